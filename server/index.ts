import "dotenv/config";
import express, { type Request, type Response, type NextFunction } from "express";
import compression from "compression";
import { createServer } from "http";
import { config } from "./config";
import { registerRoutes } from "./routes";
import { services } from "./services";
import { worstCaseLatencyMs } from "./engine";
import { describeError } from "./routes/httpErrors";

const app = express();
const httpServer = createServer(app);

// Enable gzip compression for all responses
app.use(compression({
  level: 6, // Balanced speed/compression
  threshold: 1024, // Only compress responses > 1KB
  filter: (req, res) => {
    // Always compress JSON API responses
    if (req.path.startsWith('/api')) return true;
    return compression.filter(req, res);
  }
}));

app.use(express.json());
app.use(express.urlencoded({ extended: false }));

export function log(message: string, source = "express") {
  const formattedTime = new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });

  console.log(`${formattedTime} [${source}] ${message}`);
}

app.use((req, res, next) => {
  const start = Date.now();
  const path = req.path;
  let capturedJsonResponse: unknown = undefined;

  const originalResJson = res.json;
  res.json = function (bodyJson) {
    capturedJsonResponse = bodyJson;
    return originalResJson.call(res, bodyJson);
  };

  res.on("finish", () => {
    const duration = Date.now() - start;
    if (path.startsWith("/api")) {
      let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
      if (capturedJsonResponse !== undefined) {
        const body = JSON.stringify(capturedJsonResponse);
        logLine += ` :: ${body.length > 200 ? `${body.slice(0, 199)}…` : body}`;
      }

      log(logLine);
    }
  });

  next();
});

registerRoutes(app, services);

app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  const { status, body } = describeError(err);
  console.error("[express] Unhandled error:", body.message);
  res.status(status).json(body);
});

httpServer.listen({ port: config.PORT, host: "0.0.0.0" }, () => {
  log(`serving on port ${config.PORT}`);
  log(
    `retry policy ${services.policy.maxAttempts} attempts, worst case ${worstCaseLatencyMs(services.policy, config.HTTP_TIMEOUT_MS)}ms per upstream call`,
    "resilient"
  );
});
