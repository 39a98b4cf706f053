import type { Express, Request, Response } from "express";
import { generalRateLimiter } from "./middleware/rateLimiter";
import type { Services } from "./services";
import { createRecommendationsRouter, createPlacesRouter, createListingsRouter } from "./routes/recommendations";
import { createWeatherRouter } from "./routes/weather";
import { createTravelRouter } from "./routes/travel";
import { createItinerariesRouter } from "./routes/itineraries";
import { createAgentRouter } from "./routes/agent";

export function registerRoutes(app: Express, services: Services): void {
  app.use("/api", generalRateLimiter);

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({
      status: "ok",
      cache: services.cache.stats(),
      retryPolicy: services.policy,
    });
  });

  app.use("/api/recommendations", createRecommendationsRouter(services.recommendations));
  app.use("/api/places", createPlacesRouter(services.recommendations));
  app.use("/api/listings", createListingsRouter(services.recommendations));
  app.use("/api/weather", createWeatherRouter(services.weather));
  app.use("/api/travel", createTravelRouter(services));
  app.use("/api/itineraries", createItinerariesRouter(services.storage));
  app.use("/api/agent", createAgentRouter(services));
}
