/**
 * Rate Limiting Middleware
 *
 * Every external lookup behind /api costs upstream quota, so requests are
 * limited per client IP with express-rate-limit.
 *
 * Tiers:
 * - Agent tool execution: 20/min per IP (fans out to several upstream APIs)
 * - General API: 100/min per IP
 */

import rateLimit from "express-rate-limit";
import type { Request } from "express";

/**
 * Agent tool execution rate limiter
 * 20 requests per minute per IP
 */
export const agentRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 20,
  message: {
    error: "Too many agent requests. Please wait before trying again.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

/**
 * General API rate limiter (fallback)
 * 100 requests per minute per IP
 */
export const generalRateLimiter = rateLimit({
  windowMs: 60 * 1000, // 1 minute
  max: 100,
  message: {
    error: "Too many requests. Please slow down.",
    retryAfter: 60,
  },
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => getClientIP(req),
});

export function getClientIP(req: Request): string {
  // Trust X-Forwarded-For from reverse proxies
  const forwarded = req.headers["x-forwarded-for"];
  if (forwarded) {
    const ips = typeof forwarded === "string" ? forwarded : forwarded[0];
    return ips.split(",")[0].trim();
  }

  // Fall back to direct connection
  return req.ip || req.socket.remoteAddress || "unknown";
}
