import rateLimit from "express-rate-limit";
import type { RelayConfig } from "../config.js";

export function makeRateLimiter(config: Pick<RelayConfig, "rateLimitWindowMs" | "rateLimitMax">) {
  return rateLimit({
    windowMs: config.rateLimitWindowMs,
    limit: config.rateLimitMax,
    standardHeaders: true,
    legacyHeaders: false,
    message: { ok: false, error: "rate_limited" }
  });
}
