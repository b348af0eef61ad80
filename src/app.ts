import express, { type ErrorRequestHandler } from "express";
import cors from "cors";
import type { Logger } from "pino";

import type { RelayConfig } from "./config.js";
import { ChatWebhookClient } from "./adapters/chat-webhook.js";
import { createRelay } from "./plugin/createRelay.js";
import { makeRelayRoutes } from "./api/webhook.js";
import { makeRateLimiter } from "./api/rate-limit.js";
import type { DeliveryPort } from "./types/contracts.js";

function isBodyParserError(err: unknown): err is { type: string; status: number } {
  return typeof err === "object" && err !== null && "type" in err && "status" in err
    && typeof err.type === "string" && typeof err.status === "number";
}

export function makeApp(args: { config: RelayConfig; logger: Logger; delivery?: DeliveryPort }) {
  const { config, logger: log } = args;

  const delivery = args.delivery ?? new ChatWebhookClient({
    baseUrl: config.chatWebhookBaseUrl,
    timeoutMs: config.deliveryTimeoutMs,
    maxAttempts: config.deliveryMaxAttempts,
    baseDelayMs: config.deliveryBaseDelayMs,
    logger: log
  });
  const relay = createRelay({ config, delivery, logger: log });

  const app = express();
  app.disable("x-powered-by");
  app.use(cors({
    origin: config.corsOrigins === "*" ? true : [...config.corsOrigins],
    credentials: true,
    methods: ["POST", "OPTIONS"]
  }));

  app.use("/", makeRelayRoutes({ relay, config, logger: log, limiter: makeRateLimiter(config) }));

  const onError: ErrorRequestHandler = (err, _req, res, _next) => {
    if (isBodyParserError(err) && err.type === "entity.too.large") {
      log.warn({ err }, "request body too large");
      res.status(413).json({ ok: false, error: "payload_too_large" });
      return;
    }
    log.error({ err }, "unhandled error");
    res.status(500).json({ ok: false, error: "internal_error" });
  };
  app.use(onError);

  return app;
}
