import { Router, type RequestHandler } from "express";
import type { Logger } from "pino";
import type { RelayConfig } from "../config.js";
import type { Relay } from "../plugin/createRelay.js";
import type { RelayError } from "../types/contracts.js";
import { rawBodyParser, readRawBody } from "./raw-body.js";

export const RELAY_PATH = "/zendesk-integration";

type ErrorReply = { status: number; body: Record<string, unknown> };

export function toHttpError(err: RelayError): ErrorReply {
  switch (err.kind) {
    case "unauthenticated":
      return { status: 401, body: { ok: false, error: "missing_signature" } };
    case "forbidden":
      return { status: 403, body: { ok: false, error: "invalid_signature" } };
    case "invalid_payload":
      return { status: 400, body: { ok: false, error: "invalid_payload", field: err.field, detail: err.message } };
    case "upstream_timeout":
      return { status: 504, body: { ok: false, error: "upstream_timeout" } };
    case "upstream_error":
      return { status: 502, body: { ok: false, error: "upstream_error" } };
  }
}

export function makeRelayRoutes(args: {
  relay: Relay;
  config: Pick<RelayConfig, "signatureHeader">;
  logger: Logger;
  limiter?: RequestHandler;
}) {
  const r = Router();
  const log = args.logger;

  r.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  if (args.limiter) r.use(RELAY_PATH, args.limiter);

  r.post(RELAY_PATH, rawBodyParser(), async (req, res) => {
    const rawBody = readRawBody(req);
    try {
      const out = await args.relay.relay({ rawBody, signature: req.header(args.config.signatureHeader) });

      if (!out.ok) {
        const { status, body } = toHttpError(out.error);
        if (status >= 500) log.error({ failure: out.error }, "relay: delivery failed");
        else log.warn({ failure: out.error }, "relay: rejected");
        log.debug({ rawBody: rawBody.toString("utf8") }, "relay: rejected payload");
        res.status(status).json(body);
        return;
      }

      res.json({
        ok: true,
        message: "Sent to chat",
        ticketId: out.value.ticketId,
        payload: out.value.payload
      });
    } catch (err) {
      log.error({ err, rawBody: rawBody.toString("utf8") }, "relay: unexpected failure");
      res.status(500).json({ ok: false, error: "internal_error" });
    }
  });

  return r;
}
