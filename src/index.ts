export { createRelay } from "./plugin/createRelay.js";
export type { Relay, RelayInput, RelayOutcome } from "./plugin/createRelay.js";
export { makeApp } from "./app.js";
export { makeRelayRoutes, toHttpError, RELAY_PATH } from "./api/webhook.js";
export { computeSignature, verifyHelpdeskSignature, DEFAULT_SIGNATURE_HEADER } from "./api/verify-signature.js";
export { ChatWebhookClient, DEFAULT_CHAT_WEBHOOK_BASE_URL } from "./adapters/chat-webhook.js";
export { loadConfig, ConfigError } from "./config.js";
export type { RelayConfig } from "./config.js";
export { parseInboundWebhook, parseInboundBody } from "./core/parse.js";
export { formatTicketMessage, buildOutboundMessage, STATUS_LABELS, PRIORITY_LABELS } from "./core/format.js";
export { retryWithBackoff, linearBackoff } from "./lib/retry.js";
export type {
  Ticket,
  TicketStatus,
  TicketPriority,
  Requester,
  InboundWebhook,
  OutboundMessage,
  RelayError,
  DeliveryPort,
  DeliveryReceipt,
  Result
} from "./types/contracts.js";
