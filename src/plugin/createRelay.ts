import { pino, type Logger } from "pino";
import type { RelayConfig } from "../config.js";
import { verifyHelpdeskSignature } from "../api/verify-signature.js";
import { parseInboundBody } from "../core/parse.js";
import { formatTicketMessage } from "../core/format.js";
import type { DeliveryPort, OutboundMessage, RelayError, Result } from "../types/contracts.js";

export interface RelayInput {
  rawBody: Buffer;
  signature?: string;
}

export interface RelayOutcome {
  ticketId: number;
  attempts: number;
  payload: OutboundMessage;
}

export type Relay = ReturnType<typeof createRelay>;

export function createRelay(args: {
  config: Pick<RelayConfig, "chatChannelId" | "helpdeskSigningSecret">;
  delivery: DeliveryPort;
  logger?: Logger;
}) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });

  async function relay(input: RelayInput): Promise<Result<RelayOutcome, RelayError>> {
    const sig = verifyHelpdeskSignature(input.rawBody, input.signature, args.config.helpdeskSigningSecret);
    if (!sig.ok) return sig;

    const parsed = parseInboundBody(input.rawBody);
    if (!parsed.ok) return parsed;

    const { ticket } = parsed.value;
    log.debug({ ticketId: ticket.id, status: ticket.status }, "relay: ticket parsed");

    const text = formatTicketMessage(ticket);
    const sent = await args.delivery.deliver(args.config.chatChannelId, text);
    if (!sent.ok) return sent;

    log.info({ ticketId: ticket.id, attempts: sent.value.attempts }, "relay: delivered");
    return {
      ok: true,
      value: { ticketId: ticket.id, attempts: sent.value.attempts, payload: sent.value.message }
    };
  }

  return { relay };
}
