export const TICKET_STATUSES = ["new", "open", "pending", "solved", "closed"] as const;
export const TICKET_PRIORITIES = ["low", "normal", "high", "urgent"] as const;

export type TicketStatus = (typeof TICKET_STATUSES)[number];
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];

export interface Requester {
  email: string;
  name?: string;
}

export interface Ticket {
  id: number;
  subject: string;
  status: TicketStatus;
  priority?: TicketPriority; // absent = no priority set
  requester: Requester;
}

export interface InboundWebhook {
  ticket: Ticket;
}

export interface OutboundMessage {
  readonly channel: string;
  readonly event: "message";
  readonly data: { readonly text: string };
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type Unauthenticated = { kind: "unauthenticated" };
export type Forbidden = { kind: "forbidden" };

export interface InvalidPayload {
  kind: "invalid_payload";
  field: string;
  reason: "missing" | "invalid_enum" | "invalid_type" | "malformed";
  message: string;
}

export interface UpstreamTimeout {
  kind: "upstream_timeout";
  attempts: number;
}

export interface UpstreamError {
  kind: "upstream_error";
  attempts: number;
  detail: string;
}

export type SignatureError = Unauthenticated | Forbidden;
export type DeliveryError = UpstreamTimeout | UpstreamError;
export type RelayError = SignatureError | InvalidPayload | DeliveryError;

export interface DeliveryReceipt {
  status: number;
  attempts: number;
  message: OutboundMessage;
}

/** Anything that can push a formatted message to a chat channel. */
export interface DeliveryPort {
  deliver(channel: string, text: string): Promise<Result<DeliveryReceipt, DeliveryError>>;
}
