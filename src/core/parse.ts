import { z } from "zod";
import {
  TICKET_PRIORITIES,
  TICKET_STATUSES,
  type InboundWebhook,
  type InvalidPayload,
  type Result,
  type Ticket
} from "../types/contracts.js";

// Template-driven helpdesk webhooks render placeholders as strings ("42", "Open").
const TicketId = z.preprocess(
  (v) => (typeof v === "string" && /^\d+$/.test(v.trim()) ? Number(v.trim()) : v),
  z.number().int().nonnegative().safe()
);

const lowered = z.string().transform((s) => s.trim().toLowerCase());

const Status = lowered.pipe(z.enum(TICKET_STATUSES));

const Priority = z.preprocess(
  (v) => (v === null || (typeof v === "string" && v.trim() === "") ? undefined : v),
  lowered.pipe(z.enum(TICKET_PRIORITIES)).optional()
);

const RequesterSchema = z.object({
  email: z.string().trim().min(1),
  name: z.preprocess((v) => (v === null || v === "" ? undefined : v), z.string().optional())
});

const InboundSchema = z.object({
  ticket: z.object({
    id: TicketId,
    subject: z.string(),
    status: Status,
    priority: Priority,
    requester: RequesterSchema
  })
});

function invalid(field: string, reason: InvalidPayload["reason"]): InvalidPayload {
  const message =
    reason === "missing" ? `missing ${field}`
    : reason === "invalid_enum" ? `invalid enum value for ${field}`
    : reason === "malformed" ? "malformed JSON"
    : `invalid ${field}`;
  return { kind: "invalid_payload", field, reason, message };
}

function fromIssue(issue: z.ZodIssue): InvalidPayload {
  const field = issue.path.length ? issue.path.join(".") : "body";
  if (issue.code === "invalid_type" && (issue.received === "undefined" || issue.received === "null")) {
    return invalid(field, "missing");
  }
  if (issue.code === "too_small" && field === "ticket.requester.email") return invalid(field, "missing");
  if (issue.code === "invalid_enum_value") return invalid(field, "invalid_enum");
  return invalid(field, "invalid_type");
}

export function parseInboundWebhook(raw: unknown): Result<InboundWebhook, InvalidPayload> {
  if (raw === null || typeof raw !== "object" || Array.isArray(raw)) {
    return { ok: false, error: invalid("body", "invalid_type") };
  }

  const parsed = InboundSchema.safeParse(raw);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    return { ok: false, error: first ? fromIssue(first) : invalid("body", "invalid_type") };
  }

  const t = parsed.data.ticket;
  const requester: Ticket["requester"] = { email: t.requester.email };
  if (t.requester.name !== undefined) requester.name = t.requester.name;

  const ticket: Ticket = { id: t.id, subject: t.subject, status: t.status, requester };
  if (t.priority !== undefined) ticket.priority = t.priority;

  return { ok: true, value: { ticket } };
}

export function parseInboundBody(rawBody: Buffer): Result<InboundWebhook, InvalidPayload> {
  let raw: unknown;
  try {
    raw = JSON.parse(rawBody.toString("utf8"));
  } catch {
    return { ok: false, error: invalid("body", "malformed") };
  }
  return parseInboundWebhook(raw);
}
