import type { OutboundMessage, Ticket, TicketPriority, TicketStatus } from "../types/contracts.js";

export const STATUS_LABELS: Record<TicketStatus, string> = {
  new: "🆕 New",
  open: "🔵 Open",
  pending: "⏳ Pending",
  solved: "✅ Solved",
  closed: "🔒 Closed"
};

export const PRIORITY_LABELS: Record<TicketPriority, string> = {
  urgent: "🔴 Urgent",
  high: "🟠 High",
  normal: "🟡 Normal",
  low: "🟢 Low"
};

export const NO_PRIORITY_LABEL = "Not set";

// Free text must not add lines of its own.
function singleLine(value: string): string {
  return value.replace(/[\r\n\u2028\u2029]+/g, " ");
}

// Line order is read by the chat display; keep it stable.
export function formatTicketMessage(ticket: Ticket): string {
  const { requester } = ticket;
  const email = singleLine(requester.email);
  const who = requester.name ? `${singleLine(requester.name)} <${email}>` : email;
  return [
    `Ticket #${ticket.id} Updated!`,
    `Subject: ${singleLine(ticket.subject)}`,
    `Status: ${STATUS_LABELS[ticket.status]}`,
    `Priority: ${ticket.priority ? PRIORITY_LABELS[ticket.priority] : NO_PRIORITY_LABEL}`,
    `Requester: ${who}`
  ].join("\n");
}

export function buildOutboundMessage(channel: string, text: string): OutboundMessage {
  return Object.freeze({ channel, event: "message" as const, data: Object.freeze({ text }) });
}
