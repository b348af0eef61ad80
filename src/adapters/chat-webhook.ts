import { pino, type Logger } from "pino";
import { buildOutboundMessage } from "../core/format.js";
import { linearBackoff, retryWithBackoff } from "../lib/retry.js";
import type { DeliveryError, DeliveryPort, DeliveryReceipt, Result } from "../types/contracts.js";

export const DEFAULT_CHAT_WEBHOOK_BASE_URL = "https://ping.telex.im/v1/webhooks";

export interface ChatWebhookClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  maxAttempts?: number;
  baseDelayMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

export type AttemptFailure =
  | { kind: "timeout" }
  | { kind: "transport"; detail: string }
  | { kind: "http_status"; status: number; detail: string };

export function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

function errorDetail(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const cause = err.cause instanceof Error ? ` (${err.cause.message})` : "";
  return `${err.message}${cause}`;
}

/**
 * Posts formatted messages to a chat channel webhook:
 * `POST {baseUrl}/{channel}` with `{ channel, event: "message", data: { text } }`.
 *
 * Every attempt gets its own timeout. Timeouts, transport failures and non-2xx
 * replies are retried with linear backoff.
 */
export class ChatWebhookClient implements DeliveryPort {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly log: Logger;

  constructor(opts: ChatWebhookClientOptions) {
    if (!opts.baseUrl) throw new Error("Chat webhook base URL required");
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.maxAttempts = opts.maxAttempts ?? 3;
    this.baseDelayMs = opts.baseDelayMs ?? 1_000;
    this.fetchImpl = opts.fetchImpl ?? fetch;
    this.sleep = opts.sleep;
    this.log = opts.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  }

  urlFor(channel: string): string {
    return `${this.baseUrl}/${encodeURIComponent(channel)}`;
  }

  async deliver(channel: string, text: string): Promise<Result<DeliveryReceipt, DeliveryError>> {
    const message = buildOutboundMessage(channel, text);
    const url = this.urlFor(channel);
    const body = JSON.stringify(message);

    const out = await retryWithBackoff<number, AttemptFailure>((n) => this.post(url, body, n), {
      maxAttempts: this.maxAttempts,
      backoffMs: linearBackoff(this.baseDelayMs),
      isRetryable: () => true,
      sleep: this.sleep,
      onRetry: ({ attempt, error, delayMs }) =>
        this.log.warn({ channel, attempt, failure: error, delayMs }, "delivery: retrying")
    });

    if (out.ok) {
      return { ok: true, value: { status: out.value, attempts: out.attempts, message } };
    }
    return { ok: false, error: toDeliveryError(out.error, out.attempts) };
  }

  private async post(url: string, body: string, attempt: number): Promise<Result<number, AttemptFailure>> {
    try {
      const res = await this.fetchImpl(url, {
        method: "POST",
        headers: { Accept: "application/json", "Content-Type": "application/json" },
        body,
        redirect: "follow",
        signal: AbortSignal.timeout(this.timeoutMs)
      });
      if (!res.ok) {
        const raw = await res.text().catch(() => "");
        return { ok: false, error: { kind: "http_status", status: res.status, detail: raw.slice(0, 200) } };
      }
      // drain so the socket can be reused
      await res.arrayBuffer().catch(() => undefined);
      this.log.debug({ url, attempt, status: res.status }, "delivery: accepted");
      return { ok: true, value: res.status };
    } catch (err) {
      if (isTimeoutError(err)) return { ok: false, error: { kind: "timeout" } };
      return { ok: false, error: { kind: "transport", detail: errorDetail(err) } };
    }
  }
}

export function toDeliveryError(last: AttemptFailure, attempts: number): DeliveryError {
  switch (last.kind) {
    case "timeout":
      return { kind: "upstream_timeout", attempts };
    case "http_status":
      return { kind: "upstream_error", attempts, detail: `status ${last.status}: ${last.detail}` };
    case "transport":
      return { kind: "upstream_error", attempts, detail: last.detail };
  }
}
