import { z } from "zod";
import { DEFAULT_CHAT_WEBHOOK_BASE_URL } from "./adapters/chat-webhook.js";
import { DEFAULT_SIGNATURE_HEADER } from "./api/verify-signature.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface RelayConfig {
  readonly chatChannelId: string;
  readonly chatWebhookBaseUrl: string;
  readonly helpdeskSigningSecret: string;
  readonly signatureHeader: string;
  readonly port: number;
  readonly logLevel: LogLevel;
  readonly deliveryTimeoutMs: number;
  readonly deliveryMaxAttempts: number;
  readonly deliveryBaseDelayMs: number;
  readonly rateLimitWindowMs: number;
  readonly rateLimitMax: number;
  readonly corsOrigins: "*" | readonly string[];
}

export class ConfigError extends Error {
  constructor(readonly variables: string[], detail: string) {
    super(`Invalid configuration: ${detail}`);
    this.name = "ConfigError";
  }
}

// blank values count as unset
const optional = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const required = z.preprocess(optional, z.string({ required_error: "is required" }).trim().min(1, "is required"));
const int = (def: number, min: number) => z.preprocess(optional, z.coerce.number().int().min(min).default(def));

const EnvSchema = z.object({
  TELEX_CHANNEL_ID: required,
  TELEX_WEBHOOK_BASE_URL: z.preprocess(optional, z.string().url().default(DEFAULT_CHAT_WEBHOOK_BASE_URL)),
  HELPDESK_SIGNING_SECRET: required,
  HELPDESK_SIGNATURE_HEADER: z.preprocess(
    optional,
    z.string().trim().toLowerCase().default(DEFAULT_SIGNATURE_HEADER)
  ),
  PORT: int(8000, 0),
  LOG_LEVEL: z.preprocess(optional, z.enum(LOG_LEVELS).default("info")),
  DELIVERY_TIMEOUT_MS: int(10_000, 1),
  DELIVERY_MAX_ATTEMPTS: int(3, 1),
  DELIVERY_BASE_DELAY_MS: int(1_000, 0),
  RATE_LIMIT_WINDOW_MS: int(60_000, 1),
  RATE_LIMIT_MAX: int(60, 1),
  CORS_ORIGINS: z.preprocess(optional, z.string().default("*"))
});

function parseOrigins(raw: string): "*" | readonly string[] {
  const list = raw.split(",").map((x) => x.trim()).filter(Boolean);
  if (list.length === 0 || list.includes("*")) return "*";
  return Object.freeze(list);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const variables = [...new Set(parsed.error.issues.map((i) => String(i.path[0])))];
    const detail = parsed.error.issues.map((i) => `${String(i.path[0])} ${i.message}`).join("; ");
    throw new ConfigError(variables, detail);
  }

  const e = parsed.data;
  return Object.freeze({
    chatChannelId: e.TELEX_CHANNEL_ID,
    chatWebhookBaseUrl: e.TELEX_WEBHOOK_BASE_URL.replace(/\/+$/, ""),
    helpdeskSigningSecret: e.HELPDESK_SIGNING_SECRET,
    signatureHeader: e.HELPDESK_SIGNATURE_HEADER,
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    deliveryTimeoutMs: e.DELIVERY_TIMEOUT_MS,
    deliveryMaxAttempts: e.DELIVERY_MAX_ATTEMPTS,
    deliveryBaseDelayMs: e.DELIVERY_BASE_DELAY_MS,
    rateLimitWindowMs: e.RATE_LIMIT_WINDOW_MS,
    rateLimitMax: e.RATE_LIMIT_MAX,
    corsOrigins: parseOrigins(e.CORS_ORIGINS)
  });
}
