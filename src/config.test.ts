import { describe, it } from "node:test";
import assert from "node:assert";
import { ConfigError, loadConfig } from "./config.js";

const required = {
  TELEX_CHANNEL_ID: "chan-1",
  HELPDESK_SIGNING_SECRET: "test-secret"
};

describe("loadConfig", () => {
  it("applies defaults around the required values", () => {
    const cfg = loadConfig({ ...required });
    assert.deepStrictEqual(cfg, {
      chatChannelId: "chan-1",
      chatWebhookBaseUrl: "https://ping.telex.im/v1/webhooks",
      helpdeskSigningSecret: "test-secret",
      signatureHeader: "x-helpdesk-signature",
      port: 8000,
      logLevel: "info",
      deliveryTimeoutMs: 10000,
      deliveryMaxAttempts: 3,
      deliveryBaseDelayMs: 1000,
      rateLimitWindowMs: 60000,
      rateLimitMax: 60,
      corsOrigins: "*"
    });
    assert.ok(Object.isFrozen(cfg));
  });

  it("reads overrides from the environment", () => {
    const cfg = loadConfig({
      ...required,
      TELEX_WEBHOOK_BASE_URL: "https://chat.example.test/hooks/",
      HELPDESK_SIGNATURE_HEADER: "X-Signature",
      PORT: "9100",
      DELIVERY_TIMEOUT_MS: "2500",
      DELIVERY_MAX_ATTEMPTS: "5",
      DELIVERY_BASE_DELAY_MS: "0",
      CORS_ORIGINS: "https://a.example.test, https://b.example.test"
    });
    assert.strictEqual(cfg.chatWebhookBaseUrl, "https://chat.example.test/hooks");
    assert.strictEqual(cfg.signatureHeader, "x-signature");
    assert.strictEqual(cfg.port, 9100);
    assert.strictEqual(cfg.deliveryTimeoutMs, 2500);
    assert.strictEqual(cfg.deliveryMaxAttempts, 5);
    assert.strictEqual(cfg.deliveryBaseDelayMs, 0);
    assert.deepStrictEqual(cfg.corsOrigins, ["https://a.example.test", "https://b.example.test"]);
  });

  it("treats blank optional values as unset", () => {
    const cfg = loadConfig({ ...required, PORT: "", TELEX_WEBHOOK_BASE_URL: "  " });
    assert.strictEqual(cfg.port, 8000);
    assert.strictEqual(cfg.chatWebhookBaseUrl, "https://ping.telex.im/v1/webhooks");
  });

  it("fails when required values are missing or blank", () => {
    assert.throws(
      () => loadConfig({ HELPDESK_SIGNING_SECRET: " " }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.deepStrictEqual(err.variables, ["TELEX_CHANNEL_ID", "HELPDESK_SIGNING_SECRET"]);
        assert.match(err.message, /TELEX_CHANNEL_ID is required/);
        return true;
      }
    );
  });

  it("accepts a known log level and rejects an unknown one", () => {
    assert.strictEqual(loadConfig({ ...required, LOG_LEVEL: "debug" }).logLevel, "debug");
    assert.throws(
      () => loadConfig({ ...required, LOG_LEVEL: "verbose" }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.deepStrictEqual(err.variables, ["LOG_LEVEL"]);
        assert.match(err.message, /^Invalid configuration: LOG_LEVEL /);
        return true;
      }
    );
  });

  it("rejects malformed numbers and URLs", () => {
    assert.throws(
      () => loadConfig({ ...required, DELIVERY_MAX_ATTEMPTS: "0", TELEX_WEBHOOK_BASE_URL: "not a url" }),
      (err: unknown) => {
        assert.ok(err instanceof ConfigError);
        assert.deepStrictEqual([...err.variables].sort(), ["DELIVERY_MAX_ATTEMPTS", "TELEX_WEBHOOK_BASE_URL"]);
        return true;
      }
    );
  });
});
