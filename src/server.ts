import path from "path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import { pino } from "pino";

import { loadConfig } from "./config.js";
import { makeApp } from "./app.js";
import { RELAY_PATH } from "./api/webhook.js";

// Level comes from the validated config once main() runs.
const log = pino({ level: "info" });

async function main() {
  const config = loadConfig();
  log.level = config.logLevel;

  const app = makeApp({ config, logger: log });

  app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        RELAY_PATH,
        CHAT_WEBHOOK_BASE_URL: config.chatWebhookBaseUrl,
        SIGNATURE_HEADER: config.signatureHeader,
        DELIVERY_MAX_ATTEMPTS: config.deliveryMaxAttempts,
        DELIVERY_TIMEOUT_MS: config.deliveryTimeoutMs
      },
      "Helpdesk chat relay running"
    );
  });
}

main().catch((err) => {
  log.fatal({ err }, "fatal");
  process.exit(1);
});
