import path from "path";

import dotenv from "dotenv";
dotenv.config({ path: path.resolve(process.cwd(), ".env.local") });
dotenv.config({ path: path.resolve(process.cwd(), ".env") });

import fs from "fs";
import { pino } from "pino";

import { loadConfig } from "./config.js";
import { SqliteStore } from "./store/sqlite.js";
import { createCaseAgent } from "./plugin/createCaseAgent.js";
import { createAdminDirectory } from "./core/admins.js";
import { createSlackNotifier } from "./notify/slack.js";
import { createEscalationTimer } from "./scheduler/escalation-timer.js";
import { createApp } from "./api/app.js";

const config = loadConfig();
const log = pino({ level: config.logLevel });

if (config.dbPath !== ":memory:") fs.mkdirSync(path.dirname(path.resolve(config.dbPath)), { recursive: true });
const store = new SqliteStore(config.dbPath);

async function main() {
  await store.init();

  const agent = createCaseAgent({
    store,
    admins: createAdminDirectory(config.admins),
    rules: config.rules,
    maxBodyLength: config.maxBodyLength,
    retentionDays: config.retentionDays,
    logger: log
  });
  const notifier = createSlackNotifier({ webhooks: config.webhooks, logger: log });
  const timer = createEscalationTimer({
    agent,
    notifier,
    intervalSeconds: config.checkIntervalSeconds,
    logger: log
  });

  const app = createApp({ config, store, agent, notifier, logger: log });
  const server = app.listen(config.port, () => {
    log.info(
      {
        PORT: config.port,
        DB_PATH: config.dbPath,
        ADMINS: config.admins.length,
        DEBUG: config.debug,
        SLACK_SIG_ENFORCED: config.slack.enforceSignature,
        INBOUND_EMAIL_KEY_CONFIGURED: Boolean(config.inboundEmailKey),
        ADMIN_KEY_CONFIGURED: Boolean(config.adminKey),
        WEBHOOKS: Object.entries(config.webhooks).filter(([, url]) => url).map(([name]) => name)
      },
      "support case tracker running"
    );
  });
  timer.start();

  const shutdown = (signal: string) => {
    log.info({ signal }, "shutting down");
    timer.stop();
    server.close(() => {
      store.close()
        .then(() => process.exit(0))
        .catch((err) => {
          log.error({ err }, "db close failed");
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  log.error({ err }, "fatal");
  process.exit(1);
});
