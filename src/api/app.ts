import express, { type NextFunction, type Request, type Response } from "express";
import type { Logger } from "pino";
import { Store } from "../store/store.js";
import type { CaseAgent } from "../plugin/createCaseAgent.js";
import type { Notifier } from "../notify/slack.js";
import { AppConfig } from "../config.js";
import { makeRoutes } from "./routes.js";
import { makeAdapterRoutes } from "./adapters.js";
import { captureRawBody } from "./raw-body.js";

export function createApp(args: {
  config: Pick<AppConfig, "debug" | "adminKey" | "slack" | "inboundEmailKey" | "rateLimit">;
  store: Store;
  agent: Pick<CaseAgent, "handleInbound" | "closeCase">;
  notifier: Notifier;
  logger: Logger;
}) {
  const { config, logger } = args;
  const app = express();
  app.use(express.json({ limit: "512kb", verify: captureRawBody }));

  app.use("/", makeRoutes({
    store: args.store,
    agent: args.agent,
    notifier: args.notifier,
    debug: config.debug,
    adminKey: config.adminKey,
    logger
  }));

  app.use("/adapters", makeAdapterRoutes({
    agent: args.agent,
    notifier: args.notifier,
    slack: {
      signingSecret: config.slack.signingSecret,
      enforce: config.slack.enforceSignature,
      maxSkewSeconds: config.slack.maxSkewSeconds
    },
    inboundEmailKey: config.inboundEmailKey,
    rateLimit: config.rateLimit,
    logger
  }));

  // Malformed JSON bodies arrive here from express.json().
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      return res.status(400).json({ ok: false, error: "invalid_json" });
    }
    logger.error({ err }, "request failed");
    res.status(500).json({ ok: false, error: "internal_error" });
  });

  return app;
}
