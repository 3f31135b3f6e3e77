import { Router, type Response } from "express";
import { pino, type Logger } from "pino";
import type { CaseAgent } from "../plugin/createCaseAgent.js";
import type { Notifier } from "../notify/slack.js";
import { InboundMessage } from "../types/contracts.js";
import { slackEventToInbound } from "../adapters/slack-events.js";
import { emailToInbound } from "../adapters/email-inbound.js";
import { verifySlackSignature, SlackSignatureOptions } from "./verify-slack.js";
import { rawBodyOf } from "./raw-body.js";
import { makeRateLimiter } from "./rate-limit.js";
import { requireSharedKey } from "./shared-key.js";

export function makeAdapterRoutes(args: {
  agent: Pick<CaseAgent, "handleInbound">;
  notifier: Notifier;
  slack: Omit<SlackSignatureOptions, "now">;
  inboundEmailKey?: string;
  rateLimit: { windowMs: number; max: number };
  logger?: Logger;
}) {
  const r = Router();
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });

  // Global rate-limit for adapters
  r.use(makeRateLimiter(args.rateLimit));

  async function applyInbound(res: Response, message: InboundMessage) {
    try {
      const out = await args.agent.handleInbound(message);
      if (!out.ok) return res.status(400).json(out);

      // Delivery failures are logged by the notifier, not returned.
      await args.notifier.deliver(out.intents);
      return res.json({ ok: true, outcome: out.outcome, caseId: out.caseId ?? null });
    } catch (err) {
      log.error({ err, externalId: message.externalId, source: message.source }, "inbound processing failed");
      return res.status(500).json({ ok: false, error: "internal_error" });
    }
  }

  // --- Slack Events API (JSON, signed) ---
  r.post("/slack/events", async (req, res) => {
    const v = verifySlackSignature({
      timestamp: req.header("x-slack-request-timestamp"),
      signature: req.header("x-slack-signature"),
      rawBody: rawBodyOf(req)
    }, args.slack);
    if (!v.ok) return res.status(401).json({ ok: false, error: v.error });

    const ev = slackEventToInbound(req.body);
    switch (ev.kind) {
      case "challenge":
        return res.json({ challenge: ev.challenge });
      case "ignored":
        log.debug({ reason: ev.reason }, "slack event ignored");
        return res.json({ ok: true, ignored: true });
      case "invalid":
        return res.status(400).json({ ok: false, error: "invalid_input", issues: ev.issues });
      case "message":
        return applyInbound(res, ev.message);
    }
  });

  // --- Email inbound parse relay (JSON, shared key) ---
  r.post("/email/inbound", async (req, res) => {
    const k = requireSharedKey(req, "x-inbound-key", args.inboundEmailKey);
    if (!k.ok) return res.status(k.status).json({ ok: false, error: k.error });

    const ev = emailToInbound(req.body);
    if (ev.kind === "invalid") return res.status(400).json({ ok: false, error: "invalid_input", issues: ev.issues });
    return applyInbound(res, ev.message);
  });

  return r;
}
