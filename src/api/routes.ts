import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import { pino, type Logger } from "pino";
import { Store } from "../store/store.js";
import type { CaseAgent } from "../plugin/createCaseAgent.js";
import type { Notifier } from "../notify/slack.js";
import { requireSharedKey } from "./shared-key.js";

const ListQuery = z.object({
  status: z.enum(["open", "closed"]).optional(),
  limit: z.coerce.number().int().min(1).max(200).default(50),
  offset: z.coerce.number().int().min(0).default(0)
});

const CloseBody = z.object({
  adminIdentifier: z.string().trim().min(1)
});

type AsyncHandler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not see rejected handler promises; hand them to the error middleware.
const wrap = (fn: AsyncHandler) => (req: Request, res: Response, next: NextFunction) => {
  fn(req, res).catch(next);
};

export function makeRoutes(args: {
  store: Store;
  agent: Pick<CaseAgent, "closeCase">;
  notifier: Notifier;
  debug: boolean;
  adminKey?: string;
  logger?: Logger;
}) {
  const r = Router();
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });

  // Case inspection routes exist only with DEBUG on.
  function debugOnly(_req: Request, res: Response, next: NextFunction) {
    if (!args.debug) return res.status(404).json({ ok: false, error: "not_found" });
    next();
  }

  r.get("/health", async (_req, res) => {
    try {
      await args.store.ping();
      res.json({ ok: true });
    } catch (err) {
      log.error({ err }, "health: database unreachable");
      res.status(503).json({ ok: false, error: "db_unavailable" });
    }
  });

  r.get("/cases", debugOnly, wrap(async (req, res) => {
    const q = ListQuery.safeParse(req.query);
    if (!q.success) return res.status(400).json({ ok: false, error: "invalid_query" });
    const cases = await args.store.listCases(q.data);
    res.json({ ok: true, cases });
  }));

  r.get("/cases/:id", debugOnly, wrap(async (req, res) => {
    const item = await args.store.getCase(req.params.id);
    if (!item) return res.status(404).json({ ok: false, error: "not_found" });
    const messages = await args.store.listMessages(item.caseId);
    res.json({ ok: true, case: item, messages });
  }));

  r.delete("/cases/:id", debugOnly, wrap(async (req, res) => {
    const deleted = await args.store.deleteCase(req.params.id);
    if (!deleted) return res.status(404).json({ ok: false, error: "not_found" });
    log.warn({ caseId: req.params.id }, "case: deleted");
    res.json({ ok: true });
  }));

  r.post("/cases/:id/close", wrap(async (req, res) => {
    const k = requireSharedKey(req, "x-admin-key", args.adminKey);
    if (!k.ok) return res.status(k.status).json({ ok: false, error: k.error });

    const body = CloseBody.safeParse(req.body ?? {});
    if (!body.success) return res.status(400).json({ ok: false, error: "missing_admin_identifier" });

    const out = await args.agent.closeCase(req.params.id, body.data.adminIdentifier);
    if (out.outcome === "closure_ignored") return res.status(404).json({ ok: false, error: "not_found" });

    await args.notifier.deliver(out.intents);
    res.json({ ok: true, outcome: out.outcome, caseId: out.caseId });
  }));

  return r;
}
