import { z } from "zod";
import { pino, type Logger } from "pino";
import { CaseTx, Store } from "../store/store.js";
import { AdminDirectory } from "../core/admins.js";
import { DEFAULT_RULES, escalationReasons } from "../core/engine.js";
import { isClosureCommand } from "../core/predicates.js";
import { shouldSendEscalationAlert } from "../core/alert-gate.js";
import { canTransition } from "../core/transitions.js";
import { normalizeCustomerIdentifier, sanitizeBody } from "../core/sanitize.js";
import { closureLogIntent, escalationAlertIntent, newMessageIntent } from "../core/notifications.js";
import {
  Case,
  EscalationRules,
  HandleResult,
  NotificationIntent,
  ReplyContext,
  Source
} from "../types/contracts.js";

const InboundSchema = z.object({
  externalId: z.string().trim().min(1),
  source: z.enum(["email", "chat"]),
  sender: z.string().trim().min(1),
  body: z.string(),
  receivedAt: z.string().datetime({ offset: true }).optional(),
  replyContext: z.object({
    caseId: z.string().trim().min(1).optional(),
    customerIdentifier: z.string().trim().min(1).optional()
  }).optional()
});

type Applied = Extract<HandleResult, { ok: true }>;

type Target =
  | { kind: "found"; case: Case }
  | { kind: "ambiguous"; reason: string };

export interface CaseAgentOptions {
  store: Store;
  admins: AdminDirectory;
  rules?: Partial<EscalationRules>;
  maxBodyLength?: number;
  retentionDays?: number;
  clock?: () => Date;
  logger?: Logger;
}

export type CaseAgent = ReturnType<typeof createCaseAgent>;

export function createCaseAgent(args: CaseAgentOptions) {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const rules: EscalationRules = { ...DEFAULT_RULES, ...args.rules };
  const maxBodyLength = args.maxBodyLength ?? 10_000;
  const retentionDays = args.retentionDays ?? 30;
  const clock = args.clock ?? (() => new Date());
  const store = args.store;

  async function resolveTarget(tx: CaseTx, source: Source, ctx: ReplyContext | undefined): Promise<Target> {
    if (ctx?.caseId) {
      const c = await tx.getCase(ctx.caseId);
      return c ? { kind: "found", case: c } : { kind: "ambiguous", reason: `unknown case ${ctx.caseId}` };
    }
    if (ctx?.customerIdentifier) {
      const customer = normalizeCustomerIdentifier(ctx.customerIdentifier, source);
      const c = await tx.findOpenCase(customer);
      return c ? { kind: "found", case: c } : { kind: "ambiguous", reason: `no open case for ${customer}` };
    }
    return { kind: "ambiguous", reason: "no reply context" };
  }

  async function closeWithin(tx: CaseTx, c: Case, adminIdentifier: string, now: Date): Promise<Applied> {
    if (!canTransition(c.status, "closed") || !(await tx.closeCase(c.caseId, now.toISOString()))) {
      log.info({ caseId: c.caseId, adminIdentifier }, "case: already closed");
      return { ok: true, outcome: "already_closed", caseId: c.caseId, intents: [] };
    }

    log.info({ caseId: c.caseId, adminIdentifier }, "case: closed");
    return {
      ok: true,
      outcome: "closed",
      caseId: c.caseId,
      intents: [closureLogIntent({
        caseId: c.caseId,
        customerIdentifier: c.customerIdentifier,
        adminIdentifier,
        closedAt: now
      })]
    };
  }

  async function applyClosure(tx: CaseTx, ev: ParsedInbound, now: Date): Promise<Applied> {
    const target = await resolveTarget(tx, ev.source, ev.replyContext);
    if (target.kind === "ambiguous") {
      log.warn({ adminIdentifier: ev.sender, reason: target.reason }, "closure ignored: ambiguous target");
      return { ok: true, outcome: "closure_ignored", intents: [] };
    }
    return closeWithin(tx, target.case, ev.sender, now);
  }

  async function applyAdminReply(tx: CaseTx, ev: ParsedInbound, body: string, now: Date): Promise<Applied> {
    const target = await resolveTarget(tx, ev.source, ev.replyContext);
    if (target.kind === "ambiguous" || target.case.status !== "open") {
      const reason = target.kind === "ambiguous" ? target.reason : `case ${target.case.caseId} is closed`;
      log.info({ adminIdentifier: ev.sender, reason }, "admin message: no open case to attach to");
      return { ok: true, outcome: "admin_unrouted", intents: [] };
    }

    const c = target.case;
    await tx.appendMessage(c.caseId, {
      sender: ev.sender,
      isAdmin: true,
      body,
      timestamp: ev.receivedAt,
      source: ev.source
    }, now.toISOString());

    log.info({ caseId: c.caseId, adminIdentifier: ev.sender }, "message: admin reply appended");
    return {
      ok: true,
      outcome: "appended",
      caseId: c.caseId,
      intents: [newMessageIntent({
        caseId: c.caseId,
        customerIdentifier: c.customerIdentifier,
        sender: ev.sender,
        isAdmin: true,
        body
      })]
    };
  }

  async function applyCustomerMessage(tx: CaseTx, ev: ParsedInbound, body: string, now: Date): Promise<Applied> {
    const nowIso = now.toISOString();
    const customer = normalizeCustomerIdentifier(ev.sender, ev.source);

    // `snapshot` is the case as it was before this message landed.
    const { case: snapshot, created } = await tx.resolveOrCreateCase(customer, nowIso);
    if (created) log.info({ caseId: snapshot.caseId, customer }, "case: created");

    await tx.appendMessage(snapshot.caseId, {
      sender: ev.sender,
      isAdmin: false,
      body,
      timestamp: ev.receivedAt,
      source: ev.source
    }, nowIso);
    const messages = await tx.listMessages(snapshot.caseId);

    const intents: NotificationIntent[] = [];
    const reasons = escalationReasons({ snapshot, messages, incomingBody: body, now, rules });

    if (reasons.length > 0 && !snapshot.escalated && (await tx.markEscalated(snapshot.caseId, nowIso))) {
      log.info({ caseId: snapshot.caseId, reasons }, "case: escalated");
      if (shouldSendEscalationAlert(snapshot, rules.alertIntervalMinutes, now)) {
        intents.push(escalationAlertIntent({ caseId: snapshot.caseId, customerIdentifier: customer, reasons }));
        await tx.markAlerted(snapshot.caseId, nowIso);
      } else {
        log.info({ caseId: snapshot.caseId }, "escalation alert suppressed by gate");
      }
    }

    intents.push(newMessageIntent({
      caseId: snapshot.caseId,
      customerIdentifier: customer,
      sender: ev.sender,
      isAdmin: false,
      body
    }));

    log.info({ caseId: snapshot.caseId, messageCount: messages.length }, "message: appended");
    return { ok: true, outcome: created ? "created" : "appended", caseId: snapshot.caseId, intents };
  }

  /**
   * Applies one inbound message in a single transaction. Nothing is written,
   * and the ledger is left untouched, when the message is rejected or when
   * applying it throws, so the transport can safely redeliver.
   */
  async function handleInbound(raw: unknown): Promise<HandleResult> {
    const parsed = InboundSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      log.warn({ issues }, "inbound rejected");
      return { ok: false, error: "invalid_input", issues };
    }

    const body = sanitizeBody(parsed.data.body, maxBodyLength);
    if (!body) {
      log.warn({ externalId: parsed.data.externalId }, "inbound rejected: empty body");
      return { ok: false, error: "invalid_input", issues: ["body: empty after sanitization"] };
    }

    return store.transaction<HandleResult>(async (tx) => {
      const now = clock();
      const ev: ParsedInbound = {
        ...parsed.data,
        receivedAt: parsed.data.receivedAt ? new Date(parsed.data.receivedAt).toISOString() : now.toISOString()
      };

      if (await tx.isProcessed(ev.externalId, ev.source)) {
        log.info({ externalId: ev.externalId, source: ev.source }, "dedupe: duplicate delivery");
        return { ok: true, outcome: "duplicate", intents: [] };
      }

      const isAdmin = args.admins.isAdmin(ev.sender);
      let result: Applied;
      if (isAdmin && isClosureCommand(body, rules.closurePhrases)) {
        result = await applyClosure(tx, ev, now);
      } else if (isAdmin) {
        result = await applyAdminReply(tx, ev, body, now);
      } else {
        result = await applyCustomerMessage(tx, ev, body, now);
      }

      const recorded = await tx.recordProcessed(ev.externalId, ev.source, result.caseId ?? null, now.toISOString());
      if (recorded === "duplicate") {
        log.warn({ externalId: ev.externalId, source: ev.source }, "dedupe: ledger row already present (concurrent delivery)");
      }
      return result;
    });
  }

  /** Closes a case by id on behalf of an admin. */
  async function closeCase(caseId: string, adminIdentifier: string): Promise<Applied> {
    return store.transaction<Applied>(async (tx) => {
      const c = await tx.getCase(caseId);
      if (!c) {
        log.warn({ caseId, adminIdentifier }, "closure ignored: unknown case");
        return { ok: true, outcome: "closure_ignored", intents: [] };
      }
      return closeWithin(tx, c, adminIdentifier, clock());
    });
  }

  /**
   * Re-evaluates every open case against the time and follow-up rules. Each
   * case is handled in its own transaction; a failure is logged and the sweep
   * moves on to the next case.
   */
  async function runEscalationSweep(): Promise<NotificationIntent[]> {
    const now = clock();
    const nowIso = now.toISOString();
    const open = await store.transaction((tx) => tx.listOpenCases());

    const intents: NotificationIntent[] = [];
    let escalated = 0;
    let suppressed = 0;
    let failed = 0;

    for (const candidate of open) {
      try {
        const intent = await store.transaction<NotificationIntent | null>(async (tx) => {
          const c = await tx.getCase(candidate.caseId);
          if (!c || c.status !== "open") return null;

          const messages = await tx.listMessages(c.caseId);
          const reasons = escalationReasons({ snapshot: c, messages, now, rules });
          if (reasons.length === 0) return null;

          if (!c.escalated && (await tx.markEscalated(c.caseId, nowIso))) {
            escalated++;
            log.info({ caseId: c.caseId, reasons }, "case: escalated");
          }
          if (!shouldSendEscalationAlert(c, rules.alertIntervalMinutes, now)) {
            suppressed++;
            return null;
          }
          await tx.markAlerted(c.caseId, nowIso);
          return escalationAlertIntent({ caseId: c.caseId, customerIdentifier: c.customerIdentifier, reasons });
        });
        if (intent) intents.push(intent);
      } catch (err) {
        failed++;
        log.error({ err, caseId: candidate.caseId }, "sweep: case evaluation failed");
      }
    }

    log.info({ open: open.length, escalated, alerts: intents.length, suppressed, failed }, "sweep: done");
    return intents;
  }

  async function pruneProcessed(): Promise<number> {
    const cutoff = new Date(clock().getTime() - retentionDays * 24 * 60 * 60 * 1000).toISOString();
    const removed = await store.pruneProcessed(cutoff);
    if (removed > 0) log.info({ removed, cutoff }, "dedupe: pruned ledger");
    return removed;
  }

  return { handleInbound, closeCase, runEscalationSweep, pruneProcessed, rules };
}

type ParsedInbound = z.infer<typeof InboundSchema> & { receivedAt: string };
