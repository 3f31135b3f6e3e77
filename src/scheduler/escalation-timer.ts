import { pino, type Logger } from "pino";
import type { CaseAgent } from "../plugin/createCaseAgent.js";
import type { DeliveryReport, Notifier } from "../notify/slack.js";

export type TickReport = { alerts: number; pruned: number; delivery: DeliveryReport };

export interface EscalationTimer {
  start(): void;
  stop(): void;
  /** One sweep, prune and delivery pass. Resolves to null when a tick is already in flight. */
  tick(): Promise<TickReport | null>;
}

export function createEscalationTimer(args: {
  agent: Pick<CaseAgent, "runEscalationSweep" | "pruneProcessed">;
  notifier: Notifier;
  intervalSeconds: number;
  logger?: Logger;
}): EscalationTimer {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  let timer: ReturnType<typeof setInterval> | null = null;
  let inFlight = false;

  async function tick(): Promise<TickReport | null> {
    if (inFlight) {
      log.warn("escalation tick skipped: previous tick still running");
      return null;
    }
    inFlight = true;
    try {
      const intents = await args.agent.runEscalationSweep();
      const pruned = await args.agent.pruneProcessed();
      const delivery = await args.notifier.deliver(intents);
      log.debug({ alerts: intents.length, pruned, delivery }, "escalation tick done");
      return { alerts: intents.length, pruned, delivery };
    } finally {
      inFlight = false;
    }
  }

  return {
    tick,

    start() {
      if (timer) return;
      timer = setInterval(() => {
        tick().catch((err) => log.error({ err }, "escalation tick failed"));
      }, args.intervalSeconds * 1000);
      log.info({ intervalSeconds: args.intervalSeconds }, "escalation timer started");
    },

    stop() {
      if (!timer) return;
      clearInterval(timer);
      timer = null;
      log.info("escalation timer stopped");
    }
  };
}
