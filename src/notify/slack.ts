import { pino, type Logger } from "pino";
import { NotificationIntent } from "../types/contracts.js";

export interface SlackWebhooks {
  support?: string;
  escalation?: string;
  log?: string;
}

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string }
) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

export type DeliveryReport = { sent: number; skipped: number; failed: number };

export interface Notifier {
  deliver(intents: NotificationIntent[]): Promise<DeliveryReport>;
}

function channelFor(intent: NotificationIntent, hooks: SlackWebhooks): { name: string; url?: string } {
  switch (intent.kind) {
    case "new_message":
      return { name: "support", url: hooks.support };
    case "escalation_alert":
      return { name: "escalation", url: hooks.escalation };
    case "closure_log":
      return { name: "log", url: hooks.log };
  }
}

/**
 * Posts intents to Slack incoming webhooks, one channel per intent kind.
 * Delivery is best effort: failures are logged and counted, never thrown.
 */
export function createSlackNotifier(args: {
  webhooks: SlackWebhooks;
  fetch?: FetchLike;
  logger?: Logger;
}): Notifier {
  const log = args.logger ?? pino({ level: process.env.LOG_LEVEL || "info" });
  const doFetch: FetchLike = args.fetch ?? ((url, init) => fetch(url, init));

  async function deliverOne(intent: NotificationIntent): Promise<keyof DeliveryReport> {
    const channel = channelFor(intent, args.webhooks);
    if (!channel.url) {
      log.info({ kind: intent.kind, caseId: intent.caseId, channel: channel.name, text: intent.text }, "notify: webhook not configured");
      return "skipped";
    }

    try {
      const res = await doFetch(channel.url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ text: intent.text })
      });
      if (!res.ok) {
        const body = await res.text().catch(() => "");
        log.warn({ kind: intent.kind, caseId: intent.caseId, status: res.status, body: body.slice(0, 200) }, "notify: slack rejected message");
        return "failed";
      }
      return "sent";
    } catch (err) {
      log.error({ err, kind: intent.kind, caseId: intent.caseId }, "notify: slack request failed");
      return "failed";
    }
  }

  return {
    async deliver(intents) {
      const report: DeliveryReport = { sent: 0, skipped: 0, failed: 0 };
      // In order, so an alert lands before the message that caused it.
      for (const intent of intents) {
        report[await deliverOne(intent)]++;
      }
      return report;
    }
  };
}
