import { z } from "zod";
import { InboundMessage, ReplyContext } from "../types/contracts.js";
import { findCaseIdTag } from "../core/case-id.js";

const IGNORED_SUBTYPES = new Set(["channel_join", "channel_leave", "bot_message", "message_deleted"]);

const SlackEnvelope = z.object({
  type: z.string(),
  challenge: z.string().optional(),
  event_id: z.string().optional(),
  event: z.object({
    type: z.string(),
    subtype: z.string().optional(),
    user: z.string().optional(),
    bot_id: z.string().optional(),
    text: z.string().optional(),
    ts: z.string().optional(),
    channel: z.string().optional(),
    parent_user_id: z.string().optional()
  }).passthrough().optional()
}).passthrough();

export type SlackEventResult =
  | { kind: "challenge"; challenge: string }
  | { kind: "ignored"; reason: string }
  | { kind: "invalid"; issues: string[] }
  | { kind: "message"; message: InboundMessage };

function tsToIso(ts: string | undefined, now: Date): string {
  const seconds = Number(ts);
  return ts && Number.isFinite(seconds) ? new Date(seconds * 1000).toISOString() : now.toISOString();
}

/**
 * Maps a Slack Events API payload to an inbound message. Only plain user
 * messages become messages; everything else is acknowledged and ignored.
 */
export function slackEventToInbound(body: unknown, now: Date = new Date()): SlackEventResult {
  const parsed = SlackEnvelope.safeParse(body);
  if (!parsed.success) {
    return { kind: "invalid", issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) };
  }
  const p = parsed.data;

  if (p.type === "url_verification") {
    return p.challenge ? { kind: "challenge", challenge: p.challenge } : { kind: "invalid", issues: ["challenge: missing"] };
  }
  if (p.type !== "event_callback" || !p.event) return { kind: "ignored", reason: `envelope ${p.type}` };

  const ev = p.event;
  if (ev.type !== "message") return { kind: "ignored", reason: `event ${ev.type}` };
  if (ev.subtype && IGNORED_SUBTYPES.has(ev.subtype)) return { kind: "ignored", reason: `subtype ${ev.subtype}` };
  if (ev.bot_id) return { kind: "ignored", reason: "bot message" };
  if (!ev.user || !ev.text?.trim()) return { kind: "ignored", reason: "no user or text" };
  if (!p.event_id) return { kind: "invalid", issues: ["event_id: missing"] };

  const replyContext: ReplyContext = {};
  const tag = findCaseIdTag(ev.text);
  if (tag) replyContext.caseId = tag;
  if (ev.parent_user_id && ev.parent_user_id !== ev.user) replyContext.customerIdentifier = ev.parent_user_id;

  return {
    kind: "message",
    message: {
      externalId: p.event_id,
      source: "chat",
      sender: ev.user,
      body: ev.text,
      receivedAt: tsToIso(ev.ts, now),
      ...(replyContext.caseId || replyContext.customerIdentifier ? { replyContext } : {})
    }
  };
}
