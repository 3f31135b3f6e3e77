import { Case, Message } from "../types/contracts.js";

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_URGENT_KEYWORDS = ["urgent", "immediately", "emergency", "critical"];

export const DEFAULT_CLOSURE_PHRASES = [
  "i'm closing this case.",
  "i am closing this case.",
  "closing this case.",
  "case closed.",
  "i'll close this case."
];

/** True once more than `escalationHours` have passed since the last message (UTC on both sides). */
export function isInactive(
  c: Pick<Case, "status" | "lastMessageAt">,
  now: Date,
  escalationHours: number
): boolean {
  if (c.status !== "open") return false;
  const last = Date.parse(c.lastMessageAt);
  if (!Number.isFinite(last)) return false;
  return now.getTime() - last > escalationHours * HOUR_MS;
}

/**
 * Length of the trailing run of customer messages. `messages` must be in
 * arrival order; an admin message ends the run.
 */
export function trailingCustomerRun(messages: Array<Pick<Message, "isAdmin">>): number {
  let run = 0;
  for (let i = messages.length - 1; i >= 0; i--) {
    if (messages[i].isAdmin) break;
    run++;
  }
  return run;
}

export function hasUnansweredFollowups(
  c: Pick<Case, "status">,
  messages: Array<Pick<Message, "isAdmin">>,
  maxFollowups: number
): boolean {
  if (c.status !== "open") return false;
  return trailingCustomerRun(messages) > maxFollowups;
}

// Substring match: "urgent" also matches inside "nonurgent".
export function findUrgentKeyword(body: string, keywords: string[]): string | null {
  const lower = body.toLowerCase();
  for (const k of keywords) {
    const needle = k.trim().toLowerCase();
    if (needle && lower.includes(needle)) return k;
  }
  return null;
}

export function isClosureCommand(body: string, phrases: string[]): boolean {
  const lower = body.toLowerCase();
  return phrases.some((p) => {
    const needle = p.trim().toLowerCase();
    return needle.length > 0 && lower.includes(needle);
  });
}
