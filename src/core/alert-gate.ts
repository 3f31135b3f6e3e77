import { Case } from "../types/contracts.js";

/**
 * Rate limit for escalation notifications. Independent of the `escalated`
 * flag: the first alert always goes out, later ones at most once per interval.
 * Callers record a sent alert through the store's `markAlerted`.
 */
export function shouldSendEscalationAlert(
  c: Pick<Case, "lastEscalationAlertAt">,
  minIntervalMinutes: number,
  now: Date
): boolean {
  if (c.lastEscalationAlertAt === null) return true;
  const last = Date.parse(c.lastEscalationAlertAt);
  if (!Number.isFinite(last)) return true;
  return now.getTime() - last >= minIntervalMinutes * 60 * 1000;
}
