import { Case, EscalationRules, Message } from "../types/contracts.js";
import {
  DEFAULT_CLOSURE_PHRASES,
  DEFAULT_URGENT_KEYWORDS,
  findUrgentKeyword,
  hasUnansweredFollowups,
  isInactive
} from "./predicates.js";

export const DEFAULT_RULES: EscalationRules = {
  escalationHours: 48,
  maxFollowups: 3,
  urgentKeywords: DEFAULT_URGENT_KEYWORDS,
  closurePhrases: DEFAULT_CLOSURE_PHRASES,
  alertIntervalMinutes: 60
};

type EvaluationRules = Pick<EscalationRules, "escalationHours" | "maxFollowups" | "urgentKeywords">;

/**
 * Collects every escalation reason that holds. An empty list means the case
 * should not escalate.
 *
 * `incomingBody` is only given at message arrival; the scheduled sweep leaves
 * it out, so the keyword check never runs retroactively.
 */
export function escalationReasons(args: {
  snapshot: Pick<Case, "status" | "lastMessageAt">;
  messages: Array<Pick<Message, "isAdmin">>;
  incomingBody?: string;
  now: Date;
  rules: EvaluationRules;
}): string[] {
  const { snapshot, messages, rules } = args;
  const reasons: string[] = [];

  if (args.incomingBody !== undefined && findUrgentKeyword(args.incomingBody, rules.urgentKeywords) !== null) {
    reasons.push("Urgent keywords detected in message");
  }
  if (isInactive(snapshot, args.now, rules.escalationHours)) {
    reasons.push(`Inactive for more than ${rules.escalationHours} hours`);
  }
  if (hasUnansweredFollowups(snapshot, messages, rules.maxFollowups)) {
    reasons.push(`More than ${rules.maxFollowups} follow-ups without admin reply`);
  }

  return reasons;
}
