import { describe, it } from "node:test";
import assert from "node:assert";
import { escalationReasons } from "./engine.js";
import { DEFAULT_URGENT_KEYWORDS } from "./predicates.js";

const rules = { escalationHours: 48, maxFollowups: 3, urgentKeywords: DEFAULT_URGENT_KEYWORDS };
const now = new Date("2024-05-10T12:00:00.000Z");
const recent = { status: "open" as const, lastMessageAt: "2024-05-10T11:00:00.000Z" };
const stale = { status: "open" as const, lastMessageAt: "2024-05-07T11:00:00.000Z" };
const C = { isAdmin: false };
const A = { isAdmin: true };

describe("escalationReasons", () => {
  it("should return nothing for a quiet, answered case", () => {
    const reasons = escalationReasons({ snapshot: recent, messages: [C, A, C], incomingBody: "Hi, need help", now, rules });
    assert.deepStrictEqual(reasons, []);
  });

  it("should report the keyword reason for an urgent message", () => {
    const reasons = escalationReasons({ snapshot: recent, messages: [C, C], incomingBody: "urgent issue", now, rules });
    assert.deepStrictEqual(reasons, ["Urgent keywords detected in message"]);
  });

  it("should combine every reason that holds, in a fixed order", () => {
    const reasons = escalationReasons({ snapshot: stale, messages: [C, C, C, C], incomingBody: "EMERGENCY", now, rules });
    assert.deepStrictEqual(reasons, [
      "Urgent keywords detected in message",
      "Inactive for more than 48 hours",
      "More than 3 follow-ups without admin reply",
    ]);
  });

  it("should skip the keyword check when no incoming body is given", () => {
    const reasons = escalationReasons({ snapshot: stale, messages: [A], now, rules });
    assert.deepStrictEqual(reasons, ["Inactive for more than 48 hours"]);
  });

  it("should use configured thresholds in the reason text", () => {
    const reasons = escalationReasons({
      snapshot: recent,
      messages: [C, C],
      now,
      rules: { ...rules, maxFollowups: 1, escalationHours: 0.5 },
    });
    assert.deepStrictEqual(reasons, [
      "Inactive for more than 0.5 hours",
      "More than 1 follow-ups without admin reply",
    ]);
  });

  it("should never escalate a closed case on time or follow-ups", () => {
    const reasons = escalationReasons({ snapshot: { ...stale, status: "closed" }, messages: [C, C, C, C, C], now, rules });
    assert.deepStrictEqual(reasons, []);
  });
});
