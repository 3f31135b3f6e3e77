import { describe, it } from "node:test";
import assert from "node:assert";
import { shouldSendEscalationAlert } from "./alert-gate.js";

describe("shouldSendEscalationAlert", () => {
  const t0 = new Date("2024-05-10T12:00:00.000Z");

  it("should always allow the first alert", () => {
    assert.strictEqual(shouldSendEscalationAlert({ lastEscalationAlertAt: null }, 60, t0), true);
  });

  it("should suppress a second alert inside the interval, then allow it once elapsed", () => {
    const c = { lastEscalationAlertAt: null as string | null };

    assert.strictEqual(shouldSendEscalationAlert(c, 60, t0), true);
    c.lastEscalationAlertAt = t0.toISOString();

    const tenMinutesLater = new Date(t0.getTime() + 10 * 60 * 1000);
    assert.strictEqual(shouldSendEscalationAlert(c, 60, tenMinutesLater), false);

    const anHourLater = new Date(t0.getTime() + 60 * 60 * 1000);
    assert.strictEqual(shouldSendEscalationAlert(c, 60, anHourLater), true);
  });

  it("should allow an alert one second short of the interval only after it passes", () => {
    const c = { lastEscalationAlertAt: t0.toISOString() };
    assert.strictEqual(shouldSendEscalationAlert(c, 1, new Date(t0.getTime() + 59_000)), false);
    assert.strictEqual(shouldSendEscalationAlert(c, 1, new Date(t0.getTime() + 60_000)), true);
  });
});
