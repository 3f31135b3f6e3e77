import { describe, it } from "node:test";
import assert from "node:assert";
import { ZodError } from "zod";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("should fall back to the business defaults on an empty environment", () => {
    const cfg = loadConfig({});
    assert.strictEqual(cfg.port, 7090);
    assert.strictEqual(cfg.dbPath, "./data/cases.sqlite");
    assert.strictEqual(cfg.logLevel, "info");
    assert.strictEqual(cfg.debug, false);
    assert.deepStrictEqual(cfg.rules, {
      escalationHours: 48,
      maxFollowups: 3,
      urgentKeywords: ["urgent", "immediately", "emergency", "critical"],
      closurePhrases: [
        "i'm closing this case.",
        "i am closing this case.",
        "closing this case.",
        "case closed.",
        "i'll close this case."
      ],
      alertIntervalMinutes: 60
    });
    assert.strictEqual(cfg.maxBodyLength, 10000);
    assert.strictEqual(cfg.retentionDays, 30);
    assert.strictEqual(cfg.checkIntervalSeconds, 300);
    assert.deepStrictEqual(cfg.admins, []);
    assert.deepStrictEqual(cfg.slack, { signingSecret: undefined, enforceSignature: false, maxSkewSeconds: 300 });
    assert.deepStrictEqual(cfg.rateLimit, { windowMs: 60000, max: 60 });
  });

  it("should treat blank values as unset", () => {
    const cfg = loadConfig({ ESCALATION_HOURS: "", SLACK_SUPPORT_WEBHOOK_URL: "  ", ADMIN_KEY: "" });
    assert.strictEqual(cfg.rules.escalationHours, 48);
    assert.strictEqual(cfg.webhooks.support, undefined);
    assert.strictEqual(cfg.adminKey, undefined);
  });

  it("should parse thresholds, lists and flags", () => {
    const cfg = loadConfig({
      ESCALATION_HOURS: "24",
      MAX_FOLLOWUPS: "5",
      URGENT_KEYWORDS: "asap, outage",
      CLOSURE_PHRASES: "resolved, closing.|done here.",
      ADMIN_EMAILS: "ops@example.com, lead@example.com",
      ADMIN_SLACK_IDS: "U0ADMIN01",
      DEBUG: "true",
      ENFORCE_SLACK_SIG: "1",
      SLACK_SIGNING_SECRET: "test-secret",
      SLACK_ESCALATION_WEBHOOK_URL: "https://hooks.example.com/escalation"
    });
    assert.strictEqual(cfg.rules.escalationHours, 24);
    assert.strictEqual(cfg.rules.maxFollowups, 5);
    assert.deepStrictEqual(cfg.rules.urgentKeywords, ["asap", "outage"]);
    assert.deepStrictEqual(cfg.rules.closurePhrases, ["resolved, closing.", "done here."]);
    assert.deepStrictEqual(cfg.admins, ["ops@example.com", "lead@example.com", "U0ADMIN01"]);
    assert.strictEqual(cfg.debug, true);
    assert.strictEqual(cfg.slack.enforceSignature, true);
    assert.strictEqual(cfg.slack.signingSecret, "test-secret");
    assert.strictEqual(cfg.webhooks.escalation, "https://hooks.example.com/escalation");
  });

  it("should enforce Slack signatures once a secret is set", () => {
    assert.strictEqual(loadConfig({ SLACK_SIGNING_SECRET: "test-secret" }).slack.enforceSignature, true);
    assert.strictEqual(loadConfig({ SLACK_SIGNING_SECRET: "test-secret", ENFORCE_SLACK_SIG: "" }).slack.enforceSignature, true);
    assert.strictEqual(loadConfig({ SLACK_SIGNING_SECRET: "test-secret", ENFORCE_SLACK_SIG: "false" }).slack.enforceSignature, false);
    assert.strictEqual(loadConfig({ ENFORCE_SLACK_SIG: "true" }).slack.enforceSignature, true);
  });

  it("should refuse a non-numeric threshold", () => {
    assert.throws(() => loadConfig({ MAX_FOLLOWUPS: "three" }), ZodError);
  });

  it("should refuse a malformed webhook url", () => {
    assert.throws(() => loadConfig({ SLACK_LOG_WEBHOOK_URL: "not a url" }), ZodError);
  });
});
