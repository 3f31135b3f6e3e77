import { z } from "zod";
import { DEFAULT_CLOSURE_PHRASES, DEFAULT_URGENT_KEYWORDS } from "./core/predicates.js";
import { parseIdentifierList } from "./core/admins.js";
import { EscalationRules } from "./types/contracts.js";

// .env files leave unset keys as "", which should mean "use the default".
const blankToUndefined = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const truthy = (v: string) => ["1", "true", "yes"].includes(v.trim().toLowerCase());

const flag = z.preprocess(blankToUndefined, z.string().optional().transform((v) => truthy(v ?? "")));

// Unset stays undefined so the caller can pick a default.
const optionalFlag = z.preprocess(
  blankToUndefined,
  z.string().optional().transform((v) => (v === undefined ? undefined : truthy(v)))
);

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());
const optionalUrl = z.preprocess(blankToUndefined, z.string().trim().url().optional());

const list = (separator: string, fallback: string[]) =>
  z.preprocess(blankToUndefined, z.string().optional()).transform((v) => {
    if (v === undefined) return fallback;
    const items = v.split(separator).map((s) => s.trim()).filter(Boolean);
    return items.length > 0 ? items : fallback;
  });

const EnvSchema = z.object({
  PORT: positiveInt(7090),
  DB_PATH: z.preprocess(blankToUndefined, z.string().default("./data/cases.sqlite")),
  LOG_LEVEL: z.preprocess(
    blankToUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info")
  ),
  DEBUG: flag,

  ESCALATION_HOURS: positiveInt(48),
  MAX_FOLLOWUPS: positiveInt(3),
  ALERT_INTERVAL_MINUTES: positiveInt(60),
  ESCALATION_CHECK_INTERVAL: positiveInt(300),
  PROCESSED_RETENTION_DAYS: positiveInt(30),
  MAX_BODY_LENGTH: positiveInt(10_000),
  URGENT_KEYWORDS: list(",", DEFAULT_URGENT_KEYWORDS),
  CLOSURE_PHRASES: list("|", DEFAULT_CLOSURE_PHRASES),

  ADMIN_EMAILS: z.string().optional(),
  ADMIN_SLACK_IDS: z.string().optional(),
  ADMIN_KEY: optionalString,

  SLACK_SIGNING_SECRET: optionalString,
  ENFORCE_SLACK_SIG: optionalFlag,
  SLACK_MAX_SKEW_SECONDS: positiveInt(300),
  INBOUND_EMAIL_KEY: optionalString,

  SLACK_SUPPORT_WEBHOOK_URL: optionalUrl,
  SLACK_ESCALATION_WEBHOOK_URL: optionalUrl,
  SLACK_LOG_WEBHOOK_URL: optionalUrl,

  RATE_LIMIT_WINDOW_MS: positiveInt(60_000),
  RATE_LIMIT_MAX: positiveInt(60)
});

export interface AppConfig {
  port: number;
  dbPath: string;
  logLevel: string;
  debug: boolean;
  rules: EscalationRules;
  maxBodyLength: number;
  retentionDays: number;
  checkIntervalSeconds: number;
  admins: string[];
  adminKey?: string;
  slack: {
    signingSecret?: string;
    enforceSignature: boolean;
    maxSkewSeconds: number;
  };
  inboundEmailKey?: string;
  webhooks: {
    support?: string;
    escalation?: string;
    log?: string;
  };
  rateLimit: { windowMs: number; max: number };
}

/** Reads settings from the environment. Throws a ZodError on invalid values. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = EnvSchema.parse(env);
  return {
    port: e.PORT,
    dbPath: e.DB_PATH,
    logLevel: e.LOG_LEVEL,
    debug: e.DEBUG,
    rules: {
      escalationHours: e.ESCALATION_HOURS,
      maxFollowups: e.MAX_FOLLOWUPS,
      urgentKeywords: e.URGENT_KEYWORDS,
      closurePhrases: e.CLOSURE_PHRASES,
      alertIntervalMinutes: e.ALERT_INTERVAL_MINUTES
    },
    maxBodyLength: e.MAX_BODY_LENGTH,
    retentionDays: e.PROCESSED_RETENTION_DAYS,
    checkIntervalSeconds: e.ESCALATION_CHECK_INTERVAL,
    admins: [...parseIdentifierList(e.ADMIN_EMAILS), ...parseIdentifierList(e.ADMIN_SLACK_IDS)],
    adminKey: e.ADMIN_KEY,
    slack: {
      signingSecret: e.SLACK_SIGNING_SECRET,
      // A configured secret is enforced unless ENFORCE_SLACK_SIG turns it off.
      enforceSignature: e.ENFORCE_SLACK_SIG ?? e.SLACK_SIGNING_SECRET !== undefined,
      maxSkewSeconds: e.SLACK_MAX_SKEW_SECONDS
    },
    inboundEmailKey: e.INBOUND_EMAIL_KEY,
    webhooks: {
      support: e.SLACK_SUPPORT_WEBHOOK_URL,
      escalation: e.SLACK_ESCALATION_WEBHOOK_URL,
      log: e.SLACK_LOG_WEBHOOK_URL
    },
    rateLimit: { windowMs: e.RATE_LIMIT_WINDOW_MS, max: e.RATE_LIMIT_MAX }
  };
}
