export { createCaseAgent } from "./plugin/createCaseAgent.js";
export type { CaseAgent, CaseAgentOptions } from "./plugin/createCaseAgent.js";
export { SqliteStore } from "./store/sqlite.js";
export type { Store, CaseTx } from "./store/store.js";
export { createAdminDirectory } from "./core/admins.js";
export { DEFAULT_RULES, escalationReasons } from "./core/engine.js";
export { createSlackNotifier } from "./notify/slack.js";
export { createEscalationTimer } from "./scheduler/escalation-timer.js";
export { slackEventToInbound } from "./adapters/slack-events.js";
export { emailToInbound } from "./adapters/email-inbound.js";
export { createApp } from "./api/app.js";
export { loadConfig } from "./config.js";
export type {
  Case,
  Message,
  ProcessedMessage,
  InboundMessage,
  NotificationIntent,
  HandleResult,
  EscalationRules,
  Source,
  CaseStatus
} from "./types/contracts.js";
