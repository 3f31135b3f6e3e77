export type Source = "email" | "chat";
export type CaseStatus = "open" | "closed";

export interface Case {
  caseId: string;
  customerIdentifier: string;
  status: CaseStatus;
  createdAt: string; // ISO, UTC
  lastMessageAt: string; // ISO, UTC
  messageCount: number;
  escalated: boolean;
  escalatedAt: string | null;
  lastEscalationAlertAt: string | null;
  closedAt: string | null;
}

export interface Message {
  id: number;
  caseId: string;
  sender: string;
  isAdmin: boolean;
  body: string;
  timestamp: string; // ISO, UTC
  source: Source;
}

export interface ProcessedMessage {
  externalMessageId: string;
  source: Source;
  caseId: string | null;
  processedAt: string; // ISO, UTC
}

/** Hints from the channel about which case an admin is answering. */
export interface ReplyContext {
  caseId?: string;
  customerIdentifier?: string;
}

export interface InboundMessage {
  externalId: string;
  source: Source;
  sender: string;
  body: string;
  receivedAt: string; // ISO
  replyContext?: ReplyContext;
}

export type NotificationIntent =
  | {
      kind: "new_message";
      caseId: string;
      text: string;
      customerIdentifier: string;
      sender: string;
      isAdmin: boolean;
    }
  | {
      kind: "escalation_alert";
      caseId: string;
      text: string;
      customerIdentifier: string;
      reasons: string[];
    }
  | {
      kind: "closure_log";
      caseId: string;
      text: string;
      customerIdentifier: string;
      adminIdentifier: string;
    };

export type InboundOutcome =
  | "duplicate"
  | "created"
  | "appended"
  | "closed"
  | "already_closed"
  | "closure_ignored"
  | "admin_unrouted";

export type HandleResult =
  | { ok: true; outcome: InboundOutcome; caseId?: string; intents: NotificationIntent[] }
  | { ok: false; error: "invalid_input"; issues: string[] };

export interface EscalationRules {
  escalationHours: number;
  maxFollowups: number;
  urgentKeywords: string[];
  closurePhrases: string[];
  alertIntervalMinutes: number;
}
