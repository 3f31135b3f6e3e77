import { NotificationIntent } from "../types/contracts.js";

const PREVIEW_LENGTH = 200;

export function formatNewMessage(caseId: string, body: string, displayName: string): string {
  const preview = body.length > PREVIEW_LENGTH ? body.slice(0, PREVIEW_LENGTH) + "..." : body;
  return `*${displayName}* (Case #${caseId}):\n${preview}`;
}

export function formatEscalationAlert(caseId: string, reasons: string[], customerIdentifier: string): string {
  return `:rotating_light: *ESCALATION ALERT*\nCase #${caseId} for ${customerIdentifier}\nReason: ${reasons.join("; ")}`;
}

export function formatClosureLog(caseId: string, adminIdentifier: string, closedAt: Date): string {
  const stamp = closedAt.toISOString().slice(0, 19).replace("T", " ");
  return `Case #${caseId} closed at ${stamp} UTC by ${adminIdentifier}`;
}

export function newMessageIntent(args: {
  caseId: string;
  customerIdentifier: string;
  sender: string;
  isAdmin: boolean;
  body: string;
}): NotificationIntent {
  const displayName = args.isAdmin ? `Admin ${args.sender}` : `Customer ${args.customerIdentifier}`;
  return {
    kind: "new_message",
    caseId: args.caseId,
    customerIdentifier: args.customerIdentifier,
    sender: args.sender,
    isAdmin: args.isAdmin,
    text: formatNewMessage(args.caseId, args.body, displayName)
  };
}

export function escalationAlertIntent(args: {
  caseId: string;
  customerIdentifier: string;
  reasons: string[];
}): NotificationIntent {
  return {
    kind: "escalation_alert",
    caseId: args.caseId,
    customerIdentifier: args.customerIdentifier,
    reasons: args.reasons,
    text: formatEscalationAlert(args.caseId, args.reasons, args.customerIdentifier)
  };
}

export function closureLogIntent(args: {
  caseId: string;
  customerIdentifier: string;
  adminIdentifier: string;
  closedAt: Date;
}): NotificationIntent {
  return {
    kind: "closure_log",
    caseId: args.caseId,
    customerIdentifier: args.customerIdentifier,
    adminIdentifier: args.adminIdentifier,
    text: formatClosureLog(args.caseId, args.adminIdentifier, args.closedAt)
  };
}
