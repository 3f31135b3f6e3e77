import { z } from "zod";
import { InboundMessage, ReplyContext } from "../types/contracts.js";
import { findCaseIdTag } from "../core/case-id.js";
import { fingerprintOf } from "../core/dedupe.js";

/** JSON shape posted by an inbound-parse relay. */
const EmailInbound = z.object({
  from: z.string().trim().min(1),
  to: z.union([z.string(), z.array(z.string())]).optional(),
  subject: z.string().optional(),
  text: z.string().optional(),
  html: z.string().optional(),
  messageId: z.string().optional(),
  date: z.string().optional(),
  headers: z.record(z.string()).optional()
}).passthrough();

export type EmailInboundResult =
  | { kind: "invalid"; issues: string[] }
  | { kind: "message"; message: InboundMessage };

/** `Jane Doe <jane@example.com>` -> `jane@example.com`; a bare address passes through. */
export function parseAddress(header: string): string {
  const m = header.match(/<([^<>]+)>/);
  return (m ? m[1] : header).trim().toLowerCase();
}

function stripHtml(html: string): string {
  return html.replace(/<[^>]*>/g, " ").replace(/\s+/g, " ").trim();
}

function headerValue(headers: Record<string, string> | undefined, name: string): string | undefined {
  if (!headers) return undefined;
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name);
  return key ? headers[key] : undefined;
}

function firstRecipient(to: string | string[] | undefined): string | undefined {
  const first = Array.isArray(to) ? to[0] : to?.split(",")[0];
  const addr = first ? parseAddress(first) : "";
  return addr || undefined;
}

function sentDate(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const d = new Date(raw);
  return Number.isNaN(d.getTime()) ? undefined : d.toISOString();
}

export function emailToInbound(body: unknown, now: Date = new Date()): EmailInboundResult {
  const parsed = EmailInbound.safeParse(body);
  if (!parsed.success) {
    return { kind: "invalid", issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`) };
  }
  const p = parsed.data;

  const sender = parseAddress(p.from);
  const subject = (p.subject ?? "").trim();
  const text = (p.text ?? "").trim();
  const content = text || (p.html ? stripHtml(p.html) : "");
  const fullBody = subject ? `${subject}\n\n${content}` : content;

  // The Date header is the sender's clock; messages are ordered by when the relay got them.
  const receivedAt = now.toISOString();
  const sentAt = sentDate(p.date ?? headerValue(p.headers, "date"));

  const rawId = (p.messageId ?? headerValue(p.headers, "message-id") ?? "").trim().replace(/^<|>$/g, "");
  const externalId = rawId || fingerprintOf({ source: "email", sender, sentAt, body: fullBody });

  const replyContext: ReplyContext = {};
  const tag = findCaseIdTag(fullBody);
  if (tag) replyContext.caseId = tag;
  const recipient = firstRecipient(p.to);
  if (recipient && recipient !== sender) replyContext.customerIdentifier = recipient;

  return {
    kind: "message",
    message: {
      externalId,
      source: "email",
      sender,
      body: fullBody,
      receivedAt,
      ...(replyContext.caseId || replyContext.customerIdentifier ? { replyContext } : {})
    }
  };
}
