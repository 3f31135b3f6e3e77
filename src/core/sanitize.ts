import { Source } from "../types/contracts.js";

export const TRUNCATION_MARKER = "... [truncated]";

// Keeps \t, \n and \r.
const CONTROL_CHARS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\u007F]/g;

export function sanitizeBody(raw: string, maxLength: number): string {
  const cleaned = raw
    .replace(/\r\n/g, "\n")
    .replace(CONTROL_CHARS, "")
    .trim();

  if (cleaned.length > maxLength) {
    // Never leave half of a surrogate pair at the cut.
    const high = cleaned.charCodeAt(maxLength - 1);
    const cut = high >= 0xd800 && high <= 0xdbff ? maxLength - 1 : maxLength;
    return cleaned.slice(0, cut) + TRUNCATION_MARKER;
  }
  return cleaned;
}

/**
 * Email addresses are case-insensitive in practice, so they are lowercased.
 * Chat user ids are opaque and only trimmed.
 */
export function normalizeCustomerIdentifier(sender: string, source: Source): string {
  const trimmed = sender.trim();
  return source === "email" ? trimmed.toLowerCase() : trimmed;
}
