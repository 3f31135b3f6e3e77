import crypto from "crypto";
import { Source } from "../types/contracts.js";

/**
 * Stand-in external id for deliveries that carry no stable id of their own.
 * Only fields a redelivery repeats go in: `sentAt` is the sender's own date, never the arrival time.
 */
export function fingerprintOf(args: {
  source: Source;
  sender: string;
  sentAt?: string;
  body: string;
}): string {
  const raw = `${args.source}|${args.sender}|${args.sentAt ?? ""}|${args.body}`;
  return "fp_" + crypto.createHash("sha256").update(raw).digest("hex");
}

export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = "code" in err ? err.code : undefined;
  return code === "SQLITE_CONSTRAINT" && /UNIQUE constraint failed/.test(err.message);
}
