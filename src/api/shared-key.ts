import crypto from "crypto";
import type { Request } from "express";

function constantTimeEq(a: string, b: string) {
  const ab = Buffer.from(a);
  const bb = Buffer.from(b);
  return ab.length === bb.length && crypto.timingSafeEqual(ab, bb);
}

/** Checks a shared secret sent in `header` against the configured `expected` value. */
export function requireSharedKey(req: Request, header: string, expected: string | undefined) {
  if (!expected) return { ok: false as const, status: 500, error: "key_not_configured" as const };
  const got = (req.header(header) || "").trim();
  if (!got) return { ok: false as const, status: 401, error: "missing_key" as const };
  if (!constantTimeEq(got, expected)) return { ok: false as const, status: 403, error: "invalid_key" as const };
  return { ok: true as const };
}
