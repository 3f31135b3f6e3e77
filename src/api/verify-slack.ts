import crypto from "crypto";

export type SlackSignatureOptions = {
  signingSecret?: string;
  enforce: boolean;
  maxSkewSeconds: number;
  now?: () => number; // epoch seconds
};

export type SignedRequest = {
  timestamp?: string;
  signature?: string;
  rawBody?: Buffer;
};

/**
 * Checks Slack's `v0=` request signature: HMAC-SHA256 over `v0:<ts>:<raw body>`.
 * When not enforcing, every failure passes through.
 */
export function verifySlackSignature(
  req: SignedRequest,
  opts: SlackSignatureOptions
): { ok: true } | { ok: false; error: string } {
  const secret = opts.signingSecret || "";
  if (!opts.enforce && !secret) return { ok: true };

  const fail = (error: string) => (opts.enforce ? { ok: false as const, error } : { ok: true as const });

  const ts = req.timestamp || "";
  const sig = req.signature || "";
  const raw = req.rawBody || Buffer.from("");
  if (!ts || !sig.startsWith("v0=") || raw.length === 0 || !secret) {
    return fail("missing_signature_or_secret_or_raw_body");
  }

  const tsNum = Number(ts);
  if (!Number.isFinite(tsNum)) return fail("invalid_slack_timestamp");

  const now = opts.now ? opts.now() : Math.floor(Date.now() / 1000);
  if (Math.abs(now - tsNum) > opts.maxSkewSeconds) return fail("slack_timestamp_skew");

  const expected = "v0=" + crypto
    .createHmac("sha256", secret)
    .update(`v0:${ts}:`)
    .update(raw)
    .digest("hex");

  const a = Buffer.from(expected);
  const b = Buffer.from(sig);
  if (a.length !== b.length || !crypto.timingSafeEqual(a, b)) return fail("invalid_slack_signature");

  return { ok: true };
}
