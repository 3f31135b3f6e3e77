import type { IncomingMessage, ServerResponse } from "http";
import type { Request } from "express";

// Signature checks need the exact bytes the sender signed.
export function captureRawBody(req: IncomingMessage & { rawBody?: Buffer }, _res: ServerResponse, buf: Buffer) {
  req.rawBody = buf;
}

export function rawBodyOf(req: Request): Buffer | undefined {
  return "rawBody" in req && Buffer.isBuffer(req.rawBody) ? req.rawBody : undefined;
}
