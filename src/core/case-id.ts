import { customAlphabet } from "nanoid";

const suffix = customAlphabet("0123456789ABCDEFGHJKLMNPQRSTUVWXYZ", 6);

export const CASE_ID_PATTERN = /CASE_\d{8}_\d{6}_[0-9A-Z]{6}/;

/** CASE_YYYYMMDD_HHMMSS_XXXXXX, with the time in UTC. */
export function generateCaseId(now: Date): string {
  const iso = now.toISOString(); // 2024-05-10T12:00:00.000Z
  const date = iso.slice(0, 10).replace(/-/g, "");
  const time = iso.slice(11, 19).replace(/:/g, "");
  return `CASE_${date}_${time}_${suffix()}`;
}

export function findCaseIdTag(text: string): string | null {
  const m = text.match(CASE_ID_PATTERN);
  return m ? m[0] : null;
}
