import type { EmailRecord, RawEmailRecord } from "./types.js";

export const NO_SUBJECT = "(no subject)";

export interface RecordDefaults {
  inboxUrl: string;
  threadUrlBase: string;
}

/** Apply the documented defaults and freeze the result. */
export function createEmailRecord(raw: RawEmailRecord, defaults: RecordDefaults): EmailRecord {
  const threadId = raw.threadId ?? "";
  const timestamp =
    typeof raw.timestamp === "number" && Number.isFinite(raw.timestamp) && raw.timestamp > 0
      ? raw.timestamp
      : 0;

  return Object.freeze({
    id: String(raw.id),
    threadId,
    sender: raw.sender ?? "",
    subject: raw.subject || NO_SUBJECT,
    timestamp,
    link: raw.link || threadLink(threadId, defaults),
  });
}

export function threadLink(threadId: string, defaults: RecordDefaults): string {
  return threadId ? `${defaults.threadUrlBase}${threadId}` : defaults.inboxUrl;
}

/**
 * Gmail reports X-GM-THRID as a decimal 64-bit integer; web links use hex.
 * Returns "" for anything that is not a decimal string.
 */
export function threadIdToHex(threadId: string | undefined | null): string {
  if (!threadId || !/^\d+$/.test(threadId)) return "";
  return BigInt(threadId).toString(16);
}

/** Seconds since epoch, or 0 when the header is missing or unparseable. */
export function parseMailDate(header: string | undefined): number {
  if (!header) return 0;
  const ms = Date.parse(header.trim());
  return Number.isNaN(ms) ? 0 : ms / 1000;
}
