import { createEmailRecord } from "../../src/mail/record.js";
import type { EmailRecord, RawEmailRecord } from "../../src/mail/types.js";

export const TEST_INBOX_URL = "https://mail.example.com";
export const TEST_THREAD_URL_BASE = "https://mail.example.com/#inbox/";

export const TEST_DEFAULTS = {
  inboxUrl: TEST_INBOX_URL,
  threadUrlBase: TEST_THREAD_URL_BASE,
};

export function createTestEmail(
  id: string,
  overrides: Partial<Omit<RawEmailRecord, "id">> = {}
): EmailRecord {
  return createEmailRecord(
    {
      id,
      threadId: "",
      sender: `Sender ${id}`,
      subject: `Subject ${id}`,
      timestamp: 1_700_000_000,
      ...overrides,
    },
    TEST_DEFAULTS
  );
}

/** `count` emails with distinct ids and strictly decreasing timestamps. */
export function createTestBatch(count: number, prefix = "m"): EmailRecord[] {
  return Array.from({ length: count }, (_, i) =>
    createTestEmail(`${prefix}${i + 1}`, { timestamp: 1_700_000_000 - i * 60 })
  );
}
