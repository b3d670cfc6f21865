import type { EmailRecord, ThreadGroup } from "../mail/types.js";

/**
 * Collapse duplicate ids and sort newest first.
 *
 * The first copy of an id wins even if a later copy carries fresher fields.
 * That matches what users have always seen; revisit if label changes inside
 * one batch ever need to show up.
 */
export function dedup(records: readonly EmailRecord[]): EmailRecord[] {
  const seen = new Set<string>();
  const unique: EmailRecord[] = [];

  for (const record of records) {
    if (seen.has(record.id)) continue;
    seen.add(record.id);
    unique.push(record);
  }

  // Array.prototype.sort is stable, so ties keep dedup order
  return unique.sort(byTimestampDesc);
}

/**
 * Fold records into one display entry per thread.
 * Records without a thread id never merge with each other.
 */
export function groupByThread(allEmails: readonly EmailRecord[]): ThreadGroup[] {
  const threads = new Map<string, EmailRecord[]>();

  for (const record of allEmails) {
    const key = threadKey(record);
    const members = threads.get(key);
    if (members) {
      members.push(record);
    } else {
      threads.set(key, [record]);
    }
  }

  const groups: ThreadGroup[] = [];
  for (const [key, members] of threads) {
    let representative = members[0];
    if (!representative) continue;
    for (const member of members) {
      if (member.timestamp > representative.timestamp) representative = member;
    }
    groups.push({
      key,
      representative,
      memberCount: members.length,
      memberIds: new Set(members.map((m) => m.id)),
    });
  }

  return groups.sort((a, b) => byTimestampDesc(a.representative, b.representative));
}

/** Every id in the same thread as `emailId`; just `[emailId]` when it has none. */
export function findThreadEmailIds(allEmails: readonly EmailRecord[], emailId: string): string[] {
  const target = allEmails.find((e) => e.id === emailId);
  if (!target || !target.threadId) return [emailId];
  return allEmails.filter((e) => e.threadId === target.threadId).map((e) => e.id);
}

export function removeEmailsByIds(
  allEmails: readonly EmailRecord[],
  ids: Iterable<string>
): EmailRecord[] {
  const drop = new Set(ids);
  return allEmails.filter((e) => !drop.has(e.id));
}

export function threadKey(record: EmailRecord): string {
  return record.threadId || `id:${record.id}`;
}

function byTimestampDesc(a: EmailRecord, b: EmailRecord): number {
  return b.timestamp - a.timestamp;
}
