import type { EmailRecord } from "../mail/types.js";

/**
 * Ids that already produced a notification. Treated as immutable; every
 * operation returns a new set.
 */
export type NotifiedSet = ReadonlySet<string>;

/** Forget ids that are no longer unread on the server. */
export function prune(notified: NotifiedSet, allEmails: readonly EmailRecord[]): NotifiedSet {
  const current = new Set(allEmails.map((e) => e.id));
  const kept = new Set<string>();
  for (const id of notified) {
    if (current.has(id)) kept.add(id);
  }
  return kept;
}

export function filterUnnotified(
  allEmails: readonly EmailRecord[],
  notified: NotifiedSet
): EmailRecord[] {
  return allEmails.filter((e) => !notified.has(e.id));
}

export function markNotified(notified: NotifiedSet, ids: Iterable<string>): NotifiedSet {
  const next = new Set(notified);
  for (const id of ids) next.add(id);
  return next;
}
