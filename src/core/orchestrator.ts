import { deriveBadge, type BadgeState } from "./badge.js";
import { MessageChannel } from "./channel.js";
import { formatUserFacingError, type MailwatchError } from "./errors.js";
import { filterUnnotified, markNotified, prune, type NotifiedSet } from "./notified-set.js";
import { dedup, findThreadEmailIds, groupByThread, removeEmailsByIds } from "./threads.js";
import type { EventBus, ViewSnapshot } from "./events.js";
import type { NotificationScheduler } from "./notification-scheduler.js";
import type { SnoozeState } from "./snooze.js";
import type { EmailRecord, MailSource, ThreadGroup } from "../mail/types.js";
import type { Logger } from "../utils/logger.js";

/** Everything that reaches the orchestrator from outside its own call stack. */
export type OrchestratorMessage =
  | { type: "poll-ok"; records: readonly EmailRecord[]; startedEpoch: number }
  | { type: "poll-error"; error: MailwatchError }
  | { type: "delete-failed"; ids: readonly string[]; error: unknown }
  | { type: "snooze-request" };

export interface OrchestratorOptions {
  source: Pick<MailSource, "delete">;
  scheduler: NotificationScheduler;
  snooze: SnoozeState;
  eventBus: EventBus;
  logger: Logger;
  /** Delay before the forced re-check that follows markRead(). */
  recheckAfterReadMs?: number;
}

/**
 * Sole owner of the canonical email list, the notified set, the snooze state
 * and the error flag.
 *
 * Thread-affinity rule: only code running in this class mutates that state.
 * Background work (polls, deletes, notification actions) reports back through
 * `post()`, and its messages are consumed in FIFO order.
 */
export class ReconciliationOrchestrator {
  private allEmails: readonly EmailRecord[] = [];
  private groupedView: readonly ThreadGroup[] = [];
  private notified: NotifiedSet = new Set();
  private errorFlag = false;

  // Local removals that a poll started earlier must not undo: id -> epoch
  private epoch = 0;
  private localRemovals = new Map<string, number>();

  private recheckTimers = new Set<ReturnType<typeof setTimeout>>();
  private checkRequester: (() => void) | null = null;
  private channel: MessageChannel<OrchestratorMessage>;

  private source: Pick<MailSource, "delete">;
  private scheduler: NotificationScheduler;
  private snooze: SnoozeState;
  private eventBus: EventBus;
  private logger: Logger;
  private recheckAfterReadMs: number;

  constructor(options: OrchestratorOptions) {
    this.source = options.source;
    this.scheduler = options.scheduler;
    this.snooze = options.snooze;
    this.eventBus = options.eventBus;
    this.logger = options.logger;
    this.recheckAfterReadMs = options.recheckAfterReadMs ?? 20_000;
    this.channel = new MessageChannel((message) => this.handle(message), this.logger);
  }

  // ─── Channel ────────────────────────────────────────────────────

  post(message: OrchestratorMessage): boolean {
    return this.channel.post(message);
  }

  /** Resolves once every message posted so far has been applied. */
  settled(): Promise<void> {
    return this.channel.drain();
  }

  /** Monotonic counter bumped by every local removal. */
  get actionEpoch(): number {
    return this.epoch;
  }

  private handle(message: OrchestratorMessage): void {
    switch (message.type) {
      case "poll-ok":
        this.applyPollResult(message.records, message.startedEpoch);
        break;
      case "poll-error":
        this.applyPollError(message.error);
        break;
      case "delete-failed":
        this.applyDeleteFailure(message.ids, message.error);
        break;
      case "snooze-request":
        this.snoozeFromNotification();
        break;
    }
  }

  // ─── Poll results ───────────────────────────────────────────────

  private applyPollResult(records: readonly EmailRecord[], startedEpoch: number): void {
    this.errorFlag = false;

    for (const [id, removedAt] of this.localRemovals) {
      if (removedAt <= startedEpoch) this.localRemovals.delete(id);
    }
    // Prune against what the server returned: a locally removed id that a
    // stale poll still lists keeps its notified mark.
    const serverEmails = dedup(records);
    let notified = prune(this.notified, serverEmails);
    const allEmails =
      this.localRemovals.size > 0
        ? serverEmails.filter((r) => !this.localRemovals.has(r.id))
        : serverEmails;

    this.allEmails = allEmails;
    this.groupedView = groupByThread(allEmails);
    this.publishView();

    const newEmails = filterUnnotified(allEmails, notified);
    const snoozed = this.snooze.isActive();

    // While snoozed, new mail stays out of the notified set so it is
    // announced by the first poll after the snooze ends.
    if (newEmails.length > 0 && !snoozed) {
      const { notifiedIds } = this.scheduler.schedule(newEmails, () =>
        this.post({ type: "snooze-request" })
      );
      notified = markNotified(notified, notifiedIds);
    }

    this.notified = notified;

    this.logger.info(
      {
        unread: allEmails.length,
        threads: this.groupedView.length,
        newEmails: newEmails.length,
        snoozed,
      },
      "Poll result applied"
    );
  }

  private applyPollError(error: MailwatchError): void {
    this.errorFlag = true;
    this.publishView();

    const message = formatUserFacingError(error);
    this.scheduler.notifyError(message);
    this.eventBus.publish({
      eventType: "poll.failed",
      timestamp: new Date().toISOString(),
      payload: { message, kind: error.kind },
    });

    this.logger.warn({ error, kind: error.kind }, "Poll failed");
  }

  private applyDeleteFailure(ids: readonly string[], error: unknown): void {
    // The optimistic removal stays; the next poll reconciles with the server.
    this.errorFlag = true;
    this.publishView();
    this.scheduler.notifyError(`Failed to delete thread: ${formatUserFacingError(error)}`);
    this.logger.error({ error, count: ids.length }, "Background delete failed");
  }

  // ─── User actions ───────────────────────────────────────────────

  /** Wired to the poll worker's force flag. */
  setCheckRequester(requester: () => void): void {
    this.checkRequester = requester;
  }

  checkNow(): void {
    if (!this.checkRequester) {
      this.logger.debug("checkNow ignored: no poll worker attached");
      return;
    }
    this.checkRequester();
  }

  /** The user opened a message: drop it now, confirm with the server shortly after. */
  markRead(emailId: string): void {
    this.removeLocally([emailId]);

    const timer = setTimeout(() => {
      this.recheckTimers.delete(timer);
      this.checkNow();
    }, this.recheckAfterReadMs);
    this.recheckTimers.add(timer);
  }

  /**
   * Optimistic delete: ids leave the canonical list before this returns.
   * A failure is reported once and never rolled back.
   */
  delete(ids: readonly string[]): void {
    const unique = [...new Set(ids)];
    if (unique.length === 0) return;

    this.removeLocally(unique);

    this.source
      .delete(unique)
      .then(() => {
        this.logger.info({ count: unique.length }, "Messages moved to trash");
      })
      .catch((err: unknown) => {
        this.post({ type: "delete-failed", ids: unique, error: err });
      });
  }

  /** Delete every message in the thread of `emailId`. Returns the ids removed. */
  deleteThread(emailId: string): string[] {
    const ids = findThreadEmailIds(this.allEmails, emailId);
    this.delete(ids);
    return ids;
  }

  toggleSnooze(): boolean {
    const active = this.snooze.toggle();
    this.publishSnooze();
    return active;
  }

  snoozeFromNotification(): void {
    this.snooze.snoozeFromExternalTrigger();
    this.publishSnooze();
  }

  shutdown(): void {
    this.channel.close();
    for (const timer of this.recheckTimers) clearTimeout(timer);
    this.recheckTimers.clear();
    this.scheduler.shutdown();
  }

  // ─── Views ──────────────────────────────────────────────────────

  get grouped(): readonly ThreadGroup[] {
    return this.groupedView;
  }

  get emails(): readonly EmailRecord[] {
    return this.allEmails;
  }

  get unreadCount(): number {
    return this.allEmails.length;
  }

  get badge(): BadgeState {
    return deriveBadge(this.allEmails.length > 0, this.snooze.isActive(), this.errorFlag);
  }

  get isSnoozed(): boolean {
    return this.snooze.isActive();
  }

  get isError(): boolean {
    return this.errorFlag;
  }

  get notifiedIds(): NotifiedSet {
    return this.notified;
  }

  snapshot(): ViewSnapshot {
    return {
      grouped: this.groupedView,
      badge: this.badge,
      unreadCount: this.allEmails.length,
      snoozed: this.snooze.isActive(),
    };
  }

  private removeLocally(ids: readonly string[]): void {
    this.epoch++;
    for (const id of ids) this.localRemovals.set(id, this.epoch);

    this.allEmails = removeEmailsByIds(this.allEmails, ids);
    this.groupedView = groupByThread(this.allEmails);
    this.publishView();
  }

  private publishView(): void {
    this.eventBus.publish({
      eventType: "view.updated",
      timestamp: new Date().toISOString(),
      payload: this.snapshot(),
    });
  }

  private publishSnooze(): void {
    this.publishView();
    this.eventBus.publish({
      eventType: "snooze.changed",
      timestamp: new Date().toISOString(),
      payload: {
        active: this.snooze.isActive(),
        remainingSeconds: this.snooze.remainingSeconds(),
      },
    });
  }
}
