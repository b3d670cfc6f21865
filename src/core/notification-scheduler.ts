import type { EmailRecord } from "../mail/types.js";
import type { NotificationRequest, NotificationTransport } from "../notify/types.js";
import type { Logger } from "../utils/logger.js";

export interface NotificationSchedulerOptions {
  maxIndividual: number;
  staggerMs: number;
}

export interface NotificationPlan {
  kind: "email" | "summary";
  delayMs: number;
  title: string;
  body: string;
  link?: string;
  /** Set for individual notifications only. */
  emailId?: string;
}

export interface ScheduleResult {
  plans: readonly NotificationPlan[];
  /** Every input id, including the ones folded into the summary. */
  notifiedIds: string[];
}

export const DEFAULT_SCHEDULER_OPTIONS: NotificationSchedulerOptions = {
  maxIndividual: 5,
  staggerMs: 300,
};

/**
 * Decide what to show and when. Pure; the plans are frozen snapshots so a
 * timer firing later never sees a record that changed or went away.
 */
export function planNotifications(
  records: readonly EmailRecord[],
  options: NotificationSchedulerOptions = DEFAULT_SCHEDULER_OPTIONS
): NotificationPlan[] {
  const shown = records.slice(0, options.maxIndividual);
  const plans: NotificationPlan[] = shown.map((record, k) =>
    Object.freeze({
      kind: "email" as const,
      delayMs: k * options.staggerMs,
      title: `New email from ${record.sender}`,
      body: record.subject,
      link: record.link,
      emailId: record.id,
    })
  );

  const extra = records.length - options.maxIndividual;
  if (extra > 0) {
    plans.push(
      Object.freeze({
        kind: "summary" as const,
        delayMs: shown.length * options.staggerMs,
        title: "New Emails",
        body: `And ${extra} more new email${extra > 1 ? "s" : ""}...`,
      })
    );
  }

  return plans;
}

/**
 * Staggered, fire-and-forget dispatch of notification plans.
 * Nothing is retried, tracked or cancelled once handed to the transport.
 */
export class NotificationScheduler {
  private transport: NotificationTransport;
  private logger: Logger;
  private options: NotificationSchedulerOptions;
  private closed = false;

  constructor(
    transport: NotificationTransport,
    logger: Logger,
    options: Partial<NotificationSchedulerOptions> = {}
  ) {
    this.transport = transport;
    this.logger = logger;
    this.options = { ...DEFAULT_SCHEDULER_OPTIONS, ...options };
  }

  schedule(records: readonly EmailRecord[], onSnooze?: () => void): ScheduleResult {
    const notifiedIds = records.map((r) => r.id);
    if (this.closed || records.length === 0) {
      return { plans: [], notifiedIds };
    }

    const plans = planNotifications(records, this.options);
    for (const plan of plans) {
      setTimeout(() => {
        this.dispatch(
          { title: plan.title, body: plan.body, link: plan.link, onSnooze },
          plan.kind
        );
      }, plan.delayMs);
    }

    this.logger.info(
      {
        newEmails: records.length,
        individual: plans.filter((p) => p.kind === "email").length,
        summary: plans.some((p) => p.kind === "summary"),
      },
      "Notifications scheduled"
    );

    return { plans, notifiedIds };
  }

  /** Error notifications go out at once, without stagger or snooze action. */
  notifyError(message: string, title: string = "mailwatch error"): void {
    if (this.closed) return;
    this.dispatch({ title, body: message }, "error");
  }

  /** Stop issuing new notifications. Timers already set still fire. */
  shutdown(): void {
    this.closed = true;
  }

  private dispatch(request: NotificationRequest, kind: string): void {
    this.transport.send(request).catch((err) => {
      this.logger.warn({ error: err, kind }, "Notification transport failed");
    });
  }
}
