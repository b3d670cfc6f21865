import { createCycleContext, withCycle } from "./correlation.js";
import { MalformedResponseError, toMailwatchError } from "./errors.js";
import type { OrchestratorMessage } from "./orchestrator.js";
import type { Clock } from "./snooze.js";
import type { MailSource } from "../mail/types.js";
import type { SettingsStore } from "../settings/settings-store.js";
import type { Logger } from "../utils/logger.js";

/** The slice of the orchestrator the worker may touch. */
export interface PollTarget {
  post(message: OrchestratorMessage): boolean;
  readonly actionEpoch: number;
}

export interface PollWorkerOptions {
  source: Pick<MailSource, "poll">;
  target: PollTarget;
  settings: Pick<SettingsStore, "persistLastCheckTime">;
  logger: Logger;
  intervalSeconds: number;
  /** Seconds since epoch of the last completed check, from settings. */
  lastCheckTime?: number;
  tickMs?: number;
  now?: Clock;
}

/**
 * Background poller. Wakes every tick, polls when the interval has elapsed
 * or a check was forced, and hands results to the orchestrator by message.
 * At most one poll runs at a time.
 */
export class PollWorker {
  private source: Pick<MailSource, "poll">;
  private target: PollTarget;
  private settings: Pick<SettingsStore, "persistLastCheckTime">;
  private logger: Logger;
  private intervalSeconds: number;
  private lastCheckTime: number;
  private tickMs: number;
  private now: Clock;

  private forceCheck = true;
  private inFlight: Promise<void> | null = null;
  private tickTimer: ReturnType<typeof setInterval> | null = null;

  constructor(options: PollWorkerOptions) {
    this.source = options.source;
    this.target = options.target;
    this.settings = options.settings;
    this.logger = options.logger;
    this.intervalSeconds = options.intervalSeconds;
    this.lastCheckTime = options.lastCheckTime ?? 0;
    this.tickMs = options.tickMs ?? 1000;
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.tickTimer) return;
    this.tickTimer = setInterval(() => this.onTick(), this.tickMs);
    this.onTick();
    this.logger.info(
      { intervalSec: this.intervalSeconds, tickMs: this.tickMs },
      "Poll worker started"
    );
  }

  /** Stops ticking. A poll already in flight runs to completion. */
  stop(): void {
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    this.logger.info("Poll worker stopped");
  }

  checkNow(): void {
    this.forceCheck = true;
  }

  get running(): boolean {
    return this.tickTimer !== null;
  }

  /** The poll currently in flight, if any. */
  get pending(): Promise<void> | null {
    return this.inFlight;
  }

  isDue(): boolean {
    const nowSeconds = this.now() / 1000;
    return this.forceCheck || nowSeconds - this.lastCheckTime >= this.intervalSeconds;
  }

  private onTick(): void {
    if (this.inFlight || !this.isDue()) return;
    this.inFlight = this.pollOnce().finally(() => {
      this.inFlight = null;
    });
  }

  /** One poll cycle. Never rejects. */
  async pollOnce(): Promise<void> {
    const forced = this.forceCheck;
    this.forceCheck = false;
    const startedAt = Math.floor(this.now() / 1000);

    await withCycle(createCycleContext(forced), async () => {
      const startedEpoch = this.target.actionEpoch;
      this.logger.debug({ forced }, "Polling mailbox");

      try {
        const records = await this.source.poll();
        this.target.post({ type: "poll-ok", records, startedEpoch });
      } catch (err) {
        const error = toMailwatchError(err, "Error checking emails");
        if (error instanceof MalformedResponseError) {
          this.logger.warn({ error }, "Unexpected server response, poll skipped");
        } else {
          this.target.post({ type: "poll-error", error });
        }
      }

      this.lastCheckTime = startedAt;
      this.settings.persistLastCheckTime(startedAt).catch((err: unknown) => {
        this.logger.warn({ error: err }, "Could not persist last check time");
      });
    });
  }
}
