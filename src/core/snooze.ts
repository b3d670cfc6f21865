export type SnoozeSnapshot = { active: false } | { active: true; until: number };

export type Clock = () => number;

/**
 * Snooze window for notifications.
 *
 * Expiry is detected lazily by isActive(); nothing wakes up to unsnooze.
 * Times are epoch milliseconds from the injected clock.
 */
export class SnoozeState {
  private state: SnoozeSnapshot = { active: false };
  private readonly durationMs: number;
  private readonly now: Clock;

  constructor(durationSeconds: number = 3600, now: Clock = Date.now) {
    this.durationMs = durationSeconds * 1000;
    this.now = now;
  }

  isActive(): boolean {
    if (!this.state.active) return false;
    if (this.now() >= this.state.until) {
      this.state = { active: false };
      return false;
    }
    return true;
  }

  /** Returns the new activeness. */
  toggle(): boolean {
    if (this.isActive()) {
      this.state = { active: false };
      return false;
    }
    this.state = { active: true, until: this.now() + this.durationMs };
    return true;
  }

  /** "Snooze" pressed on a notification. A second press does not extend the window. */
  snoozeFromExternalTrigger(): void {
    if (this.isActive()) return;
    this.state = { active: true, until: this.now() + this.durationMs };
  }

  remainingSeconds(): number {
    if (!this.isActive() || !this.state.active) return 0;
    return Math.max(0, Math.floor((this.state.until - this.now()) / 1000));
  }

  snapshot(): SnoozeSnapshot {
    this.isActive();
    return { ...this.state };
  }
}
