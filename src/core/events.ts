import type { Logger } from "../utils/logger.js";
import type { BadgeState } from "./badge.js";
import type { ThreadGroup } from "../mail/types.js";

export interface ViewSnapshot {
  grouped: readonly ThreadGroup[];
  badge: BadgeState;
  unreadCount: number;
  snoozed: boolean;
}

export type MailwatchEvent =
  | { eventType: "view.updated"; timestamp: string; payload: ViewSnapshot }
  | {
      eventType: "snooze.changed";
      timestamp: string;
      payload: { active: boolean; remainingSeconds: number };
    }
  | { eventType: "poll.failed"; timestamp: string; payload: { message: string; kind: string } };

export type MailwatchEventType = MailwatchEvent["eventType"];

export type EventOf<K extends MailwatchEventType> = Extract<MailwatchEvent, { eventType: K }>;

export type EventHandler<E extends MailwatchEvent = MailwatchEvent> = (
  event: E
) => Promise<void> | void;

/** Removes the listener it was returned for. */
export type Unsubscribe = () => void;

export interface EventBus {
  publish(event: MailwatchEvent): void;
  on<K extends MailwatchEventType>(eventType: K, handler: EventHandler<EventOf<K>>): Unsubscribe;
  onAny(handler: EventHandler): Unsubscribe;
}

export function isEventOf<K extends MailwatchEventType>(
  event: MailwatchEvent,
  eventType: K
): event is EventOf<K> {
  return event.eventType === eventType;
}

/**
 * Fans orchestrator events out to the front ends, synchronously and in
 * registration order. A failing listener is logged; the publisher and the
 * other listeners carry on.
 */
export class InProcessEventBus implements EventBus {
  private listeners: EventHandler[] = [];
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  publish(event: MailwatchEvent): void {
    // Listeners may unsubscribe while being called
    for (const listener of [...this.listeners]) {
      this.dispatch(listener, event);
    }
  }

  on<K extends MailwatchEventType>(eventType: K, handler: EventHandler<EventOf<K>>): Unsubscribe {
    return this.add((event) => {
      if (isEventOf(event, eventType)) return handler(event);
    });
  }

  onAny(handler: EventHandler): Unsubscribe {
    return this.add(handler);
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  private add(listener: EventHandler): Unsubscribe {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  private dispatch(listener: EventHandler, event: MailwatchEvent): void {
    try {
      const result = listener(event);
      if (result instanceof Promise) {
        result.catch((err: unknown) => this.handlerFailed(event, err));
      }
    } catch (err) {
      this.handlerFailed(event, err);
    }
  }

  private handlerFailed(event: MailwatchEvent, err: unknown): void {
    this.logger.error({ eventType: event.eventType, error: err }, "Event handler error");
  }
}
