export interface NotificationRequest {
  title: string;
  body: string;
  /** Opened by the "Open" action; the inbox URL when absent. */
  link?: string;
  onOpen?: () => void;
  /** Present only when the notification should offer "Snooze 1 hour". */
  onSnooze?: () => void;
}

/**
 * Fire-and-forget display of one notification. Resolves once the user has
 * acted on it or it expired; callers never await it on the orchestrator.
 */
export interface NotificationTransport {
  send(request: NotificationRequest): Promise<void>;
}
