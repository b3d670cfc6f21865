/** One unread message as the rest of the pipeline sees it. Always frozen. */
export interface EmailRecord {
  readonly id: string;
  /** Empty when the server exposes no thread for this message. */
  readonly threadId: string;
  readonly sender: string;
  readonly subject: string;
  /** Seconds since epoch; 0 when the Date header could not be parsed. */
  readonly timestamp: number;
  readonly link: string;
}

/** Unnormalised record as produced by a mail source before defaults apply. */
export interface RawEmailRecord {
  id: string;
  threadId?: string | null;
  sender?: string | null;
  subject?: string | null;
  timestamp?: number | null;
  link?: string | null;
}

export interface ThreadGroup {
  /** Thread id, or `id:<emailId>` for a message without a thread. */
  key: string;
  representative: EmailRecord;
  memberCount: number;
  memberIds: ReadonlySet<string>;
}

export interface ConnectionTestResult {
  ok: boolean;
  message: string;
}

/**
 * The mailbox collaborator. Every method may take network time and is only
 * ever awaited off the orchestrator.
 */
export interface MailSource {
  /** Current unread batch. Rejects with a MailwatchError. */
  poll(): Promise<EmailRecord[]>;
  /** Move the given ids to the trash. Rejects with a TransportError. */
  delete(ids: readonly string[]): Promise<void>;
  testConnection(): Promise<ConnectionTestResult>;
}
