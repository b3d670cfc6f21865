import { ImapFlow } from "imapflow";
import { decodeHeaderBlock } from "./header-decoder.js";
import { createEmailRecord, parseMailDate, threadIdToHex, type RecordDefaults } from "./record.js";
import {
  ConfigIncompleteError,
  MalformedResponseError,
  TransportError,
  formatUserFacingError,
  toMailwatchError,
} from "../core/errors.js";
import type { ConnectionTestResult, EmailRecord, MailSource } from "./types.js";
import type { Clock } from "../core/snooze.js";
import type { ImapConfig } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";

export const CONFIG_INCOMPLETE_MESSAGE =
  "Configuration incomplete. Please configure your mail account.";

const DAY_MS = 24 * 3600_000;

export interface ImapMailSourceOptions {
  imap: ImapConfig;
  username: string;
  password: string | null;
  inboxUrl: string;
  logger: Logger;
  now?: Clock;
}

interface FetchedMessage {
  uid: number;
  threadId?: string;
  headers?: Buffer;
}

/**
 * Unread-mail source over IMAP. Each call opens its own connection, so calls
 * from different background tasks never share protocol state.
 */
export class ImapMailSource implements MailSource {
  private imap: ImapConfig;
  private username: string;
  private password: string | null;
  private defaults: RecordDefaults;
  private logger: Logger;
  private now: Clock;

  constructor(options: ImapMailSourceOptions) {
    this.imap = options.imap;
    this.username = options.username;
    this.password = options.password;
    this.defaults = { inboxUrl: options.inboxUrl, threadUrlBase: options.imap.thread_url_base };
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  get hasCredentials(): boolean {
    return Boolean(this.username && this.password);
  }

  /** Unseen messages from the lookback window, newest UIDs capped at max_messages. */
  async poll(): Promise<EmailRecord[]> {
    if (!this.hasCredentials) {
      throw new ConfigIncompleteError(CONFIG_INCOMPLETE_MESSAGE);
    }

    return this.withMailbox("Error checking emails", async (client) => {
      const since = new Date(this.now() - this.imap.lookback_days * DAY_MS);
      const found = await client.search({ seen: false, since }, { uid: true });
      if (!Array.isArray(found)) {
        throw new MalformedResponseError("Mailbox search returned no result set");
      }

      const uids = found.slice(-this.imap.max_messages);
      if (uids.length === 0) return [];

      // Decoding waits until the fetch stream is drained.
      const fetched: FetchedMessage[] = [];
      for await (const message of client.fetch(
        uids,
        { uid: true, threadId: true, headers: ["from", "subject", "date"] },
        { uid: true }
      )) {
        fetched.push({ uid: message.uid, threadId: message.threadId, headers: message.headers });
      }

      const records: EmailRecord[] = [];
      for (const message of fetched) {
        records.push(await this.toRecord(message));
      }

      this.logger.debug({ unseen: found.length, fetched: records.length }, "IMAP poll complete");
      return records;
    });
  }

  /** Move messages to the trash folder. No-op without credentials or ids. */
  async delete(ids: readonly string[]): Promise<void> {
    if (!this.hasCredentials || ids.length === 0) return;

    await this.withMailbox("Failed to delete thread", async (client) => {
      const moved = await client.messageMove(ids.join(","), this.imap.trash_folder, { uid: true });
      if (!moved) {
        throw new TransportError(`Could not move messages to ${this.imap.trash_folder}`);
      }
      this.logger.debug({ count: ids.length }, "Messages moved");
    });
  }

  async testConnection(): Promise<ConnectionTestResult> {
    if (!this.hasCredentials) {
      return { ok: false, message: CONFIG_INCOMPLETE_MESSAGE };
    }

    const client = this.createClient();
    try {
      await client.connect();
      await client.logout();
      return { ok: true, message: "Connection successful" };
    } catch (err) {
      this.logger.warn({ error: err }, "Connection test failed");
      return { ok: false, message: formatUserFacingError(err) };
    }
  }

  private async toRecord(message: FetchedMessage): Promise<EmailRecord> {
    const { sender, subject, date } = await decodeHeaderBlock(message.headers);

    return createEmailRecord(
      {
        id: String(message.uid),
        threadId: threadIdToHex(message.threadId),
        sender,
        subject,
        timestamp: parseMailDate(date),
      },
      this.defaults
    );
  }

  private createClient(): ImapFlow {
    return new ImapFlow({
      host: this.imap.host,
      port: this.imap.port,
      secure: this.imap.tls,
      auth: {
        user: this.username,
        pass: this.password ?? "",
      },
      logger: false,
    });
  }

  private async withMailbox<T>(
    errorPrefix: string,
    fn: (client: ImapFlow) => Promise<T>
  ): Promise<T> {
    const client = this.createClient();

    try {
      await client.connect();
      const lock = await client.getMailboxLock(this.imap.mailbox);
      try {
        return await fn(client);
      } finally {
        lock.release();
      }
    } catch (err) {
      throw toMailwatchError(err, errorPrefix);
    } finally {
      await client.logout().catch((err: unknown) => {
        this.logger.debug({ error: err }, "IMAP logout failed");
      });
    }
  }
}
