import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { NotificationRequest, NotificationTransport } from "./types.js";
import type { NotificationsConfig } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";

const execFileAsync = promisify(execFile);

export type NotifyAction = "open" | "snooze" | null;

export interface NotifySendOptions {
  notifications: NotificationsConfig;
  inboxUrl: string;
  logger: Logger;
  /** Opens a URL in the desktop browser. */
  openUrl?: (url: string) => Promise<void>;
}

/**
 * Desktop notifications through `notify-send`. The command blocks until the
 * user picks an action or the notification expires; the chosen action name
 * comes back on stdout.
 */
export class NotifySendTransport implements NotificationTransport {
  private config: NotificationsConfig;
  private inboxUrl: string;
  private logger: Logger;
  private openUrl: (url: string) => Promise<void>;

  constructor(options: NotifySendOptions) {
    this.config = options.notifications;
    this.inboxUrl = options.inboxUrl;
    this.logger = options.logger;
    this.openUrl = options.openUrl ?? openWithXdg;
  }

  buildArgs(request: NotificationRequest): string[] {
    const args = [
      "-a", this.config.app_name,
      "-i", this.config.icon,
      "-e",
      "-t", String(this.config.expire_ms),
      "-A", request.link ? "open=Open Email" : "open=Open Inbox",
    ];
    if (request.onSnooze) {
      args.push("-A", "snooze=Snooze 1 hour");
    }
    args.push(request.title, request.body);
    return args;
  }

  async send(request: NotificationRequest): Promise<void> {
    const action = await this.display(request);

    if (action === "open") {
      if (request.onOpen) {
        request.onOpen();
      } else {
        await this.openUrl(request.link ?? this.inboxUrl);
      }
    } else if (action === "snooze") {
      request.onSnooze?.();
    }
  }

  private async display(request: NotificationRequest): Promise<NotifyAction> {
    try {
      const { stdout } = await execFileAsync("notify-send", this.buildArgs(request), {
        timeout: this.config.timeout_ms,
      });
      return parseAction(stdout);
    } catch (err) {
      // Missing binary or a notification nobody answered: nothing to do.
      if (isMissingBinary(err) || isTimeout(err)) {
        this.logger.debug({ error: err }, "notify-send unavailable or timed out");
        return null;
      }
      throw err;
    }
  }
}

export function parseAction(stdout: string | Buffer): NotifyAction {
  const action = stdout.toString().trim();
  if (action === "open" || action === "snooze") return action;
  return null;
}

export async function openWithXdg(url: string): Promise<void> {
  await execFileAsync("xdg-open", [url]);
}

function isMissingBinary(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && "killed" in err && err.killed === true;
}
