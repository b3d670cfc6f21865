/**
 * Line-oriented stand-in for the tray icon and popup. Renders the badge and
 * thread list whenever the view changes and maps typed commands onto the
 * orchestrator's action entry points.
 */
import { createInterface, type Interface } from "node:readline";
import { badgeTooltip, type BadgeState } from "../core/badge.js";
import type { EventBus, Unsubscribe, ViewSnapshot } from "../core/events.js";
import type { MailSource, ThreadGroup } from "../mail/types.js";
import type { Logger } from "../utils/logger.js";

/** What the console needs from the orchestrator. */
export interface ConsoleActions {
  readonly grouped: readonly ThreadGroup[];
  readonly badge: BadgeState;
  readonly unreadCount: number;
  checkNow(): void;
  markRead(emailId: string): void;
  deleteThread(emailId: string): string[];
  toggleSnooze(): boolean;
}

export interface ConsoleInterfaceOptions {
  actions: ConsoleActions;
  source: Pick<MailSource, "testConnection">;
  eventBus: EventBus;
  logger: Logger;
  openUrl: (url: string) => Promise<void>;
  snoozeRemainingSeconds: () => number;
  onQuit?: () => void;
  appName?: string;
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

const HELP = [
  "Commands:",
  "  check       check for new mail now",
  "  list        show unread threads",
  "  open <n>    open thread n in the browser and mark it read",
  "  read <id>   mark message <id> read",
  "  delete <n>  move every message of thread n to the trash",
  "  snooze      snooze notifications for an hour, or resume them",
  "  test        test the mail server connection",
  "  quit        exit",
].join("\n");

export class ConsoleInterface {
  private options: ConsoleInterfaceOptions;
  private output: NodeJS.WritableStream;
  private appName: string;
  private rl: Interface | null = null;
  private unsubscribeView: Unsubscribe | null = null;

  constructor(options: ConsoleInterfaceOptions) {
    this.options = options;
    this.output = options.output ?? process.stdout;
    this.appName = options.appName ?? "mailwatch";
  }

  start(): void {
    this.unsubscribeView = this.options.eventBus.on("view.updated", (event) => {
      this.write(this.renderView(event.payload));
    });

    this.rl = createInterface({
      input: this.options.input ?? process.stdin,
      terminal: false,
    });
    this.rl.on("line", (line) => {
      this.execute(line)
        .then((reply) => {
          if (reply) this.write(reply);
        })
        .catch((err: unknown) => {
          this.options.logger.error({ error: err }, "Console command failed");
        });
    });
  }

  stop(): void {
    this.unsubscribeView?.();
    this.unsubscribeView = null;
    this.rl?.close();
    this.rl = null;
  }

  async execute(line: string): Promise<string> {
    const [command = "", arg = ""] = line.trim().split(/\s+/);
    const { actions } = this.options;

    switch (command.toLowerCase()) {
      case "":
        return "";
      case "check":
        actions.checkNow();
        return "Checking for new mail...";
      case "list":
        return this.renderList(actions.grouped);
      case "open": {
        const group = this.pickGroup(arg);
        if (!group) return `No thread ${arg || "(missing number)"}`;
        actions.markRead(group.representative.id);
        await this.options.openUrl(group.representative.link);
        return `Opened: ${group.representative.subject}`;
      }
      case "read":
        if (!arg) return "Usage: read <id>";
        actions.markRead(arg);
        return `Marked ${arg} as read`;
      case "delete": {
        const group = this.pickGroup(arg);
        if (!group) return `No thread ${arg || "(missing number)"}`;
        const ids = actions.deleteThread(group.representative.id);
        return `Moved ${ids.length} message${ids.length === 1 ? "" : "s"} to trash`;
      }
      case "snooze":
        return actions.toggleSnooze() ? "Notifications snoozed for 1 hour" : "Notifications resumed";
      case "test": {
        const result = await this.options.source.testConnection();
        return result.ok ? result.message : `Connection failed: ${result.message}`;
      }
      case "quit":
      case "exit":
        this.options.onQuit?.();
        return "Bye";
      case "help":
        return HELP;
      default:
        return `Unknown command "${command}". Type "help".`;
    }
  }

  renderView(view: ViewSnapshot): string {
    const tooltip = badgeTooltip(
      view.badge,
      view.unreadCount,
      this.options.snoozeRemainingSeconds(),
      this.appName
    );
    return `[${view.badge}] ${tooltip}\n${this.renderList(view.grouped)}`;
  }

  renderList(groups: readonly ThreadGroup[]): string {
    if (groups.length === 0) return "No unread mail";
    return groups
      .map((group, i) => {
        const { sender, subject } = group.representative;
        const count = group.memberCount > 1 ? ` (${group.memberCount})` : "";
        return `${i + 1}. ${sender} - ${subject}${count}`;
      })
      .join("\n");
  }

  private pickGroup(arg: string): ThreadGroup | undefined {
    const index = Number.parseInt(arg, 10);
    if (!Number.isInteger(index) || index < 1) return undefined;
    return this.options.actions.grouped[index - 1];
  }

  private write(text: string): void {
    this.output.write(`${text}\n`);
  }
}
