import { readFileSync, existsSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { load } from "js-yaml";
import { z } from "zod";

const ImapConfigSchema = z.object({
  host: z.string().default("imap.gmail.com"),
  port: z.number().int().positive().default(993),
  tls: z.boolean().default(true),
  mailbox: z.string().default("INBOX"),
  trash_folder: z.string().default("[Gmail]/Trash"),
  // Only unread mail received within this window is considered
  lookback_days: z.number().int().positive().default(3),
  max_messages: z.number().int().positive().default(200),
  thread_url_base: z.string().default("https://mail.google.com/mail/u/0/#inbox/"),
});

const NotificationsConfigSchema = z.object({
  max_individual: z.number().int().positive().default(5),
  stagger_ms: z.number().int().nonnegative().default(300),
  app_name: z.string().default("mailwatch"),
  icon: z.string().default("mail-unread"),
  expire_ms: z.number().int().positive().default(10_000),
  timeout_ms: z.number().int().positive().default(15_000),
});

const TimingConfigSchema = z.object({
  snooze_seconds: z.number().int().positive().default(3600),
  recheck_after_read_ms: z.number().int().nonnegative().default(20_000),
  poll_tick_ms: z.number().int().positive().default(1000),
});

const SettingsConfigSchema = z.object({
  dir: z.string().default("~/.config/mailwatch"),
});

const AppConfigSchema = z.object({
  imap: ImapConfigSchema.default({}),
  notifications: NotificationsConfigSchema.default({}),
  timing: TimingConfigSchema.default({}),
  settings: SettingsConfigSchema.default({}),
  inbox_url: z.string().optional(),
  username: z.string().optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type ImapConfig = z.infer<typeof ImapConfigSchema>;
export type NotificationsConfig = z.infer<typeof NotificationsConfigSchema>;
export type TimingConfig = z.infer<typeof TimingConfigSchema>;

/**
 * Load configuration from YAML file with environment variable overrides.
 * Every key has a default, so a missing file still yields a full config.
 */
export function loadConfig(configPath?: string): AppConfig {
  const path = configPath ?? process.env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const parsed = load(readFileSync(path, "utf-8"));
    if (isRecord(parsed)) rawConfig = parsed;
  }

  applyEnvOverrides(rawConfig);

  const config = AppConfigSchema.parse(rawConfig);
  config.settings.dir = expandHome(config.settings.dir);
  return config;
}

function applyEnvOverrides(config: Record<string, unknown>): void {
  if (process.env.MAILWATCH_IMAP_HOST) {
    ensureObject(config, "imap").host = process.env.MAILWATCH_IMAP_HOST;
  }
  if (process.env.MAILWATCH_SETTINGS_DIR) {
    ensureObject(config, "settings").dir = process.env.MAILWATCH_SETTINGS_DIR;
  }
  if (process.env.MAILWATCH_USER) config.username = process.env.MAILWATCH_USER;
  if (process.env.MAILWATCH_INBOX_URL) config.inbox_url = process.env.MAILWATCH_INBOX_URL;
}

export function expandHome(path: string): string {
  if (path === "~") return homedir();
  if (path.startsWith("~/")) return join(homedir(), path.slice(2));
  return path;
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
