#!/usr/bin/env node
import { loadConfig } from "./utils/config.js";
import { createLogger } from "./utils/logger.js";
import { InProcessEventBus } from "./core/events.js";
import { NotificationScheduler } from "./core/notification-scheduler.js";
import { ReconciliationOrchestrator } from "./core/orchestrator.js";
import { PollWorker } from "./core/poll-worker.js";
import { SnoozeState } from "./core/snooze.js";
import { ImapMailSource } from "./mail/imap-source.js";
import { NotifySendTransport, openWithXdg } from "./notify/desktop-transport.js";
import { EnvCredentialStore } from "./settings/credentials.js";
import { SettingsStore, initSettingsDir } from "./settings/settings-store.js";
import { ConsoleInterface } from "./interfaces/console.js";

const logger = createLogger();

async function main() {
  logger.info("Starting mailwatch...");

  // 1. Configuration and persisted settings
  const config = loadConfig();
  await initSettingsDir(config.settings.dir);
  const settingsStore = new SettingsStore(config.settings.dir, logger.child({ component: "settings" }));
  const settings = await settingsStore.load();

  const username = config.username ?? settings.username;
  const inboxUrl = config.inbox_url ?? settings.inbox_url;
  const password = username ? await new EnvCredentialStore().getPassword(username) : null;
  logger.info(
    { settingsDir: config.settings.dir, intervalSec: settingsStore.loadInterval(), hasAccount: Boolean(username) },
    "Configuration loaded"
  );

  // 2. Collaborators
  const source = new ImapMailSource({
    imap: config.imap,
    username,
    password,
    inboxUrl,
    logger: logger.child({ component: "imap" }),
  });
  const transport = new NotifySendTransport({
    notifications: config.notifications,
    inboxUrl,
    logger: logger.child({ component: "notify" }),
  });
  const eventBus = new InProcessEventBus(logger.child({ component: "events" }));

  // 3. Core
  const scheduler = new NotificationScheduler(transport, logger.child({ component: "scheduler" }), {
    maxIndividual: config.notifications.max_individual,
    staggerMs: config.notifications.stagger_ms,
  });
  const snooze = new SnoozeState(config.timing.snooze_seconds);
  const orchestrator = new ReconciliationOrchestrator({
    source,
    scheduler,
    snooze,
    eventBus,
    logger: logger.child({ component: "orchestrator" }),
    recheckAfterReadMs: config.timing.recheck_after_read_ms,
  });
  const worker = new PollWorker({
    source,
    target: orchestrator,
    settings: settingsStore,
    logger: logger.child({ component: "poller" }),
    intervalSeconds: settingsStore.loadInterval(),
    lastCheckTime: settings.last_check_time,
    tickMs: config.timing.poll_tick_ms,
  });
  orchestrator.setCheckRequester(() => worker.checkNow());

  // 4. Presentation
  let shuttingDown = false;
  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Received shutdown signal");
    frontEnd.stop();
    worker.stop();
    orchestrator.shutdown();
    // In-flight polls, deletes and notifications are left to finish on their own.
    logger.info("Shutdown complete");
    process.exitCode = 0;
  };

  const frontEnd = new ConsoleInterface({
    actions: orchestrator,
    source,
    eventBus,
    logger: logger.child({ component: "console" }),
    openUrl: openWithXdg,
    snoozeRemainingSeconds: () => snooze.remainingSeconds(),
    onQuit: () => shutdown("quit"),
    appName: config.notifications.app_name,
  });

  frontEnd.start();
  worker.start();

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  logger.info("mailwatch is running");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
