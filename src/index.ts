/**
 * Supply Slot Bot - Entry Point
 *
 * Telegram bot that watches marketplace supply slots for its users.
 *
 * - PeriodicMonitor polls every active account, notifies about new matching
 *   slots and auto-books within each user's daily limit
 * - ContinuousSearchManager runs one search per user until a slot is booked
 *   for the requested supply
 * - BookingExecutor is the single booking path for both loops and the chat
 */
import "dotenv/config";
import { loadConfig, RuntimeConfig } from "./config";
import { initializeSupabase, closeSupabase } from "./db/supabase";
import { Store } from "./store";
import { MarketplaceClientPool } from "./sdk";
import { BookingExecutor, ContinuousSearchManager, PeriodicMonitor } from "./services";
import { TelegramApi } from "./telegram/api";
import { TelegramBot } from "./telegram/bot";
import { TelegramNotifier } from "./telegram/notifications";
import { logger, errorMessage } from "./logger";

/**
 * Main entry point
 */
async function main(): Promise<void> {
  logger.info("Starting supply slot bot...");

  const config = loadConfig();

  const runtime = new RuntimeConfig({
    forceDemo: config.MARKETPLACE_FORCE_DEMO,
    allowDemoFallback: config.MARKETPLACE_ALLOW_DEMO_FALLBACK,
  });

  // Supabase is optional - memory-only store without it
  const supabase =
    config.SUPABASE_URL && config.SUPABASE_SERVICE_ROLE_KEY
      ? initializeSupabase(config.SUPABASE_URL, config.SUPABASE_SERVICE_ROLE_KEY)
      : null;

  const store = new Store({ supabase });
  await store.initialize();

  const pool = new MarketplaceClientPool(runtime, {
    baseUrl: config.MARKETPLACE_API_BASE_URL,
    backupUrl: config.MARKETPLACE_API_BACKUP_URL,
    timeoutMs: config.MARKETPLACE_API_TIMEOUT_MS,
    proxyUrl: config.MARKETPLACE_PROXY_URL,
    debug: config.SDK_DEBUG,
    horizonDays: config.SLOT_HORIZON_DAYS,
    demoBookingSuccessRate: config.DEMO_BOOKING_SUCCESS_RATE,
    timezone: config.TIMEZONE,
  });

  const api = new TelegramApi({ token: config.TELEGRAM_BOT_TOKEN });
  const notifier = new TelegramNotifier(api);

  const executor = new BookingExecutor({
    store,
    clients: pool,
    notifier,
    horizonDays: config.SLOT_HORIZON_DAYS,
    timezone: config.TIMEZONE,
  });

  const finder = new ContinuousSearchManager({
    store,
    executor,
    notifier,
    searchIntervalMs: config.SEARCH_INTERVAL_MS,
  });

  const monitor = new PeriodicMonitor({
    store,
    clients: pool,
    executor,
    notifier,
    intervalMs: config.MONITOR_INTERVAL_MS,
    horizonDays: config.SLOT_HORIZON_DAYS,
    timezone: config.TIMEZONE,
  });

  const bot = new TelegramBot(api, {
    store,
    pool,
    executor,
    finder,
    monitor,
    runtime,
    adminIds: config.TELEGRAM_ADMIN_IDS,
    maxAccountsPerUser: config.MAX_ACCOUNTS_PER_USER,
    horizonDays: config.SLOT_HORIZON_DAYS,
  });

  await bot.start();
  monitor.start();

  logger.info(
    {
      persistence: supabase ? "supabase" : "memory",
      monitorIntervalMs: config.MONITOR_INTERVAL_MS,
      searchIntervalMs: config.SEARCH_INTERVAL_MS,
      horizonDays: config.SLOT_HORIZON_DAYS,
      runtime: runtime.snapshot(),
    },
    "Supply slot bot started successfully"
  );

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info({ signal }, "Received shutdown signal");
    await monitor.stop();
    await finder.stopAll();
    await bot.stop();
    await closeSupabase();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      logger.error({ error: errorMessage(error) }, "Shutdown failed");
      process.exit(1);
    });
  };

  process.on("SIGINT", () => onSignal("SIGINT"));
  process.on("SIGTERM", () => onSignal("SIGTERM"));
}

main().catch((error) => {
  logger.error({ error: errorMessage(error) }, "Fatal error starting bot");
  process.exit(1);
});
