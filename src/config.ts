import { z } from "zod";

const booleanFlag = (defaultValue: boolean) =>
  z
    .string()
    .optional()
    .transform((val) =>
      val === undefined || val === "" ? defaultValue : val.toLowerCase() === "true"
    );

/**
 * Application configuration for the supply slot bot
 */
export const AppConfigSchema = z.object({
  // Telegram Bot
  TELEGRAM_BOT_TOKEN: z.string().min(1).describe("Telegram bot token from @BotFather"),
  TELEGRAM_ADMIN_IDS: z
    .string()
    .optional()
    .transform((val) =>
      (val ?? "")
        .split(",")
        .map((id) => id.trim())
        .filter((id) => id.length > 0)
        .map(Number)
        .filter((id) => Number.isInteger(id))
    )
    .describe("Comma-separated Telegram user IDs allowed to use /admin"),

  // Database (Supabase) - memory-only store when absent
  SUPABASE_URL: z.string().optional().describe("Supabase project URL"),
  SUPABASE_SERVICE_ROLE_KEY: z
    .string()
    .optional()
    .describe("Supabase service role key (for server-side access)"),

  // Marketplace API
  MARKETPLACE_API_BASE_URL: z
    .string()
    .url()
    .default("https://supplies-api.wildberries.ru")
    .describe("Primary marketplace API base URL"),
  MARKETPLACE_API_BACKUP_URL: z
    .string()
    .url()
    .optional()
    .describe("Backup base URL tried once on transport failure"),
  MARKETPLACE_API_TIMEOUT_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(30000)
    .describe("Timeout for a single upstream request"),
  MARKETPLACE_PROXY_URL: z.string().optional().describe("HTTP(S) proxy for upstream calls"),
  MARKETPLACE_FORCE_DEMO: booleanFlag(false).describe("Always serve the demo dataset"),
  MARKETPLACE_ALLOW_DEMO_FALLBACK: booleanFlag(true).describe(
    "Fall back to the demo dataset when the upstream is unreachable"
  ),
  DEMO_BOOKING_SUCCESS_RATE: z.coerce
    .number()
    .min(0)
    .max(1)
    .default(0.8)
    .describe("Probability that a demo booking succeeds"),
  SDK_DEBUG: booleanFlag(false).describe("Log unknown fields in upstream responses"),

  // Loops
  MONITOR_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(5000)
    .describe("Milliseconds between monitor ticks"),
  SEARCH_INTERVAL_MS: z.coerce
    .number()
    .int()
    .positive()
    .default(30000)
    .describe("Milliseconds between continuous search attempts"),
  SLOT_HORIZON_DAYS: z.coerce
    .number()
    .int()
    .positive()
    .default(14)
    .describe("How many days ahead to request slots for"),

  // Accounts
  MAX_ACCOUNTS_PER_USER: z.coerce.number().int().positive().default(5),

  // Time zone used for quiet hours and daily auto-booking budgets
  TIMEZONE: z.string().default("Europe/Moscow"),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Load and validate configuration from the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const config = AppConfigSchema.parse(env);

  if (Boolean(config.SUPABASE_URL) !== Boolean(config.SUPABASE_SERVICE_ROLE_KEY)) {
    throw new Error("SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY must be set together");
  }

  return config;
}

/**
 * Settings an admin can flip while the bot is running.
 *
 * Clients read a snapshot when they are constructed; flipping a value
 * does not affect clients that already exist.
 */
export interface RuntimeSettings {
  forceDemo: boolean;
  allowDemoFallback: boolean;
  useBackupUrl: boolean;
}

export class RuntimeConfig {
  private settings: RuntimeSettings;

  constructor(initial: Partial<RuntimeSettings> = {}) {
    this.settings = {
      forceDemo: initial.forceDemo ?? false,
      allowDemoFallback: initial.allowDemoFallback ?? true,
      useBackupUrl: initial.useBackupUrl ?? false,
    };
  }

  snapshot(): Readonly<RuntimeSettings> {
    return { ...this.settings };
  }

  update(patch: Partial<RuntimeSettings>): Readonly<RuntimeSettings> {
    this.settings = { ...this.settings, ...patch };
    return this.snapshot();
  }
}
