import { test, expect, describe, beforeEach } from "vitest";
import type { AxiosAdapter } from "axios";
import { TelegramApi, type TelegramUpdate } from "./api";
import { TelegramBot, parseCommand } from "./bot";
import { parseCallbackData } from "./callbacks";
import { parseSetArgs } from "./commands/filters";
import { parseAdminToggle } from "./commands/admin";
import { TelegramNotifier } from "./notifications";
import { RuntimeConfig } from "../config";
import { Store } from "../store";
import { MarketplaceClientPool } from "../sdk";
import { BookingExecutor, ContinuousSearchManager, PeriodicMonitor } from "../services";

interface BotCall {
  method: string;
  body: Record<string, unknown>;
}

const ADMIN_ID = 42;
const USER_ID = 1001;

/**
 * Records Bot API calls and answers them like Telegram does
 */
function createBotApi(): { api: TelegramApi; calls: BotCall[] } {
  const calls: BotCall[] = [];
  let messageId = 0;

  const adapter: AxiosAdapter = async (config) => {
    const method = (config.url ?? "").replace(/^\//, "");
    const parsed: unknown = typeof config.data === "string" ? JSON.parse(config.data) : {};
    const body: Record<string, unknown> = isRecord(parsed) ? parsed : {};
    calls.push({ method, body });

    const result =
      method === "sendMessage"
        ? { message_id: ++messageId, chat: { id: body.chat_id } }
        : true;

    return { data: { ok: true, result }, status: 200, statusText: "OK", headers: {}, config };
  };

  return { api: new TelegramApi({ token: "test-secret", adapter }), calls };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function message(text: string, fromId = USER_ID): TelegramUpdate {
  return {
    update_id: 1,
    message: {
      message_id: 1,
      chat: { id: fromId },
      from: { id: fromId, first_name: "Alice" },
      text,
    },
  };
}

describe("parseCommand", () => {
  test("splits name and arguments", () => {
    expect(parseCommand("/set min 1.2")).toEqual({ name: "set", args: ["min", "1.2"] });
    expect(parseCommand("  /HELP  ")).toEqual({ name: "help", args: [] });
  });

  test("drops the bot mention", () => {
    expect(parseCommand("/search@slot_bot WB1 2")).toEqual({ name: "search", args: ["WB1", "2"] });
  });

  test("rejects plain text", () => {
    expect(parseCommand("hello")).toBeNull();
    expect(parseCommand("/")).toBeNull();
  });
});

describe("parseSetArgs", () => {
  test("parses each field", () => {
    expect(parseSetArgs(["min", "1.2"])).toEqual({ ok: true, patch: { min_coefficient: 1.2 } });
    expect(parseSetArgs(["max", "off"])).toEqual({ ok: true, patch: { max_coefficient: null } });
    expect(parseSetArgs(["warehouses", "507,", "117986"])).toEqual({
      ok: true,
      patch: { warehouses: ["507", "117986"] },
    });
    expect(parseSetArgs(["regions", "all"])).toEqual({ ok: true, patch: { regions: [] } });
    expect(parseSetArgs(["windows", "8-12,22-2"])).toEqual({
      ok: true,
      patch: {
        time_windows: [
          { start: 8, end: 12 },
          { start: 22, end: 2 },
        ],
      },
    });
    expect(parseSetArgs(["autobook", "ON"])).toEqual({ ok: true, patch: { auto_booking_enabled: true } });
    expect(parseSetArgs(["limit", "3"])).toEqual({ ok: true, patch: { auto_booking_limit: 3 } });
    expect(parseSetArgs(["notify", "off"])).toEqual({ ok: true, patch: { notifications_enabled: false } });
    expect(parseSetArgs(["quiet", "23-7"])).toEqual({
      ok: true,
      patch: { quiet_hours_start: 23, quiet_hours_end: 7 },
    });
  });

  test("reports bad values", () => {
    expect(parseSetArgs(["autobook", "maybe"])).toEqual({ ok: false, error: "Use on or off" });
    expect(parseSetArgs(["windows", "morning"])).toEqual({
      ok: false,
      error: "Use the form start-end, e.g. 8-12",
    });
    expect(parseSetArgs(["limit", "1.5"]).ok).toBe(false);
    expect(parseSetArgs(["min"]).ok).toBe(false);
  });

  test("reports unknown fields with usage", () => {
    const result = parseSetArgs(["colour", "red"]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.split("\n")[0]).toBe('Unknown field "colour".');
    }
  });
});

describe("parseAdminToggle", () => {
  test("maps toggles to settings", () => {
    expect(parseAdminToggle("demo", "on")).toEqual({ forceDemo: true });
    expect(parseAdminToggle("fallback", "off")).toEqual({ allowDemoFallback: false });
    expect(parseAdminToggle("url", "backup")).toEqual({ useBackupUrl: true });
    expect(parseAdminToggle("url", "main")).toEqual({ useBackupUrl: false });
  });

  test("rejects anything else", () => {
    expect(parseAdminToggle("demo", "yes")).toBeNull();
    expect(parseAdminToggle("url", undefined)).toBeNull();
    expect(parseAdminToggle("reboot", "on")).toBeNull();
  });
});

describe("parseCallbackData", () => {
  test("recognizes book and skip", () => {
    expect(parseCallbackData("book_demo-507-2026-10-20-1000")).toEqual({
      type: "book",
      slotId: "demo-507-2026-10-20-1000",
    });
    expect(parseCallbackData("skip_slot_1")).toEqual({ type: "skip", slotId: "slot_1" });
    expect(parseCallbackData("other")).toEqual({ type: "unknown" });
    expect(parseCallbackData(undefined)).toEqual({ type: "unknown" });
  });
});

describe("TelegramBot", () => {
  let calls: BotCall[];
  let bot: TelegramBot;
  let store: Store;
  let runtime: RuntimeConfig;

  beforeEach(() => {
    const botApi = createBotApi();
    calls = botApi.calls;

    store = new Store();
    runtime = new RuntimeConfig({ forceDemo: true });
    const pool = new MarketplaceClientPool(runtime);
    const notifier = new TelegramNotifier(botApi.api);
    const executor = new BookingExecutor({ store, clients: pool, notifier });
    const finder = new ContinuousSearchManager({ store, executor, notifier });
    const monitor = new PeriodicMonitor({ store, clients: pool, executor, notifier });

    bot = new TelegramBot(botApi.api, {
      store,
      pool,
      executor,
      finder,
      monitor,
      runtime,
      adminIds: [ADMIN_ID],
      maxAccountsPerUser: 1,
      horizonDays: 3,
    });
  });

  function replies(): string[] {
    return calls.filter((c) => c.method === "sendMessage").map((c) => String(c.body.text));
  }

  test("/start registers the user", async () => {
    await bot.handleUpdate(message("/start"));

    expect(await store.getUser(USER_ID)).toMatchObject({ telegram_id: USER_ID, first_name: "Alice" });
    expect(replies()[0].split("\n")[0]).toBe(
      "👋 Hi, Alice! Add a marketplace API key with /add_account to start monitoring slots."
    );
  });

  test("other commands need /start first", async () => {
    await bot.handleUpdate(message("/filters"));

    expect(replies()).toEqual(["Please send /start first."]);
  });

  test("unknown commands and plain text get a hint", async () => {
    await bot.handleUpdate(message("/dance"));
    await bot.handleUpdate(message("hi"));

    expect(replies()).toEqual([
      "Unknown command. Send /help to see the available commands.",
      "Send /help to see the available commands.",
    ]);
  });

  test("/set validates against the stored filters", async () => {
    await bot.handleUpdate(message("/start"));
    await bot.handleUpdate(message("/set min 3"));
    await bot.handleUpdate(message("/set max 2"));

    expect(replies()[1].split("\n")[0]).toBe("✅ Saved.");
    expect(replies()[2]).toBe("❌ Minimum coefficient 3 is above maximum 2");
    expect((await store.getFilters(1)).max_coefficient).toBeNull();
  });

  test("/add_account validates the key and enforces the account limit", async () => {
    await bot.handleUpdate(message("/start"));
    await bot.handleUpdate(message("/add_account test-secret-key Main"));
    await bot.handleUpdate(message("/add_account test-secret-key-2"));

    expect(replies()[1]).toBe(
      '✅ Account "Main" added (id 1).\n\n⚠️ The marketplace API is unreachable right now; demo data is being served.'
    );
    expect(replies()[2]).toBe("You already have 1 accounts (limit 1).");
  });

  test("/admin is limited to admins", async () => {
    await bot.handleUpdate(message("/start"));
    await bot.handleUpdate(message("/admin demo off"));

    expect(replies()[1]).toBe("⛔ This command is for administrators only.");
    expect(runtime.snapshot().forceDemo).toBe(true);
  });

  test("/admin flips runtime settings", async () => {
    await bot.handleUpdate(message("/start", ADMIN_ID));
    await bot.handleUpdate(message("/admin demo off", ADMIN_ID));

    expect(runtime.snapshot().forceDemo).toBe(false);
    expect(replies()[1]).toBe("✅ Updated.\nForce demo: off\nDemo fallback: on\nBase URL: main");
  });

  test("skip buttons are acknowledged", async () => {
    await bot.handleUpdate({
      update_id: 2,
      callback_query: { id: "cb-1", from: { id: USER_ID }, data: "skip_slot-1" },
    });

    expect(calls).toEqual([
      { method: "answerCallbackQuery", body: { callback_query_id: "cb-1", text: "Skipped" } },
    ]);
  });

  test("book buttons from unknown users are refused", async () => {
    await bot.handleUpdate({
      update_id: 3,
      callback_query: { id: "cb-2", from: { id: USER_ID }, data: "book_slot-1" },
    });

    expect(calls).toEqual([
      { method: "answerCallbackQuery", body: { callback_query_id: "cb-2", text: "Use /start first" } },
    ]);
  });
});
