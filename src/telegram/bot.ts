/**
 * Telegram Bot
 * Long-polls the Bot API and routes commands and inline-button presses
 */
import { setTimeout as sleep } from "node:timers/promises";
import { logger, errorMessage } from "../logger";
import type {
  SendMessageOptions,
  TelegramApi,
  TelegramMessage,
  TelegramUpdate,
  TelegramUser,
} from "./api";
import { handleCallback } from "./callbacks";
import type { BotServices, Command, CommandContext } from "./context";

// Import commands
import { startCommand, helpCommand } from "./commands/start";
import { addAccountCommand, accountsCommand, removeAccountCommand } from "./commands/accounts";
import { filtersCommand, setCommand } from "./commands/filters";
import { searchCommand, stopSearchCommand } from "./commands/search";
import { statusCommand, historyCommand, warehousesCommand } from "./commands/status";
import { adminCommand } from "./commands/admin";

const POLL_TIMEOUT_SEC = 25;
const POLL_ERROR_BACKOFF_MS = 5_000;

/**
 * All chat commands
 */
export const commands: Command[] = [
  startCommand,
  helpCommand,
  addAccountCommand,
  accountsCommand,
  removeAccountCommand,
  filtersCommand,
  setCommand,
  warehousesCommand,
  searchCommand,
  stopSearchCommand,
  statusCommand,
  historyCommand,
  adminCommand,
];

/**
 * Command handlers map
 */
const commandHandlers: Record<string, Command> = Object.fromEntries(
  commands.map((command) => [command.name, command])
);

// Accepted aliases
commandHandlers.list_accounts = accountsCommand;
commandHandlers.settings = filtersCommand;

/**
 * "/set@my_bot min 1.2" -> { name: "set", args: ["min", "1.2"] }
 */
export function parseCommand(text: string): { name: string; args: string[] } | null {
  const match = text.trim().match(/^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s+([\s\S]*))?$/);
  if (!match) return null;

  const args = (match[2] ?? "").split(/\s+/).filter((arg) => arg.length > 0);
  return { name: match[1].toLowerCase(), args };
}

export interface TelegramBotOptions {
  pollTimeoutSec?: number;
  errorBackoffMs?: number;
}

export class TelegramBot {
  private api: TelegramApi;
  private services: BotServices;
  private pollTimeoutSec: number;
  private errorBackoffMs: number;

  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;

  constructor(api: TelegramApi, services: BotServices, options: TelegramBotOptions = {}) {
    this.api = api;
    this.services = services;
    this.pollTimeoutSec = options.pollTimeoutSec ?? POLL_TIMEOUT_SEC;
    this.errorBackoffMs = options.errorBackoffMs ?? POLL_ERROR_BACKOFF_MS;
  }

  /**
   * Register the command menu and start long polling
   */
  async start(): Promise<void> {
    if (this.loop) {
      logger.warn("Telegram bot already running");
      return;
    }

    try {
      await this.api.setMyCommands(
        commands
          .filter((c) => !c.adminOnly)
          .map((c) => ({ command: c.name, description: c.description }))
      );
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, "Failed to register bot commands");
    }

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.poll(controller.signal).catch((error) => {
      logger.error({ error: errorMessage(error) }, "Telegram polling loop crashed");
    });

    logger.info("Telegram bot started");
  }

  /**
   * Stop polling and wait for the update being handled
   */
  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;
    logger.info("Telegram bot stopped");
  }

  private async poll(signal: AbortSignal): Promise<void> {
    let offset = 0;

    while (!signal.aborted) {
      try {
        const { updates, nextOffset } = await this.api.getUpdates(offset, this.pollTimeoutSec, signal);
        offset = nextOffset;

        for (const update of updates) {
          await this.handleUpdate(update);
        }
      } catch (error) {
        if (signal.aborted) break;

        logger.error({ error: errorMessage(error) }, "Polling for updates failed");
        try {
          await sleep(this.errorBackoffMs, undefined, { signal });
        } catch (sleepError) {
          if (!signal.aborted) throw sleepError;
        }
      }
    }
  }

  /**
   * Route a single update. Handler errors are logged and reported to the chat.
   */
  async handleUpdate(update: TelegramUpdate): Promise<void> {
    if (update.callback_query) {
      try {
        await handleCallback(update.callback_query, this.services, this.api);
      } catch (error) {
        logger.error(
          { data: update.callback_query.data, error: errorMessage(error) },
          "Error handling callback"
        );
      }
      return;
    }

    const message = update.message;
    if (message?.text && message.from) {
      await this.handleMessage(message, message.from, message.text);
    }
  }

  private async handleMessage(message: TelegramMessage, from: TelegramUser, text: string): Promise<void> {
    const chatId = message.chat.id;
    const reply = async (replyText: string, options: SendMessageOptions = {}): Promise<void> => {
      await this.api.sendMessage(chatId, replyText, options);
    };

    const parsed = parseCommand(text);
    if (!parsed) {
      await this.safeReply(chatId, "Send /help to see the available commands.");
      return;
    }

    const command = commandHandlers[parsed.name];
    if (!command) {
      logger.warn({ command: parsed.name }, "Unknown command received");
      await this.safeReply(chatId, "Unknown command. Send /help to see the available commands.");
      return;
    }

    if (command.adminOnly && !this.services.adminIds.includes(from.id)) {
      await this.safeReply(chatId, "⛔ This command is for administrators only.");
      return;
    }

    try {
      const user =
        command === startCommand
          ? await this.services.store.createUser({
              telegram_id: from.id,
              username: from.username ?? null,
              first_name: from.first_name ?? null,
              last_name: from.last_name ?? null,
            })
          : await this.services.store.getUser(from.id);

      if (!user) {
        await reply("Please send /start first.");
        return;
      }

      const ctx: CommandContext = {
        services: this.services,
        user,
        from,
        chatId,
        args: parsed.args,
        reply,
      };

      await command.handle(ctx);
    } catch (error) {
      logger.error({ command: parsed.name, error: errorMessage(error) }, "Error handling command");
      await this.safeReply(chatId, "An error occurred while processing your command.");
    }
  }

  private async safeReply(chatId: number, text: string): Promise<void> {
    try {
      await this.api.sendMessage(chatId, text);
    } catch (error) {
      logger.error({ chatId, error: errorMessage(error) }, "Failed to send reply");
    }
  }
}
