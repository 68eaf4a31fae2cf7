/**
 * Telegram Bot API client (axios)
 *
 * Thin wrapper over https://api.telegram.org/bot<token>/<method>. Every reply
 * is validated with zod; `ok: false` replies raise TelegramApiError.
 */
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosRequestConfig } from "axios";
import { HttpsProxyAgent } from "https-proxy-agent";
import { z } from "zod";

const TELEGRAM_API_BASE = "https://api.telegram.org";

export class TelegramApiError extends Error {
  public readonly status: number;
  public readonly errorCode?: number;

  constructor(message: string, status: number, errorCode?: number) {
    super(message);
    this.name = "TelegramApiError";
    this.status = status;
    this.errorCode = errorCode;
    Object.setPrototypeOf(this, TelegramApiError.prototype);
  }
}

const TelegramResponseSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export const TelegramUserSchema = z.object({
  id: z.number(),
  is_bot: z.boolean().optional(),
  username: z.string().optional(),
  first_name: z.string().optional(),
  last_name: z.string().optional(),
});

export type TelegramUser = z.infer<typeof TelegramUserSchema>;

const ChatSchema = z.object({ id: z.number() });

export const MessageSchema = z.object({
  message_id: z.number(),
  chat: ChatSchema,
  from: TelegramUserSchema.optional(),
  text: z.string().optional(),
});

export type TelegramMessage = z.infer<typeof MessageSchema>;

export const CallbackQuerySchema = z.object({
  id: z.string(),
  from: TelegramUserSchema,
  data: z.string().optional(),
  message: MessageSchema.optional(),
});

export type CallbackQuery = z.infer<typeof CallbackQuerySchema>;

export const UpdateSchema = z.object({
  update_id: z.number(),
  message: MessageSchema.optional(),
  callback_query: CallbackQuerySchema.optional(),
});

export type TelegramUpdate = z.infer<typeof UpdateSchema>;

export interface InlineButton {
  text: string;
  callback_data: string;
}

export type InlineKeyboard = InlineButton[][];

export interface SendMessageOptions {
  keyboard?: InlineKeyboard;
  silent?: boolean;
}

export interface BotCommand {
  command: string;
  description: string;
}

export interface TelegramApiConfig {
  token: string;
  timeoutMs?: number;
  proxyUrl?: string;
  /** Custom axios adapter (an in-process Bot API in tests) */
  adapter?: AxiosAdapter;
}

export class TelegramApi {
  private http: AxiosInstance;
  private timeoutMs: number;

  constructor(config: TelegramApiConfig) {
    this.timeoutMs = config.timeoutMs ?? 15_000;

    const axiosConfig: AxiosRequestConfig = {
      baseURL: `${TELEGRAM_API_BASE}/bot${config.token}`,
      timeout: this.timeoutMs,
      validateStatus: () => true,
    };
    if (config.adapter) {
      axiosConfig.adapter = config.adapter;
    }
    if (config.proxyUrl) {
      axiosConfig.httpsAgent = new HttpsProxyAgent(config.proxyUrl);
    }

    this.http = axios.create(axiosConfig);
  }

  private async call<T extends z.ZodTypeAny>(
    method: string,
    params: Record<string, unknown>,
    schema: T,
    options: { timeoutMs?: number; signal?: AbortSignal } = {}
  ): Promise<z.infer<T>> {
    const response = await this.http.post<unknown>(`/${method}`, params, {
      timeout: options.timeoutMs ?? this.timeoutMs,
      signal: options.signal,
    });

    const parsed = TelegramResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new TelegramApiError(`${method}: malformed response`, response.status);
    }
    if (!parsed.data.ok) {
      throw new TelegramApiError(
        `${method}: ${parsed.data.description ?? "request failed"}`,
        response.status,
        parsed.data.error_code
      );
    }

    return schema.parse(parsed.data.result);
  }

  async sendMessage(chatId: number, text: string, options: SendMessageOptions = {}): Promise<TelegramMessage> {
    const params: Record<string, unknown> = {
      chat_id: chatId,
      text,
      disable_web_page_preview: true,
      disable_notification: options.silent ?? false,
    };
    if (options.keyboard) {
      params.reply_markup = { inline_keyboard: options.keyboard };
    }

    return this.call("sendMessage", params, MessageSchema);
  }

  /**
   * Long-poll for updates. Entries that fail validation are dropped but
   * still advance the offset.
   */
  async getUpdates(
    offset: number,
    timeoutSec: number,
    signal?: AbortSignal
  ): Promise<{ updates: TelegramUpdate[]; nextOffset: number }> {
    const raw = await this.call(
      "getUpdates",
      { offset, timeout: timeoutSec, allowed_updates: ["message", "callback_query"] },
      z.array(z.unknown()),
      { timeoutMs: (timeoutSec + 10) * 1000, signal }
    );

    let nextOffset = offset;
    const updates: TelegramUpdate[] = [];

    for (const entry of raw) {
      const parsed = UpdateSchema.safeParse(entry);
      if (parsed.success) {
        updates.push(parsed.data);
        nextOffset = Math.max(nextOffset, parsed.data.update_id + 1);
        continue;
      }

      const id = z.object({ update_id: z.number() }).safeParse(entry);
      if (id.success) {
        nextOffset = Math.max(nextOffset, id.data.update_id + 1);
      }
    }

    return { updates, nextOffset };
  }

  async answerCallbackQuery(callbackQueryId: string, text?: string): Promise<void> {
    await this.call("answerCallbackQuery", { callback_query_id: callbackQueryId, text }, z.boolean());
  }

  async setMyCommands(commands: BotCommand[]): Promise<void> {
    await this.call("setMyCommands", { commands }, z.boolean());
  }
}
