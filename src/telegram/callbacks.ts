/**
 * Inline button handlers: book_<slotId>, skip_<slotId>
 */
import type { BotServices } from "./context";
import type { CallbackQuery, TelegramApi } from "./api";
import { logger } from "../logger";

export type CallbackAction =
  | { type: "book"; slotId: string }
  | { type: "skip"; slotId: string }
  | { type: "unknown" };

export function parseCallbackData(data: string | undefined): CallbackAction {
  const match = data?.match(/^(book|skip)_(.+)$/);
  if (!match) return { type: "unknown" };
  return match[1] === "book" ? { type: "book", slotId: match[2] } : { type: "skip", slotId: match[2] };
}

export async function handleCallback(
  query: CallbackQuery,
  services: BotServices,
  api: Pick<TelegramApi, "answerCallbackQuery">
): Promise<void> {
  const action = parseCallbackData(query.data);

  if (action.type === "unknown") {
    await api.answerCallbackQuery(query.id);
    return;
  }

  if (action.type === "skip") {
    await api.answerCallbackQuery(query.id, "Skipped");
    return;
  }

  const user = await services.store.getUser(query.from.id);
  if (!user) {
    await api.answerCallbackQuery(query.id, "Use /start first");
    return;
  }

  await api.answerCallbackQuery(query.id, "Booking…");
  logger.info({ userId: user.id, slotId: action.slotId }, "Booking requested from notification");

  // Outcome is reported by the executor's notifications
  await services.executor.bookBySlotId(user.id, action.slotId);
}
