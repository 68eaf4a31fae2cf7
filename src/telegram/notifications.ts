/**
 * Telegram Notifications Service
 * Sends chat messages to users on slot and booking events
 */
import type { User } from "../db/schema";
import type { SupplySlot } from "../sdk/schemas";
import type { Notifier } from "../services/notifier";
import { formatTimeWindow } from "../filters";
import { logger, errorMessage } from "../logger";
import type { InlineKeyboard, SendMessageOptions, TelegramApi } from "./api";

// Slots listed per new-slot message
export const MAX_SLOTS_PER_MESSAGE = 5;
// Telegram rejects callback_data above 64 bytes
const MAX_CALLBACK_DATA_BYTES = 64;

export class TelegramNotifier implements Notifier {
  constructor(private readonly api: Pick<TelegramApi, "sendMessage">) {}

  /**
   * Send a message to a user. Returns false on delivery failure.
   */
  private async deliver(user: User, text: string, options: SendMessageOptions = {}): Promise<boolean> {
    try {
      await this.api.sendMessage(user.telegram_id, text, options);
      logger.debug({ userId: user.id }, "Sent Telegram notification");
      return true;
    } catch (error) {
      logger.error(
        { userId: user.id, telegramId: user.telegram_id, error: errorMessage(error) },
        "Failed to send Telegram notification"
      );
      return false;
    }
  }

  async notifyNewSlots(user: User, accountName: string, slots: SupplySlot[]): Promise<void> {
    if (slots.length === 0) return;

    const shown = slots.slice(0, MAX_SLOTS_PER_MESSAGE);
    await this.deliver(user, formatNewSlots(accountName, slots), { keyboard: slotKeyboard(shown) });
  }

  async notifyBookingSuccess(
    user: User,
    slot: SupplySlot,
    accountName: string,
    autoBooked: boolean
  ): Promise<void> {
    await this.deliver(user, formatBookingSuccess(slot, accountName, autoBooked));
  }

  async notifyBookingError(user: User, message: string): Promise<void> {
    await this.deliver(user, `❌ Booking failed: ${message}`);
  }

  async sendMessage(user: User, text: string): Promise<void> {
    await this.deliver(user, text);
  }
}

export function formatSlotLines(slot: SupplySlot, index: number): string {
  return [
    `${index}. 🏭 ${slot.warehouseName}`,
    `   📅 ${slot.date} ${formatTimeWindow(slot)}`,
    `   📊 Coefficient: ${slot.coefficient}`,
  ].join("\n");
}

export function formatNewSlots(accountName: string, slots: SupplySlot[]): string {
  const shown = slots.slice(0, MAX_SLOTS_PER_MESSAGE);
  const lines = [`🆕 New slots for account "${accountName}" (${slots.length}):`, ""];

  shown.forEach((slot, i) => {
    lines.push(formatSlotLines(slot, i + 1));
  });

  if (slots.length > shown.length) {
    lines.push("", `…and ${slots.length - shown.length} more`);
  }

  return lines.join("\n");
}

export function formatBookingSuccess(slot: SupplySlot, accountName: string, autoBooked: boolean): string {
  return [
    autoBooked ? "🤖 Slot booked automatically!" : "✅ Slot booked!",
    "",
    `🏭 Warehouse: ${slot.warehouseName}`,
    `📅 Date: ${slot.date}`,
    `🕐 Time: ${formatTimeWindow(slot)}`,
    `📊 Coefficient: ${slot.coefficient}`,
    `👤 Account: ${accountName}`,
  ].join("\n");
}

/**
 * One row per slot: book / skip
 */
export function slotKeyboard(slots: SupplySlot[]): InlineKeyboard {
  const rows: InlineKeyboard = [];

  slots.forEach((slot, i) => {
    const book = `book_${slot.id}`;
    const skip = `skip_${slot.id}`;
    if (Buffer.byteLength(book) > MAX_CALLBACK_DATA_BYTES || Buffer.byteLength(skip) > MAX_CALLBACK_DATA_BYTES) {
      return;
    }
    rows.push([
      { text: `✅ Book #${i + 1}`, callback_data: book },
      { text: "❌ Skip", callback_data: skip },
    ]);
  });

  return rows;
}
