/**
 * Booking Executor
 *
 * Single path for turning a slot into a booking:
 *   client.book -> store.addBookedSlot -> (supply number) -> success notification
 *
 * Booking rejections are reported to the user and resolve to false. Once the
 * upstream accepted a booking the remaining steps always run, and a storage
 * failure is logged rather than retried, so a slot is never booked twice.
 */
import { DateTime } from "luxon";
import { BookingError } from "../sdk";
import type { SupplySlot } from "../sdk/schemas";
import type { SlotStore } from "../store";
import type { Account, User, UserWithAccounts } from "../db/schema";
import { selectBest } from "../filters";
import { logger, errorMessage } from "../logger";
import type { ClientProvider, Notifier } from "./notifier";

export interface BookingExecutorConfig {
  store: SlotStore;
  clients: ClientProvider;
  notifier: Notifier;
  horizonDays?: number;
  timezone?: string;
  now?: () => DateTime;
}

export class BookingExecutor {
  private store: SlotStore;
  private clients: ClientProvider;
  private notifier: Notifier;
  private horizonDays: number;
  private timezone: string;
  private now: () => DateTime;

  constructor(config: BookingExecutorConfig) {
    this.store = config.store;
    this.clients = config.clients;
    this.notifier = config.notifier;
    this.horizonDays = config.horizonDays ?? 14;
    this.timezone = config.timezone ?? "Europe/Moscow";
    this.now = config.now ?? (() => DateTime.now().setZone(this.timezone));
  }

  /**
   * Book a slot on an account and report the outcome to the user
   */
  async book(user: User, account: Account, slot: SupplySlot, autoBooked: boolean): Promise<boolean> {
    return this.execute(user, account, slot, autoBooked, null);
  }

  /**
   * Book a slot the user picked from a notification. The slot is re-fetched
   * per account since ids are only meaningful within one fetch.
   */
  async bookBySlotId(userId: number, slotId: string): Promise<boolean> {
    const user = await this.store.getUserWithAccounts(userId);
    if (!user) {
      logger.warn({ userId, slotId }, "Booking requested for unknown user");
      return false;
    }

    for (const account of user.accounts.filter((a) => a.is_active)) {
      let slots: SupplySlot[];
      try {
        slots = await this.clients.forAccount(account).listSupplySlots(this.horizonDays);
      } catch (error) {
        logger.warn(
          { userId, accountId: account.id, error: errorMessage(error) },
          "Slot fetch failed - trying next account"
        );
        continue;
      }

      const slot = slots.find((s) => s.id === slotId && s.isAvailable);
      if (slot) {
        return this.execute(user, account, slot, false, null);
      }
    }

    await this.notifier.notifyBookingError(user, "Slot not found or already taken");
    return false;
  }

  /**
   * One continuous-search attempt: book the best matching slot for a supply.
   * The signal is honored up to the booking call, never after it.
   */
  async autoBookBySupplyNumber(
    userId: number,
    accountId: number,
    supplyNumber: string,
    signal?: AbortSignal
  ): Promise<boolean> {
    const user = await this.store.getUserWithAccounts(userId);
    const account = user?.accounts.find((a) => a.id === accountId && a.is_active);
    if (!user || !account) {
      throw new Error(`Account ${accountId} not found or inactive for user ${userId}`);
    }

    signal?.throwIfAborted();
    const slots = await this.clients
      .forAccount(account)
      .listSupplySlots(this.horizonDays, { signal });

    const best = selectBest(slots, user.filters, this.now(), { enforceQuietHours: false });
    if (!best) {
      logger.debug({ userId, supplyNumber, fetched: slots.length }, "No matching slot yet");
      return false;
    }

    signal?.throwIfAborted();
    return this.execute(user, account, best, true, supplyNumber);
  }

  /**
   * Automatic bookings since local midnight
   */
  async countTodayAutoBookings(userId: number, now: DateTime = this.now()): Promise<number> {
    const midnight = now.setZone(this.timezone).startOf("day");
    return this.store.countAutoBookingsSince(userId, midnight.toJSDate());
  }

  private async execute(
    user: User | UserWithAccounts,
    account: Account,
    slot: SupplySlot,
    autoBooked: boolean,
    supplyNumber: string | null
  ): Promise<boolean> {
    const log = logger.child({ userId: user.id, accountId: account.id, slotId: slot.id, autoBooked });

    try {
      await this.clients.forAccount(account).book(slot.id);
    } catch (error) {
      if (error instanceof BookingError) {
        log.warn({ reason: error.reason, error: error.message }, "Booking rejected");
        await this.notifier.notifyBookingError(user, error.message);
        return false;
      }

      log.error({ error: errorMessage(error) }, "Unexpected error while booking");
      await this.notifier.notifyBookingError(user, `Unexpected error while booking: ${errorMessage(error)}`);
      throw error;
    }

    try {
      await this.store.addBookedSlot(user.id, account.id, slot, autoBooked);
      if (supplyNumber) {
        await this.store.attachSupplyNumber(user.id, slot.id, supplyNumber);
      }
    } catch (error) {
      log.error(
        { error: errorMessage(error), warehouseId: slot.warehouseId, date: slot.date },
        "Slot booked upstream but not recorded - storage is inconsistent"
      );
    }

    log.info({ warehouse: slot.warehouseName, date: slot.date, coefficient: slot.coefficient }, "Slot booked");
    await this.notifier.notifyBookingSuccess(user, slot, account.name, autoBooked);
    return true;
  }
}
