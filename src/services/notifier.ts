import type { Account, User } from "../db/schema";
import type { SupplySlot } from "../sdk/schemas";
import type { MarketplaceClient } from "../sdk";

/**
 * Outbound user messages. Implementations log delivery failures and never throw.
 */
export interface Notifier {
  notifyNewSlots(user: User, accountName: string, slots: SupplySlot[]): Promise<void>;
  notifyBookingSuccess(
    user: User,
    slot: SupplySlot,
    accountName: string,
    autoBooked: boolean
  ): Promise<void>;
  notifyBookingError(user: User, message: string): Promise<void>;
  sendMessage(user: User, text: string): Promise<void>;
}

/**
 * The client surface the services use
 */
export type SlotClient = Pick<MarketplaceClient, "listSupplySlots" | "book">;

/**
 * Hands out one client per account (MarketplaceClientPool in production)
 */
export interface ClientProvider {
  forAccount(account: Pick<Account, "id" | "credential">): SlotClient;
  evict?(accountId: number): void;
}
