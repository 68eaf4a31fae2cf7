/**
 * In-process stand-ins for the notifier and the client pool, shared by the
 * service tests
 */
import type { Account, User } from "../../db/schema";
import type { SupplySlot } from "../../sdk/schemas";
import type { RequestOptions } from "../../sdk/client";
import type { ClientProvider, Notifier, SlotClient } from "../notifier";

export type NotificationRecord =
  | { type: "newSlots"; userId: number; accountName: string; slotIds: string[] }
  | { type: "success"; userId: number; slotId: string; accountName: string; autoBooked: boolean }
  | { type: "error"; userId: number; message: string }
  | { type: "message"; userId: number; text: string };

export class RecordingNotifier implements Notifier {
  readonly sent: NotificationRecord[] = [];

  async notifyNewSlots(user: User, accountName: string, slots: SupplySlot[]): Promise<void> {
    this.sent.push({ type: "newSlots", userId: user.id, accountName, slotIds: slots.map((s) => s.id) });
  }

  async notifyBookingSuccess(
    user: User,
    slot: SupplySlot,
    accountName: string,
    autoBooked: boolean
  ): Promise<void> {
    this.sent.push({ type: "success", userId: user.id, slotId: slot.id, accountName, autoBooked });
  }

  async notifyBookingError(user: User, message: string): Promise<void> {
    this.sent.push({ type: "error", userId: user.id, message });
  }

  async sendMessage(user: User, text: string): Promise<void> {
    this.sent.push({ type: "message", userId: user.id, text });
  }

  ofType<T extends NotificationRecord["type"]>(type: T): Extract<NotificationRecord, { type: T }>[] {
    return this.sent.filter((n): n is Extract<NotificationRecord, { type: T }> => n.type === type);
  }
}

export interface ScriptedAccount {
  slots: (call: number, options: RequestOptions) => SupplySlot[] | Promise<SupplySlot[]>;
  book?: (slotId: string) => Promise<true>;
}

/**
 * Client provider whose accounts answer from scripts. Unscripted accounts
 * return no slots and book successfully.
 */
export class ScriptedClients implements ClientProvider {
  readonly fetches = new Map<number, number>();
  readonly booked: { accountId: number; slotId: string }[] = [];
  readonly evicted: number[] = [];
  private scripts = new Map<number, ScriptedAccount>();

  script(accountId: number, script: ScriptedAccount): this {
    this.scripts.set(accountId, script);
    return this;
  }

  forAccount(account: Pick<Account, "id" | "credential">): SlotClient {
    return {
      listSupplySlots: async (_horizonDays?: number, options: RequestOptions = {}) => {
        const call = (this.fetches.get(account.id) ?? 0) + 1;
        this.fetches.set(account.id, call);
        const script = this.scripts.get(account.id);
        return script ? script.slots(call, options) : [];
      },
      book: async (slotId: string) => {
        const script = this.scripts.get(account.id);
        const result: true = script?.book ? await script.book(slotId) : true;
        this.booked.push({ accountId: account.id, slotId });
        return result;
      },
    };
  }

  evict(accountId: number): void {
    this.evicted.push(accountId);
  }
}

/**
 * A slot with sensible defaults
 */
export function makeSlot(overrides: Partial<SupplySlot> = {}): SupplySlot {
  return {
    id: "slot-1",
    warehouseId: "507",
    warehouseName: "Коледино",
    date: "2026-10-20",
    timeStart: "10:00",
    timeEnd: "12:00",
    coefficient: 1.5,
    isAvailable: true,
    region: "Московская область",
    ...overrides,
  };
}
