import { test, expect, describe, beforeEach } from "vitest";
import { Store, FilterValidationError } from "./index";
import type { SupplySlot } from "../sdk/schemas";

const slot: SupplySlot = {
  id: "slot-1",
  warehouseId: "507",
  warehouseName: "Коледино",
  date: "2026-10-20",
  timeStart: "10:00",
  timeEnd: "12:00",
  coefficient: 1.4,
  isAvailable: true,
  region: null,
};

describe("Store (memory-only)", () => {
  let clock: Date;
  let store: Store;

  beforeEach(() => {
    clock = new Date("2026-10-19T09:00:00Z");
    store = new Store({ now: () => clock });
  });

  test("createUser assigns ids and default filters", async () => {
    const user = await store.createUser({ telegram_id: 1001, username: "alice" });

    expect(user.id).toBe(1);
    expect(await store.getUser(1001)).toEqual(user);

    const filters = await store.getFilters(user.id);
    expect(filters.min_coefficient).toBe(1.0);
    expect(filters.auto_booking_limit).toBe(5);
    expect(filters.notifications_enabled).toBe(true);
    expect(filters.auto_booking_enabled).toBe(false);
  });

  test("createUser returns the existing user for a known telegram id", async () => {
    const first = await store.createUser({ telegram_id: 1001, username: "alice" });
    const second = await store.createUser({ telegram_id: 1001, username: "alice2" });

    expect(second.id).toBe(first.id);
    expect(second.username).toBe("alice2");
  });

  test("accounts are listed in creation order", async () => {
    const user = await store.createUser({ telegram_id: 1001 });
    await store.addAccount(user.id, "key-a", "A");
    await store.addAccount(user.id, "key-b", "B");

    const accounts = await store.getUserAccounts(user.id);
    expect(accounts.map((a) => a.name)).toEqual(["A", "B"]);
  });

  test("deleteAccount only deletes accounts the user owns", async () => {
    const alice = await store.createUser({ telegram_id: 1 });
    const bob = await store.createUser({ telegram_id: 2 });
    const account = await store.addAccount(alice.id, "key", "Main");

    expect(await store.deleteAccount(bob.id, account.id)).toBe(false);
    expect(await store.deleteAccount(alice.id, account.id)).toBe(true);
    expect(await store.getUserAccounts(alice.id)).toEqual([]);
  });

  test("getActiveUsers skips users without active accounts", async () => {
    const alice = await store.createUser({ telegram_id: 1 });
    const bob = await store.createUser({ telegram_id: 2 });
    const a1 = await store.addAccount(alice.id, "key-1", "One");
    await store.addAccount(alice.id, "key-2", "Two");
    const b1 = await store.addAccount(bob.id, "key-3", "Three");

    await store.setAccountActive(a1.id, false);
    await store.setAccountActive(b1.id, false);

    const active = await store.getActiveUsers();
    expect(active.map((u) => u.id)).toEqual([alice.id]);
    expect(active[0].accounts.map((a) => a.name)).toEqual(["Two"]);
  });

  test("markAccountChecked records the timestamp", async () => {
    const user = await store.createUser({ telegram_id: 1 });
    const account = await store.addAccount(user.id, "key", "Main");
    const at = new Date("2026-10-19T09:05:00Z");

    await store.markAccountChecked(account.id, at);

    const [stored] = await store.getUserAccounts(user.id);
    expect(stored.last_check).toEqual(at);
  });

  test("updateFilters rejects min above max", async () => {
    const user = await store.createUser({ telegram_id: 1 });

    await expect(
      store.updateFilters(user.id, { min_coefficient: 2, max_coefficient: 1.5 })
    ).rejects.toBeInstanceOf(FilterValidationError);

    expect((await store.getFilters(user.id)).min_coefficient).toBe(1.0);
  });

  test("updateFilters merges the patch", async () => {
    const user = await store.createUser({ telegram_id: 1 });
    const updated = await store.updateFilters(user.id, {
      warehouses: ["507"],
      quiet_hours_start: 23,
      quiet_hours_end: 7,
    });

    expect(updated.warehouses).toEqual(["507"]);
    expect(updated.quiet_hours_start).toBe(23);
    expect(updated.min_coefficient).toBe(1.0);
  });

  test("updateFilters rejects out-of-range quiet hours", async () => {
    const user = await store.createUser({ telegram_id: 1 });
    await expect(store.updateFilters(user.id, { quiet_hours_start: 24 })).rejects.toThrow(
      "Quiet hour must be between 0 and 23, got 24"
    );
  });

  test("addBookedSlot stores the slot fields", async () => {
    const user = await store.createUser({ telegram_id: 1 });
    const account = await store.addAccount(user.id, "key", "Main");

    const booking = await store.addBookedSlot(user.id, account.id, slot, true);

    expect(booking).toMatchObject({
      user_id: user.id,
      account_id: account.id,
      slot_id: "slot-1",
      warehouse_id: "507",
      supply_date: "2026-10-20",
      time_slot: "10:00-12:00",
      coefficient: 1.4,
      supply_number: null,
      auto_booked: true,
      status: "booked",
    });
  });

  test("attachSupplyNumber updates the latest booking of the slot", async () => {
    const user = await store.createUser({ telegram_id: 1 });
    const account = await store.addAccount(user.id, "key", "Main");
    await store.addBookedSlot(user.id, account.id, slot, true);

    expect(await store.attachSupplyNumber(user.id, "slot-1", "WB1")).toBe(true);
    expect(await store.attachSupplyNumber(user.id, "missing", "WB1")).toBe(false);

    const [booking] = await store.getBookedSlots(user.id);
    expect(booking.supply_number).toBe("WB1");
  });

  test("countAutoBookingsSince counts only automatic bookings after the cutoff", async () => {
    const user = await store.createUser({ telegram_id: 1 });
    const account = await store.addAccount(user.id, "key", "Main");

    clock = new Date("2026-10-18T12:00:00Z");
    await store.addBookedSlot(user.id, account.id, slot, true);
    clock = new Date("2026-10-19T08:00:00Z");
    await store.addBookedSlot(user.id, account.id, slot, true);
    await store.addBookedSlot(user.id, account.id, slot, false);

    expect(await store.countAutoBookingsSince(user.id, new Date("2026-10-19T00:00:00Z"))).toBe(1);
  });

  test("getBookedSlots returns most recent first with a limit", async () => {
    const user = await store.createUser({ telegram_id: 1 });
    const account = await store.addAccount(user.id, "key", "Main");

    for (const id of ["a", "b", "c"]) {
      clock = new Date(clock.getTime() + 60_000);
      await store.addBookedSlot(user.id, account.id, { ...slot, id }, false);
    }

    const recent = await store.getBookedSlots(user.id, 2);
    expect(recent.map((b) => b.slot_id)).toEqual(["c", "b"]);
  });
});
