/**
 * In-Memory Store with Supabase Write-Through
 *
 * Architecture:
 * - Bootstrap: Load users, accounts, filters and bookings from Supabase into memory
 * - Reads: Always from memory
 * - Inserts: Awaited when Supabase is configured (generated ids are needed)
 * - Updates: Memory first, then persisted through executeWriteThrough
 *
 * Without a Supabase client the store is memory-only and assigns its own ids.
 */
import type { SupabaseClient } from "@supabase/supabase-js";
import { DateTime } from "luxon";
import { executeWriteThrough } from "../db/supabase";
import {
  AccountRowSchema,
  BookedSlotRowSchema,
  FilterRowSchema,
  UserRowSchema,
} from "../db/rows";
import {
  DEFAULT_FILTERS,
  type Account,
  type BookedSlot,
  type BookedSlotStatus,
  type FilterCriteria,
  type FilterUpdate,
  type User,
  type UserWithAccounts,
} from "../db/schema";
import type { SupplySlot } from "../sdk/schemas";
import { formatTimeWindow } from "../filters";
import { logger } from "../logger";

export interface NewUser {
  telegram_id: number;
  username?: string | null;
  first_name?: string | null;
  last_name?: string | null;
}

/**
 * Rejected filter update (e.g. min coefficient above max)
 */
export class FilterValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "FilterValidationError";
    Object.setPrototypeOf(this, FilterValidationError.prototype);
  }
}

/**
 * Storage used by the monitor, the search manager and the chat layer
 */
export interface SlotStore {
  getUser(telegramId: number): Promise<User | undefined>;
  getUserById(id: number): Promise<User | undefined>;
  getUserWithAccounts(userId: number): Promise<UserWithAccounts | undefined>;
  createUser(data: NewUser): Promise<User>;
  getUserAccounts(userId: number): Promise<Account[]>;
  addAccount(userId: number, credential: string, name: string): Promise<Account>;
  deleteAccount(userId: number, accountId: number): Promise<boolean>;
  setAccountActive(accountId: number, active: boolean): Promise<void>;
  markAccountChecked(accountId: number, at: Date): Promise<void>;
  getFilters(userId: number): Promise<FilterCriteria>;
  updateFilters(userId: number, patch: FilterUpdate): Promise<FilterCriteria>;
  addBookedSlot(
    userId: number,
    accountId: number,
    slot: SupplySlot,
    autoBooked: boolean
  ): Promise<BookedSlot>;
  attachSupplyNumber(userId: number, slotId: string, supplyNumber: string): Promise<boolean>;
  getBookedSlots(userId: number, limit?: number): Promise<BookedSlot[]>;
  countAutoBookingsSince(userId: number, since: Date): Promise<number>;
  getActiveUsers(): Promise<UserWithAccounts[]>;
}

export interface StoreOptions {
  supabase?: SupabaseClient | null;
  now?: () => Date;
}

/**
 * In-memory data store
 */
export class Store implements SlotStore {
  private users = new Map<number, User>();
  private usersByTelegramId = new Map<number, User>();
  private accounts = new Map<number, Account>();
  private filters = new Map<number, FilterCriteria>();
  private bookings = new Map<number, BookedSlot>();

  // Local id counters (memory-only mode)
  private nextIds = { user: 1, account: 1, booking: 1 };

  private readonly supabase: SupabaseClient | null;
  private readonly now: () => Date;
  private initialized = false;

  constructor(options: StoreOptions = {}) {
    this.supabase = options.supabase ?? null;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Initialize store from Supabase (no-op in memory-only mode)
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      logger.warn("Store already initialized");
      return;
    }

    if (!this.supabase) {
      logger.info("Store running memory-only (no Supabase configured)");
      this.initialized = true;
      return;
    }

    logger.info("Initializing store from Supabase...");
    const startTime = Date.now();

    await this.loadAll(this.supabase);
    this.initialized = true;

    logger.info(
      {
        users: this.users.size,
        accounts: this.accounts.size,
        bookings: this.bookings.size,
        loadTimeMs: Date.now() - startTime,
      },
      "Store initialized"
    );
  }

  /**
   * Load all data from Supabase
   */
  private async loadAll(supabase: SupabaseClient): Promise<void> {
    const { data: users, error: userError } = await supabase.from("users").select("*");
    if (userError) throw new Error(`Failed to load users: ${userError.message}`);

    this.users.clear();
    this.usersByTelegramId.clear();
    for (const row of users ?? []) {
      this.putUser(UserRowSchema.parse(row));
    }

    const { data: accounts, error: accountError } = await supabase
      .from("accounts")
      .select("*")
      .order("id", { ascending: true });
    if (accountError) throw new Error(`Failed to load accounts: ${accountError.message}`);

    this.accounts.clear();
    for (const row of accounts ?? []) {
      const account = AccountRowSchema.parse(row);
      this.accounts.set(account.id, account);
    }

    const { data: filters, error: filterError } = await supabase.from("user_filters").select("*");
    if (filterError) throw new Error(`Failed to load filters: ${filterError.message}`);

    this.filters.clear();
    for (const row of filters ?? []) {
      const criteria = FilterRowSchema.parse(row);
      this.filters.set(criteria.user_id, criteria);
    }

    const { data: bookings, error: bookingError } = await supabase
      .from("booked_slots")
      .select("*");
    if (bookingError) throw new Error(`Failed to load booked slots: ${bookingError.message}`);

    this.bookings.clear();
    for (const row of bookings ?? []) {
      const booking = BookedSlotRowSchema.parse(row);
      this.bookings.set(booking.id, booking);
    }
  }

  private putUser(user: User): void {
    this.users.set(user.id, user);
    this.usersByTelegramId.set(user.telegram_id, user);
  }

  // ============ User Operations ============

  async getUser(telegramId: number): Promise<User | undefined> {
    return this.usersByTelegramId.get(telegramId);
  }

  async getUserById(id: number): Promise<User | undefined> {
    return this.users.get(id);
  }

  async getUserWithAccounts(userId: number): Promise<UserWithAccounts | undefined> {
    const user = this.users.get(userId);
    if (!user) return undefined;

    return {
      ...user,
      accounts: await this.getUserAccounts(userId),
      filters: await this.getFilters(userId),
    };
  }

  /**
   * Create a user with default filters. Returns the existing user (with
   * refreshed names) when the Telegram id is already known.
   */
  async createUser(data: NewUser): Promise<User> {
    const existing = this.usersByTelegramId.get(data.telegram_id);
    const now = this.now();

    if (existing) {
      const updated: User = {
        ...existing,
        username: data.username ?? existing.username,
        first_name: data.first_name ?? existing.first_name,
        last_name: data.last_name ?? existing.last_name,
        updated_at: now,
      };
      this.putUser(updated);

      if (this.supabase) {
        const supabase = this.supabase;
        await executeWriteThrough("updateUser", () =>
          supabase
            .from("users")
            .update({
              username: updated.username,
              first_name: updated.first_name,
              last_name: updated.last_name,
            })
            .eq("id", updated.id)
        );
      }
      return updated;
    }

    let user: User;

    if (this.supabase) {
      const { data: inserted, error } = await this.supabase
        .from("users")
        .insert({
          telegram_id: data.telegram_id,
          username: data.username ?? null,
          first_name: data.first_name ?? null,
          last_name: data.last_name ?? null,
        })
        .select()
        .single();

      if (error) throw new Error(`Failed to insert user: ${error.message}`);
      user = UserRowSchema.parse(inserted);
    } else {
      user = {
        id: this.nextIds.user++,
        telegram_id: data.telegram_id,
        username: data.username ?? null,
        first_name: data.first_name ?? null,
        last_name: data.last_name ?? null,
        is_active: true,
        created_at: now,
        updated_at: now,
      };
    }

    this.putUser(user);
    await this.createDefaultFilters(user.id);

    logger.info({ userId: user.id, telegramId: user.telegram_id }, "User created");
    return user;
  }

  // ============ Account Operations ============

  /**
   * Accounts of a user in creation order
   */
  async getUserAccounts(userId: number): Promise<Account[]> {
    return Array.from(this.accounts.values())
      .filter((a) => a.user_id === userId)
      .sort((a, b) => a.id - b.id);
  }

  async addAccount(userId: number, credential: string, name: string): Promise<Account> {
    let account: Account;

    if (this.supabase) {
      const { data: inserted, error } = await this.supabase
        .from("accounts")
        .insert({ user_id: userId, credential, name, is_active: true })
        .select()
        .single();

      if (error) throw new Error(`Failed to insert account: ${error.message}`);
      account = AccountRowSchema.parse(inserted);
    } else {
      account = {
        id: this.nextIds.account++,
        user_id: userId,
        credential,
        name,
        is_active: true,
        created_at: this.now(),
        last_check: null,
      };
    }

    this.accounts.set(account.id, account);
    logger.info({ userId, accountId: account.id }, "Account added");
    return account;
  }

  /**
   * Delete an account owned by the user
   */
  async deleteAccount(userId: number, accountId: number): Promise<boolean> {
    const account = this.accounts.get(accountId);
    if (!account || account.user_id !== userId) {
      return false;
    }

    this.accounts.delete(accountId);

    if (this.supabase) {
      const supabase = this.supabase;
      await executeWriteThrough("deleteAccount", () =>
        supabase.from("accounts").delete().eq("id", accountId)
      );
    }

    logger.info({ userId, accountId }, "Account deleted");
    return true;
  }

  async setAccountActive(accountId: number, active: boolean): Promise<void> {
    const account = this.accounts.get(accountId);
    if (!account) return;

    this.accounts.set(accountId, { ...account, is_active: active });

    if (this.supabase) {
      const supabase = this.supabase;
      await executeWriteThrough("setAccountActive", () =>
        supabase.from("accounts").update({ is_active: active }).eq("id", accountId)
      );
    }
  }

  async markAccountChecked(accountId: number, at: Date): Promise<void> {
    const account = this.accounts.get(accountId);
    if (!account) return;

    this.accounts.set(accountId, { ...account, last_check: at });

    if (this.supabase) {
      const supabase = this.supabase;
      await executeWriteThrough("markAccountChecked", () =>
        supabase.from("accounts").update({ last_check: at.toISOString() }).eq("id", accountId)
      );
    }
  }

  // ============ Filter Operations ============

  async getFilters(userId: number): Promise<FilterCriteria> {
    const existing = this.filters.get(userId);
    if (existing) return existing;
    return this.createDefaultFilters(userId);
  }

  /**
   * Apply a partial update. Rejects updates that leave the criteria invalid.
   */
  async updateFilters(userId: number, patch: FilterUpdate): Promise<FilterCriteria> {
    const current = await this.getFilters(userId);
    const updated: FilterCriteria = { ...current, ...patch, user_id: userId, updated_at: this.now() };

    validateFilters(updated);
    this.filters.set(userId, updated);

    if (this.supabase) {
      const supabase = this.supabase;
      await executeWriteThrough("updateFilters", () =>
        supabase.from("user_filters").upsert(toFilterRow(updated), { onConflict: "user_id" })
      );
    }

    return updated;
  }

  private async createDefaultFilters(userId: number): Promise<FilterCriteria> {
    const criteria: FilterCriteria = {
      ...DEFAULT_FILTERS,
      warehouses: [],
      regions: [],
      time_windows: [],
      user_id: userId,
      updated_at: this.now(),
    };
    this.filters.set(userId, criteria);

    if (this.supabase) {
      const supabase = this.supabase;
      await executeWriteThrough("createFilters", () =>
        supabase.from("user_filters").upsert(toFilterRow(criteria), { onConflict: "user_id" })
      );
    }

    return criteria;
  }

  // ============ Booking Operations ============

  /**
   * Record a successful booking
   */
  async addBookedSlot(
    userId: number,
    accountId: number,
    slot: SupplySlot,
    autoBooked: boolean
  ): Promise<BookedSlot> {
    const status: BookedSlotStatus = "booked";
    const fields = {
      user_id: userId,
      account_id: accountId,
      slot_id: slot.id,
      warehouse_id: slot.warehouseId,
      warehouse_name: slot.warehouseName,
      supply_date: slot.date,
      time_slot: formatTimeWindow(slot),
      coefficient: slot.coefficient,
      supply_number: null,
      auto_booked: autoBooked,
      status,
    };

    let booking: BookedSlot;

    if (this.supabase) {
      const { data: inserted, error } = await this.supabase
        .from("booked_slots")
        .insert({ ...fields, booked_at: this.now().toISOString() })
        .select()
        .single();

      if (error) throw new Error(`Failed to insert booked slot: ${error.message}`);
      booking = BookedSlotRowSchema.parse(inserted);
    } else {
      booking = { id: this.nextIds.booking++, ...fields, booked_at: this.now() };
    }

    this.bookings.set(booking.id, booking);
    return booking;
  }

  /**
   * Attach a supply number to the user's latest booking of a slot
   */
  async attachSupplyNumber(userId: number, slotId: string, supplyNumber: string): Promise<boolean> {
    const latest = Array.from(this.bookings.values())
      .filter((b) => b.user_id === userId && b.slot_id === slotId)
      .sort((a, b) => b.id - a.id)[0];

    if (!latest) {
      logger.warn({ userId, slotId }, "No booking found to attach supply number to");
      return false;
    }

    this.bookings.set(latest.id, { ...latest, supply_number: supplyNumber });

    if (this.supabase) {
      const supabase = this.supabase;
      await executeWriteThrough("attachSupplyNumber", () =>
        supabase.from("booked_slots").update({ supply_number: supplyNumber }).eq("id", latest.id)
      );
    }

    return true;
  }

  /**
   * Most recent bookings first
   */
  async getBookedSlots(userId: number, limit = 10): Promise<BookedSlot[]> {
    return Array.from(this.bookings.values())
      .filter((b) => b.user_id === userId)
      .sort((a, b) => b.booked_at.getTime() - a.booked_at.getTime() || b.id - a.id)
      .slice(0, limit);
  }

  async countAutoBookingsSince(userId: number, since: Date): Promise<number> {
    let count = 0;
    for (const b of this.bookings.values()) {
      if (b.user_id === userId && b.auto_booked && b.booked_at >= since) {
        count++;
      }
    }
    return count;
  }

  // ============ Monitor Operations ============

  /**
   * Active users with at least one active account. Only active accounts are joined.
   */
  async getActiveUsers(): Promise<UserWithAccounts[]> {
    const result: UserWithAccounts[] = [];

    for (const user of this.users.values()) {
      if (!user.is_active) continue;

      const accounts = (await this.getUserAccounts(user.id)).filter((a) => a.is_active);
      if (accounts.length === 0) continue;

      result.push({ ...user, accounts, filters: await this.getFilters(user.id) });
    }

    return result.sort((a, b) => a.id - b.id);
  }

  // ============ Stats ============

  getStats(): { users: number; accounts: number; activeAccounts: number; bookings: number; bookedToday: number } {
    const midnight = DateTime.fromJSDate(this.now()).startOf("day").toJSDate();
    let activeAccounts = 0;
    let bookedToday = 0;

    for (const a of this.accounts.values()) {
      if (a.is_active) activeAccounts++;
    }
    for (const b of this.bookings.values()) {
      if (b.booked_at >= midnight) bookedToday++;
    }

    return {
      users: this.users.size,
      accounts: this.accounts.size,
      activeAccounts,
      bookings: this.bookings.size,
      bookedToday,
    };
  }
}

function validateFilters(criteria: FilterCriteria): void {
  if (criteria.min_coefficient < 0) {
    throw new FilterValidationError("Minimum coefficient cannot be negative");
  }
  if (criteria.max_coefficient !== null && criteria.min_coefficient > criteria.max_coefficient) {
    throw new FilterValidationError(
      `Minimum coefficient ${criteria.min_coefficient} is above maximum ${criteria.max_coefficient}`
    );
  }
  if (!Number.isInteger(criteria.auto_booking_limit) || criteria.auto_booking_limit < 0) {
    throw new FilterValidationError("Auto-booking limit must be a non-negative integer");
  }
  for (const hour of [criteria.quiet_hours_start, criteria.quiet_hours_end]) {
    if (hour !== null && (!Number.isInteger(hour) || hour < 0 || hour > 23)) {
      throw new FilterValidationError(`Quiet hour must be between 0 and 23, got ${hour}`);
    }
  }
  for (const window of criteria.time_windows) {
    const valid =
      Number.isInteger(window.start) &&
      Number.isInteger(window.end) &&
      window.start >= 0 &&
      window.start <= 23 &&
      window.end >= 0 &&
      window.end <= 24;
    if (!valid) {
      throw new FilterValidationError(`Invalid time window ${window.start}-${window.end}`);
    }
  }
}

function toFilterRow(criteria: FilterCriteria): Record<string, unknown> {
  return { ...criteria, updated_at: criteria.updated_at.toISOString() };
}
