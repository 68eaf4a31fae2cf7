/**
 * Database schema type definitions
 * These types match the Supabase PostgreSQL tables
 */

/**
 * Hour-of-day interval, half-open [start, end).
 * Wraps past midnight when start > end.
 */
export interface HourWindow {
  start: number; // 0-23
  end: number;   // 0-24
}

/**
 * Telegram user of the bot
 */
export interface User {
  id: number;
  telegram_id: number;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

/**
 * Marketplace credential set owned by a user
 */
export interface Account {
  id: number;
  user_id: number;
  credential: string;
  name: string;
  is_active: boolean;
  created_at: Date;
  last_check: Date | null;
}

/**
 * Per-user slot filter and notification settings
 */
export interface FilterCriteria {
  user_id: number;
  warehouses: string[];          // empty = all
  regions: string[];             // empty = all
  min_coefficient: number;
  max_coefficient: number | null;
  time_windows: HourWindow[];    // empty = all
  auto_booking_enabled: boolean;
  auto_booking_limit: number;    // per day
  notifications_enabled: boolean;
  quiet_hours_start: number | null;
  quiet_hours_end: number | null;
  updated_at: Date;
}

export type FilterUpdate = Partial<Omit<FilterCriteria, "user_id" | "updated_at">>;

export type BookedSlotStatus = "booked" | "cancelled" | "completed";

/**
 * Outcome of a successful booking
 */
export interface BookedSlot {
  id: number;
  user_id: number;
  account_id: number;
  slot_id: string;
  warehouse_id: string;
  warehouse_name: string;
  supply_date: string;   // yyyy-MM-dd
  time_slot: string;     // HH:mm-HH:mm
  coefficient: number;
  supply_number: string | null;
  booked_at: Date;
  auto_booked: boolean;
  status: BookedSlotStatus;
}

/**
 * User with accounts and filters joined (for monitor/executor)
 */
export interface UserWithAccounts extends User {
  accounts: Account[];
  filters: FilterCriteria;
}

export const DEFAULT_FILTERS: Omit<FilterCriteria, "user_id" | "updated_at"> = {
  warehouses: [],
  regions: [],
  min_coefficient: 1.0,
  max_coefficient: null,
  time_windows: [],
  auto_booking_enabled: false,
  auto_booking_limit: 5,
  notifications_enabled: true,
  quiet_hours_start: null,
  quiet_hours_end: null,
};
