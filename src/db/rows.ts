/**
 * Row parsers for the Supabase tables.
 * PostgREST returns timestamps as strings and numeric columns as strings or
 * numbers depending on type; these schemas normalize both.
 */
import { z } from "zod";
import type { Account, BookedSlot, FilterCriteria, User } from "./schema";

const timestamp = z.coerce.date();
const nullableTimestamp = z
  .union([z.string(), z.date()])
  .nullish()
  .transform((val) => (val ? new Date(val) : null));

export const UserRowSchema = z.object({
  id: z.number(),
  telegram_id: z.coerce.number(),
  username: z.string().nullable(),
  first_name: z.string().nullable(),
  last_name: z.string().nullable(),
  is_active: z.boolean().default(true),
  created_at: timestamp,
  updated_at: timestamp,
}) satisfies z.ZodType<User, z.ZodTypeDef, unknown>;

export const AccountRowSchema = z.object({
  id: z.number(),
  user_id: z.number(),
  credential: z.string(),
  name: z.string(),
  is_active: z.boolean().default(true),
  created_at: timestamp,
  last_check: nullableTimestamp,
}) satisfies z.ZodType<Account, z.ZodTypeDef, unknown>;

export const FilterRowSchema = z.object({
  user_id: z.number(),
  warehouses: z.array(z.string()).nullish().transform((val) => val ?? []),
  regions: z.array(z.string()).nullish().transform((val) => val ?? []),
  min_coefficient: z.coerce.number(),
  max_coefficient: z.coerce.number().nullable(),
  time_windows: z
    .array(z.object({ start: z.number(), end: z.number() }))
    .nullish()
    .transform((val) => val ?? []),
  auto_booking_enabled: z.boolean(),
  auto_booking_limit: z.number(),
  notifications_enabled: z.boolean(),
  quiet_hours_start: z.number().nullable(),
  quiet_hours_end: z.number().nullable(),
  updated_at: timestamp,
}) satisfies z.ZodType<FilterCriteria, z.ZodTypeDef, unknown>;

export const BookedSlotRowSchema = z.object({
  id: z.number(),
  user_id: z.number(),
  account_id: z.number(),
  slot_id: z.string(),
  warehouse_id: z.string(),
  warehouse_name: z.string(),
  supply_date: z.string(),
  time_slot: z.string(),
  coefficient: z.coerce.number(),
  supply_number: z.string().nullable(),
  booked_at: timestamp,
  auto_booked: z.boolean(),
  status: z.enum(["booked", "cancelled", "completed"]),
}) satisfies z.ZodType<BookedSlot, z.ZodTypeDef, unknown>;
