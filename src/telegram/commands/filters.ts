/**
 * /filters and /set
 */
import { z } from "zod";
import type { FilterCriteria, FilterUpdate, HourWindow } from "../../db/schema";
import { FilterValidationError } from "../../store";
import type { Command, CommandContext } from "../context";

const SET_USAGE = [
  "Usage: /set <field> <value>",
  "",
  "min <number> - minimum coefficient",
  "max <number|off> - maximum coefficient",
  "warehouses <id,id,...|all>",
  "regions <name,name,...|all>",
  "windows <8-12,14-18|all> - slot start hours",
  "autobook <on|off>",
  "limit <number> - auto-bookings per day",
  "notify <on|off>",
  "quiet <23-7|off> - quiet hours",
].join("\n");

const Coefficient = z.coerce.number().min(0).max(100);
const Toggle = z.enum(["on", "off"]).transform((val) => val === "on");
const HourRange = z
  .string()
  .regex(/^\d{1,2}-\d{1,2}$/, "Use the form start-end, e.g. 8-12")
  .transform((val): HourWindow => {
    const [start, end] = val.split("-").map(Number);
    return { start, end };
  });

export type SetResult = { ok: true; patch: FilterUpdate } | { ok: false; error: string };

function list(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Parse "/set <field> <value>" arguments into a filter patch
 */
export function parseSetArgs(args: string[]): SetResult {
  const [field, ...rest] = args;
  const value = rest.join(" ").trim();
  if (!field || !value) {
    return { ok: false, error: SET_USAGE };
  }

  const off = value.toLowerCase() === "off";
  const all = value.toLowerCase() === "all";

  const parse = <S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> | string => {
    const result = schema.safeParse(input);
    return result.success ? result.data : (result.error.issues[0]?.message ?? "Invalid value");
  };

  switch (field.toLowerCase()) {
    case "min": {
      const min = parse(Coefficient, value);
      return typeof min === "string" ? { ok: false, error: min } : { ok: true, patch: { min_coefficient: min } };
    }
    case "max": {
      if (off) return { ok: true, patch: { max_coefficient: null } };
      const max = parse(Coefficient, value);
      return typeof max === "string" ? { ok: false, error: max } : { ok: true, patch: { max_coefficient: max } };
    }
    case "warehouses":
      return { ok: true, patch: { warehouses: all ? [] : list(value) } };
    case "regions":
      return { ok: true, patch: { regions: all ? [] : list(value) } };
    case "windows": {
      if (all) return { ok: true, patch: { time_windows: [] } };
      const windows = parse(z.array(HourRange), list(value));
      return typeof windows === "string"
        ? { ok: false, error: windows }
        : { ok: true, patch: { time_windows: windows } };
    }
    case "autobook": {
      const enabled = parse(Toggle, value.toLowerCase());
      return typeof enabled === "string"
        ? { ok: false, error: "Use on or off" }
        : { ok: true, patch: { auto_booking_enabled: enabled } };
    }
    case "limit": {
      const limit = parse(z.coerce.number().int().min(0).max(100), value);
      return typeof limit === "string"
        ? { ok: false, error: limit }
        : { ok: true, patch: { auto_booking_limit: limit } };
    }
    case "notify": {
      const enabled = parse(Toggle, value.toLowerCase());
      return typeof enabled === "string"
        ? { ok: false, error: "Use on or off" }
        : { ok: true, patch: { notifications_enabled: enabled } };
    }
    case "quiet": {
      if (off) return { ok: true, patch: { quiet_hours_start: null, quiet_hours_end: null } };
      const range = parse(HourRange, value);
      return typeof range === "string"
        ? { ok: false, error: range }
        : { ok: true, patch: { quiet_hours_start: range.start, quiet_hours_end: range.end } };
    }
    default:
      return { ok: false, error: `Unknown field "${field}".\n\n${SET_USAGE}` };
  }
}

export function formatFilters(filters: FilterCriteria): string {
  const onOff = (val: boolean) => (val ? "on" : "off");
  const windows =
    filters.time_windows.length > 0
      ? filters.time_windows.map((w) => `${w.start}-${w.end}`).join(", ")
      : "any";
  const quiet =
    filters.quiet_hours_start !== null && filters.quiet_hours_end !== null
      ? `${filters.quiet_hours_start}-${filters.quiet_hours_end}`
      : "off";

  return [
    "⚙️ Your filters:",
    "",
    `🏭 Warehouses: ${filters.warehouses.length > 0 ? filters.warehouses.join(", ") : "all"}`,
    `🗺 Regions: ${filters.regions.length > 0 ? filters.regions.join(", ") : "all"}`,
    `📊 Coefficient: ${filters.min_coefficient} - ${filters.max_coefficient ?? "any"}`,
    `🕐 Start hours: ${windows}`,
    `🤖 Auto-booking: ${onOff(filters.auto_booking_enabled)} (limit ${filters.auto_booking_limit}/day)`,
    `🔔 Notifications: ${onOff(filters.notifications_enabled)}`,
    `🌙 Quiet hours: ${quiet}`,
  ].join("\n");
}

export const filtersCommand: Command = {
  name: "filters",
  description: "Show your filters",
  async handle(ctx: CommandContext): Promise<void> {
    const filters = await ctx.services.store.getFilters(ctx.user.id);
    await ctx.reply(formatFilters(filters));
  },
};

export const setCommand: Command = {
  name: "set",
  description: "Change a filter",
  async handle(ctx: CommandContext): Promise<void> {
    const result = parseSetArgs(ctx.args);
    if (!result.ok) {
      await ctx.reply(result.error);
      return;
    }

    try {
      const updated = await ctx.services.store.updateFilters(ctx.user.id, result.patch);
      await ctx.reply(`✅ Saved.\n\n${formatFilters(updated)}`);
    } catch (error) {
      if (error instanceof FilterValidationError) {
        await ctx.reply(`❌ ${error.message}`);
        return;
      }
      throw error;
    }
  },
};
