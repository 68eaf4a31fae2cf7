import type { DateTime } from "luxon";
import type { FilterCriteria, HourWindow } from "./db/schema";
import type { SupplySlot } from "./sdk/schemas";

/**
 * Subset of the criteria the filter reads
 */
export type SlotCriteria = Pick<
  FilterCriteria,
  | "warehouses"
  | "regions"
  | "min_coefficient"
  | "max_coefficient"
  | "time_windows"
  | "notifications_enabled"
  | "quiet_hours_start"
  | "quiet_hours_end"
>;

export interface MatchOptions {
  /** Explicit booking paths pass false */
  enforceQuietHours?: boolean;
}

/**
 * Start hour of a slot ("09:30" -> 9), or null when the time is unreadable
 */
export function slotStartHour(slot: Pick<SupplySlot, "timeStart">): number | null {
  const match = slot.timeStart.match(/^(\d{1,2}):/);
  if (!match) {
    return null;
  }
  return parseInt(match[1], 10);
}

/**
 * Half-open [start, end). Wraps past midnight when start > end.
 */
export function isHourInWindow(hour: number, window: HourWindow): boolean {
  if (window.start === window.end) {
    return false;
  }
  if (window.start > window.end) {
    return hour >= window.start || hour < window.end;
  }
  return hour >= window.start && hour < window.end;
}

/**
 * True when notifications are on, both bounds are set, and now falls inside them
 */
export function isQuietHour(criteria: SlotCriteria, now: DateTime): boolean {
  if (!criteria.notifications_enabled) return false;
  if (criteria.quiet_hours_start === null || criteria.quiet_hours_end === null) return false;

  return isHourInWindow(now.hour, {
    start: criteria.quiet_hours_start,
    end: criteria.quiet_hours_end,
  });
}

export function formatTimeWindow(slot: Pick<SupplySlot, "timeStart" | "timeEnd">): string {
  return `${slot.timeStart}-${slot.timeEnd}`;
}

/**
 * Check a single slot against the user's criteria
 */
export function matches(
  slot: SupplySlot,
  criteria: SlotCriteria,
  now: DateTime,
  options: MatchOptions = {}
): boolean {
  if (criteria.warehouses.length > 0 && !criteria.warehouses.includes(slot.warehouseId)) {
    return false;
  }

  if (criteria.regions.length > 0) {
    if (!slot.region || !criteria.regions.includes(slot.region)) {
      return false;
    }
  }

  if (slot.coefficient < criteria.min_coefficient) {
    return false;
  }
  if (criteria.max_coefficient !== null && slot.coefficient > criteria.max_coefficient) {
    return false;
  }

  if (criteria.time_windows.length > 0) {
    const hour = slotStartHour(slot);
    if (hour === null || !criteria.time_windows.some((window) => isHourInWindow(hour, window))) {
      return false;
    }
  }

  if ((options.enforceQuietHours ?? true) && isQuietHour(criteria, now)) {
    return false;
  }

  return true;
}

/**
 * Earliest date first, then highest coefficient. Stable.
 */
export function rank(slots: SupplySlot[]): SupplySlot[] {
  return [...slots].sort((a, b) => {
    if (a.date !== b.date) {
      return a.date < b.date ? -1 : 1;
    }
    return b.coefficient - a.coefficient;
  });
}

/**
 * The slot the system would book for these criteria, or null
 */
export function selectBest(
  slots: SupplySlot[],
  criteria: SlotCriteria,
  now: DateTime,
  options: MatchOptions = {}
): SupplySlot | null {
  const ranked = rank(slots.filter((slot) => matches(slot, criteria, now, options)));
  return ranked[0] ?? null;
}
