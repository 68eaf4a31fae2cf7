/**
 * Passive Monitor Service
 *
 * Polls slots for every active account of every active user, diffs matching
 * slots against what was seen on the previous tick for that (user, account),
 * auto-books within the daily budget and notifies about the rest.
 *
 * Flow per account:
 * 1. Fetch slots (rate limit -> skip, credential rejected -> disable account)
 * 2. Keep the ones matching the user's filters
 * 3. New = matching minus remembered; remembered = matching
 * 4. Auto-book new slots best coefficient first, up to the remaining budget
 * 5. Notify about new slots that were not booked
 */
import { setTimeout as sleep } from "node:timers/promises";
import { DateTime } from "luxon";
import { InvalidCredentialError, RateLimitError } from "../sdk";
import type { SupplySlot } from "../sdk/schemas";
import type { SlotStore } from "../store";
import type { Account, UserWithAccounts } from "../db/schema";
import { matches, rank } from "../filters";
import { logger, errorMessage } from "../logger";
import type { BookingExecutor } from "./booking-executor";
import type { ClientProvider, Notifier } from "./notifier";

const DEFAULT_INTERVAL_MS = 5_000;

export interface PassiveMonitorConfig {
  store: SlotStore;
  clients: ClientProvider;
  executor: Pick<BookingExecutor, "book" | "countTodayAutoBookings">;
  notifier: Notifier;
  intervalMs?: number;
  horizonDays?: number;
  timezone?: string;
  now?: () => DateTime;
}

export interface MonitorStatus {
  running: boolean;
  activeUsers: number;
  intervalMs: number;
  tickCount: number;
  lastTickAt: Date | null;
}

export class PeriodicMonitor {
  private store: SlotStore;
  private clients: ClientProvider;
  private executor: PassiveMonitorConfig["executor"];
  private notifier: Notifier;
  private intervalMs: number;
  private horizonDays: number;
  private now: () => DateTime;

  // userId -> accountId -> matching slot ids from the previous tick
  private seen = new Map<number, Map<number, Set<string>>>();

  private running = false;
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private tickCount = 0;
  private activeUsers = 0;
  private lastTickAt: Date | null = null;

  constructor(config: PassiveMonitorConfig) {
    this.store = config.store;
    this.clients = config.clients;
    this.executor = config.executor;
    this.notifier = config.notifier;
    this.intervalMs = config.intervalMs ?? DEFAULT_INTERVAL_MS;
    this.horizonDays = config.horizonDays ?? 14;
    const timezone = config.timezone ?? "Europe/Moscow";
    this.now = config.now ?? (() => DateTime.now().setZone(timezone));
  }

  /**
   * Start the polling loop
   */
  start(): void {
    if (this.running) {
      logger.warn("Passive monitor already running");
      return;
    }

    this.running = true;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.runLoop(controller.signal).catch((error) => {
      logger.error({ error: errorMessage(error) }, "Passive monitor loop crashed");
      this.running = false;
    });

    logger.info({ intervalMs: this.intervalMs }, "Passive monitor started");
  }

  /**
   * Stop the loop and wait for the in-flight tick
   */
  async stop(): Promise<void> {
    if (!this.running && !this.loop) return;

    this.running = false;
    this.controller?.abort();
    await this.loop;
    this.loop = null;
    this.controller = null;

    logger.info("Passive monitor stopped");
  }

  getStatus(): MonitorStatus {
    return {
      running: this.running,
      activeUsers: this.activeUsers,
      intervalMs: this.intervalMs,
      tickCount: this.tickCount,
      lastTickAt: this.lastTickAt,
    };
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.tick();
      } catch (error) {
        logger.error({ error: errorMessage(error) }, "Monitor tick failed");
      }

      try {
        await sleep(this.intervalMs, undefined, { signal });
      } catch (error) {
        if (!signal.aborted) throw error;
        break;
      }
    }
  }

  /**
   * One pass over all active users and accounts
   */
  async tick(now: DateTime = this.now()): Promise<void> {
    this.tickCount++;
    this.lastTickAt = now.toJSDate();

    const users = await this.store.getActiveUsers();
    this.activeUsers = users.length;
    this.prune(users);

    for (const user of users) {
      for (const account of user.accounts) {
        if (this.controller?.signal.aborted) return;

        try {
          await this.checkAccount(user, account, now);
        } catch (error) {
          logger.error(
            { userId: user.id, accountId: account.id, error: errorMessage(error) },
            "Account check failed"
          );
        }
      }
    }
  }

  private async checkAccount(user: UserWithAccounts, account: Account, now: DateTime): Promise<void> {
    let slots: SupplySlot[];

    try {
      slots = await this.clients
        .forAccount(account)
        .listSupplySlots(this.horizonDays, { signal: this.controller?.signal });
    } catch (error) {
      if (this.controller?.signal.aborted) return;

      if (error instanceof RateLimitError) {
        logger.warn({ userId: user.id, accountId: account.id }, "Rate limited - skipping account this tick");
        return;
      }

      if (error instanceof InvalidCredentialError) {
        await this.disableAccount(user, account);
        return;
      }

      logger.error(
        { userId: user.id, accountId: account.id, error: errorMessage(error) },
        "Slot fetch failed"
      );
      return;
    }

    await this.store.markAccountChecked(account.id, now.toJSDate());

    const matching = slots.filter((slot) => matches(slot, user.filters, now));
    const previous = this.seen.get(user.id)?.get(account.id) ?? new Set<string>();
    const fresh = matching.filter((slot) => !previous.has(slot.id));
    this.remember(user.id, account.id, new Set(matching.map((slot) => slot.id)));

    if (fresh.length === 0) return;

    logger.info(
      { userId: user.id, accountId: account.id, newSlots: fresh.length, matching: matching.length },
      "New matching slots"
    );
    await this.processNewSlots(user, account, fresh, now);
  }

  private async processNewSlots(
    user: UserWithAccounts,
    account: Account,
    fresh: SupplySlot[],
    now: DateTime
  ): Promise<void> {
    const filters = user.filters;
    let toNotify = fresh;

    if (filters.auto_booking_enabled) {
      const used = await this.executor.countTodayAutoBookings(user.id, now);
      let remaining = filters.auto_booking_limit - used;

      if (remaining > 0) {
        const candidates = [...fresh]
          .sort((a, b) => b.coefficient - a.coefficient)
          .slice(0, remaining);
        const booked = new Set<string>();

        for (const slot of candidates) {
          if (remaining <= 0) break;
          if (await this.executor.book(user, account, slot, true)) {
            booked.add(slot.id);
            remaining--;
          }
        }

        toNotify = fresh.filter((slot) => !booked.has(slot.id));
      } else {
        logger.debug({ userId: user.id, used }, "Daily auto-booking limit reached");
      }
    }

    if (toNotify.length > 0 && filters.notifications_enabled) {
      await this.notifier.notifyNewSlots(user, account.name, rank(toNotify));
    }
  }

  private async disableAccount(user: UserWithAccounts, account: Account): Promise<void> {
    logger.warn({ userId: user.id, accountId: account.id }, "Credential rejected - disabling account");

    await this.store.setAccountActive(account.id, false);
    this.seen.get(user.id)?.delete(account.id);
    this.clients.evict?.(account.id);

    await this.notifier.sendMessage(
      user,
      `🔑 The API key of account "${account.name}" was rejected by the marketplace. ` +
        `The account has been disabled; add it again with a valid key.`
    );
  }

  private remember(userId: number, accountId: number, ids: Set<string>): void {
    let perAccount = this.seen.get(userId);
    if (!perAccount) {
      perAccount = new Map();
      this.seen.set(userId, perAccount);
    }
    perAccount.set(accountId, ids);
  }

  /**
   * Forget users and accounts that are no longer active
   */
  private prune(users: UserWithAccounts[]): void {
    const active = new Map(users.map((u) => [u.id, new Set(u.accounts.map((a) => a.id))]));

    for (const [userId, perAccount] of this.seen) {
      const accountIds = active.get(userId);
      if (!accountIds) {
        this.seen.delete(userId);
        continue;
      }
      for (const accountId of perAccount.keys()) {
        if (!accountIds.has(accountId)) {
          perAccount.delete(accountId);
        }
      }
    }
  }

  /**
   * Remembered slot ids (tests and diagnostics)
   */
  getSeen(userId: number, accountId: number): ReadonlySet<string> | undefined {
    return this.seen.get(userId)?.get(accountId);
  }
}
