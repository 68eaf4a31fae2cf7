/**
 * Supply Finder
 *
 * Continuous per-user search: retries autoBookBySupplyNumber on an interval
 * until a slot is booked or the user stops the search. At most one session
 * per user; starting a new one stops the old one first.
 */
import { setTimeout as sleep } from "node:timers/promises";
import type { SlotStore } from "../store";
import type { User } from "../db/schema";
import { logger, errorMessage } from "../logger";
import type { BookingExecutor } from "./booking-executor";
import type { Notifier } from "./notifier";

const DEFAULT_SEARCH_INTERVAL_MS = 30_000;
const DEFAULT_PROGRESS_EVERY = 10;
const DEFAULT_FAILURE_WARNING_EVERY = 20;

type SearchOutcome = "completed" | "stopped" | "failed";

interface SearchSession {
  userId: number;
  accountId: number;
  supplyNumber: string;
  startedAt: Date;
  attempts: number;
  failedAttempts: number;
  controller: AbortController;
  task: Promise<SearchOutcome>;
}

export interface SessionInfo {
  supplyNumber: string;
  accountId: number;
  startedAt: Date;
  attempts: number;
}

export interface SupplyFinderConfig {
  store: SlotStore;
  executor: Pick<BookingExecutor, "autoBookBySupplyNumber">;
  notifier: Notifier;
  searchIntervalMs?: number;
  progressEvery?: number;
  failureWarningEvery?: number;
  now?: () => Date;
}

export class ContinuousSearchManager {
  private store: SlotStore;
  private executor: SupplyFinderConfig["executor"];
  private notifier: Notifier;
  private searchIntervalMs: number;
  private progressEvery: number;
  private failureWarningEvery: number;
  private now: () => Date;

  private sessions = new Map<number, SearchSession>();

  constructor(config: SupplyFinderConfig) {
    this.store = config.store;
    this.executor = config.executor;
    this.notifier = config.notifier;
    this.searchIntervalMs = config.searchIntervalMs ?? DEFAULT_SEARCH_INTERVAL_MS;
    this.progressEvery = config.progressEvery ?? DEFAULT_PROGRESS_EVERY;
    this.failureWarningEvery = config.failureWarningEvery ?? DEFAULT_FAILURE_WARNING_EVERY;
    this.now = config.now ?? (() => new Date());
  }

  /**
   * Start searching for a supply on one of the user's accounts
   */
  async start(userId: number, accountId: number, supplyNumber: string): Promise<boolean> {
    if (this.sessions.has(userId)) {
      await this.stop(userId);
    }

    const user = await this.store.getUserWithAccounts(userId);
    const account = user?.accounts.find((a) => a.id === accountId);
    if (!user || !account || !account.is_active) {
      logger.warn({ userId, accountId }, "Search not started - account missing or inactive");
      return false;
    }

    // Another start may have registered a session while the user loaded
    while (this.sessions.has(userId)) {
      await this.stop(userId);
    }

    const session: SearchSession = {
      userId,
      accountId,
      supplyNumber,
      startedAt: this.now(),
      attempts: 0,
      failedAttempts: 0,
      controller: new AbortController(),
      task: Promise.resolve("stopped"),
    };
    this.sessions.set(userId, session);
    session.task = this.run(session, user, account.name);

    logger.info({ userId, accountId, supplyNumber }, "Continuous search started");
    return true;
  }

  /**
   * Stop a user's search and wait for its task to finish
   */
  async stop(userId: number): Promise<boolean> {
    const session = this.sessions.get(userId);
    if (!session) {
      return false;
    }

    session.controller.abort();
    const outcome = await session.task;
    this.removeSession(session);

    logger.info({ userId, supplyNumber: session.supplyNumber, outcome }, "Continuous search stopped");

    // A booking or failure already sent the terminal notification
    if (outcome !== "stopped") {
      return true;
    }

    const user = await this.store.getUserById(userId);
    if (user) {
      const duration = formatDuration(this.now().getTime() - session.startedAt.getTime());
      await this.notifier.sendMessage(
        user,
        `⏹ Search for supply ${session.supplyNumber} stopped.\nDuration: ${duration}, attempts: ${session.attempts}`
      );
    }
    return true;
  }

  /**
   * Stop every session (shutdown)
   */
  async stopAll(): Promise<void> {
    const userIds = Array.from(this.sessions.keys());
    const results = await Promise.allSettled(userIds.map((id) => this.stop(id)));

    results.forEach((result, i) => {
      if (result.status === "rejected") {
        logger.error({ userId: userIds[i], error: errorMessage(result.reason) }, "Failed to stop search");
      }
    });
  }

  isSearching(userId: number): boolean {
    return this.sessions.has(userId);
  }

  getSessionInfo(userId: number): SessionInfo | null {
    const session = this.sessions.get(userId);
    if (!session) return null;

    return {
      supplyNumber: session.supplyNumber,
      accountId: session.accountId,
      startedAt: session.startedAt,
      attempts: session.attempts,
    };
  }

  listSessions(): Array<SessionInfo & { userId: number }> {
    return Array.from(this.sessions.values()).map((s) => ({
      userId: s.userId,
      supplyNumber: s.supplyNumber,
      accountId: s.accountId,
      startedAt: s.startedAt,
      attempts: s.attempts,
    }));
  }

  /**
   * Remove the session only if it is still the current one for its user
   */
  private removeSession(session: SearchSession): void {
    if (this.sessions.get(session.userId) === session) {
      this.sessions.delete(session.userId);
    }
  }

  private async run(session: SearchSession, user: User, accountName: string): Promise<SearchOutcome> {
    const { signal } = session.controller;
    const log = logger.child({ userId: session.userId, supplyNumber: session.supplyNumber });

    try {
      await this.notifier.sendMessage(
        user,
        `🔍 Search started for supply ${session.supplyNumber} (account: ${accountName}).\n` +
          `Checking every ${Math.round(this.searchIntervalMs / 1000)}s. Use /stop_search to cancel.`
      );

      while (!signal.aborted) {
        session.attempts++;
        let booked = false;

        try {
          booked = await this.executor.autoBookBySupplyNumber(
            session.userId,
            session.accountId,
            session.supplyNumber,
            signal
          );
        } catch (error) {
          if (signal.aborted) break;

          session.failedAttempts++;
          log.warn({ attempt: session.attempts, error: errorMessage(error) }, "Search attempt failed");

          if (session.failedAttempts % this.failureWarningEvery === 0) {
            await this.notifier.sendMessage(
              user,
              `⚠️ Search for supply ${session.supplyNumber}: ${session.failedAttempts} failed attempts so far. Last error: ${errorMessage(error)}`
            );
          }
        }

        if (booked) {
          this.removeSession(session);
          log.info({ attempts: session.attempts }, "Continuous search completed");
          await this.notifier.sendMessage(
            user,
            `✅ Supply ${session.supplyNumber} booked after ${session.attempts} attempt(s).`
          );
          return "completed";
        }

        if (session.attempts % this.progressEvery === 0) {
          await this.notifier.sendMessage(
            user,
            `⏳ Still searching for supply ${session.supplyNumber}: ${session.attempts} attempts so far.`
          );
        }

        try {
          await sleep(this.searchIntervalMs, undefined, { signal });
        } catch (error) {
          if (!signal.aborted) throw error;
          break;
        }
      }

      return "stopped";
    } catch (error) {
      this.removeSession(session);
      log.error({ error: errorMessage(error) }, "Continuous search failed");
      await this.notifier.sendMessage(
        user,
        `❌ Search for supply ${session.supplyNumber} failed: ${errorMessage(error)}`
      );
      return "failed";
    }
  }
}

/**
 * 5_400_000 -> "1h 30m"
 */
export function formatDuration(ms: number): string {
  const totalMinutes = Math.max(0, Math.floor(ms / 60_000));
  return `${Math.floor(totalMinutes / 60)}h ${totalMinutes % 60}m`;
}
