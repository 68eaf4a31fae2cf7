import type { RuntimeConfig } from "../config";
import type { User } from "../db/schema";
import type { MarketplaceClientPool } from "../sdk";
import type { BookingExecutor, ContinuousSearchManager, PeriodicMonitor } from "../services";
import type { SlotStore, Store } from "../store";
import type { SendMessageOptions, TelegramUser } from "./api";

/**
 * Everything a command handler can reach
 */
export interface BotServices {
  store: SlotStore & Pick<Store, "getStats">;
  pool: Pick<MarketplaceClientPool, "create" | "forAccount" | "evict" | "reset">;
  executor: Pick<BookingExecutor, "bookBySlotId">;
  finder: Pick<
    ContinuousSearchManager,
    "start" | "stop" | "isSearching" | "getSessionInfo" | "listSessions"
  >;
  monitor: Pick<PeriodicMonitor, "getStatus" | "tick">;
  runtime: RuntimeConfig;
  adminIds: number[];
  maxAccountsPerUser: number;
  horizonDays: number;
}

export interface CommandContext {
  services: BotServices;
  user: User;
  from: TelegramUser;
  chatId: number;
  args: string[];
  reply(text: string, options?: SendMessageOptions): Promise<void>;
}

export interface Command {
  name: string;
  description: string;
  adminOnly?: boolean;
  handle(ctx: CommandContext): Promise<void>;
}
