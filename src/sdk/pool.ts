import { MarketplaceClient, type MarketplaceClientConfig } from "./client";
import type { RuntimeConfig } from "../config";
import type { Account } from "../db/schema";
import { logger } from "../logger";

export type ClientDefaults = Omit<MarketplaceClientConfig, "credential" | "runtime">;

/**
 * One client per account, so endpoint discovery and degraded mode are
 * remembered per credential. reset() drops every client; clients built
 * afterwards read the current runtime settings.
 */
export class MarketplaceClientPool {
    private clients = new Map<number, { credential: string; client: MarketplaceClient }>();

    constructor(
        private readonly runtime: RuntimeConfig,
        private readonly defaults: ClientDefaults = {}
    ) {}

    forAccount(account: Pick<Account, "id" | "credential">): MarketplaceClient {
        const entry = this.clients.get(account.id);
        if (entry && entry.credential === account.credential) {
            return entry.client;
        }

        const client = this.create(account.credential);
        this.clients.set(account.id, { credential: account.credential, client });
        return client;
    }

    /**
     * Client for a credential that is not stored yet (account validation)
     */
    create(credential: string): MarketplaceClient {
        return new MarketplaceClient({
            ...this.defaults,
            credential,
            runtime: this.runtime.snapshot(),
        });
    }

    evict(accountId: number): void {
        this.clients.delete(accountId);
    }

    reset(): void {
        const count = this.clients.size;
        this.clients.clear();
        logger.info({ dropped: count }, "Client pool reset");
    }

    get size(): number {
        return this.clients.size;
    }
}
