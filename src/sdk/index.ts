// Main client export
export {
    MarketplaceClient,
    normalizeTime,
    type MarketplaceClientConfig,
    type RequestOptions,
} from "./client";
export { MarketplaceClientPool, type ClientDefaults } from "./pool";

// Error exports
export * from "./errors";

// Endpoint discovery
export * from "./endpoints";

// Schema exports
export * from "./schemas";

// Utility exports
export * from "./utils/schema-utils";
export { RequestGate } from "./utils/request-gate";
