/**
 * Endpoint discovery
 *
 * The upstream API has shipped under several paths and auth schemes. Each
 * operation category gets an ordered list of candidates; the resolver probes
 * them in order and remembers the first one that answers, for the lifetime of
 * the client that owns it.
 */
import { InvalidCredentialError, RateLimitError, UpstreamError } from "./errors";
import { logger } from "../logger";

export type OperationCategory = "warehouses" | "slots" | "booking" | "booked";

/**
 * How the credential is presented to the upstream
 * - bearer: Authorization: Bearer <key>
 * - raw:    Authorization: <key>
 * - header: X-Api-Key: <key>
 */
export type AuthScheme = "bearer" | "raw" | "header";

export interface EndpointCandidate {
    scheme: AuthScheme;
    method: "GET" | "POST";
    path: string;
}

export type StrategyTable = Record<OperationCategory, EndpointCandidate[]>;

export const DEFAULT_STRATEGIES: StrategyTable = {
    warehouses: [
        { scheme: "bearer", method: "GET", path: "/api/v1/warehouses" },
        { scheme: "raw", method: "GET", path: "/api/v1/warehouses" },
        { scheme: "header", method: "GET", path: "/api/v1/warehouses" },
        { scheme: "raw", method: "GET", path: "/api/v3/warehouses" },
    ],
    slots: [
        { scheme: "bearer", method: "GET", path: "/api/v1/supply/slots" },
        { scheme: "raw", method: "GET", path: "/api/v1/supply/slots" },
        { scheme: "header", method: "GET", path: "/api/v1/supply/slots" },
        { scheme: "raw", method: "GET", path: "/api/v1/acceptance/coefficients" },
    ],
    booking: [
        { scheme: "bearer", method: "POST", path: "/api/v1/supply/book" },
        { scheme: "raw", method: "POST", path: "/api/v1/supply/book" },
        { scheme: "header", method: "POST", path: "/api/v1/supply/book" },
    ],
    booked: [
        { scheme: "bearer", method: "GET", path: "/api/v1/supply/booked" },
        { scheme: "raw", method: "GET", path: "/api/v1/supply/booked" },
        { scheme: "header", method: "GET", path: "/api/v1/supply/booked" },
    ],
};

/**
 * Build request headers for an auth scheme
 */
export function authHeaders(scheme: AuthScheme, credential: string): Record<string, string> {
    switch (scheme) {
        case "bearer":
            return { Authorization: `Bearer ${credential}` };
        case "raw":
            return { Authorization: credential };
        case "header":
            return { "X-Api-Key": credential };
    }
}

function describe(candidate: EndpointCandidate): string {
    return `${candidate.method} ${candidate.path} (${candidate.scheme})`;
}

/**
 * Memoizing endpoint resolver
 *
 * Errors that are not about the endpoint itself (rate limiting, transport
 * failures, cancellation) stop probing and propagate unchanged.
 */
export class EndpointResolver {
    private readonly strategies: StrategyTable;
    private readonly resolved = new Map<OperationCategory, EndpointCandidate>();

    constructor(strategies: StrategyTable = DEFAULT_STRATEGIES) {
        this.strategies = strategies;
    }

    /**
     * Run an operation against the working endpoint for a category.
     * A cached endpoint that starts failing with UpstreamError is dropped and
     * the category is probed again once.
     */
    async run<T>(
        category: OperationCategory,
        attempt: (candidate: EndpointCandidate) => Promise<T>
    ): Promise<T> {
        const cached = this.resolved.get(category);
        if (!cached) {
            return this.probe(category, attempt);
        }

        try {
            return await attempt(cached);
        } catch (error) {
            if (!(error instanceof UpstreamError)) throw error;

            logger.warn(
                { category, endpoint: describe(cached), status: error.status },
                "Cached endpoint failed - re-resolving"
            );
            this.resolved.delete(category);
            return this.probe(category, attempt, cached);
        }
    }

    /**
     * Endpoint currently cached for a category
     */
    get(category: OperationCategory): EndpointCandidate | undefined {
        return this.resolved.get(category);
    }

    invalidate(category?: OperationCategory): void {
        if (category) {
            this.resolved.delete(category);
        } else {
            this.resolved.clear();
        }
    }

    private async probe<T>(
        category: OperationCategory,
        attempt: (candidate: EndpointCandidate) => Promise<T>,
        skip?: EndpointCandidate
    ): Promise<T> {
        const candidates = this.strategies[category].filter((c) => c !== skip);
        let authRejections = 0;
        let missingRoutes = 0;
        let lastError: UpstreamError | InvalidCredentialError | null = null;

        for (const candidate of candidates) {
            try {
                const result = await attempt(candidate);
                this.resolved.set(category, candidate);
                logger.info({ category, endpoint: describe(candidate) }, "Resolved working endpoint");
                return result;
            } catch (error) {
                if (error instanceof RateLimitError) throw error;

                if (error instanceof InvalidCredentialError) {
                    authRejections++;
                    lastError = error;
                    continue;
                }

                if (error instanceof UpstreamError) {
                    if (error.status === 404) missingRoutes++;
                    lastError = error;
                    logger.debug(
                        { category, endpoint: describe(candidate), status: error.status },
                        "Endpoint candidate rejected"
                    );
                    continue;
                }

                throw error;
            }
        }

        // A key refused wherever the route exists is a bad key
        if (authRejections > 0 && authRejections + missingRoutes === candidates.length) {
            throw new InvalidCredentialError(
                "Credential rejected by every endpoint",
                lastError?.rawBody
            );
        }

        throw new UpstreamError(
            `No working endpoint for ${category}: ${lastError?.message ?? "no candidates"}`,
            lastError?.status ?? 0,
            lastError?.rawBody
        );
    }
}
