import {
    BookResponseSchema,
    BookedListResponseSchema,
    SupplySlotsResponseSchema,
    WarehousesResponseSchema,
} from "./schemas";
import type {
    BookParams,
    BookResponse,
    RawSupplySlot,
    SupplySlot,
    SupplySlotsParams,
    Warehouse,
} from "./schemas";
import { parseWithUnknownFieldDetection } from "./utils/schema-utils";
import { RequestGate } from "./utils/request-gate";
import {
    BookingError,
    InvalidCredentialError,
    MarketplaceAPIError,
    RateLimitError,
    TransportError,
    UpstreamError,
    type BookingFailureReason,
} from "./errors";
import {
    DEFAULT_STRATEGIES,
    EndpointResolver,
    authHeaders,
    type EndpointCandidate,
    type OperationCategory,
    type StrategyTable,
} from "./endpoints";
import { getDemoSlots, getDemoWarehouses } from "./demo";
import type { RuntimeSettings } from "../config";
import { logger, errorMessage } from "../logger";
import axios, {
    type AxiosAdapter,
    type AxiosInstance,
    type AxiosRequestConfig,
    type AxiosResponse,
} from "axios";
import { HttpsProxyAgent } from "https-proxy-agent";
import { DateTime } from "luxon";
import { z } from "zod";

const DEFAULT_API_BASE = "https://supplies-api.wildberries.ru";
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_HORIZON_DAYS = 14;
const DEFAULT_DEMO_SUCCESS_RATE = 0.8;
const DEFAULT_MAX_CONCURRENT_REQUESTS = 2;

// Statuses the booking endpoint uses for a slot someone else got first
const SLOT_TAKEN_STATUSES = new Set([409, 410, 412]);
// Statuses for an unknown or malformed slot id
const SLOT_INVALID_STATUSES = new Set([400, 404, 422]);
const ROUTE_MISSING_STATUSES = new Set([404, 405]);

export interface MarketplaceClientConfig {
    credential: string;
    baseUrl?: string;
    backupUrl?: string;
    timeoutMs?: number;
    proxyUrl?: string;
    debug?: boolean;
    /** Snapshot of the runtime settings, read once at construction */
    runtime?: Readonly<RuntimeSettings>;
    strategies?: StrategyTable;
    horizonDays?: number;
    demoBookingSuccessRate?: number;
    maxConcurrentRequests?: number;
    timezone?: string;
    random?: () => number;
    now?: () => DateTime;
    /** Custom axios adapter (an in-process upstream in tests) */
    adapter?: AxiosAdapter;
}

export interface RequestOptions {
    signal?: AbortSignal;
}

/**
 * Type-safe marketplace supply API client using Axios
 *
 * Endpoints and auth schemes are discovered at runtime and cached per
 * operation category. Transport failures are retried once against the
 * backup base URL. When the runtime settings allow it, an unreachable
 * upstream switches the client to the demo dataset for the rest of its life.
 */
export class MarketplaceClient {
    private readonly credential: string;
    private readonly baseUrls: string[];
    private readonly timeoutMs: number;
    private readonly proxyUrl?: string;
    private readonly debug: boolean;
    private readonly allowDemoFallback: boolean;
    private readonly horizonDays: number;
    private readonly demoBookingSuccessRate: number;
    private readonly timezone: string;
    private readonly random: () => number;
    private readonly now: () => DateTime;
    private readonly adapter?: AxiosAdapter;
    private readonly resolver: EndpointResolver;
    private readonly gate: RequestGate;
    private readonly axiosInstances: AxiosInstance[];
    private degraded: boolean;

    constructor(config: MarketplaceClientConfig) {
        const runtime = config.runtime ?? {
            forceDemo: false,
            allowDemoFallback: false,
            useBackupUrl: false,
        };

        this.credential = config.credential;
        this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.proxyUrl = config.proxyUrl;
        this.debug = config.debug ?? false;
        this.allowDemoFallback = runtime.allowDemoFallback;
        this.degraded = runtime.forceDemo;
        this.horizonDays = config.horizonDays ?? DEFAULT_HORIZON_DAYS;
        this.demoBookingSuccessRate = config.demoBookingSuccessRate ?? DEFAULT_DEMO_SUCCESS_RATE;
        this.timezone = config.timezone ?? "Europe/Moscow";
        this.random = config.random ?? Math.random;
        this.now = config.now ?? (() => DateTime.now().setZone(this.timezone));
        this.adapter = config.adapter;
        this.resolver = new EndpointResolver(config.strategies ?? DEFAULT_STRATEGIES);
        this.gate = new RequestGate(config.maxConcurrentRequests ?? DEFAULT_MAX_CONCURRENT_REQUESTS);

        const primary = config.baseUrl ?? DEFAULT_API_BASE;
        const urls = config.backupUrl ? [primary, config.backupUrl] : [primary];
        this.baseUrls = runtime.useBackupUrl ? [...urls].reverse() : urls;
        this.axiosInstances = this.baseUrls.map((baseURL) => this.createAxiosInstance(baseURL));
    }

    /**
     * Create axios instance with proxy if configured
     */
    private createAxiosInstance(baseURL: string): AxiosInstance {
        const config: AxiosRequestConfig = {
            baseURL,
            timeout: this.timeoutMs,
            // Don't throw on non-2xx status codes - we handle them manually
            validateStatus: () => true,
        };

        if (this.adapter) {
            config.adapter = this.adapter;
        }

        if (this.proxyUrl) {
            const agent = new HttpsProxyAgent(this.proxyUrl);
            config.httpsAgent = agent;
            config.httpAgent = agent;
        }

        return axios.create(config);
    }

    /**
     * True when serving demo data instead of the real API
     */
    isDegraded(): boolean {
        return this.degraded;
    }

    /**
     * Endpoint currently cached for a category (diagnostics)
     */
    getResolvedEndpoint(category: OperationCategory): EndpointCandidate | undefined {
        return this.resolver.get(category);
    }

    // ============ Transport ============

    /**
     * Map an HTTP status to the error taxonomy
     */
    private handleResponse(status: number, data: unknown, errorMessage: string): unknown {
        if (status >= 200 && status < 300) {
            return data;
        }

        // Convert data to string for raw body logging
        const rawBody = typeof data === "string" ? data : JSON.stringify(data);

        if (status === 401) {
            throw new InvalidCredentialError(`${errorMessage}: invalid credential`, rawBody);
        }
        if (status === 429) {
            throw new RateLimitError(`${errorMessage}: rate limit exceeded`, rawBody);
        }

        throw new UpstreamError(`${errorMessage}: ${status} ${rawBody ?? ""}`.trim(), status, rawBody);
    }

    private async send(
        instance: AxiosInstance,
        candidate: EndpointCandidate,
        config: { params?: Record<string, string>; data?: unknown; signal?: AbortSignal }
    ): Promise<unknown> {
        let response: AxiosResponse<unknown>;

        try {
            response = await instance.request<unknown>({
                method: candidate.method,
                url: candidate.path,
                headers: {
                    Accept: "application/json",
                    "Content-Type": "application/json",
                    ...authHeaders(candidate.scheme, this.credential),
                },
                params: config.params,
                data: config.data,
                signal: config.signal,
            });
        } catch (error) {
            // Cancellation is not a transport failure
            if (axios.isCancel(error)) throw error;

            const code = axios.isAxiosError(error) ? error.code : undefined;
            throw new TransportError(`Request failed: ${errorMessage(error)}`, code);
        }

        return this.handleResponse(
            response.status,
            response.data,
            `${candidate.method} ${candidate.path} failed`
        );
    }

    /**
     * Send a request, retrying once against the backup base URL on transport failure
     */
    private async request(
        candidate: EndpointCandidate,
        config: { params?: Record<string, string>; data?: unknown; signal?: AbortSignal } = {}
    ): Promise<unknown> {
        return this.gate.run(async () => {
            const [primary, backup] = this.axiosInstances;

            try {
                return await this.send(primary, candidate, config);
            } catch (error) {
                if (!(error instanceof TransportError) || !backup) throw error;

                logger.warn(
                    { path: candidate.path, primary: this.baseUrls[0], backup: this.baseUrls[1], error: error.message },
                    "Primary base URL unreachable - retrying against backup"
                );
                return this.send(backup, candidate, config);
            }
        });
    }

    /**
     * Validate a body; a shape mismatch is an upstream error so the resolver
     * moves on to the next candidate
     */
    private parse<T extends z.ZodTypeAny>(schema: T, data: unknown, context: string): z.infer<T> {
        try {
            return this.debug
                ? parseWithUnknownFieldDetection(schema, data, context)
                : schema.parse(data);
        } catch (error) {
            if (error instanceof z.ZodError) {
                const rawBody = typeof data === "string" ? data : JSON.stringify(data);
                throw new UpstreamError(
                    `Malformed ${context} response: ${error.issues[0]?.message ?? "invalid shape"}`,
                    200,
                    rawBody?.slice(0, 500)
                );
            }
            throw error;
        }
    }

    /**
     * Run a real operation; on an unreachable upstream switch to demo data if allowed
     */
    private async withFallback<T>(
        operation: string,
        real: () => Promise<T>,
        demo: () => T
    ): Promise<T> {
        if (this.degraded) {
            return demo();
        }

        try {
            return await real();
        } catch (error) {
            const unreachable = error instanceof TransportError || error instanceof UpstreamError;
            if (!unreachable || !this.allowDemoFallback) throw error;

            this.degraded = true;
            logger.warn(
                { operation, error: error.message },
                "Upstream unavailable - switching client to demo data"
            );
            return demo();
        }
    }

    // ============ Operations ============

    /**
     * Check the credential against the warehouses endpoint.
     * False only when every candidate rejected the credential.
     */
    async validateCredential(): Promise<boolean> {
        try {
            await this.listWarehouses();
            return true;
        } catch (error) {
            if (error instanceof InvalidCredentialError) {
                return false;
            }
            throw error;
        }
    }

    /**
     * All warehouses visible to the credential
     */
    async listWarehouses(options: RequestOptions = {}): Promise<Warehouse[]> {
        return this.withFallback(
            "listWarehouses",
            () =>
                this.resolver.run("warehouses", async (candidate) => {
                    const data = await this.request(candidate, { signal: options.signal });
                    const parsed = this.parse(WarehousesResponseSchema, data, "warehouses");
                    return parsed.data.map((w) => ({
                        id: w.id,
                        name: w.name,
                        region: w.region ?? "",
                        address: w.address ?? null,
                        isActive: w.isActive,
                    }));
                }),
            () => getDemoWarehouses()
        );
    }

    /**
     * Available slots within the next horizonDays
     */
    async listSupplySlots(
        horizonDays: number = this.horizonDays,
        options: RequestOptions = {}
    ): Promise<SupplySlot[]> {
        const today = this.now().startOf("day");
        const params: SupplySlotsParams = {
            dateFrom: today.toFormat("yyyy-MM-dd"),
            dateTo: today.plus({ days: horizonDays }).toFormat("yyyy-MM-dd"),
        };

        const slots = await this.withFallback(
            "listSupplySlots",
            () =>
                this.resolver.run("slots", async (candidate) => {
                    const data = await this.request(candidate, {
                        params: { dateFrom: params.dateFrom, dateTo: params.dateTo },
                        signal: options.signal,
                    });
                    const parsed = this.parse(SupplySlotsResponseSchema, data, "slots");
                    return parsed.data.map(toSupplySlot);
                }),
            () => getDemoSlots(today, horizonDays)
        );

        return slots.filter(
            (slot) => slot.isAvailable && slot.date >= params.dateFrom && slot.date <= params.dateTo
        );
    }

    /**
     * Book a slot. Resolves to true or throws BookingError - never returns false.
     */
    async book(slotId: string): Promise<true> {
        if (this.degraded) {
            return this.simulateBooking(slotId);
        }

        const body: BookParams = { slotId };
        let response: BookResponse;

        try {
            response = await this.resolver.run("booking", async (candidate) => {
                const probing = this.resolver.get("booking") === undefined;
                try {
                    const data = await this.request(candidate, { data: body });
                    return this.parse(BookResponseSchema, data, "booking");
                } catch (error) {
                    // Only a rejected scheme or a missing route moves on to the next candidate
                    if (error instanceof InvalidCredentialError) throw error;
                    if (probing && error instanceof UpstreamError && ROUTE_MISSING_STATUSES.has(error.status)) {
                        throw error;
                    }
                    throw toBookingError(error);
                }
            });
        } catch (error) {
            throw toBookingError(error);
        }

        if (!response.success) {
            const reason = response.error ?? "Unknown error";
            throw new BookingError(`Failed to book slot: ${reason}`, classifyRejection(reason));
        }

        logger.info({ slotId, bookingId: response.bookingId }, "Slot booked");
        return true;
    }

    /**
     * Bookings the upstream has on record for this credential
     */
    async listBookedSlots(options: RequestOptions = {}): Promise<Record<string, unknown>[]> {
        return this.withFallback(
            "listBookedSlots",
            () =>
                this.resolver.run("booked", async (candidate) => {
                    const data = await this.request(candidate, { signal: options.signal });
                    return this.parse(BookedListResponseSchema, data, "booked").data;
                }),
            () => []
        );
    }

    private simulateBooking(slotId: string): true {
        if (this.random() < this.demoBookingSuccessRate) {
            logger.info({ slotId }, "[DEMO] Slot booked");
            return true;
        }
        logger.info({ slotId }, "[DEMO] Simulated booking failure");
        throw new BookingError("Slot is no longer available (demo mode)", "taken");
    }
}

/**
 * Convert a raw API slot to the internal shape
 */
function toSupplySlot(raw: RawSupplySlot): SupplySlot {
    const date = DateTime.fromISO(raw.date, { setZone: true });
    if (!date.isValid) {
        throw new UpstreamError(`Malformed slot date: ${raw.date}`, 200, JSON.stringify(raw));
    }

    return {
        id: raw.id,
        warehouseId: raw.warehouseId,
        warehouseName: raw.warehouseName,
        date: date.toFormat("yyyy-MM-dd"),
        timeStart: normalizeTime(raw.timeStart),
        timeEnd: normalizeTime(raw.timeEnd),
        coefficient: raw.coefficient,
        isAvailable: raw.isAvailable,
        region: raw.region ?? null,
    };
}

/**
 * "9:00", "09:00", "09:00:00" -> "09:00"
 */
export function normalizeTime(time: string): string {
    const match = time.match(/^(\d{1,2}):(\d{2})/);
    if (!match) return time;
    return `${match[1].padStart(2, "0")}:${match[2]}`;
}

function classifyRejection(message: string): BookingFailureReason {
    return /taken|occupied|unavailable|not available|занят/i.test(message) ? "taken" : "rejected";
}

/**
 * Every failed booking path surfaces as a BookingError
 */
function toBookingError(error: unknown): unknown {
    if (error instanceof BookingError) return error;
    if (error instanceof InvalidCredentialError) {
        return new BookingError("Credential rejected by the marketplace", "unauthorized", 401, error.rawBody);
    }
    if (error instanceof RateLimitError) {
        return new BookingError("Too many requests - try again later", "rate_limited", 429, error.rawBody);
    }
    if (error instanceof TransportError) {
        return new BookingError(`Booking request failed: ${error.message}`, "transport");
    }
    if (error instanceof UpstreamError && SLOT_TAKEN_STATUSES.has(error.status)) {
        return new BookingError("Slot is no longer available", "taken", error.status, error.rawBody);
    }
    if (error instanceof UpstreamError) {
        const reason: BookingFailureReason = SLOT_INVALID_STATUSES.has(error.status) ? "invalid" : "upstream";
        return new BookingError(`Booking failed: ${error.message}`, reason, error.status, error.rawBody);
    }
    if (error instanceof MarketplaceAPIError) {
        return new BookingError(`Booking failed: ${error.message}`, "upstream", error.status, error.rawBody);
    }
    return error;
}
