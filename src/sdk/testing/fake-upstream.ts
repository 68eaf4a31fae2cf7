/**
 * In-process marketplace API for tests.
 *
 * Plugged into MarketplaceClient through its axios `adapter` option. Routes are
 * keyed by "METHOD path"; every request is recorded with its base URL and the
 * auth scheme it used.
 */
import {
    AxiosError,
    CanceledError,
    type AxiosAdapter,
    type AxiosResponse,
    type InternalAxiosRequestConfig,
} from "axios";
import type { AuthScheme } from "../endpoints";

export interface RecordedRequest {
    baseURL: string;
    method: string;
    path: string;
    scheme: AuthScheme | null;
    params: Record<string, unknown>;
    body: unknown;
}

export interface FakeReply {
    status: number;
    data?: unknown;
}

export type RouteHandler = (request: RecordedRequest) => FakeReply | Promise<FakeReply>;

export class FakeUpstream {
    readonly requests: RecordedRequest[] = [];
    private routes = new Map<string, RouteHandler>();
    private unreachable = new Set<string>();
    private inFlight = 0;
    maxInFlight = 0;

    /**
     * Register a handler. Unregistered routes answer 404.
     */
    on(method: "GET" | "POST", path: string, handler: RouteHandler | FakeReply): this {
        this.routes.set(`${method} ${path}`, typeof handler === "function" ? handler : () => handler);
        return this;
    }

    /**
     * Requests to this base URL fail with ECONNREFUSED
     */
    failTransport(baseURL: string): this {
        this.unreachable.add(baseURL);
        return this;
    }

    restoreTransport(baseURL: string): this {
        this.unreachable.delete(baseURL);
        return this;
    }

    readonly adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
        const request: RecordedRequest = {
            baseURL: config.baseURL ?? "",
            method: (config.method ?? "get").toUpperCase(),
            path: config.url ?? "",
            scheme: detectScheme(config),
            params: isRecord(config.params) ? config.params : {},
            body: typeof config.data === "string" ? JSON.parse(config.data) : config.data,
        };
        this.requests.push(request);

        if (this.unreachable.has(request.baseURL)) {
            throw new AxiosError("connect ECONNREFUSED", "ECONNREFUSED", config);
        }

        const handler = this.routes.get(`${request.method} ${request.path}`);

        this.inFlight++;
        this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
        try {
            const reply = await withAbort(
                Promise.resolve(handler ? handler(request) : { status: 404, data: { error: "not found" } }),
                config
            );

            return {
                data: reply.data ?? null,
                status: reply.status,
                statusText: String(reply.status),
                headers: {},
                config,
                request: {},
            };
        } finally {
            this.inFlight--;
        }
    };

    /**
     * Requests whose path matches, in order
     */
    requestsTo(path: string): RecordedRequest[] {
        return this.requests.filter((r) => r.path === path);
    }
}

function detectScheme(config: InternalAxiosRequestConfig): AuthScheme | null {
    const authorization = config.headers.get("Authorization");
    if (typeof authorization === "string") {
        return authorization.startsWith("Bearer ") ? "bearer" : "raw";
    }
    return config.headers.has("X-Api-Key") ? "header" : null;
}

function withAbort<T>(promise: Promise<T>, config: InternalAxiosRequestConfig): Promise<T> {
    const signal = config.signal;
    if (!signal) return promise;
    if (signal.aborted) return Promise.reject(new CanceledError("canceled"));

    return new Promise<T>((resolve, reject) => {
        signal.addEventListener?.("abort", () => reject(new CanceledError("canceled")));
        promise.then(resolve, reject);
    });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Resolve after ms; used by handlers that simulate slow responses
 */
export function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}
