export class MarketplaceAPIError extends Error {
    public readonly status: number;
    public readonly rawBody?: string;  // Full response body for logging

    constructor(message: string, status: number, rawBody?: string) {
        super(message);
        this.name = "MarketplaceAPIError";
        this.status = status;
        this.rawBody = rawBody;

        // Ensure proper prototype chain for instanceOf checks
        Object.setPrototypeOf(this, MarketplaceAPIError.prototype);
    }
}

/**
 * HTTP 401 - the credential was rejected. Never retried, never falls back.
 */
export class InvalidCredentialError extends MarketplaceAPIError {
    constructor(message = "Invalid API key", rawBody?: string) {
        super(message, 401, rawBody);
        this.name = "InvalidCredentialError";
        Object.setPrototypeOf(this, InvalidCredentialError.prototype);
    }
}

/**
 * HTTP 429 - back off this account for the rest of the tick
 */
export class RateLimitError extends MarketplaceAPIError {
    constructor(message = "Rate limit exceeded", rawBody?: string) {
        super(message, 429, rawBody);
        this.name = "RateLimitError";
        Object.setPrototypeOf(this, RateLimitError.prototype);
    }
}

/**
 * Any other status >= 400, or a body that does not match the expected shape
 */
export class UpstreamError extends MarketplaceAPIError {
    constructor(message: string, status: number, rawBody?: string) {
        super(message, status, rawBody);
        this.name = "UpstreamError";
        Object.setPrototypeOf(this, UpstreamError.prototype);
    }
}

/**
 * No response at all: connection refused, DNS failure, timeout
 */
export class TransportError extends MarketplaceAPIError {
    public readonly code?: string;

    constructor(message: string, code?: string) {
        super(message, 0);
        this.name = "TransportError";
        this.code = code;
        Object.setPrototypeOf(this, TransportError.prototype);
    }
}

export type BookingFailureReason =
    | "taken"
    | "invalid"
    | "unauthorized"
    | "rate_limited"
    | "transport"
    | "upstream"
    | "rejected";

/**
 * Booking-specific rejection. Always surfaced to the requesting user.
 */
export class BookingError extends MarketplaceAPIError {
    public readonly reason: BookingFailureReason;

    constructor(message: string, reason: BookingFailureReason, status = 0, rawBody?: string) {
        super(message, status, rawBody);
        this.name = "BookingError";
        this.reason = reason;
        Object.setPrototypeOf(this, BookingError.prototype);
    }
}
