import { test, expect, describe } from "vitest";
import {
    EndpointResolver,
    authHeaders,
    type EndpointCandidate,
    type StrategyTable,
} from "./endpoints";
import { InvalidCredentialError, RateLimitError, TransportError, UpstreamError } from "./errors";

const A: EndpointCandidate = { scheme: "bearer", method: "GET", path: "/a" };
const B: EndpointCandidate = { scheme: "raw", method: "GET", path: "/a" };
const C: EndpointCandidate = { scheme: "header", method: "GET", path: "/b" };

const strategies: StrategyTable = {
    warehouses: [A, B, C],
    slots: [A, B],
    booking: [A],
    booked: [],
};

describe("authHeaders", () => {
    test("formats each scheme", () => {
        expect(authHeaders("bearer", "test-secret")).toEqual({ Authorization: "Bearer test-secret" });
        expect(authHeaders("raw", "test-secret")).toEqual({ Authorization: "test-secret" });
        expect(authHeaders("header", "test-secret")).toEqual({ "X-Api-Key": "test-secret" });
    });
});

describe("EndpointResolver", () => {
    test("resolves categories independently", async () => {
        const resolver = new EndpointResolver(strategies);

        await resolver.run("warehouses", async (c) => {
            if (c !== C) throw new UpstreamError("not here", 404);
            return "ok";
        });
        await resolver.run("slots", async () => "ok");

        expect(resolver.get("warehouses")).toBe(C);
        expect(resolver.get("slots")).toBe(A);
        expect(resolver.get("booking")).toBeUndefined();
    });

    test("reports a credential rejected by every candidate", async () => {
        const resolver = new EndpointResolver(strategies);

        await expect(
            resolver.run("warehouses", async () => {
                throw new InvalidCredentialError();
            })
        ).rejects.toBeInstanceOf(InvalidCredentialError);
        expect(resolver.get("warehouses")).toBeUndefined();
    });

    test("mixed auth and server failures end in an upstream error with the last status", async () => {
        const resolver = new EndpointResolver(strategies);

        const error = await resolver
            .run("warehouses", async (c) => {
                if (c === A) throw new InvalidCredentialError();
                if (c === B) throw new UpstreamError("gone", 404);
                throw new UpstreamError("down", 503);
            })
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(UpstreamError);
        expect(error).toMatchObject({ status: 503 });
    });

    test("a key refused on every route that exists is a credential error", async () => {
        const resolver = new EndpointResolver(strategies);

        const error = await resolver
            .run("warehouses", async (c) => {
                if (c === C) throw new UpstreamError("gone", 404);
                throw new InvalidCredentialError();
            })
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(InvalidCredentialError);
        expect(resolver.get("warehouses")).toBeUndefined();
    });

    test("missing routes alone stay an upstream error", async () => {
        const resolver = new EndpointResolver(strategies);

        const error = await resolver
            .run("warehouses", async () => {
                throw new UpstreamError("gone", 404);
            })
            .catch((e: unknown) => e);

        expect(error).toBeInstanceOf(UpstreamError);
        expect(error).not.toBeInstanceOf(InvalidCredentialError);
    });

    test("rate limiting and transport errors stop probing", async () => {
        const resolver = new EndpointResolver(strategies);
        const tried: EndpointCandidate[] = [];

        await expect(
            resolver.run("warehouses", async (c) => {
                tried.push(c);
                throw new RateLimitError();
            })
        ).rejects.toBeInstanceOf(RateLimitError);

        await expect(
            resolver.run("slots", async (c) => {
                tried.push(c);
                throw new TransportError("down", "ECONNREFUSED");
            })
        ).rejects.toBeInstanceOf(TransportError);

        expect(tried).toEqual([A, A]);
    });

    test("a failing cached endpoint is replaced, skipping it on the re-probe", async () => {
        const resolver = new EndpointResolver(strategies);
        await resolver.run("warehouses", async () => "ok");
        expect(resolver.get("warehouses")).toBe(A);

        const tried: EndpointCandidate[] = [];
        const result = await resolver.run("warehouses", async (c) => {
            tried.push(c);
            if (c === A) throw new UpstreamError("broken", 500);
            return "recovered";
        });

        expect(result).toBe("recovered");
        expect(tried).toEqual([A, B]);
        expect(resolver.get("warehouses")).toBe(B);
    });

    test("a cached endpoint is kept on non-upstream errors", async () => {
        const resolver = new EndpointResolver(strategies);
        await resolver.run("slots", async () => "ok");

        await expect(
            resolver.run("slots", async () => {
                throw new RateLimitError();
            })
        ).rejects.toBeInstanceOf(RateLimitError);

        expect(resolver.get("slots")).toBe(A);
    });

    test("an empty candidate list is an upstream error", async () => {
        const resolver = new EndpointResolver(strategies);

        await expect(resolver.run("booked", async () => "never")).rejects.toBeInstanceOf(UpstreamError);
    });

    test("invalidate clears one or all categories", async () => {
        const resolver = new EndpointResolver(strategies);
        await resolver.run("warehouses", async () => "ok");
        await resolver.run("slots", async () => "ok");

        resolver.invalidate("slots");
        expect(resolver.get("slots")).toBeUndefined();
        expect(resolver.get("warehouses")).toBe(A);

        resolver.invalidate();
        expect(resolver.get("warehouses")).toBeUndefined();
    });
});
