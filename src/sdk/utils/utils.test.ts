import { test, expect, describe, vi } from "vitest";
import { z } from "zod";
import { RequestGate } from "./request-gate";
import { findUnknownKeys } from "./schema-utils";

describe("RequestGate", () => {
    test("runs waiters in order once a slot frees up", async () => {
        const gate = new RequestGate(1);
        const order: string[] = [];
        let releaseFirst: () => void = () => {};

        const first = gate.run(
            () =>
                new Promise<void>((resolve) => {
                    order.push("first");
                    releaseFirst = resolve;
                })
        );
        const second = gate.run(async () => {
            order.push("second");
        });
        const third = gate.run(async () => {
            order.push("third");
        });

        await vi.waitFor(() => expect(order).toEqual(["first"]));
        expect(gate.getStatus()).toEqual({ active: 1, waiting: 2, limit: 1 });

        releaseFirst();
        await Promise.all([first, second, third]);

        expect(order).toEqual(["first", "second", "third"]);
        expect(gate.getStatus()).toEqual({ active: 0, waiting: 0, limit: 1 });
    });

    test("frees the slot when a task throws", async () => {
        const gate = new RequestGate(1);

        await expect(
            gate.run(async () => {
                throw new Error("boom");
            })
        ).rejects.toThrow("boom");

        expect(gate.getStatus().active).toBe(0);
    });

    test("rejects a non-positive limit", () => {
        expect(() => new RequestGate(0)).toThrow("Request gate limit must be a positive integer, got 0");
    });
});

describe("findUnknownKeys", () => {
    const schema = z.object({
        data: z.array(z.object({ id: z.string() })).default([]),
    });

    test("reports top-level and nested array fields", () => {
        expect(findUnknownKeys(schema, { data: [{ id: "1", extra: true }], total: 1 })).toEqual([
            "data[].extra",
            "total",
        ]);
    });

    test("ignores non-object input", () => {
        expect(findUnknownKeys(schema, "nope")).toEqual([]);
    });
});
