/**
 * Demo dataset
 *
 * Served when the client runs degraded (forced demo mode, or fallback after
 * the upstream became unreachable). Output depends only on the reference date,
 * so consecutive polls on the same day see the same slot ids.
 */
import { readFileSync } from "fs";
import { DateTime } from "luxon";
import { z } from "zod";
import type { SupplySlot, Warehouse } from "../schemas";

const DemoWarehouseSchema = z.object({
    id: z.string(),
    name: z.string(),
    region: z.string(),
    address: z.string().nullable().default(null),
});

const WINDOW_STARTS = ["08:00", "10:00", "12:00", "14:00", "16:00", "18:00"];
const WINDOW_LENGTH_HOURS = 2;
const MAX_SLOTS_PER_WAREHOUSE_DAY = 2;

let cachedWarehouses: Warehouse[] | null = null;

export function getDemoWarehouses(): Warehouse[] {
    if (!cachedWarehouses) {
        const raw: unknown = JSON.parse(
            readFileSync(new URL("./warehouses.json", import.meta.url), "utf8")
        );
        cachedWarehouses = z
            .array(DemoWarehouseSchema)
            .parse(raw)
            .map((w) => ({ ...w, isActive: true }));
    }
    return cachedWarehouses.map((w) => ({ ...w }));
}

/**
 * Slots for every warehouse over [from, from + horizonDays]
 */
export function getDemoSlots(from: DateTime, horizonDays: number): SupplySlot[] {
    const warehouses = getDemoWarehouses();
    const slots: SupplySlot[] = [];

    for (let offset = 0; offset <= horizonDays; offset++) {
        const date = from.plus({ days: offset }).toFormat("yyyy-MM-dd");

        for (const warehouse of warehouses) {
            const random = mulberry32(hashSeed(`${warehouse.id}:${date}`));
            const count = Math.floor(random() * (MAX_SLOTS_PER_WAREHOUSE_DAY + 1));
            const used = new Set<string>();

            for (let i = 0; i < count; i++) {
                const timeStart = WINDOW_STARTS[Math.floor(random() * WINDOW_STARTS.length)];
                if (used.has(timeStart)) continue;
                used.add(timeStart);

                const startHour = Number(timeStart.slice(0, 2));
                const timeEnd = `${String(startHour + WINDOW_LENGTH_HOURS).padStart(2, "0")}:00`;

                slots.push({
                    id: `demo-${warehouse.id}-${date}-${timeStart.replace(":", "")}`,
                    warehouseId: warehouse.id,
                    warehouseName: warehouse.name,
                    date,
                    timeStart,
                    timeEnd,
                    coefficient: Math.round((0.5 + random() * 2) * 10) / 10,
                    isAvailable: true,
                    region: warehouse.region,
                });
            }
        }
    }

    return slots;
}

/**
 * 32-bit string hash (FNV-1a)
 */
function hashSeed(input: string): number {
    let hash = 0x811c9dc5;
    for (let i = 0; i < input.length; i++) {
        hash ^= input.charCodeAt(i);
        hash = Math.imul(hash, 0x01000193);
    }
    return hash >>> 0;
}

/**
 * Small seeded PRNG returning floats in [0, 1)
 */
function mulberry32(seed: number): () => number {
    let state = seed;
    return () => {
        state = (state + 0x6d2b79f5) >>> 0;
        let t = state;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}
