import { z } from "zod";

/**
 * A single supply slot as returned by the API
 */
export const RawSupplySlotSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    warehouseId: z.union([z.string(), z.number()]).transform(String),
    warehouseName: z.string().default(""),
    date: z.string(), // ISO date or datetime
    timeStart: z.string().default(""),
    timeEnd: z.string().default(""),
    coefficient: z.coerce.number().default(1.0),
    isAvailable: z.boolean().default(true),
    region: z.string().nullish(),
});

export type RawSupplySlot = z.infer<typeof RawSupplySlotSchema>;

/**
 * Response from the slots list endpoint
 */
export const SupplySlotsResponseSchema = z.object({
    data: z.array(RawSupplySlotSchema).default([]),
});

export type SupplySlotsResponse = z.infer<typeof SupplySlotsResponseSchema>;

/**
 * Request params for the slots endpoint
 */
export interface SupplySlotsParams {
    dateFrom: string; // yyyy-MM-dd
    dateTo: string;   // yyyy-MM-dd
}

/**
 * One bookable delivery window. Identified by id only within a single fetch.
 */
export interface SupplySlot {
    id: string;
    warehouseId: string;
    warehouseName: string;
    date: string;      // yyyy-MM-dd
    timeStart: string; // HH:mm
    timeEnd: string;   // HH:mm
    coefficient: number;
    isAvailable: boolean;
    region: string | null;
}
