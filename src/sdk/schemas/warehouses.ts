import { z } from "zod";

/**
 * A single warehouse as returned by the API
 */
export const RawWarehouseSchema = z.object({
    id: z.union([z.string(), z.number()]).transform(String),
    name: z.string().default(""),
    region: z.string().nullish(),
    address: z.string().nullish(),
    isActive: z.boolean().default(true),
});

export type RawWarehouse = z.infer<typeof RawWarehouseSchema>;

/**
 * Response from the warehouses list endpoint
 */
export const WarehousesResponseSchema = z.object({
    data: z.array(RawWarehouseSchema).default([]),
});

export type WarehousesResponse = z.infer<typeof WarehousesResponseSchema>;

/**
 * Warehouse as used inside the bot
 */
export interface Warehouse {
    id: string;
    name: string;
    region: string;
    address: string | null;
    isActive: boolean;
}
