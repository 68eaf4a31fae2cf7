import { z } from "zod";

/**
 * Response from the booking endpoint
 */
export const BookResponseSchema = z.object({
    success: z.boolean(),
    error: z.string().nullish(),
    bookingId: z.union([z.string(), z.number()]).nullish(),
});

export type BookResponse = z.infer<typeof BookResponseSchema>;

/**
 * Request body for the booking endpoint
 */
export interface BookParams {
    slotId: string;
}

/**
 * Response from the booked-slots list endpoint.
 * Entries are passed through untouched.
 */
export const BookedListResponseSchema = z.object({
    data: z.array(z.record(z.unknown())).default([]),
});

export type BookedListResponse = z.infer<typeof BookedListResponseSchema>;
