import { z } from "zod";
import { logger } from "../../logger";

/**
 * Parse data with a schema and log any unknown fields.
 * Helps discover undocumented API fields that should be added to schemas.
 * Nested arrays of objects under `data` are inspected too.
 */
export function parseWithUnknownFieldDetection<T extends z.ZodTypeAny>(
    schema: T,
    data: unknown,
    context?: string
): z.infer<T> {
    const result = schema.parse(data);

    const unknownKeys = findUnknownKeys(schema, data);
    if (unknownKeys.length > 0) {
        logger.warn({ context, unknownKeys }, "Unknown fields detected in upstream response");
    }

    return result;
}

/**
 * List keys present in data but absent from an object schema
 */
export function findUnknownKeys(schema: z.ZodTypeAny, data: unknown, prefix = ""): string[] {
    if (!(schema instanceof z.ZodObject) || !isRecord(data)) {
        return [];
    }

    const shape: z.ZodRawShape = schema.shape;
    const unknown: string[] = [];

    for (const key of Object.keys(data)) {
        const fieldSchema = shape[key];
        if (!fieldSchema) {
            unknown.push(`${prefix}${key}`);
            continue;
        }

        const element = unwrapArrayElement(fieldSchema);
        const value = data[key];
        if (element && Array.isArray(value) && value.length > 0) {
            unknown.push(...findUnknownKeys(element, value[0], `${prefix}${key}[].`));
        }
    }

    return unknown;
}

function unwrapArrayElement(schema: z.ZodTypeAny): z.ZodTypeAny | null {
    let current = schema;
    while (current instanceof z.ZodDefault || current instanceof z.ZodOptional) {
        current = current instanceof z.ZodDefault ? current.removeDefault() : current.unwrap();
    }
    return current instanceof z.ZodArray ? current.element : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}
