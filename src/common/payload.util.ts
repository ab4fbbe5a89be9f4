// Helpers for reading untyped JSON from upstream APIs.

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function objectsIn(value: unknown): JsonObject[] {
    return Array.isArray(value) ? value.filter(isObject) : [];
}

/**
 * Numbers arrive as numbers, numeric strings, or money objects shaped like
 * `{ amount: "12.34", currency_code: "USD" }`.
 */
export function toNumber(value: unknown): number | undefined {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : undefined;
    }
    if (typeof value === 'string' && value.trim() !== '') {
        const parsed = Number(value);
        return Number.isFinite(parsed) ? parsed : undefined;
    }
    if (isObject(value) && 'amount' in value) {
        return toNumber(value.amount);
    }
    return undefined;
}

export function readNumber(obj: JsonObject | undefined, key: string): number | undefined {
    return obj ? toNumber(obj[key]) : undefined;
}

/** Like readNumber, but treats zero and negatives as "no data". */
export function readPositive(obj: JsonObject | undefined, key: string): number | undefined {
    const value = readNumber(obj, key);
    return value !== undefined && value > 0 ? value : undefined;
}

export function readString(obj: JsonObject | undefined, key: string): string | undefined {
    const value = obj?.[key];
    if (typeof value !== 'string') return undefined;
    const trimmed = value.trim();
    return trimmed === '' || trimmed.toUpperCase() === 'N/A' ? undefined : trimmed;
}

export function readObject(obj: JsonObject | undefined, key: string): JsonObject | undefined {
    const value = obj?.[key];
    return isObject(value) ? value : undefined;
}

export function firstDefined<T>(...values: (T | undefined)[]): T | undefined {
    return values.find((value) => value !== undefined);
}
