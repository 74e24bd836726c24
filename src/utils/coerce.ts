/**
 * postgis-lab - Value coercion
 *
 * pg returns COUNT(*) and NUMERIC columns as strings; dashboard payloads
 * arrive as strings or numbers. These helpers turn both into numbers.
 */

/** Integer value of a count column; anything unparseable is 0 */
export function toInt(value: unknown): number {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? Math.trunc(value) : 0;
    }
    if (typeof value === 'string' || typeof value === 'bigint') {
        const parsed = parseInt(String(value), 10);
        return Number.isNaN(parsed) ? 0 : parsed;
    }
    return 0;
}

/** Float value of a numeric column, or null when absent or unparseable */
export function toFloat(value: unknown): number | null {
    if (typeof value === 'number') {
        return Number.isFinite(value) ? value : null;
    }
    if (typeof value === 'string') {
        const parsed = parseFloat(value);
        return Number.isFinite(parsed) ? parsed : null;
    }
    return null;
}

/**
 * Coordinate from a request body. Missing, unparseable and zero values all
 * fall back to the default, matching `parseFloat(x) || fallback`.
 */
export function coordinateOr(value: unknown, fallback: number): number {
    const parsed = toFloat(value);
    return parsed === null || parsed === 0 ? fallback : parsed;
}

/** Trimmed non-empty string, or the fallback */
export function textOr(value: unknown, fallback: string): string {
    if (typeof value !== 'string') {
        return fallback;
    }
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : fallback;
}
