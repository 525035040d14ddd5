/**
 * Narrowing helpers for untyped JSON (HTTP bodies, the state file).
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Number from a JSON number or numeric string; NaN otherwise.
 */
export function toNumber(value: unknown): number {
    if (typeof value === 'number') return value;
    if (typeof value === 'string' && value.trim() !== '') return Number(value);
    return NaN;
}

export function toStringValue(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    return '';
}

export function toFiniteOrNull(value: unknown): number | null {
    const n = toNumber(value);
    return Number.isFinite(n) ? n : null;
}
