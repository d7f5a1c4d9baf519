/**
 * Normalize a raw form or preset value into a finite number.
 * Anything non-numeric, empty or non-finite becomes the fallback.
 */
export function parseNumeric(raw: unknown, fallback: number = 0): number {
    if (typeof raw === 'number') {
        return Number.isFinite(raw) ? raw : fallback;
    }
    if (typeof raw === 'string' && raw.trim() !== '') {
        const value = Number(raw);
        return Number.isFinite(value) ? value : fallback;
    }
    return fallback;
}
