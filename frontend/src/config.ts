/**
 * Configuration for the L-system studio frontend
 *
 * Centralizes limits and defaults. Values come from, in priority order:
 * 1. URL query parameters (?preset=...)
 * 2. Vite environment variables (VITE_*)
 * 3. Built-in defaults
 */

const DEFAULT_MAX_SEQUENCE_LENGTH = 2_000_000;
const DEFAULT_MAX_EXPANSION_WORK = 20_000_000;
const DEFAULT_ANIMATION_TIME_SCALE = 10;

/**
 * Parse a positive number from an env string, falling back when absent or invalid
 */
function positiveNumber(raw: string | undefined, fallback: number): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    return Number.isFinite(value) && value > 0 ? value : fallback;
}

/**
 * Get the preset name from URL query parameter
 */
function getPresetFromUrl(): string | null {
    if (typeof window !== 'undefined') {
        const params = new URLSearchParams(window.location.search);
        return params.get('preset');
    }
    return null;
}

export const config = {
    /** Expansion is refused when the predicted sequence would be longer than this */
    maxSequenceLength: positiveNumber(import.meta.env.VITE_MAX_SEQUENCE_LENGTH, DEFAULT_MAX_SEQUENCE_LENGTH),

    /** Expansion is refused when all rounds together would rewrite more symbols than this */
    maxExpansionWork: positiveNumber(import.meta.env.VITE_MAX_EXPANSION_WORK, DEFAULT_MAX_EXPANSION_WORK),

    /** Milliseconds of clock time per unit of progress at speed 1 */
    animationTimeScale: positiveNumber(import.meta.env.VITE_ANIMATION_TIME_SCALE, DEFAULT_ANIMATION_TIME_SCALE),

    /** Studio canvas size in CSS pixels */
    canvasWidth: 900,
    canvasHeight: 640,

    /** Gallery thumbnail size */
    thumbnailWidth: 280,
    thumbnailHeight: 200,

    /** Preset requested through the URL, if any */
    presetName: getPresetFromUrl(),

    /** Preset loaded when nothing is requested */
    defaultPreset: 'Koch snowflake',
} as const;

