/**
 * Bundled L-system presets
 *
 * Presets are opaque bundles of editor inputs. The loader only checks the
 * shape it needs to read; numeric values are normalized later by the
 * generator state when a preset is applied.
 */

import rawPresets from '../data/presets.json';
import { isAction } from '../lsystem/actions';
import type { Action } from '../types/lsystem';

export interface PresetRule {
    trigger: string;
    replacement: string;
}

export interface PresetAssignment {
    symbol: string;
    action: Action;
}

export interface Preset {
    name: string;
    description: string;
    axiom: string;
    rules: PresetRule[];
    iterations: number;
    params: Record<string, unknown>;
    assignments: PresetAssignment[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readRules(value: unknown): PresetRule[] {
    if (!Array.isArray(value)) return [];
    const rules: PresetRule[] = [];
    for (const entry of value) {
        if (isRecord(entry) && typeof entry.trigger === 'string' && typeof entry.replacement === 'string') {
            rules.push({ trigger: entry.trigger, replacement: entry.replacement });
        }
    }
    return rules;
}

function readAssignments(value: unknown): PresetAssignment[] {
    if (!Array.isArray(value)) return [];
    const assignments: PresetAssignment[] = [];
    for (const entry of value) {
        if (!isRecord(entry) || typeof entry.symbol !== 'string' || typeof entry.action !== 'string') continue;
        if (!isAction(entry.action)) {
            console.warn(`[Presets] Unknown action "${entry.action}" for symbol "${entry.symbol}"`);
            continue;
        }
        assignments.push({ symbol: entry.symbol, action: entry.action });
    }
    return assignments;
}

/**
 * Read one preset record, or null when it lacks a name or axiom.
 */
export function readPreset(raw: unknown): Preset | null {
    if (!isRecord(raw) || typeof raw.name !== 'string' || typeof raw.axiom !== 'string') {
        return null;
    }
    return {
        name: raw.name,
        description: typeof raw.description === 'string' ? raw.description : '',
        axiom: raw.axiom,
        rules: readRules(raw.rules),
        iterations: typeof raw.iterations === 'number' ? raw.iterations : 0,
        params: isRecord(raw.params) ? raw.params : {},
        assignments: readAssignments(raw.assignments),
    };
}

function loadPresets(raw: unknown): Preset[] {
    if (!Array.isArray(raw)) return [];
    return raw.map(readPreset).filter((p): p is Preset => p !== null);
}

export const PRESETS: ReadonlyArray<Preset> = loadPresets(rawPresets);

export function findPreset(name: string | null | undefined): Preset | undefined {
    if (!name) return undefined;
    const wanted = name.toLowerCase();
    return PRESETS.find((p) => p.name.toLowerCase() === wanted);
}
