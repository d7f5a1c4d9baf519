/**
 * Figures shown in the expansion stats panel
 */

import type { Scene } from '../types/lsystem';
import { sceneBounds } from '../lsystem/interpreter';

export interface ExpansionPoint {
    iteration: number;
    length: number;
}

export interface SceneSummary {
    symbols: number;
    segments: number;
    dots: number;
    filledPolygons: number;
    /** Polygons still open when the sequence ended; never drawn */
    openPolygons: number;
    width: number;
    height: number;
}

export function buildExpansionSeries(lengths: ReadonlyArray<number>): ExpansionPoint[] {
    return lengths.map((length, iteration) => ({ iteration, length }));
}

export function summarizeScene(sequence: string, scene: Scene): SceneSummary {
    const bounds = sceneBounds(scene);
    return {
        symbols: sequence.length,
        segments: scene.segments.length,
        dots: scene.dots.length,
        filledPolygons: scene.filledPolygons.length,
        openPolygons: scene.polygons.length,
        width: bounds ? bounds.maxX - bounds.minX : 0,
        height: bounds ? bounds.maxY - bounds.minY : 0,
    };
}

/** Axis label: 950, 1.5k, 2.0M */
export function formatCompact(value: number): string {
    const abs = Math.abs(value);
    if (abs >= 1_000_000) return `${(value / 1_000_000).toFixed(1)}M`;
    if (abs >= 1_000) return `${(value / 1_000).toFixed(1)}k`;
    return String(value);
}
