import { describe, it, expect } from 'vitest';
import { buildExpansionSeries, formatCompact, summarizeScene } from './expansionStats';
import { emptyScene } from '../lsystem/interpreter';
import type { Scene } from '../types/lsystem';

describe('buildExpansionSeries', () => {
    it('should number points from the axiom at iteration 0', () => {
        expect(buildExpansionSeries([1, 5, 25])).toEqual([
            { iteration: 0, length: 1 },
            { iteration: 1, length: 5 },
            { iteration: 2, length: 25 },
        ]);
    });
});

describe('summarizeScene', () => {
    it('should count primitives and measure the drawing', () => {
        const scene: Scene = {
            segments: [
                { start: { x: 0, y: 0 }, end: { x: 10, y: 0 }, lineWidth: 1 },
                { start: { x: 10, y: 0 }, end: { x: 10, y: 4 }, lineWidth: 1 },
            ],
            dots: [],
            polygons: [[{ x: 0, y: 0 }]],
            filledPolygons: [],
        };
        expect(summarizeScene('F+F[', scene)).toEqual({
            symbols: 4,
            segments: 2,
            dots: 0,
            filledPolygons: 0,
            openPolygons: 1,
            width: 10,
            height: 4,
        });
    });

    it('should report zero size for an empty scene', () => {
        const summary = summarizeScene('', emptyScene());
        expect(summary.width).toBe(0);
        expect(summary.height).toBe(0);
    });
});

describe('formatCompact', () => {
    it('should abbreviate thousands and millions', () => {
        expect(formatCompact(42)).toBe('42');
        expect(formatCompact(1500)).toBe('1.5k');
        expect(formatCompact(2_000_000)).toBe('2.0M');
    });
});
