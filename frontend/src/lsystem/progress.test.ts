import { describe, it, expect } from 'vitest';
import { advanceProgress, primitiveCount, visiblePrimitives } from './progress';
import type { Scene } from '../types/lsystem';

function makeScene(): Scene {
    return {
        segments: [
            { start: { x: 0, y: 0 }, end: { x: 1, y: 0 }, lineWidth: 1 },
            { start: { x: 1, y: 0 }, end: { x: 2, y: 0 }, lineWidth: 1 },
            { start: { x: 2, y: 0 }, end: { x: 3, y: 0 }, lineWidth: 2 },
            { start: { x: 3, y: 0 }, end: { x: 4, y: 0 }, lineWidth: 2 },
        ],
        dots: [
            { center: { x: 0, y: 0 }, radius: 3 },
            { center: { x: 4, y: 0 }, radius: 3 },
        ],
        polygons: [[{ x: 9, y: 9 }]],
        filledPolygons: [
            { vertices: [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 1 }], fillColor: '#123456' },
        ],
    };
}

describe('primitiveCount', () => {
    it('should be the length of the longest collection', () => {
        expect(primitiveCount(makeScene())).toBe(4);
        expect(primitiveCount({ segments: [], dots: [], polygons: [], filledPolygons: [] })).toBe(0);
    });
});

describe('visiblePrimitives', () => {
    it('should reveal nothing at or below zero progress', () => {
        expect(visiblePrimitives(makeScene(), 0)).toEqual([]);
        expect(visiblePrimitives(makeScene(), -5)).toEqual([]);
        expect(visiblePrimitives(makeScene(), 0.9)).toEqual([]);
    });

    it('should reveal every primitive once progress reaches the count', () => {
        const scene = makeScene();
        const all = visiblePrimitives(scene, primitiveCount(scene));
        expect(all).toHaveLength(1 + 4 + 2);
        expect(visiblePrimitives(scene, 1000)).toEqual(all);
        expect(visiblePrimitives(scene, Infinity)).toEqual(all);
    });

    it('should gate each collection by its own index', () => {
        const visible = visiblePrimitives(makeScene(), 2.5);
        expect(visible.map((p) => `${p.kind}:${p.index}`)).toEqual([
            'polygon:0',
            'line:0',
            'line:1',
            'dot:0',
            'dot:1',
        ]);
    });

    it('should never render open polygons', () => {
        const visible = visiblePrimitives(makeScene(), 10);
        const polygons = visible.filter((p) => p.kind === 'polygon');
        expect(polygons).toHaveLength(1);
        expect(polygons[0]).toEqual({
            kind: 'polygon',
            index: 0,
            vertices: [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 1 }],
            fillColor: '#123456',
        });
    });

    it('should carry line geometry through', () => {
        const visible = visiblePrimitives(makeScene(), 3);
        expect(visible.find((p) => p.kind === 'line' && p.index === 2)).toEqual({
            kind: 'line',
            index: 2,
            start: { x: 2, y: 0 },
            end: { x: 3, y: 0 },
            lineWidth: 2,
        });
    });

    it('should be idempotent for a fixed progress', () => {
        const scene = makeScene();
        expect(visiblePrimitives(scene, 3)).toEqual(visiblePrimitives(scene, 3));
    });
});

describe('advanceProgress', () => {
    it('should add elapsed time scaled by speed', () => {
        expect(advanceProgress(0, 100, 1, 50, 10)).toBe(10);
        expect(advanceProgress(5, 100, 2, 50, 10)).toBe(25);
    });

    it('should clamp to the maximum', () => {
        expect(advanceProgress(45, 100, 1, 50, 10)).toBe(50);
        expect(advanceProgress(50, 100, 1, 50, 10)).toBe(50);
    });

    it('should never move backwards', () => {
        expect(advanceProgress(7, -100, 1, 50, 10)).toBe(7);
        expect(advanceProgress(7, 100, -3, 50, 10)).toBe(7);
        expect(advanceProgress(7, 100, 0, 50, 10)).toBe(7);
    });

    it('should treat a non-positive time scale as one millisecond', () => {
        expect(advanceProgress(0, 5, 1, 50, 0)).toBe(5);
    });
});
