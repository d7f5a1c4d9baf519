import { describe, it, expect, vi } from 'vitest';
import { computeViewport, drawPrimitives, toCanvas } from './drawScene';
import type { RenderPrimitive } from '../types/lsystem';

function createMockContext() {
    return {
        beginPath: vi.fn(),
        moveTo: vi.fn(),
        lineTo: vi.fn(),
        closePath: vi.fn(),
        stroke: vi.fn(),
        fill: vi.fn(),
        arc: vi.fn(),
        strokeStyle: '',
        fillStyle: '',
        lineWidth: 1,
        lineCap: '',
        lineJoin: '',
    };
}

const identity = { scale: 1, offsetX: 0, offsetY: 0 };

describe('computeViewport', () => {
    it('should fit bounds inside the padded area and center them', () => {
        const viewport = computeViewport({ minX: 0, minY: 0, maxX: 100, maxY: 50 }, 220, 120, 10);
        expect(viewport).toEqual({ scale: 2, offsetX: 10, offsetY: 10 });
    });

    it('should use the tighter axis when aspect ratios differ', () => {
        const viewport = computeViewport({ minX: 0, minY: 0, maxX: 10, maxY: 10 }, 200, 100, 20);
        expect(viewport).toEqual({ scale: 6, offsetX: 70, offsetY: 20 });
    });

    it('should center the origin at unit scale when there is nothing to fit', () => {
        expect(computeViewport(null, 220, 120)).toEqual({ scale: 1, offsetX: 110, offsetY: 60 });
    });

    it('should keep unit scale for a single point', () => {
        const viewport = computeViewport({ minX: 5, minY: 5, maxX: 5, maxY: 5 }, 220, 120, 10);
        expect(viewport).toEqual({ scale: 1, offsetX: 105, offsetY: 55 });
    });

    it('should scale a flat horizontal scene by its width only', () => {
        const viewport = computeViewport({ minX: 0, minY: 0, maxX: 100, maxY: 0 }, 220, 120, 10);
        expect(viewport).toEqual({ scale: 2, offsetX: 10, offsetY: 60 });
    });
});

describe('toCanvas', () => {
    it('should apply scale then offset', () => {
        expect(toCanvas({ x: 3, y: -2 }, { scale: 2, offsetX: 10, offsetY: 20 })).toEqual({ x: 16, y: 16 });
    });
});

describe('drawPrimitives', () => {
    const line = (width: number, index: number): RenderPrimitive => ({
        kind: 'line',
        index,
        start: { x: 0, y: 0 },
        end: { x: 10, y: 0 },
        lineWidth: width,
    });

    it('should batch consecutive lines of the same width into one stroke', () => {
        const mock = createMockContext();
        const ctx = mock as unknown as CanvasRenderingContext2D;

        drawPrimitives(ctx, [line(1, 0), line(1, 1), line(2, 2)], identity, { lineColor: '#fff' });

        expect(mock.beginPath).toHaveBeenCalledTimes(2);
        expect(mock.stroke).toHaveBeenCalledTimes(2);
        expect(mock.moveTo).toHaveBeenCalledTimes(3);
        expect(mock.lineWidth).toBe(2);
        expect(mock.strokeStyle).toBe('#fff');
    });

    it('should skip lines without a positive width', () => {
        const mock = createMockContext();
        const ctx = mock as unknown as CanvasRenderingContext2D;

        drawPrimitives(ctx, [line(0, 0), line(-1, 1)], identity, { lineColor: '#fff' });

        expect(mock.moveTo).not.toHaveBeenCalled();
        expect(mock.stroke).not.toHaveBeenCalled();
    });

    it('should fill polygons with their own color', () => {
        const mock = createMockContext();
        const ctx = mock as unknown as CanvasRenderingContext2D;

        drawPrimitives(ctx, [{
            kind: 'polygon',
            index: 0,
            vertices: [{ x: 0, y: 0 }, { x: 10, y: 0 }, { x: 10, y: 10 }],
            fillColor: '#ff0000',
        }], { scale: 2, offsetX: 1, offsetY: 1 }, { lineColor: '#fff' });

        expect(mock.moveTo).toHaveBeenCalledWith(1, 1);
        expect(mock.lineTo).toHaveBeenNthCalledWith(1, 21, 1);
        expect(mock.lineTo).toHaveBeenNthCalledWith(2, 21, 21);
        expect(mock.closePath).toHaveBeenCalledTimes(1);
        expect(mock.fill).toHaveBeenCalledTimes(1);
        expect(mock.fillStyle).toBe('#ff0000');
    });

    it('should draw dots in the line color with a pixel radius', () => {
        const mock = createMockContext();
        const ctx = mock as unknown as CanvasRenderingContext2D;

        drawPrimitives(ctx, [{ kind: 'dot', index: 0, center: { x: 5, y: 5 }, radius: 3 }],
            { scale: 4, offsetX: 0, offsetY: 0 }, { lineColor: '#abcdef' });

        expect(mock.arc).toHaveBeenCalledWith(20, 20, 3, 0, Math.PI * 2);
        expect(mock.fillStyle).toBe('#abcdef');
    });

    it('should stroke pending lines before drawing a dot', () => {
        const mock = createMockContext();
        const ctx = mock as unknown as CanvasRenderingContext2D;

        drawPrimitives(ctx, [line(1, 0), { kind: 'dot', index: 0, center: { x: 0, y: 0 }, radius: 3 }],
            identity, { lineColor: '#fff' });

        expect(mock.stroke).toHaveBeenCalledTimes(1);
        expect(mock.stroke.mock.invocationCallOrder[0]).toBeLessThan(mock.arc.mock.invocationCallOrder[0]);
    });
});
