/**
 * Progressive reveal of a Scene.
 *
 * Visibility is a pure function of (scene, progress): the primitive at index i
 * of its own collection is visible once floor(progress) > i. Nothing is
 * retained between calls.
 */

import type { RenderPrimitive, Scene } from '../types/lsystem';

/** Upper bound for progress: the longest primitive collection */
export function primitiveCount(scene: Scene): number {
    return Math.max(scene.segments.length, scene.dots.length, scene.filledPolygons.length);
}

export function visiblePrimitives(scene: Scene, progress: number): RenderPrimitive[] {
    const revealed = Number.isFinite(progress) ? Math.floor(progress) : progress > 0 ? Infinity : 0;
    if (revealed <= 0) return [];

    const primitives: RenderPrimitive[] = [];

    // Fills first so outlines and dots stay on top
    const polygons = Math.min(revealed, scene.filledPolygons.length);
    for (let i = 0; i < polygons; i++) {
        const { vertices, fillColor } = scene.filledPolygons[i];
        primitives.push({ kind: 'polygon', index: i, vertices, fillColor });
    }

    const lines = Math.min(revealed, scene.segments.length);
    for (let i = 0; i < lines; i++) {
        const { start, end, lineWidth } = scene.segments[i];
        primitives.push({ kind: 'line', index: i, start, end, lineWidth });
    }

    const dots = Math.min(revealed, scene.dots.length);
    for (let i = 0; i < dots; i++) {
        const { center, radius } = scene.dots[i];
        primitives.push({ kind: 'dot', index: i, center, radius });
    }

    return primitives;
}

/**
 * Advance the animation counter by one clock sample.
 * Never moves backwards and never passes `max`.
 */
export function advanceProgress(
    progress: number,
    elapsedMs: number,
    animationSpeed: number,
    max: number,
    timeScale: number
): number {
    const scale = timeScale > 0 ? timeScale : 1;
    const delta = (Math.max(0, elapsedMs) / scale) * Math.max(0, animationSpeed);
    return Math.min(Math.max(progress, progress + delta), max);
}
