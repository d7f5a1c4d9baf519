/**
 * Canvas drawing for L-system scenes.
 *
 * Geometry is transformed into canvas space point by point instead of via
 * ctx.scale so line widths and dot radii stay in pixels at any zoom.
 */

import type { Bounds, Point, RenderPrimitive } from '../types/lsystem';

export interface Viewport {
    scale: number;
    offsetX: number;
    offsetY: number;
}

export interface DrawStyle {
    lineColor: string;
}

/**
 * Fit bounds into a width x height area, centered, with padding on each side.
 */
export function computeViewport(bounds: Bounds | null, width: number, height: number, padding: number = 20): Viewport {
    if (!bounds) {
        return { scale: 1, offsetX: width / 2, offsetY: height / 2 };
    }

    const spanX = bounds.maxX - bounds.minX;
    const spanY = bounds.maxY - bounds.minY;
    const availX = Math.max(1, width - padding * 2);
    const availY = Math.max(1, height - padding * 2);

    const scaleX = spanX > 0 ? availX / spanX : Infinity;
    const scaleY = spanY > 0 ? availY / spanY : Infinity;
    let scale = Math.min(scaleX, scaleY);
    if (!Number.isFinite(scale)) scale = 1;

    const centerX = (bounds.minX + bounds.maxX) / 2;
    const centerY = (bounds.minY + bounds.maxY) / 2;

    return {
        scale,
        offsetX: width / 2 - centerX * scale,
        offsetY: height / 2 - centerY * scale,
    };
}

export function toCanvas(p: Point, viewport: Viewport): Point {
    return {
        x: p.x * viewport.scale + viewport.offsetX,
        y: p.y * viewport.scale + viewport.offsetY,
    };
}

/**
 * Draw primitives in the order given. Consecutive lines of equal width are
 * batched into one path. Lines with a width of zero or less are not drawn.
 */
export function drawPrimitives(
    ctx: CanvasRenderingContext2D,
    primitives: ReadonlyArray<RenderPrimitive>,
    viewport: Viewport,
    style: DrawStyle
): void {
    let pathWidth: number | null = null;

    const flushLines = () => {
        if (pathWidth !== null) {
            ctx.stroke();
            pathWidth = null;
        }
    };

    ctx.lineCap = 'round';
    ctx.lineJoin = 'round';
    ctx.strokeStyle = style.lineColor;

    for (const primitive of primitives) {
        switch (primitive.kind) {
            case 'polygon': {
                flushLines();
                if (primitive.vertices.length < 2) break;
                ctx.beginPath();
                primitive.vertices.forEach((vertex, i) => {
                    const p = toCanvas(vertex, viewport);
                    if (i === 0) {
                        ctx.moveTo(p.x, p.y);
                    } else {
                        ctx.lineTo(p.x, p.y);
                    }
                });
                ctx.closePath();
                ctx.fillStyle = primitive.fillColor;
                ctx.fill();
                break;
            }

            case 'line': {
                if (primitive.lineWidth <= 0) break;
                if (pathWidth !== primitive.lineWidth) {
                    flushLines();
                    ctx.beginPath();
                    ctx.lineWidth = primitive.lineWidth;
                    pathWidth = primitive.lineWidth;
                }
                const start = toCanvas(primitive.start, viewport);
                const end = toCanvas(primitive.end, viewport);
                ctx.moveTo(start.x, start.y);
                ctx.lineTo(end.x, end.y);
                break;
            }

            case 'dot': {
                flushLines();
                const center = toCanvas(primitive.center, viewport);
                ctx.beginPath();
                ctx.arc(center.x, center.y, Math.max(0, primitive.radius), 0, Math.PI * 2);
                ctx.fillStyle = style.lineColor;
                ctx.fill();
                break;
            }
        }
    }

    flushLines();
}
