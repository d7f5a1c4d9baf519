/**
 * Studio renderer: the animated main view.
 * Draws the revealed part of the scene plus a marker at the turtle's
 * latest drawn position while the animation is still running.
 */

import type { Renderer, RenderFrame, RenderContext } from '../../rendering/types';
import { sceneBounds } from '../../lsystem/interpreter';
import { primitiveCount, visiblePrimitives } from '../../lsystem/progress';
import { computeViewport, drawPrimitives, toCanvas, type Viewport } from '../drawScene';

const TURTLE_MARKER_RADIUS = 4;
const TURTLE_MARKER_COLOR = '#f59e0b';

interface ViewportCache {
    generation: number;
    width: number;
    height: number;
    viewport: Viewport;
}

export class StudioRenderer implements Renderer {
    id = 'studio';

    // Bounds only change when the scene is regenerated or the canvas resizes
    private cache: ViewportCache | null = null;

    dispose() {
        this.cache = null;
    }

    private getViewport(frame: RenderFrame, width: number, height: number): Viewport {
        const cached = this.cache;
        if (cached && cached.generation === frame.generation && cached.width === width && cached.height === height) {
            return cached.viewport;
        }
        const viewport = computeViewport(sceneBounds(frame.scene), width, height);
        this.cache = { generation: frame.generation, width, height, viewport };
        return viewport;
    }

    render(frame: RenderFrame, rc: RenderContext) {
        const { ctx, canvas, dpr } = rc;
        const width = canvas.width / dpr;
        const height = canvas.height / dpr;

        ctx.save();
        try {
            ctx.scale(dpr, dpr);
            ctx.fillStyle = frame.style.background;
            ctx.fillRect(0, 0, width, height);

            const viewport = this.getViewport(frame, width, height);
            const primitives = visiblePrimitives(frame.scene, frame.progress);
            drawPrimitives(ctx, primitives, viewport, { lineColor: frame.style.lineColor });

            const revealed = Math.floor(frame.progress);
            if (revealed > 0 && revealed < primitiveCount(frame.scene)) {
                const lastSegment = frame.scene.segments[Math.min(revealed, frame.scene.segments.length) - 1];
                if (lastSegment) {
                    const head = toCanvas(lastSegment.end, viewport);
                    ctx.beginPath();
                    ctx.arc(head.x, head.y, TURTLE_MARKER_RADIUS, 0, Math.PI * 2);
                    ctx.fillStyle = TURTLE_MARKER_COLOR;
                    ctx.fill();
                }
            }
        } finally {
            ctx.restore();
        }
    }
}
