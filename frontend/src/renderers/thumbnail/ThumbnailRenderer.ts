/**
 * Static thumbnail renderer used by the preset gallery.
 * Always draws the whole scene, regardless of frame progress.
 */

import type { Renderer, RenderFrame, RenderContext } from '../../rendering/types';
import { sceneBounds } from '../../lsystem/interpreter';
import { primitiveCount, visiblePrimitives } from '../../lsystem/progress';
import { computeViewport, drawPrimitives } from '../drawScene';

const THUMBNAIL_PADDING = 8;

export class ThumbnailRenderer implements Renderer {
    id = 'thumbnail';

    dispose() { }

    render(frame: RenderFrame, rc: RenderContext) {
        const { ctx, canvas, dpr } = rc;
        const width = canvas.width / dpr;
        const height = canvas.height / dpr;

        ctx.save();
        try {
            ctx.scale(dpr, dpr);
            ctx.fillStyle = frame.style.background;
            ctx.fillRect(0, 0, width, height);

            const viewport = computeViewport(sceneBounds(frame.scene), width, height, THUMBNAIL_PADDING);
            const primitives = visiblePrimitives(frame.scene, primitiveCount(frame.scene));
            drawPrimitives(ctx, primitives, viewport, { lineColor: frame.style.lineColor });
        } finally {
            ctx.restore();
        }
    }
}
