import type { Renderer, ViewMode, RenderFrame, RenderContext } from './types';

const FALLBACK_INSET = 12;

// Placeholder for a view mode nothing was registered for
class FallbackRenderer implements Renderer {
    id = "fallback";

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

            ctx.strokeStyle = "#334155";
            ctx.lineWidth = 1;
            ctx.setLineDash([6, 4]);
            ctx.strokeRect(FALLBACK_INSET, FALLBACK_INSET, width - FALLBACK_INSET * 2, height - FALLBACK_INSET * 2);

            ctx.textAlign = "center";
            ctx.textBaseline = "middle";
            ctx.fillStyle = "#94a3b8";
            ctx.font = "600 14px system-ui, sans-serif";
            ctx.fillText(`No ${frame.viewMode} renderer registered`, width / 2, height / 2 - 10);
            ctx.fillStyle = "#64748b";
            ctx.font = "12px system-ui, sans-serif";
            ctx.fillText("Nothing can be drawn in this view", width / 2, height / 2 + 10);
        } finally {
            ctx.restore();
        }
    }
}

type RendererFactory = () => Renderer;

class RendererRegistry {
    private factories: Map<ViewMode, RendererFactory> = new Map();
    // One instance per view mode, created on first use
    private instances: Map<ViewMode, Renderer> = new Map();

    register(viewMode: ViewMode, factory: RendererFactory) {
        this.factories.set(viewMode, factory);
    }

    getRenderer(viewMode: ViewMode): Renderer {
        const existing = this.instances.get(viewMode);
        if (existing) return existing;

        const factory = this.factories.get(viewMode);
        if (!factory) {
            return new FallbackRenderer();
        }

        const renderer = factory();
        this.instances.set(viewMode, renderer);
        return renderer;
    }

    /**
     * Create a renderer that is not shared, for views that keep per-canvas state
     */
    createRenderer(viewMode: ViewMode): Renderer {
        const factory = this.factories.get(viewMode);
        return factory ? factory() : new FallbackRenderer();
    }

    // Dispose cached instances, e.g. on hot reload
    reset() {
        this.instances.forEach(r => r.dispose());
        this.instances.clear();
    }

    // Drop registrations as well as instances
    clear() {
        this.reset();
        this.factories.clear();
    }
}

export const rendererRegistry = new RendererRegistry();
