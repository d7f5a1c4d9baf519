import type { Scene } from '../types/lsystem';

export type ViewMode = 'studio' | 'thumbnail';

export interface RenderContext {
    canvas: HTMLCanvasElement;
    ctx: CanvasRenderingContext2D;
    dpr: number;
}

export interface RenderStyle {
    lineColor: string;
    background: string;
}

export interface RenderFrame {
    viewMode: ViewMode;
    scene: Scene;
    progress: number;
    /** Changes whenever the scene is regenerated */
    generation: number;
    style: RenderStyle;
}

export interface Renderer {
    id: string;
    /**
     * Release cached geometry
     */
    dispose(): void;

    /**
     * Draw a single frame
     */
    render(frame: RenderFrame, rc: RenderContext): void;
}
