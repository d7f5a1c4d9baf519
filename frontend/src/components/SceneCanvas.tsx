/**
 * Canvas component for drawing an L-system scene through the renderer registry
 */

import { useRef, useEffect, useState, useCallback, type CSSProperties } from 'react';
import type { Scene } from '../types/lsystem';
import type { Renderer, RenderFrame, RenderStyle, ViewMode } from '../rendering/types';
import { rendererRegistry } from '../rendering/registry';
import { initRenderers } from '../renderers/init';

interface SceneCanvasProps {
    viewMode: ViewMode;
    scene: Scene;
    progress: number;
    generation: number;
    renderStyle: RenderStyle;
    width?: number;
    height?: number;
    /** Redraw every animation frame; otherwise only when inputs change */
    animate?: boolean;
    onError?: (error: unknown, context: string) => void;
    className?: string;
    style?: CSSProperties;
}

function acquireRenderer(viewMode: ViewMode): Renderer {
    initRenderers();
    // The studio has a single canvas; thumbnails each keep their own renderer
    return viewMode === 'studio'
        ? rendererRegistry.getRenderer(viewMode)
        : rendererRegistry.createRenderer(viewMode);
}

export function SceneCanvas({
    viewMode,
    scene,
    progress,
    generation,
    renderStyle,
    width = 800,
    height = 600,
    animate = true,
    onError,
    className,
    style,
}: SceneCanvasProps) {
    const canvasRef = useRef<HTMLCanvasElement>(null);
    const [error, setError] = useState<string | null>(null);
    const dpr = typeof window !== 'undefined' ? window.devicePixelRatio || 1 : 1;

    // Report only the first failure; a broken loop would otherwise fire every frame
    const errorSetRef = useRef(false);
    const onErrorRef = useRef(onError);

    useEffect(() => {
        onErrorRef.current = onError;
    }, [onError]);

    const failOnce = useCallback((err: unknown, context: string) => {
        if (errorSetRef.current) return;
        errorSetRef.current = true;
        setError(`${context}: ${err instanceof Error ? err.message : String(err)}`);
        if (onErrorRef.current) {
            onErrorRef.current(err, context);
        } else {
            console.error(`[Canvas] ${context}`, err);
        }
    }, []);

    // Latest frame for the animation loop
    const frameRef = useRef<RenderFrame>({ viewMode, scene, progress, generation, style: renderStyle });
    frameRef.current = { viewMode, scene, progress, generation, style: renderStyle };

    const rendererRef = useRef<Renderer | null>(null);
    const ctxRef = useRef<CanvasRenderingContext2D | null>(null);

    const drawFrame = useCallback(() => {
        const canvas = canvasRef.current;
        const ctx = ctxRef.current;
        const renderer = rendererRef.current;
        if (!canvas || !ctx || !renderer || errorSetRef.current) return;

        try {
            renderer.render(frameRef.current, { canvas, ctx, dpr });
        } catch (err) {
            failOnce(err, 'Render loop error');
        }
    }, [dpr, failOnce]);

    useEffect(() => {
        const canvas = canvasRef.current;
        if (!canvas) return;

        const ctx = canvas.getContext('2d');
        if (!ctx) {
            failOnce(new Error('context unavailable'), 'Failed to get canvas 2D context');
            return;
        }
        ctxRef.current = ctx;

        if (import.meta.env.DEV) {
            console.debug(`[Canvas] Acquiring ${viewMode} renderer`);
        }
        const renderer = acquireRenderer(viewMode);
        rendererRef.current = renderer;

        return () => {
            if (import.meta.env.DEV) {
                console.debug(`[Canvas] Disposing ${renderer.id} renderer`);
            }
            renderer.dispose();
            rendererRef.current = null;
            ctxRef.current = null;
        };
    }, [viewMode, failOnce]);

    useEffect(() => {
        if (!animate) return;

        let animationFrameId: number;
        const renderLoop = () => {
            drawFrame();
            animationFrameId = requestAnimationFrame(renderLoop);
        };
        animationFrameId = requestAnimationFrame(renderLoop);

        return () => cancelAnimationFrame(animationFrameId);
    }, [animate, drawFrame, width, height]);

    useEffect(() => {
        if (!animate) drawFrame();
    }, [animate, drawFrame, scene, progress, generation, renderStyle, width, height]);

    if (error) {
        return (
            <div style={{
                width,
                height,
                display: 'flex',
                alignItems: 'center',
                justifyContent: 'center',
                flexDirection: 'column',
                padding: 20,
                backgroundColor: '#1a0000',
                color: '#ff5555',
                border: '1px solid #ff5555',
                borderRadius: 8,
                boxSizing: 'border-box'
            }}>
                <div style={{ fontWeight: 'bold', marginBottom: 8 }}>Canvas Error</div>
                <div style={{ fontSize: 12, textAlign: 'center', wordBreak: 'break-word' }}>{error}</div>
            </div>
        );
    }

    return (
        <canvas
            ref={canvasRef}
            width={Math.round(width * dpr)}
            height={Math.round(height * dpr)}
            className={className}
            style={{ width, height, display: 'block', ...style }}
        />
    );
}
