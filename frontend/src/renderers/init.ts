import { rendererRegistry } from '../rendering/registry';
import { StudioRenderer } from './studio/StudioRenderer';
import { ThumbnailRenderer } from './thumbnail/ThumbnailRenderer';

let initialized = false;

export function initRenderers() {
    if (initialized) return;
    initialized = true;

    rendererRegistry.register('studio', () => new StudioRenderer());
    rendererRegistry.register('thumbnail', () => new ThumbnailRenderer());

    if (import.meta.env.DEV) {
        console.debug('[Renderer] Registered default renderers');
    }
}
