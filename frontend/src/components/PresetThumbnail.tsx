import { useMemo } from 'react';
import { Link } from 'react-router-dom';
import { config } from '../config';
import { createInitialState, DEFAULT_COLORS } from '../state/generatorReducer';
import type { Preset } from '../utils/presets';
import { SceneCanvas } from './SceneCanvas';

interface PresetThumbnailProps {
    preset: Preset;
    onError?: (error: unknown, context: string) => void;
}

const THUMBNAIL_STYLE = { lineColor: DEFAULT_COLORS.line, background: DEFAULT_COLORS.background };

export function PresetThumbnail({ preset, onError }: PresetThumbnailProps) {
    // Generated once per preset; thumbnails never animate
    const state = useMemo(() => createInitialState(preset), [preset]);

    return (
        <Link
            to={`/?preset=${encodeURIComponent(preset.name)}`}
            reloadDocument
            className="glass-panel preset-card"
        >
            <SceneCanvas
                viewMode="thumbnail"
                scene={state.scene}
                progress={Infinity}
                generation={state.generation}
                renderStyle={THUMBNAIL_STYLE}
                width={config.thumbnailWidth}
                height={config.thumbnailHeight}
                animate={false}
                onError={onError}
                style={{ borderRadius: 8 }}
            />
            <div className="preset-card-body">
                <div className="preset-card-title">{preset.name}</div>
                <div className="preset-card-description">{preset.description}</div>
                {state.notice && <div className="preset-card-notice">{state.notice}</div>}
            </div>
        </Link>
    );
}
