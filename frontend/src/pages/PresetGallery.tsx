/**
 * PresetGallery - every bundled preset drawn in full as a thumbnail
 */

import { PresetThumbnail } from '../components/PresetThumbnail';
import { ErrorNotification } from '../components/ErrorNotification';
import { useErrorNotification } from '../hooks/useErrorNotification';
import { PRESETS } from '../utils/presets';

export function PresetGallery() {
    const { errors, addError, clearError } = useErrorNotification();

    return (
        <div className="gallery">
            <ErrorNotification errors={errors} onDismiss={clearError} />
            <header className="gallery-header">
                <h1>Preset Gallery</h1>
                <p>{PRESETS.length} presets. Open one to edit and animate it in the studio.</p>
            </header>
            <div className="gallery-grid">
                {PRESETS.map(preset => (
                    <PresetThumbnail key={preset.name} preset={preset} onError={addError} />
                ))}
            </div>
        </div>
    );
}
