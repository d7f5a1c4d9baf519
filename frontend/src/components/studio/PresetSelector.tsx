import type { Dispatch } from 'react';
import type { GeneratorEvent } from '../../state/generatorReducer';
import { PRESETS, findPreset } from '../../utils/presets';
import styles from './Studio.module.css';

interface PresetSelectorProps {
    presetName: string | null;
    dispatch: Dispatch<GeneratorEvent>;
}

export function PresetSelector({ presetName, dispatch }: PresetSelectorProps) {
    const current = findPreset(presetName);

    return (
        <div className={styles.field}>
            <select
                className={styles.select}
                aria-label="Preset"
                value={current?.name ?? ''}
                onChange={(e) => {
                    const preset = findPreset(e.target.value);
                    if (preset) dispatch({ type: 'applyPreset', preset });
                }}
            >
                {!current && <option value="">Custom</option>}
                {PRESETS.map((preset) => (
                    <option key={preset.name} value={preset.name}>{preset.name}</option>
                ))}
            </select>
            {current && <span className={styles.hint}>{current.description}</span>}
        </div>
    );
}
