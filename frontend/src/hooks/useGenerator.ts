/**
 * Owns the generator state for the studio page.
 * The reducer is pure; this hook only seeds it and logs regenerations.
 */

import { useEffect, useReducer, type Dispatch } from 'react';
import { config } from '../config';
import { createInitialState, generatorReducer } from '../state/generatorReducer';
import type { GeneratorEvent, GeneratorState } from '../state/generatorReducer';
import { findPreset } from '../utils/presets';

function initialState(): GeneratorState {
    const requested = findPreset(config.presetName);
    if (config.presetName && !requested) {
        console.warn(`[Generator] Unknown preset "${config.presetName}", using ${config.defaultPreset}`);
    }
    return createInitialState(requested ?? findPreset(config.defaultPreset));
}

export interface UseGeneratorResult {
    state: GeneratorState;
    dispatch: Dispatch<GeneratorEvent>;
}

export function useGenerator(): UseGeneratorResult {
    const [state, dispatch] = useReducer(generatorReducer, undefined, initialState);

    useEffect(() => {
        if (import.meta.env.DEV) {
            console.debug(
                `[Generator] Generation ${state.generation}: ${state.sequence.length} symbols, ` +
                `${state.scene.segments.length} segments`
            );
        }
    }, [state.generation, state.sequence.length, state.scene.segments.length]);

    return { state, dispatch };
}
