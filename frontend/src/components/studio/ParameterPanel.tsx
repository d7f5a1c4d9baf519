/**
 * Turtle parameters, iteration count and colors
 */

import type { Dispatch } from 'react';
import {
    NUMERIC_PARAMS,
    type ColorTarget,
    type GeneratorColors,
    type GeneratorEvent,
    type GeneratorParams,
    type NumericParam,
} from '../../state/generatorReducer';
import { DraftInput } from '../ui';
import styles from './Studio.module.css';

interface ParamField {
    label: string;
    step: number;
}

const PARAM_FIELDS: Record<NumericParam, ParamField> = {
    stepSize: { label: 'Step size', step: 1 },
    fractionalStepSize: { label: 'Fractional step', step: 1 },
    turningAngle: { label: 'Turning angle (°)', step: 1 },
    turningAngleIncrement: { label: 'Angle increment (°)', step: 1 },
    lineWidthIncrement: { label: 'Line width increment', step: 0.1 },
    startX: { label: 'Start X', step: 1 },
    startY: { label: 'Start Y', step: 1 },
    startAngle: { label: 'Start heading (°)', step: 1 },
    initialLineWidth: { label: 'Initial line width', step: 0.5 },
    dotRadius: { label: 'Dot radius', step: 0.5 },
    stepLengthFactor: { label: 'Step length factor', step: 0.1 },
};

const COLOR_FIELDS: ReadonlyArray<{ target: ColorTarget; label: string }> = [
    { target: 'line', label: 'Line' },
    { target: 'fill', label: 'Fill' },
    { target: 'background', label: 'Background' },
];

interface ParameterPanelProps {
    params: GeneratorParams;
    iterations: number;
    colors: GeneratorColors;
    dispatch: Dispatch<GeneratorEvent>;
}

export function ParameterPanel({ params, iterations, colors, dispatch }: ParameterPanelProps) {
    return (
        <div className={styles.paramGrid}>
            <label className={styles.field}>
                <span className={styles.fieldLabel}>Iterations</span>
                <DraftInput
                    type="number"
                    min={0}
                    step={1}
                    value={iterations}
                    ariaLabel="Iterations"
                    onCommit={(value) => dispatch({ type: 'setIterations', value })}
                />
            </label>

            {NUMERIC_PARAMS.map((param) => (
                <label key={param} className={styles.field}>
                    <span className={styles.fieldLabel}>{PARAM_FIELDS[param].label}</span>
                    <DraftInput
                        type="number"
                        step={PARAM_FIELDS[param].step}
                        value={params[param]}
                        ariaLabel={PARAM_FIELDS[param].label}
                        onCommit={(value) => dispatch({ type: 'setParam', param, value })}
                    />
                </label>
            ))}

            {COLOR_FIELDS.map(({ target, label }) => (
                <label key={target} className={styles.field}>
                    <span className={styles.fieldLabel}>{label} color</span>
                    <input
                        type="color"
                        className={styles.color}
                        value={colors[target]}
                        onChange={(e) => dispatch({ type: 'setColor', target, color: e.target.value })}
                    />
                </label>
            ))}
        </div>
    );
}
