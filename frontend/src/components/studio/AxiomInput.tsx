import type { Dispatch } from 'react';
import type { GeneratorEvent } from '../../state/generatorReducer';
import { DraftInput } from '../ui';
import styles from './Studio.module.css';

interface AxiomInputProps {
    axiom: string;
    dispatch: Dispatch<GeneratorEvent>;
}

export function AxiomInput({ axiom, dispatch }: AxiomInputProps) {
    return (
        <label className={styles.field}>
            <span className={styles.fieldLabel}>Axiom</span>
            <DraftInput
                value={axiom}
                monospace
                placeholder="e.g. F--F--F"
                ariaLabel="Axiom"
                onCommit={(value) => dispatch({ type: 'setAxiom', axiom: value })}
            />
            <span className={styles.hint}>Applied on Generate</span>
        </label>
    );
}
