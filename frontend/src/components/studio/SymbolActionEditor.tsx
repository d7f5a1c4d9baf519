import type { Dispatch } from 'react';
import { ACTIONS, type SymbolAssignment } from '../../types/lsystem';
import { ACTION_LABELS, isAction } from '../../lsystem/actions';
import type { GeneratorEvent } from '../../state/generatorReducer';
import { Button, DraftInput, TrashIcon } from '../ui';
import styles from './Studio.module.css';

interface SymbolActionEditorProps {
    assignments: SymbolAssignment[];
    dispatch: Dispatch<GeneratorEvent>;
}

export function SymbolActionEditor({ assignments, dispatch }: SymbolActionEditorProps) {
    return (
        <div className={styles.list}>
            {assignments.map((assignment) => (
                <div key={assignment.id} className={styles.assignmentRow}>
                    <DraftInput
                        value={assignment.symbol}
                        monospace
                        ariaLabel="Symbol"
                        style={{ width: 44, textAlign: 'center' }}
                        onCommit={(value) => dispatch({ type: 'updateAssignment', id: assignment.id, symbol: value })}
                    />
                    <select
                        className={styles.select}
                        value={assignment.action}
                        aria-label="Action"
                        onChange={(e) => {
                            const action = e.target.value;
                            if (isAction(action)) {
                                dispatch({ type: 'updateAssignment', id: assignment.id, action });
                            }
                        }}
                    >
                        {ACTIONS.map((action) => (
                            <option key={action} value={action}>{ACTION_LABELS[action]}</option>
                        ))}
                    </select>
                    <Button
                        variant="ghost"
                        size="small"
                        aria-label="Remove assignment"
                        onClick={() => dispatch({ type: 'removeAssignment', id: assignment.id })}
                    >
                        <TrashIcon size={14} />
                    </Button>
                </div>
            ))}
            <Button variant="secondary" size="small" onClick={() => dispatch({ type: 'addAssignment' })}>
                + Add symbol
            </Button>
        </div>
    );
}
