/**
 * Editable list of production rules.
 * Only the first character of a trigger is used; a later rule for the same
 * trigger replaces an earlier one, and the editor marks the shadowed rows.
 */

import { useMemo, type Dispatch } from 'react';
import type { RuleEntry } from '../../types/lsystem';
import { shadowedRuleIds } from '../../lsystem/expander';
import type { GeneratorEvent } from '../../state/generatorReducer';
import { Button, DraftInput, TrashIcon } from '../ui';
import styles from './Studio.module.css';

interface RuleEditorProps {
    rules: RuleEntry[];
    dispatch: Dispatch<GeneratorEvent>;
}

export function RuleEditor({ rules, dispatch }: RuleEditorProps) {
    const shadowed = useMemo(() => shadowedRuleIds(rules), [rules]);

    return (
        <div className={styles.list}>
            {rules.length === 0 && <div className={styles.empty}>No rules: the axiom is drawn as is.</div>}
            {rules.map((rule) => (
                <div
                    key={rule.id}
                    className={`${styles.ruleRow} ${shadowed.has(rule.id) ? styles.shadowed : ''}`}
                    title={shadowed.has(rule.id) ? 'Overridden by a later rule for the same symbol' : undefined}
                >
                    <DraftInput
                        value={rule.trigger}
                        monospace
                        ariaLabel="Rule trigger"
                        style={{ width: 44, textAlign: 'center' }}
                        onCommit={(value) => dispatch({ type: 'updateRule', id: rule.id, trigger: value })}
                    />
                    <span className={styles.arrow}>→</span>
                    <DraftInput
                        value={rule.replacement}
                        monospace
                        ariaLabel="Rule replacement"
                        onCommit={(value) => dispatch({ type: 'updateRule', id: rule.id, replacement: value })}
                    />
                    <Button
                        variant="ghost"
                        size="small"
                        aria-label="Remove rule"
                        onClick={() => dispatch({ type: 'removeRule', id: rule.id })}
                    >
                        <TrashIcon size={14} />
                    </Button>
                </div>
            ))}
            <Button variant="secondary" size="small" onClick={() => dispatch({ type: 'addRule' })}>
                + Add rule
            </Button>
        </div>
    );
}
