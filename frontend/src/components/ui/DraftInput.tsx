/**
 * Text input that keeps a local draft and reports it on blur or Enter.
 * Edits therefore regenerate once per commit, not once per keystroke.
 */

import { useEffect, useState, type CSSProperties, type KeyboardEvent } from 'react';
import styles from './DraftInput.module.css';

interface DraftInputProps {
    value: string | number;
    onCommit: (value: string) => void;
    type?: 'text' | 'number';
    step?: number;
    min?: number;
    placeholder?: string;
    ariaLabel?: string;
    monospace?: boolean;
    style?: CSSProperties;
}

export function DraftInput({ value, onCommit, type = 'text', step, min, placeholder, ariaLabel, monospace, style }: DraftInputProps) {
    const [draft, setDraft] = useState(String(value));

    // External changes (presets, reset) replace the draft
    useEffect(() => {
        setDraft(String(value));
    }, [value]);

    const commit = () => {
        if (draft !== String(value)) onCommit(draft);
    };

    const handleKeyDown = (e: KeyboardEvent<HTMLInputElement>) => {
        if (e.key === 'Enter') {
            commit();
        } else if (e.key === 'Escape') {
            setDraft(String(value));
        }
    };

    return (
        <input
            className={`${styles.input} ${monospace ? styles.mono : ''}`}
            type={type}
            step={step}
            min={min}
            value={draft}
            placeholder={placeholder}
            aria-label={ariaLabel}
            spellCheck={false}
            onChange={(e) => setDraft(e.target.value)}
            onBlur={commit}
            onKeyDown={handleKeyDown}
            style={style}
        />
    );
}
