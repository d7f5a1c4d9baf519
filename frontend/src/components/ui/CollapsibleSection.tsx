/**
 * Sidebar section that can be folded away
 */

import { useState, type ReactNode } from 'react';
import styles from './CollapsibleSection.module.css';

interface CollapsibleSectionProps {
    title: ReactNode;
    children: ReactNode;
    /** Short summary shown next to the title, e.g. a count */
    badge?: ReactNode;
    defaultExpanded?: boolean;
}

export function CollapsibleSection({ title, children, badge, defaultExpanded = true }: CollapsibleSectionProps) {
    const [expanded, setExpanded] = useState(defaultExpanded);

    return (
        <div className={styles.section}>
            <button
                type="button"
                className={styles.title}
                aria-expanded={expanded}
                onClick={() => setExpanded(prev => !prev)}
            >
                <span className={styles.icon}>{expanded ? '▼' : '▶'}</span>
                <span className={styles.label}>{title}</span>
                {badge !== undefined && <span className={styles.badge}>{badge}</span>}
            </button>
            {expanded && <div className={styles.content}>{children}</div>}
        </div>
    );
}
