/**
 * Titled card used by the studio sidebar and stats area
 */

import type { ReactNode } from 'react';
import styles from './Panel.module.css';

interface PanelProps {
    title?: string;
    actions?: ReactNode;
    children: ReactNode;
    className?: string;
}

export function Panel({ title, actions, children, className = '' }: PanelProps) {
    return (
        <section className={`${styles.panel} ${className}`}>
            {(title || actions) && (
                <header className={styles.header}>
                    {title && <h2 className={styles.title}>{title}</h2>}
                    {actions}
                </header>
            )}
            {children}
        </section>
    );
}
