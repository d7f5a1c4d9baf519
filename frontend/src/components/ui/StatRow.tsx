/**
 * Label / value pair for the stats panel
 */

import styles from './StatRow.module.css';

interface StatRowProps {
    label: string;
    value: string | number;
    valueColor?: string;
}

export function formatStatValue(value: string | number): string {
    return typeof value === 'number' ? value.toLocaleString('en-US') : value;
}

export function StatRow({ label, value, valueColor }: StatRowProps) {
    return (
        <div className={styles.row}>
            <span className={styles.label}>{label}</span>
            <span className={styles.value} style={{ color: valueColor }}>
                {formatStatValue(value)}
            </span>
        </div>
    );
}
