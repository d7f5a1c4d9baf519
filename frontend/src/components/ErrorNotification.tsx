/**
 * Toast stack for errors raised outside the generator core
 */

import type { ErrorNotification as ErrorNotificationType } from '../hooks/useErrorNotification';
import styles from './ErrorNotification.module.css';

interface ErrorNotificationProps {
    errors: ErrorNotificationType[];
    onDismiss: (id: number) => void;
}

export function ErrorNotification({ errors, onDismiss }: ErrorNotificationProps) {
    if (errors.length === 0) return null;

    return (
        <div className={styles.stack} role="alert">
            {errors.map(error => (
                <div key={error.id} className={styles.toast}>
                    <div className={styles.body}>
                        <div className={styles.heading}>
                            Error at {new Date(error.timestamp).toLocaleTimeString()}
                        </div>
                        <div className={styles.message}>{error.message}</div>
                    </div>
                    <button
                        className={styles.dismiss}
                        onClick={() => onDismiss(error.id)}
                        aria-label="Dismiss error"
                    >
                        ×
                    </button>
                </div>
            ))}
        </div>
    );
}
