/**
 * User-visible error toasts for failures outside the pure core
 * (canvas setup, render loop, preset loading).
 */

import { useState, useCallback, useEffect, useRef } from 'react';

export interface ErrorNotification {
    id: number;
    message: string;
    timestamp: number;
}

const AUTO_DISMISS_MS = 10000;

export function formatErrorMessage(error: unknown, context?: string): string {
    const message = error instanceof Error ? error.message : String(error);
    return context ? `${context}: ${message}` : message;
}

export function useErrorNotification(autoDismissMs: number = AUTO_DISMISS_MS) {
    const [errors, setErrors] = useState<ErrorNotification[]>([]);
    const nextIdRef = useRef(1);
    const timersRef = useRef(new Map<number, ReturnType<typeof setTimeout>>());

    const clearError = useCallback((id: number) => {
        const timer = timersRef.current.get(id);
        if (timer !== undefined) {
            clearTimeout(timer);
            timersRef.current.delete(id);
        }
        setErrors(prev => prev.filter(e => e.id !== id));
    }, []);

    const addError = useCallback((error: unknown, context?: string) => {
        const message = formatErrorMessage(error, context);
        console.error(`[Error] ${message}`, error);

        const notification: ErrorNotification = {
            id: nextIdRef.current++,
            message,
            timestamp: Date.now()
        };
        setErrors(prev => [...prev, notification]);

        if (autoDismissMs > 0) {
            timersRef.current.set(notification.id, setTimeout(() => clearError(notification.id), autoDismissMs));
        }
    }, [autoDismissMs, clearError]);

    // Pending timers must not fire after unmount
    useEffect(() => {
        const timers = timersRef.current;
        return () => {
            timers.forEach(timer => clearTimeout(timer));
            timers.clear();
        };
    }, []);

    return {
        errors,
        addError,
        clearError
    };
}
