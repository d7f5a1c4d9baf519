/**
 * Catches render errors below it and shows a recoverable message
 */

import { Component, type ErrorInfo, type ReactNode } from 'react';
import { Button } from './ui';

interface ErrorBoundaryProps {
    children: ReactNode;
}

interface ErrorBoundaryState {
    error: Error | null;
}

export class ErrorBoundary extends Component<ErrorBoundaryProps, ErrorBoundaryState> {
    state: ErrorBoundaryState = { error: null };

    static getDerivedStateFromError(error: Error): ErrorBoundaryState {
        return { error };
    }

    componentDidCatch(error: Error, info: ErrorInfo) {
        console.error('[ErrorBoundary] Render error:', error, info.componentStack);
    }

    handleRetry = () => {
        this.setState({ error: null });
    };

    render() {
        const { error } = this.state;
        if (!error) return this.props.children;

        return (
            <div style={{
                minHeight: '100vh',
                display: 'flex',
                alignItems: 'center',
                justifyContent: 'center',
                padding: 32,
                backgroundColor: 'var(--color-bg)',
                color: 'var(--color-text)',
            }}>
                <div style={{
                    maxWidth: 520,
                    width: '100%',
                    padding: 24,
                    borderRadius: 12,
                    border: '1px solid var(--color-border)',
                    background: 'var(--color-surface)',
                }}>
                    <h1 style={{ fontSize: 18, margin: 0 }}>Something went wrong</h1>
                    <pre style={{
                        marginTop: 16,
                        padding: 12,
                        maxHeight: 160,
                        overflow: 'auto',
                        fontSize: 12,
                        borderRadius: 8,
                        background: 'rgba(0,0,0,0.4)',
                        whiteSpace: 'pre-wrap',
                    }}>
                        {error.message || 'Unexpected error'}
                    </pre>
                    <Button variant="primary" onClick={this.handleRetry} style={{ marginTop: 16 }}>
                        Try again
                    </Button>
                </div>
            </div>
        );
    }
}
