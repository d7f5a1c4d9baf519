/**
 * Button with the studio's shared variants
 */

import type { ButtonHTMLAttributes, ReactNode } from 'react';
import styles from './Button.module.css';

export type ButtonVariant = 'primary' | 'success' | 'secondary' | 'danger' | 'ghost';
export type ButtonSize = 'normal' | 'small';

interface ButtonProps extends ButtonHTMLAttributes<HTMLButtonElement> {
    variant?: ButtonVariant;
    size?: ButtonSize;
    children: ReactNode;
}

export function Button({ variant = 'primary', size = 'normal', children, className = '', type = 'button', ...props }: ButtonProps) {
    const classes = [styles.button, styles[variant], size === 'small' ? styles.small : '', className]
        .filter(Boolean)
        .join(' ');

    return (
        <button type={type} className={classes} {...props}>
            {children}
        </button>
    );
}
