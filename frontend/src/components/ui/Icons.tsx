/**
 * SVG icons for the studio controls. All icons use currentColor.
 */

import type { CSSProperties, ReactNode } from 'react';

interface IconProps {
    size?: number;
    className?: string;
    style?: CSSProperties;
}

const defaultSize = 16;

function FilledIcon({ size = defaultSize, className, style, children }: IconProps & { children: ReactNode }) {
    return (
        <svg width={size} height={size} viewBox="0 0 24 24" fill="currentColor" className={className} style={style}>
            {children}
        </svg>
    );
}

function StrokeIcon({ size = defaultSize, className, style, children }: IconProps & { children: ReactNode }) {
    return (
        <svg
            width={size}
            height={size}
            viewBox="0 0 24 24"
            fill="none"
            stroke="currentColor"
            strokeWidth="2"
            strokeLinecap="round"
            strokeLinejoin="round"
            className={className}
            style={style}
        >
            {children}
        </svg>
    );
}

export function PlayIcon(props: IconProps) {
    return (
        <FilledIcon {...props}>
            <polygon points="5,3 19,12 5,21" />
        </FilledIcon>
    );
}

export function PauseIcon(props: IconProps) {
    return (
        <FilledIcon {...props}>
            <rect x="6" y="4" width="4" height="16" rx="1" />
            <rect x="14" y="4" width="4" height="16" rx="1" />
        </FilledIcon>
    );
}

export function ResetIcon(props: IconProps) {
    return (
        <StrokeIcon {...props}>
            <path d="M3 12a9 9 0 1 0 9-9 9.75 9.75 0 0 0-6.74 2.74L3 8" />
            <path d="M3 3v5h5" />
        </StrokeIcon>
    );
}

/** Branching glyph used for the generate action */
export function BranchIcon(props: IconProps) {
    return (
        <StrokeIcon {...props}>
            <path d="M12 22V12" />
            <path d="M12 12L6 6" />
            <path d="M12 12l6-6" />
            <path d="M6 6V2" />
            <path d="M18 6V2" />
        </StrokeIcon>
    );
}

export function ChevronLeftIcon(props: IconProps) {
    return (
        <StrokeIcon {...props}>
            <polyline points="15,18 9,12 15,6" />
        </StrokeIcon>
    );
}

export function ChevronRightIcon(props: IconProps) {
    return (
        <StrokeIcon {...props}>
            <polyline points="9,6 15,12 9,18" />
        </StrokeIcon>
    );
}

export function TrashIcon(props: IconProps) {
    return (
        <StrokeIcon {...props}>
            <polyline points="3,6 5,6 21,6" />
            <path d="M19 6l-1 14H6L5 6" />
            <path d="M10 11v6" />
            <path d="M14 11v6" />
        </StrokeIcon>
    );
}
