/**
 * Shared UI components barrel export
 */

export { Panel } from './Panel';
export { Button } from './Button';
export type { ButtonVariant, ButtonSize } from './Button';
export { CollapsibleSection } from './CollapsibleSection';
export { StatRow } from './StatRow';
export { PlayIcon, PauseIcon, ResetIcon, BranchIcon, ChevronLeftIcon, ChevronRightIcon, TrashIcon } from './Icons';
export { DraftInput } from './DraftInput';
