/**
 * Symbol-to-action mapping used by the turtle interpreter.
 */

import { ACTIONS, type Action, type ActionMapping, type LSymbol, type SymbolAssignment } from '../types/lsystem';

export const ACTION_LABELS: Record<Action, string> = {
    moveForward: 'Move forward',
    moveFractionalForward: 'Move forward (fractional step)',
    moveWithoutDrawing: 'Move without drawing',
    turnLeft: 'Turn left',
    turnRight: 'Turn right',
    reverseDirection: 'Reverse direction',
    pushState: 'Push state',
    popState: 'Pop state',
    incrementLineWidth: 'Increment line width',
    decrementLineWidth: 'Decrement line width',
    drawDot: 'Draw dot',
    openPolygon: 'Open polygon',
    closePolygon: 'Close polygon',
    multiplyStepLength: 'Multiply step length',
    divideStepLength: 'Divide step length',
    swapPlusMinus: 'Swap plus/minus',
    incrementTurningAngle: 'Increment turning angle',
    decrementTurningAngle: 'Decrement turning angle',
    noAction: 'No action',
};

export const DEFAULT_ASSIGNMENTS: ReadonlyArray<SymbolAssignment> = [
    { id: 'default-F', symbol: 'F', action: 'moveForward' },
    { id: 'default-G', symbol: 'G', action: 'moveFractionalForward' },
    { id: 'default-plus', symbol: '+', action: 'turnLeft' },
    { id: 'default-minus', symbol: '-', action: 'turnRight' },
    { id: 'default-push', symbol: '[', action: 'pushState' },
    { id: 'default-pop', symbol: ']', action: 'popState' },
    { id: 'default-X', symbol: 'X', action: 'noAction' },
];

export function isAction(value: string): value is Action {
    return ACTIONS.some((action) => action === value);
}

/**
 * Later assignments for the same symbol override earlier ones.
 */
export function buildActionMapping(assignments: ReadonlyArray<Pick<SymbolAssignment, 'symbol' | 'action'>>): ActionMapping {
    const mapping = new Map<LSymbol, Action>();
    for (const { symbol, action } of assignments) {
        const key = [...symbol][0];
        if (!key) continue;
        mapping.set(key, action);
    }
    return mapping;
}

export function resolveAction(mapping: ActionMapping, symbol: LSymbol): Action {
    return mapping.get(symbol) ?? 'noAction';
}
