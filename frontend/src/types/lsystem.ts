/**
 * Core data model for the L-system studio
 *
 * Shared by the expander, the turtle interpreter, the progressive renderer
 * and the generator state. Nothing in here depends on React or the DOM.
 */

/** A single character of an L-system sequence */
export type LSymbol = string;

/**
 * A production rule as edited in the UI. Entries keep a stable id so the
 * editor can key rows; only trigger and replacement matter to expansion.
 */
export interface RuleEntry {
    id: string;
    trigger: LSymbol;
    replacement: string;
}

/** Trigger symbol -> replacement sequence */
export type RuleTable = ReadonlyMap<LSymbol, string>;

export const ACTIONS = [
    'moveForward',
    'moveFractionalForward',
    'moveWithoutDrawing',
    'turnLeft',
    'turnRight',
    'reverseDirection',
    'pushState',
    'popState',
    'incrementLineWidth',
    'decrementLineWidth',
    'drawDot',
    'openPolygon',
    'closePolygon',
    'multiplyStepLength',
    'divideStepLength',
    'swapPlusMinus',
    'incrementTurningAngle',
    'decrementTurningAngle',
    'noAction',
] as const;

/** Turtle command. Closed set; the interpreter matches on it exhaustively. */
export type Action = (typeof ACTIONS)[number];

export interface SymbolAssignment {
    id: string;
    symbol: LSymbol;
    action: Action;
}

export type ActionMapping = ReadonlyMap<LSymbol, Action>;

export interface Point {
    x: number;
    y: number;
}

export interface TurtleParams {
    stepSize: number;
    fractionalStepSize: number;
    /** Degrees */
    turningAngle: number;
    turningAngleIncrement: number;
    lineWidthIncrement: number;
    startPosition: Point;
    /** Degrees, 0 = +x axis */
    startAngle: number;
    initialLineWidth?: number;
    fillColor?: string;
    dotRadius?: number;
    /** Factor used by multiplyStepLength / divideStepLength */
    stepLengthFactor?: number;
}

export interface Segment {
    start: Point;
    end: Point;
    lineWidth: number;
}

export interface Dot {
    center: Point;
    radius: number;
}

export interface FilledPolygon {
    vertices: Point[];
    fillColor: string;
}

/**
 * Output of one interpretation pass. `polygons` holds the polygons still
 * open at the end of the pass, topmost first.
 */
export interface Scene {
    segments: Segment[];
    dots: Dot[];
    polygons: Point[][];
    filledPolygons: FilledPolygon[];
}

export interface Bounds {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

export type RenderPrimitive =
    | { kind: 'polygon'; index: number; vertices: Point[]; fillColor: string }
    | { kind: 'line'; index: number; start: Point; end: Point; lineWidth: number }
    | { kind: 'dot'; index: number; center: Point; radius: number };
