/**
 * Turtle interpreter: folds an expanded sequence into a Scene.
 *
 * Each symbol resolves to one Action through the mapping and applies exactly
 * one state transition, in sequence order. Unknown symbols are no-ops, an
 * unbalanced pop or close is absorbed, and nothing here throws.
 */

import type { Action, ActionMapping, Bounds, Point, Scene, TurtleParams } from '../types/lsystem';
import { resolveAction } from './actions';

export const DEFAULT_DOT_RADIUS = 3;
export const DEFAULT_STEP_LENGTH_FACTOR = 1.5;
export const DEFAULT_LINE_WIDTH = 1;
export const DEFAULT_FILL_COLOR = '#22c55e';

interface SavedState {
    x: number;
    y: number;
    angle: number;
}

interface TurtleState {
    x: number;
    y: number;
    angle: number;
    stack: SavedState[];
    stepSize: number;
    turningAngle: number;
    lineWidth: number;
    fillColor: string;
    swapPlusMinus: boolean;
}

export function emptyScene(): Scene {
    return { segments: [], dots: [], polygons: [], filledPolygons: [] };
}

/**
 * Round to whole degrees, then wrap into [0, 360).
 * Sub-degree precision is dropped on every turn.
 */
export function quantizeHeading(degrees: number): number {
    const rounded = Math.round(degrees) % 360;
    return rounded < 0 ? rounded + 360 : rounded + 0;
}

export function interpret(sequence: string, mapping: ActionMapping, params: TurtleParams): Scene {
    const scene = emptyScene();
    const dotRadius = params.dotRadius ?? DEFAULT_DOT_RADIUS;
    const stepLengthFactor = params.stepLengthFactor ?? DEFAULT_STEP_LENGTH_FACTOR;

    const state: TurtleState = {
        x: params.startPosition.x,
        y: params.startPosition.y,
        angle: params.startAngle,
        stack: [],
        stepSize: params.stepSize,
        turningAngle: params.turningAngle,
        lineWidth: params.initialLineWidth ?? DEFAULT_LINE_WIDTH,
        fillColor: params.fillColor ?? DEFAULT_FILL_COLOR,
        swapPlusMinus: false,
    };

    const advance = (distance: number, draw: boolean) => {
        const rad = (state.angle * Math.PI) / 180;
        const start: Point = { x: state.x, y: state.y };
        state.x += distance * Math.cos(rad);
        state.y += distance * Math.sin(rad);

        if (draw) {
            scene.segments.push({
                start,
                end: { x: state.x, y: state.y },
                lineWidth: state.lineWidth,
            });
        }

        const openPolygon = scene.polygons[0];
        if (openPolygon) {
            openPolygon.push({ x: state.x, y: state.y });
        }
    };

    const turn = (delta: number) => {
        state.angle = quantizeHeading(state.angle + delta);
    };

    const apply = (action: Action) => {
        switch (action) {
            case 'moveForward':
                advance(state.stepSize, true);
                break;
            case 'moveFractionalForward':
                advance(params.fractionalStepSize, true);
                break;
            case 'moveWithoutDrawing':
                advance(state.stepSize, false);
                break;
            case 'turnLeft':
                turn(state.swapPlusMinus ? -state.turningAngle : state.turningAngle);
                break;
            case 'turnRight':
                turn(state.swapPlusMinus ? state.turningAngle : -state.turningAngle);
                break;
            case 'reverseDirection':
                turn(180);
                break;
            case 'pushState':
                state.stack.push({ x: state.x, y: state.y, angle: state.angle });
                break;
            case 'popState': {
                const saved = state.stack.pop();
                if (saved) {
                    state.x = saved.x;
                    state.y = saved.y;
                    state.angle = saved.angle;
                }
                break;
            }
            case 'incrementLineWidth':
                state.lineWidth += params.lineWidthIncrement;
                break;
            case 'decrementLineWidth':
                // No lower bound
                state.lineWidth -= params.lineWidthIncrement;
                break;
            case 'drawDot':
                scene.dots.push({ center: { x: state.x, y: state.y }, radius: dotRadius });
                break;
            case 'openPolygon':
                scene.polygons.unshift([]);
                break;
            case 'closePolygon': {
                const vertices = scene.polygons.shift();
                if (vertices) {
                    scene.filledPolygons.push({ vertices, fillColor: state.fillColor });
                }
                break;
            }
            case 'multiplyStepLength':
                state.stepSize *= stepLengthFactor;
                break;
            case 'divideStepLength':
                state.stepSize /= stepLengthFactor;
                break;
            case 'swapPlusMinus':
                state.swapPlusMinus = !state.swapPlusMinus;
                break;
            case 'incrementTurningAngle':
                state.turningAngle += params.turningAngleIncrement;
                break;
            case 'decrementTurningAngle':
                state.turningAngle -= params.turningAngleIncrement;
                break;
            case 'noAction':
                break;
            default: {
                const unreachable: never = action;
                return unreachable;
            }
        }
    };

    for (const symbol of sequence) {
        apply(resolveAction(mapping, symbol));
    }

    return scene;
}

/**
 * Bounding box of every drawable point in the scene, or null for an empty scene.
 */
export function sceneBounds(scene: Scene): Bounds | null {
    const bounds: Bounds = { minX: Infinity, minY: Infinity, maxX: -Infinity, maxY: -Infinity };

    const include = (p: Point, pad = 0) => {
        bounds.minX = Math.min(bounds.minX, p.x - pad);
        bounds.minY = Math.min(bounds.minY, p.y - pad);
        bounds.maxX = Math.max(bounds.maxX, p.x + pad);
        bounds.maxY = Math.max(bounds.maxY, p.y + pad);
    };

    for (const seg of scene.segments) {
        include(seg.start);
        include(seg.end);
    }
    for (const dot of scene.dots) {
        include(dot.center, dot.radius);
    }
    for (const polygon of scene.filledPolygons) {
        polygon.vertices.forEach((v) => include(v));
    }

    return bounds.minX === Infinity ? null : bounds;
}
