/**
 * Generator state and its transition function.
 *
 * All editor input, derived output and animation progress live in one
 * immutable record. Every user or clock action is a GeneratorEvent, and
 * generatorReducer(state, event) returns the next record without touching
 * the previous one.
 */

import { config } from '../config';
import { DEFAULT_ASSIGNMENTS, buildActionMapping } from '../lsystem/actions';
import { buildRuleTable, expand, predictLengths } from '../lsystem/expander';
import {
    DEFAULT_DOT_RADIUS,
    DEFAULT_FILL_COLOR,
    DEFAULT_LINE_WIDTH,
    DEFAULT_STEP_LENGTH_FACTOR,
    emptyScene,
    interpret,
} from '../lsystem/interpreter';
import { advanceProgress, primitiveCount } from '../lsystem/progress';
import type { Action, RuleEntry, Scene, SymbolAssignment, TurtleParams } from '../types/lsystem';
import { parseNumeric } from '../utils/numeric';
import type { Preset } from '../utils/presets';

export interface GeneratorParams {
    stepSize: number;
    fractionalStepSize: number;
    turningAngle: number;
    turningAngleIncrement: number;
    lineWidthIncrement: number;
    startX: number;
    startY: number;
    startAngle: number;
    initialLineWidth: number;
    dotRadius: number;
    stepLengthFactor: number;
}

export type NumericParam = keyof GeneratorParams;

export const NUMERIC_PARAMS: ReadonlyArray<NumericParam> = [
    'stepSize',
    'fractionalStepSize',
    'turningAngle',
    'turningAngleIncrement',
    'lineWidthIncrement',
    'startX',
    'startY',
    'startAngle',
    'initialLineWidth',
    'dotRadius',
    'stepLengthFactor',
];

export interface GeneratorColors {
    line: string;
    fill: string;
    background: string;
}

export type ColorTarget = keyof GeneratorColors;

export interface GeneratorState {
    axiom: string;
    rules: RuleEntry[];
    assignments: SymbolAssignment[];
    params: GeneratorParams;
    iterations: number;
    animationSpeed: number;
    colors: GeneratorColors;
    presetName: string | null;

    /** Expanded sequence of the last accepted generation */
    sequence: string;
    /** Predicted length per simulated iteration, index 0 is the axiom */
    lengths: number[];
    /** Predicted length after all iterations */
    predictedLength: number;
    scene: Scene;
    /** Bumped on every regeneration so views can refit */
    generation: number;

    progress: number;
    playing: boolean;

    /** Policy message, e.g. a refused expansion */
    notice: string | null;
    nextId: number;
}

export type GeneratorEvent =
    | { type: 'setAxiom'; axiom: string }
    | { type: 'addRule'; trigger?: string; replacement?: string }
    | { type: 'updateRule'; id: string; trigger?: string; replacement?: string }
    | { type: 'removeRule'; id: string }
    | { type: 'addAssignment'; symbol?: string; action?: Action }
    | { type: 'updateAssignment'; id: string; symbol?: string; action?: Action }
    | { type: 'removeAssignment'; id: string }
    | { type: 'setParam'; param: NumericParam; value: unknown }
    | { type: 'setIterations'; value: unknown }
    | { type: 'setAnimationSpeed'; value: unknown }
    | { type: 'setColor'; target: ColorTarget; color: string }
    | { type: 'applyPreset'; preset: Preset }
    | { type: 'generate' }
    | { type: 'tick'; elapsedMs: number }
    | { type: 'play' }
    | { type: 'pause' }
    | { type: 'reset' }
    | { type: 'dismissNotice' };

export interface GeneratorLimits {
    maxSequenceLength: number;
    maxExpansionWork: number;
    animationTimeScale: number;
}

export const DEFAULT_PARAMS: GeneratorParams = {
    stepSize: 10,
    fractionalStepSize: 5,
    turningAngle: 90,
    turningAngleIncrement: 1,
    lineWidthIncrement: 0.5,
    startX: 0,
    startY: 0,
    startAngle: 0,
    initialLineWidth: DEFAULT_LINE_WIDTH,
    dotRadius: DEFAULT_DOT_RADIUS,
    stepLengthFactor: DEFAULT_STEP_LENGTH_FACTOR,
};

export const DEFAULT_COLORS: GeneratorColors = {
    line: '#e2e8f0',
    fill: DEFAULT_FILL_COLOR,
    background: '#0f172a',
};

export const DEFAULT_ANIMATION_SPEED = 1;

function normalizeIterations(value: unknown): number {
    return Math.max(0, Math.floor(parseNumeric(value, 0)));
}

export function toTurtleParams(state: Pick<GeneratorState, 'params' | 'colors'>): TurtleParams {
    const { params } = state;
    return {
        stepSize: params.stepSize,
        fractionalStepSize: params.fractionalStepSize,
        turningAngle: params.turningAngle,
        turningAngleIncrement: params.turningAngleIncrement,
        lineWidthIncrement: params.lineWidthIncrement,
        startPosition: { x: params.startX, y: params.startY },
        startAngle: params.startAngle,
        initialLineWidth: params.initialLineWidth,
        fillColor: state.colors.fill,
        dotRadius: params.dotRadius,
        stepLengthFactor: params.stepLengthFactor,
    };
}

/**
 * Rebuild sequence and scene from the current inputs. Any previous scene and
 * in-flight progress are discarded.
 */
function regenerate(state: GeneratorState, limits: GeneratorLimits): GeneratorState {
    const rules = buildRuleTable(state.rules);
    const prediction = predictLengths(state.axiom, rules, state.iterations, {
        maxLength: limits.maxSequenceLength,
        maxWork: limits.maxExpansionWork,
    });
    const { lengths, finalLength } = prediction;

    if (prediction.overBudget) {
        const notice = prediction.overBudget === 'length'
            ? `Sequence would reach at least ${finalLength.toLocaleString('en-US')} symbols by iteration ${lengths.length - 1} of ${state.iterations} (limit ${limits.maxSequenceLength.toLocaleString('en-US')}). Lower the iteration count.`
            : `Expanding ${state.iterations.toLocaleString('en-US')} iterations would rewrite more than ${limits.maxExpansionWork.toLocaleString('en-US')} symbols. Lower the iteration count.`;
        return {
            ...state,
            sequence: '',
            lengths,
            predictedLength: finalLength,
            scene: emptyScene(),
            generation: state.generation + 1,
            progress: 0,
            playing: false,
            notice,
        };
    }

    const sequence = expand(state.axiom, rules, state.iterations);
    const scene = interpret(sequence, buildActionMapping(state.assignments), toTurtleParams(state));

    return {
        ...state,
        sequence,
        lengths,
        predictedLength: finalLength,
        scene,
        generation: state.generation + 1,
        progress: 0,
        playing: primitiveCount(scene) > 0,
        notice: null,
    };
}

function mergeAssignments(
    base: ReadonlyArray<SymbolAssignment>,
    overrides: Preset['assignments'],
    nextId: number
): { assignments: SymbolAssignment[]; nextId: number } {
    const assignments = base.map((a) => ({ ...a }));
    let id = nextId;
    for (const override of overrides) {
        const existing = assignments.findIndex((a) => a.symbol === override.symbol);
        if (existing >= 0) {
            assignments[existing] = { ...assignments[existing], action: override.action };
        } else {
            assignments.push({ id: `assignment-${id++}`, symbol: override.symbol, action: override.action });
        }
    }
    return { assignments, nextId: id };
}

function applyPreset(state: GeneratorState, preset: Preset): GeneratorState {
    let id = state.nextId;
    const rules = preset.rules.map((r) => ({ id: `rule-${id++}`, trigger: r.trigger, replacement: r.replacement }));
    const merged = mergeAssignments(DEFAULT_ASSIGNMENTS, preset.assignments, id);

    const params = { ...DEFAULT_PARAMS };
    for (const key of NUMERIC_PARAMS) {
        params[key] = parseNumeric(preset.params[key], DEFAULT_PARAMS[key]);
    }

    return {
        ...state,
        presetName: preset.name,
        axiom: preset.axiom,
        rules,
        assignments: merged.assignments,
        params,
        iterations: normalizeIterations(preset.iterations),
        nextId: merged.nextId,
    };
}

export function createGeneratorReducer(limits: GeneratorLimits) {
    return function generatorReducer(state: GeneratorState, event: GeneratorEvent): GeneratorState {
        switch (event.type) {
            case 'setAxiom':
                // Applied on the next 'generate'
                return { ...state, axiom: event.axiom };

            case 'addRule':
                return regenerate({
                    ...state,
                    rules: [
                        ...state.rules,
                        { id: `rule-${state.nextId}`, trigger: event.trigger ?? '', replacement: event.replacement ?? '' },
                    ],
                    nextId: state.nextId + 1,
                }, limits);

            case 'updateRule':
                return regenerate({
                    ...state,
                    rules: state.rules.map((r) => r.id === event.id
                        ? { ...r, trigger: event.trigger ?? r.trigger, replacement: event.replacement ?? r.replacement }
                        : r),
                }, limits);

            case 'removeRule':
                return regenerate({ ...state, rules: state.rules.filter((r) => r.id !== event.id) }, limits);

            case 'addAssignment':
                return regenerate({
                    ...state,
                    assignments: [
                        ...state.assignments,
                        { id: `assignment-${state.nextId}`, symbol: event.symbol ?? '', action: event.action ?? 'noAction' },
                    ],
                    nextId: state.nextId + 1,
                }, limits);

            case 'updateAssignment':
                return regenerate({
                    ...state,
                    assignments: state.assignments.map((a) => a.id === event.id
                        ? { ...a, symbol: event.symbol ?? a.symbol, action: event.action ?? a.action }
                        : a),
                }, limits);

            case 'removeAssignment':
                return regenerate({ ...state, assignments: state.assignments.filter((a) => a.id !== event.id) }, limits);

            case 'setParam':
                return regenerate({
                    ...state,
                    params: { ...state.params, [event.param]: parseNumeric(event.value, 0) },
                }, limits);

            case 'setIterations':
                return regenerate({ ...state, iterations: normalizeIterations(event.value) }, limits);

            case 'setAnimationSpeed':
                return { ...state, animationSpeed: Math.max(0, parseNumeric(event.value, 0)) };

            case 'setColor': {
                const next = { ...state, colors: { ...state.colors, [event.target]: event.color } };
                // Fill color is baked into filled polygons; the others only affect drawing
                return event.target === 'fill' ? regenerate(next, limits) : next;
            }

            case 'applyPreset':
                return regenerate(applyPreset(state, event.preset), limits);

            case 'generate':
                return regenerate(state, limits);

            case 'tick': {
                if (!state.playing) return state;
                const max = primitiveCount(state.scene);
                const progress = advanceProgress(state.progress, event.elapsedMs, state.animationSpeed, max, limits.animationTimeScale);
                const playing = progress < max;
                if (progress === state.progress && playing === state.playing) return state;
                return { ...state, progress, playing };
            }

            case 'play': {
                const max = primitiveCount(state.scene);
                if (max === 0) return state;
                return { ...state, playing: true, progress: state.progress >= max ? 0 : state.progress };
            }

            case 'pause':
                return state.playing ? { ...state, playing: false } : state;

            case 'reset':
                return {
                    ...state,
                    sequence: '',
                    lengths: [],
                    predictedLength: 0,
                    scene: emptyScene(),
                    progress: 0,
                    playing: false,
                };

            case 'dismissNotice':
                return { ...state, notice: null };

            default: {
                const unreachable: never = event;
                return unreachable;
            }
        }
    };
}

export const generatorReducer = createGeneratorReducer(config);

/**
 * Fresh state, optionally seeded from a preset and generated right away.
 */
export function createInitialState(preset?: Preset, limits: GeneratorLimits = config): GeneratorState {
    const base: GeneratorState = {
        axiom: '',
        rules: [],
        assignments: DEFAULT_ASSIGNMENTS.map((a) => ({ ...a })),
        params: { ...DEFAULT_PARAMS },
        iterations: 0,
        animationSpeed: DEFAULT_ANIMATION_SPEED,
        colors: { ...DEFAULT_COLORS },
        presetName: null,
        sequence: '',
        lengths: [],
        predictedLength: 0,
        scene: emptyScene(),
        generation: 0,
        progress: 0,
        playing: false,
        notice: null,
        nextId: 1,
    };
    return preset ? regenerate(applyPreset(base, preset), limits) : regenerate(base, limits);
}
