/**
 * Unit tests for the generator state transitions.
 * Runs the reducer directly, no React needed.
 */

import { describe, it, expect } from 'vitest';
import {
    createGeneratorReducer,
    createInitialState,
    type GeneratorEvent,
    type GeneratorState,
} from './generatorReducer';
import type { Preset } from '../utils/presets';

const limits = { maxSequenceLength: 1000, maxExpansionWork: 20000, animationTimeScale: 10 };
const reduce = createGeneratorReducer(limits);

const kochPreset: Preset = {
    name: 'Test Koch',
    description: '',
    axiom: 'F',
    rules: [{ trigger: 'F', replacement: 'F+F--F+F' }],
    iterations: 1,
    params: { turningAngle: 60, stepSize: 1 },
    assignments: [],
};

function run(state: GeneratorState, ...events: GeneratorEvent[]): GeneratorState {
    return events.reduce(reduce, state);
}

describe('generatorReducer', () => {
    describe('initial state', () => {
        it('should generate the preset right away', () => {
            const state = createInitialState(kochPreset, limits);
            expect(state.presetName).toBe('Test Koch');
            expect(state.sequence).toBe('F+F--F+F');
            expect(state.lengths).toEqual([1, 8]);
            expect(state.predictedLength).toBe(8);
            expect(state.scene.segments).toHaveLength(4);
            expect(state.progress).toBe(0);
            expect(state.playing).toBe(true);
            expect(state.notice).toBeNull();
        });

        it('should start idle without a preset', () => {
            const state = createInitialState(undefined, limits);
            expect(state.sequence).toBe('');
            expect(state.scene.segments).toEqual([]);
            expect(state.playing).toBe(false);
        });

        it('should fall back to defaults for non-numeric preset values', () => {
            const state = createInitialState({ ...kochPreset, params: { stepSize: 'oops', turningAngle: 60 } }, limits);
            expect(state.params.stepSize).toBe(10);
            expect(state.params.turningAngle).toBe(60);
        });
    });

    describe('axiom application', () => {
        it('should only regenerate on generate', () => {
            const initial = createInitialState(kochPreset, limits);
            const edited = reduce(initial, { type: 'setAxiom', axiom: 'F+F' });
            expect(edited.axiom).toBe('F+F');
            expect(edited.sequence).toBe('F+F--F+F');
            expect(edited.generation).toBe(initial.generation);

            const applied = reduce(edited, { type: 'generate' });
            expect(applied.sequence).toBe('F+F--F+F+F+F--F+F');
            expect(applied.generation).toBe(initial.generation + 1);
        });
    });

    describe('animation', () => {
        it('should advance progress on ticks and stop at the primitive count', () => {
            const initial = createInitialState(kochPreset, limits);
            const stepped = reduce(initial, { type: 'tick', elapsedMs: 20 });
            expect(stepped.progress).toBe(2);
            expect(stepped.playing).toBe(true);

            const finished = reduce(stepped, { type: 'tick', elapsedMs: 1000 });
            expect(finished.progress).toBe(4);
            expect(finished.playing).toBe(false);

            expect(reduce(finished, { type: 'tick', elapsedMs: 50 })).toBe(finished);
        });

        it('should scale progress by animation speed', () => {
            const state = run(
                createInitialState(kochPreset, limits),
                { type: 'setAnimationSpeed', value: 0.5 },
                { type: 'tick', elapsedMs: 40 }
            );
            expect(state.progress).toBe(2);
        });

        it('should clamp animation speed at zero', () => {
            const state = reduce(createInitialState(kochPreset, limits), { type: 'setAnimationSpeed', value: -2 });
            expect(state.animationSpeed).toBe(0);
        });

        it('should ignore ticks while paused', () => {
            const paused = reduce(createInitialState(kochPreset, limits), { type: 'pause' });
            expect(paused.playing).toBe(false);
            expect(reduce(paused, { type: 'tick', elapsedMs: 100 })).toBe(paused);
        });

        it('should replay from the start once finished', () => {
            const finished = run(createInitialState(kochPreset, limits), { type: 'tick', elapsedMs: 1000 });
            const replay = reduce(finished, { type: 'play' });
            expect(replay.playing).toBe(true);
            expect(replay.progress).toBe(0);
        });

        it('should resume from the current progress', () => {
            const state = run(
                createInitialState(kochPreset, limits),
                { type: 'tick', elapsedMs: 10 },
                { type: 'pause' },
                { type: 'play' }
            );
            expect(state.playing).toBe(true);
            expect(state.progress).toBe(1);
        });

        it('should not play an empty scene', () => {
            const empty = createInitialState(undefined, limits);
            expect(reduce(empty, { type: 'play' })).toBe(empty);
        });
    });

    describe('reset', () => {
        it('should clear the scene and progress', () => {
            const state = run(createInitialState(kochPreset, limits), { type: 'tick', elapsedMs: 20 }, { type: 'reset' });
            expect(state.progress).toBe(0);
            expect(state.playing).toBe(false);
            expect(state.sequence).toBe('');
            expect(state.scene).toEqual({ segments: [], dots: [], polygons: [], filledPolygons: [] });
            expect(state.axiom).toBe('F');
        });
    });

    describe('rule editing', () => {
        it('should regenerate and restart progress when a rule changes', () => {
            const stepped = run(createInitialState(kochPreset, limits), { type: 'tick', elapsedMs: 20 });
            const ruleId = stepped.rules[0].id;
            const edited = reduce(stepped, { type: 'updateRule', id: ruleId, replacement: 'FF' });
            expect(edited.sequence).toBe('FF');
            expect(edited.progress).toBe(0);
            expect(edited.scene.segments).toHaveLength(2);
        });

        it('should let the last added rule for a trigger win', () => {
            const state = reduce(createInitialState(kochPreset, limits), { type: 'addRule', trigger: 'F', replacement: 'F-F' });
            expect(state.rules).toHaveLength(2);
            expect(state.sequence).toBe('F-F');
        });

        it('should fall back to the axiom when the rule is removed', () => {
            const initial = createInitialState(kochPreset, limits);
            const state = reduce(initial, { type: 'removeRule', id: initial.rules[0].id });
            expect(state.rules).toEqual([]);
            expect(state.sequence).toBe('F');
        });

        it('should not mutate the previous state', () => {
            const initial = createInitialState(kochPreset, limits);
            const rulesBefore = initial.rules;
            reduce(initial, { type: 'addRule', trigger: 'G', replacement: 'GG' });
            expect(initial.rules).toBe(rulesBefore);
            expect(initial.rules).toHaveLength(1);
        });
    });

    describe('symbol assignments', () => {
        it('should regenerate when an assignment changes', () => {
            const initial = createInitialState(kochPreset, limits);
            const forward = initial.assignments.find((a) => a.symbol === 'F');
            expect(forward).toBeDefined();

            const state = reduce(initial, { type: 'updateAssignment', id: forward?.id ?? '', action: 'drawDot' });
            expect(state.scene.segments).toEqual([]);
            expect(state.scene.dots).toHaveLength(4);
        });

        it('should merge preset assignments over the defaults', () => {
            const state = createInitialState({
                ...kochPreset,
                assignments: [
                    { symbol: 'F', action: 'drawDot' },
                    { symbol: '{', action: 'openPolygon' },
                ],
            }, limits);

            const forward = state.assignments.find((a) => a.symbol === 'F');
            expect(forward).toEqual({ id: 'default-F', symbol: 'F', action: 'drawDot' });
            expect(state.assignments[state.assignments.length - 1]).toEqual({
                id: 'assignment-2',
                symbol: '{',
                action: 'openPolygon',
            });
        });

        it('should add and remove assignments', () => {
            const added = reduce(createInitialState(kochPreset, limits), { type: 'addAssignment', symbol: '.', action: 'drawDot' });
            const dot = added.assignments.find((a) => a.symbol === '.');
            expect(dot?.action).toBe('drawDot');

            const removed = reduce(added, { type: 'removeAssignment', id: dot?.id ?? '' });
            expect(removed.assignments.some((a) => a.symbol === '.')).toBe(false);
        });
    });

    describe('parameters', () => {
        it('should normalize non-numeric input to zero', () => {
            const state = reduce(createInitialState(kochPreset, limits), { type: 'setParam', param: 'stepSize', value: 'abc' });
            expect(state.params.stepSize).toBe(0);
        });

        it('should apply numeric strings', () => {
            const state = reduce(createInitialState(kochPreset, limits), { type: 'setParam', param: 'stepSize', value: '2' });
            expect(state.params.stepSize).toBe(2);
            expect(state.scene.segments[0].end.x).toBeCloseTo(2, 9);
        });

        it('should floor the iteration count', () => {
            const state = reduce(createInitialState(kochPreset, limits), { type: 'setIterations', value: '2.8' });
            expect(state.iterations).toBe(2);
            expect(state.sequence).toHaveLength(36);
        });
    });

    describe('runaway guard', () => {
        it('should refuse expansions beyond the sequence limit', () => {
            const state = reduce(createInitialState(kochPreset, limits), { type: 'setIterations', value: 10 });
            expect(state.sequence).toBe('');
            expect(state.scene.segments).toEqual([]);
            expect(state.playing).toBe(false);
            expect(state.lengths).toEqual([1, 8, 36, 148, 596, 2388]);
            expect(state.predictedLength).toBe(2388);
            expect(state.notice).toBe(
                'Sequence would reach at least 2,388 symbols by iteration 5 of 10 (limit 1,000). Lower the iteration count.'
            );
        });

        it('should accept a huge iteration count once the sequence is stable', () => {
            const stable: Preset = { ...kochPreset, axiom: 'X', rules: [{ trigger: 'X', replacement: 'X' }] };
            const state = reduce(createInitialState(stable, limits), { type: 'setIterations', value: '1000000000' });
            expect(state.iterations).toBe(1_000_000_000);
            expect(state.sequence).toBe('X');
            expect(state.lengths).toEqual([1]);
            expect(state.predictedLength).toBe(1);
            expect(state.notice).toBeNull();
        });

        it('should refuse a huge iteration count that would keep rewriting', () => {
            const swap: Preset = {
                ...kochPreset,
                axiom: 'A',
                rules: [
                    { trigger: 'A', replacement: 'B' },
                    { trigger: 'B', replacement: 'A' },
                ],
            };
            const state = reduce(createInitialState(swap, limits), { type: 'setIterations', value: 1e9 });
            expect(state.sequence).toBe('');
            expect(state.playing).toBe(false);
            expect(state.lengths).toEqual([1, 1, 1]);
            expect(state.notice).toBe(
                'Expanding 1,000,000,000 iterations would rewrite more than 20,000 symbols. Lower the iteration count.'
            );
        });

        it('should clear the notice on dismiss and on the next accepted generation', () => {
            const refused = reduce(createInitialState(kochPreset, limits), { type: 'setIterations', value: 10 });
            expect(reduce(refused, { type: 'dismissNotice' }).notice).toBeNull();
            expect(reduce(refused, { type: 'setIterations', value: 2 }).notice).toBeNull();
        });
    });

    describe('colors', () => {
        it('should regenerate on fill color changes only', () => {
            const polygonPreset: Preset = {
                ...kochPreset,
                axiom: '{F+F+F}',
                rules: [],
                params: { turningAngle: 120 },
                assignments: [
                    { symbol: '{', action: 'openPolygon' },
                    { symbol: '}', action: 'closePolygon' },
                ],
            };
            const initial = createInitialState(polygonPreset, limits);

            const filled = reduce(initial, { type: 'setColor', target: 'fill', color: '#abcdef' });
            expect(filled.scene.filledPolygons[0].fillColor).toBe('#abcdef');
            expect(filled.generation).toBe(initial.generation + 1);

            const lined = reduce(initial, { type: 'setColor', target: 'line', color: '#000000' });
            expect(lined.colors.line).toBe('#000000');
            expect(lined.generation).toBe(initial.generation);
        });
    });
});
