import { jest, describe, test, expect, beforeEach, afterEach } from '@jest/globals';
import { BindingEngine } from '../../Kernel.js';
import { defineUnit } from '../../L2/UnitFactory.js';
import type { UnitInit } from '../../L2/UnitFactory.js';
import { createContext, withStateUpdate } from '../../L2/Context.js';
import type { ContextInit } from '../../L2/Context.js';

const NOW = new Date('2024-11-16T12:00:00Z');

const unit = (init: Omit<UnitInit, 'type'>) => defineUnit({ type: 'EVENT:test', ...init });
const ctx = (init: ContextInit = {}) => createContext({ timestamp: NOW, ...init });

describe('Cascade Scheduler', () => {
    let engine: BindingEngine;

    beforeEach(() => {
        engine = new BindingEngine({ clock: { now: () => NOW }, logLevel: 'silent' });
    });

    test('dependencies bind across rounds regardless of registration order', () => {
        engine.register(unit({ id: 'C', dependsOn: ['B'] }));
        engine.register(unit({ id: 'B', dependsOn: ['A'] }));
        engine.register(unit({ id: 'A' }));

        const { bound } = engine.sweep(ctx());
        expect(bound.map(b => b.unitId)).toEqual(['A', 'B', 'C']);
        // Latent units are never attempted, so only the three successes are logged.
        expect(engine.attempts().map(a => a.success)).toEqual([true, true, true]);
    });

    test('dependencies registered first bind within one round', () => {
        engine.register(unit({ id: 'A' }));
        engine.register(unit({ id: 'B', dependsOn: ['A'] }));
        engine.register(unit({ id: 'C', dependsOn: ['B'] }));

        // Registration order lets A and B bind in the same round.
        expect(engine.sweep(ctx(), 1).bound.map(b => b.unitId)).toEqual(['A', 'B', 'C']);
    });

    test('maxRounds stops a reverse-ordered chain early', () => {
        engine.register(unit({ id: 'C', dependsOn: ['B'] }));
        engine.register(unit({ id: 'B', dependsOn: ['A'] }));
        engine.register(unit({ id: 'A' }));

        expect(engine.sweep(ctx(), 2).bound.map(b => b.unitId)).toEqual(['A', 'B']);
        expect(engine.isSatisfied('C')).toBe(false);
    });

    test('state mutations open guards in the next round', () => {
        engine.register(unit({ id: 'P', payload: { stateMutation: { hasKey: true } } }));
        engine.register(unit({ id: 'Q', guard: { state: { hasKey: true } } }));

        const { bound, context } = engine.sweep(ctx({ state: { hasKey: false } }));

        expect(bound.map(b => b.unitId)).toEqual(['P', 'Q']);
        expect(bound[0]?.stateChanges).toEqual([{ key: 'hasKey', old: false, new: true }]);
        expect(bound[1]?.stateChanges).toBeUndefined();
        expect(bound[1]?.context.state).toEqual({ hasKey: true });
        expect(context.state).toEqual({ hasKey: true });

        const [record] = engine.attempts('P');
        expect(record?.success && record.stateChanges).toEqual([{ key: 'hasKey', old: false, new: true }]);
    });

    test('mutations can be switched off', () => {
        engine.register(unit({ id: 'P', payload: { stateMutation: { hasKey: true } } }));
        engine.register(unit({ id: 'Q', guard: { state: { hasKey: true } } }));

        const { bound, context } = engine.sweep(ctx({ state: { hasKey: false } }), 10, false);
        expect(bound.map(b => b.unitId)).toEqual(['P']);
        expect(context.state).toEqual({ hasKey: false });
    });

    test('later mutations in a round win', () => {
        engine.register(unit({ id: 'X', payload: { stateMutation: { color: 'red' } } }));
        engine.register(unit({ id: 'Y', payload: { stateMutation: { color: 'blue' } } }));

        const { bound, context } = engine.sweep(ctx());
        expect(context.state).toEqual({ color: 'blue' });
        expect(bound.map(b => b.stateChanges)).toEqual([
            [{ key: 'color', old: null, new: 'red' }],
            [{ key: 'color', old: 'red', new: 'blue' }]
        ]);
    });

    test('a mutation that is not a plain map is ignored', () => {
        engine.register(unit({ id: 'M', payload: { stateMutation: ['not', 'a', 'map'] } }));
        const { bound, context } = engine.sweep(ctx({ state: { k: 1 } }));
        expect(bound[0]?.stateChanges).toBeUndefined();
        expect(context.state).toEqual({ k: 1 });
    });

    test('reusable units bind once per round', () => {
        engine.register(unit({ id: 'R', consumption: 'REUSABLE' }));
        engine.register(unit({ id: 'O' }));

        const { bound } = engine.sweep(ctx(), 3);
        expect(bound.map(b => b.unitId)).toEqual(['R', 'O', 'R', 'R']);
        expect(engine.ledger('R').filter(t => t.to === 'ACTIVATED')).toHaveLength(3);
    });

    test('temporal guards decide admission against the context time', () => {
        engine.register(unit({ id: 'future', guard: { when: 'after:2099-01-01T00:00:00Z' } }));
        engine.register(unit({ id: 'past', guard: { when: 'after:2020-01-01T00:00:00Z' } }));
        engine.register(unit({ id: 'deadline', guard: { when: 'before:2020-01-01T00:00:00Z' } }));

        expect(engine.sweep(ctx()).bound.map(b => b.unitId)).toEqual(['past']);
        expect(engine.explain('future')).toBe("Unit 'future' was never attempted for binding");
        expect(engine.ledger('deadline').map(t => t.to)).toEqual(['DORMANT']);
    });

    test('a unit gated behind an unbound dependency is never attempted', () => {
        engine.register(unit({ id: 'C', dependsOn: ['B'] }));
        engine.register(unit({ id: 'B', dependsOn: ['A'], guard: { actors: ['bob'] } }));
        engine.register(unit({ id: 'A' }));

        const { bound } = engine.sweep(ctx());
        expect(bound.map(b => b.unitId)).toEqual(['A']);
        expect(engine.attempts().map(a => a.unitId)).toEqual(['A']);
        expect(engine.explain('C')).toBe("Unit 'C' was never attempted for binding");
    });

    test('satisfaction persists across sweeps', () => {
        engine.register(unit({ id: 'A', guard: { actors: ['alice'] } }));
        engine.register(unit({ id: 'B', dependsOn: ['A'], guard: { actors: ['bob'] } }));

        engine.sweep(ctx({ actor: 'alice' }));
        expect(engine.satisfiedIds()).toEqual(['A']);

        const { bound } = engine.sweep(ctx({ actor: 'bob' }));
        expect(bound.map(b => b.unitId)).toEqual(['B']);
    });
});

describe('Evolution', () => {
    test('runs until a turn activates nothing new', () => {
        const engine = new BindingEngine({ clock: { now: () => NOW }, logLevel: 'silent' });
        engine.register(unit({ id: 'A' }));
        engine.register(unit({ id: 'G', guard: { state: { gate: true } } }));

        const turns: number[] = [];
        const { context, turnsUsed } = engine.evolveUntilConverged(ctx(), 10, (_engine, current, turn) => {
            turns.push(turn);
            return withStateUpdate(current, 'gate', true);
        });

        expect(turns).toEqual([0, 1]);
        expect(turnsUsed).toBe(3);
        expect(context.state).toEqual({ gate: true });
        expect(engine.satisfiedIds()).toEqual(['A', 'G']);
    });

    test('stops at maxTurns', () => {
        const engine = new BindingEngine({ clock: { now: () => NOW }, logLevel: 'silent' });
        engine.register(unit({ id: 'A' }));
        expect(engine.evolveUntilConverged(ctx(), 1).turnsUsed).toBe(1);
    });

    test('nothing to bind converges on the first turn', () => {
        const engine = new BindingEngine({ clock: { now: () => NOW }, logLevel: 'silent' });
        expect(engine.evolveUntilConverged(ctx()).turnsUsed).toBe(1);
    });
});

describe('Cascade rounds', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('a sweep stops after the first round that binds nothing', () => {
        const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
        const engine = new BindingEngine({ clock: { now: () => NOW }, logLevel: 'debug' });
        engine.register(unit({ id: 'A' }));

        const { bound } = engine.sweep(ctx(), 10);
        expect(bound.map(b => b.unitId)).toEqual(['A']);
        expect(debug.mock.calls).toEqual([
            ['[Cascade] Round 1: 1 bound'],
            ['[Cascade] Round 2: 0 bound']
        ]);
    });
});
