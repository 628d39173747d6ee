import { describe, test, expect } from '@jest/globals';
import { canTransition, createTransition } from '../Lifecycle.js';
import type { UnitState } from '../Lifecycle.js';
import { BindingError, ErrorCode, IllegalTransitionError } from '../../Errors.js';

describe('Unit Lifecycle', () => {
    const legal: [UnitState, UnitState][] = [
        ['CREATED', 'DORMANT'],
        ['DORMANT', 'ACTIVATED'],
        ['DORMANT', 'EXPIRED'],
        ['ACTIVATED', 'ARCHIVED'],
        ['ACTIVATED', 'DORMANT']
    ];

    test('allows exactly the legal pairs', () => {
        const states: UnitState[] = ['CREATED', 'DORMANT', 'ACTIVATED', 'ARCHIVED', 'EXPIRED'];
        for (const from of states) {
            for (const to of states) {
                const expected = legal.some(([f, t]) => f === from && t === to);
                expect(canTransition(from, to)).toBe(expected);
            }
        }
    });

    test('ARCHIVED and EXPIRED are terminal', () => {
        expect(canTransition('ARCHIVED', 'DORMANT')).toBe(false);
        expect(canTransition('EXPIRED', 'ACTIVATED')).toBe(false);
        expect(canTransition('EXPIRED', 'DORMANT')).toBe(false);
    });

    test('createTransition returns a frozen record', () => {
        const at = new Date('2024-11-16T12:00:00Z');
        const t = createTransition('door', 'CREATED', 'DORMANT', 'Registered', at);
        expect(t).toEqual({ unitId: 'door', from: 'CREATED', to: 'DORMANT', timestamp: at, reason: 'Registered' });
        expect(Object.isFrozen(t)).toBe(true);
    });

    test('createTransition rejects illegal pairs', () => {
        expect(() => createTransition('door', 'EXPIRED', 'ACTIVATED', 'late')).toThrow(IllegalTransitionError);
        try {
            createTransition('door', 'CREATED', 'ACTIVATED', 'skip');
            throw new Error('expected a throw');
        } catch (e: unknown) {
            expect(e).toBeInstanceOf(BindingError);
            if (!(e instanceof BindingError)) return;
            expect(e.code).toBe(ErrorCode.ILLEGAL_TRANSITION);
            expect(e.message).toBe("[Binding:ILLEGAL_TRANSITION] Invalid transition for 'door': CREATED -> ACTIVATED");
            expect(e.metadata).toEqual({ unitId: 'door', from: 'CREATED', to: 'ACTIVATED' });
        }
    });
});
