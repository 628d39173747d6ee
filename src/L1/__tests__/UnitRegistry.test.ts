import { describe, test, expect, beforeEach } from '@jest/globals';
import fc from 'fast-check';
import { UnitRegistry } from '../UnitRegistry.js';
import { findCycle } from '../DependencyGraph.js';
import { defineUnit } from '../../L2/UnitFactory.js';
import { CircularDependencyError, UnitNotFoundError } from '../../Errors.js';

const unit = (id: string, dependsOn: string[] = []) => defineUnit({ id, type: 'EVENT:test', dependsOn });

describe('Dependency Graph', () => {
    test('acyclic graphs yield null', () => {
        expect(findCycle(new Map([['a', []], ['b', ['a']], ['c', ['a', 'b']]]))).toBeNull();
    });

    test('returns the cycle path with the entry node repeated', () => {
        expect(findCycle(new Map([['a', ['b']], ['b', ['c']], ['c', ['a']]]))).toEqual(['a', 'b', 'c', 'a']);
        expect(findCycle(new Map([['self', ['self']]]))).toEqual(['self', 'self']);
    });

    test('edges to unknown ids are leaves', () => {
        expect(findCycle(new Map([['a', ['ghost']]]))).toBeNull();
    });
});

describe('Unit Registry', () => {
    let registry: UnitRegistry;

    beforeEach(() => {
        registry = new UnitRegistry();
    });

    test('keeps registration order and allows forward references', () => {
        registry.register(unit('c', ['b']));
        registry.register(unit('a'));
        registry.register(unit('b', ['a']));
        expect(registry.list().map(u => u.id)).toEqual(['c', 'a', 'b']);
        expect(registry.dependenciesOf('c')).toEqual(['b']);
        expect(registry.dependentsOf('a')).toEqual(['b']);
    });

    test('re-registering an id overwrites in place', () => {
        registry.register(unit('a'));
        registry.register(unit('b'));
        registry.register(defineUnit({ id: 'a', type: 'EVENT:replaced' }));
        expect(registry.list().map(u => u.type)).toEqual(['EVENT:replaced', 'EVENT:test']);
        expect(registry.size).toBe(2);
    });

    test('a closing cycle is rejected and nothing is committed', () => {
        registry.register(unit('a', ['b']));
        registry.register(unit('b', ['c']));

        expect(() => registry.register(unit('c', ['a']))).toThrow(CircularDependencyError);
        try {
            registry.register(unit('c', ['a']));
        } catch (e: unknown) {
            if (!(e instanceof CircularDependencyError)) throw e;
            expect(e.cycle).toEqual(['a', 'b', 'c', 'a']);
            expect(e.message).toBe('[Binding:CIRCULAR_DEPENDENCY] Circular dependency detected: a -> b -> c -> a');
        }
        expect(registry.has('c')).toBe(false);
        expect(registry.dependenciesOf('c')).toEqual([]);
    });

    test('overwriting into a cycle keeps the previous unit', () => {
        registry.register(unit('a'));
        registry.register(unit('b', ['a']));
        expect(() => registry.register(unit('a', ['b']))).toThrow(CircularDependencyError);
        expect(registry.require('a').dependsOn).toEqual([]);
    });

    test('require throws for unknown ids', () => {
        expect(() => registry.require('nope')).toThrow(UnitNotFoundError);
        expect(() => registry.require('nope')).toThrow("Unit 'nope' is not registered");
    });

    test('committed graph stays acyclic under arbitrary registrations', () => {
        const ids = ['a', 'b', 'c', 'd', 'e'];
        const registration = fc.record({
            id: fc.constantFrom(...ids),
            deps: fc.uniqueArray(fc.constantFrom(...ids), { maxLength: 3 })
        });
        fc.assert(fc.property(fc.array(registration, { maxLength: 15 }), (steps) => {
            const reg = new UnitRegistry();
            for (const step of steps) {
                try {
                    reg.register(unit(step.id, step.deps));
                } catch (e: unknown) {
                    if (!(e instanceof CircularDependencyError)) throw e;
                }
            }
            const graph = new Map(reg.list().map((u): [string, readonly string[]] => [u.id, u.dependsOn]));
            expect(findCycle(graph)).toBeNull();
        }));
    });
});
