import { jest, describe, test, expect, afterEach } from '@jest/globals';
import { DEFAULT_CONFIG, resolveConfig } from '../Config.js';
import { createLogger } from '../Logger.js';
import { SystemClock } from '../Ports.js';
import { BindingError } from '../../Errors.js';
import { BindingEngine } from '../../Kernel.js';
import { defineUnit } from '../../L2/UnitFactory.js';
import { createContext } from '../../L2/Context.js';

const NOW = new Date('2024-11-16T12:00:00Z');

describe('Config', () => {
    test('defaults', () => {
        const config = resolveConfig();
        expect(config.maxRounds).toBe(10);
        expect(config.maxTurns).toBe(10);
        expect(config.applyMutations).toBe(true);
        expect(config.logLevel).toBe('warn');
        expect(config.clock).toBe(SystemClock);
        expect(config.sink).toBeUndefined();
        expect(Object.isFrozen(DEFAULT_CONFIG)).toBe(true);
    });

    test('overrides merge over defaults', () => {
        const config = resolveConfig({ maxRounds: 3, logLevel: 'debug' });
        expect(config.maxRounds).toBe(3);
        expect(config.maxTurns).toBe(10);
        expect(config.logLevel).toBe('debug');
    });

    test('an explicit undefined does not override a default', () => {
        const config = resolveConfig({ maxRounds: undefined, maxTurns: undefined, logLevel: undefined });
        expect(config.maxRounds).toBe(10);
        expect(config.maxTurns).toBe(10);
        expect(config.logLevel).toBe('warn');
    });

    test.each([0, -2, 2.5, Number.NaN])('maxRounds %p is rejected', (value) => {
        expect(() => resolveConfig({ maxRounds: value })).toThrow(BindingError);
    });
});

describe('Logger', () => {
    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('prefixes the component and respects the level', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        const info = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);

        const log = createLogger('Cascade', 'info');
        log.warn('careful');
        log.info('hello');
        log.debug('hidden');

        expect(warn).toHaveBeenCalledWith('[Cascade] careful');
        expect(info).toHaveBeenCalledWith('[Cascade] hello');
        expect(debug).not.toHaveBeenCalled();
    });

    test('silent logs nothing', () => {
        const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        createLogger('Quiet', 'silent').warn('nope');
        expect(warn).not.toHaveBeenCalled();
    });

    test('debug level reaches cascade rounds', () => {
        const debug = jest.spyOn(console, 'debug').mockImplementation(() => undefined);
        const info = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        const engine = new BindingEngine({ clock: { now: () => NOW }, logLevel: 'debug' });
        engine.register(defineUnit({ id: 'A', type: 'EVENT:test' }));

        engine.sweep(createContext({ timestamp: NOW }));

        expect(debug.mock.calls).toEqual([
            ['[Cascade] Round 1: 1 bound'],
            ['[Cascade] Round 2: 0 bound']
        ]);
        expect(info).not.toHaveBeenCalled();
    });
});
