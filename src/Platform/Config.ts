import type { BoundResult, Context, Unit } from '../L0/Ontology.js';
import { BindingError, ErrorCode } from '../Errors.js';
import type { LogLevel } from './Logger.js';
import type { IAuditSink, ISystemClock } from './Ports.js';
import { SystemClock } from './Ports.js';

export type ActivationHook = (unit: Unit, context: Context, bound: BoundResult) => void;

export interface EngineConfig {
    maxRounds: number;      // Cascade round cap per sweep
    maxTurns: number;       // Sweep cap for evolveUntilConverged
    applyMutations: boolean;
    logLevel: LogLevel;
    clock: ISystemClock;
    sink?: IAuditSink;
    onActivated?: ActivationHook;
}

export const DEFAULT_CONFIG: Readonly<EngineConfig> = Object.freeze({
    maxRounds: 10,
    maxTurns: 10,
    applyMutations: true,
    logLevel: 'warn',
    clock: SystemClock
});

export function assertPositiveInteger(name: string, value: number): void {
    if (!Number.isInteger(value) || value < 1) {
        throw new BindingError(ErrorCode.INVALID_CONFIG, `${name} must be a positive integer, got ${value}`, { [name]: value });
    }
}

export function resolveConfig(partial: Partial<EngineConfig> = {}): EngineConfig {
    // An explicit undefined keeps the default.
    const config: EngineConfig = {
        ...DEFAULT_CONFIG,
        ...Object.fromEntries(Object.entries(partial).filter(([, value]) => value !== undefined))
    };
    assertPositiveInteger('maxRounds', config.maxRounds);
    assertPositiveInteger('maxTurns', config.maxTurns);
    return config;
}
