// src/L0/Guards.ts
import type { Context, FailureReason, Unit, UnitID } from './Ontology.js';
import { judgeTemporal } from './Temporal.js';

// --- Guard Checker Pattern ---
export interface GuardInput {
    unit: Unit;
    context: Context;
    satisfied: ReadonlySet<UnitID>;
}

export type CheckerName = 'DEPENDENCY' | 'EXPIRATION' | 'ACTOR' | 'LOCATION' | 'STATE' | 'TEMPORAL';

/**
 * One condition of a guard.
 * `matches` is the cheap prefilter, `check` the diagnosing path; `check`
 * returns null exactly when `matches` returns true.
 */
export interface GuardChecker {
    readonly name: CheckerName;
    matches(input: GuardInput): boolean;
    check(input: GuardInput): FailureReason | null;
}

function defineChecker(
    name: CheckerName,
    matches: (input: GuardInput) => boolean,
    diagnose: (input: GuardInput) => FailureReason
): GuardChecker {
    return Object.freeze({
        name,
        matches,
        check: (input: GuardInput) => (matches(input) ? null : diagnose(input))
    });
}

export function show(value: unknown): string {
    if (value === undefined) return 'undefined';
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}

function isoOf(date: Date): string {
    return Number.isNaN(date.getTime()) ? 'Invalid Date' : date.toISOString();
}

const sorted = (set: ReadonlySet<string>): string[] => [...set].sort();

// --- Concrete Checkers ---

// 1. Dependency
export const DependencyGuard = defineChecker(
    'DEPENDENCY',
    ({ unit, satisfied }) => unit.dependsOn.every(dep => satisfied.has(dep)),
    ({ unit, satisfied }) => {
        const missing = unit.dependsOn.find(dep => !satisfied.has(dep)) ?? '';
        return {
            condition: 'dependency',
            expected: missing,
            actual: 'not activated',
            message: `dependency '${missing}' not yet activated`
        };
    }
);

// 2. Expiration (absolute "before:" deadlines only)
function expiredDeadline({ unit, context }: GuardInput): string | null {
    const when = unit.guard.when;
    if (!when || !when.startsWith('before:')) return null;
    // Malformed expressions are reported by TemporalGuard, never as expiry.
    const verdict = judgeTemporal(when, context);
    if ('expr' in verdict && verdict.expr.kind === 'DATETIME' && !verdict.holds) {
        return when.slice('before:'.length);
    }
    return null;
}

export const ExpirationGuard = defineChecker(
    'EXPIRATION',
    input => expiredDeadline(input) === null,
    input => {
        const deadline = expiredDeadline(input) ?? '';
        return {
            condition: 'expired',
            expected: `before ${deadline}`,
            actual: isoOf(input.context.timestamp),
            message: `unit expired: deadline '${deadline}' has passed`
        };
    }
);

// 3. Actor
export const ActorGuard = defineChecker(
    'ACTOR',
    ({ unit, context }) => {
        const actors = unit.guard.actors;
        if (!actors || actors.size === 0) return true;
        return context.actor !== undefined && actors.has(context.actor);
    },
    ({ unit, context }) => {
        const expected = sorted(unit.guard.actors ?? new Set());
        const actual = context.actor ?? null;
        return {
            condition: 'actor',
            expected,
            actual,
            message: `actor: ${show(actual)} not in ${show(expected)}`
        };
    }
);

// 4. Location
export const LocationGuard = defineChecker(
    'LOCATION',
    ({ unit, context }) => {
        const locations = unit.guard.locations;
        if (!locations || locations.size === 0) return true;
        return context.location !== undefined && locations.has(context.location);
    },
    ({ unit, context }) => {
        const expected = sorted(unit.guard.locations ?? new Set());
        const actual = context.location ?? null;
        return {
            condition: 'location',
            expected,
            actual,
            message: `location: ${show(actual)} not in ${show(expected)}`
        };
    }
);

// 5. State (strict equality, missing key reads as null)
function firstStateMismatch({ unit, context }: GuardInput): [string, unknown, unknown] | null {
    const required = unit.guard.state;
    if (!required) return null;
    for (const [key, expected] of Object.entries(required)) {
        const actual = Object.prototype.hasOwnProperty.call(context.state, key) ? context.state[key] : null;
        if ((actual ?? null) !== (expected ?? null)) {
            return [key, expected, actual ?? null];
        }
    }
    return null;
}

export const StateGuard = defineChecker(
    'STATE',
    input => firstStateMismatch(input) === null,
    input => {
        const [key, expected, actual] = firstStateMismatch(input) ?? ['', null, null];
        return {
            condition: 'state',
            expected: { [key]: expected },
            actual: { [key]: actual },
            message: `state['${key}']: expected ${show(expected)}, got ${show(actual)}`
        };
    }
);

// 6. Temporal (parse/evaluation errors fold into the diagnostic)
const temporalHolds = ({ unit, context }: GuardInput): boolean =>
    !unit.guard.when || judgeTemporal(unit.guard.when, context).holds;

export const TemporalGuard = defineChecker(
    'TEMPORAL',
    temporalHolds,
    ({ unit, context }) => {
        const when = unit.guard.when ?? '';
        const at = isoOf(context.timestamp);
        const verdict = judgeTemporal(when, context);
        const message = 'error' in verdict
            ? `temporal: expression '${when}' evaluation error: ${verdict.error}`
            : `temporal: condition '${when}' not satisfied at ${at}`;
        return { condition: 'temporal', expected: when, actual: at, message };
    }
);
