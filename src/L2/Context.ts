import { freeze, produce } from 'immer';
import type { Context, ContextSnapshot, StateChange } from '../L0/Ontology.js';
export type { Context, ContextSnapshot, StateChange };

export interface ContextInit {
    actor?: string | null;
    timestamp?: Date;
    location?: string | null;
    state?: Record<string, unknown>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    if (typeof value !== 'object' || value === null) return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}

function copyValue(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(copyValue);
    if (value instanceof Map) return new Map([...value].map(([k, v]): [unknown, unknown] => [k, copyValue(v)]));
    if (value instanceof Set) return new Set([...value].map(copyValue));
    if (isPlainObject(value)) return copyRecord(value);
    return value;
}

/**
 * Copies every array, Map, Set and plain object reachable from `record`, so a
 * deep freeze of the copy leaves the caller's values writable.
 */
export function copyRecord(record: Readonly<Record<string, unknown>>): Record<string, unknown> {
    return Object.fromEntries(Object.entries(record).map(([key, value]): [string, unknown] => [key, copyValue(value)]));
}

/**
 * Build a frozen Context. A missing timestamp means "now".
 */
export function createContext(init: ContextInit = {}): Context {
    const context: Context = {
        ...(init.actor != null ? { actor: init.actor } : {}),
        timestamp: init.timestamp ?? new Date(),
        ...(init.location != null ? { location: init.location } : {}),
        state: copyRecord(init.state ?? {})
    };
    return freeze(context, true);
}

/**
 * Functional update: returns a new Context, the input is untouched.
 */
export function withStateUpdate(context: Context, key: string, value: unknown): Context {
    return produce(context, draft => {
        draft.state[key] = value;
    });
}

/**
 * Applies `mutation` key by key in insertion order (later keys win) and reports
 * each change against the value it replaced.
 */
export function applyStateMutation(
    context: Context,
    mutation: Readonly<Record<string, unknown>>
): { context: Context; changes: StateChange[] } {
    let current = context;
    const changes: StateChange[] = [];

    for (const [key, value] of Object.entries(mutation)) {
        const old = Object.prototype.hasOwnProperty.call(current.state, key) ? current.state[key] : null;
        changes.push({ key, old, new: value });
        current = withStateUpdate(current, key, value);
    }

    return { context: current, changes };
}

export function snapshotContext(context: Context): ContextSnapshot {
    return {
        actor: context.actor ?? null,
        timestamp: Number.isNaN(context.timestamp.getTime()) ? 'Invalid Date' : context.timestamp.toISOString(),
        location: context.location ?? null,
        state: { ...context.state }
    };
}
