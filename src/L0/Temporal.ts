// src/L0/Temporal.ts
import type { Context } from './Ontology.js';

/**
 * Temporal mini-language: "<after|before>:<reference>".
 * A reference starting with a digit is an ISO-8601 datetime compared against
 * the context timestamp; anything else names a state key checked for truthiness.
 */

export type TemporalOperator = 'after' | 'before';

export type TemporalExpression =
    | { kind: 'DATETIME'; operator: TemporalOperator; reference: Date; source: string }
    | { kind: 'STATE'; operator: TemporalOperator; stateKey: string; source: string };

export class TemporalParseError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'TemporalParseError';
    }
}

const ISO_DATETIME = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const daysInMonth = (year: number, month: number): number => new Date(Date.UTC(year, month, 0)).getUTCDate();

function isOperator(value: string): value is TemporalOperator {
    return value === 'after' || value === 'before';
}

function parseIsoDatetime(reference: string): Date {
    const match = ISO_DATETIME.exec(reference);
    if (!match) {
        throw new TemporalParseError(`Invalid ISO datetime: '${reference}'`);
    }
    // Date would roll Feb 30 or 24:00 over into the next day.
    const field = (index: number): number => Number(match[index] ?? 0);
    const [year, month, day] = [field(1), field(2), field(3)];
    if (
        month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month) ||
        field(4) > 23 || field(5) > 59 || field(6) > 59
    ) {
        throw new TemporalParseError(`Invalid ISO datetime: '${reference}'`);
    }
    // Date-only and offset-less forms are read as local time, same as datetimes with a clock part.
    const normalized = reference.length === 10 ? `${reference}T00:00:00` : reference.replace(' ', 'T');
    const parsed = new Date(normalized);
    if (Number.isNaN(parsed.getTime())) {
        throw new TemporalParseError(`Invalid ISO datetime: '${reference}'`);
    }
    return parsed;
}

export function parseTemporal(expr: string): TemporalExpression {
    const sep = expr.indexOf(':');
    if (sep < 0) {
        throw new TemporalParseError(`Invalid temporal expression: '${expr}' (missing ':')`);
    }

    const operator = expr.slice(0, sep);
    const reference = expr.slice(sep + 1);

    if (!isOperator(operator)) {
        throw new TemporalParseError(`Invalid operator: '${operator}' (must be 'after' or 'before')`);
    }
    if (reference.length === 0) {
        throw new TemporalParseError(`Invalid temporal expression: '${expr}' (empty reference)`);
    }

    if (/^\d/.test(reference)) {
        return { kind: 'DATETIME', operator, reference: parseIsoDatetime(reference), source: expr };
    }
    return { kind: 'STATE', operator, stateKey: reference, source: expr };
}

export function evaluateTemporal(expr: TemporalExpression, context: Context): boolean {
    if (expr.kind === 'STATE') {
        return Boolean(context.state[expr.stateKey]);
    }

    const now = context.timestamp.getTime();
    if (Number.isNaN(now)) {
        throw new TemporalParseError('Context timestamp is not a valid date');
    }
    const ref = expr.reference.getTime();
    return expr.operator === 'after' ? now > ref : now < ref;
}

export type TemporalJudgement =
    | { holds: boolean; expr: TemporalExpression }
    | { holds: false; error: string };

/**
 * Parse and evaluate in one step. Errors come back as data so the checkers
 * can turn them into diagnostics.
 */
export function judgeTemporal(when: string, context: Context): TemporalJudgement {
    try {
        const expr = parseTemporal(when);
        return { holds: evaluateTemporal(expr, context), expr };
    } catch (e: unknown) {
        return { holds: false, error: e instanceof Error ? e.message : String(e) };
    }
}
