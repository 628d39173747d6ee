// src/L5/Audit.ts
import type { Attempt, ConditionKind, StateChange, UnitID } from '../L0/Ontology.js';
import type { IAuditSink } from '../Platform/Ports.js';
export type { IAuditSink };

/**
 * Append-only record of every binding attempt.
 * Entries are frozen; the only amendment is attaching the state changes a
 * cascade applied after a successful bind, which replaces that entry.
 */
export class AttemptLog {
    private trail: Attempt[] = [];

    /**
     * Returns the position of the entry, used to amend it later.
     */
    public record(attempt: Attempt): number {
        this.trail.push(Object.freeze(attempt));
        return this.trail.length - 1;
    }

    public amendStateChanges(index: number, changes: readonly StateChange[]): Attempt {
        const entry = this.trail[index];
        if (!entry || !entry.success) {
            throw new Error(`AttemptLog: entry ${index} is not a successful attempt`);
        }
        const amended: Attempt = Object.freeze({ ...entry, stateChanges: [...changes] });
        this.trail[index] = amended;
        return amended;
    }

    public attempts(unitId?: UnitID): Attempt[] {
        if (unitId === undefined) return [...this.trail];
        return this.trail.filter(a => a.unitId === unitId);
    }

    public failed(unitId: UnitID): Attempt[] {
        return this.trail.filter(a => a.unitId === unitId && !a.success);
    }

    public latest(unitId: UnitID): Attempt | undefined {
        for (let i = this.trail.length - 1; i >= 0; i--) {
            const entry = this.trail[i];
            if (entry && entry.unitId === unitId) return entry;
        }
        return undefined;
    }

    /**
     * Human-readable outcome of the most recent attempt.
     */
    public explain(unitId: UnitID): string {
        const latest = this.latest(unitId);
        if (!latest) {
            return `Unit '${unitId}' was never attempted for binding`;
        }
        if (latest.success) {
            return `Unit '${unitId}' successfully activated`;
        }
        if (latest.failureReasons.length === 0) {
            return `Unit '${unitId}' failed to activate (no specific reason recorded)`;
        }
        return [
            `Unit '${unitId}' failed to activate:`,
            ...latest.failureReasons.map(r => `  - ${r.message}`)
        ].join('\n');
    }

    /**
     * Failure counts per condition kind across all failed attempts.
     */
    public stats(): Partial<Record<ConditionKind, number>> {
        return failureBreakdown(this.trail);
    }

    public get length(): number {
        return this.trail.length;
    }
}

export function failureBreakdown(attempts: readonly Attempt[]): Partial<Record<ConditionKind, number>> {
    const counts: Partial<Record<ConditionKind, number>> = {};
    for (const attempt of attempts) {
        if (attempt.success) continue;
        for (const reason of attempt.failureReasons) {
            counts[reason.condition] = (counts[reason.condition] ?? 0) + 1;
        }
    }
    return counts;
}

/**
 * Streaming mode: every recorded attempt is mirrored to the sink, if any.
 */
export class AttemptRecorder {
    constructor(
        private readonly log: AttemptLog,
        private sink?: IAuditSink
    ) { }

    public record(attempt: Attempt): number {
        const index = this.log.record(attempt);
        this.sink?.write(attempt);
        return index;
    }

    public flush(): void {
        this.sink?.flush();
    }

    /**
     * Closes and detaches the sink. Later calls are no-ops.
     */
    public close(): boolean {
        const sink = this.sink;
        if (!sink) return false;
        this.sink = undefined;
        sink.close();
        return true;
    }

    public get streaming(): boolean {
        return this.sink !== undefined;
    }
}
