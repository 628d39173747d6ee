import type { Attempt } from '../L0/Ontology.js';

/**
 * Audit Port: Sink
 * Write-only mirror of the attempt log. Calls are synchronous; a throwing
 * `write` propagates to the caller of `bind`.
 */
export interface IAuditSink {
    write(attempt: Attempt): void;
    flush(): void;
    close(): void;
}

/**
 * Environment Port: System Clock
 * Stamps transitions, attempts and bound results.
 */
export interface ISystemClock {
    now(): Date;
}

export const SystemClock: ISystemClock = {
    now: () => new Date()
};
