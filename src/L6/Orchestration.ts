// src/L6/Orchestration.ts
import type { BoundResult, Context } from '../L0/Ontology.js';
import { createContext } from '../L2/Context.js';
import type { SweepResult } from '../L3/Cascade.js';

/**
 * One actor's turn. Location defaults to '', timestamp to the run's initial one.
 */
export interface Perspective {
    actor?: string | null;
    location?: string;
    timestamp?: Date;
}

export type TimelineEntry = readonly [timestamp: Date, actor: string | null, location: string];

export interface SequenceResult {
    bound: BoundResult[];
    state: Record<string, unknown>;
}

/**
 * What the runner needs from the engine.
 */
export interface SweepingEngine {
    sweep(context: Context): SweepResult;
    now(): Date;
}

/**
 * Runs one sweep per perspective, carrying world state from each to the next,
 * so one actor's mutations can open guards for the actors after it.
 */
export class ActorSequenceRunner {
    constructor(private readonly engine: SweepingEngine) { }

    runActorSequence(
        perspectives: readonly Perspective[],
        initialState: Record<string, unknown> = {},
        initialTimestamp: Date = this.engine.now()
    ): SequenceResult {
        const bound: BoundResult[] = [];
        let state: Record<string, unknown> = { ...initialState };

        for (const perspective of perspectives) {
            const context = createContext({
                actor: perspective.actor ?? null,
                location: perspective.location ?? '',
                timestamp: perspective.timestamp ?? initialTimestamp,
                state
            });
            const result = this.engine.sweep(context);
            bound.push(...result.bound);
            state = { ...result.context.state };
        }

        return { bound, state };
    }

    runWithTimeline(
        timeline: readonly TimelineEntry[],
        initialState: Record<string, unknown> = {}
    ): SequenceResult {
        const perspectives = timeline.map(([timestamp, actor, location]) => ({ timestamp, actor, location }));
        return this.runActorSequence(perspectives, initialState);
    }
}
