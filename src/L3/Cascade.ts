import type { BoundResult, Context, StateChange, Unit, UnitID } from '../L0/Ontology.js';
import { STATE_MUTATION_KEY } from '../L0/Ontology.js';
import { applyStateMutation } from '../L2/Context.js';
import type { Logger } from '../Platform/Logger.js';

/**
 * A successful bind plus the position of its attempt record.
 */
export interface AttemptHandle {
    bound: BoundResult;
    attemptIndex: number;
}

/**
 * What the scheduler needs from the engine. Kept narrow so the engine's
 * collections stay private.
 */
export interface CascadeHost {
    units(): Unit[];
    admits(unit: Unit, context: Context): boolean;
    attempt(unit: Unit, context: Context): AttemptHandle | null;
    recordStateChanges(handle: AttemptHandle, changes: readonly StateChange[]): BoundResult;
}

export interface SweepResult {
    bound: BoundResult[];
    context: Context;
}

function isMutationMap(value: unknown): value is Readonly<Record<string, unknown>> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class CascadeScheduler {
    constructor(private host: CascadeHost, private log: Logger) { }

    /**
     * Sweeps every registered unit in registration order, round after round.
     *
     * Units failing the prefilter stay latent and leave no attempt record.
     * Bound ONE_SHOT units are skipped for the rest of this call; REUSABLE
     * units stay eligible. Between rounds the bound units' `stateMutation`
     * maps are applied in round order, last write wins. Stops at the first
     * round that binds nothing, or at `maxRounds`.
     */
    public sweep(context: Context, maxRounds: number, applyMutations: boolean): SweepResult {
        const results: BoundResult[] = [];
        const consumed = new Set<UnitID>();
        let current = context;

        for (let round = 0; round < maxRounds; round++) {
            const boundThisRound: AttemptHandle[] = [];

            for (const unit of this.host.units()) {
                if (consumed.has(unit.id)) continue;
                if (!this.host.admits(unit, current)) continue;

                const handle = this.host.attempt(unit, current);
                if (!handle) continue;

                boundThisRound.push(handle);
                if (unit.consumption === 'ONE_SHOT') {
                    consumed.add(unit.id);
                }
            }

            this.log.debug(`Round ${round + 1}: ${boundThisRound.length} bound`);
            if (boundThisRound.length === 0) break;

            for (const handle of boundThisRound) {
                const mutation = handle.bound.effect[STATE_MUTATION_KEY];
                if (!applyMutations || !isMutationMap(mutation)) {
                    results.push(handle.bound);
                    continue;
                }
                const applied = applyStateMutation(current, mutation);
                current = applied.context;
                results.push(this.host.recordStateChanges(handle, applied.changes));
            }
        }

        return { bound: results, context: current };
    }
}
