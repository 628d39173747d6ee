import type { FailureReason } from './Ontology.js';
import type { GuardChecker, GuardInput } from './Guards.js';
import { ActorGuard, DependencyGuard, ExpirationGuard, LocationGuard, StateGuard, TemporalGuard } from './Guards.js';

/**
 * Full pipeline, cheap to expensive. Temporal parsing runs last.
 */
export const BINDING_PIPELINE: readonly GuardChecker[] = Object.freeze([
    DependencyGuard,
    ExpirationGuard,
    ActorGuard,
    LocationGuard,
    StateGuard,
    TemporalGuard
]);

/**
 * Cascade prefilter. Expiration is covered by the temporal check here,
 * since an expired "before:" deadline also fails TemporalGuard.
 */
export const PREFILTER_PIPELINE: readonly GuardChecker[] = Object.freeze([
    DependencyGuard,
    TemporalGuard,
    StateGuard,
    ActorGuard,
    LocationGuard
]);

export class GuardPipeline {
    constructor(
        private readonly checkers: readonly GuardChecker[] = BINDING_PIPELINE,
        private readonly prefilter: readonly GuardChecker[] = PREFILTER_PIPELINE
    ) { }

    /**
     * Runs every checker (no short-circuit) and returns all diagnostics.
     * An empty list means the guard holds.
     */
    public evaluate(input: GuardInput): FailureReason[] {
        const reasons: FailureReason[] = [];
        for (const checker of this.checkers) {
            const reason = checker.check(input);
            if (reason) reasons.push(reason);
        }
        return reasons;
    }

    /**
     * Cheap precondition test. Units failing it stay latent and are never attempted.
     */
    public admits(input: GuardInput): boolean {
        return this.prefilter.every(checker => checker.matches(input));
    }
}
