/**
 * BINDING ONTOLOGY
 * The single source of truth for the engine's value types.
 * Every value here is treated as immutable once constructed.
 */

// --- 1. Unit ---
export type UnitID = string;

/**
 * ONE_SHOT units are skipped in later rounds of the same sweep once bound.
 * REUSABLE units may bind again in every round.
 */
export type ConsumptionMode = 'ONE_SHOT' | 'REUSABLE';

export type Payload = Readonly<Record<string, unknown>>;

export interface Unit {
    readonly id: UnitID;
    readonly type: string; // CATEGORY:name
    readonly guard: Guard;
    readonly payload: Payload;
    readonly metadata: Readonly<Record<string, unknown>>;
    readonly dependsOn: readonly UnitID[];
    readonly consumption: ConsumptionMode;
}

// --- 2. Guard ---
// Conjunctive: every present field must hold. An absent or empty field holds vacuously.
export interface Guard {
    readonly actors?: ReadonlySet<string>;
    readonly when?: string; // "<after|before>:<ISO-8601 | state-key>"
    readonly locations?: ReadonlySet<string>;
    readonly state?: Readonly<Record<string, unknown>>;
}

// --- 3. Context ---
export interface Context {
    readonly actor?: string;
    readonly timestamp: Date;
    readonly location?: string;
    readonly state: Readonly<Record<string, unknown>>;
}

export interface ContextSnapshot {
    actor: string | null;
    timestamp: string; // ISO-8601
    location: string | null;
    state: Record<string, unknown>;
}

// --- 4. Binding Outcome ---
export interface StateChange {
    readonly key: string;
    readonly old: unknown;
    readonly new: unknown;
}

export interface BoundResult {
    readonly unitId: UnitID;
    readonly type: string;
    readonly effect: Payload;
    readonly weight: number;
    readonly boundAt: Date;
    readonly context: ContextSnapshot;
    readonly stateChanges?: readonly StateChange[];
}

export type ConditionKind = 'actor' | 'temporal' | 'location' | 'state' | 'dependency' | 'expired';

export interface FailureReason {
    readonly condition: ConditionKind;
    readonly expected: unknown;
    readonly actual: unknown;
    readonly message: string;
}

// --- 5. Attempt (Audit Record) ---
interface AttemptBase {
    readonly unitId: UnitID;
    readonly timestamp: Date;
    readonly context: ContextSnapshot;
}

export interface SuccessfulAttempt extends AttemptBase {
    readonly success: true;
    readonly boundResultId: UnitID;
    readonly stateChanges?: readonly StateChange[];
}

export interface FailedAttempt extends AttemptBase {
    readonly success: false;
    readonly failureReasons: readonly FailureReason[];
}

export type Attempt = SuccessfulAttempt | FailedAttempt;

// --- 6. Payload Conventions ---
export const WEIGHT_KEY = 'weight';
export const STATE_MUTATION_KEY = 'stateMutation';
export const DEFAULT_WEIGHT = 1.0;
