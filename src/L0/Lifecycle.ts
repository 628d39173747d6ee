// src/L0/Lifecycle.ts
import type { UnitID } from './Ontology.js';
import { IllegalTransitionError } from '../Errors.js';

/**
 * Unit Lifecycle States
 */
export type UnitState =
    | 'CREATED'     // Constructed, not yet registered
    | 'DORMANT'     // Registered, awaiting a satisfying context
    | 'ACTIVATED'   // Guard held, payload released
    | 'ARCHIVED'    // Retired after activation
    | 'EXPIRED';    // Absolute "before:" deadline passed

const ALLOWED: Record<UnitState, readonly UnitState[]> = {
    'CREATED': ['DORMANT'],
    'DORMANT': ['ACTIVATED', 'EXPIRED'],
    'ACTIVATED': ['ARCHIVED', 'DORMANT'], // DORMANT for reusable consumption
    'ARCHIVED': [],
    'EXPIRED': []
};

export interface Transition {
    readonly unitId: UnitID;
    readonly from: UnitState;
    readonly to: UnitState;
    readonly timestamp: Date;
    readonly reason: string;
}

export function canTransition(from: UnitState, to: UnitState): boolean {
    return ALLOWED[from].includes(to);
}

/**
 * The only way to build a Transition. An illegal pair never reaches the ledger.
 */
export function createTransition(
    unitId: UnitID,
    from: UnitState,
    to: UnitState,
    reason: string,
    timestamp: Date = new Date()
): Transition {
    if (!canTransition(from, to)) {
        throw new IllegalTransitionError(unitId, from, to);
    }
    return Object.freeze({ unitId, from, to, timestamp, reason });
}
