/**
 * Binding Engine Error Taxonomy
 * Only structural violations are thrown. Guard mismatches are data (FailureReason).
 */

export enum ErrorCode {
    // I. Registry & Graph
    CIRCULAR_DEPENDENCY = 'CIRCULAR_DEPENDENCY',
    UNIT_NOT_FOUND = 'UNIT_NOT_FOUND',

    // II. Lifecycle
    ILLEGAL_TRANSITION = 'ILLEGAL_TRANSITION',

    // III. Unit Construction (Template Layer)
    INVALID_UNIT = 'INVALID_UNIT',
    TEMPLATE_NOT_FOUND = 'TEMPLATE_NOT_FOUND',
    TEMPLATE_VIOLATION = 'TEMPLATE_VIOLATION',

    // IV. Composition
    INVALID_COMPOSITION = 'INVALID_COMPOSITION',

    // V. Collaborators & Configuration
    UNSUPPORTED_FORMAT = 'UNSUPPORTED_FORMAT',
    INVALID_CONFIG = 'INVALID_CONFIG',
    SINK_CLOSED = 'SINK_CLOSED',
}

export class BindingError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Binding:${code}] ${message}`);
        this.name = 'BindingError';
    }
}

/**
 * Thrown when a registration would close a cycle in the dependency graph.
 * `cycle` is the ordered path, first id repeated at the end.
 */
export class CircularDependencyError extends BindingError {
    constructor(public readonly cycle: readonly string[]) {
        super(ErrorCode.CIRCULAR_DEPENDENCY, `Circular dependency detected: ${cycle.join(' -> ')}`, { cycle: [...cycle] });
        this.name = 'CircularDependencyError';
    }
}

export class IllegalTransitionError extends BindingError {
    constructor(unitId: string, from: string, to: string) {
        super(ErrorCode.ILLEGAL_TRANSITION, `Invalid transition for '${unitId}': ${from} -> ${to}`, { unitId, from, to });
        this.name = 'IllegalTransitionError';
    }
}

export class UnitNotFoundError extends BindingError {
    constructor(public readonly unitId: string) {
        super(ErrorCode.UNIT_NOT_FOUND, `Unit '${unitId}' is not registered`, { unitId });
        this.name = 'UnitNotFoundError';
    }
}

/**
 * Raised by the template layer while constructing units.
 */
export class TemplateViolationError extends BindingError {
    constructor(
        code: ErrorCode.INVALID_UNIT | ErrorCode.TEMPLATE_NOT_FOUND | ErrorCode.TEMPLATE_VIOLATION,
        message: string,
        metadata?: Record<string, unknown>
    ) {
        super(code, message, metadata);
        this.name = 'TemplateViolationError';
    }
}
