// src/L4/Combinators.ts
import type { BoundResult, Context, Unit } from '../L0/Ontology.js';
import { BindingError, ErrorCode } from '../Errors.js';

/**
 * Composition tree over units. Building a tree evaluates nothing; only
 * `evaluate` calls into the binder, depth-first and left to right.
 */
export type Bindable =
    | { readonly kind: 'ATOMIC'; readonly unit: Unit }
    | { readonly kind: 'ALTERNATIVE'; readonly left: Bindable; readonly right: Bindable }
    | { readonly kind: 'SEQUENTIAL'; readonly first: Bindable; readonly then: Bindable }
    | { readonly kind: 'PARALLEL'; readonly children: readonly Bindable[] };

export type BindingResult =
    | { readonly status: 'BOUND'; readonly bound: BoundResult; readonly boundAll?: readonly BoundResult[] }
    | { readonly status: 'LATENT'; readonly source: Unit };

/**
 * Anything that can attempt a single unit. BindingEngine satisfies this.
 */
export interface Binder {
    bind(unit: Unit, context: Context): BoundResult | null;
}

export const isBound = (result: BindingResult): result is Extract<BindingResult, { status: 'BOUND' }> =>
    result.status === 'BOUND';

// --- Constructors ---

export function atom(unit: Unit): Bindable {
    return Object.freeze({ kind: 'ATOMIC', unit });
}

/** `left | right`: fall back to right when left stays latent. */
export function alternative(left: Bindable, right: Bindable): Bindable {
    return Object.freeze({ kind: 'ALTERNATIVE', left, right });
}

/** `first >> then`: then is only attempted once first has bound. */
export function sequential(first: Bindable, then: Bindable): Bindable {
    return Object.freeze({ kind: 'SEQUENTIAL', first, then });
}

/** `a & b & ...`: every child is attempted; nested parallels are flattened. */
export function parallel(...children: Bindable[]): Bindable {
    if (children.length === 0) {
        throw new BindingError(ErrorCode.INVALID_COMPOSITION, 'parallel() needs at least one child');
    }
    const flat = children.flatMap(child => (child.kind === 'PARALLEL' ? child.children : [child]));
    return Object.freeze({ kind: 'PARALLEL', children: Object.freeze(flat) });
}

// --- Evaluation ---

export function evaluate(node: Bindable, context: Context, binder: Binder): BindingResult {
    switch (node.kind) {
        case 'ATOMIC': {
            const bound = binder.bind(node.unit, context);
            return bound
                ? { status: 'BOUND', bound }
                : { status: 'LATENT', source: node.unit };
        }
        case 'ALTERNATIVE': {
            const left = evaluate(node.left, context, binder);
            return isBound(left) ? left : evaluate(node.right, context, binder);
        }
        case 'SEQUENTIAL': {
            const first = evaluate(node.first, context, binder);
            return isBound(first) ? evaluate(node.then, context, binder) : first;
        }
        case 'PARALLEL': {
            const results = node.children.map(child => evaluate(child, context, binder));
            const boundAll: BoundResult[] = [];
            for (const result of results) {
                if (!isBound(result)) return result;
                boundAll.push(result.bound);
            }
            const last = boundAll[boundAll.length - 1];
            if (!last) {
                throw new BindingError(ErrorCode.INVALID_COMPOSITION, 'parallel node has no children');
            }
            return { status: 'BOUND', bound: last, boundAll };
        }
    }
}

export function render(node: Bindable): string {
    switch (node.kind) {
        case 'ATOMIC':
            return node.unit.id;
        case 'ALTERNATIVE':
            return `(${render(node.left)} | ${render(node.right)})`;
        case 'SEQUENTIAL':
            return `(${render(node.first)} >> ${render(node.then)})`;
        case 'PARALLEL':
            return `(${node.children.map(render).join(' & ')})`;
    }
}
