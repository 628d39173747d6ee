// src/L1/UnitRegistry.ts
import type { Unit, UnitID } from '../L0/Ontology.js';
import { CircularDependencyError, UnitNotFoundError } from '../Errors.js';
import { findCycle } from './DependencyGraph.js';

/**
 * Unit Registry
 * Stores units by id in insertion order and keeps the dependency graph acyclic.
 */
export class UnitRegistry {
    private units: Map<UnitID, Unit> = new Map();
    private graph: Map<UnitID, readonly UnitID[]> = new Map();

    /**
     * Insert or overwrite a unit. The whole candidate graph is re-validated;
     * on a cycle nothing is committed.
     */
    register(unit: Unit): void {
        const candidate = new Map(this.graph);
        candidate.set(unit.id, [...unit.dependsOn]);

        const cycle = findCycle(candidate);
        if (cycle) {
            throw new CircularDependencyError(cycle);
        }

        this.graph = candidate;
        this.units.set(unit.id, unit);
    }

    get(id: UnitID): Unit | undefined {
        return this.units.get(id);
    }

    /**
     * Lookup that treats a missing id as a caller error.
     */
    require(id: UnitID): Unit {
        const unit = this.units.get(id);
        if (!unit) throw new UnitNotFoundError(id);
        return unit;
    }

    has(id: UnitID): boolean {
        return this.units.has(id);
    }

    /**
     * All units in registration order.
     */
    list(): Unit[] {
        return Array.from(this.units.values());
    }

    dependenciesOf(id: UnitID): readonly UnitID[] {
        return this.graph.get(id) ?? [];
    }

    /**
     * Ids whose declared dependencies include `id`.
     */
    dependentsOf(id: UnitID): UnitID[] {
        const dependents: UnitID[] = [];
        for (const [node, deps] of this.graph) {
            if (deps.includes(id)) dependents.push(node);
        }
        return dependents;
    }

    get size(): number {
        return this.units.size;
    }
}
