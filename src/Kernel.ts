import type { Attempt, BoundResult, ConditionKind, Context, FailureReason, StateChange, Unit, UnitID } from './L0/Ontology.js';
import { DEFAULT_WEIGHT, WEIGHT_KEY } from './L0/Ontology.js';
import { createTransition } from './L0/Lifecycle.js';
import type { Transition, UnitState } from './L0/Lifecycle.js';
import { GuardPipeline } from './L0/GuardPipeline.js';
import { UnitRegistry } from './L1/UnitRegistry.js';
import { snapshotContext } from './L2/Context.js';
import { CascadeScheduler } from './L3/Cascade.js';
import type { AttemptHandle, SweepResult } from './L3/Cascade.js';
import { AttemptLog, AttemptRecorder } from './L5/Audit.js';
import { AuditExporter, LedgerExporter } from './L5/Export.js';
import type { ExportFormat } from './L5/Export.js';
import { CircularDependencyError } from './Errors.js';
import { assertPositiveInteger, resolveConfig } from './Platform/Config.js';
import type { EngineConfig } from './Platform/Config.js';
import { createLogger } from './Platform/Logger.js';
import type { Logger } from './Platform/Logger.js';

export type TurnHook = (engine: BindingEngine, context: Context, turn: number) => Context;

export interface EvolutionResult {
    context: Context;
    turnsUsed: number;
}

/**
 * Binding Engine
 * Owns the registry, the satisfied-id set, the transition ledger and the
 * attempt log. Single writer; not reentrant.
 */
export class BindingEngine {
    private registry = new UnitRegistry();
    private satisfied: Set<UnitID> = new Set();
    private transitions: Transition[] = [];
    private audit = new AttemptLog();
    private recorder: AttemptRecorder;
    private guards = new GuardPipeline();
    private cascade: CascadeScheduler;
    private config: EngineConfig;
    private log: Logger;

    public constructor(options: Partial<EngineConfig> = {}) {
        this.config = resolveConfig(options);
        this.log = createLogger('BindingEngine', this.config.logLevel);
        this.recorder = new AttemptRecorder(this.audit, this.config.sink);
        this.cascade = new CascadeScheduler(
            {
                units: () => this.registry.list(),
                admits: (unit, context) => this.guards.admits({ unit, context, satisfied: this.satisfied }),
                attempt: (unit, context) => this.attempt(unit, context),
                recordStateChanges: (handle, changes) => this.recordStateChanges(handle, changes)
            },
            createLogger('Cascade', this.config.logLevel)
        );
    }

    // --- Registry ---

    /**
     * Registers a unit (CREATED -> DORMANT). A dependency cycle rejects the
     * registration without touching any engine state.
     */
    public register(unit: Unit): void {
        try {
            this.registry.register(unit);
        } catch (e: unknown) {
            if (e instanceof CircularDependencyError) {
                this.log.warn(`Registration of '${unit.id}' rejected: ${e.message}`);
            }
            throw e;
        }
        this.transition(unit.id, 'CREATED', 'DORMANT', 'Registered');
    }

    public get(id: UnitID): Unit | undefined {
        return this.registry.get(id);
    }

    public units(): Unit[] {
        return this.registry.list();
    }

    public isSatisfied(id: UnitID): boolean {
        return this.satisfied.has(id);
    }

    public satisfiedIds(): UnitID[] {
        return [...this.satisfied];
    }

    /** Current time according to the configured clock. */
    public now(): Date {
        return this.config.clock.now();
    }

    // --- Binding Core ---

    /**
     * Evaluates one unit against one context through every checker.
     * Guard mismatches are recorded and yield null; they never throw.
     */
    public bind(unit: Unit, context: Context): BoundResult | null {
        return this.attempt(unit, context)?.bound ?? null;
    }

    /**
     * Binds the named units in the given order. Unknown ids throw UnitNotFoundError
     * before anything is attempted.
     */
    public bindMany(ids: readonly UnitID[], context: Context): BoundResult[] {
        const units = ids.map(id => this.registry.require(id));
        const results: BoundResult[] = [];
        for (const unit of units) {
            const bound = this.bind(unit, context);
            if (bound) results.push(bound);
        }
        return results;
    }

    private attempt(unit: Unit, context: Context): AttemptHandle | null {
        const reasons: FailureReason[] = this.guards.evaluate({ unit, context, satisfied: this.satisfied });
        const now = this.config.clock.now();
        const snapshot = snapshotContext(context);

        if (reasons.length > 0) {
            this.recorder.record({
                unitId: unit.id,
                timestamp: now,
                context: snapshot,
                success: false,
                failureReasons: reasons
            });
            if (reasons.some(r => r.condition === 'expired')) {
                this.transition(unit.id, 'DORMANT', 'EXPIRED', 'Deadline passed');
            }
            return null;
        }

        const bound: BoundResult = Object.freeze({
            unitId: unit.id,
            type: unit.type,
            effect: unit.payload,
            weight: this.weightOf(unit),
            boundAt: now,
            context: snapshot
        });

        this.satisfied.add(unit.id);
        this.transition(unit.id, 'DORMANT', 'ACTIVATED', 'Binding success');

        const index = this.recorder.record({
            unitId: unit.id,
            timestamp: now,
            context: snapshot,
            success: true,
            boundResultId: unit.id
        });

        this.config.onActivated?.(unit, context, bound);
        return { bound, attemptIndex: index };
    }

    private weightOf(unit: Unit): number {
        const weight = unit.payload[WEIGHT_KEY];
        return typeof weight === 'number' && Number.isFinite(weight) ? weight : DEFAULT_WEIGHT;
    }

    private recordStateChanges(handle: AttemptHandle, changes: readonly StateChange[]): BoundResult {
        this.audit.amendStateChanges(handle.attemptIndex, changes);
        return Object.freeze({ ...handle.bound, stateChanges: [...changes] });
    }

    // --- Cascade ---

    /**
     * Multi-round cascade over all registered units. See CascadeScheduler.
     */
    public sweep(
        context: Context,
        maxRounds: number = this.config.maxRounds,
        applyMutations: boolean = this.config.applyMutations
    ): SweepResult {
        assertPositiveInteger('maxRounds', maxRounds);
        return this.cascade.sweep(context, maxRounds, applyMutations);
    }

    /**
     * Repeats sweeps until a turn activates no new unit. `onTurnComplete` may
     * inject state before the next turn.
     */
    public evolveUntilConverged(
        context: Context,
        maxTurns: number = this.config.maxTurns,
        onTurnComplete?: TurnHook
    ): EvolutionResult {
        assertPositiveInteger('maxTurns', maxTurns);
        let current = context;

        for (let turn = 0; turn < maxTurns; turn++) {
            const before = this.satisfied.size;
            current = this.sweep(current).context;

            if (this.satisfied.size === before) {
                this.log.info(`Converged after ${turn + 1} turn(s)`);
                return { context: current, turnsUsed: turn + 1 };
            }
            if (onTurnComplete) {
                current = onTurnComplete(this, current, turn);
            }
        }
        return { context: current, turnsUsed: maxTurns };
    }

    // --- Ledger & Audit ---

    private transition(unitId: UnitID, from: UnitState, to: UnitState, reason: string): void {
        this.transitions.push(createTransition(unitId, from, to, reason, this.config.clock.now()));
    }

    public ledger(unitId?: UnitID): Transition[] {
        if (unitId === undefined) return [...this.transitions];
        return this.transitions.filter(t => t.unitId === unitId);
    }

    public attempts(unitId?: UnitID): Attempt[] {
        return this.audit.attempts(unitId);
    }

    public failed(unitId: UnitID): Attempt[] {
        return this.audit.failed(unitId);
    }

    public explain(unitId: UnitID): string {
        return this.audit.explain(unitId);
    }

    public stats(): Partial<Record<ConditionKind, number>> {
        return this.audit.stats();
    }

    // --- Export ---

    public exportTrail(filePath: string, format: ExportFormat = 'json'): void {
        AuditExporter.write(this.audit.attempts(), filePath, format);
    }

    public exportFailures(filePath: string, format: ExportFormat = 'json'): number {
        const failures = this.audit.attempts().filter(a => !a.success);
        AuditExporter.write(failures, filePath, format);
        return failures.length;
    }

    public exportLedger(filePath: string, format: ExportFormat = 'json'): void {
        LedgerExporter.write(this.transitions, filePath, format);
    }

    // --- Sink Lifecycle ---

    public flush(): void {
        this.recorder.flush();
    }

    public close(): void {
        if (this.recorder.close()) {
            this.log.info('Audit sink closed');
        }
    }
}
