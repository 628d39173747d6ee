// Public API
export { BindingEngine } from './Kernel.js';
export type { TurnHook, EvolutionResult } from './Kernel.js';

export * from './Errors.js';
export * from './L0/Ontology.js';
export { canTransition, createTransition } from './L0/Lifecycle.js';
export type { UnitState, Transition } from './L0/Lifecycle.js';
export { parseTemporal, evaluateTemporal, judgeTemporal, TemporalParseError } from './L0/Temporal.js';
export type { TemporalExpression, TemporalOperator, TemporalJudgement } from './L0/Temporal.js';
export {
    ActorGuard, DependencyGuard, ExpirationGuard, LocationGuard, StateGuard, TemporalGuard
} from './L0/Guards.js';
export type { GuardChecker, GuardInput, CheckerName } from './L0/Guards.js';
export { GuardPipeline, BINDING_PIPELINE, PREFILTER_PIPELINE } from './L0/GuardPipeline.js';

export { UnitRegistry } from './L1/UnitRegistry.js';
export { findCycle } from './L1/DependencyGraph.js';

export { createContext, withStateUpdate, applyStateMutation, snapshotContext } from './L2/Context.js';
export type { ContextInit } from './L2/Context.js';
export { defineUnit, UnitTemplate, TemplateRegistry } from './L2/UnitFactory.js';
export type { UnitInit, GuardInit, TemplateOptions, TemplateUnitInit, TemplateSchema, UnitTarget } from './L2/UnitFactory.js';

export type { SweepResult } from './L3/Cascade.js';

export { atom, alternative, sequential, parallel, evaluate, render, isBound } from './L4/Combinators.js';
export type { Bindable, BindingResult, Binder } from './L4/Combinators.js';

export { AttemptLog, AttemptRecorder, failureBreakdown } from './L5/Audit.js';
export { InMemorySink, JsonlFileSink, JsonFileSink, MultiplexSink } from './L5/Sinks.js';
export type { JsonlSinkOptions } from './L5/Sinks.js';
export { AuditExporter, LedgerExporter, exportAttemptsFiltered, isExportFormat, parseExportFormat, ENGINE_VERSION } from './L5/Export.js';
export type { ExportFormat, AuditExportMetadata, LedgerExportMetadata } from './L5/Export.js';
export { SQLiteAuditSink } from './infrastructure/persistence/SQLiteAuditSink.js';
export type { AttemptRow } from './infrastructure/persistence/SQLiteAuditSink.js';

export { ActorSequenceRunner } from './L6/Orchestration.js';
export type { Perspective, TimelineEntry, SequenceResult } from './L6/Orchestration.js';

export { DEFAULT_CONFIG, resolveConfig } from './Platform/Config.js';
export type { EngineConfig, ActivationHook } from './Platform/Config.js';
export { createLogger } from './Platform/Logger.js';
export type { Logger, LogLevel } from './Platform/Logger.js';
export { SystemClock } from './Platform/Ports.js';
export type { IAuditSink, ISystemClock } from './Platform/Ports.js';
