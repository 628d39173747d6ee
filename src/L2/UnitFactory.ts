// src/L2/UnitFactory.ts
import { freeze } from 'immer';
import type { ConsumptionMode, Guard, Payload, Unit, UnitID } from '../L0/Ontology.js';
import { ErrorCode, TemplateViolationError } from '../Errors.js';
import { copyRecord } from './Context.js';

const UNIT_TYPE = /^[A-Z]+:[a-z_]+$/;

export interface GuardInit {
    actors?: Iterable<string>;
    when?: string;
    locations?: Iterable<string>;
    state?: Record<string, unknown>;
}

export interface UnitInit {
    id: UnitID;
    type: string;
    guard?: GuardInit;
    payload?: Record<string, unknown>;
    metadata?: Record<string, unknown>;
    dependsOn?: readonly UnitID[];
    consumption?: ConsumptionMode;
}

function toGuard(init: GuardInit = {}): Guard {
    return {
        ...(init.actors !== undefined ? { actors: new Set(init.actors) } : {}),
        ...(init.when !== undefined ? { when: init.when } : {}),
        ...(init.locations !== undefined ? { locations: new Set(init.locations) } : {}),
        ...(init.state !== undefined ? { state: copyRecord(init.state) } : {})
    };
}

/**
 * Validates and deep-freezes a Unit. Guard collections become Sets.
 */
export function defineUnit(init: UnitInit): Unit {
    if (typeof init.id !== 'string' || init.id.trim().length === 0) {
        throw new TemplateViolationError(ErrorCode.INVALID_UNIT, 'Unit id must be a non-empty string');
    }
    if (!UNIT_TYPE.test(init.type)) {
        throw new TemplateViolationError(
            ErrorCode.INVALID_UNIT,
            `Unit type '${init.type}' must match CATEGORY:name`,
            { unitId: init.id, type: init.type }
        );
    }
    const consumption = init.consumption ?? 'ONE_SHOT';
    if (consumption !== 'ONE_SHOT' && consumption !== 'REUSABLE') {
        throw new TemplateViolationError(
            ErrorCode.INVALID_UNIT,
            `Unknown consumption mode '${String(consumption)}'`,
            { unitId: init.id }
        );
    }
    const dependsOn = [...(init.dependsOn ?? [])];
    if (dependsOn.some(dep => typeof dep !== 'string' || dep.length === 0)) {
        throw new TemplateViolationError(
            ErrorCode.INVALID_UNIT,
            `Unit '${init.id}' declares an empty dependency id`,
            { unitId: init.id }
        );
    }

    const unit: Unit = {
        id: init.id,
        type: init.type,
        guard: toGuard(init.guard),
        payload: copyRecord(init.payload ?? {}),
        metadata: copyRecord(init.metadata ?? {}),
        dependsOn,
        consumption
    };
    return freeze(unit, true);
}

// --- Templates ---

export type PayloadValidator = (payload: Payload) => void;

export interface TemplateOptions {
    typePattern: string; // e.g. "QUEST:*"
    requiredPayloadFields?: Iterable<string>;
    optionalPayloadFields?: Iterable<string>;
    gateRequirements?: Record<string, unknown>;
    defaultGuard?: GuardInit;
    validatePayload?: PayloadValidator;
}

export type TemplateUnitInit = Omit<UnitInit, 'payload'> & { payload: Record<string, unknown> };

export interface TemplateSchema {
    typePattern: string;
    requiredPayloadFields: string[];
    optionalPayloadFields: string[];
    gateRequirements: Record<string, unknown>;
}

function patternToRegExp(pattern: string): RegExp {
    const body = pattern
        .split('*')
        .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
        .join('.*');
    return new RegExp(`^${body}$`);
}

/**
 * Reusable unit shape: a type pattern with a `*` wildcard, required payload
 * fields, and a guard to fall back on.
 */
export class UnitTemplate {
    public readonly typePattern: string;
    public readonly requiredPayloadFields: ReadonlySet<string>;
    public readonly optionalPayloadFields: ReadonlySet<string>;
    public readonly gateRequirements: Readonly<Record<string, unknown>>;
    private readonly defaultGuard?: GuardInit;
    private readonly validator?: PayloadValidator;
    private readonly matcher: RegExp;

    constructor(options: TemplateOptions) {
        if (!options.typePattern) {
            throw new TemplateViolationError(ErrorCode.TEMPLATE_VIOLATION, 'typePattern is required');
        }
        if (!options.typePattern.includes('*')) {
            throw new TemplateViolationError(
                ErrorCode.TEMPLATE_VIOLATION,
                `typePattern '${options.typePattern}' must contain a '*' wildcard`
            );
        }
        this.typePattern = options.typePattern;
        this.requiredPayloadFields = new Set(options.requiredPayloadFields ?? []);
        this.optionalPayloadFields = new Set(options.optionalPayloadFields ?? []);
        this.gateRequirements = { ...(options.gateRequirements ?? {}) };
        this.defaultGuard = options.defaultGuard;
        this.validator = options.validatePayload;
        this.matcher = patternToRegExp(options.typePattern);
    }

    matchesType(type: string): boolean {
        return this.matcher.test(type);
    }

    /**
     * Custom payload check, run after the required-field check.
     */
    validatePayload(payload: Payload): void {
        this.validator?.(payload);
    }

    create(init: TemplateUnitInit): Unit {
        if (!this.matchesType(init.type)) {
            throw new TemplateViolationError(
                ErrorCode.TEMPLATE_VIOLATION,
                `Unit type '${init.type}' doesn't match template pattern '${this.typePattern}'`,
                { type: init.type, typePattern: this.typePattern }
            );
        }

        const missing = [...this.requiredPayloadFields]
            .filter(field => !Object.prototype.hasOwnProperty.call(init.payload, field))
            .sort();
        if (missing.length > 0) {
            throw new TemplateViolationError(
                ErrorCode.TEMPLATE_VIOLATION,
                `Missing required payload fields: ${missing.join(', ')}`,
                { missing }
            );
        }

        const guard = init.guard ?? this.defaultGuard;
        if (!guard) {
            throw new TemplateViolationError(
                ErrorCode.TEMPLATE_VIOLATION,
                'No guard provided and no default guard in template'
            );
        }

        this.validatePayload(init.payload);
        return defineUnit({ ...init, guard });
    }

    toJsonSchema(): TemplateSchema {
        return {
            typePattern: this.typePattern,
            requiredPayloadFields: [...this.requiredPayloadFields].sort(),
            optionalPayloadFields: [...this.optionalPayloadFields].sort(),
            gateRequirements: { ...this.gateRequirements }
        };
    }
}

/**
 * Whatever accepts finished units. BindingEngine satisfies this.
 */
export interface UnitTarget {
    register(unit: Unit): void;
}

export class TemplateRegistry {
    private templates: Map<string, UnitTemplate> = new Map();

    constructor(private readonly engine: UnitTarget) { }

    register(template: UnitTemplate): void {
        this.templates.set(template.typePattern, template);
    }

    get(pattern: string): UnitTemplate | undefined {
        return this.templates.get(pattern);
    }

    /**
     * First registered template whose pattern matches `type`.
     */
    findByType(type: string): UnitTemplate | undefined {
        for (const template of this.templates.values()) {
            if (template.matchesType(type)) return template;
        }
        return undefined;
    }

    /**
     * Builds a unit from the template registered under `pattern`, falling back
     * to pattern matching on the unit's type. Registers it unless told not to.
     */
    create(pattern: string, init: TemplateUnitInit, autoRegister = true): Unit {
        const template = this.templates.get(pattern) ?? this.findByType(init.type);
        if (!template) {
            throw new TemplateViolationError(
                ErrorCode.TEMPLATE_NOT_FOUND,
                `Template not found for pattern '${pattern}' or type '${init.type}'. ` +
                `Available templates: ${[...this.templates.keys()].join(', ')}`,
                { pattern, type: init.type }
            );
        }

        const unit = template.create(init);
        if (autoRegister) {
            this.engine.register(unit);
        }
        return unit;
    }

    patterns(): string[] {
        return [...this.templates.keys()];
    }
}
