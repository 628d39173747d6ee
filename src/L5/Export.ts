// src/L5/Export.ts
import fs from 'fs';
import path from 'path';
import type { Attempt, ConditionKind } from '../L0/Ontology.js';
import type { Transition } from '../L0/Lifecycle.js';
import { BindingError, ErrorCode } from '../Errors.js';
import { failureBreakdown } from './Audit.js';

export const ENGINE_VERSION = '0.1.0';

export type ExportFormat = 'json' | 'jsonl';

export interface AuditExportMetadata {
    exportTimestamp: string;
    engineVersion: string;
    totalAttempts: number;
    successCount: number;
    failureCount: number;
    successRate: number; // percent
    failureTypeBreakdown: Partial<Record<ConditionKind, number>>;
}

export interface LedgerExportMetadata {
    exportTimestamp: string;
    engineVersion: string;
    totalTransitions: number;
    transitionBreakdown: Record<string, number>;
}

function writeFile(filePath: string, content: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content, 'utf-8');
}

function toLines(entries: readonly unknown[]): string {
    return entries.map(entry => JSON.stringify(entry) + '\n').join('');
}

function unsupported(format: string): never {
    throw new BindingError(ErrorCode.UNSUPPORTED_FORMAT, `Unsupported format: ${format}`, { format });
}

export function isExportFormat(value: string): value is ExportFormat {
    return value === 'json' || value === 'jsonl';
}

export function parseExportFormat(value: string): ExportFormat {
    return isExportFormat(value) ? value : unsupported(value);
}

export class AuditExporter {
    static metadata(attempts: readonly Attempt[]): AuditExportMetadata {
        const total = attempts.length;
        const successCount = attempts.filter(a => a.success).length;
        return {
            exportTimestamp: new Date().toISOString(),
            engineVersion: ENGINE_VERSION,
            totalAttempts: total,
            successCount,
            failureCount: total - successCount,
            successRate: total > 0 ? (successCount / total) * 100 : 0,
            failureTypeBreakdown: failureBreakdown(attempts)
        };
    }

    /** `{ metadata, auditTrail }`, pretty-printed. */
    static toJson(attempts: readonly Attempt[], filePath: string, includeMetadata = true): void {
        const document = includeMetadata
            ? { metadata: AuditExporter.metadata(attempts), auditTrail: attempts }
            : { auditTrail: attempts };
        writeFile(filePath, JSON.stringify(document, null, 2));
    }

    static toJsonl(attempts: readonly Attempt[], filePath: string): void {
        writeFile(filePath, toLines(attempts));
    }

    static write(attempts: readonly Attempt[], filePath: string, format: ExportFormat): void {
        switch (format) {
            case 'json': return AuditExporter.toJson(attempts, filePath);
            case 'jsonl': return AuditExporter.toJsonl(attempts, filePath);
            default: return unsupported(format);
        }
    }
}

export class LedgerExporter {
    static metadata(transitions: readonly Transition[]): LedgerExportMetadata {
        const breakdown: Record<string, number> = {};
        for (const t of transitions) {
            const key = `${t.from} -> ${t.to}`;
            breakdown[key] = (breakdown[key] ?? 0) + 1;
        }
        return {
            exportTimestamp: new Date().toISOString(),
            engineVersion: ENGINE_VERSION,
            totalTransitions: transitions.length,
            transitionBreakdown: breakdown
        };
    }

    static toJson(transitions: readonly Transition[], filePath: string, includeMetadata = true): void {
        const document = includeMetadata
            ? { metadata: LedgerExporter.metadata(transitions), ledger: transitions }
            : { ledger: transitions };
        writeFile(filePath, JSON.stringify(document, null, 2));
    }

    static toJsonl(transitions: readonly Transition[], filePath: string): void {
        writeFile(filePath, toLines(transitions));
    }

    static write(transitions: readonly Transition[], filePath: string, format: ExportFormat): void {
        switch (format) {
            case 'json': return LedgerExporter.toJson(transitions, filePath);
            case 'jsonl': return LedgerExporter.toJsonl(transitions, filePath);
            default: return unsupported(format);
        }
    }
}

/**
 * Exports the attempts matching `success` (all of them when omitted) and
 * returns how many were written.
 */
export function exportAttemptsFiltered(
    attempts: readonly Attempt[],
    filePath: string,
    format: string = 'json',
    success?: boolean
): number {
    const checked = parseExportFormat(format);
    const filtered = success === undefined ? attempts : attempts.filter(a => a.success === success);
    AuditExporter.write(filtered, filePath, checked);
    return filtered.length;
}
