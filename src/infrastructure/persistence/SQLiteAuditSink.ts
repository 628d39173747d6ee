import Database from 'better-sqlite3';
import type { Attempt, ContextSnapshot, FailureReason, UnitID } from '../../L0/Ontology.js';
import type { IAuditSink } from '../../Platform/Ports.js';
import { BindingError, ErrorCode } from '../../Errors.js';

const TABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface AttemptRow {
    sequence: number;
    unitId: UnitID;
    success: boolean;
    timestamp: string;
    context: ContextSnapshot;
    failureReasons: FailureReason[];
    boundResultId: UnitID | null;
}

interface RawRow {
    sequence: number;
    unitId: string;
    success: number;
    timestamp: string;
    context: string;
    failureReasons: string | null;
    boundResultId: string | null;
}

function isRawRow(value: unknown): value is RawRow {
    if (typeof value !== 'object' || value === null) return false;
    return 'sequence' in value && 'unitId' in value && 'success' in value && 'context' in value;
}

export class SQLiteAuditSink implements IAuditSink {
    private db: Database.Database;
    private insert: Database.Statement;

    constructor(dbPath: string = 'binding-audit.db', private readonly table: string = 'binding_attempts') {
        if (!TABLE_NAME.test(table)) {
            throw new BindingError(ErrorCode.INVALID_CONFIG, `Invalid table name: '${table}'`, { table });
        }
        this.db = new Database(dbPath);
        this.initialize();
        this.insert = this.db.prepare(`
            INSERT INTO ${this.table} (
                unitId, success, timestamp, context, failureReasons, boundResultId
            ) VALUES (
                ?, ?, ?, ?, ?, ?
            )
        `);
    }

    private initialize() {
        if (!this.db.memory) {
            this.db.pragma('journal_mode = WAL');
        }
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS ${this.table} (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                unitId TEXT NOT NULL,
                success INTEGER NOT NULL,
                timestamp TEXT NOT NULL,
                context TEXT NOT NULL,
                failureReasons TEXT,
                boundResultId TEXT
            )
        `);
    }

    write(attempt: Attempt): void {
        this.insert.run(
            attempt.unitId,
            attempt.success ? 1 : 0,
            attempt.timestamp.toISOString(),
            JSON.stringify(attempt.context),
            attempt.success ? null : JSON.stringify(attempt.failureReasons),
            attempt.success ? attempt.boundResultId : null
        );
    }

    /** Each insert is committed immediately. */
    flush(): void { }

    close(): void {
        if (this.db.open) this.db.close();
    }

    public queryByUnit(unitId: UnitID): AttemptRow[] {
        const stmt = this.db.prepare(`SELECT * FROM ${this.table} WHERE unitId = ? ORDER BY sequence ASC`);
        return this.mapRows(stmt.all(unitId));
    }

    public queryFailures(unitId?: UnitID): AttemptRow[] {
        if (unitId === undefined) {
            const stmt = this.db.prepare(`SELECT * FROM ${this.table} WHERE success = 0 ORDER BY sequence ASC`);
            return this.mapRows(stmt.all());
        }
        const stmt = this.db.prepare(`SELECT * FROM ${this.table} WHERE success = 0 AND unitId = ? ORDER BY sequence ASC`);
        return this.mapRows(stmt.all(unitId));
    }

    public count(): number {
        const row: unknown = this.db.prepare(`SELECT COUNT(*) AS total FROM ${this.table}`).get();
        return typeof row === 'object' && row !== null && 'total' in row && typeof row.total === 'number' ? row.total : 0;
    }

    private mapRows(rows: unknown[]): AttemptRow[] {
        return rows.filter(isRawRow).map(row => this.mapRowToAttempt(row));
    }

    private mapRowToAttempt(row: RawRow): AttemptRow {
        return {
            sequence: row.sequence,
            unitId: row.unitId,
            success: row.success === 1,
            timestamp: row.timestamp,
            context: JSON.parse(row.context),
            failureReasons: row.failureReasons ? JSON.parse(row.failureReasons) : [],
            boundResultId: row.boundResultId
        };
    }
}
