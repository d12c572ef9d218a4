import Database from 'better-sqlite3';
import { z } from 'zod';
import { callContextSchema, ledgerCallSchema } from '../../ledger-core/L0/Calls.js';
import { LedgerErrorCode } from '../../ledger-core/Errors.js';
import type { Evidence, IEventStore } from '../../ledger-core/L5/Audit.js';

const rowSchema = z.object({
    evidenceId: z.string(),
    previousEvidenceId: z.string(),
    operation: z.string(),
    call: z.string(),
    context: z.string(),
    status: z.enum(['SUCCESS', 'REJECT', 'ABORTED']),
    stateRoot: z.string().nullable(),
    errorCode: z.nativeEnum(LedgerErrorCode).nullable(),
    reason: z.string().nullable()
});

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'ledger.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                operation TEXT NOT NULL,
                caller TEXT NOT NULL,
                height INTEGER NOT NULL,
                call TEXT NOT NULL,
                context TEXT NOT NULL,
                status TEXT NOT NULL,
                stateRoot TEXT,
                errorCode INTEGER,
                reason TEXT
            )
        `);
    }

    append(evidence: Evidence): void {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                evidenceId, previousEvidenceId, operation, caller, height, call, context, status, stateRoot, errorCode, reason
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.call.operation,
            evidence.context.caller,
            evidence.context.height,
            JSON.stringify(evidence.call),
            JSON.stringify(evidence.context),
            evidence.status,
            evidence.stateRoot ?? null,
            evidence.errorCode ?? null,
            evidence.reason ?? null
        );
    }

    getHistory(): Evidence[] {
        const rows = this.db.prepare('SELECT * FROM audit_log ORDER BY sequence ASC').all();
        return rows.map(row => this.mapRowToEvidence(row));
    }

    getLatest(): Evidence | null {
        const row = this.db.prepare('SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1').get();
        if (!row) return null;
        return this.mapRowToEvidence(row);
    }

    private mapRowToEvidence(raw: unknown): Evidence {
        const row = rowSchema.parse(raw);
        return {
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            call: ledgerCallSchema.parse(JSON.parse(row.call)),
            context: callContextSchema.parse(JSON.parse(row.context)),
            status: row.status,
            ...(row.stateRoot !== null ? { stateRoot: row.stateRoot } : {}),
            ...(row.errorCode !== null ? { errorCode: row.errorCode } : {}),
            ...(row.reason !== null ? { reason: row.reason } : {})
        };
    }

    public close() {
        this.db.close();
    }
}
