import Database from 'better-sqlite3';
import type { IJournalStore, JournalEntry } from '../../registry-core/L5/Journal.js';
import { isJournalOperation } from '../../registry-core/L5/Journal.js';
import type { CanonicalValue } from '../../registry-core/L0/Crypto.js';
import { DataIntegrityError, ErrorCode } from '../../registry-core/Errors.js';

interface JournalRow {
    sequence: number;
    entryId: string;
    previousEntryId: string;
    caller: string;
    operation: string;
    args: string;
    recordedAt: number;
}

type InsertParams = [number, string, string, string, string, string, number];

function isArgs(value: unknown): value is CanonicalValue[] {
    return Array.isArray(value);
}

export class SQLiteJournalStore implements IJournalStore {
    private db: Database.Database;
    private insert: Database.Statement<InsertParams, unknown>;
    private selectAll: Database.Statement<[], JournalRow>;
    private selectLatest: Database.Statement<[], JournalRow>;

    constructor(dbPath: string = 'registry.db') {
        this.db = new Database(dbPath);
        this.initialize();
        this.insert = this.db.prepare<InsertParams, unknown>(`
            INSERT INTO journal (
                sequence, entryId, previousEntryId, caller, operation, args, recordedAt
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?
            )
        `);
        this.selectAll = this.db.prepare<[], JournalRow>('SELECT * FROM journal ORDER BY sequence ASC');
        this.selectLatest = this.db.prepare<[], JournalRow>('SELECT * FROM journal ORDER BY sequence DESC LIMIT 1');
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS journal (
                sequence INTEGER PRIMARY KEY,
                entryId TEXT UNIQUE NOT NULL,
                previousEntryId TEXT NOT NULL,
                caller TEXT NOT NULL,
                operation TEXT NOT NULL,
                args TEXT NOT NULL,
                recordedAt INTEGER NOT NULL
            )
        `);
    }

    append(entry: JournalEntry): void {
        this.insert.run(
            entry.sequence,
            entry.entryId,
            entry.previousEntryId,
            entry.caller,
            entry.operation,
            JSON.stringify(entry.args),
            entry.recordedAt
        );
    }

    getHistory(): JournalEntry[] {
        return this.selectAll.all().map(row => this.mapRowToEntry(row));
    }

    getLatest(): JournalEntry | null {
        const row = this.selectLatest.get();
        if (!row) return null;
        return this.mapRowToEntry(row);
    }

    private mapRowToEntry(row: JournalRow): JournalEntry {
        const args: unknown = JSON.parse(row.args);
        if (!isJournalOperation(row.operation) || !isArgs(args)) {
            throw new DataIntegrityError(ErrorCode.INTEGRITY_BREACH, `Malformed journal row ${row.sequence}`, row.entryId);
        }
        return {
            sequence: row.sequence,
            entryId: row.entryId,
            previousEntryId: row.previousEntryId,
            caller: row.caller,
            operation: row.operation,
            args,
            recordedAt: row.recordedAt
        };
    }

    public close() {
        this.db.close();
    }
}
