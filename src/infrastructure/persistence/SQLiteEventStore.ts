import Database from 'better-sqlite3';
import type { IEventStore, JournalEntry } from '../../kernel-core/L5/Journal.js';
import { decodeEvent, encodeJson } from './EventCodec.js';

interface JournalRow {
    sequence: number;
    entryId: string;
    previousEntryId: string;
    type: string;
    timestamp: number;
    payload: string;
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'ledger.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS ledger_events (
                sequence INTEGER PRIMARY KEY,
                entryId TEXT UNIQUE NOT NULL,
                previousEntryId TEXT NOT NULL,
                type TEXT NOT NULL,
                timestamp INTEGER NOT NULL,
                payload TEXT NOT NULL
            )
        `);
    }

    /** One SQLite transaction per call: a batch lands whole or not at all. */
    async append(entries: readonly JournalEntry[]): Promise<void> {
        const stmt = this.db.prepare<[number, string, string, string, number, string]>(`
            INSERT INTO ledger_events (
                sequence, entryId, previousEntryId, type, timestamp, payload
            ) VALUES (
                ?, ?, ?, ?, ?, ?
            )
        `);

        const insertAll = this.db.transaction((batch: readonly JournalEntry[]) => {
            for (const entry of batch) {
                stmt.run(
                    entry.sequence,
                    entry.entryId,
                    entry.previousEntryId,
                    entry.event.type,
                    entry.event.timestamp,
                    encodeJson(entry.event)
                );
            }
        });
        insertAll(entries);
    }

    async getHistory(): Promise<JournalEntry[]> {
        const stmt = this.db.prepare<[], JournalRow>('SELECT * FROM ledger_events ORDER BY sequence ASC');
        return stmt.all().map((row) => this.mapRowToEntry(row));
    }

    async getLatest(): Promise<JournalEntry | null> {
        const stmt = this.db.prepare<[], JournalRow>('SELECT * FROM ledger_events ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToEntry(row);
    }

    private mapRowToEntry(row: JournalRow): JournalEntry {
        return {
            entryId: row.entryId,
            previousEntryId: row.previousEntryId,
            sequence: row.sequence,
            event: decodeEvent(row.payload)
        };
    }

    public close() {
        this.db.close();
    }
}
