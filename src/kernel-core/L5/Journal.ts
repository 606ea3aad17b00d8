// src/kernel-core/L5/Journal.ts
import { hash, canonicalize } from '../L0/Crypto.js';
import type { Hash } from '../L0/Primitives.js';
import type { LedgerEvent, LedgerEventType, EventOf } from '../L0/Ontology.js';

/**
 * Event Store Port
 * Durable home for journal entries; the journal keeps its own chain in memory.
 */
export interface IEventStore {
    append(entries: readonly JournalEntry[]): Promise<void>;
    getHistory(): Promise<JournalEntry[]>;
    getLatest(): Promise<JournalEntry | null>;
}

// --- Journal entry: one emitted event, linked to its predecessor ---
export interface JournalEntry {
    entryId: Hash;
    previousEntryId: Hash;
    sequence: number;
    event: LedgerEvent;
}

export const GENESIS_ENTRY_ID: Hash = '0'.repeat(64);

export class EventJournal {
    private localChain: JournalEntry[] = [];

    constructor(private readonly store?: IEventStore) { }

    /**
     * Appends the events of one committed transaction, in order. Entries are
     * persisted before they become visible locally.
     */
    public async append(events: readonly LedgerEvent[]): Promise<JournalEntry[]> {
        if (events.length === 0) return [];

        const tip = await this.getTip();
        let previous = tip ? tip.entryId : GENESIS_ENTRY_ID;
        let sequence = tip ? tip.sequence + 1 : 0;

        const entries: JournalEntry[] = [];
        for (const event of events) {
            const entry: JournalEntry = {
                entryId: EventJournal.entryHash(previous, sequence, event),
                previousEntryId: previous,
                sequence,
                event
            };
            entries.push(Object.freeze(entry));
            previous = entry.entryId;
            sequence++;
        }

        if (this.store) {
            await this.store.append(entries);
        }
        this.localChain.push(...entries);
        return entries;
    }

    public async getHistory(): Promise<JournalEntry[]> {
        if (this.store) {
            return await this.store.getHistory();
        }
        return [...this.localChain];
    }

    public async getTip(): Promise<JournalEntry | null> {
        const last = this.localChain[this.localChain.length - 1];
        if (last) return last;
        if (this.store) return await this.store.getLatest();
        return null;
    }

    public async ofType<T extends LedgerEventType>(type: T): Promise<EventOf<T>[]> {
        const history = await this.getHistory();
        return history
            .map((entry) => entry.event)
            .filter((event): event is EventOf<T> => event.type === type);
    }

    public async verifyChain(): Promise<boolean> {
        const history = await this.getHistory();
        let previous = GENESIS_ENTRY_ID;
        let sequence = 0;

        for (const entry of history) {
            if (entry.previousEntryId !== previous) return false;
            if (entry.sequence !== sequence) return false;
            if (EventJournal.entryHash(previous, sequence, entry.event) !== entry.entryId) return false;
            previous = entry.entryId;
            sequence++;
        }
        return true;
    }

    // [PreviousHash, Sequence, Type, Timestamp, EventHash]
    private static entryHash(previous: Hash, sequence: number, event: LedgerEvent): Hash {
        return hash(canonicalize([previous, sequence, event.type, event.timestamp, hash(canonicalize(event))]));
    }
}
