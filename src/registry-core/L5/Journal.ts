// src/registry-core/L5/Journal.ts
import { hash, canonicalize, freezeCanonical, GENESIS_HASH } from '../L0/Crypto.js';
import type { CanonicalValue } from '../L0/Crypto.js';
import type { Identity } from '../L0/Ontology.js';

export const JOURNAL_OPERATIONS = [
    'initialize',
    'addAsset',
    'updateAssetProperties',
    'updateAssetOwner',
    'recordTrackingEvent'
] as const;

export type JournalOperation = typeof JOURNAL_OPERATIONS[number];

export function isJournalOperation(value: string): value is JournalOperation {
    return JOURNAL_OPERATIONS.some(op => op === value);
}

/**
 * A committed call, as handed to the journal.
 */
export interface JournalRecord {
    caller: Identity;
    operation: JournalOperation;
    args: CanonicalValue[];
}

// --- Journal Entry (hash-linked) ---
export interface JournalEntry extends JournalRecord {
    sequence: number;
    entryId: string; // The identifying hash
    previousEntryId: string; // Chain linkage
    recordedAt: number;
}

/**
 * Journal Store Port. Synchronous: an entry is durable once `append` returns.
 */
export interface IJournalStore {
    append(entry: JournalEntry): void;
    getHistory(): JournalEntry[];
    getLatest(): JournalEntry | null;
}

export class MemoryJournalStore implements IJournalStore {
    private entries: JournalEntry[] = [];

    append(entry: JournalEntry): void {
        this.entries.push(entry);
    }
    getHistory(): JournalEntry[] {
        return [...this.entries];
    }
    getLatest(): JournalEntry | null {
        return this.entries[this.entries.length - 1] ?? null;
    }
}

export class Journal {
    constructor(
        private store: IJournalStore = new MemoryJournalStore(),
        private clock: () => number = Date.now
    ) { }

    public append(record: JournalRecord): JournalEntry {
        const latest = this.store.getLatest();
        const previousEntryId = latest ? latest.entryId : GENESIS_HASH;
        const sequence = latest ? latest.sequence + 1 : 0;
        const recordedAt = this.clock();

        // Entries are handed out by reference; nothing reachable from one may change
        const args = record.args.map(a => freezeCanonical(a));
        Object.freeze(args);

        const entry: JournalEntry = {
            sequence,
            entryId: Journal.calculateHash(previousEntryId, sequence, { ...record, args }, recordedAt),
            previousEntryId,
            caller: record.caller,
            operation: record.operation,
            args,
            recordedAt
        };

        Object.freeze(entry);
        this.store.append(entry);
        return entry;
    }

    public getHistory(): JournalEntry[] {
        return this.store.getHistory();
    }

    public getTip(): JournalEntry | null {
        return this.store.getLatest();
    }

    public get length(): number {
        const tip = this.store.getLatest();
        return tip ? tip.sequence + 1 : 0;
    }

    public verifyChain(): boolean {
        return this.findBreak() === null;
    }

    /**
     * Sequence number of the first entry whose linkage or hash does not
     * check out, or null for an intact chain.
     */
    public findBreak(): number | null {
        let prev = GENESIS_HASH;
        let expectedSequence = 0;

        for (const entry of this.store.getHistory()) {
            if (entry.sequence !== expectedSequence) return entry.sequence;
            if (entry.previousEntryId !== prev) return entry.sequence;

            const h = Journal.calculateHash(prev, entry.sequence, entry, entry.recordedAt);
            if (h !== entry.entryId) return entry.sequence;

            prev = entry.entryId;
            expectedSequence++;
        }
        return null;
    }

    private static calculateHash(prevHash: string, sequence: number, record: JournalRecord, recordedAt: number): string {
        // [PreviousHash, Sequence, Caller, Operation, Args, RecordedAt]
        const canonical: CanonicalValue[] = [
            prevHash,
            sequence,
            record.caller,
            record.operation,
            record.args,
            recordedAt
        ];
        return hash(canonicalize(canonical));
    }
}
