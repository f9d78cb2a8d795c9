import { describe, test, expect } from '@jest/globals';
import { Journal, MemoryJournalStore, isJournalOperation } from '../Journal.js';
import type { IJournalStore, JournalEntry } from '../Journal.js';
import { GENESIS_HASH, canonicalize, hash } from '../../L0/Crypto.js';

// Serves a modified copy of the history; appends go through untouched
class TamperedStore implements IJournalStore {
    constructor(
        private inner: IJournalStore,
        private tamper: (entry: JournalEntry) => JournalEntry
    ) { }
    append(entry: JournalEntry): void { this.inner.append(entry); }
    getHistory(): JournalEntry[] { return this.inner.getHistory().map(e => this.tamper(e)); }
    getLatest(): JournalEntry | null { return this.inner.getLatest(); }
}

describe('Journal', () => {
    test('entries are sequenced and hash-linked', () => {
        const journal = new Journal(new MemoryJournalStore(), () => 7);
        const first = journal.append({ caller: '', operation: 'initialize', args: ['root'] });
        const second = journal.append({ caller: 'root', operation: 'updateAssetOwner', args: [0, 'bob'] });

        expect(first.sequence).toBe(0);
        expect(first.previousEntryId).toBe(GENESIS_HASH);
        expect(first.entryId).toBe(hash(canonicalize([GENESIS_HASH, 0, '', 'initialize', ['root'], 7])));
        expect(second.sequence).toBe(1);
        expect(second.previousEntryId).toBe(first.entryId);
        expect(journal.length).toBe(2);
        expect(journal.getTip()).toEqual(second);
        expect(Object.isFrozen(second)).toBe(true);
        expect(journal.verifyChain()).toBe(true);
    });

    test('identical calls at identical times hash identically', () => {
        const a = new Journal(undefined, () => 1);
        const b = new Journal(undefined, () => 1);
        const record = { caller: 'root', operation: 'addAsset' as const, args: ['Crate', 1, 'alice', [], []] };
        expect(a.append(record).entryId).toBe(b.append(record).entryId);
    });

    test('tampering is located', () => {
        const inner = new MemoryJournalStore();
        const journal = new Journal(inner, () => 1);
        journal.append({ caller: '', operation: 'initialize', args: ['root'] });
        journal.append({ caller: 'root', operation: 'addAsset', args: ['Crate', 1, 'alice', [], []] });
        journal.append({ caller: 'alice', operation: 'updateAssetOwner', args: [0, 'bob'] });

        const forged = new Journal(new TamperedStore(inner, e =>
            e.sequence === 1 ? { ...e, args: ['Crate', 1, 'mallory', [], []] } : e
        ));
        expect(forged.verifyChain()).toBe(false);
        expect(forged.findBreak()).toBe(1);

        const reordered = new Journal(new TamperedStore(inner, e =>
            e.sequence === 2 ? { ...e, sequence: 5 } : e
        ));
        expect(reordered.findBreak()).toBe(5);
    });

    test('entries handed out by the journal cannot be altered', () => {
        const journal = new Journal(new MemoryJournalStore(), () => 1);
        journal.append({ caller: '', operation: 'initialize', args: ['root'] });
        journal.append({ caller: 'root', operation: 'addAsset', args: ['Crate', 1, 'alice', ['lot'], ['L1']] });

        const [, entry] = journal.getHistory();
        const keys = entry?.args[3];
        expect(() => { if (entry) entry.args[0] = 'Forged'; }).toThrow(TypeError);
        expect(() => { if (Array.isArray(keys)) keys.push('extra'); }).toThrow(TypeError);

        expect(journal.getHistory()[1]?.args).toEqual(['Crate', 1, 'alice', ['lot'], ['L1']]);
        expect(journal.verifyChain()).toBe(true);
    });

    test('the caller keeps no handle on journaled args', () => {
        const journal = new Journal(new MemoryJournalStore(), () => 1);
        const keys = ['lot'];
        journal.append({ caller: 'root', operation: 'addAsset', args: ['Crate', 1, 'alice', keys, ['L1']] });
        keys.push('late');

        expect(journal.getTip()?.args[3]).toEqual(['lot']);
        expect(journal.verifyChain()).toBe(true);
    });

    test('operation names', () => {
        expect(isJournalOperation('recordTrackingEvent')).toBe(true);
        expect(isJournalOperation('deleteAsset')).toBe(false);
    });
});
