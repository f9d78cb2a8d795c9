import { describe, test, expect, beforeEach } from '@jest/globals';
import { ReplayEngine } from '../Replay.js';
import { AssetRegistry } from '../../Registry.js';
import { resolveConfig } from '../../Config.js';
import { Journal, MemoryJournalStore } from '../../L5/Journal.js';
import { genesisRecord, settingsOf } from '../../L5/Genesis.js';
import type { IJournalStore, JournalEntry } from '../../L5/Journal.js';
import { DataIntegrityError, ErrorCode } from '../../Errors.js';

const config = resolveConfig({ administrators: ['root'], logLevel: 'silent', clock: () => 10 });

function populate(registry: AssetRegistry): void {
    registry.addAsset('root', 'Container', 100, 'alice', ['size'], ['40ft']);
    registry.addAsset('root', 'Chassis', 200, 'bob', [], []);
    registry.updateAssetProperties('alice', 0, ['seal'], ['S-1']);
    registry.recordTrackingEvent('alice', 0, 'Loaded', '', 'Quay 2', 300, ['carol'], ['crane'], ['C7']);
    registry.updateAssetOwner('alice', 0, 'dave');
    registry.recordTrackingEvent('erin', 1, 'Inspected', 'ok', 'Gate', 400, ['erin'], [], []);
}

describe('ReplayEngine', () => {
    let store: MemoryJournalStore;

    beforeEach(() => {
        store = new MemoryJournalStore();
        populate(new AssetRegistry(config, new Journal(store, config.clock)));
    });

    test('rebuilds identical state without writing to the journal', () => {
        const journal = new Journal(store, config.clock);
        const restored = new AssetRegistry(config, journal);

        expect(new ReplayEngine('silent').replay(journal, restored)).toBe(6);
        expect(journal.length).toBe(7);

        expect(restored.getAssetCount()).toBe(2);
        expect(restored.getAssetDetails(0)).toEqual({ id: 0, name: 'Container', createDate: 100, owner: 'dave' });
        expect(restored.getAssetProperties('root', 0)).toEqual({ size: '40ft', seal: 'S-1' });
        expect(restored.getTrackingEvent('carol', 0, 0)).toEqual({
            name: 'Loaded', description: '', location: 'Quay 2', createdBy: 'alice', eventDate: 300
        });
        expect(restored.getTrackingEventMetadata('dave', 0, 0)).toEqual({ crane: 'C7' });
        expect(restored.getTrackingEvent('erin', 1, 0).createdBy).toBe('erin');
    });

    test('new calls continue the chain after replay', () => {
        const journal = new Journal(store, config.clock);
        const restored = new AssetRegistry(config, journal);
        new ReplayEngine('silent').replay(journal, restored);

        expect(restored.addAsset('root', 'Trailer', 500, 'bob', [], [])).toBe(2);
        expect(journal.length).toBe(8);
        expect(journal.verifyChain()).toBe(true);
    });

    test('a broken chain is refused', () => {
        const forged: IJournalStore = {
            append: (entry: JournalEntry) => store.append(entry),
            getHistory: () => store.getHistory().map(e => (e.sequence === 5 ? { ...e, caller: 'dave' } : e)),
            getLatest: () => store.getLatest()
        };
        const journal = new Journal(forged);
        const restored = new AssetRegistry(config, journal);

        try {
            new ReplayEngine('silent').replay(journal, restored);
            throw new Error('expected rejection');
        } catch (e) {
            expect(e).toBeInstanceOf(DataIntegrityError);
            if (e instanceof DataIntegrityError) {
                expect(e.code).toBe(ErrorCode.INTEGRITY_BREACH);
                expect(e.message).toBe('[Registry:INTEGRITY_BREACH] Journal chain broken at entry 5');
            }
        }
        expect(restored.getAssetCount()).toBe(0);
    });

    test('an administrator set that differs from the genesis entry fails the replay', () => {
        const journal = new Journal(store, config.clock);
        const stranger = new AssetRegistry({ ...config, administrators: ['someone-else'] }, journal);

        expect(() => new ReplayEngine('silent').replay(journal, stranger)).toThrow(
            '[Registry:REPLAY_FAILURE] Replay Failure at entry 0 (initialize): administrator set differs from the journal'
        );
        expect(stranger.getAssetCount()).toBe(0);
    });

    test('settings that differ from the genesis entry fail the replay', () => {
        const journal = new Journal(store, config.clock);
        const stricter = new AssetRegistry({ ...config, eventCreationPolicy: 'CUSTODIAN_ONLY' }, journal);

        expect(() => new ReplayEngine('silent').replay(journal, stricter)).toThrow(
            '[Registry:REPLAY_FAILURE] Replay Failure at entry 0 (initialize): settings differ from the journal'
        );
    });

    test('a journalled call that fails its guard fails the replay', () => {
        const journal = new Journal(new MemoryJournalStore(), config.clock);
        journal.append(genesisRecord(['root'], settingsOf(config)));
        journal.append({ caller: 'mallory', operation: 'addAsset', args: ['Crate', 1, 'mallory', [], []] });
        const restored = new AssetRegistry(config, journal);

        try {
            new ReplayEngine('silent').replay(journal, restored);
            throw new Error('expected rejection');
        } catch (e) {
            expect(e).toBeInstanceOf(DataIntegrityError);
            if (e instanceof DataIntegrityError) {
                expect(e.code).toBe(ErrorCode.REPLAY_FAILURE);
                expect(e.message).toBe(
                    '[Registry:REPLAY_FAILURE] Replay Failure at entry 1 (addAsset): ' +
                    '[Registry:ADMINISTRATOR_REQUIRED] Authority Violation: mallory is not an administrator'
                );
            }
        }
    });

    test('refuses a registry that already holds assets', () => {
        const journal = new Journal(store, config.clock);
        const used = new AssetRegistry(config, new Journal(new MemoryJournalStore(), config.clock));
        used.addAsset('root', 'x', 0, 'alice', [], []);
        expect(() => new ReplayEngine('silent').replay(journal, used)).toThrow(/Replay requires a fresh registry/);
    });
});
