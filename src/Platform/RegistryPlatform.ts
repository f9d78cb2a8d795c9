import { AssetRegistry } from '../registry-core/Registry.js';
import { Journal, MemoryJournalStore } from '../registry-core/L5/Journal.js';
import type { IJournalStore, JournalEntry } from '../registry-core/L5/Journal.js';
import { decodeGenesis, sameSettings, settingsOf } from '../registry-core/L5/Genesis.js';
import type { Genesis } from '../registry-core/L5/Genesis.js';
import { ReplayEngine } from '../registry-core/L0/Replay.js';
import type { RegistryConfig, RegistryConfigInput } from '../registry-core/Config.js';
import { resolveConfig, shouldLog } from '../registry-core/Config.js';
import { DataIntegrityError, ErrorCode } from '../registry-core/Errors.js';
import { SQLiteJournalStore } from '../infrastructure/persistence/SQLiteJournalStore.js';

function readGenesis(entry: JournalEntry): Genesis {
    if (entry.operation !== 'initialize') {
        throw new DataIntegrityError(ErrorCode.INTEGRITY_BREACH, 'Journal does not start with an initialize entry', entry.entryId);
    }
    try {
        return decodeGenesis(entry.args);
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);
        throw new DataIntegrityError(ErrorCode.INTEGRITY_BREACH, `Malformed initialize entry: ${message}`, entry.entryId);
    }
}

export interface OpenedRegistry {
    registry: AssetRegistry;
    store: IJournalStore;
    close(): void;
}

/**
 * Opens a registry over a journal store. An empty store is initialized from
 * `config.administrators`; a populated one is verified and replayed, and its
 * genesis administrator set and admission settings (event creation policy,
 * limits) take precedence over the configured ones.
 *
 * Without an explicit store, `config.journalPath` selects a SQLite file and
 * its absence an in-memory journal.
 */
export function openRegistry(input: RegistryConfigInput | RegistryConfig, store?: IJournalStore): OpenedRegistry {
    const config = resolveConfig(input);
    let sqlite: SQLiteJournalStore | undefined;
    if (!store && config.journalPath) {
        sqlite = new SQLiteJournalStore(config.journalPath);
    }
    const journalStore: IJournalStore = store ?? sqlite ?? new MemoryJournalStore();

    try {
        const journal = new Journal(journalStore, config.clock);
        const genesis = journal.getHistory()[0];

        if (!genesis) {
            return { registry: new AssetRegistry(config, journal), store: journalStore, close: () => sqlite?.close() };
        }

        // The genesis settings decide admission, so the chain is checked before they are trusted
        const broken = journal.findBreak();
        if (broken !== null) {
            throw new DataIntegrityError(ErrorCode.INTEGRITY_BREACH, `Journal chain broken at entry ${broken}`, `sequence:${broken}`);
        }

        const { administrators, settings } = readGenesis(genesis);
        if (shouldLog(config.logLevel, 'warn')) {
            if (config.administrators.length > 0 && config.administrators.join(',') !== administrators.join(',')) {
                console.warn('[Registry] Configured administrators differ from the journal; using the journal set');
            }
            if (!sameSettings(settingsOf(config), settings)) {
                console.warn('[Registry] Configured settings differ from the journal; using the journal settings');
            }
        }

        const registry = new AssetRegistry(resolveConfig({ ...config, ...settings, administrators }), journal);
        new ReplayEngine(config.logLevel).replay(journal, registry);
        return { registry, store: journalStore, close: () => sqlite?.close() };
    } catch (e) {
        sqlite?.close();
        throw e;
    }
}
