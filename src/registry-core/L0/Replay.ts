import type { AssetRegistry } from '../Registry.js';
import type { Journal, JournalEntry } from '../L5/Journal.js';
import { asInteger, asString, asStringList } from '../L5/Decode.js';
import { decodeGenesis, sameSettings, settingsOf } from '../L5/Genesis.js';
import { DataIntegrityError, ErrorCode } from '../Errors.js';
import type { LogLevel } from '../Config.js';
import { shouldLog } from '../Config.js';

export class ReplayEngine {
    constructor(private logLevel: LogLevel = 'warn') { }

    /**
     * Replays the journal onto the registry that owns it. The registry must
     * be fresh: only the genesis entry may have been applied.
     * Returns the number of calls replayed.
     */
    public replay(journal: Journal, registry: AssetRegistry): number {
        const broken = journal.findBreak();
        if (broken !== null) {
            throw new DataIntegrityError(ErrorCode.INTEGRITY_BREACH, `Journal chain broken at entry ${broken}`, `sequence:${broken}`);
        }
        if (registry.getAssetCount() !== 0) {
            throw new DataIntegrityError(ErrorCode.REPLAY_FAILURE, 'Replay requires a fresh registry');
        }

        const history = journal.getHistory();
        this.log(`[ReplayEngine] Starting replay of ${history.length} entries...`);

        let replayed = 0;
        registry.state.withoutJournal(() => {
            for (const entry of history) {
                try {
                    this.apply(registry, entry);
                } catch (e) {
                    const message = e instanceof Error ? e.message : String(e);
                    throw new DataIntegrityError(
                        ErrorCode.REPLAY_FAILURE,
                        `Replay Failure at entry ${entry.sequence} (${entry.operation}): ${message}`,
                        entry.entryId
                    );
                }
                if (entry.operation !== 'initialize') replayed++;
            }
        });

        this.log(`[ReplayEngine] Replay complete. ${replayed} calls applied.`);
        return replayed;
    }

    private apply(registry: AssetRegistry, entry: JournalEntry): void {
        const a = entry.args;
        switch (entry.operation) {
            case 'initialize': {
                if (entry.sequence !== 0) throw new Error('initialize must be the first entry');
                const { administrators, settings } = decodeGenesis(a);
                const current = registry.administrators.list();
                if (administrators.length !== current.length || administrators.some((id, i) => id !== current[i])) {
                    throw new Error('administrator set differs from the journal');
                }
                if (!sameSettings(settings, settingsOf(registry.Config))) {
                    throw new Error('settings differ from the journal');
                }
                return;
            }
            case 'addAsset':
                registry.addAsset(
                    entry.caller,
                    asString(a[0], 'name'),
                    asInteger(a[1], 'createDate'),
                    asString(a[2], 'owner'),
                    asStringList(a[3], 'propertyKeys'),
                    asStringList(a[4], 'propertyValues')
                );
                return;
            case 'updateAssetProperties':
                registry.updateAssetProperties(
                    entry.caller,
                    asInteger(a[0], 'assetId'),
                    asStringList(a[1], 'propertyKeys'),
                    asStringList(a[2], 'propertyValues')
                );
                return;
            case 'updateAssetOwner':
                registry.updateAssetOwner(entry.caller, asInteger(a[0], 'assetId'), asString(a[1], 'newOwner'));
                return;
            case 'recordTrackingEvent':
                registry.recordTrackingEvent(
                    entry.caller,
                    asInteger(a[0], 'assetId'),
                    asString(a[1], 'name'),
                    asString(a[2], 'description'),
                    asString(a[3], 'location'),
                    asInteger(a[4], 'eventDate'),
                    asStringList(a[5], 'accessList'),
                    asStringList(a[6], 'metadataKeys'),
                    asStringList(a[7], 'metadataValues')
                );
                return;
        }
    }

    private log(message: string): void {
        if (shouldLog(this.logLevel, 'info')) console.log(message);
    }
}
