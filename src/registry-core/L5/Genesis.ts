import type { CanonicalValue } from '../L0/Crypto.js';
import type { EventCreationPolicy, Identity } from '../L0/Ontology.js';
import { NULL_IDENTITY, isEventCreationPolicy } from '../L0/Ontology.js';
import type { RegistryConfig } from '../Config.js';
import type { JournalRecord } from './Journal.js';
import { asInteger, asRecord, asString, asStringList } from './Decode.js';

/**
 * The settings that decide whether a call is admitted. They are fixed by the
 * genesis entry so that a journal replays under the rules it was written with.
 */
export interface GenesisSettings {
    eventCreationPolicy: EventCreationPolicy;
    maxAdministrators: number;
    maxAssets: number;
    maxEventsPerAsset: number;
}

export interface Genesis {
    administrators: Identity[];
    settings: GenesisSettings;
}

export function settingsOf(config: Pick<RegistryConfig, keyof GenesisSettings>): GenesisSettings {
    return {
        eventCreationPolicy: config.eventCreationPolicy,
        maxAdministrators: config.maxAdministrators,
        maxAssets: config.maxAssets,
        maxEventsPerAsset: config.maxEventsPerAsset
    };
}

export function sameSettings(a: GenesisSettings, b: GenesisSettings): boolean {
    return a.eventCreationPolicy === b.eventCreationPolicy
        && a.maxAdministrators === b.maxAdministrators
        && a.maxAssets === b.maxAssets
        && a.maxEventsPerAsset === b.maxEventsPerAsset;
}

// args: [administrators, settings]
export function genesisRecord(administrators: readonly Identity[], settings: GenesisSettings): JournalRecord {
    return {
        caller: NULL_IDENTITY,
        operation: 'initialize',
        args: [
            [...administrators],
            {
                eventCreationPolicy: settings.eventCreationPolicy,
                maxAdministrators: settings.maxAdministrators,
                maxAssets: settings.maxAssets,
                maxEventsPerAsset: settings.maxEventsPerAsset
            }
        ]
    };
}

export function decodeGenesis(args: readonly CanonicalValue[]): Genesis {
    const fields = asRecord(args[1], 'settings');
    const policy = asString(fields.eventCreationPolicy, 'eventCreationPolicy');
    if (!isEventCreationPolicy(policy)) {
        throw new Error(`eventCreationPolicy: unknown policy ${policy}`);
    }
    return {
        administrators: asStringList(args[0], 'administrators'),
        settings: {
            eventCreationPolicy: policy,
            maxAdministrators: asInteger(fields.maxAdministrators, 'maxAdministrators'),
            maxAssets: asInteger(fields.maxAssets, 'maxAssets'),
            maxEventsPerAsset: asInteger(fields.maxEventsPerAsset, 'maxEventsPerAsset')
        }
    };
}
