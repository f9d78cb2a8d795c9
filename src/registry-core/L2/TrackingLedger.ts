import type { AssetID, EventID, Identity, TrackingEvent, TrackingEventDetails } from '../L0/Ontology.js';
import { enforce, INV_IN_01, INV_IN_02, INV_IN_03, INV_RES_01 } from '../L0/Invariants.js';
import { ErrorCode, NotFoundError } from '../Errors.js';
import { StateModel } from './State.js';
import { AssetStore } from './AssetStore.js';

export interface TrackingLedgerLimits {
    maxEventsPerAsset: number;
}

export interface TrackingEventInput {
    name: string;
    description: string;
    location: string;
    eventDate: number;
    accessList: readonly Identity[];
    metadataKeys: readonly string[];
    metadataValues: readonly string[];
}

/**
 * Per-asset append-only event sequences. Event ids restart at 0 for every
 * asset; no event is ever updated or removed.
 */
export class TrackingLedger {
    constructor(
        private state: StateModel,
        private assets: AssetStore,
        private limits: TrackingLedgerLimits
    ) { }

    public count(assetId: AssetID): number {
        this.assets.require(assetId);
        return this.state.current.ledgers[assetId]?.length ?? 0;
    }

    public require(assetId: AssetID, eventId: EventID): TrackingEvent {
        this.assets.require(assetId);
        const event = this.state.current.ledgers[assetId]?.[eventId];
        if (!Number.isSafeInteger(eventId) || !event) {
            throw new NotFoundError(ErrorCode.EVENT_NOT_FOUND, `Event ${eventId} does not exist on asset ${assetId}`, { assetId, eventId });
        }
        return event;
    }

    public record(caller: Identity, assetId: AssetID, input: TrackingEventInput): EventID {
        const id = this.count(assetId);
        enforce(INV_IN_03, { accessList: input.accessList });
        enforce(INV_IN_01, { keys: input.metadataKeys, values: input.metadataValues }, 'metadata');
        enforce(INV_IN_02, { value: input.eventDate }, 'eventDate');
        enforce(INV_RES_01, { count: id, limit: this.limits.maxEventsPerAsset }, `events of asset ${assetId}`);

        this.state.transact({
            caller,
            operation: 'recordTrackingEvent',
            args: [
                assetId,
                input.name,
                input.description,
                input.location,
                input.eventDate,
                [...input.accessList],
                [...input.metadataKeys],
                [...input.metadataValues]
            ]
        }, draft => {
            const metadata = new Map<string, string>();
            input.metadataKeys.forEach((key, i) => metadata.set(key, input.metadataValues[i] ?? ''));
            draft.ledgers[assetId]?.push({
                id,
                name: input.name,
                description: input.description,
                location: input.location,
                createdBy: caller,
                eventDate: input.eventDate,
                accessList: new Set(input.accessList),
                metadata
            });
        });
        return id;
    }

    public details(assetId: AssetID, eventId: EventID): TrackingEventDetails {
        const { name, description, location, createdBy, eventDate } = this.require(assetId, eventId);
        return { name, description, location, createdBy, eventDate };
    }

    public metadata(assetId: AssetID, eventId: EventID): Record<string, string> {
        return Object.fromEntries(this.require(assetId, eventId).metadata);
    }

    public hasAccess(assetId: AssetID, eventId: EventID, identity: Identity): boolean {
        return this.require(assetId, eventId).accessList.has(identity);
    }
}
