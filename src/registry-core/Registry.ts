import type {
    AssetDetails, AssetID, EventID, Identity, TrackingEventDetails
} from './L0/Ontology.js';
import {
    AdministratorGuard, CustodianGuard, CustodianEventCreationGuard, EventReadGuard, SelfGrantEventCreationGuard
} from './L0/Guards.js';
import { GuardRegistry } from './L0/GuardRegistry.js';
import { AdministratorRegistry } from './L1/Administrators.js';
import { StateModel } from './L2/State.js';
import { AssetStore } from './L2/AssetStore.js';
import { TrackingLedger } from './L2/TrackingLedger.js';
import { Journal } from './L5/Journal.js';
import { genesisRecord, settingsOf } from './L5/Genesis.js';
import { ErrorCode, RegistryError } from './Errors.js';
import type { RegistryConfig } from './Config.js';
import { shouldLog } from './Config.js';

/**
 * AssetRegistry: the call surface.
 * Every operation resolves its records, passes the authorization guard and
 * only then touches state. A rejected call changes nothing.
 */
export class AssetRegistry {
    public readonly administrators: AdministratorRegistry;
    public readonly state: StateModel;
    private assets: AssetStore;
    private ledger: TrackingLedger;
    private guards = new GuardRegistry();

    // Pressure Tracker: ErrorCode -> Count
    private rejectionTracker: Map<ErrorCode, number> = new Map();

    public constructor(
        private config: RegistryConfig,
        public readonly journal: Journal = new Journal(undefined, config.clock)
    ) {
        this.administrators = new AdministratorRegistry(config.administrators, config.maxAdministrators);
        this.state = new StateModel(journal);
        this.assets = new AssetStore(this.state, { maxAssets: config.maxAssets });
        this.ledger = new TrackingLedger(this.state, this.assets, { maxEventsPerAsset: config.maxEventsPerAsset });

        this.guards.register('ADMINISTRATOR', AdministratorGuard);
        this.guards.register('CUSTODIAN', CustodianGuard);
        this.guards.register('EVENT_READ', EventReadGuard);
        this.guards.register(
            'EVENT_CREATION',
            config.eventCreationPolicy === 'CUSTODIAN_ONLY' ? CustodianEventCreationGuard : SelfGrantEventCreationGuard
        );

        // Genesis entry: a fresh journal starts with the administrator set and admission settings
        if (journal.length === 0) {
            journal.append(genesisRecord(this.administrators.list(), settingsOf(config)));
        }
    }

    public get Config(): Readonly<RegistryConfig> { return this.config; }

    // --- Administrators ---

    public isAdministrator(identity: Identity): boolean {
        return this.administrators.isAdministrator(identity);
    }

    // --- Assets ---

    public addAsset(
        caller: Identity,
        name: string,
        createDate: number,
        owner: Identity,
        propertyKeys: readonly string[],
        propertyValues: readonly string[]
    ): AssetID {
        return this.call('addAsset', () => {
            this.guards.enforce('ADMINISTRATOR', { caller, administrators: this.administrators });
            return this.assets.add(caller, name, createDate, owner, propertyKeys, propertyValues);
        });
    }

    public updateAssetProperties(
        caller: Identity,
        assetId: AssetID,
        propertyKeys: readonly string[],
        propertyValues: readonly string[]
    ): void {
        this.call('updateAssetProperties', () => {
            this.enforceCustodian(caller, assetId);
            this.assets.updateProperties(caller, assetId, propertyKeys, propertyValues);
        });
    }

    public updateAssetOwner(caller: Identity, assetId: AssetID, newOwner: Identity): void {
        this.call('updateAssetOwner', () => {
            this.enforceCustodian(caller, assetId);
            this.assets.updateOwner(caller, assetId, newOwner);
        });
    }

    public getAssetDetails(assetId: AssetID): AssetDetails {
        return this.call('getAssetDetails', () => this.assets.details(assetId));
    }

    public getAssetProperties(caller: Identity, assetId: AssetID): Record<string, string> {
        return this.call('getAssetProperties', () => {
            this.enforceCustodian(caller, assetId);
            return this.assets.properties(assetId);
        });
    }

    public getAssetProperty(caller: Identity, assetId: AssetID, key: string): string | undefined {
        return this.call('getAssetProperty', () => {
            this.enforceCustodian(caller, assetId);
            return this.assets.property(assetId, key);
        });
    }

    public getAssetCount(): number {
        return this.assets.count;
    }

    // --- Tracking Events ---

    public recordTrackingEvent(
        caller: Identity,
        assetId: AssetID,
        name: string,
        description: string,
        location: string,
        eventDate: number,
        accessList: readonly Identity[],
        metadataKeys: readonly string[],
        metadataValues: readonly string[]
    ): EventID {
        return this.call('recordTrackingEvent', () => {
            const { owner } = this.assets.require(assetId);
            this.guards.enforce('EVENT_CREATION', {
                caller,
                owner,
                administrators: this.administrators,
                requestedAccessList: accessList
            });
            return this.ledger.record(caller, assetId, {
                name, description, location, eventDate, accessList, metadataKeys, metadataValues
            });
        });
    }

    public getTrackingEvent(caller: Identity, assetId: AssetID, eventId: EventID): TrackingEventDetails {
        return this.call('getTrackingEvent', () => {
            this.enforceEventRead(caller, assetId, eventId);
            return this.ledger.details(assetId, eventId);
        });
    }

    public getTrackingEventMetadata(caller: Identity, assetId: AssetID, eventId: EventID): Record<string, string> {
        return this.call('getTrackingEventMetadata', () => {
            this.enforceEventRead(caller, assetId, eventId);
            return this.ledger.metadata(assetId, eventId);
        });
    }

    public hasEventAccess(caller: Identity, assetId: AssetID, eventId: EventID, identity: Identity): boolean {
        return this.call('hasEventAccess', () => {
            this.enforceEventRead(caller, assetId, eventId);
            return this.ledger.hasAccess(assetId, eventId, identity);
        });
    }

    public getTrackingEventCount(assetId: AssetID): number {
        return this.call('getTrackingEventCount', () => this.ledger.count(assetId));
    }

    // --- Diagnostics ---

    public getRejectionPressure(code: ErrorCode): number {
        return this.rejectionTracker.get(code) ?? 0;
    }

    // --- Internals ---

    private enforceCustodian(caller: Identity, assetId: AssetID): void {
        const { owner } = this.assets.require(assetId);
        this.guards.enforce('CUSTODIAN', { caller, owner, administrators: this.administrators });
    }

    private enforceEventRead(caller: Identity, assetId: AssetID, eventId: EventID): void {
        const { owner } = this.assets.require(assetId);
        const { accessList } = this.ledger.require(assetId, eventId);
        this.guards.enforce('EVENT_READ', { caller, owner, administrators: this.administrators, accessList });
    }

    private call<T>(operation: string, fn: () => T): T {
        try {
            return fn();
        } catch (e) {
            if (e instanceof RegistryError) {
                this.recordRejection(operation, e);
            }
            throw e;
        }
    }

    private recordRejection(operation: string, error: RegistryError): void {
        const currentPressure = (this.rejectionTracker.get(error.code) ?? 0) + 1;
        this.rejectionTracker.set(error.code, currentPressure);

        if (currentPressure > this.config.pressureThreshold && shouldLog(this.config.logLevel, 'warn')) {
            console.warn(`[Registry] Pressure Alert: ${error.code} rejected ${currentPressure} times (last: ${operation})`);
        }
    }
}
