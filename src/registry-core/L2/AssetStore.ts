import type { Asset, AssetDetails, AssetID, Identity } from '../L0/Ontology.js';
import { enforce, INV_ID_01, INV_IN_01, INV_IN_02, INV_RES_01 } from '../L0/Invariants.js';
import { ErrorCode, NotFoundError } from '../Errors.js';
import { StateModel } from './State.js';

export interface AssetStoreLimits {
    maxAssets: number;
}

/**
 * Asset records keyed by dense sequential id. Callers are expected to have
 * passed the authorization guard already; the store only validates input.
 */
export class AssetStore {
    constructor(
        private state: StateModel,
        private limits: AssetStoreLimits
    ) { }

    public get count(): number {
        return this.state.current.assets.length;
    }

    public require(assetId: AssetID): Asset {
        const asset = this.state.current.assets[assetId];
        if (!Number.isSafeInteger(assetId) || !asset) {
            throw new NotFoundError(ErrorCode.ASSET_NOT_FOUND, `Asset ${assetId} does not exist`, { assetId });
        }
        return asset;
    }

    public add(
        caller: Identity,
        name: string,
        createDate: number,
        owner: Identity,
        propertyKeys: readonly string[],
        propertyValues: readonly string[]
    ): AssetID {
        enforce(INV_ID_01, { identity: owner }, 'owner');
        enforce(INV_IN_01, { keys: propertyKeys, values: propertyValues }, 'properties');
        enforce(INV_IN_02, { value: createDate }, 'createDate');
        enforce(INV_RES_01, { count: this.count, limit: this.limits.maxAssets }, 'assets');

        const id = this.count;
        this.state.transact({
            caller,
            operation: 'addAsset',
            args: [name, createDate, owner, [...propertyKeys], [...propertyValues]]
        }, draft => {
            const properties = new Map<string, string>();
            propertyKeys.forEach((key, i) => properties.set(key, propertyValues[i] ?? ''));
            draft.assets.push({ id, name, createDate, owner, properties });
            draft.ledgers.push([]);
        });
        return id;
    }

    public updateProperties(
        caller: Identity,
        assetId: AssetID,
        propertyKeys: readonly string[],
        propertyValues: readonly string[]
    ): void {
        this.require(assetId);
        enforce(INV_IN_01, { keys: propertyKeys, values: propertyValues }, 'properties');

        this.state.transact({
            caller,
            operation: 'updateAssetProperties',
            args: [assetId, [...propertyKeys], [...propertyValues]]
        }, draft => {
            const target = draft.assets[assetId];
            if (!target) return;
            propertyKeys.forEach((key, i) => target.properties.set(key, propertyValues[i] ?? ''));
        });
    }

    public updateOwner(caller: Identity, assetId: AssetID, newOwner: Identity): void {
        this.require(assetId);
        enforce(INV_ID_01, { identity: newOwner }, 'newOwner');

        this.state.transact({
            caller,
            operation: 'updateAssetOwner',
            args: [assetId, newOwner]
        }, draft => {
            const target = draft.assets[assetId];
            if (target) target.owner = newOwner;
        });
    }

    public details(assetId: AssetID): AssetDetails {
        const { id, name, createDate, owner } = this.require(assetId);
        return { id, name, createDate, owner };
    }

    public properties(assetId: AssetID): Record<string, string> {
        return Object.fromEntries(this.require(assetId).properties);
    }

    public property(assetId: AssetID, key: string): string | undefined {
        return this.require(assetId).properties.get(key);
    }
}
