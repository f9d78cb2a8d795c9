/**
 * REGISTRY ONTOLOGY
 * The primitives every layer of the registry speaks in.
 */

// --- 1. Identity ---
// Attributed to each call by the host; the core never derives it.
export type Identity = string;

export const NULL_IDENTITY: Identity = '';

export function isNullIdentity(id: Identity): boolean {
    return id === NULL_IDENTITY;
}

// --- 2. Asset ---
export type AssetID = number;

export interface Asset {
    id: AssetID;
    name: string;
    createDate: number; // Caller-supplied, not interpreted
    owner: Identity;
    properties: Map<string, string>;
}

export interface AssetDetails {
    id: AssetID;
    name: string;
    createDate: number;
    owner: Identity;
}

// --- 3. Tracking Event ---
export type EventID = number;

export interface TrackingEvent {
    id: EventID;
    name: string;
    description: string;
    location: string;
    createdBy: Identity;
    eventDate: number;
    accessList: Set<Identity>;
    metadata: Map<string, string>;
}

export interface TrackingEventDetails {
    name: string;
    description: string;
    location: string;
    createdBy: Identity;
    eventDate: number;
}

// --- 4. Registry State ---
export interface RegistryState {
    assets: Asset[];
    // ledgers[assetId] is the event sequence of that asset
    ledgers: TrackingEvent[][];
    version: number;
}

// --- 5. Event Creation Policy ---
// ACCESS_LIST_SELF_GRANT: a caller listed in the access list it supplies may record the event.
// CUSTODIAN_ONLY: only the owner or an administrator may record events.
export const EVENT_CREATION_POLICIES = ['ACCESS_LIST_SELF_GRANT', 'CUSTODIAN_ONLY'] as const;

export type EventCreationPolicy = typeof EVENT_CREATION_POLICIES[number];

export function isEventCreationPolicy(value: string): value is EventCreationPolicy {
    return EVENT_CREATION_POLICIES.some(p => p === value);
}
