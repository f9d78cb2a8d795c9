// src/registry-core/L0/Crypto.ts
import { createHash } from 'crypto';

// Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

export const GENESIS_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

export type CanonicalValue =
    | string
    | number
    | boolean
    | null
    | CanonicalValue[]
    | { [key: string]: CanonicalValue };

/**
 * Deterministic JSON: object keys sorted, arrays kept in order.
 */
export function canonicalize(value: CanonicalValue): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value);
    }
    if (Array.isArray(value)) {
        return `[${value.map(v => canonicalize(v)).join(',')}]`;
    }
    const entries = Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`);
    return `{${entries.join(',')}}`;
}

/**
 * Deep copy with every array and object frozen.
 */
export function freezeCanonical(value: CanonicalValue): CanonicalValue {
    if (value === null || typeof value !== 'object') {
        return value;
    }
    if (Array.isArray(value)) {
        const copy = value.map(v => freezeCanonical(v));
        Object.freeze(copy);
        return copy;
    }
    const copy: { [key: string]: CanonicalValue } = {};
    for (const [k, v] of Object.entries(value)) {
        copy[k] = freezeCanonical(v);
    }
    Object.freeze(copy);
    return copy;
}
