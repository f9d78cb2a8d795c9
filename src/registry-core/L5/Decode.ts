import type { CanonicalValue } from '../L0/Crypto.js';

// Narrowing decoders for journaled arguments

export function asString(value: CanonicalValue | undefined, field: string): string {
    if (typeof value !== 'string') throw new Error(`${field}: expected string`);
    return value;
}

export function asInteger(value: CanonicalValue | undefined, field: string): number {
    if (typeof value !== 'number' || !Number.isSafeInteger(value)) throw new Error(`${field}: expected integer`);
    return value;
}

export function asStringList(value: CanonicalValue | undefined, field: string): string[] {
    if (!Array.isArray(value)) throw new Error(`${field}: expected list`);
    return value.map((v, i) => asString(v, `${field}[${i}]`));
}

export function asRecord(value: CanonicalValue | undefined, field: string): { [key: string]: CanonicalValue } {
    if (value === null || value === undefined || typeof value !== 'object' || Array.isArray(value)) {
        throw new Error(`${field}: expected object`);
    }
    return value;
}
