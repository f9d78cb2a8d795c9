// src/registry-core/L0/Invariants.ts
import type { Identity } from './Ontology.js';
import { isNullIdentity } from './Ontology.js';
import { ErrorCode, ValidationError } from '../Errors.js';

export interface Invariant<T> {
    id: string;
    boundary: string; // The named boundary (e.g. "Identity Integrity")
    description: string;
    permits: string; // "What would make this permissible?"
    predicate: (context: T) => boolean;
    violation: ErrorCode;
}

export interface Rejection {
    code: ErrorCode;
    invariantId: string;
    boundary: string;
    permissible: string;
    message: string;
}

// I. Identity Integrity
export const INV_ID_01: Invariant<{ identity: Identity }> = {
    id: 'INV-ID-01',
    boundary: 'Identity Integrity',
    description: 'Identity must not be the null identity',
    permits: 'Supply a non-empty identity.',
    predicate: ({ identity }) => !isNullIdentity(identity),
    violation: ErrorCode.NULL_IDENTITY
};

export const INV_ID_02: Invariant<{ administrators: readonly Identity[], max: number }> = {
    id: 'INV-ID-02',
    boundary: 'Identity Integrity',
    description: 'Administrator set must hold between 1 and the configured maximum entries',
    permits: 'Initialize with at least one and at most the maximum number of administrators.',
    predicate: ({ administrators, max }) => administrators.length >= 1 && administrators.length <= max,
    violation: ErrorCode.ADMINISTRATOR_COUNT_OUT_OF_RANGE
};

// II. Input Shape
export const INV_IN_01: Invariant<{ keys: readonly string[], values: readonly string[] }> = {
    id: 'INV-IN-01',
    boundary: 'Input Shape',
    description: 'Key and value lists must have equal length',
    permits: 'Supply exactly one value per key.',
    predicate: ({ keys, values }) => keys.length === values.length,
    violation: ErrorCode.LENGTH_MISMATCH
};

export const INV_IN_02: Invariant<{ value: number }> = {
    id: 'INV-IN-02',
    boundary: 'Input Shape',
    description: 'Dates must be safe integers',
    permits: 'Supply an integer date.',
    predicate: ({ value }) => Number.isSafeInteger(value),
    violation: ErrorCode.INVALID_INTEGER
};

export const INV_IN_03: Invariant<{ accessList: readonly Identity[] }> = {
    id: 'INV-IN-03',
    boundary: 'Input Shape',
    description: 'Event access list must not be empty',
    permits: 'Name at least one identity allowed to read the event.',
    predicate: ({ accessList }) => accessList.length > 0,
    violation: ErrorCode.EMPTY_ACCESS_LIST
};

// III. Resource Bounds
export const INV_RES_01: Invariant<{ count: number, limit: number }> = {
    id: 'INV-RES-01',
    boundary: 'Resource Bounds',
    description: 'Sequential counters must stay below their limit',
    permits: 'No further ids can be allocated in this range.',
    predicate: ({ count, limit }) => count < limit,
    violation: ErrorCode.COUNTER_OVERFLOW
};

export function check<T>(invariant: Invariant<T>, context: T): Rejection | null {
    if (invariant.predicate(context)) return null;
    return {
        code: invariant.violation,
        invariantId: invariant.id,
        boundary: invariant.boundary,
        permissible: invariant.permits,
        message: `${invariant.boundary}: ${invariant.description}`
    };
}

/**
 * Throws a ValidationError carrying the rejection when the invariant does not hold.
 */
export function enforce<T>(invariant: Invariant<T>, context: T, subject?: string): void {
    const rejection = check(invariant, context);
    if (!rejection) return;
    const message = subject ? `${rejection.message} (${subject})` : rejection.message;
    throw new ValidationError(rejection.code, message, {
        invariantId: rejection.invariantId,
        boundary: rejection.boundary,
        permissible: rejection.permissible
    });
}
