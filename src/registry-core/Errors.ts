/**
 * Registry Error Taxonomy
 * Centralized error codes for rejected calls and integrity failures.
 */

export enum ErrorCode {
    // I. Authorization
    ADMINISTRATOR_REQUIRED = 'ADMINISTRATOR_REQUIRED',
    CUSTODIAN_REQUIRED = 'CUSTODIAN_REQUIRED',
    EVENT_ACCESS_DENIED = 'EVENT_ACCESS_DENIED',

    // II. Validation
    NULL_IDENTITY = 'NULL_IDENTITY',
    ADMINISTRATOR_COUNT_OUT_OF_RANGE = 'ADMINISTRATOR_COUNT_OUT_OF_RANGE',
    LENGTH_MISMATCH = 'LENGTH_MISMATCH',
    EMPTY_ACCESS_LIST = 'EMPTY_ACCESS_LIST',
    COUNTER_OVERFLOW = 'COUNTER_OVERFLOW',
    INVALID_INTEGER = 'INVALID_INTEGER',
    INVALID_CONFIG = 'INVALID_CONFIG',

    // III. Lookup
    ASSET_NOT_FOUND = 'ASSET_NOT_FOUND',
    EVENT_NOT_FOUND = 'EVENT_NOT_FOUND',

    // IV. Journal
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
    REPLAY_FAILURE = 'REPLAY_FAILURE',
}

export abstract class RegistryError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Registry:${code}] ${message}`);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when the caller lacks the role, ownership or access-list membership
 * the operation requires.
 */
export class AuthorizationError extends RegistryError {
    constructor(code: ErrorCode, message: string, caller: string) {
        super(code, message, { caller });
    }
}

/**
 * Thrown for structurally invalid input.
 */
export class ValidationError extends RegistryError {
    constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
        super(code, message, details);
    }
}

export class NotFoundError extends RegistryError {
    constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
        super(code, message, details);
    }
}

/**
 * Thrown when the journal chain is broken or cannot be replayed.
 */
export class DataIntegrityError extends RegistryError {
    constructor(code: ErrorCode, message: string, trace?: string) {
        super(code, message, { trace });
    }
}
