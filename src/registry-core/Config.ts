import type { EventCreationPolicy, Identity } from './L0/Ontology.js';
import { isEventCreationPolicy } from './L0/Ontology.js';
import { MAX_ADMINISTRATORS } from './L1/Administrators.js';
import { ErrorCode, ValidationError } from './Errors.js';

export type LogLevel = 'silent' | 'warn' | 'info';

const LOG_LEVELS: readonly LogLevel[] = ['silent', 'warn', 'info'];

export interface RegistryConfig {
    administrators: Identity[];
    maxAdministrators: number;
    maxAssets: number;
    maxEventsPerAsset: number;
    eventCreationPolicy: EventCreationPolicy;
    // Rejections of one error code before a pressure warning is logged
    pressureThreshold: number;
    logLevel: LogLevel;
    journalPath?: string;
    clock: () => number;
}

export type RegistryConfigInput = Partial<RegistryConfig> & Pick<RegistryConfig, 'administrators'>;

export const DEFAULT_CONFIG = {
    maxAdministrators: MAX_ADMINISTRATORS,
    maxAssets: Number.MAX_SAFE_INTEGER,
    maxEventsPerAsset: Number.MAX_SAFE_INTEGER,
    eventCreationPolicy: 'ACCESS_LIST_SELF_GRANT',
    pressureThreshold: 5,
    logLevel: 'warn',
    clock: Date.now
} satisfies Omit<RegistryConfig, 'administrators' | 'journalPath'>;

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(l => l === value);
}

function requirePositiveInteger(name: string, value: number): void {
    if (!Number.isSafeInteger(value) || value < 1) {
        throw new ValidationError(ErrorCode.INVALID_CONFIG, `Config: ${name} must be a positive integer`, { [name]: value });
    }
}

export function resolveConfig(input: RegistryConfigInput): RegistryConfig {
    const config: RegistryConfig = {
        ...DEFAULT_CONFIG,
        ...input,
        administrators: [...input.administrators]
    };

    requirePositiveInteger('maxAdministrators', config.maxAdministrators);
    if (config.maxAdministrators > MAX_ADMINISTRATORS) {
        throw new ValidationError(
            ErrorCode.INVALID_CONFIG,
            `Config: maxAdministrators may only lower the cap of ${MAX_ADMINISTRATORS}`,
            { maxAdministrators: config.maxAdministrators }
        );
    }
    requirePositiveInteger('maxAssets', config.maxAssets);
    requirePositiveInteger('maxEventsPerAsset', config.maxEventsPerAsset);
    requirePositiveInteger('pressureThreshold', config.pressureThreshold);
    if (!isEventCreationPolicy(config.eventCreationPolicy)) {
        throw new ValidationError(ErrorCode.INVALID_CONFIG, `Config: unknown event creation policy ${config.eventCreationPolicy}`);
    }
    if (!isLogLevel(config.logLevel)) {
        throw new ValidationError(ErrorCode.INVALID_CONFIG, `Config: unknown log level ${config.logLevel}`);
    }
    return config;
}

/**
 * Reads REGISTRY_* environment variables; `overrides` win over the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<RegistryConfig> = {}): RegistryConfig {
    const fromEnv: Partial<RegistryConfig> = {};

    const admins = env.REGISTRY_ADMINISTRATORS;
    if (admins !== undefined) {
        fromEnv.administrators = admins.split(',').map(a => a.trim()).filter(a => a.length > 0);
    }

    const policy = env.REGISTRY_EVENT_POLICY;
    if (policy !== undefined) {
        if (!isEventCreationPolicy(policy)) {
            throw new ValidationError(ErrorCode.INVALID_CONFIG, `Config: unknown event creation policy ${policy}`);
        }
        fromEnv.eventCreationPolicy = policy;
    }

    const level = env.REGISTRY_LOG_LEVEL?.toLowerCase();
    if (level !== undefined) {
        if (!isLogLevel(level)) {
            throw new ValidationError(ErrorCode.INVALID_CONFIG, `Config: unknown log level ${level}`);
        }
        fromEnv.logLevel = level;
    }

    if (env.REGISTRY_JOURNAL_PATH) {
        fromEnv.journalPath = env.REGISTRY_JOURNAL_PATH;
    }

    const merged = { ...fromEnv, ...overrides };
    return resolveConfig({ ...merged, administrators: merged.administrators ?? [] });
}

export function shouldLog(configured: LogLevel, at: Exclude<LogLevel, 'silent'>): boolean {
    return LOG_LEVELS.indexOf(configured) >= LOG_LEVELS.indexOf(at);
}
