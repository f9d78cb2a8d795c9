export { AssetRegistry } from './registry-core/Registry.js';
export { openRegistry } from './Platform/RegistryPlatform.js';
export type { OpenedRegistry } from './Platform/RegistryPlatform.js';
export { loadConfig, resolveConfig, DEFAULT_CONFIG } from './registry-core/Config.js';
export type { RegistryConfig, RegistryConfigInput, LogLevel } from './registry-core/Config.js';
export {
    ErrorCode, RegistryError, AuthorizationError, ValidationError, NotFoundError, DataIntegrityError
} from './registry-core/Errors.js';
export { NULL_IDENTITY, isNullIdentity } from './registry-core/L0/Ontology.js';
export type {
    Identity, AssetID, EventID, AssetDetails, TrackingEventDetails, EventCreationPolicy
} from './registry-core/L0/Ontology.js';
export { Journal, MemoryJournalStore } from './registry-core/L5/Journal.js';
export type { IJournalStore, JournalEntry, JournalRecord, JournalOperation } from './registry-core/L5/Journal.js';
export { ReplayEngine } from './registry-core/L0/Replay.js';
export { SQLiteJournalStore } from './infrastructure/persistence/SQLiteJournalStore.js';
export { genesisRecord, decodeGenesis, settingsOf } from './registry-core/L5/Genesis.js';
export type { Genesis, GenesisSettings } from './registry-core/L5/Genesis.js';
