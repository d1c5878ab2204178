export { createEncryptedSqliteStorage } from './backends/encrypted-sqlite.js';
export { createInMemoryStorage } from './backends/in-memory.js';
export { createKeychainStorage } from './backends/keychain.js';
export { type CreateTokenVaultOptions, createTokenVault, type TokenVault } from './vault.js';
export type {
	KeychainEntry,
	KeychainEntryFactory,
	VaultBackend,
	VaultBackendKind,
	VaultStorage,
} from './types.js';
