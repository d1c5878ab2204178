import { BackendError, LockedError, NotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { createRwLock } from '../utils/rw-lock.js';
import { createEncryptedSqliteStorage } from './backends/encrypted-sqlite.js';
import { createInMemoryStorage } from './backends/in-memory.js';
import { createKeychainStorage } from './backends/keychain.js';
import type {
	KeychainEntryFactory,
	VaultBackend,
	VaultBackendKind,
	VaultStorage,
} from './types.js';

const logger = createLogger('vault');

interface CreateTokenVaultOptions {
	backend: VaultBackend;
	/** Replaces the OS keychain binding; used by tests and embedders */
	keychain?: KeychainEntryFactory;
	/** Start in the locked state */
	locked?: boolean;
}

interface TokenVault {
	readonly backendKind: VaultBackendKind;
	store(label: string, secret: string): Promise<void>;
	fetch(label: string): Promise<string>;
	has(label: string): Promise<boolean>;
	delete(label: string): Promise<void>;
	list(): Promise<string[]>;
	lock(): Promise<void>;
	unlock(): Promise<void>;
	isLocked(): boolean;
	rotateKeys(): Promise<number>;
	close(): void;
}

function openStorage(options: CreateTokenVaultOptions): VaultStorage {
	const { backend } = options;
	switch (backend.kind) {
		case 'os-keychain':
			return createKeychainStorage(backend.service, options.keychain);
		case 'encrypted-sqlite':
			return createEncryptedSqliteStorage(backend.path, backend.passphrase);
		case 'in-memory':
			return createInMemoryStorage();
	}
}

/**
 * Creates the token vault. Every data operation checks the lock first and
 * fails with LockedError while locked; locking leaves stored data in place.
 * Writes are exclusive, reads may overlap.
 */
export function createTokenVault(options: CreateTokenVaultOptions): TokenVault {
	const storage = openStorage(options);
	const rw = createRwLock();
	let locked = options.locked ?? false;

	function assertUnlocked(operation: string): void {
		if (locked) {
			throw new LockedError(`Vault is locked; cannot ${operation}`);
		}
	}

	async function guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
		assertUnlocked(operation);
		try {
			return await fn();
		} catch (error) {
			if (error instanceof BackendError) throw error;
			throw new BackendError(`Vault ${operation} failed`, { cause: error });
		}
	}

	async function store(label: string, secret: string): Promise<void> {
		await rw.write(() => guard('store', () => storage.store(label, secret)));
		logger.debug('Secret stored', { label, backend: options.backend.kind });
	}

	async function fetch(label: string): Promise<string> {
		const secret = await rw.read(() => guard('fetch', () => storage.fetch(label)));
		if (secret === undefined) {
			throw new NotFoundError(`Token not found: ${label}`);
		}
		return secret;
	}

	async function has(label: string): Promise<boolean> {
		const secret = await rw.read(() => guard('fetch', () => storage.fetch(label)));
		return secret !== undefined;
	}

	async function deleteSecret(label: string): Promise<void> {
		await rw.write(() => guard('delete', () => storage.delete(label)));
		logger.debug('Secret deleted', { label, backend: options.backend.kind });
	}

	async function list(): Promise<string[]> {
		return rw.read(() => guard('list', () => storage.list()));
	}

	async function lock(): Promise<void> {
		await rw.write(() => {
			locked = true;
		});
		logger.info('Vault locked');
	}

	async function unlock(): Promise<void> {
		await rw.write(() => {
			locked = false;
		});
		logger.info('Vault unlocked');
	}

	async function rotateKeys(): Promise<number> {
		return rw.write(() =>
			guard('rotate keys', async () => {
				if (!storage.rotateKeys) {
					logger.warn('Key rotation not applicable for this backend', {
						backend: options.backend.kind,
					});
					return 0;
				}
				return storage.rotateKeys();
			}),
		);
	}

	return {
		backendKind: options.backend.kind,
		store,
		fetch,
		has,
		delete: deleteSecret,
		list,
		lock,
		unlock,
		isLocked: () => locked,
		rotateKeys,
		close: () => storage.close(),
	};
}

export type { CreateTokenVaultOptions, TokenVault };
