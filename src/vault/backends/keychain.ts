import { BackendError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { KeychainEntry, KeychainEntryFactory, VaultStorage } from '../types.js';

const logger = createLogger('vault:keychain');

async function loadKeyringEntry(service: string, account: string): Promise<KeychainEntry> {
	const { Entry } = await import('@napi-rs/keyring');
	return new Entry(service, account);
}

/**
 * Stores each secret as a generic password in the OS credential store
 * (macOS Keychain, Windows Credential Manager, Secret Service on Linux).
 * The keychain cannot be enumerated per service, so `list()` only knows the
 * labels this process has written.
 */
export function createKeychainStorage(
	service: string,
	entryFactory: KeychainEntryFactory = loadKeyringEntry,
): VaultStorage {
	const knownLabels = new Set<string>();

	async function withEntry<T>(
		label: string,
		operation: string,
		fn: (entry: KeychainEntry) => T,
	): Promise<T> {
		try {
			const entry = await entryFactory(service, label);
			return fn(entry);
		} catch (error) {
			throw new BackendError(`OS keychain ${operation} failed for "${label}"`, {
				cause: error,
				hint: 'Check that a system keychain or Secret Service is available',
			});
		}
	}

	return {
		async store(label, secret) {
			await withEntry(label, 'store', (entry) => entry.setPassword(secret));
			knownLabels.add(label);
			logger.info('Stored secret in OS keychain', { label });
		},
		async fetch(label) {
			const value = await withEntry(label, 'fetch', (entry) => entry.getPassword());
			return typeof value === 'string' ? value : undefined;
		},
		async delete(label) {
			const existed = await withEntry(label, 'delete', (entry) => {
				if (typeof entry.getPassword() !== 'string') return false;
				entry.deletePassword();
				return true;
			});
			knownLabels.delete(label);
			if (!existed) return;
			logger.info('Deleted secret from OS keychain', { label });
		},
		async list() {
			return [...knownLabels].sort();
		},
		close(): void {
			knownLabels.clear();
		},
	};
}
