import type { VaultStorage } from '../types.js';

export function createInMemoryStorage(): VaultStorage {
	const secrets = new Map<string, string>();

	return {
		async store(label, secret) {
			secrets.set(label, secret);
		},
		async fetch(label) {
			return secrets.get(label);
		},
		async delete(label) {
			secrets.delete(label);
		},
		async list() {
			return [...secrets.keys()].sort();
		},
		close(): void {
			secrets.clear();
		},
	};
}
