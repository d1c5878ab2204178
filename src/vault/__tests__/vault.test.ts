import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { BackendError, LockedError, NotFoundError } from '../../utils/errors.js';
import type { KeychainEntry, KeychainEntryFactory } from '../types.js';
import { createTokenVault, type TokenVault } from '../vault.js';

const tempRoots: string[] = [];
const openVaults: TokenVault[] = [];

function createTempRoot(): string {
	const root = mkdtempSync(join(tmpdir(), 'agentgate-vault-'));
	tempRoots.push(root);
	return root;
}

function track(vault: TokenVault): TokenVault {
	openVaults.push(vault);
	return vault;
}

afterEach(() => {
	while (openVaults.length > 0) {
		openVaults.pop()?.close();
	}
	while (tempRoots.length > 0) {
		const root = tempRoots.pop();
		if (root) {
			rmSync(root, { recursive: true, force: true });
		}
	}
});

function createFakeKeychain(): { factory: KeychainEntryFactory; passwords: Map<string, string> } {
	const passwords = new Map<string, string>();
	const factory: KeychainEntryFactory = (service, account) => {
		const key = `${service}/${account}`;
		const entry: KeychainEntry = {
			setPassword(password) {
				passwords.set(key, password);
			},
			getPassword() {
				return passwords.get(key) ?? null;
			},
			deletePassword() {
				return passwords.delete(key);
			},
		};
		return entry;
	};
	return { factory, passwords };
}

describe('createTokenVault (in memory)', () => {
	it('stores and fetches secrets', async () => {
		const vault = track(createTokenVault({ backend: { kind: 'in-memory' } }));

		await vault.store('oauth.github', 'test-secret');

		await expect(vault.fetch('oauth.github')).resolves.toBe('test-secret');
		await expect(vault.has('oauth.github')).resolves.toBe(true);
		await expect(vault.list()).resolves.toEqual(['oauth.github']);
	});

	it('overwrites an existing label', async () => {
		const vault = track(createTokenVault({ backend: { kind: 'in-memory' } }));

		await vault.store('label', 'first');
		await vault.store('label', 'second');

		await expect(vault.fetch('label')).resolves.toBe('second');
	});

	it('fails with NotFoundError for unknown labels', async () => {
		const vault = track(createTokenVault({ backend: { kind: 'in-memory' } }));

		await expect(vault.fetch('missing')).rejects.toThrow(NotFoundError);
		await expect(vault.fetch('missing')).rejects.toThrow('Token not found: missing');
		await expect(vault.has('missing')).resolves.toBe(false);
	});

	it('deletes idempotently', async () => {
		const vault = track(createTokenVault({ backend: { kind: 'in-memory' } }));
		await vault.store('label', 'test-secret');

		await vault.delete('label');
		await vault.delete('label');

		await expect(vault.has('label')).resolves.toBe(false);
	});

	it('rejects every data operation while locked and keeps data', async () => {
		const vault = track(createTokenVault({ backend: { kind: 'in-memory' } }));
		await vault.store('label', 'test-secret');

		await vault.lock();
		expect(vault.isLocked()).toBe(true);

		await expect(vault.fetch('label')).rejects.toThrow(LockedError);
		await expect(vault.store('other', 'x')).rejects.toThrow(LockedError);
		await expect(vault.delete('label')).rejects.toThrow(LockedError);
		await expect(vault.list()).rejects.toThrow(LockedError);
		await expect(vault.rotateKeys()).rejects.toThrow(LockedError);

		await vault.unlock();
		expect(vault.isLocked()).toBe(false);
		await expect(vault.fetch('label')).resolves.toBe('test-secret');
	});

	it('can start locked', async () => {
		const vault = track(createTokenVault({ backend: { kind: 'in-memory' }, locked: true }));

		await expect(vault.fetch('label')).rejects.toThrow('Vault is locked; cannot fetch');
	});

	it('reports nothing to rotate', async () => {
		const vault = track(createTokenVault({ backend: { kind: 'in-memory' } }));
		await vault.store('label', 'test-secret');

		await expect(vault.rotateKeys()).resolves.toBe(0);
	});

	it('serialises concurrent writes', async () => {
		const vault = track(createTokenVault({ backend: { kind: 'in-memory' } }));

		await Promise.all(
			Array.from({ length: 10 }, (_, index) => vault.store(`label-${index}`, `value-${index}`)),
		);

		await expect(vault.list()).resolves.toHaveLength(10);
		await expect(vault.fetch('label-7')).resolves.toBe('value-7');
	});
});

describe('createTokenVault (encrypted SQLite)', () => {
	it('persists secrets across reopen', async () => {
		const path = join(createTempRoot(), 'vault.db');

		const first = createTokenVault({
			backend: { kind: 'encrypted-sqlite', path, passphrase: 'test-passphrase' },
		});
		await first.store('oauth.github', 'test-secret');
		first.close();

		const second = track(
			createTokenVault({
				backend: { kind: 'encrypted-sqlite', path, passphrase: 'test-passphrase' },
			}),
		);
		await expect(second.fetch('oauth.github')).resolves.toBe('test-secret');
	});

	it('rejects the wrong passphrase', async () => {
		const path = join(createTempRoot(), 'vault.db');
		const first = createTokenVault({
			backend: { kind: 'encrypted-sqlite', path, passphrase: 'test-passphrase' },
		});
		await first.store('label', 'test-secret');
		first.close();

		expect(() =>
			createTokenVault({
				backend: { kind: 'encrypted-sqlite', path, passphrase: 'other-passphrase' },
			}),
		).toThrow('Unable to open vault: wrong passphrase or corrupted key');
	});

	it('requires a passphrase', () => {
		const path = join(createTempRoot(), 'vault.db');

		expect(() =>
			createTokenVault({ backend: { kind: 'encrypted-sqlite', path, passphrase: '' } }),
		).toThrow(BackendError);
	});

	it('reports a file that is not a database as a backend failure', () => {
		const path = join(createTempRoot(), 'vault.db');
		writeFileSync(path, 'plain text, not a vault\n'.repeat(40));

		let caught: unknown;
		try {
			createTokenVault({
				backend: { kind: 'encrypted-sqlite', path, passphrase: 'test-passphrase' },
			});
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(BackendError);
		expect(caught).toHaveProperty('message', `Unable to open vault database at ${path}`);
		expect(caught).toHaveProperty('cause.code', 'SQLITE_NOTADB');
	});

	it('re-encrypts every entry on rotation', async () => {
		const path = join(createTempRoot(), 'vault.db');
		const vault = createTokenVault({
			backend: { kind: 'encrypted-sqlite', path, passphrase: 'test-passphrase' },
		});
		await vault.store('a', 'secret-a');
		await vault.store('b', 'secret-b');

		await expect(vault.rotateKeys()).resolves.toBe(2);
		await expect(vault.fetch('a')).resolves.toBe('secret-a');
		vault.close();

		const reopened = track(
			createTokenVault({
				backend: { kind: 'encrypted-sqlite', path, passphrase: 'test-passphrase' },
			}),
		);
		await expect(reopened.fetch('b')).resolves.toBe('secret-b');
		await expect(reopened.list()).resolves.toEqual(['a', 'b']);
	});
});

describe('createTokenVault (OS keychain)', () => {
	it('stores entries under the service name', async () => {
		const { factory, passwords } = createFakeKeychain();
		const vault = track(
			createTokenVault({ backend: { kind: 'os-keychain', service: 'agentgate' }, keychain: factory }),
		);

		await vault.store('oauth.github', 'test-secret');

		expect(passwords.get('agentgate/oauth.github')).toBe('test-secret');
		await expect(vault.fetch('oauth.github')).resolves.toBe('test-secret');
		await expect(vault.list()).resolves.toEqual(['oauth.github']);

		await vault.delete('oauth.github');
		await vault.delete('oauth.github');
		expect(passwords.size).toBe(0);
		await expect(vault.fetch('oauth.github')).rejects.toThrow(NotFoundError);
	});

	it('wraps keychain failures in BackendError', async () => {
		const vault = track(
			createTokenVault({
				backend: { kind: 'os-keychain', service: 'agentgate' },
				keychain: () => {
					throw new Error('no secret service');
				},
			}),
		);

		await expect(vault.store('label', 'test-secret')).rejects.toThrow(
			'OS keychain store failed for "label"',
		);
	});
});
