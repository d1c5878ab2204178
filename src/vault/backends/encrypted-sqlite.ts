import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { BackendError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import {
	decryptValue,
	deriveKey,
	type EncryptedValue,
	encryptValue,
	generateKey,
	generateSalt,
} from '../crypto.js';
import type { VaultStorage } from '../types.js';

const logger = createLogger('vault:sqlite');

const KEY_LABEL = 'vault-data-key';

interface MetaRow {
	kdf_salt: string;
	wrapped_nonce: string;
	wrapped_key: string;
	wrapped_tag: string;
	key_version: number;
}

interface SecretRow {
	label: string;
	nonce: string;
	ciphertext: string;
	auth_tag: string;
}

function rowToPayload(row: Pick<SecretRow, 'nonce' | 'ciphertext' | 'auth_tag'>): EncryptedValue {
	return {
		algorithm: 'aes-256-gcm',
		nonceB64: row.nonce,
		ciphertextB64: row.ciphertext,
		authTagB64: row.auth_tag,
	};
}

type VaultDatabase = InstanceType<typeof Database>;

function prepareStatements(db: VaultDatabase) {
	db.exec(`
		CREATE TABLE IF NOT EXISTS vault_meta (
			id INTEGER PRIMARY KEY CHECK (id = 1),
			kdf_salt TEXT NOT NULL,
			wrapped_nonce TEXT NOT NULL,
			wrapped_key TEXT NOT NULL,
			wrapped_tag TEXT NOT NULL,
			key_version INTEGER NOT NULL,
			updated_at TEXT NOT NULL
		);
		CREATE TABLE IF NOT EXISTS vault_secrets (
			label TEXT PRIMARY KEY,
			nonce TEXT NOT NULL,
			ciphertext TEXT NOT NULL,
			auth_tag TEXT NOT NULL,
			key_version INTEGER NOT NULL,
			updated_at TEXT NOT NULL
		);
	`);

	const selectMeta = db.prepare<[], MetaRow>(
		'SELECT kdf_salt, wrapped_nonce, wrapped_key, wrapped_tag, key_version FROM vault_meta WHERE id = 1',
	);
	const upsertMeta = db.prepare<{
		salt: string;
		nonce: string;
		key: string;
		tag: string;
		version: number;
		updatedAt: string;
	}>(`
		INSERT INTO vault_meta (id, kdf_salt, wrapped_nonce, wrapped_key, wrapped_tag, key_version, updated_at)
		VALUES (1, @salt, @nonce, @key, @tag, @version, @updatedAt)
		ON CONFLICT(id) DO UPDATE SET
			kdf_salt = excluded.kdf_salt,
			wrapped_nonce = excluded.wrapped_nonce,
			wrapped_key = excluded.wrapped_key,
			wrapped_tag = excluded.wrapped_tag,
			key_version = excluded.key_version,
			updated_at = excluded.updated_at
	`);
	const upsertSecret = db.prepare<{
		label: string;
		nonce: string;
		ciphertext: string;
		tag: string;
		version: number;
		updatedAt: string;
	}>(`
		INSERT INTO vault_secrets (label, nonce, ciphertext, auth_tag, key_version, updated_at)
		VALUES (@label, @nonce, @ciphertext, @tag, @version, @updatedAt)
		ON CONFLICT(label) DO UPDATE SET
			nonce = excluded.nonce,
			ciphertext = excluded.ciphertext,
			auth_tag = excluded.auth_tag,
			key_version = excluded.key_version,
			updated_at = excluded.updated_at
	`);
	const selectSecret = db.prepare<[string], SecretRow>(
		'SELECT label, nonce, ciphertext, auth_tag FROM vault_secrets WHERE label = ?',
	);
	const selectAllSecrets = db.prepare<[], SecretRow>(
		'SELECT label, nonce, ciphertext, auth_tag FROM vault_secrets ORDER BY label ASC',
	);
	const deleteSecret = db.prepare<[string]>('DELETE FROM vault_secrets WHERE label = ?');

	return { selectMeta, upsertMeta, upsertSecret, selectSecret, selectAllSecrets, deleteSecret };
}

/** Opens the vault file and prepares its schema; a file that is not a vault database fails here. */
function openVaultDatabase(path: string): {
	db: VaultDatabase;
	statements: ReturnType<typeof prepareStatements>;
} {
	let db: VaultDatabase | undefined;
	try {
		mkdirSync(dirname(path), { recursive: true });
		db = new Database(path);
		db.pragma('journal_mode = WAL');
		return { db, statements: prepareStatements(db) };
	} catch (error) {
		db?.close();
		throw new BackendError(`Unable to open vault database at ${path}`, { cause: error });
	}
}

/**
 * Envelope-encrypted secret store in a SQLite file.
 *
 * A random data key encrypts every secret (AES-256-GCM, label as associated
 * data). The data key itself is stored wrapped under a key derived from the
 * passphrase with scrypt. Rotation replaces the data key and re-encrypts all
 * rows in one transaction.
 */
export function createEncryptedSqliteStorage(path: string, passphrase: string): VaultStorage {
	if (passphrase.length === 0) {
		throw new BackendError('Encrypted vault requires a passphrase', {
			hint: 'Set vault.passphrase in config.yaml, e.g. "${AGENTGATE_VAULT_PASSPHRASE}"',
		});
	}

	const { db, statements } = openVaultDatabase(path);
	const { selectMeta, upsertMeta, upsertSecret, selectSecret, selectAllSecrets, deleteSecret } =
		statements;

	function writeWrappedKey(kek: Buffer, salt: Buffer, dataKey: Buffer, version: number): void {
		const wrapped = encryptValue(kek, dataKey, KEY_LABEL);
		upsertMeta.run({
			salt: salt.toString('base64'),
			nonce: wrapped.nonceB64,
			key: wrapped.ciphertextB64,
			tag: wrapped.authTagB64,
			version,
			updatedAt: new Date().toISOString(),
		});
	}

	function openDataKey(): { kek: Buffer; salt: Buffer; dataKey: Buffer; version: number } {
		const meta = selectMeta.get();
		if (!meta) {
			const salt = generateSalt();
			const kek = deriveKey(passphrase, salt);
			const dataKey = generateKey();
			writeWrappedKey(kek, salt, dataKey, 1);
			logger.info('Initialized encrypted vault', { path });
			return { kek, salt, dataKey, version: 1 };
		}

		const salt = Buffer.from(meta.kdf_salt, 'base64');
		const kek = deriveKey(passphrase, salt);
		try {
			const dataKey = decryptValue(
				kek,
				rowToPayload({
					nonce: meta.wrapped_nonce,
					ciphertext: meta.wrapped_key,
					auth_tag: meta.wrapped_tag,
				}),
				KEY_LABEL,
			);
			return { kek, salt, dataKey, version: meta.key_version };
		} catch (error) {
			throw new BackendError('Unable to open vault: wrong passphrase or corrupted key', {
				cause: error,
			});
		}
	}

	let keys: ReturnType<typeof openDataKey>;
	try {
		keys = openDataKey();
	} catch (error) {
		db.close();
		throw error;
	}

	function decryptRow(row: SecretRow, dataKey: Buffer): string {
		try {
			return decryptValue(dataKey, rowToPayload(row), row.label).toString('utf8');
		} catch (error) {
			throw new BackendError(`Vault entry "${row.label}" could not be decrypted`, { cause: error });
		}
	}

	function writeSecret(label: string, secret: string, dataKey: Buffer, version: number): void {
		const encrypted = encryptValue(dataKey, Buffer.from(secret, 'utf8'), label);
		upsertSecret.run({
			label,
			nonce: encrypted.nonceB64,
			ciphertext: encrypted.ciphertextB64,
			tag: encrypted.authTagB64,
			version,
			updatedAt: new Date().toISOString(),
		});
	}

	const rotate = db.transaction((nextKey: Buffer, nextVersion: number): number => {
		const rows = selectAllSecrets.all();
		for (const row of rows) {
			writeSecret(row.label, decryptRow(row, keys.dataKey), nextKey, nextVersion);
		}
		writeWrappedKey(keys.kek, keys.salt, nextKey, nextVersion);
		return rows.length;
	});

	return {
		async store(label, secret) {
			writeSecret(label, secret, keys.dataKey, keys.version);
		},
		async fetch(label) {
			const row = selectSecret.get(label);
			return row ? decryptRow(row, keys.dataKey) : undefined;
		},
		async delete(label) {
			deleteSecret.run(label);
		},
		async list() {
			return selectAllSecrets.all().map((row) => row.label);
		},
		async rotateKeys() {
			const nextKey = generateKey();
			const nextVersion = keys.version + 1;
			const count = rotate(nextKey, nextVersion);
			keys = { ...keys, dataKey: nextKey, version: nextVersion };
			logger.info('Rotated vault data key', { keyVersion: nextVersion, reencrypted: count });
			return count;
		},
		close(): void {
			db.close();
		},
	};
}
