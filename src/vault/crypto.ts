import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';

export interface EncryptedValue {
	algorithm: 'aes-256-gcm';
	nonceB64: string;
	ciphertextB64: string;
	authTagB64: string;
}

const ALGORITHM = 'aes-256-gcm';
const KEY_BYTES = 32;
const NONCE_BYTES = 12;
const SALT_BYTES = 16;
const SCRYPT_N = 2 ** 15;
const SCRYPT_R = 8;
const SCRYPT_P = 1;
const SCRYPT_MAXMEM = 64 * 1024 * 1024;

export function generateKey(): Buffer {
	return randomBytes(KEY_BYTES);
}

export function generateSalt(): Buffer {
	return randomBytes(SALT_BYTES);
}

/** Derives the key-encryption key from the vault passphrase (scrypt). */
export function deriveKey(passphrase: string, salt: Buffer): Buffer {
	return scryptSync(passphrase, salt, KEY_BYTES, {
		N: SCRYPT_N,
		r: SCRYPT_R,
		p: SCRYPT_P,
		maxmem: SCRYPT_MAXMEM,
	});
}

/**
 * AES-256-GCM with a fresh nonce. `associatedData` is authenticated but not
 * encrypted; the vault binds each ciphertext to its label this way.
 */
export function encryptValue(key: Buffer, plaintext: Buffer, associatedData?: string): EncryptedValue {
	const nonce = randomBytes(NONCE_BYTES);
	const cipher = createCipheriv(ALGORITHM, key, nonce);
	if (associatedData !== undefined) cipher.setAAD(Buffer.from(associatedData, 'utf8'));
	const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
	return {
		algorithm: ALGORITHM,
		nonceB64: nonce.toString('base64'),
		ciphertextB64: ciphertext.toString('base64'),
		authTagB64: cipher.getAuthTag().toString('base64'),
	};
}

/** Throws when the key is wrong or the payload was tampered with. */
export function decryptValue(key: Buffer, payload: EncryptedValue, associatedData?: string): Buffer {
	const decipher = createDecipheriv(ALGORITHM, key, Buffer.from(payload.nonceB64, 'base64'));
	if (associatedData !== undefined) decipher.setAAD(Buffer.from(associatedData, 'utf8'));
	decipher.setAuthTag(Buffer.from(payload.authTagB64, 'base64'));
	return Buffer.concat([
		decipher.update(Buffer.from(payload.ciphertextB64, 'base64')),
		decipher.final(),
	]);
}
