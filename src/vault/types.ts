/** Storage strategy, fixed when the vault is created */
export type VaultBackend =
	| { kind: 'os-keychain'; service: string }
	| { kind: 'encrypted-sqlite'; path: string; passphrase: string }
	| { kind: 'in-memory' };

export type VaultBackendKind = VaultBackend['kind'];

/**
 * What every backend implements. Lock gating and serialisation live in the
 * vault, not here.
 */
export interface VaultStorage {
	store(label: string, secret: string): Promise<void>;
	fetch(label: string): Promise<string | undefined>;
	delete(label: string): Promise<void>;
	list(): Promise<string[]>;
	/** Present only where there is a key to rotate; returns re-encrypted count */
	rotateKeys?(): Promise<number>;
	close(): void;
}

/** The slice of an OS keychain entry the vault uses */
export interface KeychainEntry {
	setPassword(password: string): void;
	getPassword(): string | null | undefined;
	deletePassword(): unknown;
}

export type KeychainEntryFactory = (service: string, account: string) => KeychainEntry | Promise<KeychainEntry>;
