import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { BackendError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { redactSecrets } from '../utils/secret-redaction.js';
import type { ConsentAction, ConsentEntry, ConsentFilters } from './types.js';

const logger = createLogger('consent:ledger');

interface NewConsentEntry {
	timestamp: Date;
	agentId: string;
	action: ConsentAction;
	userId?: string;
}

/** Append-only storage behind the ledger. Entries come back in append order. */
interface LedgerStore {
	append(entry: NewConsentEntry): ConsentEntry;
	all(): ConsentEntry[];
	close(): void;
}

interface ConsentLedger {
	logGrant(agentId: string, capability: string, durationS?: number, userId?: string): ConsentEntry;
	logRevoke(agentId: string, capability: string, userId?: string): ConsentEntry;
	logDeny(agentId: string, capability: string, reason: string, userId?: string): ConsentEntry;
	getForAgent(agentId: string): ConsentEntry[];
	getAll(): ConsentEntry[];
	query(filters: ConsentFilters): ConsentEntry[];
	/** Pretty JSON of all entries, or of those matching `filters` */
	export(filters?: ConsentFilters): string;
	close(): void;
}

interface CreateConsentLedgerOptions {
	/** SQLite file; omit for an in-memory ledger */
	dbPath?: string;
}

interface LedgerRow {
	seq: number;
	timestamp: string;
	agent_id: string;
	action: string;
	capability: string;
	duration_s: number | null;
	reason: string | null;
	user_id: string | null;
}

/** Fresh frozen copy; callers never share a `Date` or action with the store. */
function freezeEntry(entry: ConsentEntry): ConsentEntry {
	return Object.freeze({
		...entry,
		timestamp: new Date(entry.timestamp.getTime()),
		action: Object.freeze({ ...entry.action }),
	});
}

function createInMemoryLedgerStore(): LedgerStore {
	const entries: ConsentEntry[] = [];

	return {
		append(entry) {
			const stored = freezeEntry({ ...entry, seq: entries.length + 1 });
			entries.push(stored);
			return freezeEntry(stored);
		},
		all: () => entries.map(freezeEntry),
		close(): void {
			// Nothing to release for the in-memory store
		},
	};
}

function rowToEntry(row: LedgerRow): ConsentEntry {
	let action: ConsentAction;
	switch (row.action) {
		case 'grant':
			action = {
				type: 'grant',
				capability: row.capability,
				durationS: row.duration_s ?? undefined,
			};
			break;
		case 'revoke':
			action = { type: 'revoke', capability: row.capability };
			break;
		case 'deny':
			action = { type: 'deny', capability: row.capability, reason: row.reason ?? '' };
			break;
		default:
			throw new BackendError(`Unknown consent action in ledger row ${row.seq}: ${row.action}`);
	}

	return freezeEntry({
		seq: row.seq,
		timestamp: new Date(row.timestamp),
		agentId: row.agent_id,
		action,
		userId: row.user_id ?? undefined,
	});
}

type LedgerDatabase = InstanceType<typeof Database>;

function openLedgerDatabase(dbPath: string): LedgerDatabase {
	let db: LedgerDatabase | undefined;
	try {
		mkdirSync(dirname(dbPath), { recursive: true });
		db = new Database(dbPath);

		// Enable WAL mode for crash safety
		db.pragma('journal_mode = WAL');

		db.exec(`
			CREATE TABLE IF NOT EXISTS consent_ledger (
				seq INTEGER PRIMARY KEY AUTOINCREMENT,
				timestamp TEXT NOT NULL,
				agent_id TEXT NOT NULL,
				action TEXT NOT NULL CHECK (action IN ('grant', 'revoke', 'deny')),
				capability TEXT NOT NULL,
				duration_s INTEGER,
				reason TEXT,
				user_id TEXT
			);
			CREATE INDEX IF NOT EXISTS idx_consent_agent ON consent_ledger(agent_id);
			CREATE TRIGGER IF NOT EXISTS consent_ledger_no_update
				BEFORE UPDATE ON consent_ledger
				BEGIN SELECT RAISE(ABORT, 'consent ledger is append-only'); END;
			CREATE TRIGGER IF NOT EXISTS consent_ledger_no_delete
				BEFORE DELETE ON consent_ledger
				BEGIN SELECT RAISE(ABORT, 'consent ledger is append-only'); END;
		`);
		return db;
	} catch (error) {
		db?.close();
		throw new BackendError(`Unable to open consent ledger at ${dbPath}`, { cause: error });
	}
}

function createSqliteLedgerStore(dbPath: string): LedgerStore {
	const db = openLedgerDatabase(dbPath);

	const insertStmt = db.prepare<{
		timestamp: string;
		agentId: string;
		action: string;
		capability: string;
		durationS: number | null;
		reason: string | null;
		userId: string | null;
	}>(`
		INSERT INTO consent_ledger (timestamp, agent_id, action, capability, duration_s, reason, user_id)
		VALUES (@timestamp, @agentId, @action, @capability, @durationS, @reason, @userId)
	`);

	const allStmt = db.prepare<[], LedgerRow>('SELECT * FROM consent_ledger ORDER BY seq ASC');

	return {
		append(entry) {
			const result = insertStmt.run({
				timestamp: entry.timestamp.toISOString(),
				agentId: entry.agentId,
				action: entry.action.type,
				capability: entry.action.capability,
				durationS: entry.action.type === 'grant' ? (entry.action.durationS ?? null) : null,
				reason: entry.action.type === 'deny' ? entry.action.reason : null,
				userId: entry.userId ?? null,
			});
			return freezeEntry({ ...entry, seq: Number(result.lastInsertRowid) });
		},
		all: () => allStmt.all().map(rowToEntry),
		close(): void {
			db.close();
		},
	};
}

function matches(entry: ConsentEntry, filters: ConsentFilters): boolean {
	if (filters.agentId && entry.agentId !== filters.agentId) return false;
	if (filters.actionType && entry.action.type !== filters.actionType) return false;
	if (filters.capability && entry.action.capability !== filters.capability) return false;
	if (filters.since && entry.timestamp < filters.since) return false;
	if (filters.until && entry.timestamp > filters.until) return false;
	return true;
}

function toExportRecord(entry: ConsentEntry): Record<string, unknown> {
	const action: Record<string, unknown> = {
		type: entry.action.type,
		capability: entry.action.capability,
	};
	if (entry.action.type === 'grant') action.duration_s = entry.action.durationS ?? null;
	if (entry.action.type === 'deny') action.reason = entry.action.reason;

	return {
		seq: entry.seq,
		timestamp: entry.timestamp.toISOString(),
		agent_id: entry.agentId,
		action,
		user_id: entry.userId ?? null,
	};
}

/**
 * Creates the append-only consent ledger. With `dbPath` the trail is kept in
 * SQLite (WAL, update/delete blocked by triggers); if the database cannot be
 * opened the ledger falls back to memory.
 */
export function createConsentLedger(options: CreateConsentLedgerOptions = {}): ConsentLedger {
	let store: LedgerStore;
	if (options.dbPath) {
		try {
			store = createSqliteLedgerStore(options.dbPath);
		} catch (err: unknown) {
			const reason = errorMessage(err);
			logger.warn('SQLite consent ledger unavailable, using in-memory fallback', { reason });
			store = createInMemoryLedgerStore();
		}
	} else {
		store = createInMemoryLedgerStore();
	}

	let lastTimestamp = 0;

	// Timestamps never go backwards, so append order is also time order.
	function append(agentId: string, action: ConsentAction, userId?: string): ConsentEntry {
		const time = Math.max(Date.now(), lastTimestamp);
		lastTimestamp = time;
		return store.append({ timestamp: new Date(time), agentId, action, userId });
	}

	function logGrant(
		agentId: string,
		capability: string,
		durationS?: number,
		userId?: string,
	): ConsentEntry {
		const entry = append(agentId, { type: 'grant', capability, durationS }, userId);
		logger.info('Consent granted', { agentId, capability, durationS });
		return entry;
	}

	function logRevoke(agentId: string, capability: string, userId?: string): ConsentEntry {
		const entry = append(agentId, { type: 'revoke', capability }, userId);
		logger.info('Consent revoked', { agentId, capability });
		return entry;
	}

	function logDeny(
		agentId: string,
		capability: string,
		reason: string,
		userId?: string,
	): ConsentEntry {
		const safeReason = redactSecrets(reason);
		const entry = append(agentId, { type: 'deny', capability, reason: safeReason }, userId);
		logger.info('Consent denied', { agentId, capability, reason: safeReason });
		return entry;
	}

	return {
		logGrant,
		logRevoke,
		logDeny,
		getForAgent: (agentId) => store.all().filter((entry) => entry.agentId === agentId),
		getAll: () => store.all(),
		query: (filters) => store.all().filter((entry) => matches(entry, filters)),
		export: (filters) => {
			const entries = filters ? store.all().filter((entry) => matches(entry, filters)) : store.all();
			return JSON.stringify(entries.map(toExportRecord), null, 2);
		},
		close: () => store.close(),
	};
}

/** SQLite-backed ledger at `dbPath`, with the same in-memory fallback. */
export function createSqliteConsentLedger(dbPath: string): ConsentLedger {
	return createConsentLedger({ dbPath });
}

export type { ConsentLedger, CreateConsentLedgerOptions };
