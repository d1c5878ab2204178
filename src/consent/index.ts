export {
	type ConsentLedger,
	type CreateConsentLedgerOptions,
	createConsentLedger,
	createSqliteConsentLedger,
} from './ledger.js';
export type { ConsentAction, ConsentEntry, ConsentFilters } from './types.js';
