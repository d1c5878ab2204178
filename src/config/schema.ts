import { z } from 'zod';

const AgentsSchema = z.object({
	dir: z.string().default('~/.agentgate/agents'),
});

const ConsentSchema = z.object({
	/** Grant lifetime when the consent handler does not choose one; 0 means no expiry. */
	defaultDurationS: z.number().int().nonnegative().default(3600),
	permitTtlMs: z.number().int().positive().default(30_000),
});

const LedgerSchema = z.object({
	path: z.string().default('~/.agentgate/consent.db'),
	persist: z.boolean().default(true),
});

const VaultSchema = z.object({
	backend: z.enum(['os-keychain', 'encrypted-sqlite', 'in-memory']).default('encrypted-sqlite'),
	path: z.string().default('~/.agentgate/vault.db'),
	passphrase: z.string().default(''),
	service: z.string().default('agentgate'),
});

const ProviderSchema = z.object({
	clientId: z.string().default(''),
	clientSecret: z.string().optional(),
	preset: z.enum(['github', 'google']).optional(),
	authUrl: z.string().url().optional(),
	tokenUrl: z.string().url().optional(),
	deviceAuthUrl: z.string().url().optional(),
	revocationUrl: z.string().url().optional(),
	redirectUri: z.string().url().optional(),
	scopes: z.array(z.string()).default([]),
});

const OAuthSchema = z.object({
	providers: z.record(ProviderSchema).default({}),
});

const LoggingSchema = z.object({
	level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
	file: z.string().default('~/.agentgate/logs/agentgate.log'),
});

export const ConfigSchema = z.object({
	version: z.number().int().default(1),
	agents: AgentsSchema.default({}),
	consent: ConsentSchema.default({}),
	ledger: LedgerSchema.default({}),
	vault: VaultSchema.default({}),
	oauth: OAuthSchema.default({}),
	logging: LoggingSchema.default({}),
});

export type AgentGateConfig = z.infer<typeof ConfigSchema>;
export type ProviderSettings = z.infer<typeof ProviderSchema>;
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
