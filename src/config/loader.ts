import { existsSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { expandHome, getAgentGateHome, getDefaultConfigPath } from './defaults.js';
import { type AgentGateConfig, ConfigSchema } from './schema.js';

type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };

/**
 * Resolves environment variable references in config values.
 * Supports ${ENV_VAR} syntax. Unset variables resolve to an empty string.
 */
function resolveEnvVars(value: unknown): unknown {
	if (typeof value === 'string') {
		return value.replace(/\$\{([^}]+)\}/g, (_match, varName: string) => {
			return process.env[varName] ?? '';
		});
	}
	if (Array.isArray(value)) {
		return value.map(resolveEnvVars);
	}
	if (isPlainObject(value)) {
		const result: Record<string, unknown> = {};
		for (const [key, val] of Object.entries(value)) {
			result[key] = resolveEnvVars(val);
		}
		return result;
	}
	return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Converts YAML snake_case keys to camelCase for TypeScript config.
 */
function snakeToCamel(str: string): string {
	return str.replace(/_([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

function convertKeysToCamelCase(obj: unknown): unknown {
	if (Array.isArray(obj)) {
		return obj.map(convertKeysToCamelCase);
	}
	if (isPlainObject(obj)) {
		const result: Record<string, unknown> = {};
		for (const [key, val] of Object.entries(obj)) {
			result[snakeToCamel(key)] = convertKeysToCamelCase(val);
		}
		return result;
	}
	return obj;
}

function expandPaths(config: AgentGateConfig): AgentGateConfig {
	return {
		...config,
		agents: { ...config.agents, dir: expandHome(config.agents.dir) },
		ledger: { ...config.ledger, path: expandHome(config.ledger.path) },
		vault: { ...config.vault, path: expandHome(config.vault.path) },
		logging: { ...config.logging, file: expandHome(config.logging.file) },
	};
}

/**
 * Loads and validates the configuration.
 * Looks for config at the given path, or falls back to defaults.
 */
export function loadConfig(configPath?: string): Result<AgentGateConfig> {
	const path = configPath ?? getDefaultConfigPath();

	let rawConfig: unknown = {};

	if (existsSync(path)) {
		try {
			const parsed: unknown = parseYaml(readFileSync(path, 'utf-8'));
			if (isPlainObject(parsed)) {
				rawConfig = parsed;
			}
		} catch (err) {
			return {
				ok: false,
				error: new Error(
					`Failed to parse config at ${path}: ${err instanceof Error ? err.message : String(err)}`,
					{ cause: err },
				),
			};
		}
	}

	const resolvedConfig = resolveEnvVars(convertKeysToCamelCase(rawConfig));
	const result = ConfigSchema.safeParse(resolvedConfig);

	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `  - ${issue.path.join('.')}: ${issue.message}`,
		);
		return {
			ok: false,
			error: new Error(`Invalid configuration:\n${issues.join('\n')}`),
		};
	}

	return { ok: true, value: expandPaths(result.data) };
}

/**
 * Ensures the home directory and its logs folder exist.
 */
export function ensureAgentGateHome(): string {
	const home = getAgentGateHome();
	mkdirSync(join(home, 'logs'), { recursive: true });
	return home;
}

let _config: AgentGateConfig | null = null;

/**
 * Initializes and returns the config. Call once at startup.
 */
export function initConfig(configPath?: string): Result<AgentGateConfig> {
	const result = loadConfig(configPath);
	if (result.ok) {
		_config = result.value;
	}
	return result;
}

/**
 * Gets the loaded config. Throws if not initialized.
 */
export function getConfig(): AgentGateConfig {
	if (_config === null) {
		throw new Error('Config not initialized. Call initConfig() first.');
	}
	return _config;
}

/**
 * Resets config (for testing).
 */
export function resetConfig(): void {
	_config = null;
}

export type { Result };
