import { createAgentRegistry, type AgentRegistry } from './agents/registry.js';
import { createNativeRunner } from './agents/native-runner.js';
import { createAgentRuntime, type AgentRuntime } from './agents/runtime.js';
import type { ConsentHandler, NativeRunner, WasmHost } from './agents/types.js';
import { createCapabilityManager, type CapabilityManager } from './capabilities/manager.js';
import type { AgentGateConfig } from './config/schema.js';
import { createConsentLedger, type ConsentLedger } from './consent/ledger.js';
import { createOAuthBroker, type OAuthBroker } from './oauth/broker.js';
import { providerFromSettings } from './oauth/providers.js';
import type { FetchFn, ProviderConfig } from './oauth/types.js';
import { createLogger } from './utils/logger.js';
import type { VaultBackend } from './vault/types.js';
import { createTokenVault, type TokenVault } from './vault/vault.js';

const logger = createLogger('control-plane');

interface CreateControlPlaneOptions {
	consentHandler?: ConsentHandler;
	wasmHost?: WasmHost;
	nativeRunner?: NativeRunner;
	fetchImpl?: FetchFn;
}

interface ControlPlane {
	config: AgentGateConfig;
	capabilities: CapabilityManager;
	ledger: ConsentLedger;
	vault: TokenVault;
	broker: OAuthBroker;
	registry: AgentRegistry;
	runtime: AgentRuntime;
	close(): void;
}

export function vaultBackendFromConfig(config: AgentGateConfig): VaultBackend {
	switch (config.vault.backend) {
		case 'os-keychain':
			return { kind: 'os-keychain', service: config.vault.service };
		case 'encrypted-sqlite':
			return {
				kind: 'encrypted-sqlite',
				path: config.vault.path,
				passphrase: config.vault.passphrase,
			};
		case 'in-memory':
			return { kind: 'in-memory' };
	}
}

export function providersFromConfig(config: AgentGateConfig): Record<string, ProviderConfig> {
	const providers: Record<string, ProviderConfig> = {};
	for (const [name, settings] of Object.entries(config.oauth.providers)) {
		providers[name] = providerFromSettings(name, settings);
	}
	return providers;
}

export function ledgerFromConfig(config: AgentGateConfig): ConsentLedger {
	return config.ledger.persist
		? createConsentLedger({ dbPath: config.ledger.path })
		: createConsentLedger();
}

/**
 * Wires every component from one loaded configuration. The caller owns the
 * result and must `close()` it to release the ledger and vault databases.
 */
export function createControlPlane(
	config: AgentGateConfig,
	options: CreateControlPlaneOptions = {},
): ControlPlane {
	const providers = providersFromConfig(config);
	const capabilities = createCapabilityManager();
	const vault = createTokenVault({ backend: vaultBackendFromConfig(config) });
	const ledger = ledgerFromConfig(config);
	const broker = createOAuthBroker({
		vault,
		ledger,
		providers,
		fetchImpl: options.fetchImpl,
	});
	const registry = createAgentRegistry();
	const runtime = createAgentRuntime({
		capabilities,
		ledger,
		registry,
		consentHandler: options.consentHandler,
		wasmHost: options.wasmHost,
		nativeRunner: options.nativeRunner ?? createNativeRunner(),
		defaultDurationS: config.consent.defaultDurationS,
		permitTtlMs: config.consent.permitTtlMs,
	});

	logger.debug('Control plane ready', {
		vaultBackend: vault.backendKind,
		providers: broker.listProviders(),
	});

	return {
		config,
		capabilities,
		ledger,
		vault,
		broker,
		registry,
		runtime,
		close(): void {
			vault.close();
			ledger.close();
		},
	};
}

export type { ControlPlane, CreateControlPlaneOptions };
