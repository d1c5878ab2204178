#!/usr/bin/env node

import { Command } from 'commander';
import { createAgentRegistry } from './agents/registry.js';
import { registerAgentsCommands } from './cli/agents.js';
import { registerAuthCommands } from './cli/auth.js';
import { registerLedgerCommands } from './cli/ledger.js';
import { type AgentGateConfig, ensureAgentGateHome, getConfig, initConfig } from './config/index.js';
import { ledgerFromConfig, providersFromConfig, vaultBackendFromConfig } from './control-plane.js';
import { createOAuthBroker } from './oauth/broker.js';
import { initLogger } from './utils/logger.js';
import { createTokenVault } from './vault/vault.js';

const program = new Command();

function initAppConfig(configPath?: string): AgentGateConfig {
	const configResult = initConfig(configPath);
	if (!configResult.ok) {
		throw configResult.error;
	}
	const config = getConfig();
	ensureAgentGateHome();
	initLogger({
		level: config.logging.level,
		filePath: config.logging.file,
		silent: true,
	});
	return config;
}

program.name('agentgate').description('Capability and consent control plane for agents').version('0.1.0');

registerAgentsCommands(program, {
	async resolveServices(configPath) {
		const config = initAppConfig(configPath);
		return { registry: createAgentRegistry(), agentsDir: config.agents.dir };
	},
});

registerLedgerCommands(program, {
	async resolveServices(configPath) {
		const ledger = ledgerFromConfig(initAppConfig(configPath));
		return { ledger, close: () => ledger.close() };
	},
});

registerAuthCommands(program, {
	async resolveProviders(configPath) {
		return providersFromConfig(initAppConfig(configPath));
	},
	async resolveServices(configPath) {
		const config = initAppConfig(configPath);
		const providers = providersFromConfig(config);
		const vault = createTokenVault({ backend: vaultBackendFromConfig(config) });
		const ledger = ledgerFromConfig(config);
		const broker = createOAuthBroker({ vault, ledger, providers });
		return {
			broker,
			close() {
				vault.close();
				ledger.close();
			},
		};
	},
});

await program.parseAsync();
