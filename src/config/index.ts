export { expandHome, getAgentGateHome, getDefaultConfigPath } from './defaults.js';
export {
	ensureAgentGateHome,
	getConfig,
	initConfig,
	loadConfig,
	resetConfig,
	type Result,
} from './loader.js';
export {
	type AgentGateConfig,
	ConfigSchema,
	type LogLevel,
	type ProviderSettings,
} from './schema.js';
