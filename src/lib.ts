export * from './agents/index.js';
export * from './capabilities/index.js';
export * from './config/index.js';
export * from './consent/index.js';
export {
	type ControlPlane,
	type CreateControlPlaneOptions,
	createControlPlane,
	ledgerFromConfig,
	providersFromConfig,
	vaultBackendFromConfig,
} from './control-plane.js';
export * from './oauth/index.js';
export * from './protocol/index.js';
export * from './utils/index.js';
export * from './vault/index.js';
