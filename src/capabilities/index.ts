export {
	capabilitiesEqual,
	createCapability,
	formatCapability,
	isGrantValid,
	parseCapability,
} from './capability.js';
export {
	type CapabilityManager,
	type CreateCapabilityManagerOptions,
	createCapabilityManager,
	DEFAULT_PERMIT_TTL_MS,
} from './manager.js';
export type { Capability, CapabilityGrant, ExecutionPermit } from './types.js';
