export {
	entryPath,
	loadManifest,
	MANIFEST_FILE,
	MANIFEST_SCHEMA_VERSION,
	parseManifest,
	requiresNative,
	validateManifest,
} from './manifest.js';
export { CAPABILITIES_ENV, createNativeRunner, type CreateNativeRunnerOptions } from './native-runner.js';
export { type AgentRegistry, createAgentRegistry } from './registry.js';
export {
	type AgentRuntime,
	type CreateAgentRuntimeOptions,
	createAgentRuntime,
	type ExecuteOptions,
} from './runtime.js';
export type {
	AgentInfo,
	ConsentDecision,
	ConsentHandler,
	ConsentRequest,
	DiscoveryFailure,
	DiscoveryReport,
	Manifest,
	NativeRunner,
	ProcessHandle,
	ProcessResult,
	RedeemFn,
	ResourceLimits,
	SandboxMode,
	SpawnOptions,
	UiHints,
	WasmHost,
	WasmInvocation,
} from './types.js';
