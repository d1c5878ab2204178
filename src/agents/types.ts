export type SandboxMode = 'wasm' | 'native';

export interface ResourceLimits {
	/** e.g. "500m" */
	readonly cpu: string;
	/** e.g. "512Mi" */
	readonly mem: string;
}

export interface UiHints {
	/** e.g. ["streaming", "diff", "preview"] */
	readonly hints: readonly string[];
}

/** Agent descriptor loaded from `manifest.yaml`. Frozen once loaded. */
export interface Manifest {
	readonly schemaVersion: string;
	readonly name: string;
	readonly version: string;
	readonly entry: string;
	readonly sandbox: SandboxMode;
	readonly capabilities: readonly string[];
	readonly oauthScopes: readonly string[];
	readonly resources: ResourceLimits;
	readonly ui: UiHints;
}

export interface AgentInfo {
	manifest: Manifest;
	baseDir: string;
	enabled: boolean;
}

export interface DiscoveryFailure {
	dir: string;
	error: string;
}

export interface DiscoveryReport {
	registered: string[];
	failed: DiscoveryFailure[];
}

/** Consumes the execution permit's claim on one capability ("scope.action") */
export type RedeemFn = (capability: string) => boolean;

export interface WasmInvocation {
	manifest: Manifest;
	baseDir: string;
	input: string;
	redeem: RedeemFn;
}

/** WASM engine boundary; the interpreter itself lives outside this package */
export interface WasmHost {
	invoke(invocation: WasmInvocation): Promise<string>;
}

export interface SpawnOptions {
	input: string;
	cwd: string;
	redeem: RedeemFn;
	/** Capabilities to redeem before the process starts */
	capabilities?: readonly string[];
	env?: Record<string, string>;
}

export interface ProcessResult {
	exitCode: number | null;
	signal: NodeJS.Signals | null;
	stdout: string;
	stderr: string;
}

export interface ProcessHandle {
	readonly pid: number | undefined;
	wait(): Promise<ProcessResult>;
}

export interface NativeRunner {
	spawn(executable: string, args: readonly string[], options: SpawnOptions): Promise<ProcessHandle>;
}

export interface ConsentRequest {
	agentId: string;
	capability: string;
	reason: string;
	/** Suggested grant lifetime; undefined means no expiry */
	durationS?: number;
}

export type ConsentDecision =
	| { granted: true; durationS?: number }
	| { granted: false; reason: string };

/** Asks the user (or a policy) whether to grant a capability */
export type ConsentHandler = (request: ConsentRequest) => ConsentDecision | Promise<ConsentDecision>;
