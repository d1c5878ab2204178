export const PROTOCOL_VERSION = '0.1';

/** User or system input to an agent */
export interface InputEvent {
	prompt: string;
	contextRefs: string[];
}

/** One chunk of agent output */
export interface OutputEvent {
	chunkId: number;
	/** e.g. "text/plain", "text/markdown", "application/json" */
	contentType: string;
	data: Uint8Array;
	complete: boolean;
}

export interface ArtifactEvent {
	id: string;
	/** e.g. "diff", "log", "preview", "code" */
	kind: string;
	path: string;
	previewHint?: string;
}

export interface ConsentRequestEvent {
	capability: string;
	reason: string;
	durationS?: number;
}

export interface ConsentGrantEvent {
	capability: string;
	expiresAt?: Date;
}

export interface ConsentRevokeEvent {
	capability: string;
}

export interface ErrorEvent {
	code: string;
	message: string;
	hint?: string;
}

export type StateScope = 'agent' | 'session' | 'global';

export interface StateUpdateEvent {
	key: string;
	value: unknown;
	scope: StateScope;
}

export type EventType =
	| { type: 'Input'; data: InputEvent }
	| { type: 'Output'; data: OutputEvent }
	| { type: 'Artifact'; data: ArtifactEvent }
	| { type: 'ConsentRequest'; data: ConsentRequestEvent }
	| { type: 'ConsentGrant'; data: ConsentGrantEvent }
	| { type: 'ConsentRevoke'; data: ConsentRevokeEvent }
	| { type: 'Error'; data: ErrorEvent }
	| { type: 'StateUpdate'; data: StateUpdateEvent };

export type EventKind = EventType['type'];

export interface AgentEvent {
	version: typeof PROTOCOL_VERSION;
	eventType: EventType;
	agentId: string;
	timestamp: Date;
	/** Monotonically increasing per agent */
	sequence: number;
}

/** Stable codes carried by Error events raised by the host. */
export type HostErrorCode =
	| 'CAPABILITY_FORMAT'
	| 'CAPABILITY_DENIED'
	| 'AGENT_NOT_FOUND'
	| 'AGENT_DISABLED'
	| 'BACKEND_UNAVAILABLE'
	| 'EXECUTION_FAILED';
