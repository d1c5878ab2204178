export type ErrorCode =
	| 'FORMAT_ERROR'
	| 'VALIDATION_ERROR'
	| 'NOT_FOUND'
	| 'VAULT_LOCKED'
	| 'BACKEND_ERROR'
	| 'NETWORK_ERROR'
	| 'CAPABILITY_DENIED';

interface AgentGateErrorOptions {
	hint?: string;
	cause?: unknown;
}

/**
 * Base class for every expected failure in the control plane.
 * `code` is stable and safe to put on the wire; `hint` is a user-facing
 * recovery suggestion.
 */
export class AgentGateError extends Error {
	readonly code: ErrorCode;
	readonly hint?: string;

	constructor(code: ErrorCode, message: string, options: AgentGateErrorOptions = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause });
		this.name = new.target.name;
		this.code = code;
		this.hint = options.hint;
	}
}

/** Malformed capability string. */
export class FormatError extends AgentGateError {
	constructor(message: string, options?: AgentGateErrorOptions) {
		super('FORMAT_ERROR', message, options);
	}
}

/** Manifest schema mismatch or missing entry point. */
export class ValidationError extends AgentGateError {
	constructor(message: string, options?: AgentGateErrorOptions) {
		super('VALIDATION_ERROR', message, options);
	}
}

/** Unknown agent, provider, token or revoke target. */
export class NotFoundError extends AgentGateError {
	constructor(message: string, options?: AgentGateErrorOptions) {
		super('NOT_FOUND', message, options);
	}
}

export class LockedError extends AgentGateError {
	constructor(message = 'Vault is locked', options?: AgentGateErrorOptions) {
		super('VAULT_LOCKED', message, { hint: 'Unlock the vault and retry', ...options });
	}
}

/** Keychain or storage failure. */
export class BackendError extends AgentGateError {
	constructor(message: string, options?: AgentGateErrorOptions) {
		super('BACKEND_ERROR', message, options);
	}
}

/** OAuth HTTP exchange failure. */
export class NetworkError extends AgentGateError {
	readonly status?: number;

	constructor(message: string, options: AgentGateErrorOptions & { status?: number } = {}) {
		super('NETWORK_ERROR', message, options);
		this.status = options.status;
	}
}

export class CapabilityDeniedError extends AgentGateError {
	constructor(message: string, options?: AgentGateErrorOptions) {
		super('CAPABILITY_DENIED', message, options);
	}
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Renders an error and its `cause` chain, outermost first:
 * `Failed to load agent: Unsupported schema version 0.2`.
 */
export function formatErrorChain(error: unknown): string {
	const parts: string[] = [];
	const seen = new Set<unknown>();
	let current: unknown = error;
	while (current !== undefined && current !== null && !seen.has(current)) {
		seen.add(current);
		parts.push(errorMessage(current));
		current = current instanceof Error ? current.cause : undefined;
	}
	return parts.join(': ');
}
