import { formatCapability, parseCapability } from '../capabilities/capability.js';
import { DEFAULT_PERMIT_TTL_MS, type CapabilityManager } from '../capabilities/manager.js';
import type { Capability } from '../capabilities/types.js';
import type { ConsentLedger } from '../consent/ledger.js';
import {
	createEventSequencer,
	decodeEvent,
	errorEvent,
	type EventSequencer,
	inputEvent,
	textOutputEvent,
} from '../protocol/events.js';
import type { AgentEvent, EventType } from '../protocol/types.js';
import { errorMessage, formatErrorChain } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { redactSecrets } from '../utils/secret-redaction.js';
import { entryPath } from './manifest.js';
import type { AgentRegistry } from './registry.js';
import type {
	ConsentDecision,
	ConsentHandler,
	Manifest,
	NativeRunner,
	ProcessResult,
	RedeemFn,
	WasmHost,
} from './types.js';

const logger = createLogger('agents:runtime');

const DEFAULT_GRANT_DURATION_S = 3600;
const STDERR_HINT_CHARS = 500;

interface CreateAgentRuntimeOptions {
	capabilities: CapabilityManager;
	ledger: ConsentLedger;
	registry?: AgentRegistry;
	consentHandler?: ConsentHandler;
	wasmHost?: WasmHost;
	nativeRunner?: NativeRunner;
	sequencer?: EventSequencer;
	/** Grant lifetime when the handler does not pick one; 0 means no expiry */
	defaultDurationS?: number;
	permitTtlMs?: number;
	/** Recorded on ledger entries written by this runtime */
	userId?: string;
}

interface ExecuteOptions {
	/** Agent directory; entry paths resolve against it */
	baseDir?: string;
	contextRefs?: string[];
	/** Extra arguments for native agents */
	args?: string[];
}

interface AgentRuntime {
	execute(manifest: Manifest, input: string, options?: ExecuteOptions): Promise<AgentEvent[]>;
	executeAgent(name: string, input: string, options?: ExecuteOptions): Promise<AgentEvent[]>;
	revokeCapability(agentId: string, capability: string): AgentEvent;
}

/** Thrown inside an execution to stop it after an Error event was emitted */
class ExecutionAborted extends Error {}

// Agents may not forge consent outcomes on their own stream.
const AGENT_FORBIDDEN_EVENTS = new Set<EventType['type']>(['ConsentGrant', 'ConsentRevoke']);

/** Lines of native stdout that are protocol events; anything else is output text */
function tryDecodeEvent(line: string): AgentEvent | undefined {
	if (!line.startsWith('{')) return undefined;
	try {
		return decodeEvent(line);
	} catch {
		return undefined;
	}
}

/**
 * Enforces declared capabilities before an agent runs. Missing grants go
 * through the consent handler; anything not granted stops the run before
 * dispatch. Dispatch carries a single-use execution permit that backends
 * redeem per capability.
 */
export function createAgentRuntime(options: CreateAgentRuntimeOptions): AgentRuntime {
	const { capabilities, ledger } = options;
	const sequencer = options.sequencer ?? createEventSequencer();
	const defaultDurationS = options.defaultDurationS ?? DEFAULT_GRANT_DURATION_S;
	const permitTtlMs = options.permitTtlMs ?? DEFAULT_PERMIT_TTL_MS;

	async function askConsent(
		agentId: string,
		capability: string,
		reason: string,
	): Promise<ConsentDecision> {
		if (!options.consentHandler) {
			return { granted: false, reason: 'No consent handler configured' };
		}
		try {
			return await options.consentHandler({
				agentId,
				capability,
				reason,
				durationS: defaultDurationS > 0 ? defaultDurationS : undefined,
			});
		} catch (error) {
			logger.warn('Consent handler failed; treating as denial', {
				agentId,
				capability,
				error: errorMessage(error),
			});
			return { granted: false, reason: `Consent handler failed: ${errorMessage(error)}` };
		}
	}

	async function ensureCapabilities(
		manifest: Manifest,
		emit: (eventType: EventType) => void,
	): Promise<Capability[]> {
		const agentId = manifest.name;
		const required: Capability[] = [];

		for (const raw of manifest.capabilities) {
			let capability: Capability;
			try {
				capability = parseCapability(raw);
			} catch (error) {
				emit(
					errorEvent(
						'CAPABILITY_FORMAT',
						errorMessage(error),
						'Declare capabilities as "scope.action" in manifest.yaml',
					),
				);
				throw new ExecutionAborted();
			}
			required.push(capability);
			if (capabilities.check(capability)) continue;

			const name = formatCapability(capability);
			const reason = `Agent "${agentId}" requests ${name}`;
			emit({
				type: 'ConsentRequest',
				data: {
					capability: name,
					reason,
					durationS: defaultDurationS > 0 ? defaultDurationS : undefined,
				},
			});

			const decision = await askConsent(agentId, name, reason);
			if (!decision.granted) {
				ledger.logDeny(agentId, name, decision.reason, options.userId);
				emit(errorEvent('CAPABILITY_DENIED', `Capability denied: ${name}`, decision.reason));
				throw new ExecutionAborted();
			}

			const durationS = decision.durationS ?? defaultDurationS;
			// 0 means no expiry; anything else must be a positive number of seconds.
			if (!Number.isFinite(durationS) || durationS < 0) {
				const invalid = 'invalid grant duration';
				ledger.logDeny(agentId, name, invalid, options.userId);
				emit(errorEvent('CAPABILITY_DENIED', `Capability denied: ${name}`, invalid));
				throw new ExecutionAborted();
			}

			const grant = capabilities.grant(
				capability,
				durationS > 0 ? durationS * 1000 : undefined,
			);
			ledger.logGrant(agentId, name, durationS > 0 ? durationS : undefined, options.userId);
			emit({ type: 'ConsentGrant', data: { capability: name, expiresAt: grant.expiresAt } });
		}

		return required;
	}

	function nativeOutputEvents(agentId: string, result: ProcessResult): EventType[] {
		const events: EventType[] = [];
		let text: string[] = [];
		let chunkId = 0;

		const flush = (complete: boolean) => {
			if (text.length === 0) return;
			events.push(textOutputEvent(text.join('\n'), chunkId, complete));
			chunkId += 1;
			text = [];
		};

		for (const line of result.stdout.split('\n')) {
			const event = tryDecodeEvent(line.trim());
			if (event && AGENT_FORBIDDEN_EVENTS.has(event.eventType.type)) {
				logger.warn('Dropped consent event emitted by agent', {
					agentId,
					type: event.eventType.type,
				});
			} else if (event) {
				flush(false);
				events.push(event.eventType);
			} else if (line.trim().length > 0) {
				text.push(line);
			}
		}
		flush(true);
		return events;
	}

	async function dispatch(
		manifest: Manifest,
		input: string,
		baseDir: string,
		redeem: RedeemFn,
		executeOptions: ExecuteOptions,
	): Promise<EventType[]> {
		if (manifest.sandbox === 'wasm') {
			if (!options.wasmHost) {
				return [errorEvent('BACKEND_UNAVAILABLE', 'No WASM host configured')];
			}
			const output = await options.wasmHost.invoke({ manifest, baseDir, input, redeem });
			return [textOutputEvent(output)];
		}

		if (!options.nativeRunner) {
			return [errorEvent('BACKEND_UNAVAILABLE', 'No native runner configured')];
		}
		const handle = await options.nativeRunner.spawn(
			entryPath(manifest, baseDir),
			executeOptions.args ?? [],
			{ input, cwd: baseDir, redeem, capabilities: manifest.capabilities },
		);
		const result = await handle.wait();
		const events = nativeOutputEvents(manifest.name, result);
		if (result.exitCode !== 0) {
			const stderr = redactSecrets(result.stderr.trim()).slice(-STDERR_HINT_CHARS);
			events.push(
				errorEvent(
					'EXECUTION_FAILED',
					result.signal
						? `Agent terminated by ${result.signal}`
						: `Agent exited with code ${result.exitCode}`,
					stderr.length > 0 ? stderr : undefined,
				),
			);
		}
		return events;
	}

	async function execute(
		manifest: Manifest,
		input: string,
		executeOptions: ExecuteOptions = {},
	): Promise<AgentEvent[]> {
		const agentId = manifest.name;
		const baseDir = executeOptions.baseDir ?? process.cwd();
		const events: AgentEvent[] = [];
		const emit = (eventType: EventType) => {
			events.push(sequencer.emit(agentId, eventType));
		};

		emit(inputEvent(input, executeOptions.contextRefs));

		let required: Capability[];
		try {
			required = await ensureCapabilities(manifest, emit);
		} catch (error) {
			if (error instanceof ExecutionAborted) return events;
			throw error;
		}

		let token: string;
		try {
			token = capabilities.issuePermit(agentId, required, permitTtlMs).token;
		} catch (error) {
			emit(errorEvent('CAPABILITY_DENIED', errorMessage(error)));
			return events;
		}

		const redeem: RedeemFn = (value) => {
			try {
				return capabilities.redeemPermit(token, parseCapability(value));
			} catch {
				return false;
			}
		};

		logger.info('Dispatching agent', { agentId, sandbox: manifest.sandbox });
		try {
			for (const eventType of await dispatch(manifest, input, baseDir, redeem, executeOptions)) {
				emit(eventType);
			}
		} catch (error) {
			const message = formatErrorChain(error);
			logger.error('Agent execution failed', { agentId, error: message });
			emit(errorEvent('EXECUTION_FAILED', message));
		} finally {
			capabilities.releasePermit(token);
		}

		return events;
	}

	async function executeAgent(
		name: string,
		input: string,
		executeOptions: ExecuteOptions = {},
	): Promise<AgentEvent[]> {
		const info = options.registry?.get(name);
		if (!info) {
			return [sequencer.emit(name, errorEvent('AGENT_NOT_FOUND', `Agent not found: ${name}`))];
		}
		if (!info.enabled) {
			return [sequencer.emit(name, errorEvent('AGENT_DISABLED', `Agent is disabled: ${name}`))];
		}

		return execute(info.manifest, input, { ...executeOptions, baseDir: info.baseDir });
	}

	function revokeCapability(agentId: string, capability: string): AgentEvent {
		const parsed = parseCapability(capability);
		const name = formatCapability(parsed);
		capabilities.revoke(parsed);
		ledger.logRevoke(agentId, name, options.userId);
		return sequencer.emit(agentId, { type: 'ConsentRevoke', data: { capability: name } });
	}

	return {
		execute,
		executeAgent,
		revokeCapability,
	};
}

export type { AgentRuntime, CreateAgentRuntimeOptions, ExecuteOptions };
