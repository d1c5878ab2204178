import { z } from 'zod';
import { FormatError } from '../utils/errors.js';
import {
	type AgentEvent,
	type EventKind,
	type EventType,
	type HostErrorCode,
	PROTOCOL_VERSION,
} from './types.js';

const WireEventTypeSchema = z.discriminatedUnion('type', [
	z.object({
		type: z.literal('Input'),
		data: z.object({ prompt: z.string(), context_refs: z.array(z.string()).default([]) }),
	}),
	z.object({
		type: z.literal('Output'),
		data: z.object({
			chunk_id: z.number().int().nonnegative(),
			content_type: z.string().min(1),
			data: z.string().base64(),
			complete: z.boolean(),
		}),
	}),
	z.object({
		type: z.literal('Artifact'),
		data: z.object({
			id: z.string().min(1),
			kind: z.string().min(1),
			path: z.string(),
			preview_hint: z.string().nullish(),
		}),
	}),
	z.object({
		type: z.literal('ConsentRequest'),
		data: z.object({
			capability: z.string().min(1),
			reason: z.string(),
			duration_s: z.number().int().nonnegative().nullish(),
		}),
	}),
	z.object({
		type: z.literal('ConsentGrant'),
		data: z.object({
			capability: z.string().min(1),
			expires_at: z.string().datetime().nullish(),
		}),
	}),
	z.object({
		type: z.literal('ConsentRevoke'),
		data: z.object({ capability: z.string().min(1) }),
	}),
	z.object({
		type: z.literal('Error'),
		data: z.object({ code: z.string().min(1), message: z.string(), hint: z.string().nullish() }),
	}),
	z.object({
		type: z.literal('StateUpdate'),
		data: z.object({
			key: z.string().min(1),
			value: z.unknown(),
			scope: z.enum(['agent', 'session', 'global']),
		}),
	}),
]);

const WireEventSchema = z.object({
	version: z.literal(PROTOCOL_VERSION),
	event_type: WireEventTypeSchema,
	agent_id: z.string().min(1),
	timestamp: z.string().datetime(),
	sequence: z.number().int().nonnegative(),
});

type WireEvent = z.infer<typeof WireEventSchema>;
type WireEventType = z.infer<typeof WireEventTypeSchema>;

function optional<T>(value: T | null | undefined): T | undefined {
	return value ?? undefined;
}

function toWireEventType(eventType: EventType): WireEventType {
	switch (eventType.type) {
		case 'Input':
			return {
				type: 'Input',
				data: { prompt: eventType.data.prompt, context_refs: eventType.data.contextRefs },
			};
		case 'Output':
			return {
				type: 'Output',
				data: {
					chunk_id: eventType.data.chunkId,
					content_type: eventType.data.contentType,
					data: Buffer.from(eventType.data.data).toString('base64'),
					complete: eventType.data.complete,
				},
			};
		case 'Artifact':
			return {
				type: 'Artifact',
				data: {
					id: eventType.data.id,
					kind: eventType.data.kind,
					path: eventType.data.path,
					preview_hint: eventType.data.previewHint ?? null,
				},
			};
		case 'ConsentRequest':
			return {
				type: 'ConsentRequest',
				data: {
					capability: eventType.data.capability,
					reason: eventType.data.reason,
					duration_s: eventType.data.durationS ?? null,
				},
			};
		case 'ConsentGrant':
			return {
				type: 'ConsentGrant',
				data: {
					capability: eventType.data.capability,
					expires_at: eventType.data.expiresAt?.toISOString() ?? null,
				},
			};
		case 'ConsentRevoke':
			return { type: 'ConsentRevoke', data: { capability: eventType.data.capability } };
		case 'Error':
			return {
				type: 'Error',
				data: {
					code: eventType.data.code,
					message: eventType.data.message,
					hint: eventType.data.hint ?? null,
				},
			};
		case 'StateUpdate':
			return { type: 'StateUpdate', data: { ...eventType.data } };
	}
}

function fromWireEventType(wire: WireEventType): EventType {
	switch (wire.type) {
		case 'Input':
			return {
				type: 'Input',
				data: { prompt: wire.data.prompt, contextRefs: wire.data.context_refs },
			};
		case 'Output':
			return {
				type: 'Output',
				data: {
					chunkId: wire.data.chunk_id,
					contentType: wire.data.content_type,
					data: new Uint8Array(Buffer.from(wire.data.data, 'base64')),
					complete: wire.data.complete,
				},
			};
		case 'Artifact':
			return {
				type: 'Artifact',
				data: {
					id: wire.data.id,
					kind: wire.data.kind,
					path: wire.data.path,
					previewHint: optional(wire.data.preview_hint),
				},
			};
		case 'ConsentRequest':
			return {
				type: 'ConsentRequest',
				data: {
					capability: wire.data.capability,
					reason: wire.data.reason,
					durationS: optional(wire.data.duration_s),
				},
			};
		case 'ConsentGrant': {
			const expiresAt = optional(wire.data.expires_at);
			return {
				type: 'ConsentGrant',
				data: {
					capability: wire.data.capability,
					expiresAt: expiresAt === undefined ? undefined : new Date(expiresAt),
				},
			};
		}
		case 'ConsentRevoke':
			return { type: 'ConsentRevoke', data: { capability: wire.data.capability } };
		case 'Error':
			return {
				type: 'Error',
				data: {
					code: wire.data.code,
					message: wire.data.message,
					hint: optional(wire.data.hint),
				},
			};
		case 'StateUpdate':
			return {
				type: 'StateUpdate',
				data: { key: wire.data.key, value: wire.data.value, scope: wire.data.scope },
			};
	}
}

export function toWireEvent(event: AgentEvent): WireEvent {
	return {
		version: event.version,
		event_type: toWireEventType(event.eventType),
		agent_id: event.agentId,
		timestamp: event.timestamp.toISOString(),
		sequence: event.sequence,
	};
}

export function encodeEvent(event: AgentEvent): string {
	return JSON.stringify(toWireEvent(event));
}

/**
 * Parses one serialized event. Throws FormatError on malformed JSON, an
 * unknown event type or a protocol version other than 0.1.
 */
export function decodeEvent(json: string): AgentEvent {
	let raw: unknown;
	try {
		raw = JSON.parse(json);
	} catch (error) {
		throw new FormatError('Event is not valid JSON', { cause: error });
	}

	const parsed = WireEventSchema.safeParse(raw);
	if (!parsed.success) {
		const message = parsed.error.issues
			.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
			.join('; ');
		throw new FormatError(`Invalid event: ${message}`);
	}

	return {
		version: PROTOCOL_VERSION,
		eventType: fromWireEventType(parsed.data.event_type),
		agentId: parsed.data.agent_id,
		timestamp: new Date(parsed.data.timestamp),
		sequence: parsed.data.sequence,
	};
}

export function createEvent(
	eventType: EventType,
	agentId: string,
	sequence: number,
	timestamp = new Date(),
): AgentEvent {
	return { version: PROTOCOL_VERSION, eventType, agentId, timestamp, sequence };
}

export function inputEvent(prompt: string, contextRefs: string[] = []): EventType {
	return { type: 'Input', data: { prompt, contextRefs } };
}

export function textOutputEvent(
	text: string,
	chunkId = 0,
	complete = true,
	contentType = 'text/plain',
): EventType {
	return {
		type: 'Output',
		data: { chunkId, contentType, data: new Uint8Array(Buffer.from(text, 'utf-8')), complete },
	};
}

export function errorEvent(code: HostErrorCode, message: string, hint?: string): EventType {
	return { type: 'Error', data: { code, message, hint } };
}

export function outputText(event: AgentEvent): string | undefined {
	if (event.eventType.type !== 'Output') return undefined;
	return Buffer.from(event.eventType.data.data).toString('utf-8');
}

export function eventsOfType<K extends EventKind>(
	events: AgentEvent[],
	kind: K,
): Array<Extract<EventType, { type: K }>['data']> {
	const result: Array<Extract<EventType, { type: K }>['data']> = [];
	for (const event of events) {
		if (isEventOfKind(event.eventType, kind)) {
			result.push(event.eventType.data);
		}
	}
	return result;
}

function isEventOfKind<K extends EventKind>(
	eventType: EventType,
	kind: K,
): eventType is Extract<EventType, { type: K }> {
	return eventType.type === kind;
}

interface EventSequencer {
	emit(agentId: string, eventType: EventType): AgentEvent;
	peek(agentId: string): number;
}

/**
 * Stamps events with a per-agent sequence number that only ever increases.
 */
export function createEventSequencer(): EventSequencer {
	const next = new Map<string, number>();

	return {
		emit(agentId, eventType) {
			const sequence = next.get(agentId) ?? 0;
			next.set(agentId, sequence + 1);
			return createEvent(eventType, agentId, sequence);
		},
		peek: (agentId) => next.get(agentId) ?? 0,
	};
}

export type { EventSequencer, WireEvent };
