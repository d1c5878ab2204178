export {
	createEvent,
	createEventSequencer,
	decodeEvent,
	encodeEvent,
	errorEvent,
	type EventSequencer,
	eventsOfType,
	inputEvent,
	outputText,
	textOutputEvent,
	toWireEvent,
	type WireEvent,
} from './events.js';
export {
	type AgentEvent,
	type ArtifactEvent,
	type ConsentGrantEvent,
	type ConsentRequestEvent,
	type ConsentRevokeEvent,
	type ErrorEvent,
	type EventKind,
	type EventType,
	type HostErrorCode,
	type InputEvent,
	type OutputEvent,
	PROTOCOL_VERSION,
	type StateScope,
	type StateUpdateEvent,
} from './types.js';
