import { FormatError } from '../utils/errors.js';
import type { Capability, CapabilityGrant } from './types.js';

export function createCapability(scope: string, action: string): Capability {
	return Object.freeze({ scope, action });
}

/**
 * Parses `"scope.action"`. Exactly one separator and two non-empty parts.
 */
export function parseCapability(value: string): Capability {
	const parts = value.split('.');
	const [scope, action] = parts;
	if (parts.length !== 2 || !scope || !action) {
		throw new FormatError(`Invalid capability format: ${value}`, {
			hint: 'Capabilities are written as "<scope>.<action>", e.g. "files.read"',
		});
	}
	return createCapability(scope, action);
}

export function formatCapability(capability: Capability): string {
	return `${capability.scope}.${capability.action}`;
}

export function capabilitiesEqual(a: Capability, b: Capability): boolean {
	return a.scope === b.scope && a.action === b.action;
}

export function isGrantValid(grant: CapabilityGrant, now = new Date()): boolean {
	if (grant.revoked) return false;
	if (grant.expiresAt && now.getTime() > grant.expiresAt.getTime()) return false;
	return true;
}
