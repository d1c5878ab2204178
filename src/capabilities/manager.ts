import { v4 as uuidv4 } from 'uuid';
import { CapabilityDeniedError, NotFoundError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { capabilitiesEqual, formatCapability, isGrantValid } from './capability.js';
import type { Capability, CapabilityGrant, ExecutionPermit } from './types.js';

const logger = createLogger('capabilities');

export const DEFAULT_PERMIT_TTL_MS = 30_000;

interface CreateCapabilityManagerOptions {
	now?: () => Date;
}

interface CapabilityManager {
	grant(capability: Capability, durationMs?: number): CapabilityGrant;
	check(capability: Capability): boolean;
	revoke(capability: Capability): number;
	activeGrants(): CapabilityGrant[];
	cleanupExpired(): number;
	issuePermit(agentId: string, capabilities: Capability[], ttlMs?: number): ExecutionPermit;
	redeemPermit(token: string, capability: Capability): boolean;
	releasePermit(token: string): void;
}

interface PermitState {
	permit: ExecutionPermit;
	redeemed: Set<string>;
}

function copyGrant(grant: CapabilityGrant): CapabilityGrant {
	return {
		capability: grant.capability,
		grantedAt: new Date(grant.grantedAt),
		expiresAt: grant.expiresAt ? new Date(grant.expiresAt) : undefined,
		revoked: grant.revoked,
	};
}

/**
 * Creates the default-deny grant store. A capability is allowed only while at
 * least one matching grant is neither revoked nor past its expiry.
 */
export function createCapabilityManager(
	options: CreateCapabilityManagerOptions = {},
): CapabilityManager {
	const now = options.now ?? (() => new Date());
	const grants: CapabilityGrant[] = [];
	const permits = new Map<string, PermitState>();

	function grant(capability: Capability, durationMs?: number): CapabilityGrant {
		const grantedAt = now();
		const entry: CapabilityGrant = {
			capability,
			grantedAt,
			expiresAt:
				durationMs === undefined ? undefined : new Date(grantedAt.getTime() + durationMs),
			revoked: false,
		};
		grants.push(entry);
		logger.info('Granted capability', {
			capability: formatCapability(capability),
			expiresAt: entry.expiresAt?.toISOString(),
		});
		return copyGrant(entry);
	}

	function check(capability: Capability): boolean {
		const at = now();
		return grants.some(
			(entry) => capabilitiesEqual(entry.capability, capability) && isGrantValid(entry, at),
		);
	}

	/**
	 * Revokes every live grant of the capability and returns how many were
	 * revoked. Throws NotFoundError when there was nothing to revoke.
	 */
	function revoke(capability: Capability): number {
		let revoked = 0;
		for (const entry of grants) {
			if (capabilitiesEqual(entry.capability, capability) && !entry.revoked) {
				entry.revoked = true;
				revoked += 1;
			}
		}

		if (revoked === 0) {
			throw new NotFoundError(
				`Capability not found or already revoked: ${formatCapability(capability)}`,
			);
		}

		logger.info('Revoked capability', { capability: formatCapability(capability), revoked });
		return revoked;
	}

	function activeGrants(): CapabilityGrant[] {
		const at = now();
		return grants.filter((entry) => isGrantValid(entry, at)).map(copyGrant);
	}

	// History of lapsed grants belongs to the consent ledger, not the live set.
	function cleanupExpired(): number {
		const at = now();
		const before = grants.length;
		const kept = grants.filter((entry) => isGrantValid(entry, at));
		grants.splice(0, grants.length, ...kept);

		for (const [token, state] of permits) {
			if (state.permit.expiresAt.getTime() < at.getTime()) permits.delete(token);
		}

		const removed = before - kept.length;
		if (removed > 0) {
			logger.debug('Removed lapsed grants', { removed });
		}
		return removed;
	}

	function issuePermit(
		agentId: string,
		capabilities: Capability[],
		ttlMs = DEFAULT_PERMIT_TTL_MS,
	): ExecutionPermit {
		const missing = capabilities.filter((capability) => !check(capability));
		if (missing.length > 0) {
			throw new CapabilityDeniedError(
				`Capabilities not granted: ${missing.map(formatCapability).join(', ')}`,
			);
		}

		const issuedAt = now();
		const permit: ExecutionPermit = {
			token: uuidv4(),
			agentId,
			capabilities: [...capabilities],
			issuedAt,
			expiresAt: new Date(issuedAt.getTime() + ttlMs),
		};
		permits.set(permit.token, { permit, redeemed: new Set() });
		logger.debug('Issued execution permit', {
			agentId,
			capabilities: capabilities.map(formatCapability),
		});
		return {
			...permit,
			capabilities: [...permit.capabilities],
			issuedAt: new Date(permit.issuedAt),
			expiresAt: new Date(permit.expiresAt),
		};
	}

	/**
	 * Consumes the permit's claim on one capability. Succeeds once per
	 * capability, only before the permit expires and only while the
	 * underlying grant is still valid.
	 */
	function redeemPermit(token: string, capability: Capability): boolean {
		const state = permits.get(token);
		if (!state) return false;

		const key = formatCapability(capability);
		const at = now();
		if (at.getTime() > state.permit.expiresAt.getTime()) {
			permits.delete(token);
			logger.warn('Execution permit expired', { agentId: state.permit.agentId, capability: key });
			return false;
		}
		if (!state.permit.capabilities.some((listed) => capabilitiesEqual(listed, capability))) {
			return false;
		}
		if (state.redeemed.has(key)) return false;
		if (!check(capability)) {
			logger.warn('Grant lapsed before permit redemption', {
				agentId: state.permit.agentId,
				capability: key,
			});
			return false;
		}

		state.redeemed.add(key);
		return true;
	}

	function releasePermit(token: string): void {
		permits.delete(token);
	}

	return {
		grant,
		check,
		revoke,
		activeGrants,
		cleanupExpired,
		issuePermit,
		redeemPermit,
		releasePermit,
	};
}

export type { CapabilityManager, CreateCapabilityManagerOptions };
