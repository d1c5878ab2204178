/** A `(scope, action)` permission identity, written `scope.action` */
export interface Capability {
	readonly scope: string;
	readonly action: string;
}

/** A time-bounded, revocable authorization of one capability */
export interface CapabilityGrant {
	capability: Capability;
	grantedAt: Date;
	expiresAt?: Date;
	revoked: boolean;
}

/**
 * Short-lived, single-use proof that a set of capabilities was granted when
 * execution was dispatched. Execution backends redeem it per capability when
 * they wire the corresponding resource into the sandbox.
 */
export interface ExecutionPermit {
	token: string;
	agentId: string;
	capabilities: Capability[];
	issuedAt: Date;
	expiresAt: Date;
}
