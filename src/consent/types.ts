export type ConsentAction =
	| { type: 'grant'; capability: string; durationS?: number }
	| { type: 'revoke'; capability: string }
	| { type: 'deny'; capability: string; reason: string };

/** One immutable line of the consent audit trail */
export interface ConsentEntry {
	/** Append position, starting at 1 */
	readonly seq: number;
	readonly timestamp: Date;
	readonly agentId: string;
	readonly action: Readonly<ConsentAction>;
	readonly userId?: string;
}

export interface ConsentFilters {
	agentId?: string;
	actionType?: ConsentAction['type'];
	capability?: string;
	since?: Date;
	until?: Date;
}
