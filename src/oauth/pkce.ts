import { createHash, randomBytes } from 'node:crypto';

export interface PkceChallenge {
	verifier: string;
	challenge: string;
	method: 'S256';
}

/** RFC 7636 verifier (43 chars of base64url) with its S256 challenge */
export function createPkceChallenge(): PkceChallenge {
	const verifier = randomBytes(32).toString('base64url');
	return { verifier, challenge: challengeFor(verifier), method: 'S256' };
}

export function challengeFor(verifier: string): string {
	return createHash('sha256').update(verifier).digest('base64url');
}

export function createState(): string {
	return randomBytes(16).toString('base64url');
}
