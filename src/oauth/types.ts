export interface ProviderConfig {
	clientId: string;
	/** Confidential clients only; public clients rely on PKCE */
	clientSecret?: string;
	authUrl: string;
	tokenUrl: string;
	deviceAuthUrl?: string;
	/** RFC 7009 revocation endpoint */
	revocationUrl?: string;
	/** Loopback redirect used by the PKCE flow */
	redirectUri?: string;
	/** Requested when a flow is started without explicit scopes */
	scopes: string[];
}

/** Opaque reference to a vault-resident token. Never carries the secret. */
export interface TokenHandle {
	readonly id: string;
	readonly provider: string;
	readonly scopes: readonly string[];
}

/** Vault payload behind a handle */
export interface StoredToken {
	accessToken: string;
	refreshToken?: string;
	tokenType: string;
	/** ISO-8601 */
	expiresAt?: string;
	scope?: string;
}

export interface DevicePrompt {
	userCode: string;
	verificationUri: string;
	verificationUriComplete?: string;
	expiresInS: number;
}

/** Presents the user code and URL out of band (TUI card, notification, stdout) */
export type DevicePromptHandler = (prompt: DevicePrompt) => void | Promise<void>;

export interface DeviceAuthorization extends DevicePrompt {
	provider: string;
	intervalS: number;
	/** Polls the token endpoint until the user approves, denies or the code expires */
	complete(): Promise<TokenHandle>;
}

export interface AuthorizationCallback {
	code: string;
	state: string;
}

/**
 * Sends the user to the authorization URL and resolves with the parameters
 * of the redirect back to `redirectUri`.
 */
export interface PkceAuthorizer {
	authorize(authorizationUrl: string, redirectUri: string): Promise<AuthorizationCallback>;
}

export type FetchFn = typeof fetch;
