import { setTimeout as delay } from 'node:timers/promises';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { ConsentLedger } from '../consent/ledger.js';
import { AgentGateError, NetworkError, NotFoundError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { TokenVault } from '../vault/vault.js';
import {
	type DeviceCodeResponse,
	OAuthServerError,
	parseDeviceCodeResponse,
	parseTokenResponse,
	postForm,
} from './http.js';
import { createPkceChallenge, createState } from './pkce.js';
import type {
	DeviceAuthorization,
	DevicePromptHandler,
	FetchFn,
	PkceAuthorizer,
	ProviderConfig,
	StoredToken,
	TokenHandle,
} from './types.js';

const logger = createLogger('oauth:broker');

const DEVICE_CODE_GRANT = 'urn:ietf:params:oauth:grant-type:device_code';
const SLOW_DOWN_STEP_S = 5;
/** Refresh this long before the recorded expiry */
const EXPIRY_SKEW_MS = 30_000;

const StoredTokenSchema = z.object({
	accessToken: z.string(),
	refreshToken: z.string().optional(),
	tokenType: z.string(),
	expiresAt: z.string().optional(),
	scope: z.string().optional(),
});

interface CreateOAuthBrokerOptions {
	vault: TokenVault;
	ledger: ConsentLedger;
	providers?: Record<string, ProviderConfig>;
	fetchImpl?: FetchFn;
	sleep?: (ms: number) => Promise<void>;
	now?: () => Date;
}

interface OAuthBroker {
	registerProvider(name: string, config: ProviderConfig): void;
	getProvider(name: string): ProviderConfig | undefined;
	listProviders(): string[];
	startDeviceAuthorization(provider: string, scopes?: string[]): Promise<DeviceAuthorization>;
	requestTokenDeviceCode(
		provider: string,
		scopes: string[],
		prompt: DevicePromptHandler,
	): Promise<TokenHandle>;
	requestTokenPkce(
		provider: string,
		scopes: string[],
		authorizer: PkceAuthorizer,
	): Promise<TokenHandle>;
	refresh(handle: TokenHandle): Promise<TokenHandle>;
	revoke(handle: TokenHandle, actor?: string): Promise<void>;
	/** Host-side only. Refreshes first when the access token has expired. */
	getToken(handle: TokenHandle): Promise<string>;
}

/**
 * Acquires OAuth tokens into the vault and hands out opaque handles.
 * The secret never leaves the broker except through `getToken`.
 */
export function createOAuthBroker(options: CreateOAuthBrokerOptions): OAuthBroker {
	const { vault, ledger } = options;
	const fetchImpl = options.fetchImpl ?? fetch;
	const sleep = options.sleep ?? ((ms: number) => delay(ms));
	const now = options.now ?? (() => new Date());
	const providers = new Map<string, ProviderConfig>(Object.entries(options.providers ?? {}));

	function requireProvider(name: string): ProviderConfig {
		const provider = providers.get(name);
		if (!provider) {
			throw new NotFoundError(`OAuth provider not found: ${name}`, {
				hint: `Configure oauth.providers.${name} in config.yaml`,
			});
		}
		return provider;
	}

	function scopesFor(provider: ProviderConfig, scopes: string[] | undefined): string[] {
		return scopes && scopes.length > 0 ? [...scopes] : [...provider.scopes];
	}

	async function saveToken(
		providerName: string,
		scopes: string[],
		token: StoredToken,
	): Promise<TokenHandle> {
		const handle: TokenHandle = Object.freeze({
			id: uuidv4(),
			provider: providerName,
			scopes: Object.freeze([...scopes]),
		});
		await vault.store(handle.id, JSON.stringify(token));
		logger.info('OAuth token stored', { provider: providerName, handleId: handle.id, scopes });
		return handle;
	}

	async function loadToken(handle: TokenHandle): Promise<StoredToken> {
		const raw = await vault.fetch(handle.id);
		let json: unknown;
		try {
			json = JSON.parse(raw);
		} catch (error) {
			throw new NotFoundError(`Vault entry for handle ${handle.id} is not a token`, { cause: error });
		}
		const parsed = StoredTokenSchema.safeParse(json);
		if (!parsed.success) {
			throw new NotFoundError(`Vault entry for handle ${handle.id} is not a token`, {
				cause: parsed.error,
			});
		}
		return parsed.data;
	}

	async function pollForToken(
		providerName: string,
		provider: ProviderConfig,
		device: DeviceCodeResponse,
		scopes: string[],
	): Promise<TokenHandle> {
		const deadline = now().getTime() + device.expiresInS * 1000;
		let intervalS = device.intervalS;

		while (true) {
			await sleep(intervalS * 1000);
			if (now().getTime() > deadline) {
				throw new NetworkError('Device code expired before the user authorized', {
					hint: 'Start the login again',
				});
			}

			let body: unknown;
			try {
				body = await postForm(fetchImpl, provider.tokenUrl, {
					grant_type: DEVICE_CODE_GRANT,
					device_code: device.deviceCode,
					client_id: provider.clientId,
					client_secret: provider.clientSecret,
				});
			} catch (error) {
				if (!(error instanceof OAuthServerError)) throw error;
				switch (error.error) {
					case 'authorization_pending':
						continue;
					case 'slow_down':
						intervalS += SLOW_DOWN_STEP_S;
						logger.debug('Token endpoint asked to slow down', { provider: providerName, intervalS });
						continue;
					case 'access_denied':
						throw new NetworkError('User denied the authorization request', {
							cause: error,
							status: error.status,
						});
					case 'expired_token':
						throw new NetworkError('Device code expired before the user authorized', {
							cause: error,
							status: error.status,
							hint: 'Start the login again',
						});
					default:
						throw error;
				}
			}

			return saveToken(providerName, scopes, parseTokenResponse(body, now()));
		}
	}

	async function startDeviceAuthorization(
		providerName: string,
		scopes?: string[],
	): Promise<DeviceAuthorization> {
		const provider = requireProvider(providerName);
		if (!provider.deviceAuthUrl) {
			throw new NetworkError(`Provider ${providerName} does not support the device code flow`, {
				hint: 'Configure device_auth_url or use the PKCE flow',
			});
		}
		const requested = scopesFor(provider, scopes);
		const device = parseDeviceCodeResponse(
			await postForm(fetchImpl, provider.deviceAuthUrl, {
				client_id: provider.clientId,
				scope: requested.join(' '),
			}),
		);
		logger.info('Device authorization started', {
			provider: providerName,
			expiresInS: device.expiresInS,
		});

		return {
			provider: providerName,
			userCode: device.userCode,
			verificationUri: device.verificationUri,
			verificationUriComplete: device.verificationUriComplete,
			expiresInS: device.expiresInS,
			intervalS: device.intervalS,
			complete: () => pollForToken(providerName, provider, device, requested),
		};
	}

	async function requestTokenDeviceCode(
		providerName: string,
		scopes: string[],
		prompt: DevicePromptHandler,
	): Promise<TokenHandle> {
		const authorization = await startDeviceAuthorization(providerName, scopes);
		await prompt({
			userCode: authorization.userCode,
			verificationUri: authorization.verificationUri,
			verificationUriComplete: authorization.verificationUriComplete,
			expiresInS: authorization.expiresInS,
		});
		return authorization.complete();
	}

	async function requestTokenPkce(
		providerName: string,
		scopes: string[],
		authorizer: PkceAuthorizer,
	): Promise<TokenHandle> {
		const provider = requireProvider(providerName);
		if (!provider.redirectUri) {
			throw new NetworkError(`Provider ${providerName} has no redirect URI for the PKCE flow`);
		}
		const requested = scopesFor(provider, scopes);
		const pkce = createPkceChallenge();
		const state = createState();

		const url = new URL(provider.authUrl);
		url.searchParams.set('response_type', 'code');
		url.searchParams.set('client_id', provider.clientId);
		url.searchParams.set('redirect_uri', provider.redirectUri);
		url.searchParams.set('scope', requested.join(' '));
		url.searchParams.set('state', state);
		url.searchParams.set('code_challenge', pkce.challenge);
		url.searchParams.set('code_challenge_method', pkce.method);

		const callback = await authorizer.authorize(url.toString(), provider.redirectUri);
		if (callback.state !== state) {
			throw new NetworkError('OAuth state mismatch on authorization callback', {
				hint: 'Retry the login; the callback did not come from this request',
			});
		}

		const body = await postForm(fetchImpl, provider.tokenUrl, {
			grant_type: 'authorization_code',
			code: callback.code,
			redirect_uri: provider.redirectUri,
			client_id: provider.clientId,
			client_secret: provider.clientSecret,
			code_verifier: pkce.verifier,
		});
		return saveToken(providerName, requested, parseTokenResponse(body, now()));
	}

	async function refresh(handle: TokenHandle): Promise<TokenHandle> {
		const provider = requireProvider(handle.provider);
		const current = await loadToken(handle);
		if (!current.refreshToken) {
			throw new NotFoundError(`No refresh token for handle ${handle.id}`, {
				hint: 'Log in again to obtain a new token',
			});
		}

		const body = await postForm(fetchImpl, provider.tokenUrl, {
			grant_type: 'refresh_token',
			refresh_token: current.refreshToken,
			client_id: provider.clientId,
			client_secret: provider.clientSecret,
		});
		const next = parseTokenResponse(body, now());
		await vault.store(
			handle.id,
			JSON.stringify({ ...next, refreshToken: next.refreshToken ?? current.refreshToken }),
		);
		logger.info('OAuth token refreshed', { provider: handle.provider, handleId: handle.id });
		return handle;
	}

	async function revoke(handle: TokenHandle, actor = 'host'): Promise<void> {
		const provider = providers.get(handle.provider);
		let remoteError: AgentGateError | undefined;

		if (!(await vault.has(handle.id))) {
			throw new NotFoundError(`Token not found: ${handle.id}`, {
				hint: 'Run "agentgate auth login" to obtain a token first',
			});
		}

		let token: StoredToken | undefined;
		try {
			token = await loadToken(handle);
		} catch (error) {
			if (!(error instanceof NotFoundError)) throw error;
			logger.warn('Vault entry is not a token; removing it without provider revocation', {
				provider: handle.provider,
				handleId: handle.id,
			});
		}

		if (provider?.revocationUrl && token) {
			try {
				await postForm(fetchImpl, provider.revocationUrl, {
					token: token.refreshToken ?? token.accessToken,
					token_type_hint: token.refreshToken ? 'refresh_token' : 'access_token',
					client_id: provider.clientId,
					client_secret: provider.clientSecret,
				});
			} catch (error) {
				remoteError =
					error instanceof AgentGateError
						? error
						: new NetworkError(`Token revocation failed: ${errorMessage(error)}`, { cause: error });
				logger.warn('Provider revocation failed; removing token locally', {
					provider: handle.provider,
					handleId: handle.id,
					error: remoteError.message,
				});
			}
		}

		await vault.delete(handle.id);
		ledger.logRevoke(actor, `oauth.${handle.provider}`);
		logger.info('OAuth token revoked', { provider: handle.provider, handleId: handle.id });
		if (remoteError) throw remoteError;
	}

	async function getToken(handle: TokenHandle): Promise<string> {
		const token = await loadToken(handle);
		const expired =
			token.expiresAt !== undefined &&
			Date.parse(token.expiresAt) - EXPIRY_SKEW_MS <= now().getTime();
		if (expired && token.refreshToken && providers.has(handle.provider)) {
			await refresh(handle);
			return (await loadToken(handle)).accessToken;
		}
		return token.accessToken;
	}

	return {
		registerProvider(name, config) {
			providers.set(name, config);
			logger.debug('OAuth provider registered', { provider: name });
		},
		getProvider: (name) => providers.get(name),
		listProviders: () => [...providers.keys()].sort(),
		startDeviceAuthorization,
		requestTokenDeviceCode,
		requestTokenPkce,
		refresh,
		revoke,
		getToken,
	};
}

export type { CreateOAuthBrokerOptions, OAuthBroker };
