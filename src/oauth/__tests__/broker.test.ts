import { describe, expect, it } from 'vitest';
import { createConsentLedger } from '../../consent/ledger.js';
import { NotFoundError } from '../../utils/errors.js';
import { createTokenVault } from '../../vault/vault.js';
import { createOAuthBroker, type OAuthBroker } from '../broker.js';
import { challengeFor } from '../pkce.js';
import type { DevicePrompt, FetchFn, PkceAuthorizer, ProviderConfig, TokenHandle } from '../types.js';

const T0 = Date.parse('2026-01-01T00:00:00.000Z');

const provider: ProviderConfig = {
	clientId: 'test-client',
	clientSecret: 'test-secret',
	authUrl: 'https://auth.example.test/authorize',
	tokenUrl: 'https://auth.example.test/token',
	deviceAuthUrl: 'https://auth.example.test/device',
	revocationUrl: 'https://auth.example.test/revoke',
	redirectUri: 'http://127.0.0.1:8765/callback',
	scopes: ['read'],
};

interface RecordedCall {
	url: string;
	params: URLSearchParams;
}

interface FakeReply {
	status?: number;
	body?: unknown;
}

type Route = (params: URLSearchParams) => FakeReply;

function createFakeFetch(routes: Record<string, Route>): { fetchImpl: FetchFn; calls: RecordedCall[] } {
	const calls: RecordedCall[] = [];
	const fetchImpl: FetchFn = async (input, init) => {
		const url = String(input);
		const params = new URLSearchParams(typeof init?.body === 'string' ? init.body : '');
		calls.push({ url, params });
		const route = routes[url];
		if (!route) {
			return new Response('', { status: 404 });
		}
		const reply = route(params);
		return new Response(reply.body === undefined ? '' : JSON.stringify(reply.body), {
			status: reply.status ?? 200,
			headers: { 'Content-Type': 'application/json' },
		});
	};
	return { fetchImpl, calls };
}

/** Replies in order; the last reply repeats */
function sequence(...replies: FakeReply[]): Route {
	let index = 0;
	return () => {
		const reply = replies[Math.min(index, replies.length - 1)] ?? {};
		index += 1;
		return reply;
	};
}

function createHarness(routes: Record<string, Route>) {
	const { fetchImpl, calls } = createFakeFetch(routes);
	const vault = createTokenVault({ backend: { kind: 'in-memory' } });
	const ledger = createConsentLedger();
	const sleeps: number[] = [];
	const clock = { current: T0 };
	const broker = createOAuthBroker({
		vault,
		ledger,
		providers: { example: provider },
		fetchImpl,
		sleep: async (ms) => {
			sleeps.push(ms);
			clock.current += ms;
		},
		now: () => new Date(clock.current),
	});
	return { broker, vault, ledger, calls, sleeps, clock };
}

const echoStateAuthorizer: PkceAuthorizer = {
	async authorize(authorizationUrl) {
		const url = new URL(authorizationUrl);
		return { code: 'test-code', state: url.searchParams.get('state') ?? '' };
	},
};

function loginWithPkce(broker: OAuthBroker): Promise<TokenHandle> {
	return broker.requestTokenPkce('example', [], echoStateAuthorizer);
}

const deviceBody = {
	device_code: 'test-device-code',
	user_code: 'ABCD-1234',
	verification_uri: 'https://auth.example.test/activate',
	expires_in: 900,
	interval: 5,
};
const deviceReply: FakeReply = { body: deviceBody };

describe('device code flow', () => {
	it('polls through pending and slow_down until a token arrives', async () => {
		const { broker, calls, sleeps } = createHarness({
			'https://auth.example.test/device': () => deviceReply,
			'https://auth.example.test/token': sequence(
				{ body: { error: 'authorization_pending' } },
				{ body: { error: 'slow_down' } },
				{ body: { access_token: 'test-access', token_type: 'bearer', scope: 'read' } },
			),
		});
		const prompts: DevicePrompt[] = [];

		const handle = await broker.requestTokenDeviceCode('example', [], (prompt) => {
			prompts.push(prompt);
		});

		expect(prompts).toEqual([
			{
				userCode: 'ABCD-1234',
				verificationUri: 'https://auth.example.test/activate',
				verificationUriComplete: undefined,
				expiresInS: 900,
			},
		]);
		expect(sleeps).toEqual([5000, 5000, 10_000]);
		expect(handle.provider).toBe('example');
		expect(handle.scopes).toEqual(['read']);
		expect(handle.id).toMatch(/^[0-9a-f-]{36}$/);
		await expect(broker.getToken(handle)).resolves.toBe('test-access');

		const [deviceCall, pollCall] = calls;
		expect(deviceCall?.params.get('client_id')).toBe('test-client');
		expect(deviceCall?.params.get('scope')).toBe('read');
		expect(pollCall?.params.get('grant_type')).toBe('urn:ietf:params:oauth:grant-type:device_code');
		expect(pollCall?.params.get('device_code')).toBe('test-device-code');
	});

	it('exposes the prompt before polling', async () => {
		const { broker } = createHarness({
			'https://auth.example.test/device': () => ({
				body: {
					device_code: 'test-device-code',
					user_code: 'WXYZ-0000',
					verification_url: 'https://auth.example.test/activate',
					expires_in: 600,
				},
			}),
			'https://auth.example.test/token': () => ({ body: { access_token: 'test-access' } }),
		});

		const authorization = await broker.startDeviceAuthorization('example', ['read', 'write']);

		expect(authorization.userCode).toBe('WXYZ-0000');
		expect(authorization.verificationUri).toBe('https://auth.example.test/activate');
		expect(authorization.intervalS).toBe(5);
		const handle = await authorization.complete();
		expect(handle.scopes).toEqual(['read', 'write']);
	});

	it('fails when the user denies', async () => {
		const { broker } = createHarness({
			'https://auth.example.test/device': () => deviceReply,
			'https://auth.example.test/token': () => ({ body: { error: 'access_denied' } }),
		});

		await expect(broker.requestTokenDeviceCode('example', [], () => undefined)).rejects.toThrow(
			'User denied the authorization request',
		);
	});

	it('fails when the device code expires', async () => {
		const { broker, sleeps } = createHarness({
			'https://auth.example.test/device': () => ({
				body: { ...deviceBody, expires_in: 10 },
			}),
			'https://auth.example.test/token': () => ({ body: { error: 'authorization_pending' } }),
		});

		await expect(broker.requestTokenDeviceCode('example', [], () => undefined)).rejects.toThrow(
			'Device code expired before the user authorized',
		);
		expect(sleeps).toEqual([5000, 5000, 5000]);
	});

	it('rejects providers without a device endpoint', async () => {
		const { broker } = createHarness({});
		broker.registerProvider('plain', { ...provider, deviceAuthUrl: undefined });

		await expect(broker.startDeviceAuthorization('plain')).rejects.toThrow(
			'Provider plain does not support the device code flow',
		);
	});

	it('rejects unknown providers', async () => {
		const { broker } = createHarness({});

		await expect(broker.startDeviceAuthorization('nope')).rejects.toThrow(NotFoundError);
		await expect(broker.startDeviceAuthorization('nope')).rejects.toThrow(
			'OAuth provider not found: nope',
		);
	});
});

describe('authorization code flow with PKCE', () => {
	it('sends a challenge and redeems the code with its verifier', async () => {
		const { broker, calls } = createHarness({
			'https://auth.example.test/token': () => ({
				body: { access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 3600 },
			}),
		});
		let authorizationUrl = '';
		const authorizer: PkceAuthorizer = {
			async authorize(url, redirectUri) {
				authorizationUrl = url;
				expect(redirectUri).toBe('http://127.0.0.1:8765/callback');
				return { code: 'test-code', state: new URL(url).searchParams.get('state') ?? '' };
			},
		};

		const handle = await broker.requestTokenPkce('example', ['read', 'write'], authorizer);

		const sent = new URL(authorizationUrl);
		expect(sent.origin + sent.pathname).toBe('https://auth.example.test/authorize');
		expect(sent.searchParams.get('response_type')).toBe('code');
		expect(sent.searchParams.get('client_id')).toBe('test-client');
		expect(sent.searchParams.get('scope')).toBe('read write');
		expect(sent.searchParams.get('code_challenge_method')).toBe('S256');

		expect(calls).toHaveLength(1);
		const exchange = calls[0]?.params;
		expect(exchange?.get('grant_type')).toBe('authorization_code');
		expect(exchange?.get('code')).toBe('test-code');
		expect(exchange?.get('client_secret')).toBe('test-secret');
		expect(challengeFor(exchange?.get('code_verifier') ?? '')).toBe(
			sent.searchParams.get('code_challenge'),
		);
		expect(handle.scopes).toEqual(['read', 'write']);
		await expect(broker.getToken(handle)).resolves.toBe('test-access');
	});

	it('rejects a callback with a different state', async () => {
		const { broker, calls } = createHarness({});
		const forged: PkceAuthorizer = {
			async authorize() {
				return { code: 'test-code', state: 'forged' };
			},
		};

		await expect(broker.requestTokenPkce('example', [], forged)).rejects.toThrow(
			'OAuth state mismatch on authorization callback',
		);
		expect(calls).toEqual([]);
	});

	it('surfaces OAuth error bodies', async () => {
		const { broker } = createHarness({
			'https://auth.example.test/token': () => ({
				status: 400,
				body: { error: 'invalid_grant', error_description: 'Code already used' },
			}),
		});

		await expect(loginWithPkce(broker)).rejects.toThrow('OAuth error invalid_grant: Code already used');
	});
});

describe('refresh and getToken', () => {
	it('keeps the previous refresh token when none is returned', async () => {
		const { broker, vault, calls } = createHarness({
			'https://auth.example.test/token': sequence(
				{ body: { access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 3600 } },
				{ body: { access_token: 'test-access-2', expires_in: 3600 } },
			),
		});
		const handle = await loginWithPkce(broker);

		await expect(broker.refresh(handle)).resolves.toBe(handle);

		const refreshCall = calls[1]?.params;
		expect(refreshCall?.get('grant_type')).toBe('refresh_token');
		expect(refreshCall?.get('refresh_token')).toBe('test-refresh');
		const stored: unknown = JSON.parse(await vault.fetch(handle.id));
		expect(stored).toMatchObject({ accessToken: 'test-access-2', refreshToken: 'test-refresh' });
	});

	it('fails without a refresh token', async () => {
		const { broker } = createHarness({
			'https://auth.example.test/token': () => ({ body: { access_token: 'test-access' } }),
		});
		const handle = await loginWithPkce(broker);

		await expect(broker.refresh(handle)).rejects.toThrow(`No refresh token for handle ${handle.id}`);
	});

	it('refreshes an access token close to expiry', async () => {
		const { broker, calls, clock } = createHarness({
			'https://auth.example.test/token': sequence(
				{ body: { access_token: 'test-access', refresh_token: 'test-refresh', expires_in: 3600 } },
				{ body: { access_token: 'test-access-2', expires_in: 3600 } },
			),
		});
		const handle = await loginWithPkce(broker);

		clock.current = T0 + 60_000;
		await expect(broker.getToken(handle)).resolves.toBe('test-access');
		expect(calls).toHaveLength(1);

		clock.current = T0 + 3_590_000;
		await expect(broker.getToken(handle)).resolves.toBe('test-access-2');
		expect(calls).toHaveLength(2);
	});
});

describe('revoke', () => {
	it('revokes remotely, deletes the token and records the revocation', async () => {
		const { broker, vault, ledger, calls } = createHarness({
			'https://auth.example.test/token': () => ({
				body: { access_token: 'test-access', refresh_token: 'test-refresh' },
			}),
			'https://auth.example.test/revoke': () => ({ body: {} }),
		});
		const handle = await loginWithPkce(broker);

		await broker.revoke(handle);

		const revokeCall = calls[1];
		expect(revokeCall?.url).toBe('https://auth.example.test/revoke');
		expect(revokeCall?.params.get('token')).toBe('test-refresh');
		expect(revokeCall?.params.get('token_type_hint')).toBe('refresh_token');
		await expect(vault.has(handle.id)).resolves.toBe(false);
		expect(ledger.getAll().map((entry) => [entry.agentId, entry.action])).toEqual([
			['host', { type: 'revoke', capability: 'oauth.example' }],
		]);
		await expect(broker.getToken(handle)).rejects.toThrow(NotFoundError);
	});

	it('removes the token locally even when the provider call fails', async () => {
		const { broker, vault, ledger } = createHarness({
			'https://auth.example.test/token': () => ({ body: { access_token: 'test-access' } }),
			'https://auth.example.test/revoke': () => ({ status: 503 }),
		});
		const handle = await loginWithPkce(broker);

		await expect(broker.revoke(handle, 'cli')).rejects.toThrow(
			'HTTP 503 from https://auth.example.test/revoke',
		);

		await expect(vault.has(handle.id)).resolves.toBe(false);
		expect(ledger.getForAgent('cli')).toHaveLength(1);
	});

	it('fails for an unknown handle without calling the provider or the ledger', async () => {
		const { broker, ledger, calls } = createHarness({
			'https://auth.example.test/revoke': () => ({ body: {} }),
		});

		const error = await broker
			.revoke({ id: 'no-such-handle', provider: 'example', scopes: [] })
			.catch((caught: unknown) => caught);

		expect(error).toBeInstanceOf(NotFoundError);
		expect(error).toHaveProperty('message', 'Token not found: no-such-handle');

		expect(calls).toEqual([]);
		expect(ledger.getAll()).toEqual([]);
	});

	it('fails the second time a handle is revoked', async () => {
		const { broker, ledger } = createHarness({
			'https://auth.example.test/token': () => ({ body: { access_token: 'test-access' } }),
			'https://auth.example.test/revoke': () => ({ body: {} }),
		});
		const handle = await loginWithPkce(broker);

		await broker.revoke(handle);
		await expect(broker.revoke(handle)).rejects.toThrow(NotFoundError);

		expect(ledger.getAll()).toHaveLength(1);
	});

	it('removes an entry that does not hold a token without calling the provider', async () => {
		const { broker, vault, ledger, calls } = createHarness({
			'https://auth.example.test/revoke': () => ({ body: {} }),
		});
		await vault.store('broken-handle', 'not json');

		await broker.revoke({ id: 'broken-handle', provider: 'example', scopes: [] });

		expect(calls).toEqual([]);
		await expect(vault.has('broken-handle')).resolves.toBe(false);
		expect(ledger.getAll().map((entry) => entry.action)).toEqual([
			{ type: 'revoke', capability: 'oauth.example' },
		]);
	});
});

describe('providers', () => {
	it('lists registered providers in order', () => {
		const { broker } = createHarness({});
		broker.registerProvider('github', { ...provider });

		expect(broker.listProviders()).toEqual(['example', 'github']);
		expect(broker.getProvider('github')?.clientId).toBe('test-client');
		expect(broker.getProvider('missing')).toBeUndefined();
	});
});
