import { createServer } from 'node:http';
import { NetworkError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { AuthorizationCallback, PkceAuthorizer } from './types.js';

const logger = createLogger('oauth:loopback');

const DEFAULT_TIMEOUT_MS = 5 * 60 * 1000;
const LOOPBACK_HOSTS = new Set(['127.0.0.1', 'localhost', '[::1]']);

interface LoopbackAuthorizerOptions {
	/** Opens the authorization URL for the user (browser, printed link, ...) */
	open: (authorizationUrl: string) => void | Promise<void>;
	timeoutMs?: number;
}

const DONE_PAGE =
	'<!doctype html><title>Signed in</title><p>Authorization complete. You can close this window.</p>';
const FAILED_PAGE =
	'<!doctype html><title>Sign-in failed</title><p>Authorization failed. Return to the terminal.</p>';

/**
 * Receives the authorization redirect on a one-shot HTTP server bound to the
 * loopback interface (RFC 8252 §7.3). The server closes after the first
 * request to the redirect path or when the timeout elapses.
 */
export function createLoopbackAuthorizer(options: LoopbackAuthorizerOptions): PkceAuthorizer {
	const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

	return {
		authorize(authorizationUrl, redirectUri) {
			const redirect = new URL(redirectUri);
			if (redirect.protocol !== 'http:' || !LOOPBACK_HOSTS.has(redirect.hostname)) {
				return Promise.reject(
					new NetworkError(`Redirect URI is not a loopback address: ${redirectUri}`, {
						hint: 'Use http://127.0.0.1:<port>/callback as redirect_uri',
					}),
				);
			}

			return new Promise<AuthorizationCallback>((resolve, reject) => {
				let settled = false;

				const server = createServer((req, res) => {
					const url = new URL(req.url ?? '/', redirect.origin);
					if (url.pathname !== redirect.pathname) {
						res.writeHead(404).end();
						return;
					}

					const error = url.searchParams.get('error');
					const code = url.searchParams.get('code');
					const state = url.searchParams.get('state');
					const ok = !error && code !== null && state !== null;
					res.writeHead(ok ? 200 : 400, { 'Content-Type': 'text/html; charset=utf-8' });
					res.end(ok ? DONE_PAGE : FAILED_PAGE);

					if (ok) {
						finish(undefined, { code, state });
					} else {
						finish(
							new NetworkError(
								error
									? `Authorization failed: ${error}`
									: 'Authorization callback is missing code or state',
							),
						);
					}
				});

				const timer = setTimeout(() => {
					finish(
						new NetworkError('Timed out waiting for the authorization redirect', {
							hint: 'Complete the sign-in in the browser and retry',
						}),
					);
				}, timeoutMs);

				function finish(error: Error | undefined, callback?: AuthorizationCallback): void {
					if (settled) return;
					settled = true;
					clearTimeout(timer);
					server.close();
					if (callback) resolve(callback);
					else reject(error);
				}

				server.on('error', (error) => {
					finish(
						new NetworkError(`Loopback receiver failed: ${errorMessage(error)}`, { cause: error }),
					);
				});

				const port = redirect.port === '' ? 80 : Number(redirect.port);
				const host = redirect.hostname === '[::1]' ? '::1' : redirect.hostname;
				server.listen(port, host, () => {
					logger.info('Waiting for authorization redirect', { redirectUri });
					Promise.resolve()
						.then(() => options.open(authorizationUrl))
						.catch((error: unknown) => {
							finish(
								new NetworkError(`Could not open the authorization URL: ${errorMessage(error)}`, {
									cause: error,
								}),
							);
						});
				});
			});
		},
	};
}

export type { LoopbackAuthorizerOptions };
