import { describe, expect, it } from 'vitest';
import { createLoopbackAuthorizer } from '../loopback.js';

async function visit(url: string): Promise<number> {
	const response = await fetch(url);
	await response.text();
	return response.status;
}

describe('createLoopbackAuthorizer', () => {
	it('resolves with the code and state from the redirect', async () => {
		const opened: string[] = [];
		let visits: Promise<number[]> = Promise.resolve([]);
		const authorizer = createLoopbackAuthorizer({
			open: (url) => {
				opened.push(url);
				visits = (async () => [
					await visit('http://127.0.0.1:47811/favicon.ico'),
					await visit('http://127.0.0.1:47811/callback?code=test-code&state=test-state'),
				])();
				return visits.then(() => undefined);
			},
			timeoutMs: 5000,
		});

		const callback = await authorizer.authorize(
			'https://auth.example.test/authorize?client_id=test-client',
			'http://127.0.0.1:47811/callback',
		);

		expect(callback).toEqual({ code: 'test-code', state: 'test-state' });
		expect(opened).toEqual(['https://auth.example.test/authorize?client_id=test-client']);
		await expect(visits).resolves.toEqual([404, 200]);
	});

	it('rejects when the provider redirects with an error', async () => {
		const authorizer = createLoopbackAuthorizer({
			open: async () => {
				await visit('http://127.0.0.1:47812/callback?error=access_denied');
			},
			timeoutMs: 5000,
		});

		await expect(
			authorizer.authorize('https://auth.example.test/authorize', 'http://127.0.0.1:47812/callback'),
		).rejects.toThrow('Authorization failed: access_denied');
	});

	it('rejects redirect URIs outside the loopback interface', async () => {
		const authorizer = createLoopbackAuthorizer({ open: () => undefined });

		await expect(
			authorizer.authorize('https://auth.example.test/authorize', 'http://example.test/callback'),
		).rejects.toThrow('Redirect URI is not a loopback address: http://example.test/callback');
	});

	it('times out when no redirect arrives', async () => {
		const authorizer = createLoopbackAuthorizer({ open: () => undefined, timeoutMs: 50 });

		await expect(
			authorizer.authorize('https://auth.example.test/authorize', 'http://127.0.0.1:47813/callback'),
		).rejects.toThrow('Timed out waiting for the authorization redirect');
	});
});
