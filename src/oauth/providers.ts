import type { ProviderSettings } from '../config/schema.js';
import { ValidationError } from '../utils/errors.js';
import type { ProviderConfig } from './types.js';

export const DEFAULT_REDIRECT_URI = 'http://127.0.0.1:8765/callback';

export function githubProvider(clientId: string): ProviderConfig {
	return {
		clientId,
		authUrl: 'https://github.com/login/oauth/authorize',
		tokenUrl: 'https://github.com/login/oauth/access_token',
		deviceAuthUrl: 'https://github.com/login/device/code',
		redirectUri: DEFAULT_REDIRECT_URI,
		scopes: ['repo', 'read:user'],
	};
}

export function googleProvider(clientId: string): ProviderConfig {
	return {
		clientId,
		authUrl: 'https://accounts.google.com/o/oauth2/v2/auth',
		tokenUrl: 'https://oauth2.googleapis.com/token',
		deviceAuthUrl: 'https://oauth2.googleapis.com/device/code',
		revocationUrl: 'https://oauth2.googleapis.com/revoke',
		redirectUri: DEFAULT_REDIRECT_URI,
		scopes: ['openid', 'email'],
	};
}

const PRESETS: Record<'github' | 'google', (clientId: string) => ProviderConfig> = {
	github: githubProvider,
	google: googleProvider,
};

/**
 * Builds a provider from the `oauth.providers.<name>` config section.
 * A preset supplies endpoints; explicit fields override it.
 */
export function providerFromSettings(name: string, settings: ProviderSettings): ProviderConfig {
	const presetName = settings.preset ?? (name === 'github' || name === 'google' ? name : undefined);
	const base = presetName ? PRESETS[presetName](settings.clientId) : undefined;

	const authUrl = settings.authUrl ?? base?.authUrl;
	const tokenUrl = settings.tokenUrl ?? base?.tokenUrl;
	if (!authUrl || !tokenUrl) {
		throw new ValidationError(`OAuth provider "${name}" needs auth_url and token_url or a preset`);
	}

	return {
		clientId: settings.clientId,
		clientSecret: settings.clientSecret,
		authUrl,
		tokenUrl,
		deviceAuthUrl: settings.deviceAuthUrl ?? base?.deviceAuthUrl,
		revocationUrl: settings.revocationUrl ?? base?.revocationUrl,
		redirectUri: settings.redirectUri ?? base?.redirectUri ?? DEFAULT_REDIRECT_URI,
		scopes: settings.scopes.length > 0 ? settings.scopes : (base?.scopes ?? []),
	};
}
