export { type CreateOAuthBrokerOptions, createOAuthBroker, type OAuthBroker } from './broker.js';
export { OAuthServerError } from './http.js';
export { createLoopbackAuthorizer, type LoopbackAuthorizerOptions } from './loopback.js';
export { challengeFor, createPkceChallenge, createState, type PkceChallenge } from './pkce.js';
export {
	DEFAULT_REDIRECT_URI,
	githubProvider,
	googleProvider,
	providerFromSettings,
} from './providers.js';
export type {
	AuthorizationCallback,
	DeviceAuthorization,
	DevicePrompt,
	DevicePromptHandler,
	FetchFn,
	PkceAuthorizer,
	ProviderConfig,
	StoredToken,
	TokenHandle,
} from './types.js';
