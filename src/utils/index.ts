export {
	AgentGateError,
	BackendError,
	CapabilityDeniedError,
	type ErrorCode,
	errorMessage,
	FormatError,
	formatErrorChain,
	LockedError,
	NetworkError,
	NotFoundError,
	ValidationError,
} from './errors.js';
export { createLogger, initLogger, type Logger, resetLogger } from './logger.js';
export { createRwLock, type RwLock } from './rw-lock.js';
export { isSecretKeyName, redactSecrets, redactSecretsInValue } from './secret-redaction.js';
