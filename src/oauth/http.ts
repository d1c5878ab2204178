import { z } from 'zod';
import { NetworkError, errorMessage } from '../utils/errors.js';
import type { FetchFn, StoredToken } from './types.js';

const OAuthErrorSchema = z.object({
	error: z.string(),
	error_description: z.string().optional(),
});

const TokenResponseSchema = z.object({
	access_token: z.string().min(1),
	token_type: z.string().default('bearer'),
	expires_in: z.coerce.number().int().positive().optional(),
	refresh_token: z.string().min(1).optional(),
	scope: z.string().optional(),
});

const DeviceCodeResponseSchema = z
	.object({
		device_code: z.string().min(1),
		user_code: z.string().min(1),
		verification_uri: z.string().optional(),
		// Google names it verification_url
		verification_url: z.string().optional(),
		verification_uri_complete: z.string().optional(),
		expires_in: z.coerce.number().int().positive(),
		interval: z.coerce.number().int().positive().default(5),
	})
	.refine((body) => body.verification_uri !== undefined || body.verification_url !== undefined, {
		message: 'verification_uri is required',
	});

export interface DeviceCodeResponse {
	deviceCode: string;
	userCode: string;
	verificationUri: string;
	verificationUriComplete?: string;
	expiresInS: number;
	intervalS: number;
}

/** A structured `error` body returned by the authorization server */
export class OAuthServerError extends NetworkError {
	readonly error: string;

	constructor(error: string, description: string | undefined, status: number) {
		super(description ? `OAuth error ${error}: ${description}` : `OAuth error ${error}`, { status });
		this.error = error;
	}
}

/**
 * POSTs an `application/x-www-form-urlencoded` body and returns the parsed JSON.
 * Some servers (GitHub) answer errors with 200, so the `error` field is
 * checked regardless of status.
 */
export async function postForm(
	fetchImpl: FetchFn,
	url: string,
	params: Record<string, string | undefined>,
): Promise<unknown> {
	const body = new URLSearchParams();
	for (const [key, value] of Object.entries(params)) {
		if (value !== undefined) body.set(key, value);
	}

	let response: Response;
	try {
		response = await fetchImpl(url, {
			method: 'POST',
			headers: {
				Accept: 'application/json',
				'Content-Type': 'application/x-www-form-urlencoded',
			},
			body: body.toString(),
		});
	} catch (error) {
		throw new NetworkError(`Request to ${url} failed: ${errorMessage(error)}`, { cause: error });
	}

	const text = await response.text();
	let json: unknown = undefined;
	if (text.length > 0) {
		try {
			json = JSON.parse(text);
		} catch (error) {
			if (response.ok) {
				throw new NetworkError(`Unexpected non-JSON response from ${url}`, {
					status: response.status,
					cause: error,
				});
			}
		}
	}

	const oauthError = OAuthErrorSchema.safeParse(json);
	if (oauthError.success) {
		throw new OAuthServerError(
			oauthError.data.error,
			oauthError.data.error_description,
			response.status,
		);
	}
	if (!response.ok) {
		throw new NetworkError(`HTTP ${response.status} from ${url}`, { status: response.status });
	}
	return json;
}

export function parseTokenResponse(body: unknown, now: Date): StoredToken {
	const parsed = TokenResponseSchema.safeParse(body);
	if (!parsed.success) {
		throw new NetworkError('Malformed token response', { cause: parsed.error });
	}
	const { data } = parsed;
	return {
		accessToken: data.access_token,
		refreshToken: data.refresh_token,
		tokenType: data.token_type,
		expiresAt:
			data.expires_in === undefined
				? undefined
				: new Date(now.getTime() + data.expires_in * 1000).toISOString(),
		scope: data.scope,
	};
}

export function parseDeviceCodeResponse(body: unknown): DeviceCodeResponse {
	const parsed = DeviceCodeResponseSchema.safeParse(body);
	if (!parsed.success) {
		throw new NetworkError('Malformed device authorization response', { cause: parsed.error });
	}
	const { data } = parsed;
	return {
		deviceCode: data.device_code,
		userCode: data.user_code,
		verificationUri: data.verification_uri ?? data.verification_url ?? '',
		verificationUriComplete: data.verification_uri_complete,
		expiresInS: data.expires_in,
		intervalS: data.interval,
	};
}
