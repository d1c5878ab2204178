import type { Command } from 'commander';
import type { OAuthBroker } from '../oauth/broker.js';
import type { DevicePrompt, ProviderConfig } from '../oauth/types.js';
import {
	type CliColors,
	type CliOutput,
	createCliOutput,
	dim,
	getColors,
	ok,
	title,
	writeFailure,
} from './output.js';

export interface AuthCliServices {
	broker: OAuthBroker;
	close(): void;
}

export interface AuthCliHandlers {
	login(provider: string, scopes: string[]): Promise<string>;
	revoke(provider: string, handleId: string): Promise<string>;
}

interface RegisterAuthCommandOptions {
	/** Provider settings alone; listing them must not open the vault */
	resolveProviders(configPath?: string): Promise<Record<string, ProviderConfig>>;
	resolveServices(configPath?: string): Promise<AuthCliServices>;
	output?: CliOutput;
}

function renderPrompt(prompt: DevicePrompt, colors: CliColors): string {
	const lines = [
		title('Sign in to continue', colors),
		`Open ${prompt.verificationUriComplete ?? prompt.verificationUri}`,
		`and enter the code ${ok(prompt.userCode, colors)}`,
		dim(`The code expires in ${Math.round(prompt.expiresInS / 60)} minutes.`, colors),
	];
	return `${lines.join('\n')}\n`;
}

export function renderProviders(
	providers: Record<string, ProviderConfig>,
	colors: CliColors = getColors(),
): string {
	const entries = Object.entries(providers);
	if (entries.length === 0) {
		return `${dim('No OAuth providers configured.', colors)}\n`;
	}
	const lines = entries.map(([name, provider]) => {
		const flows: string[] = [];
		if (provider.deviceAuthUrl) flows.push('device');
		if (provider.redirectUri) flows.push('pkce');
		return `${name} | ${flows.join(', ') || '-'} | ${provider.scopes.join(' ')}`;
	});
	return `${lines.join('\n')}\n`;
}

export function createAuthCliHandlers(
	services: AuthCliServices,
	output: CliOutput,
	colors: CliColors = getColors(),
): AuthCliHandlers {
	async function login(provider: string, scopes: string[]): Promise<string> {
		const handle = await services.broker.requestTokenDeviceCode(provider, scopes, (prompt) => {
			output.write(renderPrompt(prompt, colors));
		});
		return `${ok('Signed in.', colors)} Token handle ${handle.id} (${handle.scopes.join(' ')})\n`;
	}

	async function revoke(provider: string, handleId: string): Promise<string> {
		await services.broker.revoke({ id: handleId, provider, scopes: [] }, 'cli');
		return `Revoked token handle ${handleId}\n`;
	}

	return { login, revoke };
}

function scopesOptionValue(value: string): string[] {
	return value
		.split(/[,\s]+/)
		.map((scope) => scope.trim())
		.filter((scope) => scope.length > 0);
}

export function registerAuthCommands(program: Command, options: RegisterAuthCommandOptions): void {
	const output = options.output ?? createCliOutput();
	const auth = program.command('auth').description('OAuth credential operations');

	async function withHandlers(
		configPath: string | undefined,
		run: (handlers: AuthCliHandlers) => Promise<string> | string,
	): Promise<void> {
		const services = await options.resolveServices(configPath);
		try {
			output.write(await run(createAuthCliHandlers(services, output)));
		} finally {
			services.close();
		}
	}

	auth
		.command('providers')
		.option('-c, --config <path>', 'Path to config file')
		.description('List configured OAuth providers')
		.action(async (commandOptions: { config?: string }) => {
			try {
				output.write(renderProviders(await options.resolveProviders(commandOptions.config)));
			} catch (error) {
				writeFailure(output, error);
				process.exitCode = 1;
			}
		});

	auth
		.command('login')
		.argument('<provider>', 'Provider name from oauth.providers')
		.option('-c, --config <path>', 'Path to config file')
		.option('-s, --scopes <scopes>', 'Comma separated scopes', scopesOptionValue)
		.description('Sign in with the device code flow')
		.action(async (provider: string, commandOptions: { config?: string; scopes?: string[] }) => {
			try {
				await withHandlers(commandOptions.config, (handlers) =>
					handlers.login(provider, commandOptions.scopes ?? []),
				);
			} catch (error) {
				writeFailure(output, error);
				process.exitCode = 1;
			}
		});

	auth
		.command('revoke')
		.argument('<provider>', 'Provider the token was issued by')
		.argument('<handle>', 'Token handle id')
		.option('-c, --config <path>', 'Path to config file')
		.description('Revoke a stored token')
		.action(async (provider: string, handle: string, commandOptions: { config?: string }) => {
			try {
				await withHandlers(commandOptions.config, (handlers) => handlers.revoke(provider, handle));
			} catch (error) {
				writeFailure(output, error);
				process.exitCode = 1;
			}
		});
}
