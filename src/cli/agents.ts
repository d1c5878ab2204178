import { join } from 'node:path';
import type { Command } from 'commander';
import { loadManifest, MANIFEST_FILE } from '../agents/manifest.js';
import type { AgentRegistry } from '../agents/registry.js';
import { formatErrorChain } from '../utils/errors.js';
import {
	type CliColors,
	createCliOutput,
	danger,
	dim,
	getColors,
	ok,
	title,
	writeFailure,
} from './output.js';

export interface AgentsCliServices {
	registry: AgentRegistry;
	/** Directory scanned when `agents list` gets no --dir */
	agentsDir: string;
}

export interface AgentsCliHandlers {
	list(dir?: string): Promise<string>;
	/** Resolves `{ valid, output }`; invalid manifests are not thrown */
	validate(dir: string): Promise<{ valid: boolean; output: string }>;
}

interface RegisterAgentsCommandOptions {
	resolveServices(configPath?: string): Promise<AgentsCliServices>;
}

export function createAgentsCliHandlers(
	services: AgentsCliServices,
	colors: CliColors = getColors(),
): AgentsCliHandlers {
	async function list(dir = services.agentsDir): Promise<string> {
		const report = await services.registry.discover(dir);
		const lines = [title(`Agents in ${dir}`, colors)];

		const agents = services.registry.list();
		if (agents.length === 0) {
			lines.push(dim('No agents found.', colors));
		}
		for (const info of agents) {
			const { manifest } = info;
			const capabilities =
				manifest.capabilities.length > 0 ? manifest.capabilities.join(', ') : '-';
			lines.push(
				`${manifest.name} ${manifest.version} | ${manifest.sandbox} | ${info.enabled ? 'enabled' : 'disabled'} | ${capabilities}`,
			);
		}
		for (const failure of report.failed) {
			lines.push(`${danger('failed', colors)} ${failure.dir}: ${failure.error}`);
		}
		return `${lines.join('\n')}\n`;
	}

	async function validate(dir: string): Promise<{ valid: boolean; output: string }> {
		try {
			const manifest = loadManifest(join(dir, MANIFEST_FILE));
			return {
				valid: true,
				output: `${ok('valid', colors)} ${manifest.name} ${manifest.version} (${manifest.sandbox})\n`,
			};
		} catch (error) {
			return {
				valid: false,
				output: `${danger('invalid', colors)} ${formatErrorChain(error)}\n`,
			};
		}
	}

	return { list, validate };
}

export function registerAgentsCommands(
	program: Command,
	options: RegisterAgentsCommandOptions,
): void {
	const output = createCliOutput();
	const agents = program.command('agents').description('Agent operations');

	agents
		.command('list')
		.option('-c, --config <path>', 'Path to config file')
		.option('-d, --dir <path>', 'Agents directory (defaults to agents.dir)')
		.description('Discover and list installed agents')
		.action(async (commandOptions: { config?: string; dir?: string }) => {
			try {
				const services = await options.resolveServices(commandOptions.config);
				output.write(await createAgentsCliHandlers(services).list(commandOptions.dir));
			} catch (error) {
				writeFailure(output, error);
				process.exitCode = 1;
			}
		});

	agents
		.command('validate')
		.argument('<dir>', 'Agent directory containing manifest.yaml')
		.option('-c, --config <path>', 'Path to config file')
		.description('Validate an agent manifest')
		.action(async (dir: string, commandOptions: { config?: string }) => {
			try {
				const services = await options.resolveServices(commandOptions.config);
				const result = await createAgentsCliHandlers(services).validate(dir);
				output.write(result.output);
				if (!result.valid) process.exitCode = 1;
			} catch (error) {
				writeFailure(output, error);
				process.exitCode = 1;
			}
		});
}
