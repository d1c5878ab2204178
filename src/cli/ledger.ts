import { writeFileSync } from 'node:fs';
import type { Command } from 'commander';
import type { ConsentLedger } from '../consent/ledger.js';
import { createCliOutput, writeFailure } from './output.js';

export interface LedgerCliServices {
	ledger: ConsentLedger;
	close(): void;
}

interface RegisterLedgerCommandOptions {
	resolveServices(configPath?: string): Promise<LedgerCliServices>;
}

export function registerLedgerCommands(
	program: Command,
	options: RegisterLedgerCommandOptions,
): void {
	const output = createCliOutput();
	const ledger = program.command('ledger').description('Consent ledger operations');

	ledger
		.command('export')
		.option('-c, --config <path>', 'Path to config file')
		.option('-o, --output <file>', 'Write to a file instead of stdout')
		.option('-a, --agent <id>', 'Only entries for this agent')
		.description('Export the consent audit trail as JSON')
		.action(async (commandOptions: { config?: string; output?: string; agent?: string }) => {
			try {
				const services = await options.resolveServices(commandOptions.config);
				try {
					const json = commandOptions.agent
						? services.ledger.export({ agentId: commandOptions.agent })
						: services.ledger.export();
					if (commandOptions.output) {
						writeFileSync(commandOptions.output, `${json}\n`, 'utf-8');
						output.write(`Wrote ${commandOptions.output}\n`);
					} else {
						output.write(`${json}\n`);
					}
				} finally {
					services.close();
				}
			} catch (error) {
				writeFailure(output, error);
				process.exitCode = 1;
			}
		});
}
