import { AgentGateError, formatErrorChain } from '../utils/errors.js';

export interface CliOutput {
	write(value: string): void;
	writeError(value: string): void;
}

export interface CliColors {
	enabled: boolean;
}

export function createCliOutput(): CliOutput {
	return {
		write(value: string) {
			process.stdout.write(value);
		},
		writeError(value: string) {
			process.stderr.write(value);
		},
	};
}

export function getColors(): CliColors {
	return {
		enabled: process.env.NO_COLOR !== '1',
	};
}

function withColor(text: string, code: string, colors: CliColors): string {
	if (!colors.enabled) return text;
	return `\x1b[${code}m${text}\x1b[0m`;
}

export function title(text: string, colors: CliColors): string {
	return withColor(text, '1;36', colors);
}

export function ok(text: string, colors: CliColors): string {
	return withColor(text, '32', colors);
}

export function dim(text: string, colors: CliColors): string {
	return withColor(text, '90', colors);
}

export function danger(text: string, colors: CliColors): string {
	return withColor(text, '31', colors);
}

/** Prints the error with its cause chain and, when present, the recovery hint */
export function writeFailure(output: CliOutput, error: unknown): void {
	const colors = getColors();
	output.writeError(`${danger('Error:', colors)} ${formatErrorChain(error)}\n`);
	if (error instanceof AgentGateError && error.hint) {
		output.writeError(`${dim(`hint: ${error.hint}`, colors)}\n`);
	}
}
