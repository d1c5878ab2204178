import { spawn as spawnChild } from 'node:child_process';
import { once } from 'node:events';
import type { Readable } from 'node:stream';
import { BackendError, CapabilityDeniedError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { NativeRunner, ProcessHandle, ProcessResult, SpawnOptions } from './types.js';

const logger = createLogger('agents:native');

const MAX_OUTPUT_BYTES = 1024 * 1024;

/** Environment variable listing the capabilities redeemed for the process */
export const CAPABILITIES_ENV = 'AGENTGATE_CAPABILITIES';

interface CreateNativeRunnerOptions {
	/** Kill the process after this long; unset means no limit */
	timeoutMs?: number;
}

function collect(stream: Readable, onOverflow: () => void): () => string {
	const chunks: Buffer[] = [];
	let size = 0;
	stream.on('data', (chunk: Buffer | string) => {
		const buffer = typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
		size += buffer.length;
		if (size > MAX_OUTPUT_BYTES) {
			onOverflow();
			return;
		}
		chunks.push(buffer);
	});
	return () => Buffer.concat(chunks).toString('utf-8');
}

/**
 * Runs native agents as child processes. Input goes to stdin, output is
 * collected from stdout and stderr. The child sees a minimal environment:
 * PATH plus the capabilities redeemed against the execution permit.
 */
export function createNativeRunner(options: CreateNativeRunnerOptions = {}): NativeRunner {
	async function spawn(
		executable: string,
		args: readonly string[],
		spawnOptions: SpawnOptions,
	): Promise<ProcessHandle> {
		const redeemed: string[] = [];
		for (const capability of spawnOptions.capabilities ?? []) {
			if (!spawnOptions.redeem(capability)) {
				throw new CapabilityDeniedError(`Execution permit does not cover ${capability}`);
			}
			redeemed.push(capability);
		}

		const child = spawnChild(executable, [...args], {
			cwd: spawnOptions.cwd,
			env: {
				PATH: process.env.PATH ?? '',
				...spawnOptions.env,
				[CAPABILITIES_ENV]: redeemed.join(','),
			},
			stdio: ['pipe', 'pipe', 'pipe'],
			windowsHide: true,
		});

		const kill = (reason: string) => {
			if (child.exitCode === null && child.signalCode === null) {
				logger.warn('Killing native agent', { pid: child.pid, reason });
				child.kill('SIGKILL');
			}
		};
		const stdout = collect(child.stdout, () => kill('stdout limit exceeded'));
		const stderr = collect(child.stderr, () => kill('stderr limit exceeded'));

		try {
			await once(child, 'spawn');
		} catch (error) {
			throw new BackendError(`Failed to start native agent: ${executable}`, {
				cause: error,
				hint: errorMessage(error),
			});
		}

		child.stdin.on('error', (error) => {
			// The agent may exit without reading its input
			logger.debug('Agent stdin closed early', { pid: child.pid, error: error.message });
		});
		child.stdin.end(spawnOptions.input);

		const timer =
			options.timeoutMs === undefined
				? undefined
				: setTimeout(() => kill('timeout'), options.timeoutMs);

		const done = new Promise<ProcessResult>((resolve, reject) => {
			child.once('error', (error) => {
				clearTimeout(timer);
				reject(new BackendError('Native agent process failed', { cause: error }));
			});
			child.once('close', (exitCode, signal) => {
				clearTimeout(timer);
				resolve({ exitCode, signal, stdout: stdout(), stderr: stderr() });
			});
		});

		logger.info('Spawned native agent', { executable, pid: child.pid });
		return {
			pid: child.pid,
			wait: () => done,
		};
	}

	return { spawn };
}

export type { CreateNativeRunnerOptions };
