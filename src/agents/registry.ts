import { existsSync, readdirSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { NotFoundError, errorMessage, formatErrorChain } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { MANIFEST_FILE, loadManifest } from './manifest.js';
import type { AgentInfo, DiscoveryReport, SandboxMode } from './types.js';

const logger = createLogger('agents:registry');

interface AgentRegistry {
	register(dir: string): Promise<AgentInfo>;
	discover(dir: string): Promise<DiscoveryReport>;
	get(name: string): AgentInfo | undefined;
	list(): AgentInfo[];
	setEnabled(name: string, enabled: boolean): void;
	unregister(name: string): boolean;
	getBySandbox(mode: SandboxMode): AgentInfo[];
}

function copyInfo(info: AgentInfo): AgentInfo {
	return { ...info };
}

/**
 * In-memory catalogue of installed agents keyed by manifest name.
 * Registering a name again replaces the previous entry.
 */
export function createAgentRegistry(): AgentRegistry {
	const agents = new Map<string, AgentInfo>();

	async function register(dir: string): Promise<AgentInfo> {
		const baseDir = resolve(dir);
		const manifestPath = join(baseDir, MANIFEST_FILE);
		if (!existsSync(manifestPath)) {
			throw new NotFoundError(`Agent manifest not found: ${manifestPath}`);
		}

		const manifest = loadManifest(manifestPath);
		const previous = agents.get(manifest.name);
		const info: AgentInfo = { manifest, baseDir, enabled: true };
		agents.set(manifest.name, info);

		if (previous && previous.baseDir !== baseDir) {
			logger.warn('Agent replaced by a later registration', {
				name: manifest.name,
				previous: previous.baseDir,
				current: baseDir,
			});
		}
		logger.info('Agent registered', {
			name: manifest.name,
			version: manifest.version,
			sandbox: manifest.sandbox,
		});
		return copyInfo(info);
	}

	async function discover(dir: string): Promise<DiscoveryReport> {
		const report: DiscoveryReport = { registered: [], failed: [] };

		let dirs: string[];
		try {
			dirs = readdirSync(dir, { withFileTypes: true })
				.filter((entry) => entry.isDirectory())
				.map((entry) => join(dir, entry.name))
				.filter((agentDir) => existsSync(join(agentDir, MANIFEST_FILE)))
				.sort();
		} catch (error) {
			logger.warn('Agents directory not readable', { dir, error: errorMessage(error) });
			return report;
		}

		for (const agentDir of dirs) {
			try {
				const info = await register(agentDir);
				report.registered.push(info.manifest.name);
			} catch (error) {
				const message = formatErrorChain(error);
				logger.warn('Failed to load agent', { dir: agentDir, error: message });
				report.failed.push({ dir: agentDir, error: message });
			}
		}

		logger.info('Agent discovery finished', {
			dir,
			registered: report.registered.length,
			failed: report.failed.length,
		});
		return report;
	}

	function get(name: string): AgentInfo | undefined {
		const info = agents.get(name);
		return info ? copyInfo(info) : undefined;
	}

	function list(): AgentInfo[] {
		return [...agents.values()]
			.sort((a, b) => a.manifest.name.localeCompare(b.manifest.name))
			.map(copyInfo);
	}

	function setEnabled(name: string, enabled: boolean): void {
		const info = agents.get(name);
		if (!info) {
			throw new NotFoundError(`Agent not found: ${name}`);
		}
		info.enabled = enabled;
		logger.info(enabled ? 'Agent enabled' : 'Agent disabled', { name });
	}

	function unregister(name: string): boolean {
		const removed = agents.delete(name);
		if (removed) logger.info('Agent unregistered', { name });
		return removed;
	}

	function getBySandbox(mode: SandboxMode): AgentInfo[] {
		return list().filter((info) => info.enabled && info.manifest.sandbox === mode);
	}

	return {
		register,
		discover,
		get,
		list,
		setEnabled,
		unregister,
		getBySandbox,
	};
}

export type { AgentRegistry };
