import { homedir, platform } from 'node:os';
import { join } from 'node:path';

/**
 * Resolves the base directory for agentgate's data.
 * Checks AGENTGATE_HOME env var first, then uses platform-specific defaults.
 */
export function getAgentGateHome(): string {
	const envHome = process.env.AGENTGATE_HOME;
	if (envHome) return envHome;

	const home = homedir();
	if (platform() === 'darwin') {
		return join(home, '.agentgate');
	}
	// Linux: respect XDG_DATA_HOME if set
	const xdgData = process.env.XDG_DATA_HOME;
	if (xdgData) {
		return join(xdgData, 'agentgate');
	}
	return join(home, '.agentgate');
}

export function getDefaultConfigPath(): string {
	return join(getAgentGateHome(), 'config.yaml');
}

/**
 * Expands a leading `~/.agentgate` or `~` to the resolved home directories.
 */
export function expandHome(path: string): string {
	if (path === '~/.agentgate' || path.startsWith('~/.agentgate/')) {
		return join(getAgentGateHome(), path.slice('~/.agentgate'.length));
	}
	if (path === '~' || path.startsWith('~/')) {
		return join(homedir(), path.slice(1));
	}
	return path;
}
