import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createConsentLedger } from '../src/consent/ledger.js';
import { loadConfig } from '../src/config/loader.js';
import type { AgentGateConfig } from '../src/config/schema.js';
import { createControlPlane } from '../src/control-plane.js';
import { eventsOfType, outputText } from '../src/protocol/events.js';

let root = '';

function writeConfig(): AgentGateConfig {
	const configPath = join(root, 'config.yaml');
	writeFileSync(
		configPath,
		`
agents:
  dir: ${join(root, 'agents')}
consent:
  default_duration_s: 120
ledger:
  path: ${join(root, 'consent.db')}
vault:
  backend: encrypted-sqlite
  path: ${join(root, 'vault.db')}
  passphrase: "\${TEST_AGENTGATE_VAULT_PASSPHRASE}"
oauth:
  providers:
    example:
      client_id: test-client
      auth_url: https://auth.example.test/authorize
      token_url: https://auth.example.test/token
    github:
      client_id: test-client
`,
	);
	const result = loadConfig(configPath);
	if (!result.ok) throw result.error;
	return result.value;
}

function writeShellAgent(): void {
	const dir = join(root, 'agents', 'shell-echo');
	mkdirSync(dir, { recursive: true });
	writeFileSync(
		join(dir, 'manifest.yaml'),
		'schema_version: "0.1"\nname: shell-echo\nversion: "0.1.0"\nentry: run.sh\nsandbox: native\ncapabilities: [files.read]\n',
	);
	const script = join(dir, 'run.sh');
	writeFileSync(script, '#!/bin/sh\nread line\necho "agent saw: $line"\necho "caps: $AGENTGATE_CAPABILITIES"\n');
	chmodSync(script, 0o755);
}

beforeEach(() => {
	root = mkdtempSync(join(tmpdir(), 'agentgate-integration-'));
	process.env.TEST_AGENTGATE_VAULT_PASSPHRASE = 'test-passphrase';
});

afterEach(() => {
	delete process.env.TEST_AGENTGATE_VAULT_PASSPHRASE;
	rmSync(root, { recursive: true, force: true });
});

describe('control plane', () => {
	it('discovers a native agent, asks consent, runs it and persists the trail', async () => {
		writeShellAgent();
		const config = writeConfig();
		const plane = createControlPlane(config, { consentHandler: () => ({ granted: true }) });

		try {
			const report = await plane.registry.discover(config.agents.dir);
			expect(report).toEqual({ registered: ['shell-echo'], failed: [] });

			const events = await plane.runtime.executeAgent('shell-echo', 'hello\n');

			expect(events.map((event) => event.eventType.type)).toEqual([
				'Input',
				'ConsentRequest',
				'ConsentGrant',
				'Output',
			]);
			const last = events.at(-1);
			expect(last && outputText(last)).toBe('agent saw: hello\ncaps: files.read');
			expect(eventsOfType(events, 'ConsentRequest')[0]?.durationS).toBe(120);
		} finally {
			plane.close();
		}

		const ledger = createConsentLedger({ dbPath: config.ledger.path });
		expect(ledger.getAll().map((entry) => [entry.agentId, entry.action])).toEqual([
			['shell-echo', { type: 'grant', capability: 'files.read', durationS: 120 }],
		]);
		ledger.close();
	});

	it('wires configured providers and an encrypted vault', async () => {
		const config = writeConfig();
		const plane = createControlPlane(config);

		try {
			expect(plane.broker.listProviders()).toEqual(['example', 'github']);
			expect(plane.broker.getProvider('github')?.tokenUrl).toBe(
				'https://github.com/login/oauth/access_token',
			);
			expect(plane.vault.backendKind).toBe('encrypted-sqlite');
			await plane.vault.store('label', 'test-secret');
		} finally {
			plane.close();
		}

		const reopened = createControlPlane(config);
		try {
			await expect(reopened.vault.fetch('label')).resolves.toBe('test-secret');
		} finally {
			reopened.close();
		}
	});

	it('denies execution when nobody answers the consent request', async () => {
		writeShellAgent();
		const config = writeConfig();
		const plane = createControlPlane(config);

		try {
			await plane.registry.discover(config.agents.dir);
			const events = await plane.runtime.executeAgent('shell-echo', 'hello\n');

			expect(eventsOfType(events, 'Error')).toEqual([
				{
					code: 'CAPABILITY_DENIED',
					message: 'Capability denied: files.read',
					hint: 'No consent handler configured',
				},
			]);
			expect(plane.ledger.getAll().map((entry) => entry.action.type)).toEqual(['deny']);
		} finally {
			plane.close();
		}
	});
});
