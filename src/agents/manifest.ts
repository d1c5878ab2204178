import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { Manifest } from './types.js';

const logger = createLogger('agents:manifest');

export const MANIFEST_FILE = 'manifest.yaml';
export const MANIFEST_SCHEMA_VERSION = '0.1';

const ManifestSchema = z.object({
	schema_version: z.string(),
	name: z.string().min(1),
	version: z.string(),
	entry: z.string(),
	sandbox: z.enum(['wasm', 'native']),
	capabilities: z.array(z.string()).default([]),
	oauth_scopes: z.array(z.string()).default([]),
	resources: z
		.object({
			cpu: z.string(),
			mem: z.string(),
		})
		.default({ cpu: '500m', mem: '512Mi' }),
	ui: z
		.object({
			hints: z.array(z.string()).default([]),
		})
		.default({}),
});

function freezeManifest(manifest: Manifest): Manifest {
	Object.freeze(manifest.capabilities);
	Object.freeze(manifest.oauthScopes);
	Object.freeze(manifest.resources);
	Object.freeze(manifest.ui.hints);
	Object.freeze(manifest.ui);
	return Object.freeze(manifest);
}

/**
 * Semantic checks on top of the shape: supported schema version and a
 * non-empty entry. Capability strings outside `scope.action` / `scope:action`
 * are only warned about.
 */
export function validateManifest(manifest: Manifest): void {
	if (manifest.schemaVersion !== MANIFEST_SCHEMA_VERSION) {
		throw new ValidationError(
			`Unsupported manifest schema version: ${manifest.schemaVersion}. Expected ${MANIFEST_SCHEMA_VERSION}`,
		);
	}
	if (manifest.entry.trim().length === 0) {
		throw new ValidationError('Manifest entry point cannot be empty');
	}
	for (const capability of manifest.capabilities) {
		if (!capability.includes('.') && !capability.includes(':')) {
			logger.warn('Capability may not follow the scope.action format', {
				agent: manifest.name,
				capability,
			});
		}
	}
}

/** Parses and validates manifest YAML. `source` names the file in errors. */
export function parseManifest(text: string, source = MANIFEST_FILE): Manifest {
	let raw: unknown;
	try {
		// Every manifest scalar is a string; the failsafe schema keeps `0.10` as written.
		raw = parseYaml(text, { schema: 'failsafe' });
	} catch (error) {
		throw new ValidationError(`Failed to parse manifest: ${source}`, { cause: error });
	}

	const parsed = ManifestSchema.safeParse(raw);
	if (!parsed.success) {
		const message = parsed.error.issues
			.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
			.join('; ');
		throw new ValidationError(`Invalid manifest at ${source}: ${message}`);
	}

	const { data } = parsed;
	const manifest: Manifest = {
		schemaVersion: data.schema_version,
		name: data.name,
		version: data.version,
		entry: data.entry,
		sandbox: data.sandbox,
		capabilities: data.capabilities,
		oauthScopes: data.oauth_scopes,
		resources: data.resources,
		ui: data.ui,
	};
	validateManifest(manifest);
	return freezeManifest(manifest);
}

export function loadManifest(path: string): Manifest {
	let text: string;
	try {
		text = readFileSync(path, 'utf-8');
	} catch (error) {
		throw new ValidationError(`Failed to read manifest: ${path}`, { cause: error });
	}

	try {
		return parseManifest(text, path);
	} catch (error) {
		throw new ValidationError(`Failed to load manifest: ${path}`, { cause: error });
	}
}

export function entryPath(manifest: Manifest, baseDir: string): string {
	return resolve(baseDir, manifest.entry);
}

export function requiresNative(manifest: Manifest): boolean {
	return manifest.sandbox === 'native';
}
