import process from 'node:process';
import fs from 'node:fs/promises';
import path from 'node:path';
import yaml from 'js-yaml';
import Ajv2020 from 'ajv/dist/2020';
import schema from '../../common/frugalDefSchema.json';

export interface DefFile {
	version: string;
	keywords: string[];
	baseTypes: string[];
	containerTypes: string[];
	// hover text for keywords and builtin types
	docs?: Record<string, string>;
}

export class Defs {
	file: DefFile;
	keywords: ReadonlySet<string>;
	baseTypes: ReadonlySet<string>;
	containerTypes: ReadonlySet<string>;
	private readonly docs: ReadonlyMap<string, string>;

	constructor(file: DefFile) {
		this.file = file;
		this.keywords = new Set(file.keywords);
		this.baseTypes = new Set(file.baseTypes);
		this.containerTypes = new Set(file.containerTypes);
		this.docs = new Map(Object.entries(file.docs ?? {}));
	}

	docFor(name: string): string | undefined {
		return this.docs.get(name);
	}

	isKeyword(name: string): boolean {
		return this.keywords.has(name);
	}

	// Base and container type names.
	isBuiltinType(name: string): boolean {
		return this.baseTypes.has(name) || this.containerTypes.has(name);
	}

	isReserved(name: string): boolean {
		return this.isKeyword(name) || this.isBuiltinType(name);
	}
}

// Source checkout (server/src) and compiled output (dist/server/src) sit at different depths.
const BUNDLED_YAML = [
	path.resolve(__dirname, '..', '..', 'common', 'frugal_defs.yaml'),
	path.resolve(__dirname, '..', '..', '..', 'common', 'frugal_defs.yaml'),
];

async function resolveDefinitionPath(defPath: string): Promise<{ raw: string; resolvedPath: string }> {
	const requested = defPath?.trim();
	const candidates: string[] = [];
	if (requested) {
		if (path.isAbsolute(requested)) candidates.push(requested);
		else {
			candidates.push(path.resolve(process.cwd(), requested));
			candidates.push(path.resolve(__dirname, requested));
		}
	}
	candidates.push(...BUNDLED_YAML);
	const seen = new Set<string>();
	let lastErr: unknown;
	for (const candidate of candidates) {
		const resolved = path.resolve(candidate);
		if (seen.has(resolved)) continue;
		seen.add(resolved);
		try {
			const raw = await fs.readFile(resolved, 'utf8');
			return { raw, resolvedPath: resolved };
		} catch (err) {
			lastErr = err;
		}
	}
	throw lastErr ?? new Error('No definition file could be resolved');
}

export async function loadDefs(defPath: string): Promise<Defs> {
	const { raw, resolvedPath } = await resolveDefinitionPath(defPath);
	const obj: unknown = yaml.load(raw, { json: true });
	if (!obj) {
		throw new Error(`Definition file "${resolvedPath}" appears to be empty or could not be parsed`);
	}
	return validateAndCreate(obj, resolvedPath);
}

export function validateAndCreate(obj: unknown, source = '<memory>'): Defs {
	const ajv = new Ajv2020({ allErrors: true, strict: false });
	const validate = ajv.compile<DefFile>(schema);
	if (!validate(obj)) {
		const msg = (validate.errors || []).map(e => `${e.instancePath} ${e.message}`).join('\n');
		throw new Error(`Definition file "${source}" failed schema validation:\n${msg}`);
	}
	return new Defs(obj);
}
