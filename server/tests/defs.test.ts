import { describe, expect, it } from 'vitest';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { loadDefs, validateAndCreate } from '../src/defs';
import { loadTestDefs } from './loadDefs.testutil';

async function tempFile(name: string, content: string): Promise<string> {
	const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'frugal-defs-'));
	const p = path.join(dir, name);
	await fs.writeFile(p, content, 'utf8');
	return p;
}

describe('loadDefs', () => {
	it('loads the fixture definitions', async () => {
		const defs = await loadTestDefs();
		expect(defs.file.version).toBe('1.0');
		expect(defs.isKeyword('scope')).toBe(true);
		expect(defs.isBuiltinType('uuid')).toBe(true);
		expect(defs.isBuiltinType('set')).toBe(true);
		expect(defs.isReserved('User')).toBe(false);
	});

	it('falls back to the bundled file when no path is given or the path does not exist', async () => {
		const bundled = await loadDefs('');
		expect(bundled.baseTypes.has('i64')).toBe(true);
		const missing = await loadDefs(path.join(os.tmpdir(), 'no-such-dir', 'defs.yaml'));
		expect([...missing.keywords]).toEqual([...bundled.keywords]);
	});

	it('loads a custom file with extra names', async () => {
		const p = await tempFile('custom.yaml', [
			'version: "2.0"',
			'keywords: [struct, service]',
			'baseTypes: [i32, decimal]',
			'containerTypes: [list]',
		].join('\n'));
		const defs = await loadDefs(p);
		expect(defs.file.version).toBe('2.0');
		expect(defs.isBuiltinType('decimal')).toBe(true);
		expect(defs.isBuiltinType('map')).toBe(false);
	});

	it('rejects a file that fails schema validation, naming the file', async () => {
		const p = await tempFile('bad.yaml', 'version: "1.0"\nkeywords: [struct]\nbaseTypes: [i32]\n');
		await expect(loadDefs(p)).rejects.toThrow(`Definition file "${p}" failed schema validation`);
	});

	it('rejects an empty file', async () => {
		const p = await tempFile('empty.yaml', '# nothing here\n');
		await expect(loadDefs(p)).rejects.toThrow('appears to be empty');
	});
});

describe('validateAndCreate', () => {
	it('builds lookup sets from a plain object', () => {
		const defs = validateAndCreate({ version: '1', keywords: ['struct'], baseTypes: ['bool'], containerTypes: ['list'] });
		expect(defs.isReserved('struct')).toBe(true);
		expect(defs.isReserved('bool')).toBe(true);
		expect(defs.isReserved('list')).toBe(true);
		expect(defs.isReserved('Thing')).toBe(false);
	});

	it('rejects duplicate and malformed names', () => {
		expect(() => validateAndCreate({ version: '1', keywords: ['a', 'a'], baseTypes: [], containerTypes: [] }))
			.toThrow('Definition file "<memory>" failed schema validation');
		expect(() => validateAndCreate({ version: '1', keywords: ['not a name'], baseTypes: [], containerTypes: [] }))
			.toThrow('failed schema validation');
	});
});
