import { describe, it, expect, beforeAll } from 'vitest';
import type { Defs } from '../src/defs';
import { isRenameable, prepareRename, rename, validateNewName } from '../src/navigation';
import { loadTestDefs } from './loadDefs.testutil';
import { docFrom, docSet, posOf } from './testUtils';

const A = 'struct User {\n  1: i64 id\n}\nstruct Team {\n  1: User lead\n}';
const B = 'service Users {\n  User get(1: i64 id)\n}';

let defs: Defs;
beforeAll(async () => {
	defs = await loadTestDefs();
});

describe('validateNewName', () => {
	it('accepts plain identifiers', () => {
		expect(validateNewName('Person', defs)).toEqual({ ok: true });
		expect(validateNewName('_tmp2', defs)).toEqual({ ok: true });
	});

	it('rejects empty and whitespace-only names', () => {
		expect(validateNewName('', defs)).toEqual({ ok: false, message: 'new name cannot be empty' });
		expect(validateNewName('   ', defs)).toEqual({ ok: false, message: 'new name cannot be empty' });
	});

	it('rejects malformed identifiers', () => {
		for (const bad of ['1abc', 'has space', 'naïve', 'a-b']) {
			expect(validateNewName(bad, defs)).toEqual({ ok: false, message: `'${bad}' is not a valid identifier` });
		}
	});

	it('rejects keywords and builtin type names', () => {
		for (const reserved of ['struct', 'throws', 'i64', 'map']) {
			expect(validateNewName(reserved, defs)).toEqual({
				ok: false,
				message: `'${reserved}' is a reserved keyword and cannot be used as an identifier`,
			});
		}
	});
});

describe('isRenameable', () => {
	it('is false only for language-owned names', () => {
		expect(isRenameable('User', defs)).toBe(true);
		expect(isRenameable('string', defs)).toBe(false);
		expect(isRenameable('void', defs)).toBe(false);
	});
});

describe('prepareRename', () => {
	it('returns the identifier range and current name', () => {
		const doc = docFrom(A);
		expect(prepareRename(doc, posOf(doc, 'User', 0, 1), defs)).toEqual({
			ok: true,
			range: { start: { line: 0, character: 7 }, end: { line: 0, character: 11 } },
			placeholder: 'User',
		});
	});

	it('refuses builtin types and empty positions', () => {
		const doc = docFrom(A);
		expect(prepareRename(doc, posOf(doc, 'i64'), defs)).toEqual({ ok: false, message: 'symbol i64 cannot be renamed' });
		expect(prepareRename(doc, { line: 2, character: 0 }, defs))
			.toEqual({ ok: false, message: 'no renameable symbol found at position' });
	});
});

describe('rename', () => {
	it('edits every occurrence across documents, grouped by URI', () => {
		const a = docFrom(A, 'file:///a.frugal');
		const b = docFrom(B, 'file:///b.frugal');
		const res = rename(a, posOf(a, 'User'), 'Person', docSet(a, b), defs);
		if (!res.ok) throw new Error(res.message);
		const changes = res.edit.changes ?? {};
		expect(Object.keys(changes)).toEqual(['file:///a.frugal', 'file:///b.frugal']);
		expect(changes['file:///a.frugal']).toEqual([
			{ range: { start: { line: 0, character: 7 }, end: { line: 0, character: 11 } }, newText: 'Person' },
			{ range: { start: { line: 4, character: 5 }, end: { line: 4, character: 9 } }, newText: 'Person' },
		]);
		expect(changes['file:///b.frugal']).toEqual([
			{ range: { start: { line: 1, character: 2 }, end: { line: 1, character: 6 } }, newText: 'Person' },
		]);
	});

	it('rejects the current name', () => {
		const doc = docFrom(A);
		expect(rename(doc, posOf(doc, 'User'), 'User', docSet(), defs))
			.toEqual({ ok: false, message: "new name 'User' is the same as current name" });
	});

	it('rejects reserved and malformed names before building edits', () => {
		const doc = docFrom(A);
		expect(rename(doc, posOf(doc, 'User'), 'enum', docSet(), defs))
			.toEqual({ ok: false, message: "'enum' is a reserved keyword and cannot be used as an identifier" });
		expect(rename(doc, posOf(doc, 'User'), '9lives', docSet(), defs))
			.toEqual({ ok: false, message: "'9lives' is not a valid identifier" });
	});

	it('refuses to rename builtin types or nothing', () => {
		const doc = docFrom(A);
		expect(rename(doc, posOf(doc, 'i64'), 'Long', docSet(), defs))
			.toEqual({ ok: false, message: 'symbol i64 cannot be renamed' });
		expect(rename(doc, { line: 50, character: 0 }, 'X', docSet(), defs))
			.toEqual({ ok: false, message: 'no renameable symbol found at position' });
	});
});
