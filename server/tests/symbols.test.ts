import { describe, it, expect } from 'vitest';
import { SymbolKind } from 'vscode-languageserver/node';
import { documentSymbols, extractSymbols, workspaceSymbols } from '../src/symbols';
import { docFrom } from './testUtils';

const SRC = [
	'struct User {',
	'  1: i64 id',
	'}',
	'exception NotFound {}',
	'enum Color { RED, GREEN }',
	'const string GREETING = "hi"',
	'typedef i64 UserId',
	'service Users {',
	'  User get(1: UserId id)',
	'}',
	'scope Events {',
	'  Created: User',
	'}',
].join('\n');

describe('extractSymbols', () => {
	it('lists top-level definitions in source order with name and full ranges', () => {
		const doc = docFrom(SRC);
		const syms = extractSymbols(doc.tree, doc.source);
		expect(syms.map(s => [s.kind, s.name])).toEqual([
			['struct', 'User'],
			['exception', 'NotFound'],
			['enum', 'Color'],
			['const', 'GREETING'],
			['typedef', 'UserId'],
			['service', 'Users'],
			['scope', 'Events'],
		]);
		expect(syms[0]!.declarationRange).toEqual({ start: { line: 0, character: 7 }, end: { line: 0, character: 11 } });
		expect(syms[0]!.fullRange).toEqual({ start: { line: 0, character: 0 }, end: { line: 2, character: 1 } });
	});

	it('takes the declared name of a const or typedef, not its type', () => {
		const doc = docFrom('typedef Base Alias\nconst Base DEFAULT = 1');
		expect(extractSymbols(doc.tree, doc.source).map(s => s.name)).toEqual(['Alias', 'DEFAULT']);
	});

	it('skips definitions without a name', () => {
		const doc = docFrom('struct {}\nstruct Named {}');
		expect(extractSymbols(doc.tree, doc.source).map(s => s.name)).toEqual(['Named']);
	});

	it('is deterministic', () => {
		const doc = docFrom(SRC);
		const strip = () => extractSymbols(doc.tree, doc.source).map(({ node: _node, ...rest }) => rest);
		expect(strip()).toEqual(strip());
		const again = docFrom(SRC);
		expect(extractSymbols(again.tree, again.source).map(s => s.name))
			.toEqual(extractSymbols(doc.tree, doc.source).map(s => s.name));
	});

	it('returns an empty list without a tree', () => {
		expect(extractSymbols(null, '')).toEqual([]);
	});
});

describe('documentSymbols', () => {
	it('nests members under their definitions', () => {
		const out = documentSymbols(docFrom(SRC));
		expect(out.map(s => [s.name, s.kind, s.detail])).toEqual([
			['User', SymbolKind.Struct, 'Struct'],
			['NotFound', SymbolKind.Class, 'Exception'],
			['Color', SymbolKind.Enum, 'Enum'],
			['GREETING', SymbolKind.Constant, 'Constant'],
			['UserId', SymbolKind.TypeParameter, 'Type Alias'],
			['Users', SymbolKind.Class, 'Service'],
			['Events', SymbolKind.Class, 'Scope (pub/sub)'],
		]);
		expect(out[0]!.children?.map(c => [c.name, c.kind, c.detail])).toEqual([['id', SymbolKind.Field, 'Field']]);
		expect(out[2]!.children?.map(c => c.name)).toEqual(['RED', 'GREEN']);
		expect(out[2]!.children?.[0]?.kind).toBe(SymbolKind.EnumMember);
		expect(out[5]!.children?.map(c => [c.name, c.kind])).toEqual([['get', SymbolKind.Method]]);
		expect(out[6]!.children?.map(c => [c.name, c.kind, c.detail])).toEqual([['Created', SymbolKind.Event, 'Event']]);
		expect(out[3]!.children).toEqual([]);
	});
});

describe('workspaceSymbols', () => {
	it('matches names case-insensitively across Frugal documents only', () => {
		const a = docFrom('struct UserProfile {}\nstruct Order {}', 'file:///a.frugal');
		const b = docFrom('service UserService {}', 'file:///b.frugal');
		const other = docFrom('struct UserThing {}', 'file:///notes.txt');
		const out = workspaceSymbols('user', [a, b, other]);
		expect(out.map(s => [s.name, s.location.uri])).toEqual([
			['UserProfile', 'file:///a.frugal'],
			['UserService', 'file:///b.frugal'],
		]);
	});

	it('returns every top-level symbol for an empty query', () => {
		const a = docFrom('struct A {}\nenum B {}', 'file:///a.frugal');
		expect(workspaceSymbols('', [a]).map(s => s.name)).toEqual(['A', 'B']);
	});
});
