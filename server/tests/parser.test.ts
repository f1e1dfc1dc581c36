import { describe, it, expect } from 'vitest';
import { parseFrugal } from '../src/ast/parser';
import { type SyntaxNode, findAll, nameNodeOf, nodeText } from '../src/ast';

// Named-node outline: kind(child, child) with leaf text for identifiers and literals.
function outline(n: SyntaxNode, src: string): string {
	const named = n.children.filter(c => c.named);
	if (!named.length) return n.kind === 'identifier' || n.kind === 'integer' || n.kind === 'base_type'
		? `${n.kind}:${nodeText(n, src)}`
		: n.kind;
	return `${n.kind}(${named.map(c => outline(c, src)).join(' ')})`;
}

describe('parser', () => {
	it('builds a struct with field ids, types and names', () => {
		const src = 'struct User {\n  1: i64 id,\n  2: optional string name\n}';
		const { tree, errors } = parseFrugal(src);
		expect(errors).toEqual([]);
		expect(outline(tree, src)).toBe(
			'document(struct_definition(identifier:User struct_body(' +
			'field(field_id(integer:1) field_type(base_type:i64) identifier:id) ' +
			'field(field_id(integer:2) field_requiredness field_type(base_type:string) identifier:name))))',
		);
	});

	it('separates parameter and throws field lists', () => {
		const src = 'service Users {\n  oneway void ping(),\n  User get(1: i64 id) throws (1: NotFound nf)\n}';
		const { tree, errors } = parseFrugal(src);
		expect(errors).toEqual([]);
		const fns = findAll(tree, 'function_definition');
		expect(fns.map(f => nodeText(nameNodeOf(f), src))).toEqual(['ping', 'get']);
		const get = fns[1]!;
		expect(get.children.map(c => c.kind)).toEqual(['return_type', 'identifier', '(', 'field_list', ')', 'throws', '(', 'field_list', ')']);
		expect(findAll(fns[0]!, 'field_list')[0]!.children.length).toBe(0);
	});

	it('nests container element types', () => {
		const src = 'typedef map<string, list<Item>> Index';
		const { tree, errors } = parseFrugal(src);
		expect(errors).toEqual([]);
		expect(outline(tree, src)).toBe(
			'document(typedef_definition(field_type(container_type(' +
			'field_type(base_type:string) field_type(container_type(field_type(identifier:Item))))) identifier:Index))',
		);
	});

	it('parses scopes, enums, consts, includes and namespaces', () => {
		const src = [
			'include "shared.frugal"',
			'namespace go events',
			'const i32 MAX_SIZE = 10',
			'enum Color { RED = 1, GREEN }',
			'scope Events prefix "foo.{user}" {',
			'  Created: shared.Event',
			'}',
		].join('\n');
		const { tree, errors } = parseFrugal(src);
		expect(errors).toEqual([]);
		expect(tree.children.map(c => c.kind)).toEqual([
			'include_statement', 'namespace_declaration', 'const_definition', 'enum_definition', 'scope_definition',
		]);
		expect(findAll(tree, 'enum_field').map(f => nodeText(nameNodeOf(f), src))).toEqual(['RED', 'GREEN']);
		const op = findAll(tree, 'scope_operation')[0]!;
		expect(nodeText(op, src)).toBe('Created: shared.Event');
		expect(findAll(tree, 'scope_prefix').length).toBe(1);
	});

	it('sets parent links once for every child', () => {
		const { tree } = parseFrugal('struct A { 1: B b }');
		for (const id of findAll(tree, 'identifier')) {
			expect(id.parent).not.toBeNull();
			expect(id.parent?.children).toContain(id);
		}
		expect(tree.parent).toBeNull();
	});

	it('reports a missing closing brace at the end of the last token', () => {
		const src = 'struct User {\n  1: i64 id\n';
		const { tree, errors } = parseFrugal(src);
		expect(errors).toEqual([{ message: 'Missing }', line: 1, column: 11, offset: 25 }]);
		expect(findAll(tree, '}').map(n => n.missing)).toEqual([true]);
	});

	it('inserts a missing identifier without inventing a name', () => {
		const src = 'struct {}';
		const { tree, errors } = parseFrugal(src);
		expect(errors).toEqual([{ message: 'Missing identifier', line: 0, column: 6, offset: 6 }]);
		const def = tree.children[0]!;
		expect(def.kind).toBe('struct_definition');
		expect(nameNodeOf(def)).toBeNull();
	});

	it('wraps stray tokens in an ERROR node and keeps parsing', () => {
		const src = 'garbage here\nstruct A {}';
		const { tree, errors } = parseFrugal(src);
		expect(errors).toEqual([{ message: 'Syntax error', line: 0, column: 0, offset: 0 }]);
		expect(tree.children.map(c => c.kind)).toEqual(['ERROR', 'struct_definition']);
		expect(nodeText(tree.children[0]!, src)).toBe('garbage here');
	});

	it('recovers from a bad member inside a body', () => {
		const src = 'struct A {\n  1: i64 a\n  @@\n  2: i64 b\n}';
		const { tree, errors } = parseFrugal(src);
		expect(errors.map(e => [e.message, e.line, e.column])).toEqual([['Syntax error', 2, 2]]);
		expect(findAll(tree, 'field').length).toBe(2);
	});

	it('reports an unterminated block comment', () => {
		const { errors } = parseFrugal('struct A {}\n/* open');
		expect(errors).toEqual([{ message: 'Unterminated block comment', line: 1, column: 0, offset: 12 }]);
	});

	it('always returns a tree, even for empty input', () => {
		const { tree, errors } = parseFrugal('');
		expect(tree.kind).toBe('document');
		expect(tree.children).toEqual([]);
		expect(errors).toEqual([]);
	});
});
