import { describe, it, expect } from 'vitest';
import { findAll, nodeText, type SyntaxNode } from '../src/ast';
import { classifyIdentifier } from '../src/classify';
import { docFrom } from './testUtils';

const SRC = [
	'struct User {',
	'  1: Profile profile',
	'}',
	'enum Color { RED = 1 }',
	'const Color DEFAULT_COLOR = RED',
	'service Users extends Base {',
	'  User get(1: i64 id) throws (1: NotFound nf)',
	'}',
	'scope Events {',
	'  Created: User',
	'}',
].join('\n');

function identifiers(): Array<{ text: string; node: SyntaxNode }> {
	const doc = docFrom(SRC);
	if (!doc.tree) throw new Error('no tree');
	return findAll(doc.tree, 'identifier').map(node => ({ text: nodeText(node, SRC), node }));
}

describe('classifyIdentifier', () => {
	it('classifies every identifier by its position', () => {
		const got = identifiers().map(({ text, node }) => {
			const c = classifyIdentifier(node);
			return [text, c.isDeclaration, c.kind];
		});
		expect(got).toEqual([
			['User', true, 'struct'],
			['Profile', false, 'type_reference'],
			['profile', true, 'field'],
			['Color', true, 'enum'],
			['RED', true, 'enum_value'],
			['Color', false, 'type_reference'],
			['DEFAULT_COLOR', true, 'const'],
			['RED', false, 'reference'],
			['Users', true, 'service'],
			['Base', false, 'reference'],
			['User', false, 'type_reference'],
			['get', true, 'method'],
			['id', true, 'parameter'],
			['NotFound', false, 'type_reference'],
			['nf', true, 'parameter'],
			['Events', true, 'scope'],
			['Created', true, 'operation'],
			['User', false, 'type_reference'],
		]);
	});
});
