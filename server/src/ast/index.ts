import type { Range } from 'vscode-languageserver/node';
import type { Span } from '../core/tokens';

export type Point = { row: number; column: number };

export const DEFINITION_KINDS = [
	'service_definition', 'scope_definition', 'struct_definition', 'enum_definition',
	'const_definition', 'typedef_definition', 'exception_definition',
] as const;
export type DefinitionKind = typeof DEFINITION_KINDS[number];
const DEFINITION_SET = new Set<string>(DEFINITION_KINDS);

export function isDefinitionKind(kind: string): kind is DefinitionKind {
	return DEFINITION_SET.has(kind);
}

export class SyntaxNode {
	// Named kinds such as 'struct_definition'; anonymous leaves carry their literal text, e.g. '{' or 'throws'.
	readonly kind: string;
	readonly named: boolean;
	// Placeholder inserted by error recovery; zero width.
	readonly missing: boolean;
	readonly startIndex: number;
	readonly endIndex: number;
	readonly startPosition: Point;
	readonly endPosition: Point;
	readonly children: readonly SyntaxNode[];
	// Non-owning back-reference, assigned once when the parent node is built.
	private parentRef: SyntaxNode | null = null;

	constructor(init: { kind: string; named: boolean; missing?: boolean; span: Span; start: Point; end: Point; children?: SyntaxNode[] }) {
		this.kind = init.kind;
		this.named = init.named;
		this.missing = !!init.missing;
		this.startIndex = init.span.start;
		this.endIndex = init.span.end;
		this.startPosition = init.start;
		this.endPosition = init.end;
		this.children = init.children ?? [];
		for (const c of this.children) c.parentRef = this;
	}

	get parent(): SyntaxNode | null { return this.parentRef; }
	get isError(): boolean { return this.kind === 'ERROR'; }
}

export function nodeText(node: SyntaxNode | null | undefined, source: string): string {
	if (!node) return '';
	const { startIndex: s, endIndex: e } = node;
	if (s > source.length || e > source.length || s > e) return '';
	return source.slice(s, e);
}

export function nodeToRange(node: SyntaxNode): Range {
	return {
		start: { line: node.startPosition.row, character: node.startPosition.column },
		end: { line: node.endPosition.row, character: node.endPosition.column },
	};
}

// Pre-order walk. Returning false from the visitor skips the node's subtree.
export function walk(node: SyntaxNode, visit: (n: SyntaxNode) => boolean | void): void {
	if (visit(node) === false) return;
	for (const c of node.children) walk(c, visit);
}

export function findAll(root: SyntaxNode, kind: string): SyntaxNode[] {
	const out: SyntaxNode[] = [];
	walk(root, n => { if (n.kind === kind) out.push(n); });
	return out;
}

export function childrenOfKind(node: SyntaxNode, kind: string): SyntaxNode[] {
	return node.children.filter(c => c.kind === kind);
}

// Name slot of a construct: its first direct identifier child that the parser did not invent.
export function nameNodeOf(node: SyntaxNode): SyntaxNode | null {
	for (const c of node.children) {
		if (c.kind === 'identifier') return c.missing ? null : c;
	}
	return null;
}
