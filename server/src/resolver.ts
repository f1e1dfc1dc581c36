import type { Location, Position, Range } from 'vscode-languageserver/node';
import { type SyntaxNode, nodeText, nodeToRange, walk } from './ast';
import { classifyIdentifier } from './classify';
import type { DocumentSet, FrugalDocument } from './document';
import { locationKey } from './range';

export interface ResolvedSymbol {
	name: string;
	range: Range;
	node: SyntaxNode;
}

function isNameBearing(n: SyntaxNode): boolean {
	return !n.missing && (n.kind === 'identifier' || n.kind === 'base_type');
}

// Most specific node whose span contains the offset (end exclusive).
function deepestAt(root: SyntaxNode, offset: number): SyntaxNode | null {
	if (offset < root.startIndex || offset >= root.endIndex) return null;
	let cur = root;
	for (;;) {
		const next = cur.children.find(c => c.startIndex <= offset && offset < c.endIndex);
		if (!next) return cur;
		cur = next;
	}
}

function nameNodeAt(root: SyntaxNode, offset: number): SyntaxNode | null {
	const hit = deepestAt(root, offset);
	if (!hit) return null;
	if (isNameBearing(hit)) return hit;
	const child = hit.children.find(c => isNameBearing(c) && c.startIndex <= offset && offset <= c.endIndex);
	if (child) return child;
	if (hit.parent && isNameBearing(hit.parent)) return hit.parent;
	return null;
}

// Token leaf under the cursor, or the one just before it.
export function leafAt(doc: FrugalDocument, position: Position): SyntaxNode | null {
	if (!doc.tree) return null;
	const offset = doc.lines.offsetAt(position);
	if (offset === null) return null;
	const hit = deepestAt(doc.tree, offset);
	if (hit && !hit.children.length) return hit;
	const before = offset > 0 ? deepestAt(doc.tree, offset - 1) : null;
	return before && !before.children.length ? before : null;
}

// Identifier (or base type) under the cursor. A cursor just past the end of a word still resolves to it.
export function symbolAt(doc: FrugalDocument, position: Position): ResolvedSymbol | null {
	if (!doc.tree) return null;
	const offset = doc.lines.offsetAt(position);
	if (offset === null) return null;
	let node = nameNodeAt(doc.tree, offset);
	if (!node && offset > 0) node = nameNodeAt(doc.tree, offset - 1);
	if (!node) return null;
	const name = nodeText(node, doc.source);
	if (!name) return null;
	return { name, range: nodeToRange(node), node };
}

// Every identifier in the document whose text is exactly `name`, in tree pre-order.
export function occurrences(doc: FrugalDocument, name: string): SyntaxNode[] {
	const out: SyntaxNode[] = [];
	if (!doc.tree) return out;
	walk(doc.tree, n => {
		if (n.kind === 'identifier' && !n.missing && nodeText(n, doc.source) === name) out.push(n);
	});
	return out;
}

// The origin document first, then the set in its own order; a set entry for the origin URI is not searched twice.
export function searchOrder(doc: FrugalDocument, documentSet: DocumentSet): FrugalDocument[] {
	const out = [doc];
	for (const d of documentSet.values()) {
		if (d.uri !== doc.uri) out.push(d);
	}
	return out;
}

function collectLocations(name: string, docs: FrugalDocument[], keep: (n: SyntaxNode) => boolean): Location[] {
	const out: Location[] = [];
	const seen = new Set<string>();
	for (const d of docs) {
		for (const n of occurrences(d, name)) {
			if (!keep(n)) continue;
			const loc: Location = { uri: d.uri, range: nodeToRange(n) };
			const key = locationKey(loc.uri, loc.range);
			if (seen.has(key)) continue;
			seen.add(key);
			out.push(loc);
		}
	}
	return out;
}

const isDeclaration = (n: SyntaxNode) => classifyIdentifier(n).isDeclaration;

// The single location left out of a reference list: the origin when it declares the name, else the first declaration found.
function declarationToSkip(target: ResolvedSymbol, doc: FrugalDocument, docs: FrugalDocument[]): Location | null {
	if (target.node.kind === 'identifier' && isDeclaration(target.node)) {
		return { uri: doc.uri, range: target.range };
	}
	return collectLocations(target.name, docs, isDeclaration)[0] ?? null;
}

export function findReferences(
	doc: FrugalDocument,
	position: Position,
	includeDeclaration: boolean,
	documentSet: DocumentSet,
): Location[] {
	const target = symbolAt(doc, position);
	if (!target) return [];
	const docs = searchOrder(doc, documentSet);
	const all = collectLocations(target.name, docs, () => true);
	if (includeDeclaration) return all;
	const skip = declarationToSkip(target, doc, docs);
	if (!skip) return all;
	const skipKey = locationKey(skip.uri, skip.range);
	return all.filter(l => locationKey(l.uri, l.range) !== skipKey);
}

// Declarations of the name under the cursor.
export function findDefinition(doc: FrugalDocument, position: Position, documentSet: DocumentSet): Location[] {
	const target = symbolAt(doc, position);
	if (!target) return [];
	return collectLocations(target.name, searchOrder(doc, documentSet), isDeclaration);
}
