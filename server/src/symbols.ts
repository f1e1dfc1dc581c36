import { DocumentSymbol, Range, SymbolInformation, SymbolKind } from 'vscode-languageserver/node';
import { type SyntaxNode, type DefinitionKind, isDefinitionKind, nameNodeOf, nodeText, nodeToRange, walk } from './ast';
import { type FrugalDocument, isFrugalFile } from './document';
import { AssertNever } from './utils';

export type TopLevelKind = 'service' | 'scope' | 'struct' | 'enum' | 'const' | 'typedef' | 'exception';
export type FrugalSymbolKind = TopLevelKind | 'field' | 'parameter' | 'enum_value' | 'method';

export interface FrugalSymbol {
	name: string;
	kind: FrugalSymbolKind;
	// name token only
	declarationRange: Range;
	// whole construct, body included
	fullRange: Range;
	node: SyntaxNode;
}

export type TopLevelSymbol = FrugalSymbol & { kind: TopLevelKind };

export const DEFINITION_SYMBOL_KIND: Record<DefinitionKind, TopLevelKind> = {
	service_definition: 'service',
	scope_definition: 'scope',
	struct_definition: 'struct',
	enum_definition: 'enum',
	const_definition: 'const',
	typedef_definition: 'typedef',
	exception_definition: 'exception',
};

// Top-level definitions in pre-order. Definitions whose name slot is empty are skipped.
export function extractSymbols(tree: SyntaxNode | null, source: string): TopLevelSymbol[] {
	const out: TopLevelSymbol[] = [];
	if (!tree) return out;
	walk(tree, n => {
		if (!isDefinitionKind(n.kind)) return;
		const id = nameNodeOf(n);
		const name = nodeText(id, source);
		if (id && name) {
			out.push({
				name,
				kind: DEFINITION_SYMBOL_KIND[n.kind],
				declarationRange: nodeToRange(id),
				fullRange: nodeToRange(n),
				node: n,
			});
		}
		return false;
	});
	return out;
}

function lspKindOf(kind: TopLevelKind): SymbolKind {
	switch (kind) {
		case 'service':
		case 'scope':
		case 'exception':
			return SymbolKind.Class;
		case 'struct': return SymbolKind.Struct;
		case 'enum': return SymbolKind.Enum;
		case 'const': return SymbolKind.Constant;
		case 'typedef': return SymbolKind.TypeParameter;
		default: return AssertNever(kind, `unhandled symbol kind ${String(kind)}`);
	}
}

const SYMBOL_DETAIL: Record<TopLevelKind, string> = {
	service: 'Service',
	scope: 'Scope (pub/sub)',
	struct: 'Struct',
	enum: 'Enum',
	const: 'Constant',
	typedef: 'Type Alias',
	exception: 'Exception',
};

type MemberShape = { body: string; item: string; kind: SymbolKind; detail: string };

const MEMBERS: Partial<Record<TopLevelKind, MemberShape>> = {
	service: { body: 'service_body', item: 'function_definition', kind: SymbolKind.Method, detail: 'Method' },
	scope: { body: 'scope_body', item: 'scope_operation', kind: SymbolKind.Event, detail: 'Event' },
	struct: { body: 'struct_body', item: 'field', kind: SymbolKind.Field, detail: 'Field' },
	exception: { body: 'struct_body', item: 'field', kind: SymbolKind.Field, detail: 'Field' },
	enum: { body: 'enum_body', item: 'enum_field', kind: SymbolKind.EnumMember, detail: 'Enum Value' },
};

// Member nodes of a definition (methods, events, fields, enum values) in source order.
export function memberNodes(sym: TopLevelSymbol): SyntaxNode[] {
	const shape = MEMBERS[sym.kind];
	if (!shape) return [];
	const out: SyntaxNode[] = [];
	for (const body of sym.node.children) {
		if (body.kind !== shape.body) continue;
		for (const item of body.children) {
			if (item.kind === shape.item) out.push(item);
		}
	}
	return out;
}

function memberSymbols(sym: TopLevelSymbol, source: string): DocumentSymbol[] {
	const shape = MEMBERS[sym.kind];
	if (!shape) return [];
	const out: DocumentSymbol[] = [];
	for (const item of memberNodes(sym)) {
		const id = nameNodeOf(item);
		const name = nodeText(id, source);
		if (!id || !name) continue;
		out.push(DocumentSymbol.create(name, shape.detail, shape.kind, nodeToRange(item), nodeToRange(id)));
	}
	return out;
}

// Outline for one document: top-level definitions with their members nested underneath.
export function documentSymbols(doc: FrugalDocument): DocumentSymbol[] {
	const out: DocumentSymbol[] = [];
	for (const sym of extractSymbols(doc.tree, doc.source)) {
		out.push(DocumentSymbol.create(
			sym.name,
			SYMBOL_DETAIL[sym.kind],
			lspKindOf(sym.kind),
			sym.fullRange,
			sym.declarationRange,
			memberSymbols(sym, doc.source),
		));
	}
	return out;
}

// Case-insensitive substring match over the top-level symbols of every Frugal document.
export function workspaceSymbols(query: string, docs: Iterable<FrugalDocument>): SymbolInformation[] {
	const needle = query.trim().toLowerCase();
	const out: SymbolInformation[] = [];
	for (const doc of docs) {
		if (!isFrugalFile(doc.uri)) continue;
		for (const sym of extractSymbols(doc.tree, doc.source)) {
			if (needle && !sym.name.toLowerCase().includes(needle)) continue;
			out.push(SymbolInformation.create(sym.name, lspKindOf(sym.kind), sym.fullRange, doc.uri));
		}
	}
	return out;
}
