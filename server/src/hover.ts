import { type Hover, MarkupKind, type Position, type Range } from 'vscode-languageserver/node';
import { URI, Utils } from 'vscode-uri';
import { type SyntaxNode, childrenOfKind, nodeText, nodeToRange } from './ast';
import type { Defs } from './defs';
import type { DocumentSet, FrugalDocument } from './document';
import { leafAt, searchOrder, symbolAt } from './resolver';
import { extractSymbols, memberNodes, type TopLevelKind, type TopLevelSymbol } from './symbols';

const KIND_INFO: Record<TopLevelKind, { title: string; blurb: string; members?: string }> = {
	service: { title: 'Service', blurb: 'Service definition with RPC methods.', members: 'Methods' },
	scope: { title: 'Scope', blurb: 'Pub/sub scope for event messaging.', members: 'Events' },
	struct: { title: 'Struct', blurb: 'Data structure definition.', members: 'Fields' },
	enum: { title: 'Enum', blurb: 'Enumeration type.', members: 'Values' },
	const: { title: 'Constant', blurb: 'Constant value.' },
	typedef: { title: 'Type Alias', blurb: 'Type alias definition.' },
	exception: { title: 'Exception', blurb: 'Exception type definition.', members: 'Fields' },
};

function markdown(parts: string[], range: Range): Hover {
	return { contents: { kind: MarkupKind.Markdown, value: parts.join('\n') }, range };
}

// Source text of a node on one line, without a trailing separator.
function flatText(node: SyntaxNode | undefined, source: string): string {
	return nodeText(node, source).replace(/\s+/g, ' ').replace(/\s*[,;]$/, '').trim();
}

function signatureLine(sym: TopLevelSymbol, source: string): string | null {
	const type = flatText(childrenOfKind(sym.node, 'field_type')[0], source);
	if (sym.kind === 'const') {
		const value = flatText(childrenOfKind(sym.node, 'const_value')[0], source);
		return `\`${type} ${sym.name} = ${value}\``;
	}
	if (sym.kind === 'typedef') return `\`${sym.name}\` → \`${type}\``;
	return null;
}

function symbolHover(sym: TopLevelSymbol, owner: FrugalDocument, originUri: string, range: Range): Hover {
	const info = KIND_INFO[sym.kind];
	const parts = [`**${info.title}**: \`${sym.name}\``, '', info.blurb];
	const signature = signatureLine(sym, owner.source);
	if (signature) parts.push('', signature);
	if (info.members) {
		const items = memberNodes(sym).map(n => flatText(n, owner.source)).filter(Boolean);
		parts.push('', `**${info.members}:**`);
		if (items.length) parts.push(...items.map(t => `- \`${t}\``));
		else parts.push('None defined.');
	}
	const at = `line ${sym.declarationRange.start.line + 1}, column ${sym.declarationRange.start.character + 1}`;
	const where = owner.uri === originUri ? at : `${at} of \`${Utils.basename(URI.parse(owner.uri))}\``;
	parts.push('', `*Defined at ${where}*`);
	return markdown(parts, range);
}

function builtinHover(word: string, node: SyntaxNode, defs: Defs): Hover | null {
	const doc = defs.docFor(word);
	if (!doc) return null;
	const title = defs.isBuiltinType(word) ? 'Type' : 'Keyword';
	return markdown([`**${title}**: \`${word}\``, '', doc], nodeToRange(node));
}

// Hover for a user symbol (first top-level definition of that name, origin document first),
// a builtin type or a keyword.
export function frugalHover(
	doc: FrugalDocument,
	position: Position,
	defs: Defs,
	documentSet: DocumentSet = new Map(),
): Hover | null {
	const target = symbolAt(doc, position);
	if (target) {
		if (target.node.kind === 'base_type') return builtinHover(target.name, target.node, defs);
		for (const d of searchOrder(doc, documentSet)) {
			const sym = extractSymbols(d.tree, d.source).find(s => s.name === target.name);
			if (sym) return symbolHover(sym, d, doc.uri, target.range);
		}
		return null;
	}
	const leaf = leafAt(doc, position);
	if (!leaf || leaf.named || leaf.missing) return null;
	return builtinHover(nodeText(leaf, doc.source), leaf, defs);
}
