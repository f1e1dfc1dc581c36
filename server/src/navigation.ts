import { DocumentHighlight, DocumentHighlightKind, Position, Range, TextEdit, WorkspaceEdit } from 'vscode-languageserver/node';
import { nodeText, nodeToRange, walk } from './ast';
import { classifyIdentifier } from './classify';
import type { Defs } from './defs';
import type { DocumentSet, FrugalDocument } from './document';
import { findReferences, occurrences, symbolAt } from './resolver';

export type Check = { ok: true } | { ok: false; message: string };
export type RenameResult = { ok: true; edit: WorkspaceEdit } | { ok: false; message: string };
export type PrepareRenameResult = { ok: true; range: Range; placeholder: string } | { ok: false; message: string };

const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function validateNewName(name: string, defs: Defs): Check {
	if (!name.trim()) return { ok: false, message: 'new name cannot be empty' };
	if (!IDENTIFIER_RE.test(name)) return { ok: false, message: `'${name}' is not a valid identifier` };
	if (defs.isReserved(name)) {
		return { ok: false, message: `'${name}' is a reserved keyword and cannot be used as an identifier` };
	}
	return { ok: true };
}

// Keywords and builtin type names belong to the language, everything else to the user.
export function isRenameable(name: string, defs: Defs): boolean {
	return !defs.isReserved(name);
}

export function prepareRename(doc: FrugalDocument, position: Position, defs: Defs): PrepareRenameResult {
	const target = symbolAt(doc, position);
	if (!target) return { ok: false, message: 'no renameable symbol found at position' };
	if (target.node.kind !== 'identifier' || !isRenameable(target.name, defs)) {
		return { ok: false, message: `symbol ${target.name} cannot be renamed` };
	}
	return { ok: true, range: target.range, placeholder: target.name };
}

export function rename(
	doc: FrugalDocument,
	position: Position,
	newName: string,
	documentSet: DocumentSet,
	defs: Defs,
): RenameResult {
	const target = symbolAt(doc, position);
	if (!target) return { ok: false, message: 'no renameable symbol found at position' };
	if (target.node.kind !== 'identifier' || !isRenameable(target.name, defs)) {
		return { ok: false, message: `symbol ${target.name} cannot be renamed` };
	}
	const valid = validateNewName(newName, defs);
	if (!valid.ok) return valid;
	if (newName === target.name) {
		return { ok: false, message: `new name '${newName}' is the same as current name` };
	}
	const changes: Record<string, TextEdit[]> = {};
	for (const loc of findReferences(doc, position, true, documentSet)) {
		(changes[loc.uri] ||= []).push(TextEdit.replace(loc.range, newName));
	}
	return { ok: true, edit: { changes } };
}

// Occurrences of the name under the cursor within this document only.
export function documentHighlights(doc: FrugalDocument, position: Position): DocumentHighlight[] {
	const target = symbolAt(doc, position);
	if (!target) return [];
	if (target.node.kind === 'base_type') {
		const out: DocumentHighlight[] = [];
		if (!doc.tree) return out;
		walk(doc.tree, n => {
			if (n.kind === 'base_type' && nodeText(n, doc.source) === target.name) {
				out.push(DocumentHighlight.create(nodeToRange(n), DocumentHighlightKind.Text));
			}
		});
		return out;
	}
	return occurrences(doc, target.name).map(n => {
		const c = classifyIdentifier(n);
		return DocumentHighlight.create(nodeToRange(n), c.isDeclaration ? DocumentHighlightKind.Write : DocumentHighlightKind.Read);
	});
}
