import { DiagnosticSeverity } from 'vscode-languageserver/node';
import { type SyntaxNode, childrenOfKind, findAll, nodeText, nodeToRange, walk } from './ast';
import { type Diag, type DiagCode, FRUGAL_DIAGCODES } from './analysisTypes';
import type { Defs } from './defs';
import type { FrugalDocument } from './document';
import { pointRange } from './range';
import { extractSymbols, type TopLevelKind, type TopLevelSymbol } from './symbols';

export interface DiagnosticsOptions {
	namingConventions?: boolean;
	// codes left out of the result
	disabled?: ReadonlySet<DiagCode>;
}

// All passes over one document, concatenated in a fixed order.
export function computeDiagnostics(doc: FrugalDocument, defs: Defs, opts: DiagnosticsOptions = {}): Diag[] {
	const out: Diag[] = [];
	out.push(...parseErrorDiagnostics(doc));
	out.push(...duplicateDefinitionDiagnostics(doc));
	out.push(...fieldIdDiagnostics(doc));
	if (opts.namingConventions !== false) out.push(...namingConventionDiagnostics(doc));
	out.push(...unknownTypeDiagnostics(doc, defs));
	const disabled = opts.disabled;
	return disabled?.size ? out.filter(d => !disabled.has(d.code)) : out;
}

export function parseErrorDiagnostics(doc: FrugalDocument): Diag[] {
	return doc.parseErrors.map(e => ({
		range: pointRange(e.line, e.column),
		message: e.message,
		severity: DiagnosticSeverity.Error,
		code: FRUGAL_DIAGCODES.SYNTAX,
		related: [],
	}));
}

export function duplicateDefinitionDiagnostics(doc: FrugalDocument): Diag[] {
	const out: Diag[] = [];
	const first = new Map<string, TopLevelSymbol>();
	for (const sym of extractSymbols(doc.tree, doc.source)) {
		const key = `${sym.kind}\u0000${sym.name}`;
		const prev = first.get(key);
		if (!prev) { first.set(key, sym); continue; }
		out.push({
			range: sym.declarationRange,
			message: `Duplicate ${sym.kind} definition '${sym.name}'`,
			severity: DiagnosticSeverity.Error,
			code: FRUGAL_DIAGCODES.DUPLICATE_DEFINITION,
			related: [{
				location: { uri: doc.uri, range: prev.declarationRange },
				message: `First definition of '${sym.name}' here`,
			}],
		});
	}
	return out;
}

// ---- field identifiers ----

const FIELD_ID_RE = /^[+-]?\d+$/;

// Numeric value and node of a field's ID; null when absent, not a decimal integer, or out of range.
function fieldIdOf(field: SyntaxNode, source: string): { value: number; node: SyntaxNode } | null {
	const fieldId = childrenOfKind(field, 'field_id')[0];
	const idNode = fieldId ? childrenOfKind(fieldId, 'integer')[0] : undefined;
	if (!idNode || idNode.missing) return null;
	const text = nodeText(idNode, source);
	if (!FIELD_ID_RE.test(text)) return null;
	const value = Number.parseInt(text, 10);
	if (!Number.isSafeInteger(value)) return null;
	return { value, node: idNode };
}

function checkFieldNamespace(doc: FrugalDocument, fields: SyntaxNode[], suffix: string, out: Diag[]) {
	const seen = new Map<number, SyntaxNode>();
	for (const field of fields) {
		const id = fieldIdOf(field, doc.source);
		if (!id) continue;
		const prev = seen.get(id.value);
		if (prev) {
			out.push({
				range: nodeToRange(id.node),
				message: `Duplicate field ID ${id.value}${suffix}`,
				severity: DiagnosticSeverity.Error,
				code: FRUGAL_DIAGCODES.DUPLICATE_FIELD_ID,
				related: [{
					location: { uri: doc.uri, range: nodeToRange(prev) },
					message: `Field ID ${id.value} first used here`,
				}],
			});
		} else {
			seen.set(id.value, id.node);
		}
		if (id.value < 1) {
			out.push({
				range: nodeToRange(id.node),
				message: `Field ID must be positive, got ${id.value}`,
				severity: DiagnosticSeverity.Error,
				code: FRUGAL_DIAGCODES.INVALID_FIELD_ID,
				related: [],
			});
		}
	}
}

// A field list preceded by a `throws` sibling is the throws clause.
function isThrowsList(list: SyntaxNode): boolean {
	const parent = list.parent;
	if (!parent) return false;
	for (const sibling of parent.children) {
		if (sibling === list) return false;
		if (sibling.kind === 'throws') return true;
	}
	return false;
}

// Struct and exception bodies are one namespace each; a function has separate parameter and throws namespaces.
export function fieldIdDiagnostics(doc: FrugalDocument): Diag[] {
	const out: Diag[] = [];
	if (!doc.tree) return out;
	walk(doc.tree, n => {
		if (n.kind === 'struct_body') {
			checkFieldNamespace(doc, childrenOfKind(n, 'field'), '', out);
		} else if (n.kind === 'function_definition') {
			for (const list of childrenOfKind(n, 'field_list')) {
				const suffix = isThrowsList(list) ? ' in throws list' : ' in parameter list';
				checkFieldNamespace(doc, childrenOfKind(list, 'field'), suffix, out);
			}
		}
	});
	return out;
}

// ---- naming ----

export function isPascalCase(name: string): boolean {
	return /^[A-Z]/.test(name) && !/[_\s]/.test(name) && /[a-z]/.test(name);
}

export function isUpperSnakeCase(name: string): boolean {
	return /^[A-Z0-9]+(?:_[A-Z0-9]+)*$/.test(name);
}

const NAMING_RULES: Partial<Record<TopLevelKind, { convention: string; test: (name: string) => boolean }>> = {
	service: { convention: 'PascalCase', test: isPascalCase },
	struct: { convention: 'PascalCase', test: isPascalCase },
	exception: { convention: 'PascalCase', test: isPascalCase },
	enum: { convention: 'PascalCase', test: isPascalCase },
	scope: { convention: 'PascalCase', test: isPascalCase },
	const: { convention: 'UPPER_SNAKE_CASE', test: isUpperSnakeCase },
};

function titleCase(word: string): string {
	return word.charAt(0).toUpperCase() + word.slice(1);
}

export function namingConventionDiagnostics(doc: FrugalDocument): Diag[] {
	const out: Diag[] = [];
	for (const sym of extractSymbols(doc.tree, doc.source)) {
		const rule = NAMING_RULES[sym.kind];
		if (!rule || rule.test(sym.name)) continue;
		out.push({
			range: sym.declarationRange,
			message: `${titleCase(sym.kind)} '${sym.name}' should follow ${rule.convention} naming convention`,
			severity: DiagnosticSeverity.Warning,
			code: FRUGAL_DIAGCODES.NAMING_CONVENTION,
			related: [],
		});
	}
	return out;
}

// ---- type references ----

const TYPE_DEFINING_KINDS = new Set<TopLevelKind>(['struct', 'exception', 'enum', 'typedef']);

export function knownTypes(doc: FrugalDocument, defs: Defs): Set<string> {
	const known = new Set<string>([...defs.baseTypes, ...defs.containerTypes]);
	for (const sym of extractSymbols(doc.tree, doc.source)) {
		if (TYPE_DEFINING_KINDS.has(sym.kind)) known.add(sym.name);
	}
	return known;
}

// Leading name of a field type: its identifier, else its base type. Containers have none.
function leadingTypeName(fieldType: SyntaxNode, source: string): string {
	if (childrenOfKind(fieldType, 'container_type').length) return '';
	const named = childrenOfKind(fieldType, 'identifier')[0] ?? childrenOfKind(fieldType, 'base_type')[0];
	if (!named || named.missing) return '';
	return nodeText(named, source);
}

export function unknownTypeDiagnostics(doc: FrugalDocument, defs: Defs): Diag[] {
	const out: Diag[] = [];
	if (!doc.tree) return out;
	const known = knownTypes(doc, defs);
	for (const fieldType of findAll(doc.tree, 'field_type')) {
		if (fieldType.missing) continue;
		const name = leadingTypeName(fieldType, doc.source);
		// include-qualified names resolve in another file
		if (!name || name.includes('.') || known.has(name)) continue;
		out.push({
			range: nodeToRange(fieldType),
			message: `Unknown type '${name}'`,
			severity: DiagnosticSeverity.Error,
			code: FRUGAL_DIAGCODES.UNKNOWN_TYPE,
			related: [],
		});
	}
	return out;
}
