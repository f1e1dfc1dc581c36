import { URI } from 'vscode-uri';
import type { SyntaxNode } from './ast';
import { parseFrugal, type ParseError } from './ast/parser';
import { LineIndex } from './range';

// One parsed snapshot of a document. Immutable once built; a new text means a new FrugalDocument.
export interface FrugalDocument {
	uri: string;
	source: string;
	// null when no tree could be produced for the snapshot
	tree: SyntaxNode | null;
	parseErrors: ParseError[];
	lines: LineIndex;
}

// Open documents keyed by URI; iteration order is insertion order.
export type DocumentSet = ReadonlyMap<string, FrugalDocument>;

// `baseTypes` normally comes from the loaded language definitions.
export function parseDocument(uri: string, source: string, baseTypes?: ReadonlySet<string>): FrugalDocument {
	const { tree, errors } = parseFrugal(source, baseTypes);
	return { uri, source, tree, parseErrors: errors, lines: new LineIndex(source) };
}

export function isFrugalFile(uri: string): boolean {
	return URI.parse(uri).path.endsWith('.frugal');
}
