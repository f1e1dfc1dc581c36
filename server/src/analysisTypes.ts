import type { DiagnosticRelatedInformation, DiagnosticSeverity, Range } from 'vscode-languageserver/node';

export const FRUGAL_DIAGCODES = {
	SYNTAX: 'FRG000',
	DUPLICATE_DEFINITION: 'FRG010',
	DUPLICATE_FIELD_ID: 'FRG020',
	INVALID_FIELD_ID: 'FRG021',
	NAMING_CONVENTION: 'FRG030',
	UNKNOWN_TYPE: 'FRG040',
} as const;
export type DiagCode = typeof FRUGAL_DIAGCODES[keyof typeof FRUGAL_DIAGCODES];

const DIAG_VALUE_SET = new Set<string>(Object.values(FRUGAL_DIAGCODES));

function isDiagCode(value: string): value is DiagCode {
	return DIAG_VALUE_SET.has(value);
}

// Friendly names derived from the code table; syntax errors (FRG000) keep only their numeric form.
const DIAG_NAME_MAP: Record<string, DiagCode> = (() => {
	const map: Record<string, DiagCode> = {};
	for (const [enumName, code] of Object.entries(FRUGAL_DIAGCODES)) {
		if (code === FRUGAL_DIAGCODES.SYNTAX) continue;
		map[enumName.toLowerCase().replace(/_/g, '-')] = code;
	}
	return map;
})();

export function normalizeDiagCode(raw: string | null | undefined): DiagCode | null {
	if (!raw) return null;
	const trimmed = raw.trim();
	if (!trimmed) return null;
	const upper = trimmed.toUpperCase();
	if (isDiagCode(upper)) return upper;
	const canon = trimmed.toLowerCase().replace(/_/g, '-');
	return DIAG_NAME_MAP[canon] ?? null;
}

export interface Diag {
	range: Range;
	message: string;
	severity: DiagnosticSeverity;
	code: DiagCode;
	// Always present; empty when the diagnostic points nowhere else.
	related: DiagnosticRelatedInformation[];
}
