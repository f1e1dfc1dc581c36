import { type DiagCode, normalizeDiagCode } from './analysisTypes';

export interface ServerSettings {
	definitionsPath: string;
	logFile: string;
	debug: boolean;
	namingConventions: boolean;
	disabledDiagnostics: Set<DiagCode>;
}

export function defaultSettings(): ServerSettings {
	return { definitionsPath: '', logFile: '', debug: false, namingConventions: true, disabledDiagnostics: new Set() };
}

export interface DisabledDiagnostics {
	codes: Set<DiagCode>;
	// entries that name no known diagnostic, as the user wrote them
	unrecognized: string[];
}

// `diagnostics.disable` accepts a list or a comma/space separated string of codes (FRG030) or names (naming-convention).
export function parseDisabledDiagnostics(input: unknown): DisabledDiagnostics {
	const entries: unknown[] = Array.isArray(input)
		? input
		: typeof input === 'string' ? input.split(/[,\s]+/).filter(Boolean) : [];
	const out: DisabledDiagnostics = { codes: new Set(), unrecognized: [] };
	for (const entry of entries) {
		if (typeof entry === 'string' && !entry.trim()) continue;
		const code = typeof entry === 'string' ? normalizeDiagCode(entry) : null;
		if (code) out.codes.add(code);
		else out.unrecognized.push(String(entry));
	}
	return out;
}

function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === 'object' && v !== null && !Array.isArray(v);
}

// Merge client-provided options (initializationOptions or the `frugal` configuration section) over `prev`.
// Keys that are absent or of the wrong type keep their previous value; `warn` hears about disable entries it cannot resolve.
export function readSettings(
	raw: unknown,
	prev: ServerSettings = defaultSettings(),
	warn: (msg: string) => void = () => {},
): ServerSettings {
	const next: ServerSettings = { ...prev, disabledDiagnostics: new Set(prev.disabledDiagnostics) };
	if (!isRecord(raw)) return next;
	if (typeof raw.definitionsPath === 'string') next.definitionsPath = raw.definitionsPath;
	if (typeof raw.logFile === 'string') next.logFile = raw.logFile;
	if (typeof raw.debug === 'boolean') next.debug = raw.debug;
	const diagnostics = raw.diagnostics;
	if (isRecord(diagnostics)) {
		if (diagnostics.disable !== undefined) {
			const { codes, unrecognized } = parseDisabledDiagnostics(diagnostics.disable);
			next.disabledDiagnostics = codes;
			if (unrecognized.length) warn(`ignoring unknown diagnostics in diagnostics.disable: ${unrecognized.join(', ')}`);
		}
		if (typeof diagnostics.namingConventions === 'boolean') next.namingConventions = diagnostics.namingConventions;
	}
	return next;
}

export function setsEqual<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): boolean {
	if (a.size !== b.size) return false;
	for (const v of a) if (!b.has(v)) return false;
	return true;
}
