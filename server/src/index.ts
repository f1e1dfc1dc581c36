import {
	createConnection,
	TextDocuments,
	Diagnostic,
	ProposedFeatures,
	InitializeParams,
	DidChangeConfigurationNotification,
	TextDocumentSyncKind,
	InitializeResult,
	ResponseError,
	ErrorCodes,
	type Connection,
} from 'vscode-languageserver/node';
import 'source-map-support/register.js';
import fs from 'node:fs';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { Defs, loadDefs } from './defs';
import type { Diag } from './analysisTypes';
import { computeDiagnostics } from './diagnostics';
import { type DocumentSet, type FrugalDocument, isFrugalFile, parseDocument } from './document';
import { frugalHover } from './hover';
import { documentHighlights, prepareRename, rename } from './navigation';
import { findDefinition, findReferences } from './resolver';
import { readSettings, defaultSettings, setsEqual, type ServerSettings } from './settings';
import { documentSymbols, workspaceSymbols } from './symbols';

const LOG_PREFIX = '[frugal-lsp]';

const connection: Connection = createConnection(ProposedFeatures.all);
const documents = new TextDocuments(TextDocument);

let defs: Defs | null = null;
let settings: ServerSettings = defaultSettings();

function appendLog(line: string) {
	if (!settings.logFile) return;
	try {
		fs.appendFileSync(settings.logFile, `${new Date().toISOString()} ${line}\n`);
	} catch (err) {
		if (settings.debug) console.warn(`${LOG_PREFIX} failed to append log file`, err);
	}
}

function logInfo(msg: string) {
	connection.console.log(`${LOG_PREFIX} ${msg}`);
	appendLog(msg);
}

function logWarning(msg: string) {
	connection.console.warn(`${LOG_PREFIX} ${msg}`);
	appendLog(`warning: ${msg}`);
}

function logError(msg: string) {
	connection.console.error(`${LOG_PREFIX} ${msg}`);
	appendLog(`error: ${msg}`);
}

// -----------------------------------
// Per-version parse cache (one entry per open document)
// -----------------------------------
type CacheEntry = { version: number; doc: FrugalDocument };
const parseCache = new Map<string, CacheEntry>();

function getParsed(doc: TextDocument): FrugalDocument {
	const hit = parseCache.get(doc.uri);
	if (hit && hit.version === doc.version) return hit.doc;
	const parsed = parseDocument(doc.uri, doc.getText(), defs?.baseTypes);
	parseCache.set(doc.uri, { version: doc.version, doc: parsed });
	return parsed;
}

// Snapshot of every open Frugal document, in the order the client opened them.
function openDocumentSet(): DocumentSet {
	const set = new Map<string, FrugalDocument>();
	for (const d of documents.all()) {
		if (isFrugalFile(d.uri)) set.set(d.uri, getParsed(d));
	}
	return set;
}

async function loadDefinitions(requested: string): Promise<Defs> {
	try {
		return await loadDefs(requested);
	} catch (e) {
		if (!requested) throw e;
		logError(`failed to load definitions from "${requested}", using bundled file: ${String(e)}`);
		return loadDefs('');
	}
}

function toDiagnostic(d: Diag): Diagnostic {
	const out: Diagnostic = {
		range: d.range,
		severity: d.severity,
		message: d.message,
		source: 'frugal-lsp',
		code: d.code,
	};
	if (d.related.length) out.relatedInformation = d.related;
	return out;
}

async function validateTextDocument(doc: TextDocument) {
	if (!defs || !isFrugalFile(doc.uri)) return;
	const parsed = getParsed(doc);
	const diags = computeDiagnostics(parsed, defs, {
		namingConventions: settings.namingConventions,
		disabled: settings.disabledDiagnostics,
	});
	try {
		await connection.sendDiagnostics({ uri: doc.uri, diagnostics: diags.map(toDiagnostic) });
	} catch (e) {
		logError(`sendDiagnostics failed for ${doc.uri}: ${String(e)}`);
	}
}

async function revalidateAllOpenDocs() {
	for (const d of documents.all()) await validateTextDocument(d);
}

connection.onInitialize(async (params: InitializeParams): Promise<InitializeResult> => {
	settings = readSettings(params.initializationOptions, settings, logWarning);
	appendLog('initialize');
	defs = await loadDefinitions(settings.definitionsPath);
	logInfo(`loaded language definitions version ${defs.file.version}`);
	return {
		capabilities: {
			textDocumentSync: TextDocumentSyncKind.Incremental,
			definitionProvider: true,
			referencesProvider: true,
			documentHighlightProvider: true,
			hoverProvider: true,
			documentSymbolProvider: true,
			workspaceSymbolProvider: true,
			renameProvider: { prepareProvider: true },
		},
	};
});

connection.onInitialized(() => {
	connection.client.register(DidChangeConfigurationNotification.type, undefined)
		.catch(e => logError(`configuration registration failed: ${String(e)}`));
});

connection.onDidChangeConfiguration(async change => {
	const raw: unknown = change.settings;
	const section = typeof raw === 'object' && raw !== null && 'frugal' in raw ? raw.frugal : undefined;
	const prev = settings;
	settings = readSettings(section, prev, logWarning);
	if (settings.definitionsPath !== prev.definitionsPath) {
		logInfo(`definitions path changed: reloading`);
		defs = await loadDefinitions(settings.definitionsPath);
		// cached trees were lexed with the previous base types
		parseCache.clear();
	}
	const changed = settings.definitionsPath !== prev.definitionsPath
		|| settings.namingConventions !== prev.namingConventions
		|| !setsEqual(settings.disabledDiagnostics, prev.disabledDiagnostics);
	if (changed) await revalidateAllOpenDocs();
});

documents.onDidChangeContent(async change => {
	await validateTextDocument(change.document);
});

documents.onDidClose(e => {
	parseCache.delete(e.document.uri);
	connection.sendDiagnostics({ uri: e.document.uri, diagnostics: [] })
		.catch(err => logError(`clearing diagnostics failed: ${String(err)}`));
});

// --------------------
// Navigation providers
// --------------------
connection.onReferences((params, token) => {
	if (token?.isCancellationRequested) return [];
	const doc = documents.get(params.textDocument.uri); if (!doc) return [];
	const includeDecl = !!params.context?.includeDeclaration;
	return findReferences(getParsed(doc), params.position, includeDecl, openDocumentSet());
});

connection.onDefinition((params, token) => {
	if (token?.isCancellationRequested) return [];
	const doc = documents.get(params.textDocument.uri); if (!doc) return [];
	return findDefinition(getParsed(doc), params.position, openDocumentSet());
});

connection.onDocumentHighlight((params, token) => {
	if (token?.isCancellationRequested) return [];
	const doc = documents.get(params.textDocument.uri); if (!doc) return [];
	return documentHighlights(getParsed(doc), params.position);
});

connection.onHover((params, token) => {
	if (token?.isCancellationRequested) return null;
	const doc = documents.get(params.textDocument.uri); if (!doc || !defs) return null;
	return frugalHover(getParsed(doc), params.position, defs, openDocumentSet());
});

connection.onDocumentSymbol((params, token) => {
	if (token?.isCancellationRequested) return [];
	const doc = documents.get(params.textDocument.uri); if (!doc) return [];
	return documentSymbols(getParsed(doc));
});

connection.onWorkspaceSymbol((params, token) => {
	if (token?.isCancellationRequested) return [];
	return workspaceSymbols(params.query, openDocumentSet().values());
});

// -----------------
// Rename providers
// -----------------
connection.onPrepareRename((params, token) => {
	if (token?.isCancellationRequested) return null;
	const doc = documents.get(params.textDocument.uri); if (!doc || !defs) return null;
	const res = prepareRename(getParsed(doc), params.position, defs);
	if (!res.ok) return new ResponseError(ErrorCodes.InvalidRequest, res.message);
	return { range: res.range, placeholder: res.placeholder };
});

connection.onRenameRequest((params, token) => {
	if (token?.isCancellationRequested) return null;
	const doc = documents.get(params.textDocument.uri); if (!doc || !defs) return null;
	const res = rename(getParsed(doc), params.position, params.newName, openDocumentSet(), defs);
	if (!res.ok) {
		if (settings.debug) console.warn(`${LOG_PREFIX} rename rejected: ${res.message}`);
		return new ResponseError(ErrorCodes.InvalidRequest, res.message);
	}
	return res.edit;
});

documents.listen(connection);
connection.listen();

// -----------------
// Lifecycle hooks
// -----------------
connection.onShutdown(() => {
	logInfo('onShutdown: clearing caches');
	parseCache.clear();
});

connection.onExit(() => {
	appendLog('onExit: terminating process');
	process.exit(0);
});
