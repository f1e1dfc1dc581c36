/*
	Recursive-descent parser for Frugal IDL. Builds a concrete syntax tree of SyntaxNode
	values: every consumed token becomes a leaf, unexpected tokens are wrapped in ERROR
	nodes and expected-but-absent tokens become zero-width placeholder (missing) nodes,
	so a tree always comes back, whatever the input.
*/
import { SyntaxNode, walk } from './index';
import { Lexer, CONTAINER_TYPES } from './lexer';
import type { Token } from '../core/tokens';
import { LineIndex } from '../range';

export interface ParseError {
	message: string;
	// 0-based
	line: number;
	column: number;
	offset: number;
}

export interface ParseResult {
	tree: SyntaxNode;
	errors: ParseError[];
}

// `baseTypes` decides which words are builtin types; the lexer's default set applies when omitted.
export function parseFrugal(text: string, baseTypes?: ReadonlySet<string>): ParseResult {
	const P = new Parser(new Lexer(text, baseTypes), text);
	const tree = P.parseDocument();
	const errors = [...collectErrors(tree, text), ...P.lexicalErrors()];
	errors.sort((a, b) => a.offset - b.offset);
	return { tree, errors };
}

// Walks the tree reporting ERROR nodes and parser-inserted placeholders.
function collectErrors(root: SyntaxNode, text: string): ParseError[] {
	const index = new LineIndex(text);
	const out: ParseError[] = [];
	walk(root, n => {
		if (n.isError) {
			out.push({ message: 'Syntax error', line: n.startPosition.row, column: n.startPosition.column, offset: n.startIndex });
		} else if (n.missing) {
			const p = index.pointAt(n.startIndex);
			out.push({ message: `Missing ${n.kind}`, line: p.row, column: p.column, offset: n.startIndex });
		}
	});
	return out;
}

const DEFINITION_KEYWORDS = new Set(['const', 'typedef', 'enum', 'struct', 'exception', 'service', 'scope']);
const HEADER_KEYWORDS = new Set(['include', 'namespace']);
const CONTAINER_SET = new Set<string>(CONTAINER_TYPES);

class Parser {
	private readonly lx: Lexer;
	private readonly src: string;
	private readonly index: LineIndex;
	private lastEnd = 0;
	private readonly commentErrors: ParseError[] = [];

	constructor(lx: Lexer, src: string) {
		this.lx = lx;
		this.src = src;
		this.index = new LineIndex(src);
	}

	lexicalErrors(): ParseError[] {
		return this.commentErrors;
	}

	// ---- token access ----

	// Comments never reach the grammar; an unterminated one is reported as it is skipped.
	private peek(): Token {
		let t = this.lx.peek();
		while (t.kind === 'comment-line' || t.kind === 'comment-block') {
			if (t.unterminated) {
				const p = this.index.pointAt(t.span.start);
				this.commentErrors.push({ message: 'Unterminated block comment', line: p.row, column: p.column, offset: t.span.start });
			}
			this.lx.next();
			t = this.lx.peek();
		}
		return t;
	}

	private next(): Token {
		this.peek();
		const t = this.lx.next();
		if (t.kind !== 'eof') this.lastEnd = t.span.end;
		return t;
	}

	private at(kind: Token['kind'], value?: string): boolean {
		const t = this.peek();
		return t.kind === kind && (value === undefined || t.value === value);
	}

	private atEof(): boolean { return this.peek().kind === 'eof'; }

	private atTopLevelStart(): boolean {
		const t = this.peek();
		return t.kind === 'keyword' && (DEFINITION_KEYWORDS.has(t.value) || HEADER_KEYWORDS.has(t.value));
	}

	// ---- node builders ----

	private leaf(t: Token, kind?: string): SyntaxNode {
		return new SyntaxNode({
			kind: kind ?? t.value,
			named: kind !== undefined,
			span: t.span,
			start: this.index.pointAt(t.span.start),
			end: this.index.pointAt(t.span.end),
		});
	}

	private node(kind: string, children: SyntaxNode[]): SyntaxNode {
		const first = children[0];
		const last = children[children.length - 1];
		const start = first ? first.startIndex : this.lastEnd;
		const end = last ? last.endIndex : start;
		return new SyntaxNode({
			kind,
			named: true,
			span: { start, end },
			start: this.index.pointAt(start),
			end: this.index.pointAt(end),
			children,
		});
	}

	private missingNode(kind: string, named: boolean): SyntaxNode {
		const at = this.lastEnd;
		const p = this.index.pointAt(at);
		return new SyntaxNode({ kind, named, missing: true, span: { start: at, end: at }, start: p, end: p });
	}

	// Consume the expected token, or insert a placeholder without consuming anything.
	private expect(kind: Token['kind'], value: string | undefined, nodeKind?: string): SyntaxNode {
		if (this.at(kind, value)) return this.leaf(this.next(), nodeKind);
		return this.missingNode(nodeKind ?? value ?? kind, nodeKind !== undefined);
	}

	private expectPunct(value: string): SyntaxNode {
		return this.expect('punct', value);
	}

	private expectIdentifier(): SyntaxNode {
		return this.expect('id', undefined, 'identifier');
	}

	private optionalPunct(out: SyntaxNode[], value: string): boolean {
		if (!this.at('punct', value)) return false;
		out.push(this.leaf(this.next()));
		return true;
	}

	private optionalSeparator(out: SyntaxNode[]) {
		if (!this.optionalPunct(out, ',')) this.optionalPunct(out, ';');
	}

	// Wrap unexpected tokens into one ERROR node; always consumes at least one token.
	private errorUntil(isSync: () => boolean): SyntaxNode {
		const skipped: SyntaxNode[] = [this.leaf(this.next())];
		while (!this.atEof() && !isSync()) skipped.push(this.leaf(this.next()));
		return this.node('ERROR', skipped);
	}

	// ---- grammar ----

	parseDocument(): SyntaxNode {
		const children: SyntaxNode[] = [];
		while (!this.atEof()) {
			const t = this.peek();
			if (t.kind === 'keyword') {
				const def = this.parseTopLevel(t.value);
				if (def) { children.push(def); continue; }
			}
			children.push(this.errorUntil(() => this.atTopLevelStart()));
		}
		return new SyntaxNode({
			kind: 'document',
			named: true,
			span: { start: 0, end: this.src.length },
			start: this.index.pointAt(0),
			end: this.index.pointAt(this.src.length),
			children,
		});
	}

	private parseTopLevel(keyword: string): SyntaxNode | null {
		switch (keyword) {
			case 'include': return this.parseInclude();
			case 'namespace': return this.parseNamespace();
			case 'const': return this.parseConst();
			case 'typedef': return this.parseTypedef();
			case 'enum': return this.parseEnum();
			case 'struct': return this.parseStructLike('struct_definition');
			case 'exception': return this.parseStructLike('exception_definition');
			case 'service': return this.parseService();
			case 'scope': return this.parseScope();
			default: return null;
		}
	}

	private parseInclude(): SyntaxNode {
		const children = [this.leaf(this.next())];
		children.push(this.expect('string', undefined, 'string_literal'));
		return this.node('include_statement', children);
	}

	private parseNamespace(): SyntaxNode {
		const children = [this.leaf(this.next())];
		const t = this.peek();
		if (t.kind === 'id' || t.kind === 'keyword' || t.kind === 'base-type' || (t.kind === 'punct' && t.value === '*')) {
			children.push(this.leaf(this.next(), 'namespace_scope'));
		} else {
			children.push(this.missingNode('namespace_scope', true));
		}
		children.push(this.expectIdentifier());
		return this.node('namespace_declaration', children);
	}

	private parseConst(): SyntaxNode {
		const children = [this.leaf(this.next())];
		children.push(this.parseFieldType());
		children.push(this.expectIdentifier());
		children.push(this.expectPunct('='));
		children.push(this.parseConstValue());
		this.optionalSeparator(children);
		return this.node('const_definition', children);
	}

	private parseTypedef(): SyntaxNode {
		const children = [this.leaf(this.next())];
		children.push(this.parseFieldType());
		children.push(this.expectIdentifier());
		this.optionalAnnotations(children);
		this.optionalSeparator(children);
		return this.node('typedef_definition', children);
	}

	private parseEnum(): SyntaxNode {
		const children = [this.leaf(this.next())];
		children.push(this.expectIdentifier());
		children.push(this.parseBody('enum_body', () => this.at('id'), () => this.parseEnumField()));
		this.optionalAnnotations(children);
		return this.node('enum_definition', children);
	}

	private parseEnumField(): SyntaxNode {
		const children = [this.leaf(this.next(), 'identifier')];
		if (this.optionalPunct(children, '=')) {
			children.push(this.expect('integer', undefined, 'integer'));
		}
		this.optionalAnnotations(children);
		this.optionalSeparator(children);
		return this.node('enum_field', children);
	}

	private parseStructLike(kind: string): SyntaxNode {
		const children = [this.leaf(this.next())];
		children.push(this.expectIdentifier());
		children.push(this.parseBody('struct_body', () => this.atFieldStart(), () => this.parseField()));
		this.optionalAnnotations(children);
		return this.node(kind, children);
	}

	private parseService(): SyntaxNode {
		const children = [this.leaf(this.next())];
		children.push(this.expectIdentifier());
		if (this.at('keyword', 'extends')) {
			children.push(this.leaf(this.next()));
			children.push(this.expectIdentifier());
		}
		children.push(this.parseBody('service_body', () => this.atFunctionStart(), () => this.parseFunction()));
		this.optionalAnnotations(children);
		return this.node('service_definition', children);
	}

	private parseScope(): SyntaxNode {
		const children = [this.leaf(this.next())];
		children.push(this.expectIdentifier());
		if (this.at('keyword', 'prefix')) {
			children.push(this.leaf(this.next()));
			const prefix = this.expect('string', undefined, 'string_literal');
			children.push(prefix.missing ? prefix : this.node('scope_prefix', [prefix]));
		}
		children.push(this.parseBody('scope_body', () => this.at('id'), () => this.parseScopeOperation()));
		this.optionalAnnotations(children);
		return this.node('scope_definition', children);
	}

	private parseScopeOperation(): SyntaxNode {
		const children = [this.leaf(this.next(), 'identifier')];
		children.push(this.expectPunct(':'));
		children.push(this.parseFieldType());
		this.optionalAnnotations(children);
		this.optionalSeparator(children);
		return this.node('scope_operation', children);
	}

	// '{' item* '}' with recovery: a top-level keyword ends the body early (the '}' is reported missing).
	private parseBody(kind: string, atItem: () => boolean, parseItem: () => SyntaxNode): SyntaxNode {
		const children = [this.expectPunct('{')];
		if (children[0]!.missing) return this.node(kind, children);
		while (!this.atEof() && !this.at('punct', '}') && !this.atTopLevelStart()) {
			if (atItem()) { children.push(parseItem()); continue; }
			children.push(this.errorUntil(() => this.at('punct', '}') || this.atTopLevelStart() || atItem()));
		}
		children.push(this.expectPunct('}'));
		return this.node(kind, children);
	}

	private atTypeStart(): boolean {
		const t = this.peek();
		if (t.kind === 'id' || t.kind === 'base-type') return true;
		return t.kind === 'keyword' && CONTAINER_SET.has(t.value);
	}

	private atFieldStart(): boolean {
		const t = this.peek();
		if (t.kind === 'integer') return true;
		if (t.kind === 'keyword' && (t.value === 'required' || t.value === 'optional')) return true;
		return this.atTypeStart();
	}

	private atFunctionStart(): boolean {
		const t = this.peek();
		if (t.kind === 'keyword' && (t.value === 'oneway' || t.value === 'void')) return true;
		return this.atTypeStart();
	}

	private parseField(): SyntaxNode {
		const children: SyntaxNode[] = [];
		if (this.at('integer')) {
			const id = this.leaf(this.next(), 'integer');
			children.push(this.node('field_id', [id, this.expectPunct(':')]));
		}
		const t = this.peek();
		if (t.kind === 'keyword' && (t.value === 'required' || t.value === 'optional')) {
			children.push(this.node('field_requiredness', [this.leaf(this.next())]));
		}
		children.push(this.parseFieldType());
		children.push(this.expectIdentifier());
		if (this.optionalPunct(children, '=')) children.push(this.parseConstValue());
		this.optionalAnnotations(children);
		this.optionalSeparator(children);
		return this.node('field', children);
	}

	private parseFunction(): SyntaxNode {
		const children: SyntaxNode[] = [];
		if (this.at('keyword', 'oneway')) children.push(this.leaf(this.next()));
		if (this.at('keyword', 'void')) {
			children.push(this.node('return_type', [this.leaf(this.next())]));
		} else {
			children.push(this.node('return_type', [this.parseFieldType()]));
		}
		children.push(this.expectIdentifier());
		this.parseFieldListInParens(children);
		if (this.at('keyword', 'throws')) {
			children.push(this.leaf(this.next()));
			this.parseFieldListInParens(children);
		}
		this.optionalAnnotations(children);
		this.optionalSeparator(children);
		return this.node('function_definition', children);
	}

	private parseFieldListInParens(out: SyntaxNode[]) {
		const open = this.expectPunct('(');
		out.push(open);
		if (open.missing) return;
		const fields: SyntaxNode[] = [];
		const stop = () => this.at('punct', ')') || this.at('punct', '}') || this.atTopLevelStart();
		while (!this.atEof() && !stop()) {
			if (this.atFieldStart()) { fields.push(this.parseField()); continue; }
			fields.push(this.errorUntil(() => stop() || this.atFieldStart()));
		}
		out.push(this.node('field_list', fields));
		out.push(this.expectPunct(')'));
	}

	private parseFieldType(): SyntaxNode {
		const t = this.peek();
		if (t.kind === 'id') return this.node('field_type', [this.leaf(this.next(), 'identifier')]);
		if (t.kind === 'base-type') {
			return this.node('field_type', [this.leaf(this.next(), 'base_type')]);
		}
		if (t.kind === 'keyword' && CONTAINER_SET.has(t.value)) {
			const children = [this.leaf(this.next()), this.expectPunct('<'), this.parseFieldType()];
			if (t.value === 'map') {
				children.push(this.expectPunct(','));
				children.push(this.parseFieldType());
			}
			children.push(this.expectPunct('>'));
			return this.node('field_type', [this.node('container_type', children)]);
		}
		return this.missingNode('field_type', true);
	}

	private parseConstValue(): SyntaxNode {
		const t = this.peek();
		switch (t.kind) {
			case 'integer': return this.node('const_value', [this.leaf(this.next(), 'integer')]);
			case 'double': return this.node('const_value', [this.leaf(this.next(), 'double')]);
			case 'string': return this.node('const_value', [this.leaf(this.next(), 'string_literal')]);
			case 'id': return this.node('const_value', [this.leaf(this.next(), 'identifier')]);
			case 'punct':
				if (t.value === '[') return this.node('const_value', [this.parseConstList()]);
				if (t.value === '{') return this.node('const_value', [this.parseConstMap()]);
				break;
			default:
				break;
		}
		return this.missingNode('const_value', true);
	}

	private parseConstList(): SyntaxNode {
		const children = [this.leaf(this.next())];
		while (!this.atEof() && !this.at('punct', ']') && !this.atTopLevelStart()) {
			const value = this.parseConstValue();
			if (value.missing) {
				children.push(this.errorUntil(() => this.at('punct', ']') || this.at('punct', ',') || this.atTopLevelStart()));
				this.optionalSeparator(children);
				continue;
			}
			children.push(value);
			this.optionalSeparator(children);
		}
		children.push(this.expectPunct(']'));
		return this.node('const_list', children);
	}

	private parseConstMap(): SyntaxNode {
		const children = [this.leaf(this.next())];
		while (!this.atEof() && !this.at('punct', '}') && !this.atTopLevelStart()) {
			const key = this.parseConstValue();
			if (key.missing) {
				children.push(this.errorUntil(() => this.at('punct', '}') || this.at('punct', ',') || this.atTopLevelStart()));
				this.optionalSeparator(children);
				continue;
			}
			children.push(key);
			children.push(this.expectPunct(':'));
			children.push(this.parseConstValue());
			this.optionalSeparator(children);
		}
		children.push(this.expectPunct('}'));
		return this.node('const_map', children);
	}

	// '(' key ('=' "value")? (',' ...)* ')'
	private optionalAnnotations(out: SyntaxNode[]) {
		if (!this.at('punct', '(')) return;
		const children = [this.leaf(this.next())];
		while (!this.atEof() && !this.at('punct', ')') && !this.atTopLevelStart()) {
			const t = this.peek();
			if (t.kind !== 'id' && t.kind !== 'keyword' && t.kind !== 'base-type') {
				children.push(this.errorUntil(() => this.at('punct', ')') || this.at('id') || this.atTopLevelStart()));
				continue;
			}
			const pair = [this.leaf(this.next(), 'annotation_key')];
			if (this.optionalPunct(pair, '=')) pair.push(this.expect('string', undefined, 'string_literal'));
			this.optionalSeparator(pair);
			children.push(this.node('annotation', pair));
		}
		children.push(this.expectPunct(')'));
		out.push(this.node('annotations', children));
	}
}
