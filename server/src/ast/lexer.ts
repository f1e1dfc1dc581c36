/*
	Frugal lexer: produces identifier, literal, keyword and punctuation tokens.
	Comments are emitted as tokens so the parser can decide what to do with them.
*/
import { TokenStream, type Token } from '../core/tokens';

// Base type names used when no language definitions are supplied.
export const DEFAULT_BASE_TYPES: ReadonlySet<string> = new Set([
	'bool', 'byte', 'i8', 'i16', 'i32', 'i64', 'double', 'string', 'binary', 'uuid',
]);
export const CONTAINER_TYPES = ['list', 'set', 'map'] as const;

const KEYWORDS = [
	'include', 'namespace', 'const', 'typedef', 'enum', 'struct', 'exception',
	'service', 'scope', 'extends', 'throws', 'oneway', 'required', 'optional', 'prefix', 'void',
	...CONTAINER_TYPES,
] as const;
type Keyword = typeof KEYWORDS[number];
const KEYWORD_SET = new Set<string>(KEYWORDS);
export function isKeyword(value: string): value is Keyword {
	return KEYWORD_SET.has(value);
}

const PUNCT = new Set(['{', '}', '(', ')', '<', '>', '[', ']', ',', ';', ':', '=', '*']);

export class Lexer {
	private i = 0;
	private readonly n: number;
	private readonly text: string;
	private readonly ts: TokenStream;
	private readonly baseTypes: ReadonlySet<string>;

	// Words in `baseTypes` lex as base-type tokens unless they are grammar keywords.
	constructor(text: string, baseTypes: ReadonlySet<string> = DEFAULT_BASE_TYPES) {
		this.text = text;
		this.n = text.length;
		this.baseTypes = baseTypes;
		this.ts = new TokenStream((): Token => this.scanOne());
	}

	public next(): Token {
		return this.ts.next();
	}

	public peek(): Token {
		return this.ts.peek();
	}

	private scanOne(): Token {
		while (this.i < this.n && /\s/.test(this.text[this.i]!)) this.i++;
		if (this.i >= this.n) return this.mk('eof', '', this.i, this.i);

		const c = this.text[this.i]!;
		const c2 = this.text[this.i + 1];

		// comments: '//' and '#' run to end of line, '/* */' may span lines
		if ((c === '/' && c2 === '/') || c === '#') {
			const start = this.i;
			const lineEnd = this.findLineEnd(this.i);
			const body = this.text.slice(start + (c === '#' ? 1 : 2), lineEnd);
			this.i = lineEnd;
			return this.mk('comment-line', body, start, lineEnd);
		}
		if (c === '/' && c2 === '*') {
			const start = this.i;
			let j = this.i + 2;
			while (j < this.n && !(this.text[j] === '*' && this.text[j + 1] === '/')) j++;
			const closed = j < this.n;
			const tok = this.mk('comment-block', this.text.slice(start + 2, j), start, closed ? j + 2 : j);
			if (!closed) tok.unterminated = true;
			this.i = tok.span.end;
			return tok;
		}

		if (c === '"' || c === '\'') {
			const start = this.i;
			let j = this.i + 1;
			while (j < this.n && this.text[j] !== c && this.text[j] !== '\n') {
				if (this.text[j] === '\\') j++;
				j++;
			}
			if (this.text[j] !== c) {
				// unterminated string: surface the rest of the line as invalid
				this.i = j;
				return this.mk('invalid', this.text.slice(start, j), start, j);
			}
			this.i = j + 1;
			return this.mk('string', this.text.slice(start, this.i), start, this.i);
		}

		if (isDigit(c) || ((c === '+' || c === '-') && isDigit(c2))) {
			return this.scanNumber();
		}

		if (isIdStart(c)) {
			const start = this.i;
			let j = this.i + 1;
			for (;;) {
				while (j < this.n && isIdContinue(this.text[j])) j++;
				// dotted names: shared.User, Status.ACTIVE
				if (this.text[j] === '.' && isIdStart(this.text[j + 1])) { j += 2; continue; }
				break;
			}
			const word = this.text.slice(start, j);
			this.i = j;
			return this.mk(this.wordKind(word), word, start, j);
		}

		const start = this.i;
		this.i++;
		return this.mk(PUNCT.has(c) ? 'punct' : 'invalid', c, start, this.i);
	}

	private wordKind(word: string): Token['kind'] {
		if (isKeyword(word)) return 'keyword';
		return this.baseTypes.has(word) ? 'base-type' : 'id';
	}

	private scanNumber(): Token {
		const start = this.i;
		let j = this.i;
		if (this.text[j] === '+' || this.text[j] === '-') j++;
		if (this.text[j] === '0' && (this.text[j + 1] === 'x' || this.text[j + 1] === 'X')) {
			j += 2;
			while (j < this.n && /[0-9a-fA-F]/.test(this.text[j]!)) j++;
			this.i = j;
			return this.mk('integer', this.text.slice(start, j), start, j);
		}
		let isDouble = false;
		while (j < this.n && isDigit(this.text[j])) j++;
		if (this.text[j] === '.' && isDigit(this.text[j + 1])) {
			isDouble = true;
			j++;
			while (j < this.n && isDigit(this.text[j])) j++;
		}
		if (this.text[j] === 'e' || this.text[j] === 'E') {
			let k = j + 1;
			if (this.text[k] === '+' || this.text[k] === '-') k++;
			if (isDigit(this.text[k])) {
				isDouble = true;
				j = k;
				while (j < this.n && isDigit(this.text[j])) j++;
			}
		}
		this.i = j;
		return this.mk(isDouble ? 'double' : 'integer', this.text.slice(start, j), start, j);
	}

	private findLineEnd(pos: number): number {
		let i = pos; while (i < this.n && this.text[i] !== '\n') i++; return i;
	}

	private mk(kind: Token['kind'], value: string, start: number, end: number): Token {
		return { kind, value, span: { start, end } };
	}
}

function isDigit(ch: string | undefined): boolean {
	return !!ch && ch >= '0' && ch <= '9';
}

function isIdStart(ch: string | undefined): boolean {
	return !!ch && /[A-Za-z_]/.test(ch);
}

function isIdContinue(ch: string | undefined): boolean {
	return !!ch && /[A-Za-z0-9_]/.test(ch);
}
