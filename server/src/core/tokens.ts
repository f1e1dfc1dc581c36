// Token model shared by the lexer and the parser

export type Span = { start: number; end: number };

export type TokenKind =
	| 'id'
	| 'integer'
	| 'double'
	| 'string'
	| 'keyword'
	| 'base-type'
	| 'punct'
	| 'comment-line'
	| 'comment-block'
	| 'invalid'
	| 'eof';

export interface Token {
	kind: TokenKind;
	value: string;
	span: Span;
	// Set for block comments that reach end of input without '*/'.
	unterminated?: boolean;
}

export class TokenStream {
	private readonly producer: () => Token;
	private pushback: Token[] = [];
	private stickyEof: Token | null = null;

	constructor(producer: () => Token) {
		this.producer = producer;
	}

	next(): Token {
		if (this.stickyEof) return this.stickyEof;
		const t = this.pushback.pop() ?? this.producer();
		if (t.kind === 'eof') this.stickyEof = t;
		return t;
	}

	peek(): Token {
		const t = this.next();
		this.pushBack(t);
		return t;
	}

	pushBack(t: Token) {
		if (t.kind === 'eof') return;
		this.pushback.push(t);
	}
}
