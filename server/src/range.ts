import type { Position, Range } from 'vscode-languageserver/node';
import type { Point } from './ast';

export function computeLineOffsets(text: string): number[] {
	const out = [0];
	for (let i = 0; i < text.length; i++) { if (text[i] === '\n') out.push(i + 1); }
	return out;
}

// Offset <-> (line, column) conversion over one source snapshot. Columns count UTF-16 code units.
export class LineIndex {
	private readonly text: string;
	private readonly lineOffsets: number[];
	private readonly length: number;

	constructor(text: string) {
		this.text = text;
		this.lineOffsets = computeLineOffsets(text);
		this.length = text.length;
	}

	get lineCount(): number { return this.lineOffsets.length; }

	pointAt(offset: number): Point {
		const off = Math.max(0, Math.min(offset, this.length));
		let lo = 0, hi = this.lineOffsets.length - 1, ans = 0;
		while (lo <= hi) {
			const mid = (lo + hi) >> 1;
			if (this.lineOffsets[mid]! <= off) { ans = mid; lo = mid + 1; }
			else hi = mid - 1;
		}
		return { row: ans, column: off - this.lineOffsets[ans]! };
	}

	positionAt(offset: number): Position {
		const p = this.pointAt(offset);
		return { line: p.row, character: p.column };
	}

	// Length of a line without its terminator.
	lineLength(line: number): number {
		const start = this.lineOffsets[line];
		if (start === undefined) return 0;
		let end = line + 1 < this.lineOffsets.length ? this.lineOffsets[line + 1]! - 1 : this.length;
		if (end > start && this.text[end - 1] === '\r') end--;
		return end - start;
	}

	// Strict conversion: positions outside the text yield null instead of being clamped.
	offsetAt(pos: Position): number | null {
		if (pos.line < 0 || pos.character < 0 || pos.line >= this.lineOffsets.length) return null;
		if (pos.character > this.lineLength(pos.line)) return null;
		return this.lineOffsets[pos.line]! + pos.character;
	}
}

export function locationKey(uri: string, r: Range): string {
	return `${uri}:${r.start.line}:${r.start.character}:${r.end.line}:${r.end.character}`;
}

// One-character range at a line/column, used for parser-reported errors.
export function pointRange(line: number, column: number): Range {
	return { start: { line, character: column }, end: { line, character: column + 1 } };
}
