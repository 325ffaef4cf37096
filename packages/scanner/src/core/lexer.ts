/**
 * The cursor contract the scanner reads through, and a string-backed
 * implementation for hosts that hold the whole source in memory.
 */

/**
 * Character cursor handed to the scanner on every call.
 * The scanner never looks behind the cursor and never rewinds it.
 */
export interface Lexer {
	/** Next character, or '' at end of input. */
	readonly lookahead: string
	/** Consumes the lookahead into the current token. */
	advance(): void
	/** Consumes the lookahead without including it in the token. */
	skip(): void
	/** Fixes the token end at the current position. */
	markEnd(): void
	eof(): boolean
}

export interface Span {
	readonly start: number
	readonly end: number
}

export interface Location {
	/** 1-indexed */
	readonly line: number
	/** 1-indexed */
	readonly column: number
}

export class SourceCursor implements Lexer {
	private readonly source: string
	private readonly lineStarts: number[] = [0]
	private position = 0
	private tokenStart = 0
	private beginOffset = 0
	private markedEnd: number | null = null
	private included = false

	constructor(source: string) {
		this.source = source
		for (let i = 0; i < source.length; i++) {
			if (source[i] === '\n') this.lineStarts.push(i + 1)
		}
	}

	get offset(): number {
		return this.position
	}

	get lookahead(): string {
		return this.source[this.position] ?? ''
	}

	eof(): boolean {
		return this.position >= this.source.length
	}

	/** Starts a new token at the current offset. */
	begin(): void {
		this.beginOffset = this.position
		this.tokenStart = this.position
		this.markedEnd = null
		this.included = false
	}

	advance(): void {
		if (this.eof()) return
		this.position++
		this.included = true
	}

	skip(): void {
		if (this.eof()) return
		this.position++
		// Skipped characters ahead of the token are not part of it.
		if (!this.included) this.tokenStart = this.position
	}

	markEnd(): void {
		this.markedEnd = this.position
	}

	/**
	 * Closes the current token and resumes at its end.
	 * Characters consumed past the last markEnd() are handed back.
	 */
	accept(): Span {
		const end = this.markedEnd ?? this.position
		const start = Math.min(this.tokenStart, end)
		this.position = end
		return { end, start }
	}

	/** Returns to where begin() was called, after a declined scan. */
	rewind(): void {
		this.position = this.beginOffset
		this.tokenStart = this.beginOffset
		this.markedEnd = null
		this.included = false
	}

	locate(offset: number): Location {
		let low = 0
		let high = this.lineStarts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			const lineStart = this.lineStarts[mid] ?? 0
			if (lineStart <= offset) low = mid
			else high = mid - 1
		}
		return { column: offset - (this.lineStarts[low] ?? 0) + 1, line: low + 1 }
	}

	slice(span: Span): string {
		return this.source.slice(span.start, span.end)
	}
}
