import { SourceCursor } from '../core/lexer.ts'
import { TokenKind, TokenStore } from '../core/tokens.ts'
import type { ScanTrace } from '../core/trace.ts'
import { createExternalScanner, type ExternalScanner } from '../external.ts'
import { skipComment } from '../scan/line-boundary.ts'
import type { ScannerOptions, ScannerState } from '../state/scanner-state.ts'
import {
	type HostMode,
	INSTRUCTION_MARKER,
	INTERPOLATION_CLOSE,
	modeAfterContent,
	modeAfterScannerToken,
	symbolsForMode,
} from './modes.ts'

export interface TokenizeOptions {
	/** Treat a `|` token as the start of raw instruction text. */
	instructions?: boolean
	scanner?: Omit<ScannerOptions, 'trace'>
	trace?: ScanTrace
}

export interface TokenizeResult {
	tokens: TokenStore
	/** Scanner state after the last call, ready to snapshot. */
	state: ScannerState
}

function isSingleCharToken(char: string): boolean {
	return char === INSTRUCTION_MARKER || char === INTERPOLATION_CLOSE
}

function isContentChar(char: string): boolean {
	return (
		char !== '' &&
		char !== ' ' &&
		char !== '\t' &&
		char !== '\n' &&
		char !== '\r' &&
		char !== '#' &&
		!isSingleCharToken(char)
	)
}

/**
 * Skips same-line whitespace and a trailing comment.
 * Returns true when anything was skipped.
 */
function skipExtras(cursor: SourceCursor): boolean {
	const start = cursor.offset
	while (cursor.lookahead === ' ' || cursor.lookahead === '\t') {
		cursor.skip()
	}
	if (cursor.lookahead === '#') {
		skipComment(cursor)
	}
	return cursor.offset !== start
}

function lexContent(cursor: SourceCursor): void {
	if (isSingleCharToken(cursor.lookahead)) {
		cursor.advance()
		return
	}
	while (isContentChar(cursor.lookahead)) {
		cursor.advance()
	}
}

function payloadFor(kind: TokenKind, state: ScannerState): number {
	return kind === TokenKind.Indent || kind === TokenKind.Dedent ? state.stack.current : 0
}

class HostSession {
	readonly tokens = new TokenStore()
	private mode: HostMode = 'structure'
	readonly state: ScannerState
	private readonly cursor: SourceCursor
	private readonly scanner: ExternalScanner<ScannerState>
	private readonly instructions: boolean

	constructor(source: string, scanner: ExternalScanner<ScannerState>, instructions: boolean) {
		this.cursor = new SourceCursor(source)
		this.scanner = scanner
		this.state = scanner.create()
		this.instructions = instructions
	}

	private record(kind: TokenKind, payload: number): string {
		const span = this.cursor.accept()
		const { line, column } = this.cursor.locate(span.start)
		this.tokens.add({ column, end: span.end, kind, line, payload, start: span.start })
		return this.cursor.slice(span)
	}

	private tryScanner(): boolean {
		const { cursor, state } = this
		cursor.begin()
		const kind = this.scanner.scan(state, cursor, symbolsForMode(this.mode))
		if (kind === null) {
			cursor.rewind()
			return false
		}
		this.record(kind, payloadFor(kind, state))
		this.mode = modeAfterScannerToken(this.mode, kind)
		return true
	}

	/** Runs one host step. Returns false once EOF has been recorded. */
	step(): boolean {
		if (this.tryScanner()) return true

		const { cursor } = this
		if (cursor.eof()) {
			cursor.begin()
			this.record(TokenKind.Eof, 0)
			return false
		}
		if (skipExtras(cursor)) return true

		if (cursor.lookahead === '\n' || cursor.lookahead === '\r') {
			// A line break the scanner declined is plain whitespace.
			cursor.skip()
			return true
		}

		cursor.begin()
		lexContent(cursor)
		const text = this.record(TokenKind.Content, 0)
		this.mode = modeAfterContent(this.mode, text, this.instructions)
		return true
	}
}

/**
 * Drives the scanner over `source` the way a table-driven parser would,
 * lexing everything the scanner declines as plain content.
 */
export function tokenize(source: string, options: TokenizeOptions = {}): TokenizeResult {
	const scanner = createExternalScanner({ ...options.scanner, trace: options.trace })
	const session = new HostSession(source, scanner, options.instructions ?? false)
	let running = true
	while (running) {
		running = session.step()
	}
	return { state: session.state, tokens: session.tokens }
}
