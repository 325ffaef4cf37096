import type { Lexer } from '../core/lexer.ts'
import { type ExternalTokenKind, TokenKind, type ValidSymbols } from '../core/tokens.ts'
import { reportDiagnostic, traceLog } from '../core/trace.ts'
import type { ScannerState } from '../state/scanner-state.ts'

/** A tab always counts as three columns, wherever it appears. */
export const TAB_WIDTH = 3

/** Widths saturate here so they fit the signed 16-bit snapshot marker. */
export const MAX_INDENT_WIDTH = 0x7fff

export interface LineMeasure {
	/** A line break or end of input was reached. */
	readonly foundEndOfLine: boolean
	/** Indentation of the next line that holds code. */
	readonly width: number
}

export function isAtLineBoundary(lexer: Lexer): boolean {
	return lexer.lookahead === '\n' || lexer.lookahead === '\r' || lexer.eof()
}

function widen(width: number, columns: number): number {
	return Math.min(MAX_INDENT_WIDTH, width + columns)
}

export function skipComment(lexer: Lexer): void {
	while (lexer.lookahead !== '' && lexer.lookahead !== '\n') {
		lexer.skip()
	}
}

/**
 * Consumes line breaks, blank and comment-only lines, and the indentation
 * of the next code line. Only the first newline belongs to the token; the
 * rest is skipped. End of input counts as a boundary with width 0.
 */
export function measureLineBoundary(lexer: Lexer): LineMeasure {
	let foundEndOfLine = false
	let width = 0

	for (;;) {
		const char = lexer.lookahead
		if (char === '\n') {
			if (foundEndOfLine) {
				lexer.skip()
			} else {
				lexer.advance()
				lexer.markEnd()
			}
			foundEndOfLine = true
			width = 0
		} else if (char === '\r') {
			lexer.skip()
		} else if (char === ' ' && foundEndOfLine) {
			width = widen(width, 1)
			lexer.skip()
		} else if (char === '\t' && foundEndOfLine) {
			width = widen(width, TAB_WIDTH)
			lexer.skip()
		} else if (char === '#' && foundEndOfLine) {
			// The newline ending the comment resets the width.
			skipComment(lexer)
		} else if (lexer.eof()) {
			if (!foundEndOfLine) lexer.markEnd()
			return { foundEndOfLine: true, width: 0 }
		} else {
			return { foundEndOfLine, width }
		}
	}
}

/**
 * Decides INDENT, DEDENT or NEWLINE for the line ahead, in that order.
 */
export function scanLineBoundary(
	state: ScannerState,
	lexer: Lexer,
	valid: ValidSymbols
): ExternalTokenKind | null {
	const { foundEndOfLine, width } = measureLineBoundary(lexer)
	if (!foundEndOfLine) return null

	const { stack } = state
	const current = stack.current
	traceLog(state.trace, () => `  line boundary: width=${width} current=${current}`)

	if (valid.has(TokenKind.Indent) && width > current) {
		if (!stack.push(width)) {
			reportDiagnostic(state.trace, 'BSSCAN001', { depth: stack.capacity, width })
		}
		state.pendingDedent = null
		return TokenKind.Indent
	}

	if (valid.has(TokenKind.Dedent) && width < current) {
		const top = stack.pop()
		if (width < top) state.pendingDedent = width
		return TokenKind.Dedent
	}

	if (width < current) {
		state.pendingDedent = width
		traceLog(state.trace, () => `  deferred dedent to ${width}`)
	}

	// A NEWLINE at end of input would repeat forever.
	if (valid.has(TokenKind.Newline) && !lexer.eof()) {
		return TokenKind.Newline
	}
	return null
}
