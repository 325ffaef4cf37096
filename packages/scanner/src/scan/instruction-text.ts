import type { Lexer } from '../core/lexer.ts'
import { type ExternalTokenKind, TokenKind, type ValidSymbols } from '../core/tokens.ts'

export const INTERPOLATION_OPEN = '{'
export const INTERPOLATION_BANG = '!'

/** Characters a text segment never contains: end of input, newline, '{'. */
export function isTextTerminator(char: string): boolean {
	return char === '' || char === '\n' || char === INTERPOLATION_OPEN
}

function consumeTextRun(lexer: Lexer): void {
	while (!isTextTerminator(lexer.lookahead)) {
		lexer.advance()
	}
}

/**
 * Scans at a '{': either the `{!` escape, or a lone brace that becomes
 * the first character of a text segment. Declines when the brace is
 * lone and text segments are not accepted.
 */
export function scanInterpolationStart(
	lexer: Lexer,
	valid: ValidSymbols
): ExternalTokenKind | null {
	lexer.advance()
	if (lexer.lookahead === INTERPOLATION_BANG) {
		lexer.advance()
		lexer.markEnd()
		return TokenKind.InterpolationStart
	}

	if (!valid.has(TokenKind.InstructionTextSegment)) return null

	// The brace is already consumed; it stays in the segment.
	consumeTextRun(lexer)
	lexer.markEnd()
	return TokenKind.InstructionTextSegment
}

/** Scans the longest run up to a newline, '{' or end of input. */
export function scanTextSegment(lexer: Lexer): ExternalTokenKind {
	consumeTextRun(lexer)
	lexer.markEnd()
	return TokenKind.InstructionTextSegment
}
