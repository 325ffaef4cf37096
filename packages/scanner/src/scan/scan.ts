import type { Lexer } from '../core/lexer.ts'
import {
	type ExternalTokenKind,
	TokenKind,
	tokenKindName,
	type ValidSymbols,
} from '../core/tokens.ts'
import { traceLog } from '../core/trace.ts'
import { describeState, type ScannerState } from '../state/scanner-state.ts'
import { isTextTerminator, scanInterpolationStart, scanTextSegment } from './instruction-text.ts'
import { isAtLineBoundary, scanLineBoundary } from './line-boundary.ts'
import { resolvePendingDedent } from './pending-dedent.ts'

function describeLookahead(lexer: Lexer): string {
	if (lexer.eof()) return 'EOF'
	return JSON.stringify(lexer.lookahead)
}

function describeValid(valid: ValidSymbols): string {
	return [...valid].map(tokenKindName).join(',')
}

function pickToken(
	state: ScannerState,
	lexer: Lexer,
	valid: ValidSymbols
): ExternalTokenKind | null {
	// Instruction text is selected by the accepted kinds and bypasses
	// indentation entirely.
	if (valid.has(TokenKind.InterpolationStart) && lexer.lookahead === '{') {
		return scanInterpolationStart(lexer, valid)
	}
	if (valid.has(TokenKind.InstructionTextSegment) && !isTextTerminator(lexer.lookahead)) {
		return scanTextSegment(lexer)
	}

	const pending = resolvePendingDedent(state, valid)
	if (pending !== null) return pending

	// Same-line whitespace is left to the host.
	if (!isAtLineBoundary(lexer)) return null

	return scanLineBoundary(state, lexer, valid)
}

/**
 * Emits at most one token from the cursor, or declines with null.
 *
 * Only INDENT and DEDENT decisions change `state`, plus the deferred
 * dedent marker. A decline is not an error: the host falls back to its
 * own rules.
 */
export function scan(
	state: ScannerState,
	lexer: Lexer,
	valid: ValidSymbols
): ExternalTokenKind | null {
	traceLog(
		state.trace,
		() => `scan: lookahead=${describeLookahead(lexer)} valid=[${describeValid(valid)}] ${describeState(state)}`
	)
	const result = pickToken(state, lexer, valid)
	traceLog(state.trace, () =>
		result === null ? '  => no token' : `  => ${tokenKindName(result)} ${describeState(state)}`
	)
	return result
}
