import { type ExternalTokenKind, TokenKind, type ValidSymbols } from '../core/tokens.ts'
import type { ScannerState } from '../state/scanner-state.ts'

/**
 * Emits one DEDENT toward a deferred target width.
 *
 * A single line break can close several blocks, but the host asks for one
 * token at a time. The marker carries the target across calls. It is kept
 * while DEDENT is not accepted, and dropped once it no longer lies below
 * the current block.
 */
export function resolvePendingDedent(
	state: ScannerState,
	valid: ValidSymbols
): ExternalTokenKind | null {
	const target = state.pendingDedent
	if (target === null || !valid.has(TokenKind.Dedent)) return null

	const { stack } = state
	if (target < stack.current && stack.depth > 1) {
		const top = stack.pop()
		if (top <= target) state.pendingDedent = null
		return TokenKind.Dedent
	}

	state.pendingDedent = null
	return null
}
