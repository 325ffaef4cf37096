import assert from 'node:assert'
import { describe, it } from 'node:test'
import { TokenKind, validSymbols } from '../../src/core/tokens.ts'
import { resolvePendingDedent } from '../../src/scan/pending-dedent.ts'
import { createScannerState, type ScannerState } from '../../src/state/scanner-state.ts'

const DEDENT = validSymbols(TokenKind.Dedent)

function stateWith(widths: number[], pending: number | null): ScannerState {
	const state = createScannerState()
	for (const width of widths) state.stack.push(width)
	state.pendingDedent = pending
	return state
}

describe('scan/pending-dedent', () => {
	it('should do nothing without a marker', () => {
		const state = stateWith([3], null)
		assert.strictEqual(resolvePendingDedent(state, DEDENT), null)
		assert.deepStrictEqual(state.stack.entries(), [0, 3])
	})

	it('should emit one DEDENT per call until the target is reached', () => {
		const state = stateWith([3, 6], 0)

		assert.strictEqual(resolvePendingDedent(state, DEDENT), TokenKind.Dedent)
		assert.deepStrictEqual(state.stack.entries(), [0, 3])
		assert.strictEqual(state.pendingDedent, 0)

		assert.strictEqual(resolvePendingDedent(state, DEDENT), TokenKind.Dedent)
		assert.deepStrictEqual(state.stack.entries(), [0])
		assert.strictEqual(state.pendingDedent, null)
	})

	it('should clear the marker once the top is at or below the target', () => {
		const state = stateWith([3, 6], 4)
		assert.strictEqual(resolvePendingDedent(state, DEDENT), TokenKind.Dedent)
		assert.deepStrictEqual(state.stack.entries(), [0, 3])
		assert.strictEqual(state.pendingDedent, null)
	})

	it('should keep the marker while DEDENT is not accepted', () => {
		const state = stateWith([3], 0)
		assert.strictEqual(resolvePendingDedent(state, validSymbols(TokenKind.Newline)), null)
		assert.strictEqual(state.pendingDedent, 0)
		assert.deepStrictEqual(state.stack.entries(), [0, 3])
	})

	it('should drop a stale marker without emitting', () => {
		const state = stateWith([3], 3)
		assert.strictEqual(resolvePendingDedent(state, DEDENT), null)
		assert.strictEqual(state.pendingDedent, null)
		assert.deepStrictEqual(state.stack.entries(), [0, 3])
	})

	it('should never pop the base level', () => {
		const state = stateWith([], 0)
		assert.strictEqual(resolvePendingDedent(state, DEDENT), null)
		assert.deepStrictEqual(state.stack.entries(), [0])
	})
})
