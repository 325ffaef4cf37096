import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { SourceCursor } from '../../src/core/lexer.ts'
import { type ExternalTokenKind, TokenKind, validSymbols } from '../../src/core/tokens.ts'
import { tokenize } from '../../src/host/tokenize.ts'
import { measureLineBoundary, TAB_WIDTH } from '../../src/scan/line-boundary.ts'
import { scan } from '../../src/scan/scan.ts'
import { createScannerState, type ScannerState } from '../../src/state/scanner-state.ts'
import { deserializeState, serializeState } from '../../src/state/serialization.ts'

const EXTERNAL_KINDS: ExternalTokenKind[] = [
	TokenKind.Newline,
	TokenKind.Indent,
	TokenKind.Dedent,
	TokenKind.InterpolationStart,
	TokenKind.InstructionTextSegment,
]

const sourceArb = fc
	.array(fc.constantFrom(' ', '\t', '\n', '\r', '#', 'a', 'b', '{', '!', '}', '|'), {
		maxLength: 60,
	})
	.map((chars) => chars.join(''))

const widthsArb = fc
	.uniqueArray(fc.integer({ max: 40, min: 1 }), { maxLength: 8 })
	.map((widths) => [...widths].sort((a, b) => a - b))

const stateArb = fc
	.record({
		pending: fc.option(fc.integer({ max: 60, min: 0 }), { nil: null }),
		widths: widthsArb,
	})
	.map(({ pending, widths }) => {
		const state = createScannerState()
		for (const width of widths) state.stack.push(width)
		state.pendingDedent = pending
		return state
	})

function snapshotOf(state: ScannerState): number[] {
	return Array.from(serializeState(state))
}

describe('scan properties', () => {
	describe('measurement', () => {
		it('counts one column per space and three per tab', () => {
			fc.assert(
				fc.property(fc.array(fc.constantFrom(' ', '\t'), { maxLength: 40 }), (chars) => {
					const cursor = new SourceCursor(`\n${chars.join('')}x`)
					const spaces = chars.filter((c) => c === ' ').length
					const tabs = chars.length - spaces
					return measureLineBoundary(cursor).width === spaces + TAB_WIDTH * tabs
				}),
				{ numRuns: 300 }
			)
		})
	})

	describe('block structure', () => {
		it('emits one INDENT per deeper line, pushing its width', () => {
			fc.assert(
				fc.property(widthsArb, (widths) => {
					const source = ['top', ...widths.map((w) => `${' '.repeat(w)}x`)].join('\n')
					const { tokens } = tokenize(source)
					const indents = [...tokens]
						.map(([, t]) => t)
						.filter((t) => t.kind === TokenKind.Indent)
						.map((t) => t.payload)
					assert.deepStrictEqual(indents, widths)
				}),
				{ numRuns: 200 }
			)
		})

		it('emits one DEDENT per level crossed by a single line', () => {
			fc.assert(
				fc.property(widthsArb, (widths) => {
					const lines = ['top', ...widths.map((w) => `${' '.repeat(w)}x`), 'end']
					const { tokens, state } = tokenize(lines.join('\n'))
					const dedents = tokens.kinds().filter((k) => k === TokenKind.Dedent).length
					assert.strictEqual(dedents, widths.length)
					assert.deepStrictEqual(state.stack.entries(), [0])
				}),
				{ numRuns: 200 }
			)
		})
	})

	describe('safety', () => {
		it('always terminates with a single EOF', () => {
			fc.assert(
				fc.property(sourceArb, fc.boolean(), (source, instructions) => {
					const kinds = tokenize(source, { instructions }).tokens.kinds()
					assert.strictEqual(kinds[kinds.length - 1], TokenKind.Eof)
					assert.strictEqual(kinds.filter((k) => k === TokenKind.Eof).length, 1)
				}),
				{ numRuns: 500 }
			)
		})

		it('keeps the stack rooted at 0 and strictly increasing', () => {
			fc.assert(
				fc.property(sourceArb, (source) => {
					const entries = tokenize(source).state.stack.entries()
					assert.strictEqual(entries[0], 0)
					for (let i = 1; i < entries.length; i++) {
						assert.ok((entries[i] ?? 0) > (entries[i - 1] ?? 0))
					}
				}),
				{ numRuns: 500 }
			)
		})

		it('restores a valid state from arbitrary bytes', () => {
			fc.assert(
				fc.property(fc.uint8Array({ maxLength: 64 }), (bytes) => {
					const state = createScannerState()
					deserializeState(bytes, state)
					const entries = state.stack.entries()
					assert.ok(entries.length >= 1 && entries.length <= state.stack.capacity)
					assert.strictEqual(entries[0], 0)
					for (let i = 1; i < entries.length; i++) {
						assert.ok((entries[i] ?? 0) > (entries[i - 1] ?? 0))
					}
				}),
				{ numRuns: 500 }
			)
		})
	})

	describe('snapshots', () => {
		it('a restored state makes the same decision as the original', () => {
			fc.assert(
				fc.property(
					stateArb,
					sourceArb,
					fc.subarray(EXTERNAL_KINDS),
					(original, source, kinds) => {
						const restored = createScannerState()
						deserializeState(serializeState(original), restored)

						const valid = validSymbols(...kinds)
						const left = new SourceCursor(source)
						const right = new SourceCursor(source)
						left.begin()
						right.begin()
						const leftKind = scan(original, left, valid)
						const rightKind = scan(restored, right, valid)

						assert.strictEqual(rightKind, leftKind)
						assert.deepStrictEqual(right.accept(), left.accept())
						assert.deepStrictEqual(snapshotOf(restored), snapshotOf(original))
					}
				),
				{ numRuns: 500 }
			)
		})
	})
})
