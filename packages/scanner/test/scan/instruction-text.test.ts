import assert from 'node:assert'
import { describe, it } from 'node:test'
import { SourceCursor } from '../../src/core/lexer.ts'
import { TokenKind, type ValidSymbols, validSymbols } from '../../src/core/tokens.ts'
import { scan } from '../../src/scan/scan.ts'
import { createScannerState } from '../../src/state/scanner-state.ts'

const TEXT = validSymbols(TokenKind.InterpolationStart, TokenKind.InstructionTextSegment)

function scanOnce(source: string, valid: ValidSymbols, from = 0) {
	const cursor = new SourceCursor(source)
	for (let i = 0; i < from; i++) cursor.advance()
	cursor.begin()
	const kind = scan(createScannerState(), cursor, valid)
	if (kind === null) return { kind, text: null }
	return { kind, text: cursor.slice(cursor.accept()) }
}

describe('scan/instruction-text', () => {
	it('should scan the interpolation escape as its own token', () => {
		const result = scanOnce('{!x!}', validSymbols(TokenKind.InterpolationStart))
		assert.deepStrictEqual(result, { kind: TokenKind.InterpolationStart, text: '{!' })
	})

	it('should fold a lone brace into a text segment', () => {
		assert.deepStrictEqual(scanOnce('{x', TEXT), {
			kind: TokenKind.InstructionTextSegment,
			text: '{x',
		})
	})

	it('should decline a lone brace when text segments are not accepted', () => {
		assert.deepStrictEqual(scanOnce('{x', validSymbols(TokenKind.InterpolationStart)), {
			kind: null,
			text: null,
		})
	})

	it('should end a text segment before the next brace', () => {
		assert.deepStrictEqual(scanOnce('hello {!name}', TEXT), {
			kind: TokenKind.InstructionTextSegment,
			text: 'hello ',
		})
	})

	it('should end a text segment before a newline', () => {
		assert.strictEqual(scanOnce('abc\ndef', TEXT).text, 'abc')
	})

	it('should stop a lone-brace segment at the following brace', () => {
		assert.strictEqual(scanOnce('{{!', TEXT).text, '{')
		assert.deepStrictEqual(scanOnce('{{!', TEXT, 1), {
			kind: TokenKind.InterpolationStart,
			text: '{!',
		})
	})

	it('should accept a lone brace at end of input', () => {
		assert.strictEqual(scanOnce('{', TEXT).text, '{')
	})

	it('should take leading whitespace into the segment', () => {
		const valid = validSymbols(TokenKind.InstructionTextSegment, TokenKind.Newline)
		assert.strictEqual(scanOnce('   text', valid).text, '   text')
	})

	it('should fall through to line handling at a newline', () => {
		const valid = validSymbols(TokenKind.InstructionTextSegment, TokenKind.Newline)
		assert.deepStrictEqual(scanOnce('\nx', valid), { kind: TokenKind.Newline, text: '\n' })
	})

	it('should leave a brace to the host when the escape is not accepted', () => {
		const valid = validSymbols(TokenKind.Newline, TokenKind.Indent, TokenKind.Dedent)
		assert.strictEqual(scanOnce('{!x', valid).kind, null)
	})
})
