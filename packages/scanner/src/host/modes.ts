import { TokenKind, type ValidSymbols, validSymbols } from '../core/tokens.ts'

/**
 * What the stand-in parser expects next.
 * - 'structure': ordinary lines; only indentation tokens come from the scanner
 * - 'text': raw instruction text after a `|` marker
 * - 'interpolation': inside `{! ... }`, lexed by the host until `}`
 */
export type HostMode = 'structure' | 'text' | 'interpolation'

export const INSTRUCTION_MARKER = '|'
export const INTERPOLATION_CLOSE = '}'

const STRUCTURE_SYMBOLS = validSymbols(TokenKind.Newline, TokenKind.Indent, TokenKind.Dedent)

const TEXT_SYMBOLS = validSymbols(
	TokenKind.Newline,
	TokenKind.Indent,
	TokenKind.Dedent,
	TokenKind.InterpolationStart,
	TokenKind.InstructionTextSegment
)

export function symbolsForMode(mode: HostMode): ValidSymbols {
	return mode === 'text' ? TEXT_SYMBOLS : STRUCTURE_SYMBOLS
}

/** Mode after the scanner emitted `kind`. */
export function modeAfterScannerToken(mode: HostMode, kind: TokenKind): HostMode {
	switch (kind) {
		case TokenKind.InterpolationStart:
			return 'interpolation'
		case TokenKind.Newline:
		case TokenKind.Indent:
		case TokenKind.Dedent:
			return 'structure'
		default:
			return mode
	}
}

/** Mode after the host lexed `text` as content. */
export function modeAfterContent(mode: HostMode, text: string, instructions: boolean): HostMode {
	if (mode === 'structure' && instructions && text === INSTRUCTION_MARKER) return 'text'
	if (mode === 'interpolation' && text === INTERPOLATION_CLOSE) return 'text'
	return mode
}
