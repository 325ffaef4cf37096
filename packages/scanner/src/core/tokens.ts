/**
 * Token kinds and storage.
 * External kinds keep the order the grammar declares its externals in.
 */

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	// Indentation (0-2)
	Newline: 0,
	Indent: 1,
	Dedent: 2,

	// Instruction text (3-4)
	InterpolationStart: 3,
	InstructionTextSegment: 4,

	// Host-lexed (100-254)
	Content: 100,

	// Special (255)
	Eof: 255,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

/** Kinds the external scanner itself can emit. */
export type ExternalTokenKind =
	| typeof TokenKind.Newline
	| typeof TokenKind.Indent
	| typeof TokenKind.Dedent
	| typeof TokenKind.InterpolationStart
	| typeof TokenKind.InstructionTextSegment

/** Kinds the caller is willing to accept at the current parse position. */
export type ValidSymbols = ReadonlySet<ExternalTokenKind>

export function validSymbols(...kinds: ExternalTokenKind[]): ValidSymbols {
	return new Set(kinds)
}

const KIND_NAMES: Record<TokenKind, string> = {
	[TokenKind.Newline]: 'NEWLINE',
	[TokenKind.Indent]: 'INDENT',
	[TokenKind.Dedent]: 'DEDENT',
	[TokenKind.InterpolationStart]: 'INTERPOLATION_START',
	[TokenKind.InstructionTextSegment]: 'INSTRUCTION_TEXT_SEGMENT',
	[TokenKind.Content]: 'CONTENT',
	[TokenKind.Eof]: 'EOF',
}

export function tokenKindName(kind: TokenKind): string {
	return KIND_NAMES[kind]
}

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

/**
 * A single token.
 * Payload meaning depends on kind:
 * - Indent: width of the block it opens
 * - Dedent: width of the block it returns to
 * - everything else: 0
 */
export interface Token {
	readonly kind: TokenKind
	/** Offset of the first character (inclusive). */
	readonly start: number
	/** Offset past the last character (exclusive). */
	readonly end: number
	readonly line: number
	readonly column: number
	readonly payload: number
}

/**
 * Dense array storage for tokens.
 * Append-only while a host drives the scanner.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [tokenId(i), token]
		}
	}

	kinds(): TokenKind[] {
		return this.tokens.map((token) => token.kind)
	}
}
