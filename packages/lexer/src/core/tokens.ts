/**
 * Token model.
 * A closed set of flat kinds; only Number carries a payload.
 */

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	// Grouping (0-9)
	LeftParen: 0,
	RightParen: 1,
	LeftBracket: 2,
	RightBracket: 3,
	LeftAngle: 4,
	RightAngle: 5,

	// Operators (10-19)
	Plus: 10,
	Minus: 11,
	Asterisk: 12,
	Slash: 13,

	// Punctuation (20-29)
	Bang: 20,
	Underscore: 21,
	Apostrophe: 22,
	Question: 23,
	Equals: 24,

	// Literals (100-199)
	Number: 100,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

/** Every kind except Number. */
export type PunctuationKind = Exclude<TokenKind, typeof TokenKind.Number>

export interface PunctuationToken {
	readonly kind: PunctuationKind
}

export interface NumberToken {
	readonly kind: typeof TokenKind.Number
	/** Signed 32-bit integer */
	readonly value: number
}

export type Token = PunctuationToken | NumberToken

const KIND_NAMES = new Map<TokenKind, string>(
	Object.entries(TokenKind).map(([name, kind]): [TokenKind, string] => [kind, name])
)

const PUNCTUATION_TOKENS = new Map<PunctuationKind, PunctuationToken>()

/** Shared frozen instance per punctuation kind. */
export function punctuationToken(kind: PunctuationKind): PunctuationToken {
	const existing = PUNCTUATION_TOKENS.get(kind)
	if (existing !== undefined) return existing

	const token: PunctuationToken = Object.freeze({ kind })
	PUNCTUATION_TOKENS.set(kind, token)
	return token
}

export function numberToken(value: number): NumberToken {
	return Object.freeze({ kind: TokenKind.Number, value })
}

export function isNumberToken(token: Token): token is NumberToken {
	return token.kind === TokenKind.Number
}

export function tokenKindName(kind: TokenKind): string {
	const name = KIND_NAMES.get(kind)
	if (name === undefined) {
		throw new Error(`Invalid TokenKind: ${kind}`)
	}
	return name
}

/** Debug rendering: `LeftParen`, `Number(42)`. */
export function formatToken(token: Token): string {
	const name = tokenKindName(token.kind)
	return isNumberToken(token) ? `${name}(${token.value})` : name
}

export function tokensEqual(a: Token, b: Token): boolean {
	if (isNumberToken(a) && isNumberToken(b)) return a.value === b.value
	return a.kind === b.kind
}
