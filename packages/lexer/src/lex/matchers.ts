/**
 * Single-token matchers.
 * Each matcher recognizes one lexeme at the very start of the cursor, or returns null
 * without consuming anything. Matchers never skip whitespace.
 */

import {
	type NumberToken,
	numberToken,
	type PunctuationKind,
	punctuationToken,
	type Token,
	TokenKind,
} from '../core/tokens.ts'
import { advanceCursor, peekChar, type SourceCursor } from './cursor.ts'

export interface ScanResult<T extends Token = Token> {
	readonly token: T
	/** Cursor just past the lexeme */
	readonly rest: SourceCursor
}

export type Matcher = (cursor: SourceCursor) => ScanResult | null

export const INT32_MAX = 2_147_483_647

/**
 * Builds a matcher for a one-character lexeme.
 */
export function charMatcher(target: string, kind: PunctuationKind): Matcher {
	const token = punctuationToken(kind)
	return (cursor) => {
		const char = peekChar(cursor)
		if (char !== target) return null
		return { rest: advanceCursor(cursor, char.length), token }
	}
}

const NUMERIC = /^\p{N}$/u

/** Any Unicode number character (decimal digits, letter numbers, other numbers). */
export function isNumeric(char: string): boolean {
	return NUMERIC.test(char)
}

/**
 * Leading run of numeric code points. The run is what a number literal spans,
 * whether or not it turns out to be a valid one.
 */
export function numericRun(cursor: SourceCursor): string {
	let current = cursor
	let char = peekChar(current)
	while (char !== '' && isNumeric(char)) {
		current = advanceCursor(current, char.length)
		char = peekChar(current)
	}
	return cursor.source.slice(cursor.offset, current.offset)
}

export function isDecimalRun(run: string): boolean {
	return /^[0-9]+$/.test(run)
}

/**
 * Parses a digit run as a signed 32-bit integer, or null when it overflows.
 */
export function parseInt32(digits: string): number | null {
	const significant = digits.replace(/^0+/, '')
	if (significant.length > String(INT32_MAX).length) return null
	const value = Number(digits)
	return value <= INT32_MAX ? value : null
}

/**
 * Matches the longest run of numeric characters. The run must be ASCII digits
 * that fit in 32 bits, otherwise nothing matches. A sign is never part of the literal.
 */
export function matchNumber(cursor: SourceCursor): ScanResult<NumberToken> | null {
	const run = numericRun(cursor)
	if (run === '' || !isDecimalRun(run)) return null

	const value = parseInt32(run)
	if (value === null) return null

	return { rest: advanceCursor(cursor, run.length), token: numberToken(value) }
}

export const matchLeftParen = charMatcher('(', TokenKind.LeftParen)
export const matchRightParen = charMatcher(')', TokenKind.RightParen)
export const matchLeftBracket = charMatcher('[', TokenKind.LeftBracket)
export const matchRightBracket = charMatcher(']', TokenKind.RightBracket)
export const matchLeftAngle = charMatcher('<', TokenKind.LeftAngle)
export const matchRightAngle = charMatcher('>', TokenKind.RightAngle)
export const matchPlus = charMatcher('+', TokenKind.Plus)
export const matchMinus = charMatcher('-', TokenKind.Minus)
export const matchAsterisk = charMatcher('*', TokenKind.Asterisk)
export const matchSlash = charMatcher('/', TokenKind.Slash)
export const matchBang = charMatcher('!', TokenKind.Bang)
export const matchUnderscore = charMatcher('_', TokenKind.Underscore)
export const matchApostrophe = charMatcher("'", TokenKind.Apostrophe)
export const matchQuestion = charMatcher('?', TokenKind.Question)
export const matchEquals = charMatcher('=', TokenKind.Equals)

/**
 * Matchers in priority order. The number matcher stays last.
 */
export const MATCHERS: readonly Matcher[] = [
	matchLeftParen,
	matchRightParen,
	matchLeftBracket,
	matchRightBracket,
	matchLeftAngle,
	matchRightAngle,
	matchPlus,
	matchMinus,
	matchAsterisk,
	matchSlash,
	matchBang,
	matchUnderscore,
	matchApostrophe,
	matchQuestion,
	matchEquals,
	matchNumber,
]

/**
 * First successful match in priority order.
 */
export function matchToken(cursor: SourceCursor): ScanResult | null {
	for (const matcher of MATCHERS) {
		const result = matcher(cursor)
		if (result !== null) return result
	}
	return null
}
