import { advanceCursor, peekChar, type SourceCursor } from './cursor.ts'

const WHITESPACE = /^\p{White_Space}$/u

/**
 * Classifies a single code point by the Unicode White_Space property.
 */
export function isWhitespace(char: string): boolean {
	return WHITESPACE.test(char)
}

/**
 * Returns a cursor past all leading whitespace.
 */
export function skipWhitespace(cursor: SourceCursor): SourceCursor {
	let current = cursor
	let char = peekChar(current)
	while (char !== '' && isWhitespace(char)) {
		current = advanceCursor(current, char.length)
		char = peekChar(current)
	}
	return current
}
