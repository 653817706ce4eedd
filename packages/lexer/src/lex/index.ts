/**
 * Lexical analysis module.
 * Turns source text into tokens, one at a time, with one token of lookahead.
 */

export {
	advanceCursor,
	createCursor,
	exhaustedCursor,
	isAtEnd,
	peekChar,
	remainingText,
	type SourceCursor,
} from './cursor.ts'
export { Lexer, type StopReason } from './lexer.ts'
export {
	charMatcher,
	INT32_MAX,
	MATCHERS,
	type Matcher,
	matchNumber,
	matchToken,
	parseInt32,
	type ScanResult,
} from './matchers.ts'
export { LexError, type TokenizeResult, tokenize, tokenizeOrThrow } from './tokenizer.ts'
export { isWhitespace, skipWhitespace } from './whitespace.ts'
