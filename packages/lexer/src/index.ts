/**
 * parenscan lexer public API
 *
 * Scans a small parenthesized expression language into a flat token stream:
 * - Ordered single-token matchers over an immutable source cursor
 * - Whitespace skipped before every match
 * - Pull-based Lexer with one token of lookahead
 */

export {
	type Diagnostic,
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	formatToken,
	getDiagnostic,
	interpolateMessage,
	isNumberToken,
	isValidDiagnosticCode,
	type NumberToken,
	numberToken,
	type PunctuationKind,
	type PunctuationToken,
	punctuationToken,
	ScanContext,
	type SourcePosition,
	type Token,
	TokenKind,
	tokenKindName,
	tokensEqual,
} from './core/index.ts'
export {
	advanceCursor,
	charMatcher,
	createCursor,
	exhaustedCursor,
	INT32_MAX,
	isAtEnd,
	isWhitespace,
	Lexer,
	LexError,
	MATCHERS,
	type Matcher,
	matchNumber,
	matchToken,
	parseInt32,
	peekChar,
	remainingText,
	type ScanResult,
	type SourceCursor,
	skipWhitespace,
	type StopReason,
	type TokenizeResult,
	tokenize,
	tokenizeOrThrow,
} from './lex/index.ts'
