/**
 * Core data structures for the scanner: token model, scan context, diagnostics.
 */

export { type Diagnostic, ScanContext, type SourcePosition } from './context.ts'
export {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	isValidDiagnosticCode,
} from './diagnostics.ts'
export {
	formatToken,
	isNumberToken,
	type NumberToken,
	numberToken,
	type PunctuationKind,
	type PunctuationToken,
	punctuationToken,
	type Token,
	TokenKind,
	tokenKindName,
	tokensEqual,
} from './tokens.ts'
