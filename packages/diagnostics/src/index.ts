/**
 * @parenscan/diagnostics
 *
 * Shared diagnostic types and definitions for parenscan packages.
 */

export { interpolateMessage } from './interpolate.ts'
export {
	LEXER_DIAGNOSTICS,
	type LexerDiagnosticCode,
	PSLEX001,
	PSLEX002,
	PSLEX003,
} from './lexer.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	severityLabel,
} from './types.ts'
