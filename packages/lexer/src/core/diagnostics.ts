/**
 * Re-export diagnostic types and lexer definitions from shared package.
 */

import { LEXER_DIAGNOSTICS, type LexerDiagnosticCode } from '@parenscan/diagnostics'

export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
	LEXER_DIAGNOSTICS,
	type LexerDiagnosticCode,
	PSLEX001,
	PSLEX002,
	PSLEX003,
	severityLabel,
} from '@parenscan/diagnostics'

/**
 * All valid diagnostic codes for the lexer.
 */
export type DiagnosticCode = LexerDiagnosticCode

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof LEXER_DIAGNOSTICS)[typeof code] {
	return LEXER_DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in LEXER_DIAGNOSTICS
}
