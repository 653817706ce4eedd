/**
 * Lexer diagnostic definitions.
 *
 * Error code format: PSLEX<NUMBER>
 * - PSLEX: Scanner errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// LEXER ERRORS (PSLEX001-099)
// =============================================================================

export const PSLEX001: DiagnosticDef = {
	code: 'PSLEX001',
	description:
		'Scanning stopped here because this character does not start any token. Only brackets, arithmetic operators, a few punctuation marks and whole numbers are recognized.',
	message: "unexpected character '{char}'",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Remove the character or replace it with one of ( ) [ ] < > + - * / ! _ \' ? =',
}

export const PSLEX002: DiagnosticDef = {
	code: 'PSLEX002',
	description: 'Number literals must fit in a signed 32-bit integer (at most 2147483647).',
	message: 'integer literal out of range: {digits}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use a number no larger than 2147483647.',
}

export const PSLEX003: DiagnosticDef = {
	code: 'PSLEX003',
	description:
		'A number literal may only contain the ASCII digits 0-9. Other numeric characters, such as superscripts or digits from other scripts, end the scan.',
	message: 'invalid digit in number literal: {digits}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Write the number with the digits 0-9 only.',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all lexer diagnostics.
 */
export const LEXER_DIAGNOSTICS = {
	PSLEX001,
	PSLEX002,
	PSLEX003,
} as const

export type LexerDiagnosticCode = keyof typeof LEXER_DIAGNOSTICS
