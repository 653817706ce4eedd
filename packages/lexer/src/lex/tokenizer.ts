import type { Diagnostic } from '../core/context.ts'
import { ScanContext } from '../core/context.ts'
import type { Token } from '../core/tokens.ts'
import { Lexer } from './lexer.ts'

export interface TokenizeResult {
	succeeded: boolean
	tokens: Token[]
}

/**
 * Error thrown by tokenizeOrThrow when scanning stops on unrecognized input.
 */
export class LexError extends Error {
	readonly diagnostic: Diagnostic

	constructor(message: string, diagnostic: Diagnostic) {
		super(message)
		this.name = 'LexError'
		this.diagnostic = diagnostic
	}
}

/**
 * Drains a lexer over the context. Unrecognized input leaves a diagnostic in the context.
 */
export function tokenize(context: ScanContext): TokenizeResult {
	const lexer = new Lexer(context)
	const tokens = [...lexer]
	return { succeeded: lexer.stopReason?.kind !== 'unrecognized', tokens }
}

/**
 * Tokenizes the whole source or throws a LexError carrying the formatted diagnostic.
 */
export function tokenizeOrThrow(source: string, filename?: string): Token[] {
	const context = new ScanContext(source, filename)
	const lexer = new Lexer(context)
	const tokens = [...lexer]
	const stop = lexer.stopReason
	if (stop?.kind === 'unrecognized') {
		throw new LexError(context.formatDiagnostic(stop.diagnostic), stop.diagnostic)
	}
	return tokens
}
