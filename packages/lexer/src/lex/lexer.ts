/**
 * Streaming lexer with one token of lookahead.
 */

import { type Diagnostic, ScanContext } from '../core/context.ts'
import type { Token } from '../core/tokens.ts'
import {
	createCursor,
	exhaustedCursor,
	isAtEnd,
	peekChar,
	remainingText,
	type SourceCursor,
} from './cursor.ts'
import { isDecimalRun, isNumeric, matchToken, numericRun } from './matchers.ts'
import { skipWhitespace } from './whitespace.ts'

/**
 * Why the lexer stopped producing tokens.
 * `next()` and `peek()` report both cases as `undefined`; this tells them apart.
 */
export type StopReason =
	| { readonly kind: 'end' }
	| {
			readonly kind: 'unrecognized'
			/** Offset of the offending character in UTF-16 code units */
			readonly offset: number
			readonly line: number
			readonly column: number
			readonly char: string
			readonly diagnostic: Diagnostic
	  }

const END: StopReason = { kind: 'end' }

export class Lexer implements Iterable<Token> {
	readonly context: ScanContext

	private cursor: SourceCursor
	private lookahead: Token | undefined
	private stop: StopReason | null = null

	constructor(input: string | ScanContext) {
		this.context = typeof input === 'string' ? new ScanContext(input) : input
		this.cursor = createCursor(this.context.source)
		this.lookahead = this.scan()
	}

	/**
	 * Returns the lookahead token and scans the one after it.
	 * Once `undefined` is returned it is returned forever.
	 */
	next(): Token | undefined {
		const token = this.lookahead
		if (token !== undefined) {
			this.lookahead = this.scan()
		}
		return token
	}

	/** The next token without consuming it. */
	peek(): Token | undefined {
		return this.lookahead
	}

	/** `null` while tokens remain. */
	get stopReason(): StopReason | null {
		return this.stop
	}

	/** Unconsumed text after the lookahead's lexeme. */
	remaining(): string {
		return remainingText(this.cursor)
	}

	*[Symbol.iterator](): Generator<Token, void, undefined> {
		let token = this.next()
		while (token !== undefined) {
			yield token
			token = this.next()
		}
	}

	private scan(): Token | undefined {
		const start = skipWhitespace(this.cursor)
		const result = matchToken(start)
		if (result !== null) {
			this.cursor = result.rest
			return result.token
		}

		this.stop = this.describeStop(start)
		this.cursor = exhaustedCursor(start)
		return undefined
	}

	private describeStop(at: SourceCursor): StopReason {
		if (isAtEnd(at)) return END

		const char = peekChar(at)
		const diagnostic = isNumeric(char)
			? this.emitNumberError(at)
			: this.context.emit('PSLEX001', at.offset, { char })

		return {
			char,
			column: diagnostic.column,
			diagnostic,
			kind: 'unrecognized',
			line: diagnostic.line,
			offset: at.offset,
		}
	}

	private emitNumberError(at: SourceCursor): Diagnostic {
		const digits = numericRun(at)
		return isDecimalRun(digits)
			? this.context.emit('PSLEX002', at.offset, { digits })
			: this.context.emit('PSLEX003', at.offset, { digits })
	}
}
