/**
 * Scan context shared by a lexer and its caller.
 * Holds the borrowed source text and collects diagnostics.
 */

import {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	severityLabel,
} from './diagnostics.ts'

/**
 * A diagnostic message with location information.
 */
export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Line number (1-indexed) */
	readonly line: number
	/** Column number (1-indexed, in code points) */
	readonly column: number
	/** Offset into the source in UTF-16 code units */
	readonly offset: number
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

/** Line terminators: CRLF, LF, CR, LINE SEPARATOR, PARAGRAPH SEPARATOR. */
const LINE_BREAK = /\r\n|[\n\r\u2028\u2029]/

export interface SourcePosition {
	readonly line: number
	readonly column: number
}

export class ScanContext {
	/** Original source text, never copied or modified */
	readonly source: string

	/** Source filename for error messages */
	readonly filename: string

	private readonly diagnostics: Diagnostic[] = []

	private errorCount = 0

	constructor(source: string, filename = '<input>') {
		this.source = source
		this.filename = filename
	}

	/**
	 * Line and column (both 1-indexed) of a source offset.
	 * Columns count code points, so the caret lines up under astral characters.
	 */
	positionAt(offset: number): SourcePosition {
		const lines = this.source.slice(0, offset).split(LINE_BREAK)
		const lastLine = lines[lines.length - 1] ?? ''
		return { column: Array.from(lastLine).length + 1, line: lines.length }
	}

	/**
	 * Emit a diagnostic by code at a source offset.
	 */
	emit(code: DiagnosticCode, offset: number, args?: DiagnosticArgs): Diagnostic {
		const def = getDiagnostic(code)
		const { line, column } = this.positionAt(offset)
		const diagnostic: Diagnostic = {
			column,
			def,
			line,
			message: interpolateMessage(def.message, args),
			offset,
			...(args ? { args } : {}),
		}
		this.diagnostics.push(diagnostic)
		if (def.severity === DiagnosticSeverity.Error) {
			this.errorCount++
		}
		return diagnostic
	}

	hasErrors(): boolean {
		return this.errorCount > 0
	}

	getErrorCount(): number {
		return this.errorCount
	}

	getDiagnostics(): readonly Diagnostic[] {
		return this.diagnostics
	}

	getSourceLine(line: number): string | undefined {
		return this.source.split(LINE_BREAK)[line - 1]
	}

	/**
	 * Format a diagnostic for display.
	 *
	 * Example:
	 * ```
	 * error[PSLEX001]: unexpected character '~'
	 *   --> <input>:1:6
	 *    |
	 *  1 | (+ 1 ~)
	 *    |      ^
	 *    |
	 *    = help: Remove the character or replace it with one of ...
	 * ```
	 */
	formatDiagnostic(diagnostic: Diagnostic): string {
		const { def } = diagnostic
		const header = `${severityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
		const location = `  --> ${this.filename}:${diagnostic.line}:${diagnostic.column}`

		const sourceLine = this.getSourceLine(diagnostic.line)
		if (sourceLine === undefined) {
			return `${header}\n${location}`
		}

		const pad = ' '.repeat(String(diagnostic.line).length)
		const emptyPrefix = ` ${pad} | `
		const pointer = `${' '.repeat(diagnostic.column - 1)}^`
		const lines = [
			header,
			location,
			emptyPrefix,
			` ${diagnostic.line} | ${sourceLine}`,
			`${emptyPrefix}${pointer}`,
		]

		if (def.suggestion) {
			lines.push(emptyPrefix, `   = help: ${interpolateMessage(def.suggestion, diagnostic.args)}`)
		}

		return lines.join('\n')
	}

	formatAllDiagnostics(): string {
		return this.diagnostics.map((d) => this.formatDiagnostic(d)).join('\n\n')
	}
}
