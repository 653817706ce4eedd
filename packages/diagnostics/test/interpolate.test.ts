import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	DiagnosticSeverity,
	interpolateMessage,
	LEXER_DIAGNOSTICS,
	PSLEX001,
	PSLEX003,
	severityLabel,
} from '../src/index.ts'

describe('diagnostics', () => {
	describe('interpolateMessage', () => {
		it('should return the message unchanged without args', () => {
			assert.strictEqual(interpolateMessage('plain {x}'), 'plain {x}')
		})

		it('should replace known placeholders', () => {
			assert.strictEqual(
				interpolateMessage('found {found}, expected {expected}', { expected: 'digit', found: 3 }),
				'found 3, expected digit'
			)
		})

		it('should keep unknown placeholders', () => {
			assert.strictEqual(interpolateMessage('{known} {missing}', { known: 'a' }), 'a {missing}')
		})

		it('should fill catalog messages', () => {
			assert.strictEqual(interpolateMessage(PSLEX001.message, { char: '~' }), "unexpected character '~'")
			assert.strictEqual(
				interpolateMessage(PSLEX003.message, { digits: '12²' }),
				'invalid digit in number literal: 12²'
			)
		})
	})

	describe('catalog', () => {
		it('should register every lexer diagnostic as an error under its own code', () => {
			for (const [code, def] of Object.entries(LEXER_DIAGNOSTICS)) {
				assert.strictEqual(def.code, code)
				assert.strictEqual(def.severity, DiagnosticSeverity.Error)
			}
			assert.deepStrictEqual(Object.keys(LEXER_DIAGNOSTICS), ['PSLEX001', 'PSLEX002', 'PSLEX003'])
		})

		it('should label severities', () => {
			assert.strictEqual(severityLabel(DiagnosticSeverity.Error), 'error')
			assert.strictEqual(severityLabel(DiagnosticSeverity.Warning), 'warning')
			assert.strictEqual(severityLabel(DiagnosticSeverity.Note), 'note')
		})
	})
})
