import assert from 'node:assert'
import { describe, it } from 'node:test'
import {
	formatToken,
	isNumberToken,
	numberToken,
	punctuationToken,
	TokenKind,
	tokenKindName,
	tokensEqual,
} from '../../src/core/tokens.ts'

describe('core/tokens', () => {
	describe('TokenKind', () => {
		it('should have correct values for grouping tokens', () => {
			assert.strictEqual(TokenKind.LeftParen, 0)
			assert.strictEqual(TokenKind.RightParen, 1)
			assert.strictEqual(TokenKind.RightAngle, 5)
		})

		it('should have correct value for Number', () => {
			assert.strictEqual(TokenKind.Number, 100)
		})

		it('should have unique values', () => {
			const values = Object.values(TokenKind)
			assert.strictEqual(new Set(values).size, values.length)
			assert.strictEqual(values.length, 16)
		})

		it('should declare kinds grouped by ascending range', () => {
			const values = Object.values(TokenKind)
			assert.deepStrictEqual(values, [...values].sort((a, b) => a - b))
			assert.deepStrictEqual(Object.keys(TokenKind).slice(0, 6), [
				'LeftParen',
				'RightParen',
				'LeftBracket',
				'RightBracket',
				'LeftAngle',
				'RightAngle',
			])
		})
	})

	describe('tokenKindName', () => {
		it('should name kinds', () => {
			assert.strictEqual(tokenKindName(TokenKind.Apostrophe), 'Apostrophe')
			assert.strictEqual(tokenKindName(TokenKind.Number), 'Number')
		})

		it('should throw for unknown kinds', () => {
			assert.throws(() => tokenKindName(999 as never), /Invalid TokenKind: 999/)
		})
	})

	describe('punctuationToken', () => {
		it('should return one frozen instance per kind', () => {
			const a = punctuationToken(TokenKind.Bang)
			const b = punctuationToken(TokenKind.Bang)
			assert.strictEqual(a, b)
			assert.strictEqual(Object.isFrozen(a), true)
			assert.strictEqual(a.kind, TokenKind.Bang)
		})
	})

	describe('numberToken', () => {
		it('should carry the value', () => {
			const token = numberToken(42)
			assert.strictEqual(token.kind, TokenKind.Number)
			assert.strictEqual(token.value, 42)
			assert.strictEqual(isNumberToken(token), true)
			assert.strictEqual(isNumberToken(punctuationToken(TokenKind.Plus)), false)
		})
	})

	describe('formatToken', () => {
		it('should render payload-free tokens by name', () => {
			assert.strictEqual(formatToken(punctuationToken(TokenKind.LeftBracket)), 'LeftBracket')
		})

		it('should render numbers with their value', () => {
			assert.strictEqual(formatToken(numberToken(7)), 'Number(7)')
		})
	})

	describe('tokensEqual', () => {
		it('should compare kinds and values', () => {
			assert.strictEqual(tokensEqual(numberToken(3), numberToken(3)), true)
			assert.strictEqual(tokensEqual(numberToken(3), numberToken(4)), false)
			assert.strictEqual(
				tokensEqual(punctuationToken(TokenKind.Slash), punctuationToken(TokenKind.Slash)),
				true
			)
			assert.strictEqual(tokensEqual(numberToken(0), punctuationToken(TokenKind.LeftParen)), false)
		})
	})
})
