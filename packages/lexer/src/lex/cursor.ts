/**
 * Source cursor: the caller's text plus an offset into it.
 * Advancing produces a new cursor; the text is never sliced or copied until asked for.
 */

export interface SourceCursor {
	readonly source: string
	/** Offset in UTF-16 code units */
	readonly offset: number
}

export function createCursor(source: string, offset = 0): SourceCursor {
	return { offset: Math.min(Math.max(offset, 0), source.length), source }
}

export function isAtEnd(cursor: SourceCursor): boolean {
	return cursor.offset >= cursor.source.length
}

/** First code point of the remaining text, or '' at end of input. */
export function peekChar(cursor: SourceCursor): string {
	const codePoint = cursor.source.codePointAt(cursor.offset)
	return codePoint === undefined ? '' : String.fromCodePoint(codePoint)
}

export function advanceCursor(cursor: SourceCursor, count: number): SourceCursor {
	return createCursor(cursor.source, cursor.offset + count)
}

/** Cursor positioned at the end of the same source. */
export function exhaustedCursor(cursor: SourceCursor): SourceCursor {
	return createCursor(cursor.source, cursor.source.length)
}

export function remainingText(cursor: SourceCursor): string {
	return cursor.source.slice(cursor.offset)
}
