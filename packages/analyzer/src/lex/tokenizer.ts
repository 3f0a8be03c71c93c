import type { Token } from '../core/tokens.ts'
import { type Lexeme, lex } from '../grammar/index.ts'

const UTF8_BOM = '\uFEFF'

/**
 * Offsets at which each line starts. Index 0 is line 1.
 */
function computeLineStarts(source: string): number[] {
	const starts = [0]
	for (let i = 0; i < source.length; i++) {
		if (source.charAt(i) === '\n') starts.push(i + 1)
	}
	return starts
}

/**
 * Find the 0-based index of the line containing `offset`.
 */
function findLineIndex(lineStarts: readonly number[], offset: number): number {
	let low = 0
	let high = lineStarts.length - 1
	while (low < high) {
		const mid = Math.ceil((low + high) / 2)
		const start = lineStarts[mid] ?? 0
		if (start <= offset) {
			low = mid
		} else {
			high = mid - 1
		}
	}
	return low
}

function toToken(lexeme: Lexeme, lineStarts: readonly number[]): Token {
	const index = findLineIndex(lineStarts, lexeme.offset)
	const lineStart = lineStarts[index] ?? 0
	return {
		column: lexeme.offset - lineStart,
		line: index + 1,
		raw: lexeme.raw,
	}
}

/**
 * A lexeme that starts a construct which may continue on the next line:
 * a template literal, a block comment, or a string whose line ends with a
 * backslash. Lexed on its own, such a construct falls back to punctuators.
 */
function leavesConstructOpen(chunk: string, lexemes: readonly Lexeme[]): boolean {
	const continued = chunk.endsWith('\\\n')
	return lexemes.some((lexeme, index) => {
		if (lexeme.raw === '`') return true
		if (continued && (lexeme.raw === '"' || lexeme.raw === "'")) return true
		if (lexeme.raw !== '/') return false
		const next = lexemes[index + 1]
		return next !== undefined && next.offset === lexeme.offset + 1 && next.raw.startsWith('*')
	})
}

/**
 * Lex `text` a group of lines at a time, with offsets into the whole text.
 *
 * A group that leaves a construct open is retried with twice as many lines,
 * so every token comes out as it would from lexing the whole text at once.
 */
function lexByLines(
	text: string,
	lineStarts: readonly number[],
	chunkLines: number
): Lexeme[] | undefined {
	const lexemes: Lexeme[] = []
	let first = 0
	let size = chunkLines

	while (first < lineStarts.length) {
		const last = Math.min(first + size, lineStarts.length)
		const from = lineStarts[first] ?? text.length
		const to = lineStarts[last] ?? text.length
		const chunk = text.slice(from, to)
		const result = lex(chunk)
		const final = last === lineStarts.length

		if (!final && (!result.succeeded || leavesConstructOpen(chunk, result.lexemes))) {
			size *= 2
			continue
		}
		if (!result.succeeded) return undefined

		for (const lexeme of result.lexemes) {
			lexemes.push({ offset: lexeme.offset + from, raw: lexeme.raw })
		}
		first = last
		size = chunkLines
	}

	return lexemes
}

export interface TokenizeOptions {
	/** Lines lexed per match; larger inputs are split into groups of this size */
	chunkLines?: number
}

const DEFAULT_CHUNK_LINES = 256

/**
 * Tokenize TypeScript source into positioned tokens.
 *
 * Whitespace and comments are dropped. Lines are 1-based, columns are 0-based.
 * A leading byte order mark is not part of any line.
 *
 * @param source - Source text of one file
 * @returns Tokens in source order
 */
export function tokenize(source: string, options: TokenizeOptions = {}): Token[] {
	const text = source.startsWith(UTF8_BOM) ? source.slice(UTF8_BOM.length) : source
	const lineStarts = computeLineStarts(text)

	const lexemes = lexByLines(text, lineStarts, Math.max(1, options.chunkLines ?? DEFAULT_CHUNK_LINES))
	if (lexemes === undefined) return []

	return lexemes.map((lexeme) => toToken(lexeme, lineStarts))
}
