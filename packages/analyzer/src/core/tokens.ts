/**
 * A lexical unit of a source file.
 *
 * `line` is 1-based, like checker output. `column` is the 0-based UTF-16
 * offset within the line, one less than the column the checker reports for
 * the same position.
 */
export interface Token {
	readonly raw: string
	readonly line: number
	readonly column: number
}

/**
 * Check whether a 0-based column falls inside a token's span on its line.
 */
export function tokenSpans(token: Token, line: number, column: number): boolean {
	return token.line === line && column >= token.column && column < token.column + token.raw.length
}
