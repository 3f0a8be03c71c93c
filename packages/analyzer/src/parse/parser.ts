/**
 * Checker output parser.
 *
 * Format: file(line,column): error TSxxxx: message
 *
 * Each separator is split on its first occurrence only, so a `(` inside the
 * file name yields a wrong file/coordinate split. Returns undefined on any
 * line that does not follow the format.
 */
import type { DiagnosticError } from '../core/diagnostics.ts'
import { classify } from './classify.ts'

const ERROR_SEPARATOR = '): error '
const CODE_SEPARATOR = ': '
const DIGITS = /^\d+$/

function splitOnce(text: string, separator: string): [string, string] | undefined {
	const index = text.indexOf(separator)
	if (index === -1) return undefined
	return [text.slice(0, index), text.slice(index + separator.length)]
}

function parseCoordinate(text: string): number | undefined {
	if (!DIGITS.test(text)) return undefined
	const value = Number.parseInt(text, 10)
	return Number.isSafeInteger(value) ? value : undefined
}

/**
 * Parse one line of checker output into a diagnostic.
 */
export function parseDiagnostic(line: string): DiagnosticError | undefined {
	const text = line.endsWith('\r') ? line.slice(0, -1) : line

	const head = splitOnce(text, '(')
	if (head === undefined) return undefined
	const [file, rest] = head

	const location = splitOnce(rest, ERROR_SEPARATOR)
	if (location === undefined) return undefined
	const [coordinates, detail] = location

	const pair = splitOnce(coordinates, ',')
	if (pair === undefined) return undefined

	const body = splitOnce(detail, CODE_SEPARATOR)
	if (body === undefined) return undefined
	const [code, message] = body

	const lineNumber = parseCoordinate(pair[0])
	const column = parseCoordinate(pair[1])
	if (lineNumber === undefined || column === undefined) return undefined

	return {
		code: classify(code),
		column,
		file,
		line: lineNumber,
		message,
	}
}

/**
 * Parse multi-line checker output.
 * Lines that are not diagnostics (summaries, indented continuations, blanks) are skipped.
 */
export function parseDiagnosticOutput(output: string): DiagnosticError[] {
	const errors: DiagnosticError[] = []
	for (const line of output.split('\n')) {
		const error = parseDiagnostic(line)
		if (error !== undefined) errors.push(error)
	}
	return errors
}
