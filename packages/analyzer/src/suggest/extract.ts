/**
 * Value extraction from checker messages and source tokens.
 *
 * Checker messages quote their subjects in single quotes, at fixed positions
 * per message template. Extraction is tied to that wording: when a template
 * changes, these helpers return undefined instead of failing, and callers
 * substitute a placeholder.
 */
import { type Token, tokenSpans } from '../core/tokens.ts'

const QUOTE = "'"

/**
 * Split a message on `'` and take the part at `index`.
 * Odd indexes are the quoted segments: 1 is the first, 3 the second, and so on.
 */
export function quotedPart(message: string, index: number): string | undefined {
	return message.split(QUOTE)[index]
}

/**
 * Find the token covering a checker position.
 *
 * @param line - 1-based line from the diagnostic
 * @param column - 1-based column from the diagnostic
 * @returns The first token, in sequence order, whose span on `line` contains the position
 */
export function tokenAt(tokens: readonly Token[], line: number, column: number): Token | undefined {
	if (column < 1) return undefined
	const target = column - 1
	return tokens.find((token) => tokenSpans(token, line, target))
}

/**
 * Read the segment that starts right after an opening quote at `start`,
 * up to the next quote or the end of the message.
 */
function readQuoted(message: string, start: number): { value: string; end: number } {
	const close = message.indexOf(QUOTE, start)
	if (close === -1) return { end: message.length, value: message.slice(start) }
	return { end: close, value: message.slice(start, close) }
}

/**
 * Source and target types of an assignability message:
 * "Type 'A' is not assignable to type 'B'."
 *
 * The source is the segment after the first `ype '`; the target is the next
 * quoted segment after it.
 */
export function findAssignability(message: string): { from: string; to: string } | undefined {
	const marker = `ype ${QUOTE}`
	const start = message.indexOf(marker, 1)
	if (start === -1) return undefined

	const from = readQuoted(message, start + marker.length)
	const open = message.indexOf(QUOTE, from.end + 1)
	if (from.end === message.length || open === -1) return undefined

	const to = readQuoted(message, open + 1)
	return { from: from.value, to: to.value }
}

/**
 * Take the text after the last occurrence of `marker`, up to the next quote.
 */
export function lastQuotedAfter(message: string, marker: string): string | undefined {
	const start = message.lastIndexOf(marker)
	if (start === -1) return undefined
	const rest = message.slice(start + marker.length)
	const end = rest.indexOf(QUOTE)
	if (end === -1) return undefined
	return rest.slice(0, end)
}

/**
 * Take the text after the first occurrence of `marker`, up to the next quote.
 */
export function extractObjectType(message: string, marker: string): string | undefined {
	const start = message.indexOf(marker)
	if (start === -1) return undefined
	const rest = message.slice(start + marker.length)
	const end = rest.indexOf(QUOTE)
	if (end === -1) return undefined
	return rest.slice(0, end)
}

/**
 * Parse an object type literal such as `{ a: string; b: number; }` into a
 * property → type mapping.
 *
 * Anything that is not wrapped in braces yields an empty mapping. Clauses
 * without a colon are skipped; a repeated property keeps its last type.
 * Nested object types are not supported.
 */
export function parseObjectProperties(literal: string): Map<string, string> {
	const properties = new Map<string, string>()

	const text = literal.trim()
	if (!text.startsWith('{') || !text.endsWith('}')) {
		return properties
	}

	const inner = text.slice(1, -1)
	for (const part of inner.split(';')) {
		const clause = part.trim()
		if (clause.length === 0) continue

		const colon = clause.indexOf(':')
		if (colon === -1) continue

		properties.set(clause.slice(0, colon).trim(), clause.slice(colon + 1).trim())
	}

	return properties
}

export interface PropertyMismatch {
	readonly property: string
	readonly provided: string
	readonly expected: string
}

/**
 * Compare two property mappings.
 *
 * Reports every expected property that is also provided with a different
 * type, sorted by property name. Properties present on one side only are
 * not reported.
 */
export function diffObjectTypes(
	provided: ReadonlyMap<string, string>,
	expected: ReadonlyMap<string, string>
): PropertyMismatch[] {
	const mismatches: PropertyMismatch[] = []
	for (const property of [...expected.keys()].sort()) {
		const expectedType = expected.get(property)
		const providedType = provided.get(property)
		if (expectedType === undefined || providedType === undefined) continue
		if (providedType !== expectedType) {
			mismatches.push({ expected: expectedType, property, provided: providedType })
		}
	}
	return mismatches
}

const ARGUMENT_MARKER = `Argument of type ${QUOTE}`
const PARAMETER_MARKER = `to parameter of type ${QUOTE}`

export interface ArgumentMismatch {
	readonly provided: string
	readonly expected: string
	readonly mismatches: readonly PropertyMismatch[]
}

/**
 * Compare the argument and parameter types of an argument mismatch message:
 * "Argument of type 'A' is not assignable to parameter of type 'B'."
 *
 * Returns undefined when either type cannot be located.
 */
export function findArgumentMismatch(message: string): ArgumentMismatch | undefined {
	const provided = extractObjectType(message, ARGUMENT_MARKER)
	const expected = extractObjectType(message, PARAMETER_MARKER)
	if (provided === undefined || expected === undefined) return undefined

	return {
		expected,
		mismatches: diffObjectTypes(parseObjectProperties(provided), parseObjectProperties(expected)),
		provided,
	}
}
