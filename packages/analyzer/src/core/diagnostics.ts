/**
 * Structured records produced from checker output.
 */

import type { ErrorKindValue } from '@tshint/diagnostics'

/**
 * One checker diagnostic, parsed from a single output line.
 *
 * `line` and `column` are copied from the diagnostic text without conversion;
 * they are 1-based positions in `file`.
 */
export interface DiagnosticError {
	readonly file: string
	readonly line: number
	readonly column: number
	readonly code: ErrorKindValue
	readonly message: string
}

/**
 * Suggestion lines for one diagnostic, plus an optional help line.
 */
export interface Suggestion {
	readonly suggestions: readonly string[]
	readonly help?: string | undefined
}

/**
 * A diagnostic paired with its suggestion, when one is available.
 */
export interface AnalyzedDiagnostic {
	readonly error: DiagnosticError
	readonly suggestion?: Suggestion | undefined
}
