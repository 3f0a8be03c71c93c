/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Note: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>

/**
 * How an extracted value is highlighted when it is embedded into a suggestion.
 * - error: the offending value
 * - expected: the value the checker wanted
 * - warning: a value worth a second look
 */
export const EmphasisTone = {
	Error: 'error',
	Expected: 'expected',
	Warning: 'warning',
} as const

export type EmphasisTone = (typeof EmphasisTone)[keyof typeof EmphasisTone]

/**
 * Suggestion templates for one error kind.
 *
 * Every `{name}` placeholder is filled from the arguments the kind's strategy
 * extracts. Placeholders without an `emphasis` entry are highlighted as errors.
 */
export interface SuggestionDef {
	readonly code: string
	readonly title: string
	readonly suggestions: readonly string[]
	readonly help?: string
	readonly emphasis?: Readonly<Record<string, EmphasisTone>>
}
