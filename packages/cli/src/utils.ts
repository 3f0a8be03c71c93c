import { resolve } from 'node:path'
import {
	type AnalyzedDiagnostic,
	codeOf,
	type DiagnosticError,
	isUnsupported,
} from '@tshint/analyzer'
import {
	type DiagnosticArgs,
	type DiagnosticCode,
	ERROR_CODES,
	getDiagnostic,
	getSuggestionDef,
	interpolateMessage,
	KNOWN_ERROR_KINDS,
} from '@tshint/diagnostics'

export type OutputFormat = 'text' | 'json'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/**
 * A write to a pipe whose reader has gone away.
 */
export function isBrokenPipe(error: unknown): boolean {
	return isNodeError(error) && error.code === 'EPIPE'
}

/**
 * Format a catalogued CLI diagnostic as `[CODE] message`.
 */
export function formatCliDiagnostic(code: DiagnosticCode, args: DiagnosticArgs): string {
	return `[${code}] ${interpolateMessage(getDiagnostic(code).message, args)}`
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatCliDiagnostic('THCLI001', { path: filePath })
	}
	return formatCliDiagnostic('THCLI002', { reason: getErrorMessage(error) })
}

export function formatInvalidFormatError(format: string): string {
	return formatCliDiagnostic('THCLI003', { format })
}

export function formatSourceWarning(filePath: string): string {
	return formatCliDiagnostic('THCLI004', { path: filePath })
}

export function isValidFormat(value: string): value is OutputFormat {
	return value === 'text' || value === 'json'
}

/**
 * Resolve a file named in a diagnostic against the directory the checker ran in.
 */
export function resolveSourcePath(file: string, cwd: string | undefined): string {
	return resolve(cwd ?? '.', file)
}

/**
 * Kind label for display: the kind name, or `unsupported` for unknown codes.
 */
export function kindLabel(error: DiagnosticError): string {
	return isUnsupported(error.code) ? error.code.kind : error.code
}

/**
 * Format one analyzed diagnostic for the terminal.
 */
export function formatExplanation({ error, suggestion }: AnalyzedDiagnostic): string {
	const lines = [
		`error[${codeOf(error.code)}]: ${error.message}`,
		`  --> ${error.file}:${error.line}:${error.column}`,
	]

	if (suggestion === undefined) {
		lines.push('   = note: no suggestion available')
		return lines.join('\n')
	}

	for (const text of suggestion.suggestions) {
		lines.push(`   = suggestion: ${text}`)
	}
	if (suggestion.help !== undefined) {
		lines.push(`   = help: ${suggestion.help}`)
	}
	return lines.join('\n')
}

export interface ExplanationRecord {
	file: string
	line: number
	column: number
	code: string
	kind: string
	message: string
	suggestions: string[]
	help: string | null
}

/**
 * Flatten an analyzed diagnostic into a JSON-friendly record.
 */
export function toExplanationRecord({ error, suggestion }: AnalyzedDiagnostic): ExplanationRecord {
	return {
		code: codeOf(error.code),
		column: error.column,
		file: error.file,
		help: suggestion?.help ?? null,
		kind: kindLabel(error),
		line: error.line,
		message: error.message,
		suggestions: suggestion === undefined ? [] : [...suggestion.suggestions],
	}
}

/**
 * Summarize a run: how many diagnostics were read and how many got a suggestion.
 */
export function formatSummary(results: readonly AnalyzedDiagnostic[]): string {
	const explained = results.filter((result) => result.suggestion !== undefined).length
	const noun = results.length === 1 ? 'diagnostic' : 'diagnostics'
	return `${results.length} ${noun}, ${explained} with suggestions`
}

/**
 * One row per known code: code, kind and title, padded into columns.
 * Aliases get their own row.
 */
export function formatCodeRows(): string[] {
	const rows: Array<[string, string, string]> = []
	for (const kind of KNOWN_ERROR_KINDS) {
		const { title } = getSuggestionDef(kind)
		for (const code of ERROR_CODES[kind]) {
			rows.push([code, kind, title])
		}
	}

	const codeWidth = Math.max(...rows.map(([code]) => code.length))
	const kindWidth = Math.max(...rows.map(([, kind]) => kind.length))
	return rows.map(
		([code, kind, title]) => `${code.padEnd(codeWidth)}  ${kind.padEnd(kindWidth)}  ${title}`
	)
}
