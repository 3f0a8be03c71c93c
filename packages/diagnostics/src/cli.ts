/**
 * CLI diagnostic definitions.
 *
 * Error code format: THCLI<NUMBER>
 * - THCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (THCLI001-099)
// =============================================================================

export const THCLI001: DiagnosticDef = {
	code: 'THCLI001',
	description: "tshint couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const THCLI002: DiagnosticDef = {
	code: 'THCLI002',
	description: "The file exists but tshint can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const THCLI003: DiagnosticDef = {
	code: 'THCLI003',
	description: "tshint doesn't recognize this output format.",
	message: 'unknown format "{format}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Use `--format text` for readable output or `--format json` for tooling.',
}

export const THCLI004: DiagnosticDef = {
	code: 'THCLI004',
	description: 'A diagnostic points at a source file that could not be read.',
	message: 'source unavailable: {path}',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Run tshint from the directory tsc was run in, or pass `--cwd`.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	THCLI001,
	THCLI002,
	THCLI003,
	THCLI004,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
