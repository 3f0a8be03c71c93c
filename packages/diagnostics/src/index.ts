/**
 * @tshint/diagnostics
 *
 * Error kinds, checker code table and suggestion catalog shared by tshint packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	THCLI001,
	THCLI002,
	THCLI003,
	THCLI004,
} from './cli.ts'
export { interpolateMessage, templateKeys } from './interpolate.ts'
export {
	CODE_TABLE,
	ERROR_CODES,
	ErrorKind,
	type ErrorKindValue,
	KNOWN_ERROR_KINDS,
	type KnownErrorKind,
	type UnsupportedErrorKind,
} from './kinds.ts'
export {
	type CatalogEntry,
	type FallbackDef,
	getSuggestionDef,
	SUGGESTION_CATALOG,
} from './suggestions.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
	EmphasisTone,
	type EmphasisTone as EmphasisToneType,
	type SuggestionDef,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'

/**
 * All valid CLI diagnostic codes.
 */
export type DiagnosticCode = keyof typeof CLI_DIAGNOSTICS

/**
 * Get a CLI diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof CLI_DIAGNOSTICS)[typeof code] {
	return CLI_DIAGNOSTICS[code]
}
