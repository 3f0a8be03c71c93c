import {
	CODE_TABLE,
	ERROR_CODES,
	type ErrorKindValue,
	type KnownErrorKind,
	type UnsupportedErrorKind,
} from '@tshint/diagnostics'

/**
 * Map a checker code (e.g. `TS2322`) to its error kind.
 * Never fails: codes outside the table become `unsupported`, keeping the code verbatim.
 */
export function classify(code: string): ErrorKindValue {
	return CODE_TABLE.get(code) ?? { code, kind: 'unsupported' }
}

export function isUnsupported(kind: ErrorKindValue): kind is UnsupportedErrorKind {
	return typeof kind !== 'string'
}

/**
 * Inverse of `classify`.
 *
 * Aliased kinds answer with their canonical code, so `codeOf(classify('TS7044'))`
 * is `TS7006`. Unsupported kinds answer with the code they were created from.
 */
export function codeOf(kind: ErrorKindValue): string {
	if (isUnsupported(kind)) return kind.code
	return canonicalCode(kind)
}

function canonicalCode(kind: KnownErrorKind): string {
	return ERROR_CODES[kind][0]
}
