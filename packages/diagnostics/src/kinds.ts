/**
 * Error kinds recognized in TypeScript checker output.
 *
 * Each kind owns one or more `TSxxxx` codes. The first code listed for a kind
 * is its canonical code; the rest are aliases the checker emits for the same
 * problem under different wording.
 */

/** Known error kinds - string discriminant. */
export const ErrorKind = {
	CannotFindIdentifier: 'cannot-find-identifier',
	DirectCastPotentiallyMistaken: 'direct-cast-potentially-mistaken',
	IncompatibleOverload: 'incompatible-overload',
	IncorrectInterfaceImplementation: 'incorrect-interface-implementation',
	InlineTypeMismatch: 'inline-type-mismatch',
	InvalidIndexType: 'invalid-index-type',
	InvalidShadowInScope: 'invalid-shadow-in-scope',
	LeftSideArithmeticMustBeNumber: 'left-side-arithmetic-must-be-number',
	MissingParameters: 'missing-parameters',
	MissingReturnValue: 'missing-return-value',
	NoImplicitAny: 'no-implicit-any',
	NonExistentModuleImport: 'non-existent-module-import',
	ObjectIsPossiblyNull: 'object-possibly-null',
	ObjectIsPossiblyUndefined: 'object-possibly-undefined',
	ObjectIsUnknown: 'object-is-unknown',
	PropertyDoesNotExist: 'property-does-not-exist',
	PropertyMissingInType: 'property-missing-in-type',
	PropertyNotAssignableToBase: 'property-not-assignable-to-base',
	ReadonlyPropertyAssignment: 'readonly-property-assignment',
	RightSideArithmeticMustBeNumber: 'right-side-arithmetic-must-be-number',
	SpreadArgumentMustBeTuple: 'spread-argument-must-be-tuple',
	TypeMismatch: 'type-mismatch',
	TypoPropertyOnType: 'typo-property-on-type',
	UncallableExpression: 'uncallable-expression',
	UnintentionalComparison: 'unintentional-comparison',
} as const

export type KnownErrorKind = (typeof ErrorKind)[keyof typeof ErrorKind]

/**
 * A code that is not in the table. The original code string is kept verbatim.
 */
export interface UnsupportedErrorKind {
	readonly kind: 'unsupported'
	readonly code: string
}

export type ErrorKindValue = KnownErrorKind | UnsupportedErrorKind

/**
 * Codes per kind, canonical code first.
 */
export const ERROR_CODES: { readonly [K in KnownErrorKind]: readonly [string, ...string[]] } = {
	'cannot-find-identifier': ['TS2304'],
	'direct-cast-potentially-mistaken': ['TS2352'],
	'incompatible-overload': ['TS2394'],
	'incorrect-interface-implementation': ['TS2420'],
	'inline-type-mismatch': ['TS2345'],
	'invalid-index-type': ['TS2538'],
	'invalid-shadow-in-scope': ['TS2451'],
	'left-side-arithmetic-must-be-number': ['TS2362'],
	'missing-parameters': ['TS2554'],
	'missing-return-value': ['TS2355'],
	'no-implicit-any': ['TS7006', 'TS7044'],
	'non-existent-module-import': ['TS2307'],
	'object-is-unknown': ['TS18046'],
	'object-possibly-null': ['TS2531', 'TS18047'],
	'object-possibly-undefined': ['TS2532', 'TS18048'],
	'property-does-not-exist': ['TS2339'],
	'property-missing-in-type': ['TS2741'],
	'property-not-assignable-to-base': ['TS2416'],
	'readonly-property-assignment': ['TS2540'],
	'right-side-arithmetic-must-be-number': ['TS2363'],
	'spread-argument-must-be-tuple': ['TS2556'],
	'type-mismatch': ['TS2322'],
	'typo-property-on-type': ['TS2551'],
	'uncallable-expression': ['TS2349'],
	'unintentional-comparison': ['TS2367'],
}

/**
 * All known kinds, in declaration order.
 */
export const KNOWN_ERROR_KINDS: readonly KnownErrorKind[] = Object.values(ErrorKind)

function buildCodeTable(): ReadonlyMap<string, KnownErrorKind> {
	const table = new Map<string, KnownErrorKind>()
	for (const kind of KNOWN_ERROR_KINDS) {
		for (const code of ERROR_CODES[kind]) {
			table.set(code, kind)
		}
	}
	return table
}

/**
 * Lookup table from checker code (e.g. `TS2322`) to its kind.
 */
export const CODE_TABLE: ReadonlyMap<string, KnownErrorKind> = buildCodeTable()
