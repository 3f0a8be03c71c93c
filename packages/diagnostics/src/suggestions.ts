/**
 * Suggestion catalog for TypeScript checker errors.
 *
 * One entry per error kind, named after the kind's canonical code. Templates
 * use `{name}` placeholders that the analyzer fills with values extracted
 * from the diagnostic message or from the source token at the error position.
 */

import type { KnownErrorKind } from './kinds.ts'
import { EmphasisTone, type SuggestionDef } from './types.ts'

/**
 * Lines used when a strategy cannot find the subject it needs.
 */
export interface FallbackDef {
	readonly suggestions: readonly string[]
	readonly help?: string
}

export interface CatalogEntry extends SuggestionDef {
	readonly fallback?: FallbackDef
}

// =============================================================================
// ASSIGNABILITY
// =============================================================================

export const TS2322: CatalogEntry = {
	code: 'TS2322',
	emphasis: { to: EmphasisTone.Expected },
	help: 'Ensure that the types are compatible or perform an explicit conversion.',
	suggestions: ['Try converting this value from `{from}` to `{to}`.'],
	title: 'Type is not assignable',
}

export const TS2345: CatalogEntry = {
	code: 'TS2345',
	emphasis: { expected: EmphasisTone.Expected },
	help: 'Check the function arguments to ensure they match the expected parameter types.',
	suggestions: ['Property `{property}` is provided as `{provided}` but expects `{expected}`.'],
	title: 'Argument type mismatch',
}

export const TS2352: CatalogEntry = {
	code: 'TS2352',
	emphasis: { from: EmphasisTone.Warning, to: EmphasisTone.Warning },
	help: 'Consider using type guards or intermediate conversions to ensure type safety when casting from `{from}` to `{to}`, only intermediately cast `as unknown` if this is desired.',
	suggestions: [
		'Directly casting from `{from}` to `{to}` can be unsafe or mistaken, as both types do not overlap sufficiently.',
	],
	title: 'Type assertion may be a mistake',
}

export const TS2416: CatalogEntry = {
	code: 'TS2416',
	emphasis: { propertyBaseType: EmphasisTone.Expected },
	help: 'Ensure that the type of property `{property}` in class `{implType}` is compatible with the type defined in base class `{baseType}`.',
	suggestions: [
		'Property `{property}` in class `{implType}` is not assignable to the same property in base class `{baseType}`.',
		'Property `{property}` is implemented as type `{propertyImplType}` but defined as `{propertyBaseType}`.',
	],
	title: 'Property not assignable to base type',
}

export const TS2741: CatalogEntry = {
	code: 'TS2741',
	fallback: {
		help: 'Ensure the object has all required properties defined in the type.',
		suggestions: [
			'Verify that the object structure includes all required members of the specified type.',
		],
	},
	help: 'Ensure that `{name}` has all required properties defined in the type `{type}`.',
	suggestions: ['Verify that `{name}` matches the annotated type `{type}`.'],
	title: 'Property is missing in type',
}

export const TS2420: CatalogEntry = {
	code: 'TS2420',
	help: 'Ensure that `{className}` provides all required properties and methods defined in the interface `{interfaceName}`.',
	suggestions: [
		'Class `{className}` does not implement `{property}` from interface `{interfaceName}`.',
	],
	title: 'Class incorrectly implements interface',
}

// =============================================================================
// CALLS
// =============================================================================

export const TS2554: CatalogEntry = {
	code: 'TS2554',
	help: 'Function `{name}` is missing 1 or more arguments.',
	suggestions: ['Check if all required arguments are provided when invoking `{name}`.'],
	title: 'Wrong number of arguments',
}

export const TS2556: CatalogEntry = {
	code: 'TS2556',
	help: "Ensure that the argument being spread is a tuple type compatible with the function's parameter type.",
	suggestions: ['The argument being spread must be a tuple type or a `spreadable` type.'],
	title: 'Invalid spread argument',
}

export const TS2394: CatalogEntry = {
	code: 'TS2394',
	help: 'Check the function overloads and ensure that this signature adheres to the parent signature.',
	suggestions: ['The provided arguments do not match any overload of the function.'],
	title: 'Overload signature not compatible',
}

export const TS2349: CatalogEntry = {
	code: 'TS2349',
	help: 'Ensure that `{name}` is a function or has a callable signature before invoking it.',
	suggestions: ['Expression `{name}` can not be invoked or called.'],
	title: 'Expression is not callable',
}

export const TS2355: CatalogEntry = {
	code: 'TS2355',
	help: 'A function that declares a return type must return a value of that type on all branches.',
	suggestions: ['A return value is missing where one is expected.'],
	title: 'Function must return a value',
}

// =============================================================================
// NAMES AND PROPERTIES
// =============================================================================

export const TS7006: CatalogEntry = {
	code: 'TS7006',
	help: "Consider adding type annotations to avoid implicit 'any' types.",
	suggestions: ['`{name}` is implicitly `any`.'],
	title: 'Implicit any',
}

export const TS2339: CatalogEntry = {
	code: 'TS2339',
	help: 'Ensure the property exists on the type or adjust your code to avoid accessing it.',
	suggestions: ['Property `{property}` is not found on type `{type}`.'],
	title: 'Property does not exist',
}

export const TS2551: CatalogEntry = {
	code: 'TS2551',
	emphasis: { suggested: EmphasisTone.Expected, type: EmphasisTone.Warning },
	help: 'Check for typos in the property name `{property}` or ensure that it is defined on type `{type}`.',
	suggestions: ['Property `{property}` does not exist on type `{type}`. Try `{suggested}` instead.'],
	title: 'Property does not exist (did you mean)',
}

export const TS2540: CatalogEntry = {
	code: 'TS2540',
	help: 'Consider removing the assignment to the read-only property `{property}` or changing its declaration to be mutable.',
	suggestions: ['Property `{property}` is readonly and thus can not be re-assigned.'],
	title: 'Cannot assign to read-only property',
}

export const TS2451: CatalogEntry = {
	code: 'TS2451',
	help: 'Consider renaming the invalid shadowed variable `{name}`.',
	suggestions: ['Declared variable `{name}` can not shadow another variable in this scope.'],
	title: 'Cannot redeclare block-scoped variable',
}

export const TS2304: CatalogEntry = {
	code: 'TS2304',
	help: 'Ensure that `{name}` is declared and accessible in the current scope or remove this reference.',
	suggestions: ['Identifier `{name}` cannot be found in the current scope.'],
	title: 'Cannot find name',
}

export const TS2307: CatalogEntry = {
	code: 'TS2307',
	help: 'Ensure that the module `{name}` is installed and the import path is correct.',
	suggestions: ['Module `{name}` does not exist.'],
	title: 'Cannot find module',
}

export const TS2538: CatalogEntry = {
	code: 'TS2538',
	help: 'Ensure that the index type is `number`, `string`, `symbol` or a compatible index type.',
	suggestions: ['`{type}` cannot be used as an index accessor.'],
	title: 'Cannot be used as index type',
}

// =============================================================================
// NARROWING
// =============================================================================

export const TS2532: CatalogEntry = {
	code: 'TS2532',
	help: 'Consider optional chaining or an explicit check before attempting to access `{name}`.',
	suggestions: ['`{name}` may be `undefined` here.'],
	title: 'Object is possibly undefined',
}

export const TS2367: CatalogEntry = {
	code: 'TS2367',
	help: 'Review the comparison logic to ensure it makes sense.',
	suggestions: ['Impossible to compare as left side value is narrowed to a single value.'],
	title: 'Condition always returns constant',
}

// No suggestions yet: the checker's wording for these does not carry the
// subject reliably enough to extract it.

export const TS2531: CatalogEntry = {
	code: 'TS2531',
	suggestions: [],
	title: 'Object is possibly null',
}

export const TS18046: CatalogEntry = {
	code: 'TS18046',
	suggestions: [],
	title: 'Object is of type unknown',
}

// =============================================================================
// ARITHMETIC
// =============================================================================

export const TS2362: CatalogEntry = {
	code: 'TS2362',
	help: 'Ensure that the value on the left side of the arithmetic operator is of type `number`, `bigint` or an enum member.',
	suggestions: ['The left-hand side of any arithmetic operation must be a number or enumerable.'],
	title: 'Left-hand side must be numeric',
}

export const TS2363: CatalogEntry = {
	code: 'TS2363',
	help: 'Ensure that the value on the right side of the arithmetic operator is of type `number`, `bigint` or an enum member.',
	suggestions: ['The right-hand side of any arithmetic operation must be a number or enumerable.'],
	title: 'Right-hand side must be numeric',
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of suggestion templates, keyed by error kind.
 */
export const SUGGESTION_CATALOG: { readonly [K in KnownErrorKind]: CatalogEntry } = {
	'cannot-find-identifier': TS2304,
	'direct-cast-potentially-mistaken': TS2352,
	'incompatible-overload': TS2394,
	'incorrect-interface-implementation': TS2420,
	'inline-type-mismatch': TS2345,
	'invalid-index-type': TS2538,
	'invalid-shadow-in-scope': TS2451,
	'left-side-arithmetic-must-be-number': TS2362,
	'missing-parameters': TS2554,
	'missing-return-value': TS2355,
	'no-implicit-any': TS7006,
	'non-existent-module-import': TS2307,
	'object-is-unknown': TS18046,
	'object-possibly-null': TS2531,
	'object-possibly-undefined': TS2532,
	'property-does-not-exist': TS2339,
	'property-missing-in-type': TS2741,
	'property-not-assignable-to-base': TS2416,
	'readonly-property-assignment': TS2540,
	'right-side-arithmetic-must-be-number': TS2363,
	'spread-argument-must-be-tuple': TS2556,
	'type-mismatch': TS2322,
	'typo-property-on-type': TS2551,
	'uncallable-expression': TS2349,
	'unintentional-comparison': TS2367,
}

/**
 * Get the catalog entry for a kind.
 */
export function getSuggestionDef(kind: KnownErrorKind): CatalogEntry {
	return SUGGESTION_CATALOG[kind]
}
