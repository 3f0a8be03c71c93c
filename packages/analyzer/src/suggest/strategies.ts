/**
 * Per-kind suggestion strategies.
 *
 * Each strategy pulls its values out of the message (by quoted position) or
 * out of the token at the error position, and fills the kind's catalog
 * templates. A missing value becomes a placeholder noun, so a covered kind
 * always produces a suggestion.
 */
import { ErrorKind, getSuggestionDef, type KnownErrorKind } from '@tshint/diagnostics'
import type { DiagnosticError, Suggestion } from '../core/diagnostics.ts'
import type { Token } from '../core/tokens.ts'
import {
	findArgumentMismatch,
	findAssignability,
	lastQuotedAfter,
	quotedPart,
	tokenAt,
} from './extract.ts'
import { type Emphasize, renderFallback, renderLines, renderSuggestion } from './render.ts'

/**
 * Build a suggestion for one diagnostic.
 * Returning undefined means no suggestion is available.
 */
export type Strategy = (
	error: DiagnosticError,
	tokens: readonly Token[],
	emphasize: Emphasize
) => Suggestion | undefined

function quoted(error: DiagnosticError, index: number, placeholder: string): string {
	return quotedPart(error.message, index) ?? placeholder
}

function tokenName(error: DiagnosticError, tokens: readonly Token[]): string | undefined {
	return tokenAt(tokens, error.line, error.column)?.raw
}

/**
 * A strategy that fills a kind's templates from quoted message parts.
 * `parts` maps placeholder name to [quote index, placeholder noun].
 */
function fromQuotes(
	kind: KnownErrorKind,
	parts: Readonly<Record<string, readonly [number, string]>>
): Strategy {
	return (error, _tokens, emphasize) => {
		const args: Record<string, string> = {}
		for (const [key, [index, placeholder]] of Object.entries(parts)) {
			args[key] = quoted(error, index, placeholder)
		}
		return renderSuggestion(getSuggestionDef(kind), args, emphasize)
	}
}

/**
 * A strategy whose text never depends on the diagnostic.
 */
function fixed(kind: KnownErrorKind): Strategy {
	return (_error, _tokens, emphasize) => renderSuggestion(getSuggestionDef(kind), {}, emphasize)
}

// =============================================================================
// STRATEGIES WITH CUSTOM EXTRACTION
// =============================================================================

const typeMismatch: Strategy = (error, _tokens, emphasize) => {
	const types = findAssignability(error.message)
	return renderSuggestion(
		getSuggestionDef(ErrorKind.TypeMismatch),
		{ from: types?.from ?? 'type', to: types?.to ?? 'type' },
		emphasize
	)
}

/**
 * One line per property whose provided type differs from the expected one.
 * Without such a property only the help line remains.
 */
const inlineTypeMismatch: Strategy = (error, _tokens, emphasize) => {
	const entry = getSuggestionDef(ErrorKind.InlineTypeMismatch)
	const { help } = renderSuggestion(entry, {}, emphasize)
	const mismatches = findArgumentMismatch(error.message)?.mismatches ?? []

	const suggestions = mismatches.flatMap((mismatch) =>
		renderLines(
			entry,
			entry.suggestions,
			{ expected: mismatch.expected, property: mismatch.property, provided: mismatch.provided },
			emphasize
		)
	)
	return { help, suggestions }
}

const missingParameters: Strategy = (error, tokens, emphasize) => {
	const name = tokenName(error, tokens) ?? quoted(error, 1, 'function')
	return renderSuggestion(getSuggestionDef(ErrorKind.MissingParameters), { name }, emphasize)
}

const propertyMissingInType: Strategy = (error, tokens, emphasize) => {
	const entry = getSuggestionDef(ErrorKind.PropertyMissingInType)
	const type = lastQuotedAfter(error.message, "type '")
	if (type === undefined) return renderFallback(entry, {}, emphasize)

	const name = tokenName(error, tokens) ?? 'object'
	return renderSuggestion(entry, { name, type }, emphasize)
}

/**
 * "Object is possibly 'undefined'." quotes the value, not the subject; the
 * subject then comes from the source token. "'x' is possibly 'undefined'."
 * quotes the subject first.
 */
const objectPossiblyUndefined: Strategy = (error, tokens, emphasize) => {
	const name = error.message.startsWith('Object is possibly')
		? (tokenName(error, tokens) ?? 'object')
		: quoted(error, 1, 'object')
	return renderSuggestion(getSuggestionDef(ErrorKind.ObjectIsPossiblyUndefined), { name }, emphasize)
}

const uncallableExpression: Strategy = (error, tokens, emphasize) => {
	const name = quotedPart(error.message, 1) ?? tokenName(error, tokens) ?? 'expression'
	return renderSuggestion(getSuggestionDef(ErrorKind.UncallableExpression), { name }, emphasize)
}

// =============================================================================
// DISPATCH
// =============================================================================

const noImplicitAny = fromQuotes(ErrorKind.NoImplicitAny, { name: [1, 'parameter'] })

const propertyDoesNotExist = fromQuotes(ErrorKind.PropertyDoesNotExist, {
	property: [1, 'property'],
	type: [3, 'type'],
})

const directCast = fromQuotes(ErrorKind.DirectCastPotentiallyMistaken, {
	from: [1, 'type'],
	to: [3, 'type'],
})

const invalidShadow = fromQuotes(ErrorKind.InvalidShadowInScope, { name: [1, 'variable'] })

const missingModule = fromQuotes(ErrorKind.NonExistentModuleImport, { name: [1, 'module'] })

const readonlyAssignment = fromQuotes(ErrorKind.ReadonlyPropertyAssignment, {
	property: [1, 'property'],
})

const incorrectImplementation = fromQuotes(ErrorKind.IncorrectInterfaceImplementation, {
	className: [1, 'class'],
	interfaceName: [3, 'interface'],
	property: [5, 'property'],
})

const propertyNotAssignableToBase = fromQuotes(ErrorKind.PropertyNotAssignableToBase, {
	baseType: [5, 'base type'],
	implType: [3, 'type'],
	property: [1, 'property'],
	propertyBaseType: [9, 'base type'],
	propertyImplType: [7, 'type'],
})

const cannotFindIdentifier = fromQuotes(ErrorKind.CannotFindIdentifier, {
	name: [1, 'identifier'],
})

const invalidIndexType = fromQuotes(ErrorKind.InvalidIndexType, { type: [1, 'type'] })

const typoProperty = fromQuotes(ErrorKind.TypoPropertyOnType, {
	property: [1, 'property'],
	suggested: [5, 'property'],
	type: [3, 'type'],
})

/**
 * Select the built-in strategy for a kind.
 *
 * `object-is-unknown` and `object-possibly-null` have none: their messages
 * do not carry the subject reliably. Callers can still cover them through
 * `SynthesizeOptions.strategies`.
 */
export function builtinStrategy(kind: KnownErrorKind): Strategy | undefined {
	switch (kind) {
		case ErrorKind.TypeMismatch:
			return typeMismatch
		case ErrorKind.InlineTypeMismatch:
			return inlineTypeMismatch
		case ErrorKind.MissingParameters:
			return missingParameters
		case ErrorKind.NoImplicitAny:
			return noImplicitAny
		case ErrorKind.PropertyMissingInType:
			return propertyMissingInType
		case ErrorKind.UnintentionalComparison:
			return fixed(kind)
		case ErrorKind.PropertyDoesNotExist:
			return propertyDoesNotExist
		case ErrorKind.ObjectIsPossiblyUndefined:
			return objectPossiblyUndefined
		case ErrorKind.DirectCastPotentiallyMistaken:
			return directCast
		case ErrorKind.SpreadArgumentMustBeTuple:
		case ErrorKind.RightSideArithmeticMustBeNumber:
		case ErrorKind.LeftSideArithmeticMustBeNumber:
		case ErrorKind.IncompatibleOverload:
		case ErrorKind.MissingReturnValue:
			return fixed(kind)
		case ErrorKind.InvalidShadowInScope:
			return invalidShadow
		case ErrorKind.NonExistentModuleImport:
			return missingModule
		case ErrorKind.ReadonlyPropertyAssignment:
			return readonlyAssignment
		case ErrorKind.IncorrectInterfaceImplementation:
			return incorrectImplementation
		case ErrorKind.PropertyNotAssignableToBase:
			return propertyNotAssignableToBase
		case ErrorKind.CannotFindIdentifier:
			return cannotFindIdentifier
		case ErrorKind.UncallableExpression:
			return uncallableExpression
		case ErrorKind.InvalidIndexType:
			return invalidIndexType
		case ErrorKind.TypoPropertyOnType:
			return typoProperty
		case ErrorKind.ObjectIsPossiblyNull:
		case ErrorKind.ObjectIsUnknown:
			return undefined
		default: {
			const unhandled: never = kind
			return unhandled
		}
	}
}
