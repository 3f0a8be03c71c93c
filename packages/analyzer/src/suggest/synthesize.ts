import type { KnownErrorKind } from '@tshint/diagnostics'
import type { DiagnosticError, Suggestion } from '../core/diagnostics.ts'
import type { Token } from '../core/tokens.ts'
import { isUnsupported } from '../parse/classify.ts'
import { type Emphasize, plain } from './render.ts'
import { builtinStrategy, type Strategy } from './strategies.ts'

export interface SynthesizeOptions {
	/** Decorates extracted values, e.g. with color */
	emphasize?: Emphasize
	/** Strategies that take precedence over the built-in ones, per kind */
	strategies?: Partial<Record<KnownErrorKind, Strategy>>
}

/**
 * Build a suggestion for a diagnostic.
 *
 * @param error - Parsed diagnostic
 * @param tokens - Tokens of the file the diagnostic points into
 * @returns The suggestion, or undefined for unsupported codes and kinds without a strategy
 */
export function synthesize(
	error: DiagnosticError,
	tokens: readonly Token[],
	options: SynthesizeOptions = {}
): Suggestion | undefined {
	const kind = error.code
	if (isUnsupported(kind)) return undefined

	const strategy = options.strategies?.[kind] ?? builtinStrategy(kind)
	if (strategy === undefined) return undefined

	return strategy(error, tokens, options.emphasize ?? plain)
}
