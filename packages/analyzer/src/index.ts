/**
 * tshint Analyzer Public API
 *
 * One-way pipeline, every stage a pure function:
 * - Parsing (checker output line → DiagnosticError, code classified)
 * - Tokenization (source text → positioned tokens)
 * - Synthesis (DiagnosticError + tokens → Suggestion)
 */

import type { AnalyzedDiagnostic, DiagnosticError } from './core/diagnostics.ts'
import type { Token } from './core/tokens.ts'
import { parseDiagnosticOutput } from './parse/parser.ts'
import { type SynthesizeOptions, synthesize } from './suggest/synthesize.ts'

export {
	type AnalyzedDiagnostic,
	type DiagnosticError,
	type Suggestion,
	type Token,
	tokenSpans,
} from './core/index.ts'
export { type TokenizeOptions, tokenize } from './lex/index.ts'
export {
	classify,
	codeOf,
	isUnsupported,
	parseDiagnostic,
	parseDiagnosticOutput,
} from './parse/index.ts'
export {
	type ArgumentMismatch,
	builtinStrategy,
	diffObjectTypes,
	type Emphasize,
	extractObjectType,
	findArgumentMismatch,
	findAssignability,
	lastQuotedAfter,
	type PropertyMismatch,
	parseObjectProperties,
	plain,
	quotedPart,
	renderFallback,
	renderSuggestion,
	type Strategy,
	type SuggestionArgs,
	type SynthesizeOptions,
	synthesize,
	tokenAt,
} from './suggest/index.ts'

/**
 * Supplies the tokens of a file named in a diagnostic.
 */
export type TokenSource = (file: string) => readonly Token[]

/**
 * Build a suggestion for every parsed diagnostic.
 *
 * `tokensFor` is called at most once per distinct file, in order of first
 * appearance.
 *
 * @param errors - Parsed diagnostics
 * @param tokensFor - Token lookup for the files the diagnostics point into
 * @param options - Synthesis options
 * @returns Diagnostics in input order, each with its suggestion when one is available
 */
export function analyzeDiagnostics(
	errors: readonly DiagnosticError[],
	tokensFor: TokenSource,
	options: SynthesizeOptions = {}
): AnalyzedDiagnostic[] {
	const cache = new Map<string, readonly Token[]>()

	const lookup = (file: string): readonly Token[] => {
		const cached = cache.get(file)
		if (cached !== undefined) return cached
		const tokens = tokensFor(file)
		cache.set(file, tokens)
		return tokens
	}

	return errors.map((error) => ({
		error,
		suggestion: synthesize(error, lookup(error.file), options),
	}))
}

/**
 * Parse checker output and build a suggestion for every diagnostic in it.
 */
export function analyzeOutput(
	output: string,
	tokensFor: TokenSource,
	options: SynthesizeOptions = {}
): AnalyzedDiagnostic[] {
	return analyzeDiagnostics(parseDiagnosticOutput(output), tokensFor, options)
}
