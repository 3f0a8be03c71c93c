import {
	type CatalogEntry,
	type DiagnosticArgs,
	EmphasisTone,
	interpolateMessage,
} from '@tshint/diagnostics'
import type { Suggestion } from '../core/diagnostics.ts'

/**
 * Decorate an extracted value before it is embedded in a suggestion.
 * Used by renderers to add color; the default leaves the value unchanged.
 */
export type Emphasize = (value: string, tone: EmphasisTone) => string

export const plain: Emphasize = (value) => value

/**
 * Values a strategy extracted for a catalog entry's placeholders.
 */
export type SuggestionArgs = Readonly<Record<string, string>>

function emphasizeArgs(
	entry: CatalogEntry,
	args: SuggestionArgs,
	emphasize: Emphasize
): DiagnosticArgs {
	const result: DiagnosticArgs = {}
	for (const [key, value] of Object.entries(args)) {
		result[key] = emphasize(value, entry.emphasis?.[key] ?? EmphasisTone.Error)
	}
	return result
}

/**
 * Fill every template of an entry's line list.
 */
export function renderLines(
	entry: CatalogEntry,
	templates: readonly string[],
	args: SuggestionArgs,
	emphasize: Emphasize
): string[] {
	const values = emphasizeArgs(entry, args, emphasize)
	return templates.map((template) => interpolateMessage(template, values))
}

/**
 * Fill an optional help template.
 */
export function renderHelp(
	entry: CatalogEntry,
	template: string | undefined,
	args: SuggestionArgs,
	emphasize: Emphasize
): string | undefined {
	if (template === undefined) return undefined
	return interpolateMessage(template, emphasizeArgs(entry, args, emphasize))
}

/**
 * Build a suggestion from a catalog entry's main templates.
 */
export function renderSuggestion(
	entry: CatalogEntry,
	args: SuggestionArgs,
	emphasize: Emphasize
): Suggestion {
	return {
		help: renderHelp(entry, entry.help, args, emphasize),
		suggestions: renderLines(entry, entry.suggestions, args, emphasize),
	}
}

/**
 * Build a suggestion from a catalog entry's fallback templates.
 * The fallback's help replaces the main help only when it has one.
 * Entries without a fallback render their main templates.
 */
export function renderFallback(
	entry: CatalogEntry,
	args: SuggestionArgs,
	emphasize: Emphasize
): Suggestion {
	const { fallback } = entry
	if (fallback === undefined) return renderSuggestion(entry, args, emphasize)
	return {
		help: renderHelp(entry, fallback.help ?? entry.help, args, emphasize),
		suggestions: renderLines(entry, fallback.suggestions, args, emphasize),
	}
}
