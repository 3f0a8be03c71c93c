/**
 * Suggestion synthesis.
 */

export {
	type ArgumentMismatch,
	diffObjectTypes,
	extractObjectType,
	findArgumentMismatch,
	findAssignability,
	lastQuotedAfter,
	type PropertyMismatch,
	parseObjectProperties,
	quotedPart,
	tokenAt,
} from './extract.ts'
export {
	type Emphasize,
	plain,
	renderFallback,
	renderSuggestion,
	type SuggestionArgs,
} from './render.ts'
export { builtinStrategy, type Strategy } from './strategies.ts'
export { type SynthesizeOptions, synthesize } from './synthesize.ts'
