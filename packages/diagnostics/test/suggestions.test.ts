import assert from 'node:assert'
import { describe, it } from 'node:test'
import { getDiagnostic } from '../src/index.ts'
import { templateKeys } from '../src/interpolate.ts'
import { ERROR_CODES, ErrorKind, KNOWN_ERROR_KINDS } from '../src/kinds.ts'
import { getSuggestionDef, SUGGESTION_CATALOG, TS2322 } from '../src/suggestions.ts'

const UNCOVERED: readonly string[] = [ErrorKind.ObjectIsUnknown, ErrorKind.ObjectIsPossiblyNull]

describe('suggestion catalog', () => {
	it('should name each entry after its kind canonical code', () => {
		for (const kind of KNOWN_ERROR_KINDS) {
			assert.strictEqual(SUGGESTION_CATALOG[kind].code, ERROR_CODES[kind][0], kind)
		}
	})

	it('should give every kind a title', () => {
		for (const kind of KNOWN_ERROR_KINDS) {
			assert.ok(SUGGESTION_CATALOG[kind].title.length > 0, kind)
		}
	})

	it('should give every covered kind suggestion lines and help', () => {
		for (const kind of KNOWN_ERROR_KINDS) {
			if (UNCOVERED.includes(kind)) continue
			const entry = SUGGESTION_CATALOG[kind]
			assert.ok(entry.suggestions.length > 0, kind)
			assert.notStrictEqual(entry.help, undefined, kind)
		}
	})

	it('should leave uncovered kinds without templates', () => {
		for (const kind of UNCOVERED) {
			const entry = KNOWN_ERROR_KINDS.find((known) => known === kind)
			assert.ok(entry !== undefined)
			assert.deepStrictEqual(SUGGESTION_CATALOG[entry].suggestions, [])
		}
	})

	it('should only emphasize placeholders that appear in the templates', () => {
		for (const kind of KNOWN_ERROR_KINDS) {
			const entry = SUGGESTION_CATALOG[kind]
			const templates = [
				...entry.suggestions,
				entry.help ?? '',
				...(entry.fallback?.suggestions ?? []),
				entry.fallback?.help ?? '',
			]
			const keys = new Set(templates.flatMap(templateKeys))
			for (const key of Object.keys(entry.emphasis ?? {})) {
				assert.ok(keys.has(key), `${kind}: ${key}`)
			}
		}
	})

	it('should return entries by kind', () => {
		assert.strictEqual(getSuggestionDef(ErrorKind.TypeMismatch), TS2322)
	})
})

describe('CLI diagnostics', () => {
	it('should look up definitions by code', () => {
		assert.strictEqual(getDiagnostic('THCLI001').message, 'file not found: {path}')
	})
})
