import assert from 'node:assert'
import { describe, it } from 'node:test'
import type { DiagnosticError } from '../../src/core/diagnostics.ts'
import type { Token } from '../../src/core/tokens.ts'
import { classify } from '../../src/parse/classify.ts'
import { parseDiagnostic } from '../../src/parse/parser.ts'
import { synthesize } from '../../src/suggest/synthesize.ts'

function diagnostic(code: string, message: string, line = 1, column = 1): DiagnosticError {
	return { code: classify(code), column, file: 'src/app.ts', line, message }
}

describe('suggest/synthesize', () => {
	describe('assignability', () => {
		it('should suggest a conversion for TS2322', () => {
			const error = parseDiagnostic(
				"src/app.ts(10,5): error TS2322: Type 'string' is not assignable to type 'number'."
			)
			assert.ok(error !== undefined)
			assert.deepStrictEqual(synthesize(error, []), {
				help: 'Ensure that the types are compatible or perform an explicit conversion.',
				suggestions: ['Try converting this value from `string` to `number`.'],
			})
		})

		it('should use placeholders when TS2322 types are missing', () => {
			const suggestion = synthesize(diagnostic('TS2322', 'Types are incompatible.'), [])
			assert.deepStrictEqual(suggestion?.suggestions, ['Try converting this value from `type` to `type`.'])
		})

		it('should list each mismatched property for TS2345', () => {
			const error = diagnostic(
				'TS2345',
				"Argument of type '{ a: string; b: string; c: boolean; }' is not assignable to parameter of type '{ a: string; b: number; c: string; }'."
			)
			assert.deepStrictEqual(synthesize(error, []), {
				help: 'Check the function arguments to ensure they match the expected parameter types.',
				suggestions: [
					'Property `b` is provided as `string` but expects `number`.',
					'Property `c` is provided as `boolean` but expects `string`.',
				],
			})
		})

		it('should keep only the help line for TS2345 without object types', () => {
			const error = diagnostic(
				'TS2345',
				"Argument of type 'string' is not assignable to parameter of type 'number'."
			)
			assert.deepStrictEqual(synthesize(error, []), {
				help: 'Check the function arguments to ensure they match the expected parameter types.',
				suggestions: [],
			})
		})

		it('should keep only the help line for TS2345 without types', () => {
			assert.deepStrictEqual(synthesize(diagnostic('TS2345', 'Argument mismatch.'), [])?.suggestions, [])
		})

		it('should keep only the help line when TS2345 object types agree', () => {
			const error = diagnostic(
				'TS2345',
				"Argument of type '{ a: string; extra: number; }' is not assignable to parameter of type '{ a: string; }'."
			)
			assert.deepStrictEqual(synthesize(error, [])?.suggestions, [])
		})

		it('should explain a risky cast for TS2352', () => {
			const error = diagnostic(
				'TS2352',
				"Conversion of type 'number' to type 'string' may be a mistake because neither type sufficiently overlaps with the other."
			)
			assert.deepStrictEqual(synthesize(error, [])?.suggestions, [
				'Directly casting from `number` to `string` can be unsafe or mistaken, as both types do not overlap sufficiently.',
			])
		})

		it('should name the type and the variable for TS2741', () => {
			const tokens: Token[] = [{ column: 6, line: 3, raw: 'config' }]
			const error = diagnostic(
				'TS2741',
				"Property 'timeout' is missing in type '{ apiKey: string; }' but required in type 'Config'.",
				3,
				7
			)
			assert.deepStrictEqual(synthesize(error, tokens), {
				help: 'Ensure that `config` has all required properties defined in the type `Config`.',
				suggestions: ['Verify that `config` matches the annotated type `Config`.'],
			})
		})

		it('should use a placeholder name for TS2741 without a token', () => {
			const error = diagnostic(
				'TS2741',
				"Property 'timeout' is missing in type '{ apiKey: string; }' but required in type 'Config'."
			)
			assert.deepStrictEqual(synthesize(error, [])?.suggestions, [
				'Verify that `object` matches the annotated type `Config`.',
			])
		})

		it('should use the fallback for TS2741 without a type', () => {
			assert.deepStrictEqual(synthesize(diagnostic('TS2741', 'Property is missing.'), []), {
				help: 'Ensure the object has all required properties defined in the type.',
				suggestions: [
					'Verify that the object structure includes all required members of the specified type.',
				],
			})
		})

		it('should name class and interface for TS2420', () => {
			const error = diagnostic(
				'TS2420',
				"Class 'Service' incorrectly implements interface 'IService'. Property 'start' is missing in type 'Service' but required in type 'IService'."
			)
			assert.deepStrictEqual(synthesize(error, []), {
				help: 'Ensure that `Service` provides all required properties and methods defined in the interface `IService`.',
				suggestions: ['Class `Service` does not implement `start` from interface `IService`.'],
			})
		})

		it('should describe both property types for TS2416', () => {
			const error = diagnostic(
				'TS2416',
				"Property 'value' in type 'Derived' is not assignable to the same property in base type 'Base'. Type 'number' is not assignable to type 'string'."
			)
			assert.deepStrictEqual(synthesize(error, []), {
				help: 'Ensure that the type of property `value` in class `Derived` is compatible with the type defined in base class `Base`.',
				suggestions: [
					'Property `value` in class `Derived` is not assignable to the same property in base class `Base`.',
					'Property `value` is implemented as type `number` but defined as `string`.',
				],
			})
		})
	})

	describe('calls', () => {
		it('should name the called function from the token for TS2554', () => {
			const tokens: Token[] = [{ column: 2, line: 5, raw: 'foo' }]
			const error = diagnostic('TS2554', 'Expected 2 arguments, but got 1.', 5, 3)
			assert.deepStrictEqual(synthesize(error, tokens), {
				help: 'Function `foo` is missing 1 or more arguments.',
				suggestions: ['Check if all required arguments are provided when invoking `foo`.'],
			})
		})

		it('should use a placeholder for TS2554 without a token', () => {
			const error = diagnostic('TS2554', 'Expected 2 arguments, but got 1.', 5, 3)
			assert.deepStrictEqual(synthesize(error, [])?.suggestions, [
				'Check if all required arguments are provided when invoking `function`.',
			])
		})

		it('should name the expression from the token for TS2349', () => {
			const tokens: Token[] = [{ column: 0, line: 4, raw: 'notAFunction' }]
			const error = diagnostic('TS2349', 'This expression is not callable.', 4, 1)
			assert.deepStrictEqual(synthesize(error, tokens)?.suggestions, [
				'Expression `notAFunction` can not be invoked or called.',
			])
		})

		it('should give fixed text for kinds without values', () => {
			const fixed: Array<[string, string]> = [
				['TS2556', 'The argument being spread must be a tuple type or a `spreadable` type.'],
				['TS2394', 'The provided arguments do not match any overload of the function.'],
				['TS2355', 'A return value is missing where one is expected.'],
				['TS2367', 'Impossible to compare as left side value is narrowed to a single value.'],
				['TS2362', 'The left-hand side of any arithmetic operation must be a number or enumerable.'],
				['TS2363', 'The right-hand side of any arithmetic operation must be a number or enumerable.'],
			]
			for (const [code, text] of fixed) {
				assert.deepStrictEqual(synthesize(diagnostic(code, 'anything'), [])?.suggestions, [text], code)
			}
		})
	})

	describe('names and properties', () => {
		it('should name the parameter for TS7006 and TS7044', () => {
			const plain = diagnostic('TS7006', "Parameter 'x' implicitly has an 'any' type.")
			const inferred = diagnostic(
				'TS7044',
				"Parameter 'cb' implicitly has an 'any' type, but a better type may be inferred from usage."
			)
			assert.deepStrictEqual(synthesize(plain, []), {
				help: "Consider adding type annotations to avoid implicit 'any' types.",
				suggestions: ['`x` is implicitly `any`.'],
			})
			assert.deepStrictEqual(synthesize(inferred, [])?.suggestions, ['`cb` is implicitly `any`.'])
		})

		it('should name property and type for TS2339', () => {
			const error = diagnostic('TS2339', "Property 'bar' does not exist on type '{ foo: number; }'.")
			assert.deepStrictEqual(synthesize(error, [])?.suggestions, [
				'Property `bar` is not found on type `{ foo: number; }`.',
			])
		})

		it('should propose the suggested name for TS2551', () => {
			const error = diagnostic(
				'TS2551',
				"Property 'fistName' does not exist on type 'Person'. Did you mean 'firstName'?"
			)
			assert.deepStrictEqual(synthesize(error, [])?.suggestions, [
				'Property `fistName` does not exist on type `Person`. Try `firstName` instead.',
			])
		})

		it('should name the readonly property for TS2540', () => {
			const error = diagnostic('TS2540', "Cannot assign to 'id' because it is a read-only property.")
			assert.deepStrictEqual(synthesize(error, [])?.suggestions, [
				'Property `id` is readonly and thus can not be re-assigned.',
			])
		})

		it('should name the shadowing variable for TS2451', () => {
			const error = diagnostic('TS2451', "Cannot redeclare block-scoped variable 'duplicateVar'.")
			assert.deepStrictEqual(synthesize(error, []), {
				help: 'Consider renaming the invalid shadowed variable `duplicateVar`.',
				suggestions: ['Declared variable `duplicateVar` can not shadow another variable in this scope.'],
			})
		})

		it('should name the identifier for TS2304', () => {
			const error = diagnostic('TS2304', "Cannot find name 'undefinedVariable'.")
			assert.deepStrictEqual(synthesize(error, [])?.suggestions, [
				'Identifier `undefinedVariable` cannot be found in the current scope.',
			])
		})

		it('should name the module for TS2307', () => {
			const error = diagnostic(
				'TS2307',
				"Cannot find module 'non-existent-module' or its corresponding type declarations."
			)
			assert.deepStrictEqual(synthesize(error, [])?.suggestions, ['Module `non-existent-module` does not exist.'])
		})

		it('should name the index type for TS2538', () => {
			const error = diagnostic('TS2538', "Type '{ toString: () => string; }' cannot be used as an index type.")
			assert.deepStrictEqual(synthesize(error, []), {
				help: 'Ensure that the index type is `number`, `string`, `symbol` or a compatible index type.',
				suggestions: ['`{ toString: () => string; }` cannot be used as an index accessor.'],
			})
		})
	})

	describe('narrowing', () => {
		it('should name the quoted subject for TS18048', () => {
			const error = diagnostic('TS18048', "'currentUser' is possibly 'undefined'.")
			assert.deepStrictEqual(synthesize(error, []), {
				help: 'Consider optional chaining or an explicit check before attempting to access `currentUser`.',
				suggestions: ['`currentUser` may be `undefined` here.'],
			})
		})

		it('should name the subject from the token for TS2532', () => {
			const tokens: Token[] = [{ column: 12, line: 2, raw: 'user' }]
			const error = diagnostic('TS2532', "Object is possibly 'undefined'.", 2, 13)
			assert.deepStrictEqual(synthesize(error, tokens)?.suggestions, ['`user` may be `undefined` here.'])
			assert.deepStrictEqual(synthesize(error, [])?.suggestions, ['`object` may be `undefined` here.'])
		})

		it('should give no suggestion for uncovered kinds', () => {
			assert.strictEqual(synthesize(diagnostic('TS18046', "'value' is of type 'unknown'."), []), undefined)
			assert.strictEqual(synthesize(diagnostic('TS2531', "Object is possibly 'null'."), []), undefined)
			assert.strictEqual(synthesize(diagnostic('TS18047', "'node' is possibly 'null'."), []), undefined)
		})
	})

	describe('unsupported codes', () => {
		it('should give no suggestion', () => {
			assert.strictEqual(synthesize(diagnostic('TS1005', "';' expected."), []), undefined)
		})
	})

	describe('options', () => {
		it('should decorate values with their tone', () => {
			const error = diagnostic('TS2322', "Type 'string' is not assignable to type 'number'.")
			const suggestion = synthesize(error, [], {
				emphasize: (value, tone) => `<${tone}:${value}>`,
			})
			assert.deepStrictEqual(suggestion, {
				help: 'Ensure that the types are compatible or perform an explicit conversion.',
				suggestions: ['Try converting this value from `<error:string>` to `<expected:number>`.'],
			})
		})

		it('should let a custom strategy cover an uncovered kind', () => {
			const error = diagnostic('TS18046', "'value' is of type 'unknown'.")
			const suggestion = synthesize(error, [], {
				strategies: { 'object-is-unknown': () => ({ suggestions: ['Narrow `value` first.'] }) },
			})
			assert.deepStrictEqual(suggestion, { suggestions: ['Narrow `value` first.'] })
		})

		it('should let a custom strategy replace a built-in one', () => {
			const error = diagnostic('TS2304', "Cannot find name 'x'.")
			const suggestion = synthesize(error, [], {
				strategies: { 'cannot-find-identifier': () => undefined },
			})
			assert.strictEqual(suggestion, undefined)
		})
	})

	describe('determinism', () => {
		it('should produce the same suggestion on repeated calls', () => {
			const tokens: Token[] = [{ column: 2, line: 5, raw: 'foo' }]
			const error = diagnostic('TS2554', 'Expected 2 arguments, but got 1.', 5, 3)
			assert.deepStrictEqual(synthesize(error, tokens), synthesize(error, tokens))
		})
	})
})
