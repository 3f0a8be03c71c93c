import type { Node, Semantics } from 'ohm-js'
import * as ohm from 'ohm-js'

/**
 * A lexeme and its offset in the matched input.
 */
export interface Lexeme {
	raw: string
	offset: number
}

/**
 * Result of lexing a source text.
 */
export interface LexResult {
	lexemes: Lexeme[]
	succeeded: boolean
	message?: string | undefined
}

/**
 * TypeScript lexicon.
 *
 * Only the token boundaries matter here, not the syntax: identifiers, numbers,
 * string and template literals, and punctuators (longest operators first).
 * Any other character becomes a one-character punctuator, so every input
 * matches. Template literals are lexed as a single token, substitutions
 * included.
 *
 * Comment syntax (treated as whitespace):
 *   // to end of line
 *   /* to the next *\/
 */
const grammarSource = String.raw`
TsLexicon {
  Tokens (a token stream) = token*

  token = template | string | number | identifier | punctuator

  identifier (an identifier) = identifierStart identifierPart*
  identifierStart = letter | "_" | "$" | "#"
  identifierPart = alnum | "_" | "$"

  number (a number) = digit numberPart* fraction?
  numberPart = alnum | "_"
  fraction = "." digit numberPart*

  string (a string) = "\"" doubleChar* "\"" | "'" singleChar* "'"
  doubleChar = escape | ~("\"" | "\n") any
  singleChar = escape | ~("'" | "\n") any

  template (a template literal) = "\x60" templateChar* "\x60"
  templateChar = escape | ~"\x60" any

  escape = "\\" any

  punctuator = operator | any
  operator = ">>>=" | "..." | "===" | "!==" | "**=" | "<<=" | ">>=" | ">>>" | "&&=" | "||=" | "??="
           | "=>" | "==" | "!=" | "<=" | ">=" | "&&" | "||" | "??" | "?." | "++" | "--"
           | "+=" | "-=" | "*=" | "/=" | "%=" | "&=" | "|=" | "^=" | "**" | "<<" | ">>"

  // Comments treated as whitespace (newlines already in built-in space)
  space += comment
  comment = "//" (~"\n" any)*        -- line
          | "/*" (~"*/" any)* "*/"    -- block
}
`

/**
 * The compiled lexicon grammar.
 */
export const TsLexicon = ohm.grammar(grammarSource)

/**
 * Create semantics for the lexicon grammar.
 */
export function createSemantics(): Semantics {
	const semantics = TsLexicon.createSemantics()

	// Extract one Lexeme from a token node
	semantics.addOperation<Lexeme>('toLexeme', {
		token(_inner: Node) {
			return {
				offset: this.source.startIdx,
				raw: this.sourceString,
			}
		},
	})

	// Collect all lexemes from the stream
	semantics.addOperation<Lexeme[]>('toLexemes', {
		Tokens(tokens: Node) {
			return tokens.children.map((token: Node) => token['toLexeme']())
		},
	})

	return semantics
}

/**
 * Default semantics instance.
 */
export const semantics = createSemantics()

/**
 * Lex source text into lexemes with their offsets.
 *
 * @param input - Source text
 * @returns Lexemes in source order, and whether the input matched
 */
export function lex(input: string): LexResult {
	const matchResult = TsLexicon.match(input)

	if (matchResult.failed()) {
		return {
			lexemes: [],
			message: matchResult.message,
			succeeded: false,
		}
	}

	const lexemes: Lexeme[] = semantics(matchResult)['toLexemes']()

	return {
		lexemes,
		succeeded: true,
	}
}
