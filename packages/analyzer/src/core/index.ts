/**
 * Core data types shared by the parser, tokenizer and suggestion engine.
 */

export type { AnalyzedDiagnostic, DiagnosticError, Suggestion } from './diagnostics.ts'
export { type Token, tokenSpans } from './tokens.ts'
