/**
 * Diagnostic parsing and classification.
 */

export { classify, codeOf, isUnsupported } from './classify.ts'
export { parseDiagnostic, parseDiagnosticOutput } from './parser.ts'
