import type { DiagnosticArgs } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args.
 * Values are inserted as-is; braces inside a value are never expanded.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (_, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : `{${key}}`
	})
}

/**
 * List the placeholder names a template refers to, in order of first use.
 */
export function templateKeys(message: string): string[] {
	const keys: string[] = []
	for (const match of message.matchAll(/\{(\w+)\}/g)) {
		const key = match[1]
		if (key !== undefined && !keys.includes(key)) keys.push(key)
	}
	return keys
}
