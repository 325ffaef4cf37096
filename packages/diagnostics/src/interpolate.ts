import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{(\w+)\}/g

/**
 * Replaces each `{key}` in a catalog template with the matching argument.
 * Placeholders without an argument are left as written.
 */
export function interpolateMessage(template: string, args?: DiagnosticArgs): string {
	if (args === undefined) return template
	return template.replace(PLACEHOLDER, (placeholder: string, key: string) => {
		const value = args[key]
		return value === undefined ? placeholder : String(value)
	})
}
