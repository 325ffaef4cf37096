/**
 * @blockscan/diagnostics
 *
 * Shared diagnostic types and definitions for blockscan packages.
 */

export {
	BSCLI001,
	BSCLI002,
	BSCLI003,
	BSCLI004,
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
} from './cli.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	BSSCAN001,
	BSSCAN002,
	BSSCAN003,
	BSSCAN004,
	SCANNER_DIAGNOSTICS,
	type ScannerDiagnosticCode,
} from './scanner.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
	severityLabel,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { SCANNER_DIAGNOSTICS } from './scanner.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...SCANNER_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
