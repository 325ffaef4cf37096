/**
 * Scanner diagnostic definitions.
 *
 * None of these stop scanning. They describe places where the scanner
 * degraded instead of failing, so a host can surface them when tracing.
 *
 * Error code format: BSSCAN<NUMBER>
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// INDENT STACK (BSSCAN001-049)
// =============================================================================

export const BSSCAN001: DiagnosticDef = {
	code: 'BSSCAN001',
	description:
		'The block is nested deeper than the scanner tracks. Later dedents may close the wrong enclosing block.',
	message: 'indent depth limit of {depth} reached; width {width} is not tracked',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Flatten the nesting, or raise `maxDepth` (up to 255).',
}

// =============================================================================
// SNAPSHOTS (BSSCAN050-099)
// =============================================================================

export const BSSCAN002: DiagnosticDef = {
	code: 'BSSCAN002',
	description: 'The snapshot buffer is too small for the whole indent stack.',
	message: 'snapshot truncated: wrote {written} of {depth} indent levels',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Raise `bufferSize` so that 4 + 2 * depth bytes fit.',
}

export const BSSCAN003: DiagnosticDef = {
	code: 'BSSCAN003',
	description: 'The restored snapshot did not hold a complete, strictly increasing indent stack.',
	message: 'malformed snapshot: recovered {recovered} of {declared} indent levels',
	severity: DiagnosticSeverity.Note,
}

export const BSSCAN004: DiagnosticDef = {
	code: 'BSSCAN004',
	description: 'The snapshot was written by an incompatible format version.',
	message: 'unknown snapshot format version {version}; state reset',
	severity: DiagnosticSeverity.Note,
}

// =============================================================================
// CATALOG
// =============================================================================

/**
 * Central catalog of all scanner diagnostics.
 */
export const SCANNER_DIAGNOSTICS = {
	BSSCAN001,
	BSSCAN002,
	BSSCAN003,
	BSSCAN004,
} as const

/**
 * All valid scanner diagnostic codes.
 */
export type ScannerDiagnosticCode = keyof typeof SCANNER_DIAGNOSTICS
