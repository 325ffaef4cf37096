/**
 * CLI diagnostic definitions.
 *
 * Error code format: BSCLI<NUMBER>
 * - BSCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (BSCLI001-099)
// =============================================================================

export const BSCLI001: DiagnosticDef = {
	code: 'BSCLI001',
	description: "blockscan couldn't find a file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const BSCLI002: DiagnosticDef = {
	code: 'BSCLI002',
	description: "The file exists but blockscan can't open it.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const BSCLI003: DiagnosticDef = {
	code: 'BSCLI003',
	description: '`--line` takes a 1-based line number.',
	message: 'invalid line number "{value}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a positive whole number, for example `--line 12`.',
}

export const BSCLI004: DiagnosticDef = {
	code: 'BSCLI004',
	description: 'Something unexpected went wrong while scanning. This is a bug.',
	message: 'tokenization failed: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Re-run with `--trace` and include the output when reporting it.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	BSCLI001,
	BSCLI002,
	BSCLI003,
	BSCLI004,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
