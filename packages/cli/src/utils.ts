import {
	BSCLI001,
	BSCLI002,
	BSCLI003,
	BSCLI004,
	interpolateMessage,
	severityLabel,
} from '@blockscan/diagnostics'
import {
	type ScanDiagnostic,
	type ScanTrace,
	type Token,
	TokenKind,
	tokenKindName,
} from '@blockscan/scanner'

/** Lines printed on each side of `--line`. */
export const LINE_WINDOW = 5

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(BSCLI001.message, { path: filePath })
		return `[${BSCLI001.code}] ${message}`
	}
	const message = interpolateMessage(BSCLI002.message, { reason: getErrorMessage(error) })
	return `[${BSCLI002.code}] ${message}`
}

export function formatLineError(value: string): string {
	const message = interpolateMessage(BSCLI003.message, { value })
	return `[${BSCLI003.code}] ${message}`
}

export function formatScanFailure(error: unknown): string {
	const message = interpolateMessage(BSCLI004.message, { reason: getErrorMessage(error) })
	return `[${BSCLI004.code}] ${message}`
}

/** Parses a 1-based line number; null when `value` is not one. */
export function parseLineNumber(value: string): number | null {
	if (!/^\d+$/.test(value)) return null
	const line = Number.parseInt(value, 10)
	return line >= 1 ? line : null
}

export function isWithinLineWindow(line: number, target: number | undefined): boolean {
	if (target === undefined) return true
	return line >= target - LINE_WINDOW && line <= target + LINE_WINDOW
}

function describeToken(token: Token, text: string): string {
	const name = tokenKindName(token.kind)
	switch (token.kind) {
		case TokenKind.Indent:
		case TokenKind.Dedent:
			return `${name}(${token.payload})`
		case TokenKind.Newline:
		case TokenKind.Eof:
			return name
		default:
			return `${name} ${JSON.stringify(text)}`
	}
}

/**
 * One output line per token, e.g. `Line    3: INDENT(3) @ 5..6`.
 */
export function formatToken(token: Token, source: string): string {
	const text = source.slice(token.start, token.end)
	const line = String(token.line).padStart(4)
	return `Line ${line}: ${describeToken(token, text)} @ ${token.start}..${token.end}`
}

export function formatSnapshot(bytes: Uint8Array): string {
	return Array.from(bytes, (byte) => byte.toString(16).padStart(2, '0')).join(' ')
}

export function formatDiagnostic(diagnostic: ScanDiagnostic): string {
	return `${severityLabel(diagnostic.def.severity)}[${diagnostic.def.code}] ${diagnostic.message}`
}

/**
 * The parts of a command logger that scanner tracing writes to.
 */
export interface TraceOutput {
	info(message: string): void
	warning(message: string): void
}

/**
 * Forwards scanner decisions to `info` and diagnostics to `warning`.
 */
export function createTraceBridge(output: TraceOutput): ScanTrace {
	return {
		diagnostic: (diagnostic) => output.warning(formatDiagnostic(diagnostic)),
		log: (message) => output.info(message),
	}
}
