import type { ScanTrace } from '../core/trace.ts'
import { DEFAULT_MAX_INDENT_DEPTH, IndentStack } from './indent-stack.ts'

/** Snapshot budget matching the usual host serialization buffer. */
export const DEFAULT_SERIALIZATION_BUFFER_SIZE = 1024

/** Header bytes: version, depth and the two marker bytes. */
export const SNAPSHOT_HEADER_SIZE = 4

export interface ScannerOptions {
	/** Indent levels tracked, base included. Clamped to 1..255. */
	maxDepth?: number
	/** Largest snapshot serialize() may produce, in bytes. */
	bufferSize?: number
	trace?: ScanTrace
}

/**
 * Persistent scanner state for one parse session.
 */
export interface ScannerState {
	readonly stack: IndentStack
	/** Target width still to dedent to, or null when nothing is pending. */
	pendingDedent: number | null
	readonly bufferSize: number
	readonly trace: ScanTrace | undefined
}

export function createScannerState(options: ScannerOptions = {}): ScannerState {
	const { maxDepth = DEFAULT_MAX_INDENT_DEPTH, bufferSize = DEFAULT_SERIALIZATION_BUFFER_SIZE } =
		options
	return {
		bufferSize: Math.max(SNAPSHOT_HEADER_SIZE, Math.floor(bufferSize)),
		pendingDedent: null,
		stack: new IndentStack(maxDepth),
		trace: options.trace,
	}
}

export function resetScannerState(state: ScannerState): void {
	state.stack.reset()
	state.pendingDedent = null
}

export function describeState(state: ScannerState): string {
	const pending = state.pendingDedent === null ? '-' : String(state.pendingDedent)
	return `stack=[${state.stack.entries().join(',')}] pending=${pending}`
}
