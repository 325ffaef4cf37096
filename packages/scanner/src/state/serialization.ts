/**
 * Snapshot codec for incremental reparsing.
 *
 * Layout (version 1, little-endian):
 *   [0]    format version
 *   [1]    stack depth
 *   [2..3] pending-dedent marker, signed 16-bit, -1 when unset
 *   [4..]  stack widths, unsigned 16-bit each, base first
 *
 * Widths are written while they fit the buffer budget; the depth byte
 * still records the full depth.
 */

import { reportDiagnostic } from '../core/trace.ts'
import { type ScannerState, resetScannerState, SNAPSHOT_HEADER_SIZE } from './scanner-state.ts'

export const SNAPSHOT_FORMAT_VERSION = 1

const NO_PENDING = -1

export function serializeState(state: ScannerState): Uint8Array {
	const entries = state.stack.entries()
	const buffer = new Uint8Array(state.bufferSize)
	let size = 0

	buffer[size++] = SNAPSHOT_FORMAT_VERSION
	buffer[size++] = entries.length
	const pending = state.pendingDedent ?? NO_PENDING
	buffer[size++] = pending & 0xff
	buffer[size++] = (pending >> 8) & 0xff

	let written = 0
	for (const width of entries) {
		if (size + 2 > state.bufferSize) break
		buffer[size++] = width & 0xff
		buffer[size++] = (width >> 8) & 0xff
		written++
	}

	if (written < entries.length) {
		reportDiagnostic(state.trace, 'BSSCAN002', { depth: entries.length, written })
	}
	return buffer.slice(0, size)
}

function readInt16(bytes: Uint8Array, offset: number): number {
	const raw = (bytes[offset] ?? 0) | ((bytes[offset + 1] ?? 0) << 8)
	return (raw << 16) >> 16
}

function readUint16(bytes: Uint8Array, offset: number): number {
	return (bytes[offset] ?? 0) | ((bytes[offset + 1] ?? 0) << 8)
}

/**
 * Restores a snapshot into `state`. Never throws: zero-length input
 * resets, and anything malformed restores the most it can.
 */
export function deserializeState(bytes: Uint8Array, state: ScannerState): void {
	resetScannerState(state)
	if (bytes.length === 0) return

	const version = bytes[0]
	if (version !== SNAPSHOT_FORMAT_VERSION) {
		reportDiagnostic(state.trace, 'BSSCAN004', { version: version ?? 0 })
		return
	}

	const declared = bytes[1] ?? 0
	const depth = Math.min(declared, state.stack.capacity)

	if (bytes.length >= SNAPSHOT_HEADER_SIZE) {
		const pending = readInt16(bytes, 2)
		state.pendingDedent = pending < 0 ? null : pending
	}

	const widths: number[] = []
	for (let offset = SNAPSHOT_HEADER_SIZE; widths.length < depth && offset + 1 < bytes.length; offset += 2) {
		widths.push(readUint16(bytes, offset))
	}

	const recovered = state.stack.restore(widths)
	if (declared > 0 && recovered !== declared) {
		reportDiagnostic(state.trace, 'BSSCAN003', { declared, recovered })
	}
}
