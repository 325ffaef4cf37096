import type { Lexer } from './core/lexer.ts'
import type { ExternalTokenKind, ValidSymbols } from './core/tokens.ts'
import { scan } from './scan/scan.ts'
import {
	createScannerState,
	resetScannerState,
	type ScannerOptions,
	type ScannerState,
} from './state/scanner-state.ts'
import { deserializeState, serializeState } from './state/serialization.ts'

/**
 * The four-operation contract a table-driven parser calls into.
 * State is threaded explicitly, so any number of sessions can run side by side.
 */
export interface ExternalScanner<State> {
	create(): State
	destroy(state: State): void
	serialize(state: State): Uint8Array
	deserialize(bytes: Uint8Array, state: State): void
	scan(state: State, lexer: Lexer, valid: ValidSymbols): ExternalTokenKind | null
}

/**
 * Creates the block-structure scanner. `options` apply to every state it creates.
 */
export function createExternalScanner(
	options: ScannerOptions = {}
): ExternalScanner<ScannerState> {
	return {
		create: () => createScannerState(options),
		deserialize: deserializeState,
		destroy: resetScannerState,
		scan,
		serialize: serializeState,
	}
}
