/**
 * @blockscan/scanner
 *
 * Context-sensitive tokenizer for indentation-structured sources with
 * raw instruction text and `{! ... }` interpolation.
 */

export { type Lexer, type Location, SourceCursor, type Span } from './core/lexer.ts'
export {
	type ExternalTokenKind,
	type Token,
	type TokenId,
	TokenKind,
	TokenStore,
	tokenId,
	tokenKindName,
	type ValidSymbols,
	validSymbols,
} from './core/tokens.ts'
export {
	CollectingTrace,
	reportDiagnostic,
	type ScanDiagnostic,
	type ScanTrace,
} from './core/trace.ts'
export { createExternalScanner, type ExternalScanner } from './external.ts'
export { type HostMode, symbolsForMode } from './host/modes.ts'
export { type TokenizeOptions, type TokenizeResult, tokenize } from './host/tokenize.ts'
export { MAX_INDENT_WIDTH, scan, TAB_WIDTH } from './scan/index.ts'
export {
	DEFAULT_MAX_INDENT_DEPTH,
	IndentStack,
	MAX_INDENT_DEPTH_LIMIT,
} from './state/indent-stack.ts'
export {
	createScannerState,
	DEFAULT_SERIALIZATION_BUFFER_SIZE,
	describeState,
	resetScannerState,
	type ScannerOptions,
	type ScannerState,
} from './state/scanner-state.ts'
export {
	deserializeState,
	SNAPSHOT_FORMAT_VERSION,
	serializeState,
} from './state/serialization.ts'
