import {
	type DiagnosticArgs,
	type DiagnosticDef,
	getDiagnostic,
	interpolateMessage,
	type ScannerDiagnosticCode,
} from '@blockscan/diagnostics'

/**
 * A catalogued note or warning raised while scanning or restoring state.
 */
export interface ScanDiagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

/**
 * Optional observer for scanner decisions. Nothing is reported without one.
 */
export interface ScanTrace {
	log(message: string): void
	diagnostic(diagnostic: ScanDiagnostic): void
}

export function traceLog(trace: ScanTrace | undefined, message: () => string): void {
	if (trace === undefined) return
	trace.log(message())
}

export function reportDiagnostic(
	trace: ScanTrace | undefined,
	code: ScannerDiagnosticCode,
	args?: DiagnosticArgs
): void {
	if (trace === undefined) return
	const def = getDiagnostic(code)
	trace.diagnostic({ args, def, message: interpolateMessage(def.message, args) })
}

/**
 * Trace sink that keeps everything in memory.
 */
export class CollectingTrace implements ScanTrace {
	readonly messages: string[] = []
	readonly diagnostics: ScanDiagnostic[] = []

	log(message: string): void {
		this.messages.push(message)
	}

	diagnostic(diagnostic: ScanDiagnostic): void {
		this.diagnostics.push(diagnostic)
	}

	codes(): string[] {
		return this.diagnostics.map((d) => d.def.code)
	}
}
