/**
 * Per-call token decisions.
 */

export {
	INTERPOLATION_BANG,
	INTERPOLATION_OPEN,
	isTextTerminator,
	scanInterpolationStart,
	scanTextSegment,
} from './instruction-text.ts'
export {
	isAtLineBoundary,
	type LineMeasure,
	MAX_INDENT_WIDTH,
	measureLineBoundary,
	scanLineBoundary,
	TAB_WIDTH,
} from './line-boundary.ts'
export { resolvePendingDedent } from './pending-dedent.ts'
export { scan } from './scan.ts'
