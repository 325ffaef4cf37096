/**
 * Default number of indent levels tracked, the base level included.
 */
export const DEFAULT_MAX_INDENT_DEPTH = 100

/**
 * Hard ceiling: the snapshot stores the depth in one byte.
 */
export const MAX_INDENT_DEPTH_LIMIT = 255

/**
 * Ordered widths of the currently open blocks.
 *
 * Always starts at 0, never empty, strictly increasing bottom to top.
 * Pushing past capacity is a no-op: deeper levels are simply not tracked,
 * so a later dedent closes the nearest tracked level instead.
 */
export class IndentStack {
	readonly capacity: number
	private readonly widths: number[] = [0]

	constructor(capacity: number = DEFAULT_MAX_INDENT_DEPTH) {
		this.capacity = clampCapacity(capacity)
	}

	get depth(): number {
		return this.widths.length
	}

	/** Width of the innermost open block. */
	get current(): number {
		return this.widths[this.widths.length - 1] ?? 0
	}

	get isFull(): boolean {
		return this.widths.length >= this.capacity
	}

	/** Returns false when the width was not tracked. */
	push(width: number): boolean {
		if (this.isFull || width <= this.current) return false
		this.widths.push(width)
		return true
	}

	/** Closes the innermost block and returns the new current width. */
	pop(): number {
		if (this.widths.length > 1) this.widths.pop()
		return this.current
	}

	entries(): readonly number[] {
		return this.widths
	}

	/**
	 * Replaces the contents with the longest usable prefix of `widths`.
	 * A prefix is usable while it starts at 0 and keeps increasing; the
	 * base level survives even when nothing else does. Returns the number
	 * of levels kept.
	 */
	restore(widths: readonly number[]): number {
		this.widths.length = 1
		this.widths[0] = 0
		if (widths.length > 0 && widths[0] !== 0) return 1
		for (let i = 1; i < widths.length && !this.isFull; i++) {
			const width = widths[i]
			if (width === undefined || width <= this.current) break
			this.widths.push(width)
		}
		return this.widths.length
	}

	reset(): void {
		this.restore([])
	}
}

function clampCapacity(capacity: number): number {
	if (!Number.isFinite(capacity)) return DEFAULT_MAX_INDENT_DEPTH
	return Math.min(MAX_INDENT_DEPTH_LIMIT, Math.max(1, Math.floor(capacity)))
}
