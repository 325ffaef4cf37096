import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type TokenizeResult, serializeState, tokenize } from '@blockscan/scanner'
import {
	createTraceBridge,
	formatLineError,
	formatReadError,
	formatScanFailure,
	formatSnapshot,
	formatToken,
	isWithinLineWindow,
	parseLineNumber,
} from '../utils.ts'

export default class TokensCommand extends BaseCommand {
	static override commandName = 'tokens'
	static override description = 'Print the token stream the scanner produces for a file'

	@args.string({ description: 'Source file to scan' })
	declare input: string

	@flags.boolean({ description: 'Scan text after a `|` marker as raw instruction text' })
	declare instructions: boolean

	@flags.boolean({ description: 'Log every scanner decision and diagnostic' })
	declare trace: boolean

	@flags.string({ alias: 'l', description: 'Only print tokens within five lines of this line' })
	declare line?: string

	@flags.boolean({ description: 'Print the final scanner snapshot as hex bytes' })
	declare snapshot: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	/** Returns undefined for "all lines", null when the flag is invalid. */
	private resolveTargetLine(): number | undefined | null {
		if (this.line === undefined) return undefined
		const target = parseLineNumber(this.line)
		if (target === null) {
			this.logger.error(formatLineError(this.line))
			this.exitCode = 1
		}
		return target
	}

	private scanSource(source: string): TokenizeResult | null {
		try {
			return tokenize(source, {
				instructions: this.instructions,
				trace: this.trace ? createTraceBridge(this.logger) : undefined,
			})
		} catch (error: unknown) {
			this.logger.error(formatScanFailure(error))
			this.exitCode = 1
			return null
		}
	}

	private printTokens(result: TokenizeResult, source: string, target: number | undefined): void {
		for (const [, token] of result.tokens) {
			if (isWithinLineWindow(token.line, target)) {
				this.logger.log(formatToken(token, source))
			}
		}
	}

	override async run(): Promise<void> {
		const target = this.resolveTargetLine()
		if (target === null) return

		const source = await this.readSourceFile()
		if (source === null) return

		const result = this.scanSource(source)
		if (result === null) return

		this.printTokens(result, source, target)
		if (this.snapshot) {
			this.logger.log(`snapshot: ${formatSnapshot(serializeState(result.state))}`)
		}
	}
}
