#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import TokensCommand from './commands/tokens.ts'

const version = '0.1.0'

const kernel = Kernel.create()

kernel.info.set('binary', 'blockscan')
kernel.info.set('version', version)

kernel.defineFlag('help', {
	alias: 'h',
	description: 'Display help information',
	type: 'boolean',
})

kernel.defineFlag('version', {
	alias: 'v',
	description: 'Display version number',
	type: 'boolean',
})

kernel.addLoader(new ListLoader([TokensCommand, HelpCommand]))

kernel.on('finding:command', async (): Promise<boolean> => {
	console.log(`blockscan v${version}`)
	console.log('')
	console.log('Usage: blockscan <command> [options]')
	console.log('')
	console.log('Commands:')
	console.log('  tokens    Print the token stream for a source file')
	console.log('')
	console.log('Run "blockscan --help" for available commands and options.')
	return true
})

try {
	await kernel.handle(process.argv.slice(2))
} catch (error: unknown) {
	console.error(error)
	process.exit(1)
}
