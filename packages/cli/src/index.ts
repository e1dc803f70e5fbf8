#!/usr/bin/env node
/**
 * jpegseg CLI - JPEG segment inspection and rewriting
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { copyFile, printFile, stripFile } from './commands'

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

type Command = 'print' | 'copy' | 'strip'

interface CliOptions {
	overwrite?: boolean

	// Flags
	verbose?: boolean
	quiet?: boolean

	help?: boolean
	version?: boolean
}

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const VERSION = '0.1.0'

const COMMANDS: readonly Command[] = ['print', 'copy', 'strip']

const HELP = `
jpegseg - JPEG segment tool

USAGE:
  jpegseg print <file>                Print markers and segment sizes
  jpegseg copy <input> <output>       Copy a file, rewriting its MPF index
  jpegseg strip <input> <output>      Copy the first image without metadata

OPTIONS:
  --overwrite           Overwrite existing files
  -v, --verbose         Verbose output (MPF fields, output sizes)
  --quiet               Suppress output
  --help                Show this help
  --version             Show version

EXAMPLES:
  jpegseg print photo.jpg                      # List segments
  jpegseg print -v stereo.mpo                  # Include the MPF index fields
  jpegseg copy stereo.mpo copy.mpo             # Re-pack all images
  jpegseg strip photo.jpg clean.jpg            # Drop COM, APPn and JPGn

`

// ─────────────────────────────────────────────────────────────────────────────
// Argument Parser
// ─────────────────────────────────────────────────────────────────────────────

function isCommand(word: string): word is Command {
	return COMMANDS.some((command) => command === word)
}

function parseArgs(args: string[]): { command?: Command; paths: string[]; options: CliOptions } {
	const paths: string[] = []
	const options: CliOptions = {}
	let command: Command | undefined

	for (const arg of args) {
		if (arg === '--help' || arg === '-?') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet') {
			options.quiet = true
		} else if (arg === '--overwrite') {
			options.overwrite = true
		} else if (arg.startsWith('-')) {
			console.error(`Unknown option: ${arg}`)
			process.exit(1)
		} else if (!command) {
			if (!isCommand(arg)) {
				console.error(`Unknown command: ${arg}`)
				process.exit(1)
			}
			command = arg
		} else {
			paths.push(arg)
		}
	}
	return { command, paths, options }
}

// ─────────────────────────────────────────────────────────────────────────────
// File Helpers
// ─────────────────────────────────────────────────────────────────────────────

function readInput(path: string): Uint8Array {
	const resolved = resolve(path)
	if (!existsSync(resolved)) {
		console.error(`File not found: ${resolved}`)
		process.exit(1)
	}
	return new Uint8Array(readFileSync(resolved))
}

function writeOutput(path: string, data: Uint8Array, options: CliOptions): void {
	const resolved = resolve(path)
	if (existsSync(resolved) && !options.overwrite) {
		console.error(`Error: ${path} exists, use --overwrite`)
		process.exit(1)
	}
	writeFileSync(resolved, data)
	if (options.verbose && !options.quiet) {
		console.log(`       Size: ${formatBytes(data.length)}`)
	}
}

function formatBytes(bytes: number): string {
	if (bytes < 1024) return `${bytes} B`
	if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
	return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
}

function expectPaths(command: Command, paths: string[], count: number): void {
	if (paths.length !== count) {
		const usage = count === 1 ? '<file>' : '<input> <output>'
		console.error(`Usage: jpegseg ${command} ${usage}`)
		process.exit(1)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Main
// ─────────────────────────────────────────────────────────────────────────────

function main(): void {
	const { command, paths, options } = parseArgs(process.argv.slice(2))

	if (options.help) {
		console.log(HELP)
		return
	}

	if (options.version) {
		console.log(`jpegseg v${VERSION}`)
		return
	}

	if (!command) {
		console.log(HELP)
		process.exit(1)
	}

	switch (command) {
		case 'print': {
			expectPaths(command, paths, 1)
			const lines = printFile(readInput(paths[0]!), { verbose: options.verbose })
			if (!options.quiet) {
				for (const line of lines) console.log(line)
			}
			break
		}

		case 'copy': {
			expectPaths(command, paths, 2)
			const [input, output] = [paths[0]!, paths[1]!]
			const result = copyFile(readInput(input))
			writeOutput(output, result.data, options)
			if (!options.quiet) {
				const images = result.index ? result.index.imageOffsets.length : 1
				console.log(`${input} → ${output} (${images} image${images === 1 ? '' : 's'})`)
			}
			break
		}

		case 'strip': {
			expectPaths(command, paths, 2)
			const [input, output] = [paths[0]!, paths[1]!]
			writeOutput(output, stripFile(readInput(input)), options)
			if (!options.quiet) {
				console.log(`${input} → ${output}`)
			}
			break
		}
	}
}

try {
	main()
} catch (err: unknown) {
	console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
	process.exit(1)
}
