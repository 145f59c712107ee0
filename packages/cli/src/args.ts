/**
 * Argument parsing
 */

import { ConversionError } from '@vtfkit/core'
import type { ExportOptionRecord } from '@vtfkit/layers'

export type Command = 'info' | 'unpack' | 'pack'

const COMMANDS: readonly Command[] = ['info', 'unpack', 'pack']

export interface CliOptions {
	out?: string

	// Export
	format?: string
	vtfVersion?: string
	type?: string
	mipmaps?: string
	resize?: string
	thumbnail?: boolean
	reflectivity?: boolean
	bumpScale?: string
	merge?: boolean

	// Flags
	verbose?: boolean
	quiet?: boolean
	help?: boolean
	version?: boolean
}

export interface ParsedArgs {
	command?: Command
	inputs: string[]
	options: CliOptions
}

type ValueOption = 'out' | 'format' | 'vtfVersion' | 'type' | 'mipmaps' | 'resize' | 'bumpScale'

const VALUE_OPTIONS: Record<string, ValueOption> = {
	'-o': 'out',
	'--out': 'out',
	'-f': 'format',
	'--format': 'format',
	'--vtf-version': 'vtfVersion',
	'-t': 'type',
	'--type': 'type',
	'-m': 'mipmaps',
	'--mipmaps': 'mipmaps',
	'-r': 'resize',
	'--resize': 'resize',
	'--bump-scale': 'bumpScale',
}

/**
 * Split argv (without the node and script entries) into a command,
 * positional inputs and options. Unknown options are InvalidConfig.
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
	const inputs: string[] = []
	const options: CliOptions = {}
	let command: Command | undefined

	for (let i = 0; i < args.length; i++) {
		const arg = args[i]

		if (arg === '--help' || arg === '-h') {
			options.help = true
		} else if (arg === '--version' || arg === '-V') {
			options.version = true
		} else if (arg === '--verbose' || arg === '-v') {
			options.verbose = true
		} else if (arg === '--quiet' || arg === '-q') {
			options.quiet = true
		} else if (arg === '--no-thumbnail') {
			options.thumbnail = false
		} else if (arg === '--no-reflectivity') {
			options.reflectivity = false
		} else if (arg === '--merge') {
			options.merge = true
		} else if (Object.hasOwn(VALUE_OPTIONS, arg)) {
			const value = args[i + 1]
			if (value === undefined) {
				throw new ConversionError('InvalidConfig', `Missing value for ${arg}`)
			}
			options[VALUE_OPTIONS[arg]] = value
			i++
		} else if (arg.startsWith('-') && arg !== '-') {
			throw new ConversionError('InvalidConfig', `Unknown option: ${arg}`)
		} else if (command === undefined && inputs.length === 0) {
			const found = COMMANDS.find((c) => c === arg)
			if (found === undefined) {
				throw new ConversionError('InvalidConfig', `Unknown command: ${arg} (expected one of ${COMMANDS.join(', ')})`)
			}
			command = found
		} else {
			inputs.push(arg)
		}
	}

	return { command, inputs, options }
}

/**
 * Export options under the dialog ids understood by parseExportOptions.
 * Options not given on the command line stay unset.
 */
export function toExportRecord(options: CliOptions): ExportOptionRecord {
	return {
		version: options.vtfVersion,
		image_format: options.format,
		image_type: options.type,
		mipmap_filter: options.mipmaps,
		resize_method: options.resize,
		thumbnail_enabled: options.thumbnail,
		recompute_reflectivity_enabled: options.reflectivity,
		bumpmap_scale: options.bumpScale,
		merge_layers_enabled: options.merge,
	}
}
