/**
 * vtfkit CLI commands
 *
 *   info    print the header of one or more VTF files
 *   unpack  write every frame/face of a VTF as a farbfeld layer
 *   pack    build a VTF from farbfeld layers
 */

import { mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { basename, dirname, extname, join } from 'node:path'
import {
	ConsoleLogger,
	ConversionError,
	createRasterImage,
	errorMessage,
	isConversionError,
	type ImageData,
	type Logger,
	type LogLevel,
} from '@vtfkit/core'
import { describeContainer, exportVtf, loadVtf, parseExportOptions, type VtfInfo } from '@vtfkit/layers'
import { VTF_FLAG, vtfCodec } from '@vtfkit/vtf'
import { parseArgs, toExportRecord, type CliOptions } from './args'
import { decodeFarbfeld, encodeFarbfeld } from './farbfeld'

export const VERSION = '0.1.0'

export const HELP = `
vtfkit - Valve Texture Format converter

USAGE:
  vtfkit info <file.vtf>...                 Show file info
  vtfkit unpack <file.vtf> [-o <dir>]       Write each frame/face as <name>.NNN.ff
  vtfkit pack <layer.ff>... [-o <file.vtf>] Build a VTF, one layer per file

PACK OPTIONS:
  -f, --format <name>     Image format (RGBA8888, BGR888, DXT5, ...)
  --vtf-version <7.x>     Container version, 7.0 to 7.6 (default 7.4)
  -t, --type <type>       standard, envmap or volumetric
  -m, --mipmaps <filter>  none, default, box, bilinear, cubic, catmull,
                          mitchell, point or kaiser (default kaiser)
  -r, --resize <method>   Power of two rounding: bigger, smaller, nearest
  --no-thumbnail          Leave out the low resolution thumbnail
  --no-reflectivity       Keep the default reflectivity
  --bump-scale <n>        Bump map scale, 0 to 10
  --merge                 Flatten all layers into one frame

OPTIONS:
  -o, --out <path>        Output file or directory
  -v, --verbose           Debug output
  -q, --quiet             Errors only
  -h, --help              Show this help
  -V, --version           Show version
`

/**
 * Run the CLI against argv (without the node and script entries).
 * Returns the process exit code.
 */
export function run(args: readonly string[]): number {
	let logger: Logger = createLogger({})

	try {
		const { command, inputs, options } = parseArgs(args)
		logger = createLogger(options)

		if (options.version) {
			console.log(`vtfkit v${VERSION}`)
			return 0
		}
		if (options.help || command === undefined) {
			console.log(HELP)
			return 0
		}
		if (inputs.length === 0) {
			throw new ConversionError('InvalidConfig', `${command} needs at least one input file`)
		}

		switch (command) {
			case 'info':
				for (const input of inputs) showInfo(input)
				break
			case 'unpack':
				for (const input of inputs) unpack(input, options, logger)
				break
			case 'pack':
				pack(inputs, options, logger)
				break
		}
		return 0
	} catch (err) {
		if (isConversionError(err)) {
			logger.error(`${err.kind}: ${err.message}`)
			for (const warning of err.warnings) logger.warn(warning.message)
		} else {
			logger.error(errorMessage(err))
		}
		return 1
	}
}

function createLogger(options: CliOptions): Logger {
	let level: LogLevel = 'info'
	if (options.verbose) level = 'debug'
	if (options.quiet) level = 'error'
	return new ConsoleLogger('vtfkit', level)
}

function readBytes(path: string): Uint8Array {
	try {
		return new Uint8Array(readFileSync(path))
	} catch (err) {
		throw new ConversionError('ReadError', `Cannot read ${path}: ${errorMessage(err)}`, { cause: err })
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// info
// ─────────────────────────────────────────────────────────────────────────────

function showInfo(path: string): void {
	const info = describeContainer(vtfCodec.parseContainer(readBytes(path)))
	console.log(formatInfo(path, info).join('\n'))
}

const row = (label: string, value: string): string => `  ${label.padEnd(14)}${value}`

export function formatInfo(path: string, info: VtfInfo): string[] {
	return [
		path,
		row('version', `7.${info.version}`),
		row('format', info.formatName),
		row('size', `${info.width}x${info.height}x${info.depth}`),
		row('type', info.imageType),
		row('frames', String(info.frameCount)),
		row('faces', String(info.faceCount)),
		row('mipmaps', String(info.mipCount)),
		row('flags', formatFlags(info.flags)),
		row('reflectivity', info.reflectivity.map((v) => v.toFixed(3)).join(' ')),
		row('bump scale', String(info.bumpScale)),
		row('thumbnail', info.hasThumbnail ? 'yes' : 'no'),
	]
}

export function formatFlags(flags: number): string {
	const hex = `0x${flags.toString(16).padStart(8, '0')}`
	const names = Object.entries(VTF_FLAG)
		.filter(([, bit]) => (flags & bit) !== 0)
		.map(([name]) => name)
	return names.length > 0 ? `${hex} (${names.join(', ')})` : hex
}

// ─────────────────────────────────────────────────────────────────────────────
// unpack
// ─────────────────────────────────────────────────────────────────────────────

function unpack(path: string, options: CliOptions, logger: Logger): void {
	const { image } = loadVtf(path, { logger })
	const outDir = options.out ?? dirname(path)
	const base = basename(path, extname(path))

	mkdirSync(outDir, { recursive: true })
	image.layers.forEach((layer, i) => {
		const output = join(outDir, `${base}.${String(i + 1).padStart(3, '0')}.ff`)
		try {
			writeFileSync(output, encodeFarbfeld(layer.image))
		} catch (err) {
			throw new ConversionError('SerializationError', `Cannot write ${output}: ${errorMessage(err)}`, { cause: err })
		}
		logger.debug(`${layer.name} -> ${output}`)
	})

	logger.info(`Unpacked ${image.layers.length} layers from ${path} into ${outDir}`)
}

// ─────────────────────────────────────────────────────────────────────────────
// pack
// ─────────────────────────────────────────────────────────────────────────────

function pack(inputs: readonly string[], options: CliOptions, logger: Logger): void {
	const config = parseExportOptions(toExportRecord(options))
	const layers: ImageData[] = inputs.map((input) => {
		try {
			return decodeFarbfeld(readBytes(input))
		} catch (err) {
			if (isConversionError(err, 'ParseError')) {
				throw new ConversionError('ParseError', `${input}: ${err.message}`, { cause: err })
			}
			throw err
		}
	})

	const output = options.out ?? join(dirname(inputs[0]), `${basename(inputs[0], extname(inputs[0]))}.vtf`)
	const { container, warnings } = exportVtf(createRasterImage(layers), config, output, { logger })

	logger.info(
		`Packed ${layers.length} layers into ${output}: ${container.width}x${container.height}, ` +
			`${container.frameCount} frames, ${container.faceCount} faces, ${container.mipCount} mipmaps`,
		{ warnings: warnings.length }
	)
}
