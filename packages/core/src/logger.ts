/**
 * Minimal leveled logger. Pipelines take a Logger so hosts can route
 * messages into their own UI; the default writes to the console.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogMeta = Record<string, unknown>

export interface Logger {
	debug(message: string, meta?: LogMeta): void
	info(message: string, meta?: LogMeta): void
	warn(message: string, meta?: LogMeta): void
	error(message: string, meta?: LogMeta): void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
}

export function formatMeta(meta?: LogMeta): string {
	if (!meta) return ''
	try {
		return ` ${JSON.stringify(meta)}`
	} catch {
		return ' [unserializable meta]'
	}
}

export class ConsoleLogger implements Logger {
	private readonly prefix: string
	private readonly minLevel: LogLevel

	constructor(prefix = 'vtfkit', minLevel: LogLevel = 'info') {
		this.prefix = prefix
		this.minLevel = minLevel
	}

	debug(message: string, meta?: LogMeta): void {
		this.log('debug', message, meta)
	}

	info(message: string, meta?: LogMeta): void {
		this.log('info', message, meta)
	}

	warn(message: string, meta?: LogMeta): void {
		this.log('warn', message, meta)
	}

	error(message: string, meta?: LogMeta): void {
		this.log('error', message, meta)
	}

	private log(level: LogLevel, message: string, meta?: LogMeta): void {
		if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) return
		const line = `[${this.prefix}] [${level}] ${message}${formatMeta(meta)}`
		if (level === 'warn' || level === 'error') {
			console.error(line)
		} else {
			console.log(line)
		}
	}
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
}

export function defaultLogger(): Logger {
	return new ConsoleLogger('vtfkit', 'warn')
}
