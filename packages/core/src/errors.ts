/**
 * Conversion error kinds
 */

export type ConversionErrorKind =
	| 'ParseError'
	| 'ReadError'
	| 'InvalidConfig'
	| 'ShapeMismatch'
	| 'DimensionMismatch'
	| 'UnsupportedFormatForVersion'
	| 'DerivedAssetError'
	| 'SerializationError'

/**
 * A single frame/face cell that did not accept its pixel data.
 * The cell is left zeroed and the export carries on.
 */
export interface PixelAssignmentWarning {
	readonly kind: 'PixelAssignmentWarning'
	readonly layer: number
	readonly frame: number
	readonly face: number
	readonly message: string
}

export interface ConversionErrorOptions {
	cause?: unknown
	warnings?: readonly PixelAssignmentWarning[]
}

export class ConversionError extends Error {
	readonly kind: ConversionErrorKind
	/** Warnings collected before the failure */
	readonly warnings: readonly PixelAssignmentWarning[]

	constructor(kind: ConversionErrorKind, message: string, options: ConversionErrorOptions = {}) {
		super(message, options.cause === undefined ? undefined : { cause: options.cause })
		this.name = 'ConversionError'
		this.kind = kind
		this.warnings = options.warnings ?? []
	}

	/**
	 * Same error, with the warnings collected so far attached
	 */
	withWarnings(warnings: readonly PixelAssignmentWarning[]): ConversionError {
		return new ConversionError(this.kind, this.message, {
			cause: this.cause,
			warnings: [...this.warnings, ...warnings],
		})
	}
}

export function isConversionError(err: unknown, kind?: ConversionErrorKind): err is ConversionError {
	if (!(err instanceof ConversionError)) return false
	return kind === undefined || err.kind === kind
}

export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
