/**
 * The source yielded no usable markup (empty string, unreadable file or data URI, no `<svg>` root).
 */
export class InvalidInputError extends Error {
	public name = 'InvalidInputError'
}

/**
 * The drawing box resolved to a non-positive width or height.
 */
export class InvalidGeometryError extends Error {
	public name = 'InvalidGeometryError'
}

/**
 * The markup is not well-formed XML. Aborts the whole conversion.
 */
export class MalformedDocumentError extends Error {
	public name = 'MalformedDocumentError'

	constructor(public readonly line: number, reason: string) {
		super(`Malformed SVG document at line ${line}: ${reason}`)
	}
}

export class UnknownHandleError extends Error {
	public name = 'UnknownHandleError'

	constructor(public readonly handle: number) {
		super(`No converted SVG document is registered under handle ${handle}`)
	}
}
