import { readFileSync } from 'fs'

/**
 * Loads the bytes behind a file path or `data:` URI. Returns `undefined` if there are none.
 */
export type ByteLoader = (source: string) => Uint8Array | undefined

const DATA_URI_REGEX = /^data:([^,]*?)(;base64)?,(.*)$/is

export const isDataUri = (source: string): boolean => source.trimStart().toLowerCase().startsWith('data:')

/**
 * The media type of a `data:` URI, e.g. `image/svg+xml`.
 */
export function getDataUriMediaType(source: string): string | undefined {
	const match = source.trim().match(DATA_URI_REGEX)
	return match ? (match[1] ?? '').split(';')[0]?.trim().toLowerCase() : undefined
}

export function decodeDataUri(source: string): Uint8Array | undefined {
	const match = source.trim().match(DATA_URI_REGEX)
	if (!match) {
		return undefined
	}
	const payload = match[3] ?? ''
	if (match[2]) {
		return Buffer.from(payload.replace(/\s+/g, ''), 'base64')
	}
	try {
		return Buffer.from(decodeURIComponent(payload), 'utf-8')
	} catch (error) {
		if (error instanceof URIError) {
			return undefined
		}
		throw error
	}
}

const missingFileCodes = new Set(['ENOENT', 'ENOTDIR', 'EISDIR', 'ENAMETOOLONG'])

/**
 * The default loader: decodes `data:` URIs and reads everything else from the file system.
 */
export const loadBytes: ByteLoader = source => {
	if (isDataUri(source)) {
		return decodeDataUri(source)
	}
	try {
		return readFileSync(source)
	} catch (error) {
		if (
			error instanceof Error &&
			'code' in error &&
			typeof error.code === 'string' &&
			missingFileCodes.has(error.code)
		) {
			return undefined
		}
		throw error
	}
}

/**
 * Whether an image reference points at an SVG document, judged by its extension or media type.
 */
export const isSvgReference = (href: string): boolean =>
	isDataUri(href) ? getDataUriMediaType(href) === 'image/svg+xml' : /\.svg$/i.test(href.split(/[?#]/)[0] ?? '')
