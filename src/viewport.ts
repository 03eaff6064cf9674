import { Box, Matrix } from './geometry.js'

export type Alignment = 'min' | 'mid' | 'max'

export type PreserveAspectRatio =
	| { readonly align: 'none' }
	| { readonly align: { readonly x: Alignment; readonly y: Alignment }; readonly meetOrSlice: 'meet' | 'slice' }

export const DEFAULT_PRESERVE_ASPECT_RATIO: PreserveAspectRatio = {
	align: { x: 'mid', y: 'mid' },
	meetOrSlice: 'meet',
}

const ALIGN_REGEX = /^x(Min|Mid|Max)Y(Min|Mid|Max)$/

const toAlignment = (value: string): Alignment => (value === 'Min' ? 'min' : value === 'Max' ? 'max' : 'mid')

/**
 * Parses a `preserveAspectRatio` attribute. Anything unrecognized falls back to `xMidYMid meet`.
 */
export function parsePreserveAspectRatio(value: string | undefined): PreserveAspectRatio {
	const tokens = (value ?? '').trim().split(/\s+/).filter(token => token !== 'defer')
	const [alignToken, meetOrSliceToken] = tokens
	if (alignToken === 'none') {
		return { align: 'none' }
	}
	const match = alignToken?.match(ALIGN_REGEX)
	if (!match) {
		return DEFAULT_PRESERVE_ASPECT_RATIO
	}
	return {
		align: { x: toAlignment(match[1] ?? 'Mid'), y: toAlignment(match[2] ?? 'Mid') },
		meetOrSlice: meetOrSliceToken === 'slice' ? 'slice' : 'meet',
	}
}

/**
 * Parses a `viewBox` attribute. Returns `undefined` if it does not hold four numbers with a positive size.
 */
export function parseViewBox(value: string | undefined): Box | undefined {
	if (!value) {
		return undefined
	}
	const numbers = value
		.trim()
		.split(/[\s,]+/)
		.map(part => parseFloat(part))
	const [x, y, width, height] = numbers
	if (
		numbers.length !== 4 ||
		!numbers.every(Number.isFinite) ||
		x === undefined ||
		y === undefined ||
		width === undefined ||
		height === undefined ||
		width <= 0 ||
		height <= 0
	) {
		return undefined
	}
	return { x, y, width, height }
}

export interface ViewportFit {
	readonly scaleX: number
	readonly scaleY: number
	readonly offsetX: number
	readonly offsetY: number
	/** Maps viewBox coordinates to viewport coordinates. */
	readonly matrix: Matrix
}

const alignmentOffset = (alignment: Alignment, leftover: number): number =>
	alignment === 'min' ? 0 : alignment === 'max' ? leftover : leftover / 2

/**
 * Computes how a viewBox is scaled and aligned into a viewport of the given size.
 */
export function fitViewBox(
	viewportWidth: number,
	viewportHeight: number,
	viewBox: Box,
	preserveAspectRatio: PreserveAspectRatio
): ViewportFit {
	let scaleX = viewportWidth / viewBox.width
	let scaleY = viewportHeight / viewBox.height
	let offsetX = 0
	let offsetY = 0
	if (preserveAspectRatio.align !== 'none') {
		const scale =
			preserveAspectRatio.meetOrSlice === 'slice' ? Math.max(scaleX, scaleY) : Math.min(scaleX, scaleY)
		scaleX = scale
		scaleY = scale
		offsetX = alignmentOffset(preserveAspectRatio.align.x, viewportWidth - viewBox.width * scale)
		offsetY = alignmentOffset(preserveAspectRatio.align.y, viewportHeight - viewBox.height * scale)
	}
	return {
		scaleX,
		scaleY,
		offsetX,
		offsetY,
		matrix: [scaleX, 0, 0, scaleY, offsetX - viewBox.x * scaleX, offsetY - viewBox.y * scaleY],
	}
}
