import { DeviceColor } from './colors.js'
import { LengthContext, parseHrefId, parseLength } from './css.js'
import { getHref } from './dom.js'
import { applyMatrix, Box, IDENTITY_MATRIX, Matrix } from './geometry.js'
import { Attributes, parsePaint, resolveStyle } from './style.js'
import { parseTransform } from './transform.js'
import type { DocumentContext } from './traversal.js'
import { clamp, isDefined } from './util.js'

export interface GradientStop {
	/** Position along the gradient vector, in `[0, 1]`. */
	readonly offset: number
	readonly color: DeviceColor
	readonly opacity: number
}

export type GradientUnits = 'objectBoundingBox' | 'userSpaceOnUse'

/**
 * A `<linearGradient>` or `<radialGradient>` as declared in the document, before resolving references.
 */
export interface GradientDefinition {
	readonly id: string
	readonly type: 'linear' | 'radial'
	/** The raw geometry attributes (`x1`… or `cx`…). */
	readonly attributes: Attributes
	/** `undefined` if not declared, so that a referenced gradient can supply it. */
	readonly units: GradientUnits | undefined
	readonly transform: Matrix | undefined
	/** Id of the gradient referenced through `href`. */
	readonly href: string | undefined
	readonly stops: GradientStop[]
}

interface ResolvedGradientBase {
	/** Maps the unit square of the coordinates to the painted box, in page space. */
	readonly placement: Matrix
	/** Sorted by offset. */
	readonly stops: readonly GradientStop[]
}

/**
 * A gradient ready to be emitted as a shading. Coordinates are fractions of the painted box,
 * with the y axis pointing up.
 */
export type ResolvedGradient =
	| (ResolvedGradientBase & {
			readonly type: 'linear'
			readonly coords: readonly [x1: number, y1: number, x2: number, y2: number]
	  })
	| (ResolvedGradientBase & {
			readonly type: 'radial'
			readonly coords: readonly [cx: number, cy: number, fx: number, fy: number, r: number]
	  })

/**
 * How the geometry attributes of a gradient are to be read.
 * - `percentage`: `%` values, fractions of the bounding box
 * - `measure`: lengths, in user space or in the bounding box depending on the units
 * - `ratio`: unitless fractions of the bounding box (radial gradients only)
 */
export type CoordinateMode = 'percentage' | 'measure' | 'ratio'

const defaultCoordinates: Record<GradientDefinition['type'], Readonly<Record<string, string>>> = {
	linear: { x1: '0%', y1: '0%', x2: '100%', y2: '0%' },
	radial: { cx: '50%', cy: '50%', r: '50%' },
}

export const parseGradientUnits = (value: string | undefined): GradientUnits | undefined =>
	value === 'userSpaceOnUse' || value === 'objectBoundingBox' ? value : undefined

/**
 * Parses a `<stop>` offset. Percentages and bare numbers greater than 1 are divided by 100.
 */
export function parseStopOffset(value: string | undefined): number {
	const trimmed = value?.trim() ?? ''
	const number = parseFloat(trimmed)
	if (!Number.isFinite(number)) {
		return 0
	}
	return clamp(trimmed.endsWith('%') || number > 1 ? number / 100 : number, 0, 1)
}

const toPercentageFraction = (value: string): number => clamp(parseFloat(value) / 100, 0, 1) || 0

export function getCoordinateMode(type: GradientDefinition['type'], attributes: Attributes): CoordinateMode {
	const first = type === 'linear' ? attributes.x1 ?? '0%' : attributes.cx ?? '50%'
	if (first.trim().endsWith('%')) {
		return 'percentage'
	}
	const radius = attributes.r?.trim()
	if (type === 'radial' && radius !== undefined && !radius.endsWith('%') && parseFloat(radius) <= 1) {
		return 'ratio'
	}
	return 'measure'
}

/**
 * Registers a gradient element. Its stops are added as the `<stop>` children are encountered.
 */
export function registerGradient(
	type: GradientDefinition['type'],
	attributes: Attributes,
	context: Pick<DocumentContext, 'gradients' | 'getUniqueId'>
): GradientDefinition {
	const definition: GradientDefinition = {
		id: attributes.id ?? context.getUniqueId(`${type}Gradient`),
		type,
		attributes,
		units: parseGradientUnits(attributes.gradientUnits),
		transform:
			attributes.gradientTransform === undefined ? undefined : parseTransform(attributes.gradientTransform),
		href: parseHrefId(getHref(attributes)),
		stops: [],
	}
	context.gradients.set(definition.id, definition)
	return definition
}

const BLACK: DeviceColor = { space: 'gray', gray: 0 }

export function addGradientStop(
	gradient: GradientDefinition,
	attributes: Attributes,
	{ frame, options }: Pick<DocumentContext, 'frame' | 'options'>
): void {
	const style = resolveStyle(frame.style, attributes, options.dpi)
	const paint = parsePaint(style['stop-color'], style)
	const resolved = paint.type === 'color' ? options.colors(paint.value) : undefined
	gradient.stops.push({
		offset: parseStopOffset(attributes.offset),
		color: resolved?.color ?? BLACK,
		opacity: style['stop-opacity'] * (resolved?.alpha ?? 1),
	})
}

/**
 * Follows `href` references from the given gradient, stopping at unknown ids and cycles.
 */
function getReferenceChain(gradients: ReadonlyMap<string, GradientDefinition>, id: string): GradientDefinition[] {
	const chain: GradientDefinition[] = []
	const visited = new Set<string>()
	let current: string | undefined = id
	while (current !== undefined && !visited.has(current)) {
		visited.add(current)
		const gradient = gradients.get(current)
		if (!gradient) {
			break
		}
		chain.push(gradient)
		current = gradient.href
	}
	return chain
}

export interface GradientTarget {
	/** Bounding box of the painted element, in its user space. */
	readonly box: Box
	readonly pageHeight: number
	readonly lengthContext: LengthContext
}

/**
 * Resolves a gradient reference against the element it paints.
 * Returns `undefined` if the id is unknown or no gradient in the reference chain has stops.
 */
export function resolveGradient(
	gradients: ReadonlyMap<string, GradientDefinition>,
	id: string,
	{ box, pageHeight, lengthContext }: GradientTarget
): ResolvedGradient | undefined {
	const chain = getReferenceChain(gradients, id)
	const gradient = chain[0]
	const stops = chain.find(definition => definition.stops.length > 0)?.stops
	if (!gradient || !stops) {
		return undefined
	}
	const units = chain.map(definition => definition.units).find(isDefined) ?? 'objectBoundingBox'
	const { type, attributes } = gradient
	const transform = gradient.transform ?? IDENTITY_MATRIX
	const mode = getCoordinateMode(type, attributes)
	const userSpace = mode === 'measure' && units === 'userSpaceOnUse'

	const getValue = (name: string): string => (attributes[name] ?? defaultCoordinates[type][name] ?? '0').trim()
	const read = (name: string, axis: 'x' | 'y'): number => {
		const value = getValue(name)
		if (value.endsWith('%')) {
			const fraction = toPercentageFraction(value)
			if (!userSpace) {
				return fraction
			}
			// Percentages always refer to the box, so turn them into user space like the other coordinates
			return axis === 'x' ? box.x + fraction * box.width : box.y + fraction * box.height
		}
		return mode === 'percentage' ? toPercentageFraction(value) : parseLength(value, 0, lengthContext) ?? 0
	}
	const toFraction = (x: number, y: number): [number, number] => {
		const point = applyMatrix(transform, x, y)
		if (!userSpace) {
			return [point.x, 1 - point.y]
		}
		const fractionX = box.width === 0 ? 0 : (point.x - box.x) / box.width
		const fractionY = box.height === 0 ? 0 : (point.y - box.y) / box.height
		return [fractionX, 1 - fractionY]
	}

	const placement: Matrix = [box.width, 0, 0, box.height, box.x, pageHeight - box.y - box.height]
	const sortedStops = [...stops].sort((a, b) => a.offset - b.offset)

	if (type === 'linear') {
		const [x1, y1] = toFraction(read('x1', 'x'), read('y1', 'y'))
		const [x2, y2] = toFraction(read('x2', 'x'), read('y2', 'y'))
		// Identical endpoints have no direction: nudge them so the last stop covers the box
		const coords: [number, number, number, number] = x1 === x2 && y1 === y2 ? [1, 0, 0.999, 0] : [x1, y1, x2, y2]
		return { type, coords, placement, stops: sortedStops }
	}

	const cx = read('cx', 'x')
	const cy = read('cy', 'y')
	const [centerX, centerY] = toFraction(cx, cy)
	const [focusX, focusY] = toFraction(
		attributes.fx === undefined ? cx : read('fx', 'x'),
		attributes.fy === undefined ? cy : read('fy', 'y')
	)
	const [a, b, c, d] = transform
	const radiusValue = getValue('r')
	let radius =
		radiusValue.endsWith('%') || mode === 'percentage'
			? toPercentageFraction(radiusValue)
			: parseLength(radiusValue, 0, lengthContext) ?? 0
	if (userSpace && !radiusValue.endsWith('%')) {
		radius = box.width === 0 ? 0 : radius / box.width
	}
	radius *= Math.sqrt(Math.abs(a * d - b * c))
	return { type, coords: [centerX, centerY, focusX, focusY, radius], placement, stops: sortedStops }
}
