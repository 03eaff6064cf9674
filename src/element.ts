import { writeClipRegion } from './clip.js'
import { DeviceColor } from './colors.js'
import { LengthContext, normalizeBlendMode, parseLength, parseNumberList } from './css.js'
import { getHref, ShapeName } from './dom.js'
import {
	boundingBoxToBox,
	Box,
	flipMatrix,
	isEmptyBoundingBox,
	isIdentityMatrix,
	Matrix,
	multiplyMatrices,
} from './geometry.js'
import { ResolvedGradient, resolveGradient } from './gradients.js'
import { LineStyle } from './graphics.js'
import { isSvgReference } from './loader.js'
import { createPath, InterpretedPath, interpretPath, PathSegment, writePath } from './path.js'
import { Attributes, isNonPainting, parsePaint, resolveStyle, SvgStyle } from './style.js'
import { embedSvgDocument } from './svg.js'
import { parseTransform } from './transform.js'
import { DocumentContext, enterFrame, Size } from './traversal.js'

/**
 * The length percentages of `r` and `stroke-width` refer to.
 */
export const normalizedDiagonal = ({ width, height }: Size): number => Math.sqrt((width * width + height * height) / 2)

const getLengthContext = (style: SvgStyle, { dpi }: Pick<DocumentContext['options'], 'dpi'>): LengthContext => ({
	dpi,
	fontSize: style['font-size'],
})

function buildRect(x: number, y: number, width: number, height: number, rx: number, ry: number): PathSegment[] {
	if (rx <= 0 || ry <= 0) {
		return [
			{ type: 'move', x, y },
			{ type: 'line', x: x + width, y },
			{ type: 'line', x: x + width, y: y + height },
			{ type: 'line', x, y: y + height },
			{ type: 'close' },
		]
	}
	const right = x + width
	const bottom = y + height
	const corner = (cx: number, cy: number, startAngle: number, endX: number, endY: number): PathSegment => ({
		type: 'arc',
		arc: { cx, cy, rx, ry, rotation: 0, startAngle, sweep: Math.PI / 2 },
		x: endX,
		y: endY,
	})
	return [
		{ type: 'move', x: x + rx, y },
		{ type: 'line', x: right - rx, y },
		corner(right - rx, y + ry, -Math.PI / 2, right, y + ry),
		{ type: 'line', x: right, y: bottom - ry },
		corner(right - rx, bottom - ry, 0, right - rx, bottom),
		{ type: 'line', x: x + rx, y: bottom },
		corner(x + rx, bottom - ry, Math.PI / 2, x, bottom - ry),
		{ type: 'line', x, y: y + ry },
		corner(x + rx, y + ry, Math.PI, x + rx, y),
		{ type: 'close' },
	]
}

function buildEllipse(cx: number, cy: number, rx: number, ry: number): PathSegment[] {
	return [
		{ type: 'move', x: cx + rx, y: cy },
		{ type: 'arc', arc: { cx, cy, rx, ry, rotation: 0, startAngle: 0, sweep: 2 * Math.PI }, x: cx + rx, y: cy },
		{ type: 'close' },
	]
}

function buildPolyline(points: readonly number[], closed: boolean): PathSegment[] {
	const segments: PathSegment[] = []
	// An odd trailing coordinate is ignored
	for (let index = 0; index + 1 < points.length; index += 2) {
		segments.push({ type: index === 0 ? 'move' : 'line', x: points[index] ?? 0, y: points[index + 1] ?? 0 })
	}
	if (closed && segments.length > 0) {
		segments.push({ type: 'close' })
	}
	return segments
}

/**
 * Computes the geometry of a shape element in its own user space.
 *
 * @returns `undefined` for shapes that do not render, like a rect without width or a circle without radius.
 */
export function buildShapePath(
	shape: ShapeName,
	attributes: Attributes,
	style: SvgStyle,
	{ frame, options }: Pick<DocumentContext, 'frame' | 'options'>
): InterpretedPath | undefined {
	const { viewport } = frame
	const lengthContext = getLengthContext(style, options)
	const horizontal = (name: string, fallback = 0): number =>
		parseLength(attributes[name], viewport.width, lengthContext) ?? fallback
	const vertical = (name: string, fallback = 0): number =>
		parseLength(attributes[name], viewport.height, lengthContext) ?? fallback
	const diagonal = (name: string): number =>
		parseLength(attributes[name], normalizedDiagonal(viewport), lengthContext) ?? 0

	switch (shape) {
		case 'path': {
			const path = interpretPath(attributes.d ?? '', { minLength: options.minLength })
			return path.segments.length > 0 ? path : undefined
		}
		case 'rect': {
			const width = horizontal('width')
			const height = vertical('height')
			if (width <= 0 || height <= 0) {
				return undefined
			}
			const rx = parseLength(attributes.rx, viewport.width, lengthContext)
			const ry = parseLength(attributes.ry, viewport.height, lengthContext)
			return createPath(
				buildRect(
					horizontal('x'),
					vertical('y'),
					width,
					height,
					Math.min(Math.max(rx ?? ry ?? 0, 0), width / 2),
					Math.min(Math.max(ry ?? rx ?? 0, 0), height / 2)
				)
			)
		}
		case 'circle': {
			const r = diagonal('r')
			return r > 0 ? createPath(buildEllipse(horizontal('cx'), vertical('cy'), r, r)) : undefined
		}
		case 'ellipse': {
			const rx = horizontal('rx')
			const ry = vertical('ry')
			return rx > 0 && ry > 0 ? createPath(buildEllipse(horizontal('cx'), vertical('cy'), rx, ry)) : undefined
		}
		case 'line':
			return createPath([
				{ type: 'move', x: horizontal('x1'), y: vertical('y1') },
				{ type: 'line', x: horizontal('x2'), y: vertical('y2') },
			])
		case 'polyline':
		case 'polygon': {
			const segments = buildPolyline(parseNumberList(attributes.points), shape === 'polygon')
			return segments.length > 0 ? createPath(segments) : undefined
		}
	}
}

/**
 * Writes an ExtGState for the element if its alpha or blend mode differ from what its scope already set.
 */
export function writeGraphicsState(
	style: SvgStyle,
	fillAlpha: number,
	strokeAlpha: number,
	{ frame, options }: Pick<DocumentContext, 'frame' | 'options'>
): string {
	const ownBlendMode = normalizeBlendMode(style['mix-blend-mode'])
	if (fillAlpha === frame.groupOpacity && strokeAlpha === frame.groupOpacity && ownBlendMode === 'Normal') {
		return ''
	}
	return options.graphics.setExtGState({
		fillAlpha,
		strokeAlpha,
		blendMode: ownBlendMode === 'Normal' ? frame.blendMode : ownBlendMode,
	})
}

const lineCaps: Record<string, LineStyle['cap']> = { butt: 0, round: 1, square: 2 }
const lineJoins: Record<string, LineStyle['join']> = { miter: 0, round: 1, bevel: 2 }

export function getLineStyle(style: SvgStyle, viewport: Size, lengthContext: LengthContext): LineStyle {
	const diagonal = normalizedDiagonal(viewport)
	const dashes =
		style['stroke-dasharray'] === 'none'
			? []
			: style['stroke-dasharray']
					.split(/[\s,]+/)
					.filter(Boolean)
					.map(dash => parseLength(dash, diagonal, lengthContext))
	const validDashes = dashes.every(dash => dash !== undefined && dash >= 0)
		? dashes.filter((dash): dash is number => dash !== undefined)
		: []
	const dashArray = validDashes.some(dash => dash > 0)
		? validDashes.length % 2 === 1
			? [...validDashes, ...validDashes]
			: validDashes
		: []
	return {
		width: parseLength(style['stroke-width'], diagonal, lengthContext) ?? 1,
		cap: lineCaps[style['stroke-linecap']] ?? 0,
		join: lineJoins[style['stroke-linejoin']] ?? 0,
		miterLimit: Math.max(style['stroke-miterlimit'], 1),
		dashArray,
		dashPhase: dashArray.length > 0 ? style['stroke-dashoffset'] : 0,
	}
}

type ResolvedPaint =
	| { readonly type: 'none' }
	| { readonly type: 'color'; readonly color: DeviceColor; readonly alpha: number }
	| { readonly type: 'gradient'; readonly gradient: ResolvedGradient }

const NO_PAINT: ResolvedPaint = { type: 'none' }

/**
 * Resolves a `fill` or `stroke` value to something paintable. Unknown gradients fall back to the fallback color
 * of the reference, if any.
 */
function resolvePaint(value: string, style: SvgStyle, box: Box, context: DocumentContext): ResolvedPaint {
	const { colors, logger, dpi } = context.options
	const resolveColorPaint = (token: string): ResolvedPaint => {
		const resolved = colors(token)
		if (!resolved) {
			logger.warn(`Ignoring unknown color ${token}`)
			return NO_PAINT
		}
		return { type: 'color', ...resolved }
	}
	const paint = parsePaint(value, style)
	switch (paint.type) {
		case 'none':
			return NO_PAINT
		case 'color':
			return resolveColorPaint(paint.value)
		case 'gradient': {
			const gradient = resolveGradient(context.gradients, paint.id, {
				box,
				pageHeight: context.pageHeight,
				lengthContext: getLengthContext(style, { dpi }),
			})
			if (gradient) {
				return { type: 'gradient', gradient }
			}
			if (paint.fallback !== undefined) {
				return resolveColorPaint(paint.fallback === 'currentColor' ? style.color : paint.fallback)
			}
			logger.warn(`Ignoring paint with unknown gradient #${paint.id}`)
			return NO_PAINT
		}
	}
}

/**
 * Writes the operators painting a path with the element's fill and stroke, wrapped in a saved graphics state
 * holding the element's transform and clip. Returns an empty string if nothing is painted.
 */
export function paintPath(
	path: InterpretedPath,
	style: SvgStyle,
	transform: Matrix,
	context: DocumentContext
): string {
	const { frame, options, pageHeight } = context
	const { graphics } = options
	const box = boundingBoxToBox(path.boundingBox)
	let fill = resolvePaint(style.fill, style, box, context)
	let stroke = resolvePaint(style.stroke, style, box, context)
	// A shading needs an area to fill
	if (fill.type === 'gradient' && (box.width <= 0 || box.height <= 0)) {
		fill = NO_PAINT
	}
	// Strokes cannot be shaded: use the first stop
	if (stroke.type === 'gradient') {
		const [firstStop] = stroke.gradient.stops
		stroke = firstStop ? { type: 'color', color: firstStop.color, alpha: firstStop.opacity } : NO_PAINT
	}
	const lineStyle = getLineStyle(style, frame.viewport, getLengthContext(style, options))
	if (lineStyle.width <= 0) {
		stroke = NO_PAINT
	}
	if (fill.type === 'none' && stroke.type === 'none') {
		return ''
	}

	const evenOdd = style['fill-rule'] === 'evenodd'
	const pathOperators = writePath(path.segments, graphics, pageHeight)
	const opacity = frame.groupOpacity * style.opacity
	const fillAlpha = opacity * style['fill-opacity'] * (fill.type === 'color' ? fill.alpha : 1)
	const strokeAlpha = opacity * style['stroke-opacity'] * (stroke.type === 'color' ? stroke.alpha : 1)

	let output = graphics.saveState()
	if (!isIdentityMatrix(transform)) {
		output += graphics.transform(flipMatrix(transform, pageHeight))
	}
	output += writeClipRegion(style, isEmptyBoundingBox(path.boundingBox) ? undefined : box, context)
	output += writeGraphicsState(style, fillAlpha, strokeAlpha, context)
	if (fill.type === 'gradient') {
		output +=
			graphics.saveState() +
			pathOperators +
			graphics.paint(evenOdd ? 'W* n' : 'W n') +
			graphics.shading(fill.gradient) +
			graphics.restoreState()
	}
	if (stroke.type === 'color') {
		output += graphics.setLineStyle(lineStyle) + graphics.setStrokeColor(stroke.color)
	}
	if (fill.type === 'color') {
		output += graphics.setFillColor(fill.color) + pathOperators
		output += graphics.paint(stroke.type === 'color' ? (evenOdd ? 'B*' : 'B') : evenOdd ? 'f*' : 'f')
	} else if (stroke.type === 'color') {
		output += pathOperators + graphics.paint('S')
	}
	return output + graphics.restoreState()
}

/**
 * Draws a basic shape or path. Hidden shapes are measured but not painted.
 */
export function drawShape(shape: ShapeName, attributes: Attributes, context: DocumentContext): void {
	const style = resolveStyle(context.frame.style, attributes, context.options.dpi)
	const path = buildShapePath(shape, attributes, style, context)
	if (!path || isNonPainting(style) || context.frame.hidden) {
		return
	}
	context.output += paintPath(path, style, parseTransform(attributes.transform), context)
}

/**
 * Opens a `<g>` (or `<a>`, `<switch>`): a saved graphics state carrying the group's transform, clip, opacity and
 * blend mode for its children.
 *
 * @returns The action to run at the group's end tag.
 */
export function openGroup(attributes: Attributes, context: DocumentContext): () => void {
	const { frame, options, pageHeight } = context
	const { graphics } = options
	const style = resolveStyle(frame.style, attributes, options.dpi)
	const transform = parseTransform(attributes.transform)
	const groupOpacity = frame.groupOpacity * style.opacity
	const ownBlendMode = normalizeBlendMode(style['mix-blend-mode'])

	let output = graphics.saveState()
	if (!isIdentityMatrix(transform)) {
		output += graphics.transform(flipMatrix(transform, pageHeight))
	}
	output += writeClipRegion(style, undefined, context)
	output += writeGraphicsState(style, groupOpacity, groupOpacity, context)
	context.output += output

	const leaveFrame = enterFrame(context, {
		style,
		viewport: frame.viewport,
		ctm: multiplyMatrices(frame.ctm, transform),
		groupOpacity,
		blendMode: ownBlendMode === 'Normal' ? frame.blendMode : ownBlendMode,
	})
	return () => {
		context.output += graphics.restoreState()
		leaveFrame()
	}
}

/**
 * Draws an `<image>`. SVG documents are converted recursively into a child context, everything else is handed
 * to the graphics engine as raster data.
 */
export function drawImage(attributes: Attributes, context: DocumentContext): void {
	const { frame, options, pageHeight } = context
	const { graphics, logger } = options
	const style = resolveStyle(frame.style, attributes, options.dpi)
	const lengthContext = getLengthContext(style, options)
	const x = parseLength(attributes.x, frame.viewport.width, lengthContext) ?? 0
	const y = parseLength(attributes.y, frame.viewport.height, lengthContext) ?? 0
	const width = parseLength(attributes.width, frame.viewport.width, lengthContext) ?? 0
	const height = parseLength(attributes.height, frame.viewport.height, lengthContext) ?? 0
	const href = getHref(attributes)?.trim()
	if (!href || width <= 0 || height <= 0 || isNonPainting(style) || frame.hidden) {
		return
	}
	const transform = parseTransform(attributes.transform)

	if (isSvgReference(href)) {
		embedSvgDocument(href, { x, y, width, height }, multiplyMatrices(frame.ctm, transform), context)
		return
	}

	const data = options.loadBytes(href)
	if (!data) {
		logger.warn(`Ignoring image that could not be loaded: ${href.slice(0, 64)}`)
		return
	}
	const opacity = frame.groupOpacity * style.opacity
	let output = graphics.saveState()
	if (!isIdentityMatrix(transform)) {
		output += graphics.transform(flipMatrix(transform, pageHeight))
	}
	output += writeClipRegion(style, { x, y, width, height }, context)
	output += writeGraphicsState(style, opacity, opacity, context)
	output += graphics.image([width, 0, 0, height, x, pageHeight - y - height], data)
	context.output += output + graphics.restoreState()
}
