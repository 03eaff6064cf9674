import { writeClipRegion } from './clip.js'
import { LengthContext, normalizeBlendMode, parseLength } from './css.js'
import { writeGraphicsState } from './element.js'
import { InvalidGeometryError } from './errors.js'
import {
	Box,
	flipMatrix,
	IDENTITY_MATRIX,
	isIdentityMatrix,
	Matrix,
	multiplyMatrices,
	scalingMatrix,
	translationMatrix,
} from './geometry.js'
import { Attributes, resolveStyle, SvgStyle } from './style.js'
import { parseTransform } from './transform.js'
import { createDocumentContext, DocumentContext, enterFrame, Size, traverseDocument } from './traversal.js'
import { fitViewBox, parsePreserveAspectRatio, parseViewBox } from './viewport.js'

/**
 * The size an `<svg>` declares through `width` and `height`, falling back to its `viewBox`. Unknown dimensions
 * are 0.
 */
export function getIntrinsicSize(attributes: Attributes, lengthContext: LengthContext): Size {
	const viewBox = parseViewBox(attributes.viewBox)
	return {
		width: parseLength(attributes.width, viewBox?.width ?? 0, lengthContext) ?? viewBox?.width ?? 0,
		height: parseLength(attributes.height, viewBox?.height ?? 0, lengthContext) ?? viewBox?.height ?? 0,
	}
}

/**
 * Resolves the requested drawing size. A width and height of 0 take the intrinsic size, a single 0 is derived
 * from the other dimension keeping the intrinsic aspect ratio.
 */
export function resolveDrawingSize(requested: Size, intrinsic: Size): Size {
	let { width, height } = requested
	if (width === 0 && height === 0) {
		width = intrinsic.width
		height = intrinsic.height
	} else if (width === 0) {
		width = intrinsic.height > 0 ? (height * intrinsic.width) / intrinsic.height : 0
	} else if (height === 0) {
		height = intrinsic.width > 0 ? (width * intrinsic.height) / intrinsic.width : 0
	}
	if (!(width > 0) || !(height > 0)) {
		throw new InvalidGeometryError(`The SVG drawing size resolved to ${width}x${height}`)
	}
	return { width, height }
}

/**
 * Opens the document's root `<svg>`: clips to the drawing box and maps the viewBox (or the intrinsic size) onto it.
 *
 * @returns The action to run at the root's end tag.
 */
export function openRootSvg(attributes: Attributes, context: DocumentContext): () => void {
	const { frame, options, placement, pageHeight } = context
	const { graphics, dpi, logger } = options
	const style = resolveStyle(frame.style, attributes, dpi)
	const viewBox = parseViewBox(attributes.viewBox)
	const intrinsic = getIntrinsicSize(attributes, { dpi, fontSize: style['font-size'] })
	const pointsPerPixel = 72 / dpi
	const { width, height } = resolveDrawingSize(placement, {
		width: intrinsic.width * pointsPerPixel,
		height: intrinsic.height * pointsPerPixel,
	})
	const contentBox: Box | undefined =
		viewBox ?? (intrinsic.width > 0 && intrinsic.height > 0 ? { x: 0, y: 0, ...intrinsic } : undefined)
	let viewBoxMatrix: Matrix
	let viewport: Size
	if (contentBox) {
		viewBoxMatrix = fitViewBox(width, height, contentBox, parsePreserveAspectRatio(attributes.preserveAspectRatio))
			.matrix
		viewport = { width: contentBox.width, height: contentBox.height }
	} else {
		// Embedded documents are already scaled by their placement
		const scale = context.depth === 0 ? pointsPerPixel : 1
		viewBoxMatrix = scalingMatrix(scale)
		viewport = { width: width / scale, height: height / scale }
	}
	logger.debug(`Drawing SVG document of ${width}x${height} at nesting depth ${context.depth}`)

	let output = graphics.saveState()
	if (!isIdentityMatrix(placement.matrix)) {
		output += graphics.transform(flipMatrix(placement.matrix, pageHeight))
	}
	output += graphics.rect(0, pageHeight - height, width, height) + graphics.paint('W n')
	if (!isIdentityMatrix(viewBoxMatrix)) {
		output += graphics.transform(flipMatrix(viewBoxMatrix, pageHeight))
	}
	output += writeGraphicsState(style, style.opacity, style.opacity, context)
	context.output += output

	const ownBlendMode = normalizeBlendMode(style['mix-blend-mode'])
	const leaveFrame = enterFrame(context, {
		style,
		viewport,
		ctm: multiplyMatrices(placement.matrix, viewBoxMatrix),
		groupOpacity: style.opacity,
		blendMode: ownBlendMode,
	})
	return () => {
		context.output += graphics.restoreState()
		leaveFrame()
	}
}

/**
 * Opens an `<svg>` nested in the document: a new viewport positioned by `x`/`y`, clipped unless its overflow is
 * visible, with its own viewBox mapping.
 *
 * @returns The action to run at the element's end tag.
 */
export function openNestedSvg(attributes: Attributes, context: DocumentContext): () => void {
	const { frame, options, pageHeight } = context
	const { graphics, dpi, logger } = options
	const specifiedStyle = resolveStyle(frame.style, attributes, dpi)
	const lengthContext = { dpi, fontSize: specifiedStyle['font-size'] }
	const x = parseLength(attributes.x, frame.viewport.width, lengthContext) ?? 0
	const y = parseLength(attributes.y, frame.viewport.height, lengthContext) ?? 0
	const width = parseLength(attributes.width ?? '100%', frame.viewport.width, lengthContext) ?? 0
	const height = parseLength(attributes.height ?? '100%', frame.viewport.height, lengthContext) ?? 0
	const hasArea = width > 0 && height > 0
	// A viewport without area disables rendering of its content
	const style: SvgStyle = hasArea ? specifiedStyle : { ...specifiedStyle, display: 'none' }
	const viewBox = parseViewBox(attributes.viewBox)
	const transform = parseTransform(attributes.transform)
	const viewBoxMatrix =
		viewBox && hasArea
			? fitViewBox(width, height, viewBox, parsePreserveAspectRatio(attributes.preserveAspectRatio)).matrix
			: IDENTITY_MATRIX
	const local = multiplyMatrices(translationMatrix(x, y), viewBoxMatrix)
	const groupOpacity = frame.groupOpacity * style.opacity
	const ownBlendMode = normalizeBlendMode(style['mix-blend-mode'])

	let output = graphics.saveState()
	if (!isIdentityMatrix(transform)) {
		output += graphics.transform(flipMatrix(transform, pageHeight))
	}
	if (style.overflow !== 'visible' && hasArea) {
		output += graphics.rect(x, pageHeight - y - height, width, height) + graphics.paint('W n')
	}
	output += writeClipRegion(style, undefined, context)
	output += writeGraphicsState(style, groupOpacity, groupOpacity, context)
	if (!isIdentityMatrix(local)) {
		output += graphics.transform(flipMatrix(local, pageHeight))
	}
	context.output += output
	context.svgDepth++
	logger.debug(`Entering nested <svg> at depth ${context.svgDepth}`)

	const leaveFrame = enterFrame(context, {
		style,
		viewport: viewBox ?? { width, height },
		ctm: multiplyMatrices(multiplyMatrices(frame.ctm, transform), local),
		groupOpacity,
		blendMode: ownBlendMode === 'Normal' ? frame.blendMode : ownBlendMode,
	})
	return () => {
		context.output += graphics.restoreState()
		context.svgDepth--
		leaveFrame()
	}
}

/**
 * Converts an SVG document referenced by an `<image>` into a child context of `context`, drawn into `box`.
 * Its output follows the parent's output when rendering.
 *
 * @param matrix Maps the image's user space to the top-down page space.
 */
export function embedSvgDocument(href: string, box: Box, matrix: Matrix, context: DocumentContext): void {
	const { options, pageHeight, depth } = context
	const { logger, maxNestingDepth } = options
	if (depth >= maxNestingDepth) {
		logger.warn(`Ignoring SVG image nested deeper than ${maxNestingDepth} levels`)
		return
	}
	const data = options.loadBytes(href)
	if (!data) {
		logger.warn(`Ignoring SVG image that could not be loaded: ${href.slice(0, 64)}`)
		return
	}
	const child = createDocumentContext(
		options,
		pageHeight,
		{ matrix: multiplyMatrices(matrix, translationMatrix(box.x, box.y)), width: box.width, height: box.height },
		depth + 1
	)
	context.children.push(child)
	traverseDocument(Buffer.from(data).toString('utf-8'), child)
}
