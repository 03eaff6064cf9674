import { parseClipRect, parseUrlReference } from './css.js'
import { expandUse } from './definitions.js'
import { ElementKind } from './dom.js'
import { buildShapePath } from './element.js'
import { Box, Matrix, multiplyMatrices } from './geometry.js'
import { InterpretedPath, writePath } from './path.js'
import { Attributes, resolveStyle, SvgStyle } from './style.js'
import { parseTransform } from './transform.js'
import { DocumentContext } from './traversal.js'

/**
 * A shape of a `<clipPath>`, kept as geometry to be replayed wherever the clip path is referenced.
 */
export interface ClipShape {
	readonly path: InterpretedPath
	/** Maps the shape's coordinates to the user space of the referencing element. */
	readonly matrix: Matrix
	readonly evenOdd: boolean
}

export interface ClipCapture {
	readonly shapes: ClipShape[]
	/** Transform of the `<clipPath>` composed with those of the currently open children. */
	matrix: Matrix
}

/**
 * Starts capturing the children of a `<clipPath>` instead of drawing them.
 *
 * @returns The action to run at the `</clipPath>` end tag.
 */
export function startClipCapture(attributes: Attributes, context: DocumentContext): () => void {
	const id = attributes.id ?? context.getUniqueId('clipPath')
	const shapes: ClipShape[] = []
	context.clipPaths.set(id, shapes)
	context.clip = { shapes, matrix: parseTransform(attributes.transform) }
	return () => {
		context.clip = undefined
	}
}

/**
 * Handles an element inside a `<clipPath>`: shapes are captured, `<use>` is expanded and every element's
 * transform applies to its children.
 */
export function captureClipElement(
	kind: ElementKind,
	attributes: Attributes,
	context: DocumentContext,
	clip: ClipCapture
): () => void {
	if (kind.type === 'use') {
		return expandUse(attributes, context)
	}
	const previousMatrix = clip.matrix
	clip.matrix = multiplyMatrices(previousMatrix, parseTransform(attributes.transform))
	if (kind.type === 'shape') {
		const style = resolveStyle(context.frame.style, attributes, context.options.dpi)
		const path = buildShapePath(kind.shape, attributes, style, context)
		if (path) {
			clip.shapes.push({ path, matrix: clip.matrix, evenOdd: style['clip-rule'] === 'evenodd' })
		}
	}
	return () => {
		clip.matrix = previousMatrix
	}
}

/**
 * Writes the clipping path for an element: the shapes of its `clip-path` reference, then its old-style
 * `clip: rect()` inset from `box`. Returns an empty string if neither applies.
 */
export function writeClipRegion(style: SvgStyle, box: Box | undefined, context: DocumentContext): string {
	const { graphics, logger, dpi } = context.options
	const { pageHeight } = context
	let output = ''

	const reference = parseUrlReference(style['clip-path'])
	if (reference) {
		const shapes = context.clipPaths.get(reference.id)
		if (!shapes) {
			logger.warn(`Ignoring unknown clip path #${reference.id}`)
		} else if (shapes.length === 0) {
			// An empty clip path hides the element entirely
			output += graphics.rect(0, 0, 0, 0) + graphics.paint('W n')
		} else {
			for (const shape of shapes) {
				output += writePath(shape.path.segments, graphics, pageHeight, shape.matrix)
			}
			output += graphics.paint(shapes[0]?.evenOdd ? 'W* n' : 'W n')
		}
	}

	const insets = box && parseClipRect(style.clip, { dpi, fontSize: style['font-size'] })
	if (box && insets) {
		const x = box.x + insets.left
		const y = box.y + insets.top
		const width = box.width - insets.left - insets.right
		const height = box.height - insets.top - insets.bottom
		output += graphics.rect(x, pageHeight - y - height, width, height) + graphics.paint('W n')
	}
	return output
}
