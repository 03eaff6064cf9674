import { writeClipRegion } from './clip.js'
import { parseLength, parseNumberList } from './css.js'
import { writeGraphicsState } from './element.js'
import { flipMatrix, isIdentityMatrix, multiplyMatrices } from './geometry.js'
import { Attributes, isNonPainting, parsePaint, resolveStyle, SvgStyle } from './style.js'
import { parseTransform } from './transform.js'
import { DocumentContext, enterFrame } from './traversal.js'
import { formatNumber } from './util.js'

export type TextAnchor = 'start' | 'middle' | 'end'
export type TextDirection = 'ltr' | 'rtl'

export interface TextLayoutRequest {
	readonly text: string
	/** Anchor point in the bottom-up page space of the current graphics state. */
	readonly x: number
	readonly y: number
	readonly anchor: TextAnchor
	readonly direction: TextDirection
	readonly font: {
		readonly family: string
		/** In user units. */
		readonly size: number
		readonly weight: string
		readonly style: string
	}
}

export interface TextLayoutResult {
	readonly operators: string
	/** Advance width of the text, in user units. */
	readonly width: number
}

/**
 * Lays out and writes one run of text.
 */
export type TextLayout = (request: TextLayoutRequest) => TextLayoutResult

const escapePdfString = (text: string): string =>
	text.replace(/[\\()]/g, character => `\\${character}`).replace(/\r/g, '\\r').replace(/\n/g, '\\n')

/**
 * Estimates the advance of every character as half the font size and writes the text with the `/F1` font.
 */
export const layoutText: TextLayout = ({ text, x, y, anchor, direction, font }) => {
	const width = text.length * font.size * 0.5
	const anchorShift = anchor === 'middle' ? width / 2 : anchor === 'end' ? width : 0
	// Right-to-left text extends to the left of its start
	const shift = direction === 'rtl' ? width - anchorShift : anchorShift
	const operators = [
		'BT',
		`/F1 ${formatNumber(font.size)} Tf`,
		`${formatNumber(x - shift)} ${formatNumber(y)} Td`,
		`(${escapePdfString(text)}) Tj`,
		'ET',
	]
	return { operators: operators.join('\n') + '\n', width }
}

/**
 * The text accumulator of an open `<text>` element.
 */
export interface TextState {
	/** Current text position in the `<text>` element's user space. */
	x: number
	y: number
	/** Character data not written yet. */
	pending: string
	/** Whether the last written run ended with a space, or nothing has been written yet. */
	collapseLeadingSpace: boolean
}

const getAnchor = (style: SvgStyle): TextAnchor =>
	style['text-anchor'] === 'middle' || style['text-anchor'] === 'end' ? style['text-anchor'] : 'start'

const getDirection = (style: SvgStyle): TextDirection => (style.direction === 'rtl' ? 'rtl' : 'ltr')

/**
 * Writes the pending characters with the current style and advances the text position.
 * Whitespace runs collapse to a single space.
 */
export function flushText(context: DocumentContext, isEnd: boolean): void {
	const { text, frame, options, pageHeight } = context
	if (!text) {
		return
	}
	let value = text.pending.replace(/\s+/g, ' ')
	text.pending = ''
	if (text.collapseLeadingSpace) {
		value = value.trimStart()
	}
	if (isEnd) {
		value = value.trimEnd()
	}
	if (!value) {
		return
	}
	text.collapseLeadingSpace = value.endsWith(' ')

	const { style } = frame
	const direction = getDirection(style)
	const result = options.textLayout({
		text: value,
		x: text.x,
		y: pageHeight - text.y,
		anchor: getAnchor(style),
		direction,
		font: {
			family: style['font-family'],
			size: style['font-size'],
			weight: style['font-weight'],
			style: style['font-style'],
		},
	})
	text.x += direction === 'rtl' ? -result.width : result.width

	if (isNonPainting(style) || frame.hidden) {
		return
	}
	const paint = parsePaint(style.fill, style)
	if (paint.type === 'none') {
		return
	}
	// Text cannot be shaded: gradients paint it black
	const resolved = paint.type === 'color' ? options.colors(paint.value) : undefined
	if (paint.type === 'color' && !resolved) {
		options.logger.warn(`Ignoring text with unknown color ${paint.value}`)
		return
	}
	const { graphics } = options
	const alpha = frame.groupOpacity * style.opacity * style['fill-opacity'] * (resolved?.alpha ?? 1)
	const output = graphics.setFillColor(resolved?.color ?? { space: 'gray', gray: 0 }) + result.operators
	const graphicsState = writeGraphicsState(style, alpha, alpha, context)
	// A span has no graphics state of its own to restore
	context.output += graphicsState
		? graphics.saveState() + graphicsState + output + graphics.restoreState()
		: output
}

/**
 * Opens a `<text>` or `<tspan>`. A `<text>` starts a new text accumulator in its own graphics state, a `<tspan>`
 * writes the text before it and moves the text position.
 *
 * @returns The action to run at the element's end tag, writing the remaining text.
 */
export function openText(
	kind: { readonly span: boolean },
	attributes: Attributes,
	context: DocumentContext
): () => void {
	const { frame, options, pageHeight } = context
	const { graphics, dpi } = options
	const style = resolveStyle(frame.style, attributes, dpi)
	const lengthContext = { dpi, fontSize: style['font-size'] }
	const readPosition = (name: string, reference: number): number | undefined =>
		parseLength(attributes[name]?.trim().split(/[\s,]+/)[0], reference, lengthContext)
	const dx = parseNumberList(attributes.dx)[0] ?? 0
	const dy = parseNumberList(attributes.dy)[0] ?? 0

	const parentText = context.text
	if (kind.span && parentText) {
		flushText(context, false)
		parentText.x = (readPosition('x', frame.viewport.width) ?? parentText.x) + dx
		parentText.y = (readPosition('y', frame.viewport.height) ?? parentText.y) + dy
		const leaveFrame = enterFrame(context, { ...frame, style })
		return () => {
			flushText(context, false)
			leaveFrame()
		}
	}

	const transform = parseTransform(attributes.transform)
	let output = graphics.saveState()
	if (!isIdentityMatrix(transform)) {
		output += graphics.transform(flipMatrix(transform, pageHeight))
	}
	output += writeClipRegion(style, undefined, context)
	context.output += output
	context.text = {
		x: (readPosition('x', frame.viewport.width) ?? 0) + dx,
		y: (readPosition('y', frame.viewport.height) ?? 0) + dy,
		pending: '',
		collapseLeadingSpace: true,
	}
	const leaveFrame = enterFrame(context, { ...frame, style, ctm: multiplyMatrices(frame.ctm, transform) })
	return () => {
		flushText(context, true)
		context.output += graphics.restoreState()
		context.text = parentText
		leaveFrame()
	}
}
