import { SaxesParser } from 'saxes'

import { captureClipElement, ClipCapture, ClipShape, startClipCapture } from './clip.js'
import { ColorResolver } from './colors.js'
import { BlendMode } from './css.js'
import { Definition, expandUse, recordClose, recordOpen } from './definitions.js'
import { ElementKind, getElementKind } from './dom.js'
import { drawImage, drawShape, openGroup } from './element.js'
import { InvalidInputError, MalformedDocumentError } from './errors.js'
import { Matrix } from './geometry.js'
import { addGradientStop, GradientDefinition, registerGradient } from './gradients.js'
import { GraphicsEngine } from './graphics.js'
import { ByteLoader } from './loader.js'
import { Attributes, createDefaultStyle, SvgStyle } from './style.js'
import { openNestedSvg, openRootSvg } from './svg.js'
import { openText, TextLayout, TextState } from './text.js'
import { assert, createIdGenerator } from './util.js'

export type Logger = Pick<Console, 'debug' | 'warn'>

export interface SvgConverterOptions {
	/**
	 * Writes the content-stream operators and collects the resources they use.
	 *
	 * @default new PdfGraphics()
	 */
	graphics?: GraphicsEngine

	/** Maps color tokens to device colors. */
	colors?: ColorResolver

	/** Lays out and writes a run of text. */
	textLayout?: TextLayout

	/** Loads documents and images given as file paths or `data:` URIs. */
	loadBytes?: ByteLoader

	/**
	 * Pixels per inch. Only used to convert the document's intrinsic size to points.
	 *
	 * @default 72
	 */
	dpi?: number

	/**
	 * Path parameters with a smaller absolute value are snapped to zero.
	 *
	 * @default 0.01
	 */
	minLength?: number

	/**
	 * How deep embedded SVG images and `<use>` expansions may nest.
	 *
	 * @default 8
	 */
	maxNestingDepth?: number

	/** @default console */
	logger?: Logger
}

export type ResolvedOptions = Required<SvgConverterOptions>

export interface Size {
	readonly width: number
	readonly height: number
}

/**
 * One level of the scope stack. Frames are never mutated: opening a scope creates a new frame pointing at its
 * parent, closing it restores the parent.
 */
export interface Frame {
	readonly style: SvgStyle
	/** The size percentages in this user space refer to. */
	readonly viewport: Size
	/** Maps this user space to the top-down page space. */
	readonly ctm: Matrix
	/** Product of the opacity of all enclosing scopes. */
	readonly groupOpacity: number
	/** Blend mode in effect for the scope. */
	readonly blendMode: BlendMode
	/** Whether the scope or one of its ancestors has `display: none`. Nothing inside it is painted. */
	readonly hidden: boolean
	readonly parent: Frame | undefined
}

/**
 * Where a document is drawn on the page.
 */
export interface DocumentPlacement {
	/** Maps the drawing's top left corner to the top-down page space. */
	readonly matrix: Matrix
	/** A width or height of 0 is derived from the document's intrinsic size. */
	readonly width: number
	readonly height: number
}

interface OpenElement {
	readonly close: () => void
	/** Whether the element was recorded into a definition, so its end tag must be too. */
	readonly recorded: boolean
}

/**
 * State of one document conversion. Embedded SVG images get a context of their own.
 */
export interface DocumentContext {
	readonly options: ResolvedOptions
	/** Height of the page, for flipping the y axis. */
	readonly pageHeight: number
	/** Nesting depth of embedded SVG images, 0 for a top-level document. */
	readonly depth: number
	readonly placement: DocumentPlacement
	readonly getUniqueId: (prefix: string) => string

	readonly gradients: Map<string, GradientDefinition>
	readonly definitions: Map<string, Definition>
	readonly clipPaths: Map<string, ClipShape[]>
	/** Contexts of embedded SVG images, in document order. */
	readonly children: DocumentContext[]

	/** Closing actions of the elements that are still open, innermost last. */
	readonly openElements: OpenElement[]
	/** Definitions that are still being recorded, innermost last. */
	readonly recordings: Definition[]
	/** Ids of the definitions currently being expanded by `<use>`. */
	readonly expanding: Set<string>

	output: string
	frame: Frame
	rootSeen: boolean
	/** Number of open `<defs>` (and unreferenced `<symbol>`) elements. Nothing is drawn while positive. */
	definitionsDepth: number
	clip: ClipCapture | undefined
	gradient: GradientDefinition | undefined
	text: TextState | undefined
	/** Number of `<use>` expansions being replayed. Nothing is recorded while positive. */
	replayDepth: number
	/** Character data not yet attached to a recorded event. */
	recordedText: string
	/** Number of open nested `<svg>` elements. */
	svgDepth: number
}

export function createDocumentContext(
	options: ResolvedOptions,
	pageHeight: number,
	placement: DocumentPlacement,
	depth = 0
): DocumentContext {
	const style = createDefaultStyle(options.dpi)
	return {
		options,
		pageHeight,
		depth,
		placement,
		getUniqueId: createIdGenerator(),
		gradients: new Map(),
		definitions: new Map(),
		clipPaths: new Map(),
		children: [],
		openElements: [],
		recordings: [],
		expanding: new Set(),
		output: '',
		frame: {
			style,
			viewport: { width: placement.width, height: placement.height },
			ctm: placement.matrix,
			groupOpacity: 1,
			blendMode: 'Normal',
			hidden: false,
			parent: undefined,
		},
		rootSeen: false,
		definitionsDepth: 0,
		clip: undefined,
		gradient: undefined,
		text: undefined,
		replayDepth: 0,
		recordedText: '',
		svgDepth: 0,
	}
}

/**
 * Parses the markup and dispatches its elements in document order, writing into the context's output.
 */
export function traverseDocument(markup: string, context: DocumentContext): void {
	const parser = new SaxesParser()
	parser.on('error', error => {
		throw new MalformedDocumentError(parser.line, error.message)
	})
	parser.on('doctype', doctype => {
		for (const [name, value] of parseEntityDeclarations(doctype)) {
			parser.ENTITIES[name] = value
		}
	})
	parser.on('opentag', tag => handleOpenTag(tag.name, tag.attributes, context))
	parser.on('closetag', tag => handleCloseTag(tag.name, context))
	parser.on('text', text => handleCharacters(text, context))
	parser.on('cdata', text => handleCharacters(text, context))
	parser.write(markup).close()
	if (!context.rootSeen) {
		throw new InvalidInputError('The document has no root element')
	}
}

const entityDeclaration = /<!ENTITY\s+([^\s%"']+)\s+(?:"([^"]*)"|'([^']*)')\s*>/g

/**
 * Reads the general entities declared in the internal subset of a document type declaration,
 * as found in documents exported by vector editors (`<!ENTITY ns_svg "http://www.w3.org/2000/svg">`).
 * Parameter entities and external entities are ignored.
 */
export function parseEntityDeclarations(doctype: string): Map<string, string> {
	const entities = new Map<string, string>()
	for (const [, name, doubleQuoted, singleQuoted] of doctype.matchAll(entityDeclaration)) {
		const value = doubleQuoted ?? singleQuoted
		if (name !== undefined && value !== undefined && !entities.has(name)) {
			entities.set(name, value)
		}
	}
	return entities
}

const noop = (): void => {}

/**
 * Makes `frame` the current frame. The returned function restores the previous one.
 */
export function enterFrame(context: DocumentContext, frame: Omit<Frame, 'parent' | 'hidden'>): () => void {
	const parent = context.frame
	context.frame = { ...frame, hidden: parent.hidden || frame.style.display === 'none', parent }
	return () => {
		context.frame = parent
	}
}

/**
 * Whether elements are currently painted, as opposed to recorded as definitions or clip geometry.
 */
export const isDrawing = (context: DocumentContext): boolean => context.definitionsDepth === 0 && !context.clip

export function handleOpenTag(name: string, attributes: Attributes, context: DocumentContext): void {
	const kind = getElementKind(name)
	if (!context.rootSeen) {
		if (kind.type !== 'svg') {
			throw new InvalidInputError(`Expected an <svg> root element, got <${name}>`)
		}
		context.rootSeen = true
		context.openElements.push({ close: openRootSvg(attributes, context), recorded: false })
		return
	}
	const { recorded, stopRecording } = recordOpen(name, attributes, kind, context)
	const close = dispatchOpen(kind, attributes, context)
	context.openElements.push({
		recorded,
		close: () => {
			close()
			stopRecording()
		},
	})
}

export function handleCloseTag(name: string, context: DocumentContext): void {
	const element = context.openElements.pop()
	assert(element, `Unexpected end tag </${name}>`)
	if (element.recorded) {
		recordClose(name, context)
	}
	element.close()
}

export function handleCharacters(text: string, context: DocumentContext): void {
	if (context.recordings.length > 0 && context.replayDepth === 0 && !context.clip) {
		context.recordedText += text
	}
	if (context.text && isDrawing(context)) {
		context.text.pending += text
	}
}

/**
 * Routes an element to its handler according to the traversal mode.
 *
 * @returns The action to run at the element's end tag.
 */
function dispatchOpen(kind: ElementKind, attributes: Attributes, context: DocumentContext): () => void {
	// Gradients register in any mode, except as clip geometry
	if (kind.type === 'gradient') {
		if (context.clip) {
			return noop
		}
		context.gradient = registerGradient(kind.gradientType, attributes, context)
		return () => {
			context.gradient = undefined
		}
	}
	if (kind.type === 'stop') {
		if (!context.clip && context.gradient) {
			addGradientStop(context.gradient, attributes, context)
		}
		return noop
	}

	if (context.clip) {
		return kind.type === 'clipPath' ? noop : captureClipElement(kind, attributes, context, context.clip)
	}
	if (kind.type === 'clipPath') {
		return startClipCapture(attributes, context)
	}

	if (kind.type === 'defs' || kind.type === 'symbol') {
		context.definitionsDepth++
		return () => {
			context.definitionsDepth--
		}
	}
	if (context.definitionsDepth > 0) {
		return noop
	}

	switch (kind.type) {
		case 'svg':
			return openNestedSvg(attributes, context)
		case 'group':
			return openGroup(attributes, context)
		case 'use':
			return expandUse(attributes, context)
		case 'shape':
			drawShape(kind.shape, attributes, context)
			return noop
		case 'image':
			drawImage(attributes, context)
			return noop
		case 'text':
			return openText(kind, attributes, context)
		case 'unknown':
			return noop
	}
}
