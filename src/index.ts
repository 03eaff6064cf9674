import { resolveColor } from './colors.js'
import { InvalidInputError, UnknownHandleError } from './errors.js'
import { translationMatrix } from './geometry.js'
import { PdfGraphics } from './graphics.js'
import { ByteLoader, loadBytes } from './loader.js'
import { layoutText } from './text.js'
import {
	createDocumentContext,
	DocumentContext,
	ResolvedOptions,
	SvgConverterOptions,
	traverseDocument,
} from './traversal.js'
import { createCounter } from './util.js'

export * from './colors.js'
export * from './errors.js'
export * from './gradients.js'
export * from './graphics.js'
export * from './loader.js'
export * from './text.js'
export type { BoundingBox, Box, Matrix, Point } from './geometry.js'
export type { Frame, Logger, ResolvedOptions, Size, SvgConverterOptions } from './traversal.js'
export { interpretPath, tokenizePathData } from './path.js'
export type { InterpretedPath, PathCommand, PathSegment } from './path.js'
export { parseTransform } from './transform.js'
export { fitViewBox, parsePreserveAspectRatio, parseViewBox } from './viewport.js'
export type { PreserveAspectRatio, ViewportFit } from './viewport.js'

export function resolveOptions(options: SvgConverterOptions = {}): ResolvedOptions {
	return {
		graphics: options.graphics ?? new PdfGraphics(),
		colors: options.colors ?? resolveColor,
		textLayout: options.textLayout ?? layoutText,
		loadBytes: options.loadBytes ?? loadBytes,
		dpi: options.dpi ?? 72,
		minLength: options.minLength ?? 0.01,
		maxNestingDepth: options.maxNestingDepth ?? 8,
		logger: options.logger ?? console,
	}
}

/**
 * Reads the markup behind a source: literal markup (starting with `<`, or marked with a leading `@`),
 * a `data:` URI or a file path.
 */
export function readSource(source: string, load: ByteLoader): string {
	if (source.startsWith('@')) {
		return source.slice(1)
	}
	if (source.trimStart().startsWith('<')) {
		return source
	}
	const data = source.trim() === '' ? undefined : load(source.trim())
	if (!data) {
		throw new InvalidInputError('The SVG source could not be read')
	}
	return Buffer.from(data).toString('utf-8')
}

const renderDocument = (context: DocumentContext): string =>
	context.output + context.children.map(renderDocument).join('')

/**
 * Converts SVG documents into PDF content-stream operators.
 *
 * @example
 * const converter = new SvgConverter()
 * const markup = '@<svg width="10" height="10"><rect width="10" height="10"/></svg>'
 * const handle = converter.convert(markup, 50, 50, 0, 0, 842)
 * const operators = converter.render(handle)
 */
export class SvgConverter {
	public readonly options: ResolvedOptions

	private readonly documents = new Map<number, DocumentContext>()
	private readonly nextHandle = createCounter()

	constructor(options?: SvgConverterOptions) {
		this.options = resolveOptions(options)
	}

	/**
	 * Converts a document drawn with its top left corner at (`x`, `y`), measured from the top of the page.
	 * A `width` or `height` of 0 is derived from the document's intrinsic size.
	 *
	 * @param source Markup, a `data:` URI or a file path.
	 * @param pageHeight Height of the page, for flipping into the bottom-up page space.
	 * @returns A handle for {@link SvgConverter.render}.
	 */
	public convert(source: string, x: number, y: number, width: number, height: number, pageHeight: number): number {
		const markup = readSource(source, this.options.loadBytes)
		if (markup.trim() === '') {
			throw new InvalidInputError('The SVG source is empty')
		}
		const context = createDocumentContext(this.options, pageHeight, {
			matrix: translationMatrix(x, y),
			width,
			height,
		})
		traverseDocument(markup, context)
		const handle = this.nextHandle()
		this.documents.set(handle, context)
		this.options.logger.debug(
			`Converted SVG document into handle ${handle} with ${context.children.length} embedded documents`
		)
		return handle
	}

	/**
	 * The operators of a converted document, followed by those of the SVG images it embeds.
	 */
	public render(handle: number): string {
		const context = this.documents.get(handle)
		if (!context) {
			throw new UnknownHandleError(handle)
		}
		return renderDocument(context)
	}
}
