import { parseHrefId } from './css.js'
import { ElementKind, getElementKind, getHref, removeTagNamespace } from './dom.js'
import { Attributes } from './style.js'
import { DocumentContext, handleCharacters, handleCloseTag, handleOpenTag } from './traversal.js'

/**
 * A recorded start or end tag. `leadingText` is the character data that preceded the tag.
 */
export type DefinitionEvent =
	| { readonly type: 'open'; readonly name: string; readonly attributes: Attributes; readonly leadingText: string }
	| { readonly type: 'close'; readonly name: string; readonly leadingText: string }

/**
 * The recorded markup of an element with an `id`, replayed by `<use>`.
 */
export interface Definition {
	readonly events: DefinitionEvent[]
	/** Whether the end tag has been recorded. */
	complete: boolean
}

const notRecorded = { recorded: false, stopRecording: () => {} }

const unrecordedKinds = new Set<ElementKind['type']>(['gradient', 'stop', 'clipPath'])

/**
 * Records a start tag into every open definition and opens a new definition if the element has an `id`.
 */
export function recordOpen(
	name: string,
	attributes: Attributes,
	kind: ElementKind,
	context: DocumentContext
): { recorded: boolean; stopRecording: () => void } {
	if (context.replayDepth > 0 || context.clip || unrecordedKinds.has(kind.type)) {
		return notRecorded
	}
	const event: DefinitionEvent = {
		type: 'open',
		name,
		attributes,
		leadingText: context.recordings.length > 0 ? context.recordedText : '',
	}
	context.recordedText = ''
	for (const recording of context.recordings) {
		recording.events.push(event)
	}
	const id = attributes.id
	if (!id) {
		return { recorded: context.recordings.length > 0, stopRecording: () => {} }
	}
	const definition: Definition = { events: [event], complete: false }
	context.definitions.set(id, definition)
	context.recordings.push(definition)
	return {
		recorded: true,
		stopRecording: () => {
			definition.complete = true
			context.recordings.pop()
			if (context.recordings.length === 0) {
				context.recordedText = ''
			}
		},
	}
}

export function recordClose(name: string, context: DocumentContext): void {
	const event: DefinitionEvent = { type: 'close', name, leadingText: context.recordedText }
	context.recordedText = ''
	for (const recording of context.recordings) {
		recording.events.push(event)
	}
}

// Elements whose x and y position them, so a <use> offset can be added to them
const positionedKinds = new Set<ElementKind['type']>(['svg', 'image', 'text', 'use'])

const toNumber = (value: string | undefined): number => {
	const number = parseFloat(value ?? '')
	return Number.isFinite(number) ? number : 0
}

/**
 * Merges the attributes of a `<use>` element into those of the element it references.
 *
 * The `<use>` attributes win, except that `x` and `y` add to the referenced element's position (or become a
 * translation for elements without one), inline styles are concatenated with the `<use>` declarations last and
 * transforms are composed with the `<use>` transform outermost. `id` and `href` are dropped. A `<symbol>` becomes
 * an `<svg>`.
 */
export function mergeUseAttributes(
	definitionName: string,
	definitionAttributes: Attributes,
	useAttributes: Attributes
): { name: string; attributes: Attributes } {
	const name = removeTagNamespace(definitionName) === 'symbol' ? 'svg' : definitionName
	const kind = getElementKind(name)
	const isViewport = kind.type === 'svg'
	const isPositioned = positionedKinds.has(kind.type) || (kind.type === 'shape' && kind.shape === 'rect')

	const merged: Record<string, string> = {}
	for (const [attribute, value] of Object.entries(definitionAttributes)) {
		merged[attribute] = value
	}
	const skipped = new Set(['id', 'href', 'xlink:href', 'x', 'y', 'style', 'transform', 'width', 'height'])
	for (const [attribute, value] of Object.entries(useAttributes)) {
		if (!skipped.has(attribute)) {
			merged[attribute] = value
		}
	}
	delete merged.id
	delete merged.href
	delete merged['xlink:href']

	const offsetX = toNumber(useAttributes.x)
	const offsetY = toNumber(useAttributes.y)
	const transforms = [useAttributes.transform]
	if (isPositioned) {
		if (useAttributes.x !== undefined) {
			merged.x = String(toNumber(definitionAttributes.x) + offsetX)
		}
		if (useAttributes.y !== undefined) {
			merged.y = String(toNumber(definitionAttributes.y) + offsetY)
		}
	} else if (offsetX !== 0 || offsetY !== 0) {
		transforms.push(`translate(${offsetX}, ${offsetY})`)
	}
	transforms.push(definitionAttributes.transform)
	const transform = transforms.filter(Boolean).join(' ')
	if (transform) {
		merged.transform = transform
	}

	const style = [definitionAttributes.style, useAttributes.style].filter(Boolean).join(';')
	if (style) {
		merged.style = style
	}

	if (isViewport) {
		for (const dimension of ['width', 'height'] as const) {
			const value = useAttributes[dimension]
			if (value !== undefined) {
				merged[dimension] = value
			}
		}
	}
	return { name, attributes: merged }
}

/**
 * Expands a `<use>` element by replaying the referenced definition at the current position.
 * Unknown, unfinished and cyclic references are skipped with a warning.
 *
 * @returns The action to run at the `<use>` end tag.
 */
export function expandUse(attributes: Attributes, context: DocumentContext): () => void {
	const { logger, maxNestingDepth } = context.options
	const noop = (): void => {}
	const id = parseHrefId(getHref(attributes))
	const definition = id === undefined ? undefined : context.definitions.get(id)
	if (id === undefined || !definition) {
		logger.warn(`Ignoring <use> with unresolvable reference ${getHref(attributes) ?? '(none)'}`)
		return noop
	}
	if (!definition.complete || context.expanding.has(id)) {
		logger.warn(`Ignoring <use> of #${id}: the reference is cyclic`)
		return noop
	}
	if (context.expanding.size >= maxNestingDepth) {
		logger.warn(`Ignoring <use> of #${id}: nested deeper than ${maxNestingDepth} levels`)
		return noop
	}
	const [first, ...rest] = definition.events
	if (!first || first.type !== 'open') {
		return noop
	}

	const merged = mergeUseAttributes(first.name, first.attributes, attributes)
	const events: DefinitionEvent[] = [{ ...first, ...merged, leadingText: '' }, ...rest]
	context.expanding.add(id)
	context.replayDepth++
	try {
		for (const event of events) {
			if (event.leadingText) {
				handleCharacters(event.leadingText, context)
			}
			if (event.type === 'open') {
				handleOpenTag(event.name, event.attributes, context)
			} else {
				handleCloseTag(event.name, context)
			}
		}
	} finally {
		context.replayDepth--
		context.expanding.delete(id)
	}
	return noop
}
