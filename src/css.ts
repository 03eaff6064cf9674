import cssValueParser from 'postcss-value-parser'

import { isTaggedUnionMember } from './util.js'

export interface LengthContext {
	/** Pixels per inch, i.e. user units per inch. */
	readonly dpi: number
	/** Font size in user units, for `em` and `ex`. */
	readonly fontSize: number
}

const LENGTH_REGEX = /^\s*([+-]?(?:\d+\.?\d*|\.\d+)(?:e[+-]?\d+)?)\s*([a-z%]*)\s*$/i

/**
 * Converts a CSS/SVG length to user units (pixels).
 *
 * @param reference The length percentages refer to.
 * @returns `undefined` if the value is missing or not a length.
 */
export function parseLength(
	value: string | undefined,
	reference: number,
	{ dpi, fontSize }: LengthContext
): number | undefined {
	const match = value?.match(LENGTH_REGEX)
	if (!match) {
		return undefined
	}
	const number = parseFloat(match[1] ?? '')
	switch ((match[2] ?? '').toLowerCase()) {
		case '':
		case 'px':
			return number
		case '%':
			return (number / 100) * reference
		case 'pt':
			return (number * dpi) / 72
		case 'pc':
			return (number * dpi) / 6
		case 'in':
			return number * dpi
		case 'mm':
			return (number * dpi) / 25.4
		case 'cm':
			return (number * dpi) / 2.54
		case 'em':
			return number * fontSize
		case 'ex':
			return (number * fontSize) / 2
	}
	return undefined
}

/**
 * Parses a list of numbers separated by whitespace and/or commas, e.g. `points` or `stroke-dasharray`.
 */
export const parseNumberList = (value: string | undefined): number[] =>
	(value ?? '')
		.split(/[\s,]+/)
		.filter(Boolean)
		.map(part => parseFloat(part))
		.filter(Number.isFinite)

const fontSizeKeywords: Record<string, number> = {
	'xx-small': 9,
	'x-small': 10,
	small: 13,
	medium: 16,
	large: 18,
	'x-large': 24,
	'xx-large': 32,
}

const isFontSizeKeyword = (keyword: string): boolean =>
	Object.keys(fontSizeKeywords).includes(keyword) || keyword === 'smaller' || keyword === 'larger'

/**
 * Resolves a `font-size` value to user units, relative to the parent font size.
 */
export function parseFontSize(value: string, context: LengthContext): number {
	const keyword = fontSizeKeywords[value.trim().toLowerCase()]
	if (keyword !== undefined) {
		return (keyword * context.dpi) / 96
	}
	if (value === 'smaller') {
		return context.fontSize / 1.2
	}
	if (value === 'larger') {
		return context.fontSize * 1.2
	}
	return parseLength(value, context.fontSize, context) ?? context.fontSize
}

export interface FontShorthand {
	readonly 'font-style'?: string
	readonly 'font-variant'?: string
	readonly 'font-weight'?: string
	readonly 'font-size'?: string
	readonly 'font-family'?: string
}

const fontStyleKeywords = new Set(['italic', 'oblique'])
const fontWeightKeywords = new Set(['bold', 'bolder', 'lighter'])
const fontStretchKeywords = new Set([
	'ultra-condensed',
	'extra-condensed',
	'condensed',
	'semi-condensed',
	'semi-expanded',
	'expanded',
	'extra-expanded',
	'ultra-expanded',
])

/**
 * Splits the `font` shorthand (`[style] [variant] [weight] [stretch] size[/line-height] family`) into its
 * longhands. Returns an empty object if no font size is found, which makes the declaration invalid.
 */
export function parseFontShorthand(value: string): FontShorthand {
	const nodes = cssValueParser(value.trim()).nodes
	const result: { -readonly [P in keyof FontShorthand]: FontShorthand[P] } = {}
	let index = 0
	for (; index < nodes.length; index++) {
		const node = nodes[index]
		if (!node || node.type === 'space') {
			continue
		}
		if (node.type !== 'word') {
			return {}
		}
		const keyword = node.value.toLowerCase()
		if (keyword === 'normal' || fontStretchKeywords.has(keyword)) {
			continue
		}
		if (fontStyleKeywords.has(keyword)) {
			result['font-style'] = keyword
		} else if (keyword === 'small-caps') {
			result['font-variant'] = keyword
		} else if (fontWeightKeywords.has(keyword) || /^[1-9]00$/.test(keyword)) {
			result['font-weight'] = keyword
		} else if (LENGTH_REGEX.test(node.value) || isFontSizeKeyword(keyword)) {
			result['font-size'] = node.value
			index++
			break
		} else {
			return {}
		}
	}
	if (result['font-size'] === undefined) {
		return {}
	}
	// Line height
	const next = nodes[index]
	if (next?.type === 'div' && next.value === '/') {
		index += 2
	}
	const family = cssValueParser.stringify(nodes.slice(index)).trim()
	if (family) {
		result['font-family'] = family
	}
	return result
}

/**
 * Splits an inline `style` attribute into lower-cased property names and values.
 * Semicolons inside parentheses or quotes (e.g. in data URIs) do not end a declaration.
 */
export function parseStyleDeclarations(style: string | undefined): Map<string, string> {
	const declarations = new Map<string, string>()
	if (!style) {
		return declarations
	}
	const addDeclaration = (declaration: string): void => {
		const colon = declaration.indexOf(':')
		if (colon === -1) {
			return
		}
		const name = declaration.slice(0, colon).trim().toLowerCase()
		const value = declaration
			.slice(colon + 1)
			.replace(/!important\s*$/i, '')
			.trim()
		if (name && value) {
			declarations.set(name, value)
		}
	}
	let depth = 0
	let quote: string | undefined
	let start = 0
	for (let index = 0; index < style.length; index++) {
		const character = style[index]
		if (quote) {
			if (character === quote) {
				quote = undefined
			}
		} else if (character === '"' || character === "'") {
			quote = character
		} else if (character === '(') {
			depth++
		} else if (character === ')') {
			depth = Math.max(0, depth - 1)
		} else if (character === ';' && depth === 0) {
			addDeclaration(style.slice(start, index))
			start = index + 1
		}
	}
	addDeclaration(style.slice(start))
	return declarations
}

export interface UrlReference {
	readonly id: string
	/** The paint to use if the reference cannot be resolved, e.g. `red` in `url(#gradient) red`. */
	readonly fallback: string | undefined
}

/**
 * Extracts a local `url(#id)` reference from a paint or `clip-path` value.
 */
export function parseUrlReference(value: string | undefined): UrlReference | undefined {
	if (!value || !value.includes('url(')) {
		return undefined
	}
	const parsedValue = cssValueParser(value)
	const urlNode = parsedValue.nodes.find(isTaggedUnionMember('type', 'function' as const))
	if (!urlNode || urlNode.value !== 'url') {
		return undefined
	}
	const argument = urlNode.nodes[0]
	if (!argument) {
		return undefined
	}
	const target = unescapeStringValue(argument.value.trim())
	const hash = target.indexOf('#')
	if (hash === -1) {
		return undefined
	}
	const rest = parsedValue.nodes.filter(node => node !== urlNode)
	const fallback = cssValueParser.stringify(rest).trim()
	return { id: target.slice(hash + 1), fallback: fallback || undefined }
}

/**
 * Extracts the local id of an `href`/`xlink:href` value such as `#shape`.
 */
export function parseHrefId(href: string | undefined): string | undefined {
	const trimmed = href?.trim()
	return trimmed?.startsWith('#') && trimmed.length > 1 ? trimmed.slice(1) : undefined
}

export interface ClipInsets {
	readonly top: number
	readonly right: number
	readonly bottom: number
	readonly left: number
}

/**
 * Parses the deprecated `clip: rect(top, right, bottom, left)` property. `auto` offsets are zero.
 */
export function parseClipRect(value: string | undefined, context: LengthContext): ClipInsets | undefined {
	if (!value) {
		return undefined
	}
	const rectNode = cssValueParser(value).nodes.find(isTaggedUnionMember('type', 'function' as const))
	if (!rectNode || rectNode.value !== 'rect') {
		return undefined
	}
	const [top = 0, right = 0, bottom = 0, left = 0] = rectNode.nodes
		.filter(isTaggedUnionMember('type', 'word' as const))
		.map(word => (word.value === 'auto' ? 0 : parseLength(word.value, 0, context) ?? 0))
	return { top, right, bottom, left }
}

const blendModes = [
	'Normal',
	'Multiply',
	'Screen',
	'Overlay',
	'Darken',
	'Lighten',
	'ColorDodge',
	'ColorBurn',
	'HardLight',
	'SoftLight',
	'Difference',
	'Exclusion',
	'Hue',
	'Saturation',
	'Color',
	'Luminosity',
] as const

export type BlendMode = typeof blendModes[number]

/**
 * Maps a CSS `mix-blend-mode` value to the PDF blend mode name, e.g. `color-dodge` to `ColorDodge`.
 */
export function normalizeBlendMode(value: string): BlendMode {
	const key = value.trim().toLowerCase().replace(/-/g, '')
	return blendModes.find(mode => mode.toLowerCase() === key) ?? 'Normal'
}

export const unescapeStringValue = (value: string): string =>
	value
		// Replace hex escape sequences
		.replace(/\\([\da-f]{1,2})/gi, (substring, codePoint: string) => String.fromCodePoint(parseInt(codePoint, 16)))
		// Replace all other escapes (quotes, backslash, etc)
		.replace(/\\(.)/g, '$1')
