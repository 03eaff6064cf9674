import {
	FontShorthand,
	parseFontShorthand,
	parseFontSize,
	parseStyleDeclarations,
	parseUrlReference,
} from './css.js'

const textProperties = [
	'alignment-baseline',
	'baseline-shift',
	'clip',
	'clip-path',
	'clip-rule',
	'color',
	'color-interpolation',
	'color-interpolation-filters',
	'color-profile',
	'color-rendering',
	'cursor',
	'direction',
	'display',
	'dominant-baseline',
	'enable-background',
	'fill',
	'fill-rule',
	'filter',
	'flood-color',
	'font',
	'font-family',
	'font-size-adjust',
	'font-stretch',
	'font-style',
	'font-variant',
	'font-weight',
	'glyph-orientation-horizontal',
	'glyph-orientation-vertical',
	'image-rendering',
	'kerning',
	'letter-spacing',
	'lighting-color',
	'marker',
	'marker-end',
	'marker-mid',
	'marker-start',
	'mask',
	'mix-blend-mode',
	'overflow',
	'pointer-events',
	'shape-rendering',
	'stop-color',
	'stroke',
	'stroke-dasharray',
	'stroke-linecap',
	'stroke-linejoin',
	'stroke-width',
	'text-anchor',
	'text-decoration',
	'text-rendering',
	'unicode-bidi',
	'visibility',
	'word-spacing',
	'writing-mode',
] as const

const numericProperties = [
	'fill-opacity',
	'flood-opacity',
	'opacity',
	'stop-opacity',
	'stroke-dashoffset',
	'stroke-miterlimit',
	'stroke-opacity',
] as const

export type TextStyleProperty = typeof textProperties[number]
export type NumericStyleProperty = typeof numericProperties[number]
export type StyleProperty = TextStyleProperty | NumericStyleProperty | 'font-size'

/**
 * The resolved presentation properties of one element.
 * Known properties are fixed fields; any other declaration of the inline `style` lands in `extra`.
 */
export type SvgStyle = { readonly [P in TextStyleProperty]: string } &
	{ readonly [P in NumericStyleProperty]: number } & {
		/** Font size in user units. */
		readonly 'font-size': number
		readonly extra: ReadonlyMap<string, string>
	}

const inheritedProperties = new Set<StyleProperty>([
	'clip-rule',
	'color',
	'color-interpolation',
	'color-interpolation-filters',
	'color-profile',
	'color-rendering',
	'cursor',
	'direction',
	'fill',
	'fill-opacity',
	'fill-rule',
	'font',
	'font-family',
	'font-size',
	'font-size-adjust',
	'font-stretch',
	'font-style',
	'font-variant',
	'font-weight',
	'glyph-orientation-horizontal',
	'glyph-orientation-vertical',
	'image-rendering',
	'kerning',
	'letter-spacing',
	'marker',
	'marker-end',
	'marker-mid',
	'marker-start',
	'pointer-events',
	'shape-rendering',
	'stroke',
	'stroke-dasharray',
	'stroke-dashoffset',
	'stroke-linecap',
	'stroke-linejoin',
	'stroke-miterlimit',
	'stroke-opacity',
	'stroke-width',
	'text-anchor',
	'text-rendering',
	'visibility',
	'word-spacing',
	'writing-mode',
])

export const isInheritedProperty = (property: StyleProperty): boolean => inheritedProperties.has(property)

/**
 * Document defaults, with the font size given for 96 user units per inch.
 */
export const DEFAULT_STYLE: SvgStyle = {
	'alignment-baseline': 'auto',
	'baseline-shift': 'baseline',
	clip: 'auto',
	'clip-path': 'none',
	'clip-rule': 'nonzero',
	color: 'black',
	'color-interpolation': 'sRGB',
	'color-interpolation-filters': 'linearRGB',
	'color-profile': 'auto',
	'color-rendering': 'auto',
	cursor: 'auto',
	direction: 'ltr',
	display: 'inline',
	'dominant-baseline': 'auto',
	'enable-background': 'accumulate',
	fill: 'black',
	'fill-opacity': 1,
	'fill-rule': 'nonzero',
	filter: 'none',
	'flood-color': 'black',
	'flood-opacity': 1,
	font: '',
	'font-family': 'helvetica',
	'font-size': 16,
	'font-size-adjust': 'none',
	'font-stretch': 'normal',
	'font-style': 'normal',
	'font-variant': 'normal',
	'font-weight': 'normal',
	'glyph-orientation-horizontal': '0deg',
	'glyph-orientation-vertical': 'auto',
	'image-rendering': 'auto',
	kerning: 'auto',
	'letter-spacing': 'normal',
	'lighting-color': 'white',
	marker: '',
	'marker-end': 'none',
	'marker-mid': 'none',
	'marker-start': 'none',
	mask: 'none',
	'mix-blend-mode': 'normal',
	opacity: 1,
	overflow: 'auto',
	'pointer-events': 'visiblePainted',
	'shape-rendering': 'auto',
	'stop-color': 'black',
	'stop-opacity': 1,
	stroke: 'none',
	'stroke-dasharray': 'none',
	'stroke-dashoffset': 0,
	'stroke-linecap': 'butt',
	'stroke-linejoin': 'miter',
	'stroke-miterlimit': 4,
	'stroke-opacity': 1,
	'stroke-width': '1',
	'text-anchor': 'start',
	'text-decoration': 'none',
	'text-rendering': 'auto',
	'unicode-bidi': 'normal',
	visibility: 'visible',
	'word-spacing': 'normal',
	'writing-mode': 'lr-tb',
	extra: new Map(),
}

/**
 * The defaults for a document rendered at the given resolution.
 */
export const createDefaultStyle = (dpi: number): SvgStyle => ({
	...DEFAULT_STYLE,
	'font-size': (DEFAULT_STYLE['font-size'] * dpi) / 96,
})

const knownProperties = new Set<string>([...textProperties, ...numericProperties, 'font-size'])

export type Attributes = Readonly<Record<string, string>>

type Mutable<T> = { -readonly [P in keyof T]: T[P] }

const fontLonghands: readonly (keyof FontShorthand)[] = [
	'font-style',
	'font-variant',
	'font-weight',
	'font-size',
	'font-family',
]

const isFontLonghand = (property: string): property is keyof FontShorthand =>
	fontLonghands.some(longhand => longhand === property)

/**
 * The longhands a `font` shorthand sets. Those it leaves out are reset to `normal`, except the family.
 */
function expandFontShorthand(value: string | undefined): FontShorthand {
	const font = value === undefined ? {} : parseFontShorthand(value)
	if (font['font-size'] === undefined) {
		return {}
	}
	return { 'font-style': 'normal', 'font-variant': 'normal', 'font-weight': 'normal', ...font }
}

/**
 * Resolves the style of an element from its parent's style, its presentation attributes and its inline `style`.
 *
 * For every property, a presentation attribute wins over an inline declaration of the same name, and the
 * literal `inherit` defers to the parent. Inherited properties otherwise keep the parent's value,
 * all others reset to the document defaults. The `font` shorthand fills in the font longhands not given.
 */
export function resolveStyle(parent: SvgStyle, attributes: Attributes, dpi: number): SvgStyle {
	const declarations = parseStyleDeclarations(attributes.style)
	const declared = (property: StyleProperty): string | undefined => {
		const attribute = attributes[property]?.trim()
		if (attribute !== undefined && attribute !== '' && attribute !== 'inherit') {
			return attribute
		}
		const declaration = declarations.get(property)
		if (declaration !== undefined && declaration !== 'inherit') {
			return declaration
		}
		return undefined
	}
	const font = expandFontShorthand(declared('font'))
	const specified = (property: StyleProperty): string | undefined =>
		declared(property) ?? (isFontLonghand(property) ? font[property] : undefined)
	const isExplicitInherit = (property: StyleProperty): boolean =>
		attributes[property]?.trim() === 'inherit' || declarations.get(property) === 'inherit'
	const fallback = <P extends StyleProperty>(property: P): SvgStyle[P] =>
		isInheritedProperty(property) || isExplicitInherit(property) ? parent[property] : DEFAULT_STYLE[property]

	const extra = new Map<string, string>()
	for (const [name, value] of declarations) {
		if (!knownProperties.has(name)) {
			extra.set(name, value)
		}
	}

	const style: Mutable<SvgStyle> = { ...DEFAULT_STYLE, extra }
	for (const property of textProperties) {
		style[property] = specified(property) ?? fallback(property)
	}
	for (const property of numericProperties) {
		const value = parseFloat(specified(property) ?? '')
		style[property] = Number.isFinite(value) ? value : fallback(property)
	}
	const fontSize = specified('font-size')
	style['font-size'] =
		fontSize === undefined ? parent['font-size'] : parseFontSize(fontSize, { dpi, fontSize: parent['font-size'] })
	return style
}

/**
 * Whether the element paints nothing. Its geometry is still processed.
 * `display: none` on an ancestor is tracked by the frame instead, since `display` is not inherited.
 */
export const isNonPainting = (style: SvgStyle): boolean =>
	style.visibility === 'hidden' || style.visibility === 'collapse' || style.display === 'none'

export type Paint =
	| { readonly type: 'none' }
	| { readonly type: 'color'; readonly value: string }
	| { readonly type: 'gradient'; readonly id: string; readonly fallback: string | undefined }

/**
 * Classifies a `fill` or `stroke` value, substituting `currentColor`.
 */
export function parsePaint(value: string, style: SvgStyle): Paint {
	const trimmed = value.trim()
	if (trimmed === '' || trimmed === 'none') {
		return { type: 'none' }
	}
	const reference = parseUrlReference(trimmed)
	if (reference) {
		return { type: 'gradient', id: reference.id, fallback: reference.fallback }
	}
	if (trimmed.startsWith('url(')) {
		return { type: 'none' }
	}
	return { type: 'color', value: trimmed === 'currentColor' ? style.color : trimmed }
}
