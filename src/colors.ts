import { readFileSync } from 'fs'

import cssValueParser from 'postcss-value-parser'

import { clamp, isTaggedUnionMember } from './util.js'

/**
 * A color in a PDF device color space. Components are in `[0, 1]`.
 */
export type DeviceColor =
	| { readonly space: 'gray'; readonly gray: number }
	| { readonly space: 'rgb'; readonly red: number; readonly green: number; readonly blue: number }
	| {
			readonly space: 'cmyk'
			readonly cyan: number
			readonly magenta: number
			readonly yellow: number
			readonly black: number
	  }

export interface ResolvedColor {
	readonly color: DeviceColor
	/** Alpha carried by the color token itself, e.g. from `rgba()`. */
	readonly alpha: number
}

/**
 * Maps a color token to a device color. Returns `undefined` for `none` and anything unrecognized.
 */
export type ColorResolver = (token: string) => ResolvedColor | undefined

let namedColors: ReadonlyMap<string, string> | undefined

function getNamedColors(): ReadonlyMap<string, string> {
	if (!namedColors) {
		const json: unknown = JSON.parse(readFileSync(new URL('../data/named-colors.json', import.meta.url), 'utf-8'))
		const entries = new Map<string, string>()
		if (typeof json === 'object' && json !== null) {
			for (const [name, value] of Object.entries(json)) {
				if (typeof value === 'string') {
					entries.set(name, value)
				}
			}
		}
		namedColors = entries
	}
	return namedColors
}

const rgb = (red: number, green: number, blue: number, alpha = 1): ResolvedColor => ({
	color: { space: 'rgb', red: clamp(red, 0, 1), green: clamp(green, 0, 1), blue: clamp(blue, 0, 1) },
	alpha: clamp(alpha, 0, 1),
})

function parseHexColor(hex: string): ResolvedColor | undefined {
	if (!/^[\da-f]+$/i.test(hex)) {
		return undefined
	}
	const expanded =
		hex.length === 3 || hex.length === 4
			? [...hex].map(digit => digit + digit).join('')
			: hex.length === 6 || hex.length === 8
			? hex
			: undefined
	if (!expanded) {
		return undefined
	}
	const channel = (index: number): number => parseInt(expanded.slice(index * 2, index * 2 + 2), 16) / 255
	return rgb(channel(0), channel(1), channel(2), expanded.length === 8 ? channel(3) : 1)
}

/**
 * Parses one functional-notation component. Percentages are fractions of `max`.
 */
function parseComponent(value: string, max: number): number {
	const number = parseFloat(value)
	if (!Number.isFinite(number)) {
		return 0
	}
	return value.trim().endsWith('%') ? number / 100 : number / max
}

function parseFunctionalColor(token: string): ResolvedColor | undefined {
	const functionNode = cssValueParser(token).nodes.find(isTaggedUnionMember('type', 'function' as const))
	if (!functionNode) {
		return undefined
	}
	const args = functionNode.nodes.filter(isTaggedUnionMember('type', 'word' as const)).map(word => word.value)
	switch (functionNode.value.toLowerCase()) {
		case 'rgb':
		case 'rgba': {
			const [red, green, blue, alpha] = args
			if (red === undefined || green === undefined || blue === undefined) {
				return undefined
			}
			return rgb(
				parseComponent(red, 255),
				parseComponent(green, 255),
				parseComponent(blue, 255),
				alpha === undefined ? 1 : parseComponent(alpha, 1)
			)
		}
		case 'cmyk': {
			const [cyan, magenta, yellow, black] = args.map(arg => clamp(parseComponent(arg, 100), 0, 1))
			if (cyan === undefined || magenta === undefined || yellow === undefined || black === undefined) {
				return undefined
			}
			return { color: { space: 'cmyk', cyan, magenta, yellow, black }, alpha: 1 }
		}
	}
	return undefined
}

export const resolveColor: ColorResolver = token => {
	const value = token.trim().toLowerCase()
	if (value === '' || value === 'none') {
		return undefined
	}
	if (value === 'transparent') {
		return rgb(0, 0, 0, 0)
	}
	if (value.startsWith('#')) {
		return parseHexColor(value.slice(1))
	}
	if (value.includes('(')) {
		return parseFunctionalColor(value)
	}
	const named = getNamedColors().get(value)
	return named ? parseHexColor(named.slice(1)) : undefined
}
