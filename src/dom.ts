import { Attributes } from './style.js'

export type ShapeName = 'path' | 'rect' | 'circle' | 'ellipse' | 'line' | 'polyline' | 'polygon'

/**
 * The closed set of element kinds the dispatcher distinguishes.
 * Anything else is `unknown`: it opens no scope, but its children are still visited.
 */
export type ElementKind =
	| { readonly type: 'svg' }
	| { readonly type: 'group' }
	| { readonly type: 'defs' }
	| { readonly type: 'symbol' }
	| { readonly type: 'clipPath' }
	| { readonly type: 'gradient'; readonly gradientType: 'linear' | 'radial' }
	| { readonly type: 'stop' }
	| { readonly type: 'use' }
	| { readonly type: 'shape'; readonly shape: ShapeName }
	| { readonly type: 'image' }
	| { readonly type: 'text'; readonly span: boolean }
	| { readonly type: 'unknown'; readonly name: string }

const shapeNames = new Set<string>(['path', 'rect', 'circle', 'ellipse', 'line', 'polyline', 'polygon'])
const isShapeName = (name: string): name is ShapeName => shapeNames.has(name)

/**
 * Strips a namespace prefix from a tag name, e.g. `svg:rect` to `rect`.
 */
export const removeTagNamespace = (name: string): string => name.slice(name.indexOf(':') + 1)

export function getElementKind(tagName: string): ElementKind {
	const name = removeTagNamespace(tagName)
	if (isShapeName(name)) {
		return { type: 'shape', shape: name }
	}
	switch (name) {
		case 'svg':
		case 'defs':
		case 'symbol':
		case 'clipPath':
		case 'stop':
		case 'use':
		case 'image':
			return { type: name }
		case 'g':
		case 'a':
		case 'switch':
			return { type: 'group' }
		case 'linearGradient':
			return { type: 'gradient', gradientType: 'linear' }
		case 'radialGradient':
			return { type: 'gradient', gradientType: 'radial' }
		case 'text':
			return { type: 'text', span: false }
		case 'tspan':
			return { type: 'text', span: true }
	}
	return { type: 'unknown', name }
}

/**
 * Reads `href`, preferring the SVG 2 attribute over `xlink:href`.
 */
export const getHref = (attributes: Attributes): string | undefined => attributes.href ?? attributes['xlink:href']
