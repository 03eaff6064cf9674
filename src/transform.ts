import cssValueParser from 'postcss-value-parser'

import { degreesToRadians, IDENTITY_MATRIX, Matrix, multiplyMatrices } from './geometry.js'
import { isTaggedUnionMember } from './util.js'

/**
 * Converts a single transform function to a matrix. Unknown functions and missing arguments yield the identity.
 */
export function transformFunctionToMatrix(name: string, args: readonly number[]): Matrix {
	const [first, second, third] = args
	if (first === undefined) {
		return IDENTITY_MATRIX
	}
	switch (name) {
		case 'matrix': {
			if (args.length < 6) {
				return IDENTITY_MATRIX
			}
			const [a = 1, b = 0, c = 0, d = 1, e = 0, f = 0] = args
			return [a, b, c, d, e, f]
		}
		case 'translate':
			return [1, 0, 0, 1, first, second ?? 0]
		case 'scale':
			return [first, 0, 0, second ?? first, 0, 0]
		case 'rotate': {
			const angle = degreesToRadians(first)
			const cos = Math.cos(angle)
			const sin = Math.sin(angle)
			const cx = second ?? 0
			const cy = third ?? 0
			// translate(cx, cy) rotate(angle) translate(-cx, -cy)
			return [cos, sin, -sin, cos, cx - cos * cx + sin * cy, cy - sin * cx - cos * cy]
		}
		case 'skewX':
			return [1, 0, Math.tan(degreesToRadians(first)), 1, 0, 0]
		case 'skewY':
			return [1, Math.tan(degreesToRadians(first)), 0, 1, 0, 0]
	}
	return IDENTITY_MATRIX
}

/**
 * Parses a `transform` (or `gradientTransform`) attribute into one composed matrix.
 * Functions compose left to right, so the rightmost one acts first on a point.
 */
export function parseTransform(value: string | undefined): Matrix {
	if (!value) {
		return IDENTITY_MATRIX
	}
	return cssValueParser(value)
		.nodes.filter(isTaggedUnionMember('type', 'function' as const))
		.map(node =>
			transformFunctionToMatrix(
				node.value,
				node.nodes
					.filter(isTaggedUnionMember('type', 'word' as const))
					.map(word => parseFloat(word.value))
					.filter(Number.isFinite)
			)
		)
		.reduce(multiplyMatrices, IDENTITY_MATRIX)
}
