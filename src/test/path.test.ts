import { assert } from 'chai'

import { PdfGraphics } from '../graphics.js'
import { createPath, interpretPath, tokenizePathData, writePath } from '../path.js'

import { lines } from './util.js'

const options = { minLength: 0.01 }

describe('tokenizePathData()', () => {
	it('splits commands and their parameters', () => {
		assert.deepStrictEqual(tokenizePathData('M1,2l3-4z'), [
			{ name: 'M', relative: false, parameters: [1, 2] },
			{ name: 'L', relative: true, parameters: [3, -4] },
			{ name: 'Z', relative: true, parameters: [] },
		])
	})

	it('splits numbers on a second decimal point', () => {
		assert.deepStrictEqual(tokenizePathData('M.5.5')[0]?.parameters, [0.5, 0.5])
	})
})

describe('interpretPath()', () => {
	it('interprets absolute lines and computes the bounding box', () => {
		const path = interpretPath('M0 0 L10 0 L10 10 Z', options)
		assert.deepStrictEqual(path.segments, [
			{ type: 'move', x: 0, y: 0 },
			{ type: 'line', x: 10, y: 0 },
			{ type: 'line', x: 10, y: 10 },
			{ type: 'close' },
		])
		assert.deepStrictEqual(path.boundingBox, { minX: 0, minY: 0, maxX: 10, maxY: 10 })
	})

	it('treats extra moveto pairs as relative lineto commands', () => {
		const path = interpretPath('m 10 10 20 0 0 20', options)
		assert.deepStrictEqual(path.segments, [
			{ type: 'move', x: 10, y: 10 },
			{ type: 'line', x: 30, y: 10 },
			{ type: 'line', x: 30, y: 30 },
		])
	})

	it('interprets horizontal and vertical lines', () => {
		const path = interpretPath('M5 5 h10 v10 H5 z', options)
		assert.deepStrictEqual(path.segments, [
			{ type: 'move', x: 5, y: 5 },
			{ type: 'line', x: 15, y: 5 },
			{ type: 'line', x: 15, y: 15 },
			{ type: 'line', x: 5, y: 15 },
			{ type: 'close' },
		])
	})

	it('returns to the subpath start after closing', () => {
		const path = interpretPath('M5 5 L10 5 Z l1 1', options)
		assert.deepStrictEqual(path.segments[3], { type: 'line', x: 6, y: 6 })
	})

	it('reflects the previous control point for smooth cubics', () => {
		const path = interpretPath('M0 0 C 0 10 10 10 10 0 S 20 -10 20 0', options)
		assert.deepStrictEqual(path.segments[2], { type: 'curve', x1: 10, y1: -10, x2: 20, y2: -10, x: 20, y: 0 })
	})

	it('uses the current point as control point for a smooth cubic without a preceding cubic', () => {
		const path = interpretPath('M5 5 S 10 10 20 5', options)
		assert.deepStrictEqual(path.segments[1], { type: 'curve', x1: 5, y1: 5, x2: 10, y2: 10, x: 20, y: 5 })
	})

	it('elevates quadratic curves to cubics', () => {
		const segment = interpretPath('M0 0 Q 3 3 6 0', options).segments[1]
		assert.strictEqual(segment?.type, 'curve')
		if (segment?.type === 'curve') {
			assert.closeTo(segment.x1, 2, 1e-9)
			assert.closeTo(segment.y1, 2, 1e-9)
			assert.closeTo(segment.x2, 4, 1e-9)
			assert.closeTo(segment.y2, 2, 1e-9)
			assert.strictEqual(segment.x, 6)
			assert.strictEqual(segment.y, 0)
		}
	})

	it('reflects the previous quadratic control point for smooth quadratics', () => {
		const [, , first, second] = interpretPath('M0 0 Q 5 10 10 0 T 20 0 T 30 0', options).segments
		assert.strictEqual(first?.type, 'curve')
		if (first?.type === 'curve') {
			// Control point (15, -10), reflected from (5, 10) around (10, 0)
			assert.closeTo(first.x1, 10 + 10 / 3, 1e-9)
			assert.closeTo(first.y1, -20 / 3, 1e-9)
			assert.closeTo(first.x2, 20 - 10 / 3, 1e-9)
			assert.closeTo(first.y2, -20 / 3, 1e-9)
		}
		assert.strictEqual(second?.type, 'curve')
		if (second?.type === 'curve') {
			// Control point (25, 10), reflected from (15, -10) around (20, 0)
			assert.closeTo(second.x1, 20 + 10 / 3, 1e-9)
			assert.closeTo(second.y1, 20 / 3, 1e-9)
			assert.strictEqual(second.x, 30)
			assert.strictEqual(second.y, 0)
		}
	})

	it('offsets each repeated relative group from the end of the previous one', () => {
		assert.deepStrictEqual(interpretPath('M10 10 l 5 0 0 5', options).segments, [
			{ type: 'move', x: 10, y: 10 },
			{ type: 'line', x: 15, y: 10 },
			{ type: 'line', x: 15, y: 15 },
		])
		assert.deepStrictEqual(interpretPath('M0 0 c 1 1 2 2 3 0 1 1 2 2 3 0', options).segments, [
			{ type: 'move', x: 0, y: 0 },
			{ type: 'curve', x1: 1, y1: 1, x2: 2, y2: 2, x: 3, y: 0 },
			{ type: 'curve', x1: 4, y1: 1, x2: 5, y2: 2, x: 6, y: 0 },
		])
	})

	it('snaps tiny values to zero', () => {
		const path = interpretPath('M0 0 L10 0.005', options)
		assert.deepStrictEqual(path.segments[1], { type: 'line', x: 10, y: 0 })
	})

	it('ignores an incomplete trailing parameter group', () => {
		const path = interpretPath('M0 0 L10 10 20', options)
		assert.lengthOf(path.segments, 2)
	})

	it('interprets arcs with an exact bounding box', () => {
		const path = interpretPath('M0 0 A 5 5 0 0 1 10 0', options)
		const arc = path.segments[1]
		assert.strictEqual(arc?.type, 'arc')
		assert.closeTo(path.boundingBox.minX, 0, 1e-9)
		assert.closeTo(path.boundingBox.maxX, 10, 1e-9)
		assert.closeTo(path.boundingBox.minY, -5, 1e-9)
		assert.closeTo(path.boundingBox.maxY, 0, 1e-9)
	})

	it('drops arcs with a zero radius but moves to their endpoint', () => {
		const path = interpretPath('M0 0 A 0 5 0 0 1 10 0 l 1 1', options)
		assert.deepStrictEqual(path.segments, [
			{ type: 'move', x: 0, y: 0 },
			{ type: 'line', x: 11, y: 1 },
		])
	})

	it('yields the same result when interpreted twice', () => {
		const data = 'M10 10 c 5 0 5 5 10 5 s 5 5 10 0 q 5 -5 10 0 t 10 0 a 3 4 30 1 0 5 5 z'
		assert.deepStrictEqual(interpretPath(data, options), interpretPath(data, options))
	})

	it('returns no segments for garbage', () => {
		const path = interpretPath('hello', options)
		assert.deepStrictEqual(path.segments, [])
	})
})

describe('writePath()', () => {
	it('flips points into the bottom-up page space', () => {
		const path = interpretPath('M0 0 L10 20 Z', options)
		assert.deepStrictEqual(lines(writePath(path.segments, new PdfGraphics(), 100)), [
			'0.000000 100.000000 m',
			'10.000000 80.000000 l',
			'h',
		])
	})

	it('maps points through the given matrix first', () => {
		const path = createPath([{ type: 'move', x: 1, y: 1 }])
		assert.deepStrictEqual(lines(writePath(path.segments, new PdfGraphics(), 100, [2, 0, 0, 2, 5, 5])), [
			'7.000000 93.000000 m',
		])
	})

	it('writes arcs as cubic curves', () => {
		const path = interpretPath('M0 0 A 5 5 0 0 1 10 0', options)
		const output = lines(writePath(path.segments, new PdfGraphics(), 0))
		assert.lengthOf(output, 3)
		assert.strictEqual(output[2]?.slice(-' 10.000000 0.000000 c'.length), ' 10.000000 0.000000 c')
	})
})
