import { assert } from 'chai'

import { mergeUseAttributes } from '../definitions.js'

describe('mergeUseAttributes()', () => {
	it('adds the offset to positioned elements', () => {
		assert.deepStrictEqual(
			mergeUseAttributes('rect', { id: 'r', x: '5', y: '5', width: '10', height: '10' }, { href: '#r', x: '100' }),
			{ name: 'rect', attributes: { x: '105', y: '5', width: '10', height: '10' } }
		)
	})

	it('turns the offset into a translation for other elements', () => {
		assert.deepStrictEqual(
			mergeUseAttributes(
				'circle',
				{ id: 'c', r: '2', transform: 'rotate(45)' },
				{ href: '#c', x: '10', y: '20', transform: 'scale(2)' }
			),
			{ name: 'circle', attributes: { r: '2', transform: 'scale(2) translate(10, 20) rotate(45)' } }
		)
	})

	it('lets presentation attributes of the use element win and appends its style', () => {
		assert.deepStrictEqual(
			mergeUseAttributes('path', { id: 'p', d: 'M0 0', fill: 'red', style: 'stroke: blue' }, {
				href: '#p',
				fill: 'green',
				style: 'stroke: black',
			}),
			{ name: 'path', attributes: { d: 'M0 0', fill: 'green', style: 'stroke: blue;stroke: black' } }
		)
	})

	it('turns a symbol into an svg sized by the use element', () => {
		assert.deepStrictEqual(
			mergeUseAttributes('symbol', { id: 's', viewBox: '0 0 10 10' }, { href: '#s', width: '20', height: '30' }),
			{ name: 'svg', attributes: { viewBox: '0 0 10 10', width: '20', height: '30' } }
		)
	})
})
