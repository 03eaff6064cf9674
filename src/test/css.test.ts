import { assert } from 'chai'

import { resolveColor } from '../colors.js'
import {
	normalizeBlendMode,
	parseClipRect,
	parseFontShorthand,
	parseFontSize,
	parseHrefId,
	parseLength,
	parseNumberList,
	parseStyleDeclarations,
	parseUrlReference,
} from '../css.js'
import { createDefaultStyle, DEFAULT_STYLE, parsePaint, resolveStyle } from '../style.js'

const lengthContext = { dpi: 72, fontSize: 16 }

describe('css', () => {
	describe('parseLength()', () => {
		it('reads unitless numbers and pixels as user units', () => {
			assert.strictEqual(parseLength('12', 0, lengthContext), 12)
			assert.strictEqual(parseLength(' 12px ', 0, lengthContext), 12)
		})
		it('resolves percentages against the reference', () => {
			assert.strictEqual(parseLength('50%', 200, lengthContext), 100)
		})
		it('converts absolute units with the resolution', () => {
			assert.strictEqual(parseLength('1in', 0, lengthContext), 72)
			assert.strictEqual(parseLength('1in', 0, { dpi: 96, fontSize: 16 }), 96)
			assert.strictEqual(parseLength('6pc', 0, lengthContext), 72)
		})
		it('resolves font-relative units', () => {
			assert.strictEqual(parseLength('2em', 0, lengthContext), 32)
			assert.strictEqual(parseLength('1ex', 0, lengthContext), 8)
		})
		it('returns undefined for anything else', () => {
			assert.isUndefined(parseLength('abc', 0, lengthContext))
			assert.isUndefined(parseLength('12furlongs', 0, lengthContext))
			assert.isUndefined(parseLength(undefined, 0, lengthContext))
		})
	})

	describe('parseNumberList()', () => {
		it('splits on commas and whitespace', () => {
			assert.deepStrictEqual(parseNumberList('1,2 3 ,4'), [1, 2, 3, 4])
		})
	})

	describe('parseFontSize()', () => {
		it('resolves keywords for the resolution', () => {
			assert.strictEqual(parseFontSize('medium', { dpi: 72, fontSize: 10 }), 12)
		})
		it('resolves relative sizes against the parent size', () => {
			assert.strictEqual(parseFontSize('50%', { dpi: 72, fontSize: 10 }), 5)
		})
		it('keeps the parent size for invalid values', () => {
			assert.strictEqual(parseFontSize('huge', { dpi: 72, fontSize: 10 }), 10)
		})
	})

	describe('parseFontShorthand()', () => {
		it('splits the shorthand into longhands', () => {
			assert.deepStrictEqual(parseFontShorthand('italic bold 20px/1.5 "Times New Roman", serif'), {
				'font-style': 'italic',
				'font-weight': 'bold',
				'font-size': '20px',
				'font-family': '"Times New Roman", serif',
			})
		})
		it('reads numeric weights and small caps', () => {
			assert.deepStrictEqual(parseFontShorthand('small-caps 600 large sans-serif'), {
				'font-variant': 'small-caps',
				'font-weight': '600',
				'font-size': 'large',
				'font-family': 'sans-serif',
			})
		})
		it('rejects values without a font size', () => {
			assert.deepStrictEqual(parseFontShorthand('bold serif'), {})
		})
	})

	describe('parseStyleDeclarations()', () => {
		it('lower-cases names and strips !important', () => {
			const declarations = parseStyleDeclarations('FILL: red; stroke:blue !important')
			assert.deepStrictEqual([...declarations], [
				['fill', 'red'],
				['stroke', 'blue'],
			])
		})
		it('does not split inside parentheses', () => {
			const declarations = parseStyleDeclarations('background: url(data:a;b); fill: none')
			assert.strictEqual(declarations.get('background'), 'url(data:a;b)')
			assert.strictEqual(declarations.get('fill'), 'none')
		})
		it('ignores declarations without a value', () => {
			assert.strictEqual(parseStyleDeclarations('fill:; stroke').size, 0)
		})
	})

	describe('parseUrlReference()', () => {
		it('extracts the id and the fallback', () => {
			assert.deepStrictEqual(parseUrlReference('url(#paint) red'), { id: 'paint', fallback: 'red' })
		})
		it('accepts quoted urls', () => {
			assert.deepStrictEqual(parseUrlReference('url("#clip")'), { id: 'clip', fallback: undefined })
		})
		it('ignores values without a url', () => {
			assert.isUndefined(parseUrlReference('red'))
		})
	})

	describe('parseHrefId()', () => {
		it('strips the hash', () => {
			assert.strictEqual(parseHrefId(' #shape '), 'shape')
		})
		it('ignores external references', () => {
			assert.isUndefined(parseHrefId('other.svg#shape'))
		})
	})

	describe('parseClipRect()', () => {
		it('reads the insets in top, right, bottom, left order', () => {
			assert.deepStrictEqual(parseClipRect('rect(1, 2, 3, 4)', lengthContext), {
				top: 1,
				right: 2,
				bottom: 3,
				left: 4,
			})
		})
		it('treats auto as zero', () => {
			assert.deepStrictEqual(parseClipRect('rect(auto 2 auto 4)', lengthContext), {
				top: 0,
				right: 2,
				bottom: 0,
				left: 4,
			})
		})
		it('ignores auto', () => {
			assert.isUndefined(parseClipRect('auto', lengthContext))
		})
	})

	describe('normalizeBlendMode()', () => {
		it('maps CSS names to PDF names', () => {
			assert.strictEqual(normalizeBlendMode('color-dodge'), 'ColorDodge')
			assert.strictEqual(normalizeBlendMode('multiply'), 'Multiply')
		})
		it('falls back to Normal', () => {
			assert.strictEqual(normalizeBlendMode('plus-lighter'), 'Normal')
		})
	})
})

describe('style', () => {
	describe('createDefaultStyle()', () => {
		it('scales the default font size with the resolution', () => {
			assert.strictEqual(createDefaultStyle(72)['font-size'], 12)
			assert.strictEqual(createDefaultStyle(96)['font-size'], 16)
		})
	})

	describe('resolveStyle()', () => {
		const parent = { ...DEFAULT_STYLE, fill: 'red', opacity: 0.5 }

		it('inherits inherited properties', () => {
			assert.strictEqual(resolveStyle(parent, {}, 96).fill, 'red')
		})
		it('resets non-inherited properties', () => {
			assert.strictEqual(resolveStyle(parent, {}, 96).opacity, 1)
		})
		it('lets the presentation attribute win over the inline style', () => {
			assert.strictEqual(resolveStyle(parent, { fill: 'blue', style: 'fill: green' }, 96).fill, 'blue')
		})
		it('uses the inline style without an attribute', () => {
			assert.strictEqual(resolveStyle(parent, { style: 'fill: green' }, 96).fill, 'green')
		})
		it('skips an attribute of inherit', () => {
			assert.strictEqual(resolveStyle(parent, { fill: 'inherit', style: 'fill: green' }, 96).fill, 'green')
		})
		it('takes the parent value for an explicit inherit of a non-inherited property', () => {
			assert.strictEqual(resolveStyle(parent, { opacity: 'inherit' }, 96).opacity, 0.5)
		})
		it('parses numeric properties', () => {
			assert.strictEqual(resolveStyle(parent, { 'fill-opacity': '0.25' }, 96)['fill-opacity'], 0.25)
		})
		it('resolves the font size against the parent', () => {
			assert.strictEqual(resolveStyle(DEFAULT_STYLE, { 'font-size': '2em' }, 96)['font-size'], 32)
		})
		it('expands the font shorthand', () => {
			const style = resolveStyle(DEFAULT_STYLE, { style: 'font: bold 40px serif' }, 96)
			assert.strictEqual(style['font-size'], 40)
			assert.strictEqual(style['font-family'], 'serif')
			assert.strictEqual(style['font-weight'], 'bold')
			assert.strictEqual(style['font-style'], 'normal')
		})
		it('lets font longhands win over the shorthand', () => {
			const style = resolveStyle(
				{ ...DEFAULT_STYLE, 'font-style': 'italic' },
				{ 'font-size': '12', style: 'font: bold 40px serif; font-weight: 300' },
				96
			)
			assert.strictEqual(style['font-size'], 12)
			assert.strictEqual(style['font-weight'], '300')
			assert.strictEqual(style['font-style'], 'normal')
		})
		it('does not inherit display', () => {
			assert.strictEqual(resolveStyle({ ...DEFAULT_STYLE, display: 'none' }, {}, 96).display, 'inline')
		})
		it('keeps unknown declarations', () => {
			assert.strictEqual(resolveStyle(parent, { style: 'foo: bar' }, 96).extra.get('foo'), 'bar')
		})
	})

	describe('parsePaint()', () => {
		it('substitutes currentColor', () => {
			assert.deepStrictEqual(parsePaint('currentColor', { ...DEFAULT_STYLE, color: 'teal' }), {
				type: 'color',
				value: 'teal',
			})
		})
		it('classifies gradient references', () => {
			assert.deepStrictEqual(parsePaint('url(#g) blue', DEFAULT_STYLE), {
				type: 'gradient',
				id: 'g',
				fallback: 'blue',
			})
		})
		it('classifies none', () => {
			assert.deepStrictEqual(parsePaint(' none ', DEFAULT_STYLE), { type: 'none' })
		})
	})
})

describe('resolveColor()', () => {
	it('parses short hex colors', () => {
		assert.deepStrictEqual(resolveColor('#f00'), { color: { space: 'rgb', red: 1, green: 0, blue: 0 }, alpha: 1 })
	})
	it('parses hex colors with alpha', () => {
		assert.deepStrictEqual(resolveColor('#0000ff80'), {
			color: { space: 'rgb', red: 0, green: 0, blue: 1 },
			alpha: 128 / 255,
		})
	})
	it('parses rgb() with numbers and percentages', () => {
		assert.deepStrictEqual(resolveColor('rgb(255, 0, 0)'), {
			color: { space: 'rgb', red: 1, green: 0, blue: 0 },
			alpha: 1,
		})
		assert.deepStrictEqual(resolveColor('rgb(100%, 50%, 0%)'), {
			color: { space: 'rgb', red: 1, green: 0.5, blue: 0 },
			alpha: 1,
		})
	})
	it('parses rgba()', () => {
		assert.strictEqual(resolveColor('rgba(0, 0, 255, 0.5)')?.alpha, 0.5)
	})
	it('parses named colors in any case', () => {
		assert.deepStrictEqual(resolveColor('Blue'), { color: { space: 'rgb', red: 0, green: 0, blue: 1 }, alpha: 1 })
	})
	it('parses transparent', () => {
		assert.strictEqual(resolveColor('transparent')?.alpha, 0)
	})
	it('returns undefined for none and unknown tokens', () => {
		assert.isUndefined(resolveColor('none'))
		assert.isUndefined(resolveColor('blurple'))
	})
})
