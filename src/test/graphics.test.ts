import { assert } from 'chai'

import { DeviceColor } from '../colors.js'
import { PdfGraphics, toRgb } from '../graphics.js'

const red: DeviceColor = { space: 'rgb', red: 1, green: 0, blue: 0 }
const blue: DeviceColor = { space: 'rgb', red: 0, green: 0, blue: 1 }

const interpolation = (from: string, to: string): string =>
	`<< /FunctionType 2 /Domain [0 1] /C0 [${from}] /C1 [${to}] /N 1 >>`

describe('PdfGraphics', () => {
	it('writes path construction operators', () => {
		const graphics = new PdfGraphics()
		assert.strictEqual(graphics.moveTo(1, 2), '1.000000 2.000000 m\n')
		assert.strictEqual(graphics.lineTo(-1.5, 0), '-1.500000 0.000000 l\n')
		assert.strictEqual(graphics.curveTo(1, 2, 3, 4, 5, 6), '1.000000 2.000000 3.000000 4.000000 5.000000 6.000000 c\n')
		assert.strictEqual(graphics.rect(0, 0, 10, 20), '0.000000 0.000000 10.000000 20.000000 re\n')
		assert.strictEqual(graphics.closePath(), 'h\n')
	})

	it('writes colors with the operator of their color space', () => {
		const graphics = new PdfGraphics()
		assert.strictEqual(graphics.setFillColor({ space: 'gray', gray: 0.5 }), '0.500000 g\n')
		assert.strictEqual(graphics.setStrokeColor(red), '1.000000 0.000000 0.000000 RG\n')
		assert.strictEqual(
			graphics.setFillColor({ space: 'cmyk', cyan: 0, magenta: 1, yellow: 1, black: 0 }),
			'0.000000 1.000000 1.000000 0.000000 k\n'
		)
	})

	it('writes the line style', () => {
		const graphics = new PdfGraphics()
		assert.strictEqual(
			graphics.setLineStyle({ width: 2, cap: 1, join: 2, miterLimit: 4, dashArray: [], dashPhase: 0 }),
			'2.000000 w 1 J 2 j 4.000000 M [] 0.000000 d\n'
		)
		assert.strictEqual(
			graphics.setLineStyle({ width: 1, cap: 0, join: 0, miterLimit: 10, dashArray: [3, 1], dashPhase: 2 }),
			'1.000000 w 0 J 0 j 10.000000 M [3.000000 1.000000] 2.000000 d\n'
		)
	})

	it('registers a graphics state per call', () => {
		const graphics = new PdfGraphics()
		assert.strictEqual(graphics.setExtGState({ fillAlpha: 0.5, strokeAlpha: 1, blendMode: 'Multiply' }), '/GS1 gs\n')
		assert.strictEqual(graphics.setExtGState({ fillAlpha: 1, strokeAlpha: 1, blendMode: 'Normal' }), '/GS2 gs\n')
		assert.deepStrictEqual(graphics.resources, [
			{
				type: 'ExtGState',
				name: 'GS1',
				dictionary: '<< /Type /ExtGState /CA 1.000000 /ca 0.500000 /BM /Multiply >>',
			},
			{
				type: 'ExtGState',
				name: 'GS2',
				dictionary: '<< /Type /ExtGState /CA 1.000000 /ca 1.000000 /BM /Normal >>',
			},
		])
	})

	describe('shading()', () => {
		it('writes an axial shading with a single interpolation', () => {
			const graphics = new PdfGraphics()
			const output = graphics.shading({
				type: 'linear',
				coords: [0, 1, 1, 1],
				placement: [100, 0, 0, 50, 10, 20],
				stops: [
					{ offset: 0, color: red, opacity: 1 },
					{ offset: 1, color: blue, opacity: 1 },
				],
			})
			assert.strictEqual(output, '100.000000 0.000000 0.000000 50.000000 10.000000 20.000000 cm\n/Sh1 sh\n')
			assert.strictEqual(
				graphics.resources[0]?.dictionary,
				'<< /ShadingType 2 /ColorSpace /DeviceRGB /Coords [0.000000 1.000000 1.000000 1.000000] /Domain [0 1] ' +
					`/Function ${interpolation('1.000000 0.000000 0.000000', '0.000000 0.000000 1.000000')} ` +
					'/Extend [true true] >>'
			)
		})

		it('writes a radial shading from the focus to the circle', () => {
			const graphics = new PdfGraphics()
			graphics.shading({
				type: 'radial',
				coords: [0.5, 0.5, 0.25, 0.75, 0.5],
				placement: [1, 0, 0, 1, 0, 0],
				stops: [
					{ offset: 0, color: { space: 'gray', gray: 0 }, opacity: 1 },
					{ offset: 1, color: { space: 'gray', gray: 1 }, opacity: 1 },
				],
			})
			assert.strictEqual(
				graphics.resources[0]?.dictionary,
				'<< /ShadingType 3 /ColorSpace /DeviceGray ' +
					'/Coords [0.250000 0.750000 0.000000 0.500000 0.500000 0.500000] /Domain [0 1] ' +
					`/Function ${interpolation('0.000000', '1.000000')} /Extend [true true] >>`
			)
		})

		it('pads the stops and stitches their interpolations', () => {
			const graphics = new PdfGraphics()
			graphics.shading({
				type: 'linear',
				coords: [0, 1, 1, 1],
				placement: [1, 0, 0, 1, 0, 0],
				stops: [
					{ offset: 0.25, color: { space: 'gray', gray: 0 }, opacity: 1 },
					{ offset: 0.75, color: { space: 'gray', gray: 1 }, opacity: 1 },
				],
			})
			const functions = [
				interpolation('0.000000', '0.000000'),
				interpolation('0.000000', '1.000000'),
				interpolation('1.000000', '1.000000'),
			]
			assert.strictEqual(
				graphics.resources[0]?.dictionary,
				'<< /ShadingType 2 /ColorSpace /DeviceGray /Coords [0.000000 1.000000 1.000000 1.000000] /Domain [0 1] ' +
					`/Function << /FunctionType 3 /Domain [0 1] /Functions [${functions.join(' ')}] ` +
					'/Bounds [0.250000 0.750000] /Encode [0 1 0 1 0 1] >> /Extend [true true] >>'
			)
		})

		it('converts mixed color spaces to RGB', () => {
			const graphics = new PdfGraphics()
			graphics.shading({
				type: 'linear',
				coords: [0, 1, 1, 1],
				placement: [1, 0, 0, 1, 0, 0],
				stops: [
					{ offset: 0, color: { space: 'gray', gray: 1 }, opacity: 1 },
					{ offset: 1, color: red, opacity: 1 },
				],
			})
			assert.include(
				graphics.resources[0]?.dictionary ?? '',
				`/ColorSpace /DeviceRGB /Coords [0.000000 1.000000 1.000000 1.000000] /Domain [0 1] /Function ${interpolation(
					'1.000000 1.000000 1.000000',
					'1.000000 0.000000 0.000000'
				)}`
			)
		})

		it('writes nothing without stops', () => {
			const graphics = new PdfGraphics()
			const output = graphics.shading({ type: 'linear', coords: [0, 1, 1, 1], placement: [1, 0, 0, 1, 0, 0], stops: [] })
			assert.strictEqual(output, '')
			assert.lengthOf(graphics.resources, 0)
		})
	})

	it('registers raster images as XObjects', () => {
		const graphics = new PdfGraphics()
		const data = new Uint8Array([1, 2, 3])
		assert.strictEqual(
			graphics.image([10, 0, 0, 20, 5, 5], data),
			'q\n10.000000 0.000000 0.000000 20.000000 5.000000 5.000000 cm\n/Im1 Do\nQ\n'
		)
		assert.strictEqual(graphics.resources[0]?.data, data)
	})
})

describe('toRgb()', () => {
	it('converts gray', () => {
		assert.deepStrictEqual(toRgb({ space: 'gray', gray: 0.5 }), { space: 'rgb', red: 0.5, green: 0.5, blue: 0.5 })
	})
	it('converts cmyk', () => {
		assert.deepStrictEqual(toRgb({ space: 'cmyk', cyan: 1, magenta: 0, yellow: 0, black: 0.5 }), {
			space: 'rgb',
			red: 0,
			green: 0.5,
			blue: 0.5,
		})
	})
})
