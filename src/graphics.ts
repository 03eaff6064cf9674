import { BlendMode } from './css.js'
import { DeviceColor } from './colors.js'
import { Matrix } from './geometry.js'
import type { GradientStop, ResolvedGradient } from './gradients.js'
import { createCounter, formatNumber } from './util.js'

/**
 * Path painting operators: fill, even-odd fill, stroke, fill and stroke, no paint, and clipping.
 */
export type PaintOperator = 'n' | 'f' | 'f*' | 'S' | 'B' | 'B*' | 'W n' | 'W* n'

export interface LineStyle {
	readonly width: number
	/** 0 butt, 1 round, 2 projecting square */
	readonly cap: 0 | 1 | 2
	/** 0 miter, 1 round, 2 bevel */
	readonly join: 0 | 1 | 2
	readonly miterLimit: number
	readonly dashArray: readonly number[]
	readonly dashPhase: number
}

export interface ExtGStateParameters {
	readonly fillAlpha: number
	readonly strokeAlpha: number
	readonly blendMode: BlendMode
}

/**
 * Writes page content-stream operators. All coordinates are in the bottom-up page space, in points.
 */
export interface GraphicsEngine {
	saveState(): string
	restoreState(): string
	transform(matrix: Matrix): string
	moveTo(x: number, y: number): string
	lineTo(x: number, y: number): string
	curveTo(x1: number, y1: number, x2: number, y2: number, x: number, y: number): string
	closePath(): string
	rect(x: number, y: number, width: number, height: number): string
	paint(operator: PaintOperator): string
	setFillColor(color: DeviceColor): string
	setStrokeColor(color: DeviceColor): string
	setLineStyle(style: LineStyle): string
	setExtGState(parameters: ExtGStateParameters): string
	/** Paints a gradient placed by `gradient.placement`, clipped by the current clipping path. */
	shading(gradient: ResolvedGradient): string
	/** Paints a raster image into the unit square mapped by `placement`. */
	image(placement: Matrix, data: Uint8Array): string
}

export interface PdfResource {
	readonly type: 'ExtGState' | 'Shading' | 'XObject'
	readonly name: string
	readonly dictionary: string
	readonly data?: Uint8Array
}

const formatNumbers = (...values: number[]): string => values.map(formatNumber).join(' ')

const formatColorComponents = (color: DeviceColor): string => {
	switch (color.space) {
		case 'gray':
			return formatNumbers(color.gray)
		case 'rgb':
			return formatNumbers(color.red, color.green, color.blue)
		case 'cmyk':
			return formatNumbers(color.cyan, color.magenta, color.yellow, color.black)
	}
}

const colorOperators: Record<DeviceColor['space'], [fill: string, stroke: string]> = {
	gray: ['g', 'G'],
	rgb: ['rg', 'RG'],
	cmyk: ['k', 'K'],
}

const colorSpaceNames: Record<DeviceColor['space'], string> = {
	gray: '/DeviceGray',
	rgb: '/DeviceRGB',
	cmyk: '/DeviceCMYK',
}

export function toRgb(color: DeviceColor): DeviceColor {
	switch (color.space) {
		case 'rgb':
			return color
		case 'gray':
			return { space: 'rgb', red: color.gray, green: color.gray, blue: color.gray }
		case 'cmyk':
			return {
				space: 'rgb',
				red: (1 - color.cyan) * (1 - color.black),
				green: (1 - color.magenta) * (1 - color.black),
				blue: (1 - color.yellow) * (1 - color.black),
			}
	}
}

/**
 * Builds the shading function over the stops: one exponential interpolation per pair of neighbouring stops,
 * stitched together when there are more than two.
 */
function shadingFunction(stops: readonly GradientStop[]): string {
	const interpolation = (from: GradientStop, to: GradientStop): string =>
		`<< /FunctionType 2 /Domain [0 1] /C0 [${formatColorComponents(from.color)}] /C1 [${formatColorComponents(
			to.color
		)}] /N 1 >>`
	const pairs = stops.slice(1).map((stop, index) => interpolation(stops[index] ?? stop, stop))
	if (pairs.length === 1) {
		return pairs[0] ?? ''
	}
	const bounds = stops.slice(1, -1).map(stop => formatNumber(stop.offset))
	const encode = pairs.map(() => '0 1').join(' ')
	return `<< /FunctionType 3 /Domain [0 1] /Functions [${pairs.join(' ')}] /Bounds [${bounds.join(
		' '
	)}] /Encode [${encode}] >>`
}

/**
 * Pads the stop list so it covers offsets 0 to 1 and converts mixed color spaces to RGB.
 */
function normalizeStops(stops: readonly GradientStop[]): GradientStop[] {
	const first = stops[0]
	const last = stops[stops.length - 1]
	if (!first || !last) {
		return []
	}
	const padded = [
		...(first.offset > 0 ? [{ ...first, offset: 0 }] : []),
		...stops,
		...(last.offset < 1 ? [{ ...last, offset: 1 }] : []),
	]
	const sameSpace = padded.every(stop => stop.color.space === first.color.space)
	return sameSpace ? padded : padded.map(stop => ({ ...stop, color: toRgb(stop.color) }))
}

/**
 * Writes PDF content-stream operators and collects the resources (graphics states, shadings, images)
 * they refer to.
 */
export class PdfGraphics implements GraphicsEngine {
	public readonly resources: PdfResource[] = []

	private readonly nextExtGStateId = createCounter()
	private readonly nextShadingId = createCounter()
	private readonly nextImageId = createCounter()

	public saveState(): string {
		return 'q\n'
	}

	public restoreState(): string {
		return 'Q\n'
	}

	public transform(matrix: Matrix): string {
		return `${formatNumbers(...matrix)} cm\n`
	}

	public moveTo(x: number, y: number): string {
		return `${formatNumbers(x, y)} m\n`
	}

	public lineTo(x: number, y: number): string {
		return `${formatNumbers(x, y)} l\n`
	}

	public curveTo(x1: number, y1: number, x2: number, y2: number, x: number, y: number): string {
		return `${formatNumbers(x1, y1, x2, y2, x, y)} c\n`
	}

	public closePath(): string {
		return 'h\n'
	}

	public rect(x: number, y: number, width: number, height: number): string {
		return `${formatNumbers(x, y, width, height)} re\n`
	}

	public paint(operator: PaintOperator): string {
		return `${operator}\n`
	}

	public setFillColor(color: DeviceColor): string {
		return `${formatColorComponents(color)} ${colorOperators[color.space][0]}\n`
	}

	public setStrokeColor(color: DeviceColor): string {
		return `${formatColorComponents(color)} ${colorOperators[color.space][1]}\n`
	}

	public setLineStyle(style: LineStyle): string {
		const dash = style.dashArray.length > 0 ? formatNumbers(...style.dashArray) : ''
		return `${formatNumber(style.width)} w ${style.cap} J ${style.join} j ${formatNumber(
			style.miterLimit
		)} M [${dash}] ${formatNumber(style.dashPhase)} d\n`
	}

	public setExtGState({ fillAlpha, strokeAlpha, blendMode }: ExtGStateParameters): string {
		const name = `GS${this.nextExtGStateId()}`
		this.resources.push({
			type: 'ExtGState',
			name,
			dictionary: `<< /Type /ExtGState /CA ${formatNumber(strokeAlpha)} /ca ${formatNumber(
				fillAlpha
			)} /BM /${blendMode} >>`,
		})
		return `/${name} gs\n`
	}

	public shading(gradient: ResolvedGradient): string {
		const stops = normalizeStops(gradient.stops)
		const first = stops[0]
		if (!first) {
			return ''
		}
		const name = `Sh${this.nextShadingId()}`
		const colorSpace = colorSpaceNames[first.color.space]
		const coords =
			gradient.type === 'linear'
				? formatNumbers(...gradient.coords)
				: formatNumbers(
						gradient.coords[2],
						gradient.coords[3],
						0,
						gradient.coords[0],
						gradient.coords[1],
						gradient.coords[4]
				  )
		this.resources.push({
			type: 'Shading',
			name,
			dictionary: `<< /ShadingType ${
				gradient.type === 'linear' ? 2 : 3
			} /ColorSpace ${colorSpace} /Coords [${coords}] /Domain [0 1] /Function ${shadingFunction(
				stops
			)} /Extend [true true] >>`,
		})
		return `${this.transform(gradient.placement)}/${name} sh\n`
	}

	public image(placement: Matrix, data: Uint8Array): string {
		const name = `Im${this.nextImageId()}`
		this.resources.push({ type: 'XObject', name, dictionary: '<< /Type /XObject /Subtype /Image >>', data })
		return `q\n${this.transform(placement)}/${name} Do\nQ\n`
	}
}
