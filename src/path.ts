import {
	applyMatrix,
	arcBoundingBox,
	arcToCubicSegments,
	BoundingBox,
	CenterArc,
	EMPTY_BOUNDING_BOX,
	endpointToCenterArc,
	IDENTITY_MATRIX,
	includePoint,
	Matrix,
	unionBoundingBoxes,
} from './geometry.js'
import { GraphicsEngine } from './graphics.js'

/**
 * A drawing primitive produced by interpreting path data, in the path's own user space.
 */
export type PathSegment =
	| { readonly type: 'move'; readonly x: number; readonly y: number }
	| { readonly type: 'line'; readonly x: number; readonly y: number }
	| {
			readonly type: 'curve'
			readonly x1: number
			readonly y1: number
			readonly x2: number
			readonly y2: number
			readonly x: number
			readonly y: number
	  }
	| { readonly type: 'arc'; readonly arc: CenterArc; readonly x: number; readonly y: number }
	| { readonly type: 'close' }

export interface InterpretedPath {
	readonly segments: PathSegment[]
	readonly boundingBox: BoundingBox
}

export interface PathOptions {
	/** Absolute values below this are snapped to zero. */
	readonly minLength: number
}

type CommandName = 'M' | 'L' | 'H' | 'V' | 'C' | 'S' | 'Q' | 'T' | 'A' | 'Z'

const parameterCounts: Record<CommandName, number> = {
	M: 2,
	L: 2,
	H: 1,
	V: 1,
	C: 6,
	S: 4,
	Q: 4,
	T: 2,
	A: 7,
	Z: 0,
}

const isCommandName = (name: string): name is CommandName => name in parameterCounts

// Signs, digits and an optional fraction. Exponents are not recognized.
const NUMBER_REGEX = /[+-]?(?:\d+\.?\d*|\.\d+)/g
const COMMAND_REGEX = /([MLHVCSQTAZ])([^MLHVCSQTAZ]*)/gi

export interface PathCommand {
	readonly name: CommandName
	readonly relative: boolean
	readonly parameters: number[]
}

/**
 * Splits path data into command letters and their numeric parameter runs.
 */
export function tokenizePathData(data: string): PathCommand[] {
	const commands: PathCommand[] = []
	for (const [, letter = '', run = ''] of data.matchAll(COMMAND_REGEX)) {
		const name = letter.toUpperCase()
		if (!isCommandName(name)) {
			continue
		}
		commands.push({
			name,
			relative: letter !== name,
			parameters: (run.match(NUMBER_REGEX) ?? []).map(Number),
		})
	}
	return commands
}

/**
 * Mutable cursor carried across the commands of one path.
 */
interface PathState {
	x: number
	y: number
	subpathX: number
	subpathY: number
	boundingBox: BoundingBox
	/** Second control point of the previous cubic segment, if the previous command was `C` or `S`. */
	cubicControl: { x: number; y: number } | undefined
	/** Control point of the previous quadratic segment, if the previous command was `Q` or `T`. */
	quadraticControl: { x: number; y: number } | undefined
}

const ARC_UNSNAPPED_PARAMETERS = new Set([2, 3, 4])

/**
 * Interprets SVG path data into drawing primitives and computes their bounding box.
 * Pure: interpreting the same data twice yields identical results.
 */
export function interpretPath(data: string, { minLength }: PathOptions): InterpretedPath {
	const segments: PathSegment[] = []
	const state: PathState = {
		x: 0,
		y: 0,
		subpathX: 0,
		subpathY: 0,
		boundingBox: EMPTY_BOUNDING_BOX,
		cubicControl: undefined,
		quadraticControl: undefined,
	}
	const snap = (value: number): number => (Math.abs(value) < minLength ? 0 : value)
	const include = (x: number, y: number): void => {
		state.boundingBox = includePoint(state.boundingBox, x, y)
	}

	for (const command of tokenizePathData(data)) {
		if (command.name === 'Z') {
			segments.push({ type: 'close' })
			state.x = state.subpathX
			state.y = state.subpathY
			state.cubicControl = undefined
			state.quadraticControl = undefined
			continue
		}

		const count = parameterCounts[command.name]
		const parameters = command.parameters.map((value, index) =>
			command.name === 'A' && ARC_UNSNAPPED_PARAMETERS.has(index % count) ? value : snap(value)
		)
		for (let offset = 0; offset + count <= parameters.length; offset += count) {
			const group = parameters.slice(offset, offset + count)
			// Relative coordinates are offsets from the current point after the previous group
			const baseX = command.relative ? state.x : 0
			const baseY = command.relative ? state.y : 0
			const [p0 = 0, p1 = 0, p2 = 0, p3 = 0, p4 = 0, p5 = 0, p6 = 0] = group
			let cubicControl: PathState['cubicControl']
			let quadraticControl: PathState['quadraticControl']

			switch (command.name) {
				case 'M': {
					const x = baseX + p0
					const y = baseY + p1
					// Additional coordinate pairs are implicit lineto commands
					segments.push({ type: offset === 0 ? 'move' : 'line', x, y })
					if (offset === 0) {
						state.subpathX = x
						state.subpathY = y
					}
					state.x = x
					state.y = y
					include(x, y)
					break
				}
				case 'L':
				case 'H':
				case 'V': {
					const x = command.name === 'V' ? state.x : baseX + p0
					const y = command.name === 'H' ? state.y : command.name === 'V' ? baseY + p0 : baseY + p1
					segments.push({ type: 'line', x, y })
					state.x = x
					state.y = y
					include(x, y)
					break
				}
				case 'C':
				case 'S': {
					let x1: number
					let y1: number
					let rest: number[]
					if (command.name === 'C') {
						x1 = baseX + p0
						y1 = baseY + p1
						rest = [p2, p3, p4, p5]
					} else {
						x1 = state.cubicControl ? 2 * state.x - state.cubicControl.x : state.x
						y1 = state.cubicControl ? 2 * state.y - state.cubicControl.y : state.y
						rest = [p0, p1, p2, p3]
					}
					const [r0 = 0, r1 = 0, r2 = 0, r3 = 0] = rest
					const x2 = baseX + r0
					const y2 = baseY + r1
					const x = baseX + r2
					const y = baseY + r3
					segments.push({ type: 'curve', x1, y1, x2, y2, x, y })
					include(x1, y1)
					include(x2, y2)
					include(x, y)
					state.x = x
					state.y = y
					cubicControl = { x: x2, y: y2 }
					break
				}
				case 'Q':
				case 'T': {
					let qx: number
					let qy: number
					let x: number
					let y: number
					if (command.name === 'Q') {
						qx = baseX + p0
						qy = baseY + p1
						x = baseX + p2
						y = baseY + p3
					} else {
						qx = state.quadraticControl ? 2 * state.x - state.quadraticControl.x : state.x
						qy = state.quadraticControl ? 2 * state.y - state.quadraticControl.y : state.y
						x = baseX + p0
						y = baseY + p1
					}
					// Degree elevation to a cubic
					const x1 = state.x + (2 / 3) * (qx - state.x)
					const y1 = state.y + (2 / 3) * (qy - state.y)
					const x2 = x + (2 / 3) * (qx - x)
					const y2 = y + (2 / 3) * (qy - y)
					segments.push({ type: 'curve', x1, y1, x2, y2, x, y })
					include(x1, y1)
					include(x2, y2)
					include(x, y)
					state.x = x
					state.y = y
					quadraticControl = { x: qx, y: qy }
					break
				}
				case 'A': {
					const x = baseX + p5
					const y = baseY + p6
					const degenerate =
						Math.abs(p0) < minLength ||
						Math.abs(p1) < minLength ||
						(Math.abs(state.x - x) < minLength && Math.abs(state.y - y) < minLength)
					if (!degenerate) {
						const arc = endpointToCenterArc({
							x1: state.x,
							y1: state.y,
							rx: p0,
							ry: p1,
							xAxisRotation: p2,
							largeArc: p3 !== 0,
							sweep: p4 !== 0,
							x2: x,
							y2: y,
						})
						segments.push({ type: 'arc', arc, x, y })
						state.boundingBox = unionBoundingBoxes(state.boundingBox, arcBoundingBox(arc))
					}
					include(x, y)
					state.x = x
					state.y = y
					break
				}
			}

			state.cubicControl = cubicControl
			state.quadraticControl = quadraticControl
		}
	}

	return { segments, boundingBox: state.boundingBox }
}

/**
 * Wraps segments built by hand (for basic shapes) with their bounding box.
 * Curve control points count towards the box, as in {@link interpretPath}.
 */
export function createPath(segments: PathSegment[]): InterpretedPath {
	let boundingBox = EMPTY_BOUNDING_BOX
	for (const segment of segments) {
		switch (segment.type) {
			case 'move':
			case 'line':
				boundingBox = includePoint(boundingBox, segment.x, segment.y)
				break
			case 'curve':
				boundingBox = includePoint(boundingBox, segment.x1, segment.y1)
				boundingBox = includePoint(boundingBox, segment.x2, segment.y2)
				boundingBox = includePoint(boundingBox, segment.x, segment.y)
				break
			case 'arc':
				boundingBox = unionBoundingBoxes(boundingBox, arcBoundingBox(segment.arc))
				break
		}
	}
	return { segments, boundingBox }
}

/**
 * Writes segments through the graphics engine. Every point is mapped through `matrix` and then flipped
 * into the bottom-up page space. Arcs are approximated with cubic curves.
 */
export function writePath(
	segments: readonly PathSegment[],
	graphics: GraphicsEngine,
	pageHeight: number,
	matrix: Matrix = IDENTITY_MATRIX
): string {
	const toPage = (x: number, y: number): [number, number] => {
		const point = applyMatrix(matrix, x, y)
		return [point.x, pageHeight - point.y]
	}
	let output = ''
	for (const segment of segments) {
		switch (segment.type) {
			case 'move':
				output += graphics.moveTo(...toPage(segment.x, segment.y))
				break
			case 'line':
				output += graphics.lineTo(...toPage(segment.x, segment.y))
				break
			case 'curve':
				output += graphics.curveTo(
					...toPage(segment.x1, segment.y1),
					...toPage(segment.x2, segment.y2),
					...toPage(segment.x, segment.y)
				)
				break
			case 'arc':
				for (const cubic of arcToCubicSegments(segment.arc)) {
					output += graphics.curveTo(
						...toPage(cubic.x1, cubic.y1),
						...toPage(cubic.x2, cubic.y2),
						...toPage(cubic.x, cubic.y)
					)
				}
				break
			case 'close':
				output += graphics.closePath()
				break
		}
	}
	return output
}
