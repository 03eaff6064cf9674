/**
 * A 2D affine matrix `[a, b, c, d, e, f]`, mapping `(x, y)` to `(a·x + c·y + e, b·x + d·y + f)`.
 */
export type Matrix = readonly [a: number, b: number, c: number, d: number, e: number, f: number]

export interface Point {
	readonly x: number
	readonly y: number
}

/**
 * An axis-aligned box given by its extreme coordinates.
 */
export interface BoundingBox {
	readonly minX: number
	readonly minY: number
	readonly maxX: number
	readonly maxY: number
}

export interface Box {
	readonly x: number
	readonly y: number
	readonly width: number
	readonly height: number
}

export const IDENTITY_MATRIX: Matrix = [1, 0, 0, 1, 0, 0]

export const EMPTY_BOUNDING_BOX: BoundingBox = {
	minX: Infinity,
	minY: Infinity,
	maxX: -Infinity,
	maxY: -Infinity,
}

/**
 * Matrix product `left · right`: applied to a point, `right` acts first.
 */
export function multiplyMatrices(left: Matrix, right: Matrix): Matrix {
	const [a1, b1, c1, d1, e1, f1] = left
	const [a2, b2, c2, d2, e2, f2] = right
	return [
		a1 * a2 + c1 * b2,
		b1 * a2 + d1 * b2,
		a1 * c2 + c1 * d2,
		b1 * c2 + d1 * d2,
		a1 * e2 + c1 * f2 + e1,
		b1 * e2 + d1 * f2 + f1,
	]
}

export const isIdentityMatrix = (matrix: Matrix): boolean =>
	matrix.every((value, index) => value === IDENTITY_MATRIX[index])

export const translationMatrix = (tx: number, ty: number): Matrix => [1, 0, 0, 1, tx, ty]

export const scalingMatrix = (sx: number, sy: number = sx): Matrix => [sx, 0, 0, sy, 0, 0]

export function applyMatrix(matrix: Matrix, x: number, y: number): Point {
	const [a, b, c, d, e, f] = matrix
	return { x: a * x + c * y + e, y: b * x + d * y + f }
}

/**
 * Re-expresses a top-down (y grows downwards) matrix in the bottom-up space of a page of the given height,
 * i.e. conjugates it with the flip `(x, y) → (x, pageHeight − y)`.
 */
export function flipMatrix(matrix: Matrix, pageHeight: number): Matrix {
	const [a, b, c, d, e, f] = matrix
	return [a, -b, -c, d, e + c * pageHeight, pageHeight * (1 - d) - f]
}

/**
 * Signed angle in radians from vector `(ux, uy)` to vector `(vx, vy)`, in `(-π, π]`.
 */
export function vectorAngle(ux: number, uy: number, vx: number, vy: number): number {
	const angle = Math.atan2(ux * vy - uy * vx, ux * vx + uy * vy)
	// atan2 returns -π for the exactly opposite direction when the cross product is -0
	return angle === -Math.PI ? Math.PI : angle
}

export const degreesToRadians = (degrees: number): number => (degrees * Math.PI) / 180

export const includePoint = (box: BoundingBox, x: number, y: number): BoundingBox => ({
	minX: Math.min(box.minX, x),
	minY: Math.min(box.minY, y),
	maxX: Math.max(box.maxX, x),
	maxY: Math.max(box.maxY, y),
})

export const unionBoundingBoxes = (first: BoundingBox, second: BoundingBox): BoundingBox => ({
	minX: Math.min(first.minX, second.minX),
	minY: Math.min(first.minY, second.minY),
	maxX: Math.max(first.maxX, second.maxX),
	maxY: Math.max(first.maxY, second.maxY),
})

export const isEmptyBoundingBox = (box: BoundingBox): boolean => box.minX > box.maxX || box.minY > box.maxY

export function boundingBoxToBox(box: BoundingBox): Box {
	if (isEmptyBoundingBox(box)) {
		return { x: 0, y: 0, width: 0, height: 0 }
	}
	return { x: box.minX, y: box.minY, width: box.maxX - box.minX, height: box.maxY - box.minY }
}

/**
 * An elliptical arc in center parameterization. Angles are in radians in the top-down user space,
 * `sweep` is signed (positive sweeps towards increasing angles).
 */
export interface CenterArc {
	readonly cx: number
	readonly cy: number
	readonly rx: number
	readonly ry: number
	/** Rotation of the ellipse's x-axis, in radians. */
	readonly rotation: number
	readonly startAngle: number
	readonly sweep: number
}

export interface EndpointArc {
	readonly x1: number
	readonly y1: number
	readonly rx: number
	readonly ry: number
	/** Rotation of the ellipse's x-axis, in degrees. */
	readonly xAxisRotation: number
	readonly largeArc: boolean
	readonly sweep: boolean
	readonly x2: number
	readonly y2: number
}

/**
 * Converts an arc given by its endpoints to center parameterization.
 * Radii too small to span the endpoints are scaled up uniformly.
 *
 * @see https://www.w3.org/TR/SVG11/implnote.html#ArcConversionEndpointToCenter
 */
export function endpointToCenterArc(arc: EndpointArc): CenterArc {
	const rotation = degreesToRadians(arc.xAxisRotation)
	const cos = Math.cos(rotation)
	const sin = Math.sin(rotation)
	const halfDx = (arc.x1 - arc.x2) / 2
	const halfDy = (arc.y1 - arc.y2) / 2
	const x1p = cos * halfDx + sin * halfDy
	const y1p = -sin * halfDx + cos * halfDy

	let rx = Math.abs(arc.rx)
	let ry = Math.abs(arc.ry)
	const lambda = (x1p * x1p) / (rx * rx) + (y1p * y1p) / (ry * ry)
	if (lambda > 1) {
		rx *= Math.sqrt(lambda)
		ry *= Math.sqrt(lambda)
	}

	const rx2 = rx * rx
	const ry2 = ry * ry
	const numerator = rx2 * ry2 - rx2 * y1p * y1p - ry2 * x1p * x1p
	const denominator = rx2 * y1p * y1p + ry2 * x1p * x1p
	let root = numerator <= 0 || denominator === 0 ? 0 : Math.sqrt(numerator / denominator)
	if (arc.largeArc === arc.sweep) {
		root = -root
	}
	const cxp = (root * rx * y1p) / ry
	const cyp = (-root * ry * x1p) / rx

	const cx = cos * cxp - sin * cyp + (arc.x1 + arc.x2) / 2
	const cy = sin * cxp + cos * cyp + (arc.y1 + arc.y2) / 2

	const ux = (x1p - cxp) / rx
	const uy = (y1p - cyp) / ry
	const vx = (-x1p - cxp) / rx
	const vy = (-y1p - cyp) / ry
	const startAngle = vectorAngle(1, 0, ux, uy)
	let sweep = vectorAngle(ux, uy, vx, vy)
	if (!arc.sweep && sweep > 0) {
		sweep -= 2 * Math.PI
	} else if (arc.sweep && sweep < 0) {
		sweep += 2 * Math.PI
	}

	return { cx, cy, rx, ry, rotation, startAngle, sweep }
}

export const pointOnArc = (arc: CenterArc, angle: number): Point => {
	const cos = Math.cos(arc.rotation)
	const sin = Math.sin(arc.rotation)
	const ex = arc.rx * Math.cos(angle)
	const ey = arc.ry * Math.sin(angle)
	return { x: arc.cx + cos * ex - sin * ey, y: arc.cy + sin * ex + cos * ey }
}

export interface CubicSegment {
	readonly x1: number
	readonly y1: number
	readonly x2: number
	readonly y2: number
	readonly x: number
	readonly y: number
}

/**
 * Approximates an arc with cubic Bezier segments, each spanning at most a quarter turn.
 */
export function arcToCubicSegments(arc: CenterArc): CubicSegment[] {
	const segmentCount = Math.max(1, Math.ceil(Math.abs(arc.sweep) / (Math.PI / 2) - 1e-9))
	const delta = arc.sweep / segmentCount
	const kappa = (4 / 3) * Math.tan(delta / 4)
	const cos = Math.cos(arc.rotation)
	const sin = Math.sin(arc.rotation)
	// Derivative of the ellipse at the given angle
	const tangent = (angle: number): Point => {
		const dx = -arc.rx * Math.sin(angle)
		const dy = arc.ry * Math.cos(angle)
		return { x: cos * dx - sin * dy, y: sin * dx + cos * dy }
	}

	const segments: CubicSegment[] = []
	let angle = arc.startAngle
	for (let index = 0; index < segmentCount; index++) {
		const nextAngle = angle + delta
		const from = pointOnArc(arc, angle)
		const to = pointOnArc(arc, nextAngle)
		const fromTangent = tangent(angle)
		const toTangent = tangent(nextAngle)
		segments.push({
			x1: from.x + kappa * fromTangent.x,
			y1: from.y + kappa * fromTangent.y,
			x2: to.x - kappa * toTangent.x,
			y2: to.y - kappa * toTangent.y,
			x: to.x,
			y: to.y,
		})
		angle = nextAngle
	}
	return segments
}

/**
 * Exact bounding box of an arc: its endpoints plus every axis extremum the sweep passes.
 */
export function arcBoundingBox(arc: CenterArc): BoundingBox {
	const start = pointOnArc(arc, arc.startAngle)
	const end = pointOnArc(arc, arc.startAngle + arc.sweep)
	let box = includePoint(includePoint(EMPTY_BOUNDING_BOX, start.x, start.y), end.x, end.y)

	const cos = Math.cos(arc.rotation)
	const sin = Math.sin(arc.rotation)
	// Parameter angles where dx/dθ = 0 and dy/dθ = 0
	const extremaX = Math.atan2(-arc.ry * sin, arc.rx * cos)
	const extremaY = Math.atan2(arc.ry * cos, arc.rx * sin)
	const from = Math.min(arc.startAngle, arc.startAngle + arc.sweep)
	const to = Math.max(arc.startAngle, arc.startAngle + arc.sweep)
	for (const base of [extremaX, extremaY]) {
		for (let turn = -2; turn <= 2; turn++) {
			for (const angle of [base + turn * 2 * Math.PI, base + Math.PI + turn * 2 * Math.PI]) {
				if (angle > from && angle < to) {
					const point = pointOnArc(arc, angle)
					box = includePoint(box, point.x, point.y)
				}
			}
		}
	}
	return box
}
