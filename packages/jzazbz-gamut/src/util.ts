import type { Matrix3, Vec3 } from './types.ts'

export function clamp(min: number, value: number, max: number): number {
	return Math.max(min, Math.min(max, value))
}

export function multiply(m: Matrix3, v: Vec3): Vec3 {
	const [x, y, z] = v
	return [
		m[0][0] * x + m[0][1] * y + m[0][2] * z,
		m[1][0] * x + m[1][1] * y + m[1][2] * z,
		m[2][0] * x + m[2][1] * y + m[2][2] * z,
	]
}

export function toMatrix3(rows: readonly (readonly number[])[]): Matrix3 {
	if (rows.length !== 3) {
		throw new Error(`Expected 3 rows, got ${rows.length}.`)
	}
	return [toVec3(rows[0]), toVec3(rows[1]), toVec3(rows[2])]
}

export function toVec3(values: readonly number[]): Vec3 {
	if (values.length !== 3) {
		throw new Error(`Expected 3 components, got ${values.length}.`)
	}
	return [values[0], values[1], values[2]]
}

export function lerp(a: number, b: number, t: number): number {
	return a + t * (b - a)
}

/**
 * Reduce degrees to [-180, 180). NaN and infinities become NaN.
 */
export function normalizeHue(degrees: number): number {
	const reduced = degrees % 360
	const wrapped = reduced < -180 ? reduced + 360 : reduced
	return wrapped >= 180 ? wrapped - 360 : wrapped
}

export function degreesToRadians(degrees: number): number {
	return (degrees * Math.PI) / 180
}

export function radiansToDegrees(radians: number): number {
	return (radians * 180) / Math.PI
}

/**
 * Shift `radians` by whole turns into [reference - π, reference + π).
 */
export function unwrapHue(radians: number, reference: number): number {
	const turn = 2 * Math.PI
	const offset = (((radians - reference + Math.PI) % turn) + turn) % turn
	return reference + offset - Math.PI
}
