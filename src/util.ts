export const createCounter = (): (() => number) => {
	let count = 0
	return () => ++count
}

export const createIdGenerator = (): ((prefix: string) => string) => {
	const nextCounts = new Map<string, number>()
	return prefix => {
		const count = nextCounts.get(prefix) ?? 1
		nextCounts.set(prefix, count + 1)
		return `${prefix}${count}`
	}
}

export const isDefined = <T>(value: T): value is NonNullable<T> => value !== null && value !== undefined

/**
 * Formats a number the way PDF content streams expect it: fixed point with six decimals.
 */
export const formatNumber = (value: number): string => {
	const fixed = value.toFixed(6)
	// Avoid "-0.000000"
	return fixed === '-0.000000' ? '0.000000' : fixed
}

export const clamp = (value: number, min: number, max: number): number => Math.min(Math.max(value, min), max)

/**
 * Type guard to check if an object is a specific member of a tagged union type.
 *
 * @param key The key to check
 * @param value The value the key has to be.
 */
export const isTaggedUnionMember = <T extends object, K extends keyof T, V extends T[K]>(key: K, value: V) => (
	object: T
): object is T & Record<K, V> => object[key] === value

export function assert(condition: unknown, message: string): asserts condition {
	if (!condition) {
		throw new Error(message)
	}
}
