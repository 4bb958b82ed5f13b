/**
 * Assertion utilities for internal invariants.
 *
 * Failures here point at a programming defect, not at bad caller input, so
 * they throw a plain Error instead of a dedicated error class.
 *
 * @module
 */

/**
 * Assert that a value is neither null nor undefined.
 *
 * @param value - The value to check.
 * @param message - Optional error message if assertion fails.
 * @throws Error if value is null or undefined.
 *
 * @example
 * ```ts
 * const cost = costs.get(key)
 * assertValue(cost, `No cost recorded for ${key}`)
 * // TypeScript now knows cost is a number
 * ```
 */
export function assertValue<T>(
	value?: T,
	message?: string,
): asserts value is NonNullable<T> {
	if (value === undefined || value === null) {
		throw Error(message ?? "Value is undefined or null")
	}
}

/**
 * Assert that a condition holds.
 */
export function assert(
	condition: boolean,
	message?: string,
): asserts condition {
	if (!condition) throw Error(message ?? "Assertion failed")
}
