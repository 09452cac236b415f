/**
 * Run `fn` and return the error it throws, which must be an instance of `type`
 */
export function catchError<E extends Error>(
	type: new (...args: never[]) => E,
	fn: () => unknown
): E {
	try {
		fn()
	} catch (error) {
		if (error instanceof type) return error
		throw error
	}
	throw new Error(`Expected ${type.name} to be thrown`)
}
