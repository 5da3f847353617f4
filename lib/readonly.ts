type ReadOnlyPrimitive =
	| undefined
	| null
	| boolean
	| string
	| number
	| Buffer
	| Date;

/**
 * Deep read-only view of a resource spec. Reconcilers receive the
 * declared configuration through this type and never modify it.
 */
export type ReadOnly<T> = T extends ReadOnlyPrimitive
	? T
	: T extends Array<infer U>
		? ReadonlyArray<ReadOnly<U>>
		: { readonly [K in keyof T]: ReadOnly<T[K]> };
