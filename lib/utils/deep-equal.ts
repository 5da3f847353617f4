function isObject(value: unknown): value is object {
	return typeof value === 'object' && value !== null;
}

// Entries with an undefined value are treated as absent, so that
// `{ a: undefined }` and `{}` describe the same configuration
function definedEntries(o: object): Map<string, unknown> {
	return new Map(Object.entries(o).filter(([, v]) => v !== undefined));
}

/**
 * Calculates deep equality between two configuration values.
 *
 * Object key order is not relevant, array order is. Use a `HashSet`
 * to compare unordered collections.
 */
export function deepEqual(value: unknown, other: unknown): boolean {
	if (Buffer.isBuffer(value) && Buffer.isBuffer(other)) {
		return value.equals(other);
	}

	if (Array.isArray(value) || Array.isArray(other)) {
		if (!Array.isArray(value) || !Array.isArray(other)) {
			return false;
		}
		return (
			value.length === other.length &&
			value.every((v, i) => deepEqual(v, other[i]))
		);
	}

	if (isObject(value) && isObject(other)) {
		const [vProps, oProps] = [value, other].map(definedEntries);
		if (vProps.size !== oProps.size) {
			// If the property lists are different lengths we don't need
			// to check any further
			return false;
		}

		return Array.from(vProps).every(
			([key, v]) => oProps.has(key) && deepEqual(v, oProps.get(key)),
		);
	}

	return value === other;
}
