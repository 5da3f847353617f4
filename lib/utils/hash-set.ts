/**
 * HashSet provides set semantics for configuration records that have no
 * natural ordering. Membership is decided by a hash of a canonical
 * serialization of each element, so two collections holding the same
 * records in a different order compare as equal, and repeated records
 * collapse into one.
 *
 * Iteration follows insertion order of the first occurrence of each
 * element.
 */
export class HashSet<T> implements Iterable<T> {
	private readonly items = new Map<string, T>();

	constructor(
		private readonly hash: (t: T) => string,
		items: Iterable<T> = [],
	) {
		for (const item of items) {
			this.add(item);
		}
	}

	static of<T>(hash: (t: T) => string, items: Iterable<T> = []): HashSet<T> {
		return new HashSet(hash, items);
	}

	get size(): number {
		return this.items.size;
	}

	add(item: T): this {
		const key = this.hash(item);
		if (!this.items.has(key)) {
			this.items.set(key, item);
		}
		return this;
	}

	has(item: T): boolean {
		return this.items.has(this.hash(item));
	}

	/**
	 * The sorted list of element hashes
	 */
	keys(): string[] {
		return [...this.items.keys()].sort();
	}

	values(): T[] {
		return [...this.items.values()];
	}

	[Symbol.iterator](): Iterator<T> {
		return this.items.values();
	}

	/**
	 * Return the elements of this set that are not in the other
	 */
	difference(other: Iterable<T>): T[] {
		const o = HashSet.of(this.hash, other);
		return this.values().filter((item) => !o.has(item));
	}

	equals(other: Iterable<T>): boolean {
		const o = HashSet.of(this.hash, other);
		if (this.size !== o.size) {
			return false;
		}

		// Otherwise the sets are equal if A - B = 0
		return this.difference(o).length === 0;
	}
}

/**
 * Compare two collections as sets of hashed elements. A missing
 * collection is the empty set.
 */
export function sameElements<T>(
	hash: (t: T) => string,
	a: Iterable<T> = [],
	b: Iterable<T> = [],
): boolean {
	return HashSet.of(hash, a).equals(b);
}
