/**
 * Return a copy of the object without the keys that have an
 * undefined value
 */
export function compact<T extends object>(o: T): Partial<T> {
	const res: Partial<T> = {};
	for (const key of Object.keys(o) as Array<keyof T>) {
		if (o[key] !== undefined) {
			res[key] = o[key];
		}
	}
	return res;
}
