import type { ImageSummary } from '../client';

/**
 * Short form of an image ID, as shown by `docker images`
 */
export function shortId(id: string): string {
	return id.replace(/^sha256:/, '').slice(0, 12);
}

/**
 * Lookup of the local images by any of the names the daemon uses for
 * them. Images are stored once by ID, short IDs and repo tags are
 * aliases pointing to that ID.
 */
export class ImageIndex {
	private readonly byId = new Map<string, ImageSummary>();
	private readonly aliases = new Map<string, string>();

	constructor(images: ImageSummary[] = []) {
		images.forEach((image) => this.add(image));
	}

	static from(images: ImageSummary[]): ImageIndex {
		return new ImageIndex(images);
	}

	get size(): number {
		return this.byId.size;
	}

	add(image: ImageSummary): this {
		this.byId.set(image.Id, image);
		this.aliases.set(shortId(image.Id), image.Id);
		for (const tag of image.RepoTags) {
			this.aliases.set(tag, image.Id);
		}
		return this;
	}

	get(ref: string): ImageSummary | undefined {
		const id = this.byId.has(ref) ? ref : this.aliases.get(ref);
		return id != null ? this.byId.get(id) : undefined;
	}

	/**
	 * Find the reference the daemon knows the image by. A reference
	 * with no match is tried once more with the `latest` tag.
	 */
	resolve(ref: string): string | undefined {
		if (this.get(ref) != null) {
			return ref;
		}
		const latest = `${ref}:latest`;
		if (this.get(latest) != null) {
			return latest;
		}
		return undefined;
	}
}
