import * as tar from 'tar-stream';

export interface ArchiveEntry {
	name: string;
	content: Buffer;
	mode?: number;
}

/**
 * Pack files into an in-memory tar archive
 */
export function toTarball(entries: ArchiveEntry[]): Promise<Buffer> {
	const pack = tar.pack();
	const chunks: Buffer[] = [];
	const packed = new Promise<Buffer>((resolve, reject) => {
		pack.on('data', (chunk: unknown) => {
			if (Buffer.isBuffer(chunk)) {
				chunks.push(chunk);
			}
		});
		pack.on('error', reject);
		pack.on('end', () => resolve(Buffer.concat(chunks)));
	});

	for (const { name, content, mode = 0o644 } of entries) {
		pack.entry({ name, mode, size: content.length }, content);
	}
	pack.finalize();

	return packed;
}
