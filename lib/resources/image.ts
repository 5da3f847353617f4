import type { AuthConfig, BuildRequest } from '../client';
import {
	ConfigurationError,
	ImageNotFound,
	NotFound,
	RuntimeError,
} from '../errors';
import type { ImageSpec, ImageState, Observed } from '../types';
import { toAuthConfigs, toBuildArgs, toUlimits } from './convert';
import type { Context } from './resource';
import { Resource } from './resource';

/**
 * Repository part of the image reference, `registry/name` when a
 * registry is given
 */
export function repositoryOf(spec: ImageSpec): string {
	return spec.registry ? `${spec.registry}/${spec.name}` : spec.name;
}

/**
 * The reference an image resource is identified by. The tag defaults
 * to `latest`, an empty tag leaves the reference untagged.
 */
export function imageRef(spec: ImageSpec): string {
	const tag = spec.tag ?? 'latest';
	const repository = repositoryOf(spec);
	return tag ? `${repository}:${tag}` : repository;
}

function validate(spec: ImageSpec): void {
	if (!spec.name) {
		throw new ConfigurationError('image name cannot be empty');
	}

	const modes = [
		spec.pull ? 'pull' : undefined,
		spec.loadPath ? 'loadPath' : undefined,
		spec.buildLocalPath ? 'buildLocalPath' : undefined,
		spec.buildRemotePath ? 'buildRemotePath' : undefined,
	].filter((m) => m != null);
	if (modes.length > 1) {
		throw new ConfigurationError(
			`only one of ${modes.join(', ')} can be set for image '${spec.name}'`,
		);
	}

	if (spec.timeout != null && spec.timeout < 0) {
		throw new ConfigurationError('image timeout cannot be negative');
	}

	// throws on duplicate registries
	toAuthConfigs(spec.auth);
}

function authFor(spec: ImageSpec): AuthConfig | undefined {
	return toAuthConfigs(spec.auth)[spec.registry ?? ''];
}

function timeoutMs(spec: ImageSpec): number | undefined {
	return spec.timeout ? spec.timeout * 1000 : undefined;
}

function toBuildRequest(spec: ImageSpec): BuildRequest {
	return {
		name: imageRef(spec),
		contextDir: spec.buildLocalPath || undefined,
		remote: spec.buildRemotePath || undefined,
		dockerfile: spec.dockerfile,
		noCache: spec.noCache ?? false,
		memory: spec.memory,
		memswap: spec.memswap,
		cpuShares: spec.cpuShares,
		cpuQuota: spec.cpuQuota,
		cpuPeriod: spec.cpuPeriod,
		cpuSetCpus: spec.cpuSetCpus,
		networkMode: spec.networkMode,
		cgroupParent: spec.cgroupParent,
		labels: spec.labels ?? {},
		buildArgs: toBuildArgs(spec.buildArgs),
		ulimits: toUlimits(spec.ulimitSoft, spec.ulimitHard),
		authConfigs: toAuthConfigs(spec.auth),
		timeoutMs: timeoutMs(spec),
	};
}

async function push(spec: ImageSpec, { client, logger }: Context) {
	const auth = authFor(spec);
	if (auth == null) {
		logger.debug(
			`no credentials for registry '${spec.registry ?? ''}', pushing anonymously`,
		);
	}
	try {
		await client.pushImage({
			name: repositoryOf(spec),
			tag: spec.tag ?? 'latest',
			auth,
			timeoutMs: timeoutMs(spec),
		});
	} catch (e) {
		throw new RuntimeError(`failed to push image ${imageRef(spec)}`, e);
	}
}

// Created is an RFC 3339 timestamp
function toEpochSeconds(created: string): number {
	return Math.floor(Date.parse(created) / 1000);
}

async function read(
	id: string,
	_: ImageSpec,
	{ client }: Context,
): Promise<Observed<ImageState> | null> {
	try {
		const image = await client.inspectImage(id);
		return {
			id,
			state: {
				imageId: image.Id,
				parent: image.Parent,
				comment: image.Comment,
				author: image.Author,
				dockerVersion: image.DockerVersion,
				os: image.Os,
				architecture: image.Architecture,
				size: image.Size,
				virtualSize: image.VirtualSize,
				createdAt: toEpochSeconds(image.Created),
				labels: image.Labels,
				digests: image.RepoDigests,
				allTags: image.RepoTags,
			},
		};
	} catch (e) {
		if (NotFound.is(e)) {
			return null;
		}
		throw e;
	}
}

/**
 * Images are pulled, loaded from an archive or built, and optionally
 * pushed to their registry. An image with no acquisition mode is
 * expected to exist on the daemon already.
 */
export const Image = Resource.of<ImageSpec, ImageState>({
	kind: 'image',
	description: (spec) => `image '${imageRef(spec)}'`,
	validate,
	inPlace: ['push', 'keep', 'timeout', 'auth'],
	async create(spec, ctx) {
		const { client } = ctx;
		const ref = imageRef(spec);

		try {
			if (spec.pull) {
				await client.pullImage({
					repository: repositoryOf(spec),
					tag: spec.tag ?? 'latest',
					auth: authFor(spec),
					timeoutMs: timeoutMs(spec),
				});
			} else if (spec.loadPath) {
				await client.loadImage(spec.loadPath);
			} else if (spec.buildLocalPath || spec.buildRemotePath) {
				await client.buildImage(toBuildRequest(spec));
			}
		} catch (e) {
			throw new RuntimeError(`failed to acquire image ${ref}`, e);
		}

		if (spec.push) {
			await push(spec, ctx);
		}

		const observed = await read(ref, spec, ctx);
		if (observed == null) {
			throw new ImageNotFound(ref);
		}
		return observed;
	},
	read,
	async update(id, prior, next, ctx) {
		if (!prior.push && next.push) {
			await push(next, ctx);
		}
		return read(id, next, ctx);
	},
	async delete(id, spec, { client, logger }) {
		if (spec.keep) {
			logger.debug(`keeping image ${id} on the daemon`);
			return;
		}
		try {
			await client.removeImage(id, { force: true });
		} catch (e) {
			if (NotFound.is(e)) {
				return;
			}
			throw e;
		}
	},
	async exists(id, spec, ctx) {
		return (await read(id, spec, ctx)) != null;
	},
});
