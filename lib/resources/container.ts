import { setTimeout as delay } from 'timers/promises';

import type { ContainerDetails, DockerClient } from '../client';
import {
	ConfigurationError,
	ContainerExited,
	ContainerNotRunning,
	ImageNotFound,
	NotFound,
	PartialFailure,
	RuntimeError,
} from '../errors';
import {
	hashCapabilities,
	hashExtraHost,
	hashNetworkAttachment,
	hashPort,
	hashUpload,
	hashVolume,
} from '../hash';
import type {
	ContainerSpec,
	ContainerState,
	NetworkAttachment,
	Observed,
	Upload,
} from '../types';
import { HashSet, sameElements } from '../utils/hash-set';
import { toArchive, toCreateRequest, toVolumeConfig } from './convert';
import { ImageIndex } from './image-index';
import type { Context } from './resource';
import { Resource } from './resource';

const RESTART_POLICIES = ['no', 'on-failure', 'always', 'unless-stopped'];
const LOG_DRIVERS = ['json-file', 'syslog', 'journald', 'gelf', 'fluentd'];

// Unix or windows absolute path
const ABSOLUTE_PATH = /^[a-zA-Z]:\\|^\//;

const identity = (s: string) => s;

function assertAbsolute(value: string | undefined, field: string) {
	if (value != null && value.length > 0 && !ABSOLUTE_PATH.test(value)) {
		throw new ConfigurationError(`"${field}" must be an absolute path`);
	}
}

function assertMin(value: number | undefined, min: number, field: string) {
	if (value != null && value < min) {
		throw new ConfigurationError(`"${field}" must be at least ${min}`);
	}
}

function validate(spec: ContainerSpec): void {
	if (!spec.name) {
		throw new ConfigurationError('container name cannot be empty');
	}
	if (!spec.image) {
		throw new ConfigurationError(
			`no image given for container '${spec.name}'`,
		);
	}

	if ((spec.command ?? []).some((c) => c === '')) {
		throw new ConfigurationError('values for command may not be empty');
	}

	if (spec.restart != null && !RESTART_POLICIES.includes(spec.restart)) {
		throw new ConfigurationError(
			`"restart" must be one of ${RESTART_POLICIES.join(', ')}`,
		);
	}
	if (spec.logDriver != null && !LOG_DRIVERS.includes(spec.logDriver)) {
		throw new ConfigurationError(
			`"logDriver" must be one of ${LOG_DRIVERS.join(', ')}`,
		);
	}

	assertMin(spec.memory, 0, 'memory');
	assertMin(spec.memorySwap, -1, 'memorySwap');
	assertMin(spec.cpuShares, 0, 'cpuShares');
	assertMin(spec.maxRetryCount, 0, 'maxRetryCount');
	assertMin(spec.destroyGraceSeconds, 0, 'destroyGraceSeconds');

	for (const { internal, external } of spec.ports ?? []) {
		assertMin(internal, 1, 'ports.internal');
		assertMin(external, 1, 'ports.external');
	}

	for (const v of spec.volumes ?? []) {
		assertAbsolute(v.hostPath, 'volumes.hostPath');
		assertAbsolute(v.containerPath, 'volumes.containerPath');
	}
	// throws on entries that are neither a mount nor a volume source
	toVolumeConfig(spec.volumes ?? []);

	for (const { file } of spec.upload ?? []) {
		assertAbsolute(file, 'upload.file');
	}
}

async function find(client: DockerClient, id: string) {
	const containers = await client.listContainers();
	return containers.find((c) => c.Id === id);
}

async function remove(
	id: string,
	spec: ContainerSpec,
	{ client, logger }: Context,
): Promise<void> {
	const grace = spec.destroyGraceSeconds ?? 0;
	if (grace > 0) {
		logger.debug(`stopping container ${id} with a ${grace}s timeout`);
		try {
			await client.stopContainer(id, grace);
		} catch (e) {
			if (NotFound.is(e)) {
				return;
			}
			throw new RuntimeError(`error stopping container ${id}`, e);
		}
	}

	try {
		await client.removeContainer(id, { force: true, removeVolumes: true });
	} catch (e) {
		if (NotFound.is(e)) {
			return;
		}
		throw new RuntimeError(`error deleting container ${id}`, e);
	}
}

// Removal while reporting a different failure, an error here
// would hide the one the caller needs to see
async function discard(id: string, spec: ContainerSpec, ctx: Context) {
	try {
		await remove(id, spec, ctx);
	} catch (e) {
		ctx.logger.warn(`could not remove container ${id}`, e);
	}
}

async function inspect(
	client: DockerClient,
	id: string,
): Promise<ContainerDetails | null> {
	try {
		return await client.inspectContainer(id);
	} catch (e) {
		if (NotFound.is(e)) {
			return null;
		}
		throw new RuntimeError(`error inspecting container ${id}`, e);
	}
}

function toState(details: ContainerDetails): ContainerState {
	const net = details.NetworkSettings;
	if (net == null) {
		return {};
	}
	return {
		ipAddress: net.IPAddress,
		ipPrefixLength: net.IPPrefixLen,
		gateway: net.Gateway,
		bridge: net.Bridge,
	};
}

/**
 * Observe a container and decide if it is in an acceptable state.
 *
 * A container created by this call (`createdAt` is set) is given
 * `pollAttempts` observations to reach the running state. Otherwise
 * the container is observed once, and removed if it is required to
 * run but is not running.
 *
 * Returns null if the container is gone.
 */
export async function observe(
	id: string,
	spec: ContainerSpec,
	createdAt: Date | null,
	ctx: Context,
): Promise<Observed<ContainerState> | null> {
	const { client, logger, opts } = ctx;
	if ((await find(client, id)) == null) {
		return null;
	}

	const mustRun = spec.mustRun ?? true;
	const loops = createdAt != null ? Math.max(opts.pollAttempts, 1) : 1;

	let details = await inspect(client, id);
	for (let attempt = 1; details != null; attempt++) {
		const { Running, FinishedAt, Error: reason } = details.State;
		if (Running || !mustRun) {
			break;
		}

		if (createdAt == null) {
			logger.warn(`container ${id} is not running, removing it`);
			await remove(id, spec, ctx);
			return null;
		}

		// It exited right after starting, dependent resources must
		// not go ahead
		if (new Date(FinishedAt) > createdAt) {
			await discard(id, spec, ctx);
			throw new ContainerExited(id, reason);
		}

		if (attempt >= loops) {
			break;
		}

		logger.debug(
			`container ${id} is not running yet (attempt ${attempt}/${loops})`,
		);
		await delay(opts.pollIntervalMs);
		details = await inspect(client, id);
	}

	if (details == null) {
		return null;
	}

	if (!details.State.Running && mustRun) {
		await discard(id, spec, ctx);
		throw new ContainerNotRunning(id, loops);
	}

	return { id, state: toState(details) };
}

async function connect(
	id: string,
	{ name, aliases }: NetworkAttachment,
	{ client, logger }: Context,
) {
	logger.debug(`connecting container ${id} to network '${name}'`);
	try {
		await client.connectNetwork(name, { container: id, aliases });
	} catch (e) {
		throw new PartialFailure(
			id,
			`unable to connect container ${id} to network '${name}'`,
			e,
		);
	}
}

async function upload(id: string, u: Upload, { client, logger }: Context) {
	logger.debug(`uploading ${u.file} to container ${id}`);
	try {
		await client.uploadArchive(id, '/', await toArchive(u));
	} catch (e) {
		throw new PartialFailure(
			id,
			`unable to upload ${u.file} to container ${id}`,
			e,
		);
	}
}

/**
 * Containers are created, attached to their networks, given their
 * files and started as one operation. Creation waits for the
 * container to settle before reporting success.
 *
 * A failure after the container exists is reported as a
 * `PartialFailure` holding the container ID. The container is left
 * in place.
 */
export const Container = Resource.of<ContainerSpec, ContainerState>({
	kind: 'container',
	description: (spec) => `container '${spec.name}'`,
	validate,
	inPlace: ['destroyGraceSeconds', 'mustRun'],
	compare: {
		ports: (a, b) => sameElements(hashPort, a.ports, b.ports),
		volumes: (a, b) => sameElements(hashVolume, a.volumes, b.volumes),
		extraHosts: (a, b) =>
			sameElements(hashExtraHost, a.extraHosts, b.extraHosts),
		networks: (a, b) =>
			sameElements(hashNetworkAttachment, a.networks, b.networks),
		upload: (a, b) => sameElements(hashUpload, a.upload, b.upload),
		capabilities: (a, b) =>
			hashCapabilities(a.capabilities ?? {}) ===
			hashCapabilities(b.capabilities ?? {}),
		env: (a, b) => sameElements(identity, a.env, b.env),
		links: (a, b) => sameElements(identity, a.links, b.links),
		dns: (a, b) => sameElements(identity, a.dns, b.dns),
		dnsOpts: (a, b) => sameElements(identity, a.dnsOpts, b.dnsOpts),
		dnsSearch: (a, b) => sameElements(identity, a.dnsSearch, b.dnsSearch),
	},
	async create(spec, ctx) {
		const { client, logger } = ctx;

		const images = ImageIndex.from(await client.listImages());
		const image = images.resolve(spec.image);
		if (image == null) {
			throw new ImageNotFound(spec.image);
		}

		let id: string;
		try {
			id = await client.createContainer(toCreateRequest(spec, image));
		} catch (e) {
			throw new RuntimeError(`unable to create container '${spec.name}'`, e);
		}
		logger.debug(`created container ${id} from image ${image}`);

		for (const network of HashSet.of<NetworkAttachment>(
			hashNetworkAttachment,
			spec.networks,
		)) {
			await connect(id, network, ctx);
		}

		for (const u of HashSet.of<Upload>(hashUpload, spec.upload)) {
			await upload(id, u, ctx);
		}

		const createdAt = new Date();
		try {
			await client.startContainer(id);
		} catch (e) {
			throw new PartialFailure(id, `unable to start container ${id}`, e);
		}

		const observed = await observe(id, spec, createdAt, ctx);
		if (observed == null) {
			throw new NotFound('container', id);
		}
		return observed;
	},
	read: (id, spec, ctx) => observe(id, spec, null, ctx),
	delete: remove,
	async exists(id, _, { client }) {
		return (await find(client, id)) != null;
	},
});
