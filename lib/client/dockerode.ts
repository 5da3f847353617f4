import Docker from 'dockerode';
import { createReadStream, promises as fs } from 'fs';
import { Readable } from 'stream';

import { NotFound } from '../errors';
import type { Logger } from '../logger';
import { NullLogger } from '../logger';
import { toTarball } from '../utils/archive';
import { compact } from '../utils/object';
import type {
	BuildRequest,
	ContainerCreateRequest,
	ContainerDetails,
	ContainerSummary,
	DockerClient,
	ImageDetails,
	ImageSummary,
	IpamConfigRequest,
	NetworkConnectRequest,
	NetworkCreateRequest,
	NetworkDetails,
	PullRequest,
	PushRequest,
	VolumeCreateRequest,
	VolumeDetails,
} from './types';

interface StatusError extends Error {
	statusCode: number;
}

function isStatusError(x: unknown): x is StatusError {
	return (
		x instanceof Error && 'statusCode' in x && typeof x.statusCode === 'number'
	);
}

/**
 * Turn a 404 from the daemon into a `NotFound` error
 */
async function orNotFound<T>(
	kind: string,
	ref: string,
	p: Promise<T>,
): Promise<T> {
	try {
		return await p;
	} catch (e) {
		if (isStatusError(e) && e.statusCode === 404) {
			throw new NotFound(kind, ref, { cause: e });
		}
		throw e;
	}
}

interface Progress {
	status?: string;
	stream?: string;
	error?: string;
}

function toProgress(event: unknown): Progress {
	if (typeof event !== 'object' || event == null) {
		return {};
	}

	const str = (key: string) => {
		const v: unknown = Reflect.get(event, key);
		return typeof v === 'string' ? v : undefined;
	};
	return { status: str('status'), stream: str('stream'), error: str('error') };
}

function toReadable(stream: NodeJS.ReadableStream): Readable {
	return stream instanceof Readable ? stream : new Readable().wrap(stream);
}

/**
 * Aborts a request once the daemon has sent nothing for `timeoutMs`.
 * Every progress message re-arms the timer.
 */
class InactivityTimer {
	private readonly controller = new AbortController();
	private timer?: NodeJS.Timeout;

	constructor(private readonly timeoutMs: number) {
		this.touch();
	}

	get signal(): AbortSignal {
		return this.controller.signal;
	}

	touch(): void {
		clearTimeout(this.timer);
		this.timer = setTimeout(
			() =>
				this.controller.abort(
					new Error(`no progress from the daemon in ${this.timeoutMs}ms`),
				),
			this.timeoutMs,
		);
	}

	clear(): void {
		clearTimeout(this.timer);
	}
}

function inactivityTimer(timeoutMs?: number): InactivityTimer | undefined {
	return timeoutMs != null && timeoutMs > 0
		? new InactivityTimer(timeoutMs)
		: undefined;
}

// The dockerode typings describe IPAM entries as flat string maps
// but the daemon also takes a map of auxiliary addresses
function toIpamEntry(c: IpamConfigRequest): Record<string, string> {
	const entry: Record<string, string> = {};
	if (c.Subnet != null) {
		entry.Subnet = c.Subnet;
	}
	if (c.IPRange != null) {
		entry.IPRange = c.IPRange;
	}
	if (c.Gateway != null) {
		entry.Gateway = c.Gateway;
	}
	if (c.AuxiliaryAddresses != null) {
		Object.assign(entry, { AuxiliaryAddresses: c.AuxiliaryAddresses });
	}
	return entry;
}

// Query parameters the build endpoint takes that are missing from
// the dockerode typings, or typed differently there
interface BuildQueryExtras {
	cpusetcpus?: string;
	ulimits?: string;
	cgroupparent?: string;
	remote?: string;
	abortSignal?: AbortSignal;
}

function toBuildOptions(
	req: BuildRequest,
	abortSignal?: AbortSignal,
): Docker.ImageBuildOptions {
	const options: Docker.ImageBuildOptions = compact({
		t: req.name,
		dockerfile: req.dockerfile,
		nocache: req.noCache,
		memory: req.memory,
		memswap: req.memswap,
		cpushares: req.cpuShares,
		cpuquota: req.cpuQuota,
		cpuperiod: req.cpuPeriod,
		networkmode: req.networkMode,
		labels: req.labels,
		buildargs: Object.fromEntries(
			req.buildArgs.map(({ name, value }) => [name, value]),
		),
		registryconfig: Object.fromEntries(
			Object.entries(req.authConfigs).map(([registry, a]) => [
				registry,
				{ username: a.username, password: a.password },
			]),
		),
	});
	const extras: BuildQueryExtras = compact({
		cpusetcpus: req.cpuSetCpus,
		cgroupparent: req.cgroupParent,
		// The query string encoder does not serialize arrays as JSON
		ulimits: JSON.stringify(req.ulimits),
		remote: req.remote,
		abortSignal,
	});
	Object.assign(options, extras);
	return options;
}

// dockerode resolves a Volume handle on create, not the response
// body its typings describe
function handleName(handle: unknown): string | undefined {
	if (typeof handle !== 'object' || handle == null) {
		return;
	}
	const name: unknown = Reflect.get(handle, 'name');
	return typeof name === 'string' ? name : undefined;
}

/**
 * DockerClient on top of dockerode
 */
export class DockerodeClient implements DockerClient {
	constructor(
		private readonly docker: Docker,
		private readonly logger: Logger = NullLogger,
	) {}

	static from(
		options: Docker.DockerOptions,
		logger: Logger = NullLogger,
	): DockerodeClient {
		return new DockerodeClient(new Docker(options), logger);
	}

	async ping(): Promise<void> {
		await this.docker.ping();
	}

	async listImages(): Promise<ImageSummary[]> {
		const images = await this.docker.listImages();
		return images.map((i) => ({ Id: i.Id, RepoTags: i.RepoTags ?? [] }));
	}

	async inspectImage(ref: string): Promise<ImageDetails> {
		const info = await orNotFound(
			'image',
			ref,
			this.docker.getImage(ref).inspect(),
		);
		return {
			Id: info.Id,
			Parent: info.Parent,
			Comment: info.Comment,
			Author: info.Author,
			DockerVersion: info.DockerVersion,
			Os: info.Os,
			Architecture: info.Architecture,
			Size: info.Size,
			VirtualSize: info.VirtualSize ?? info.Size,
			Created: info.Created,
			Labels: info.Config?.Labels ?? {},
			RepoTags: info.RepoTags ?? [],
			RepoDigests: info.RepoDigests ?? [],
		};
	}

	/**
	 * Follow a progress stream from the daemon.
	 *
	 * The daemon reports pull, build and push failures as a message in
	 * the stream with a 200 status code, the promise rejects on the
	 * first of those messages. With a timeout, the request is aborted
	 * once the stream stalls for that long.
	 */
	private async follow(
		open: (abortSignal?: AbortSignal) => Promise<NodeJS.ReadableStream>,
		onProgress: (p: Progress) => void,
		timeoutMs?: number,
	): Promise<void> {
		const timer = inactivityTimer(timeoutMs);
		const signal = timer?.signal;
		try {
			const stream = await open(signal);
			await new Promise<void>((resolve, reject) => {
				const onAbort = () => reject(signal?.reason);
				if (signal?.aborted) {
					onAbort();
					return;
				}
				signal?.addEventListener('abort', onAbort, { once: true });

				this.docker.modem.followProgress(
					toReadable(stream),
					(err: unknown) => {
						signal?.removeEventListener('abort', onAbort);
						if (err != null) {
							reject(err);
							return;
						}
						resolve();
					},
					(event: unknown) => {
						timer?.touch();
						const p = toProgress(event);
						if (p.error != null) {
							reject(new Error(p.error));
							return;
						}
						onProgress(p);
					},
				);
			});
		} finally {
			timer?.clear();
		}
	}

	async pullImage({
		repository,
		tag,
		auth,
		timeoutMs,
	}: PullRequest): Promise<void> {
		const ref = tag ? `${repository}:${tag}` : repository;
		await this.follow(
			(abortSignal) =>
				this.docker.pull(ref, {
					...(auth && { authconfig: auth }),
					...(abortSignal && { abortSignal }),
				}),
			(p) => p.status && this.logger.debug(`pull ${ref}: ${p.status}`),
			timeoutMs,
		);
	}

	async loadImage(archivePath: string): Promise<void> {
		// Fail early with the fs error rather than a broken request
		await fs.access(archivePath);
		const archive = createReadStream(archivePath);
		await this.follow(
			async () => {
				try {
					return await this.docker.loadImage(archive);
				} catch (e) {
					archive.destroy();
					throw e;
				}
			},
			(p) => p.stream && this.logger.debug(p.stream.trim()),
		);
	}

	async buildImage(req: BuildRequest): Promise<void> {
		let context: Docker.ImageBuildContext | NodeJS.ReadableStream;
		if (req.contextDir != null) {
			context = {
				context: req.contextDir,
				src: await fs.readdir(req.contextDir),
			};
		} else {
			// Remote builds still need a request body
			context = Readable.from([await toTarball([])]);
		}

		await this.follow(
			(abortSignal) =>
				this.docker.buildImage(context, toBuildOptions(req, abortSignal)),
			(p) => p.stream && this.logger.debug(p.stream.trimEnd()),
			req.timeoutMs,
		);
	}

	async pushImage({ name, tag, auth, timeoutMs }: PushRequest): Promise<void> {
		await this.follow(
			(abortSignal) =>
				this.docker.getImage(name).push({
					...(tag && { tag }),
					// The daemon expects an auth header even for anonymous pushes
					authconfig: auth ?? { username: '', password: '', serveraddress: '' },
					...(abortSignal && { abortSignal }),
				}),
			(p) => p.status && this.logger.debug(`push ${name}: ${p.status}`),
			timeoutMs,
		);
	}

	async removeImage(ref: string, opts: { force: boolean }): Promise<void> {
		await orNotFound(
			'image',
			ref,
			this.docker.getImage(ref).remove({ force: opts.force }),
		);
	}

	async listContainers(): Promise<ContainerSummary[]> {
		const containers = await this.docker.listContainers({ all: true });
		return containers.map((c) => ({
			Id: c.Id,
			Names: c.Names,
			State: c.State,
		}));
	}

	async createContainer(req: ContainerCreateRequest): Promise<string> {
		const container = await this.docker.createContainer(req);
		return container.id;
	}

	async startContainer(id: string): Promise<void> {
		await orNotFound('container', id, this.docker.getContainer(id).start());
	}

	async stopContainer(id: string, timeoutSeconds: number): Promise<void> {
		try {
			await orNotFound(
				'container',
				id,
				this.docker.getContainer(id).stop({ t: timeoutSeconds }),
			);
		} catch (e) {
			// 304 means the container was already stopped
			if (isStatusError(e) && e.statusCode === 304) {
				return;
			}
			throw e;
		}
	}

	async removeContainer(
		id: string,
		opts: { force: boolean; removeVolumes: boolean },
	): Promise<void> {
		await orNotFound(
			'container',
			id,
			this.docker
				.getContainer(id)
				.remove({ force: opts.force, v: opts.removeVolumes }),
		);
	}

	async inspectContainer(id: string): Promise<ContainerDetails> {
		const info = await orNotFound(
			'container',
			id,
			this.docker.getContainer(id).inspect(),
		);
		const state = info.State;
		const net = info.NetworkSettings;
		return {
			Id: info.Id,
			Name: info.Name,
			State: {
				Running: state.Running,
				ExitCode: state.ExitCode,
				Error: state.Error,
				StartedAt: state.StartedAt,
				FinishedAt: state.FinishedAt,
			},
			...(net != null && {
				NetworkSettings: {
					IPAddress: net.IPAddress,
					IPPrefixLen: net.IPPrefixLen,
					Gateway: net.Gateway,
					Bridge: net.Bridge,
				},
			}),
		};
	}

	async uploadArchive(
		id: string,
		path: string,
		archive: Buffer,
	): Promise<void> {
		await orNotFound(
			'container',
			id,
			this.docker.getContainer(id).putArchive(archive, { path }),
		);
	}

	async connectNetwork(
		network: string,
		{ container, aliases }: NetworkConnectRequest,
	): Promise<void> {
		await orNotFound(
			'network',
			network,
			this.docker.getNetwork(network).connect({
				Container: container,
				...(aliases &&
					aliases.length > 0 && { EndpointConfig: { Aliases: aliases } }),
			}),
		);
	}

	async createNetwork(req: NetworkCreateRequest): Promise<NetworkDetails> {
		const { IPAM, ...rest } = req;
		const options = {
			...compact(rest),
			Name: req.Name,
			...(IPAM && {
				IPAM: {
					Driver: IPAM.Driver ?? 'default',
					Config: (IPAM.Config ?? []).map(toIpamEntry),
				},
			}),
		};
		const network = await this.docker.createNetwork(options);
		return this.inspectNetwork(network.id);
	}

	async inspectNetwork(id: string): Promise<NetworkDetails> {
		const info: Docker.NetworkInspectInfo = await orNotFound(
			'network',
			id,
			this.docker.getNetwork(id).inspect(),
		);
		return {
			Id: info.Id,
			Name: info.Name,
			Scope: info.Scope,
			Driver: info.Driver,
			Internal: info.Internal,
			Options: info.Options ?? {},
		};
	}

	async removeNetwork(id: string): Promise<void> {
		await orNotFound('network', id, this.docker.getNetwork(id).remove());
	}

	async createVolume(req: VolumeCreateRequest): Promise<VolumeDetails> {
		const created: unknown = await this.docker.createVolume(compact(req));
		const name = handleName(created);
		if (name == null) {
			throw new Error('the daemon did not report the name of the new volume');
		}
		return this.inspectVolume(name);
	}

	async inspectVolume(name: string): Promise<VolumeDetails> {
		const info = await orNotFound(
			'volume',
			name,
			this.docker.getVolume(name).inspect(),
		);
		return { Name: info.Name, Driver: info.Driver, Mountpoint: info.Mountpoint };
	}

	async removeVolume(name: string): Promise<void> {
		await orNotFound('volume', name, this.docker.getVolume(name).remove());
	}
}
