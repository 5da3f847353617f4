import type * as Docker from 'dockerode';

/**
 * Credentials sent to the daemon for registry operations
 */
export interface AuthConfig {
	username: string;
	password: string;
	serveraddress: string;
}

export interface Ulimit {
	Name: string;
	Soft: number;
	Hard: number;
}

export interface BuildArg {
	name: string;
	value: string;
}

export interface PullRequest {
	repository: string;
	tag?: string;
	auth?: AuthConfig;
	timeoutMs?: number;
}

export interface PushRequest {
	/**
	 * Repository name, including the registry if any
	 */
	name: string;
	tag?: string;
	auth?: AuthConfig;
	timeoutMs?: number;
}

export interface BuildRequest {
	/**
	 * Tag for the resulting image
	 */
	name: string;

	/**
	 * Exactly one of `contextDir` and `remote` is set
	 */
	contextDir?: string;
	remote?: string;

	dockerfile?: string;
	noCache: boolean;
	memory?: number;
	memswap?: number;
	cpuShares?: number;
	cpuQuota?: number;
	cpuPeriod?: number;
	cpuSetCpus?: string;
	networkMode?: string;
	cgroupParent?: string;
	labels: Record<string, string>;
	buildArgs: BuildArg[];
	ulimits: Ulimit[];

	/**
	 * Credentials per registry host
	 */
	authConfigs: Record<string, AuthConfig>;
	timeoutMs?: number;
}

export interface ImageSummary {
	Id: string;
	RepoTags: string[];
}

export interface ImageDetails {
	Id: string;
	Parent: string;
	Comment: string;
	Author: string;
	DockerVersion: string;
	Os: string;
	Architecture: string;
	Size: number;
	VirtualSize: number;
	Created: string;
	Labels: Record<string, string>;
	RepoTags: string[];
	RepoDigests: string[];
}

export interface ContainerSummary {
	Id: string;
	Names: string[];
	State: string;
}

export interface ContainerDetails {
	Id: string;
	Name: string;
	State: {
		Running: boolean;
		ExitCode: number;
		Error: string;
		StartedAt: string;
		FinishedAt: string;
	};
	NetworkSettings?: {
		IPAddress: string;
		IPPrefixLen: number;
		Gateway: string;
		Bridge: string;
	};
}

/**
 * Container create options, in the shape of the docker API
 */
export type ContainerCreateRequest = Docker.ContainerCreateOptions;

export interface NetworkConnectRequest {
	container: string;
	aliases?: string[];
}

export interface IpamConfigRequest {
	Subnet?: string;
	IPRange?: string;
	Gateway?: string;
	AuxiliaryAddresses?: Record<string, string>;
}

export interface NetworkCreateRequest {
	Name: string;
	CheckDuplicate?: boolean;
	Driver?: string;
	Internal?: boolean;
	Options?: Record<string, string>;
	IPAM?: {
		Driver?: string;
		Config?: IpamConfigRequest[];
	};
}

export interface NetworkDetails {
	Id: string;
	Name: string;
	Scope: string;
	Driver: string;
	Internal: boolean;
	Options: Record<string, string>;
}

export interface VolumeCreateRequest {
	Name?: string;
	Driver?: string;
	DriverOpts?: Record<string, string>;
}

export interface VolumeDetails {
	Name: string;
	Driver: string;
	Mountpoint: string;
}

/**
 * The operations the reconcilers need from the docker daemon.
 *
 * Every lookup, removal or update of an object that does not
 * exist rejects with `NotFound`. Any other failure is passed
 * through as is.
 */
export interface DockerClient {
	ping(): Promise<void>;

	listImages(): Promise<ImageSummary[]>;
	inspectImage(ref: string): Promise<ImageDetails>;
	pullImage(req: PullRequest): Promise<void>;
	loadImage(archivePath: string): Promise<void>;
	buildImage(req: BuildRequest): Promise<void>;
	pushImage(req: PushRequest): Promise<void>;
	removeImage(ref: string, opts: { force: boolean }): Promise<void>;

	/**
	 * List all containers, including stopped ones
	 */
	listContainers(): Promise<ContainerSummary[]>;
	createContainer(req: ContainerCreateRequest): Promise<string>;
	startContainer(id: string): Promise<void>;
	stopContainer(id: string, timeoutSeconds: number): Promise<void>;
	removeContainer(
		id: string,
		opts: { force: boolean; removeVolumes: boolean },
	): Promise<void>;
	inspectContainer(id: string): Promise<ContainerDetails>;

	/**
	 * Extract a tar archive into the container filesystem at `path`
	 */
	uploadArchive(id: string, path: string, archive: Buffer): Promise<void>;
	connectNetwork(network: string, req: NetworkConnectRequest): Promise<void>;

	createNetwork(req: NetworkCreateRequest): Promise<NetworkDetails>;
	inspectNetwork(id: string): Promise<NetworkDetails>;
	removeNetwork(id: string): Promise<void>;

	createVolume(req: VolumeCreateRequest): Promise<VolumeDetails>;
	inspectVolume(name: string): Promise<VolumeDetails>;
	removeVolume(name: string): Promise<void>;
}
