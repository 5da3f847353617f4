import type { ConnectionOverrides } from './connection/settings';

/**
 * Credentials for a registry, used when pulling, building
 * and pushing images
 */
export interface RegistryAuth {
	registry: string;
	username: string;
	password: string;
}

export interface ImageSpec extends ConnectionOverrides {
	/**
	 * Registry host, e.g. `registry.example.com:5000`. The image
	 * identity is prefixed with it when given.
	 */
	registry?: string;
	name: string;

	/**
	 * Defaults to `latest`, an empty tag leaves the reference untagged
	 */
	tag?: string;

	/**
	 * Acquisition modes. At most one of these may be set
	 */
	pull?: boolean;
	loadPath?: string;
	buildLocalPath?: string;
	buildRemotePath?: string;

	dockerfile?: string;
	noCache?: boolean;
	buildArgs?: Record<string, string>;
	labels?: Record<string, string>;
	memory?: number;
	memswap?: number;
	cpuShares?: number;
	cpuQuota?: number;
	cpuPeriod?: number;
	cpuSetCpus?: string;
	networkMode?: string;
	cgroupParent?: string;
	ulimitSoft?: Record<string, number>;
	ulimitHard?: Record<string, number>;

	/**
	 * Timeout in seconds for pull, build and push calls
	 */
	timeout?: number;

	push?: boolean;

	/**
	 * Leave the image on the daemon when the resource is deleted
	 */
	keep?: boolean;

	auth?: RegistryAuth[];
}

export interface ImageState {
	/**
	 * Content ID assigned by the daemon
	 */
	imageId: string;
	parent: string;
	comment: string;
	author: string;
	dockerVersion: string;
	os: string;
	architecture: string;
	size: number;
	virtualSize: number;

	/**
	 * Creation time in seconds since the epoch
	 */
	createdAt: number;
	labels: Record<string, string>;
	digests: string[];
	allTags: string[];
}

export type Protocol = 'tcp' | 'udp' | 'sctp';

export interface Port {
	internal: number;
	external?: number;
	ip?: string;

	/**
	 * Defaults to `tcp`
	 */
	protocol?: Protocol;
}

/**
 * A volume entry is one of
 * - a named volume or host path bound to `containerPath`
 * - the volumes of another container (`fromContainer`)
 * - an anonymous volume at `containerPath`
 */
export interface VolumeMount {
	fromContainer?: string;
	containerPath?: string;
	hostPath?: string;
	volumeName?: string;
	readOnly?: boolean;
}

export interface ExtraHost {
	host: string;
	ip: string;
}

export interface Capabilities {
	add?: string[];
	drop?: string[];
}

export interface NetworkAttachment {
	name: string;
	aliases?: string[];
}

/**
 * A file written into the container before it is started
 */
export interface Upload {
	content: string;
	file: string;
}

export type RestartPolicy = 'no' | 'on-failure' | 'always' | 'unless-stopped';

export type LogDriver = 'json-file' | 'syslog' | 'journald' | 'gelf' | 'fluentd';

export interface ContainerSpec extends ConnectionOverrides {
	name: string;
	image: string;
	hostname?: string;
	domainname?: string;
	entrypoint?: string[];
	command?: string[];
	user?: string;

	ports?: Port[];
	volumes?: VolumeMount[];
	extraHosts?: ExtraHost[];
	env?: string[];
	links?: string[];
	networks?: NetworkAttachment[];
	capabilities?: Capabilities;
	dns?: string[];
	dnsOpts?: string[];
	dnsSearch?: string[];
	labels?: Record<string, string>;
	upload?: Upload[];

	privileged?: boolean;
	publishAllPorts?: boolean;
	restart?: RestartPolicy;
	maxRetryCount?: number;

	/**
	 * Memory limit in MiB
	 */
	memory?: number;

	/**
	 * Memory plus swap limit in MiB, -1 for unlimited swap
	 */
	memorySwap?: number;
	cpuShares?: number;
	logDriver?: LogDriver;
	logOpts?: Record<string, string>;
	networkMode?: string;

	/**
	 * Seconds to wait for the container to stop before it is removed
	 */
	destroyGraceSeconds?: number;

	/**
	 * The container is expected to be running. Defaults to true
	 */
	mustRun?: boolean;
}

export interface ContainerState {
	ipAddress?: string;
	ipPrefixLength?: number;
	gateway?: string;
	bridge?: string;
}

export interface IpamConfig {
	subnet?: string;
	ipRange?: string;
	gateway?: string;
	auxAddress?: Record<string, string>;
}

export interface NetworkSpec extends ConnectionOverrides {
	name: string;
	checkDuplicate?: boolean;
	driver?: string;
	options?: Record<string, string>;
	internal?: boolean;
	ipamDriver?: string;
	ipamConfig?: IpamConfig[];
}

export interface NetworkState {
	name: string;
	scope: string;
	driver: string;
	options: Record<string, string>;
	internal: boolean;
}

export interface VolumeSpec extends ConnectionOverrides {
	/**
	 * The daemon assigns a name if left empty
	 */
	name?: string;
	driver?: string;
	driverOpts?: Record<string, string>;
}

export interface VolumeState {
	name: string;
	driver: string;
	mountpoint: string;
}

/**
 * The identity assigned to a resource together with the
 * state observed on the daemon
 */
export interface Observed<TState> {
	id: string;
	state: TState;
}
