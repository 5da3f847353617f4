import type {
	AuthConfig,
	BuildArg,
	ContainerCreateRequest,
	Ulimit,
} from '../client';
import { ConfigurationError } from '../errors';
import { hashExtraHost, hashPort, hashVolume } from '../hash';
import type {
	ContainerSpec,
	ExtraHost,
	Port,
	RegistryAuth,
	Upload,
	VolumeMount,
} from '../types';
import { toTarball } from '../utils/archive';
import { HashSet } from '../utils/hash-set';

const MiB = 1024 * 1024;

export interface PortBinding {
	HostPort: string;
	HostIp?: string;
}

export interface PortConfig {
	exposed: Record<string, object>;
	bindings: Record<string, PortBinding[]>;
}

/**
 * Build the exposed port set and the host bindings for a list of
 * port entries. Only entries with an external port are bound.
 */
export function toPortConfig(ports: Port[]): PortConfig {
	const exposed: Record<string, object> = {};
	const bindings: Record<string, PortBinding[]> = {};
	for (const { internal, external, ip, protocol = 'tcp' } of ports) {
		const key = `${internal}/${protocol}`;
		exposed[key] = {};
		if (external == null) {
			continue;
		}
		const binding: PortBinding = { HostPort: String(external) };
		if (ip != null) {
			binding.HostIp = ip;
		}
		bindings[key] = [...(bindings[key] ?? []), binding];
	}
	return { exposed, bindings };
}

export function toExtraHosts(hosts: ExtraHost[]): string[] {
	return hosts.map(({ host, ip }) => `${host}:${ip}`);
}

export interface VolumeConfig {
	volumes: Record<string, object>;
	binds: string[];
	volumesFrom: string[];
}

/**
 * Sort volume entries into container volumes, bind mounts and
 * containers to inherit volumes from
 */
export function toVolumeConfig(entries: VolumeMount[]): VolumeConfig {
	const res: VolumeConfig = { volumes: {}, binds: [], volumesFrom: [] };
	for (const v of entries) {
		const from = v.fromContainer ?? '';
		const containerPath = v.containerPath ?? '';
		const source = v.volumeName || v.hostPath || '';

		if (from.length === 0 && containerPath.length === 0) {
			throw new ConfigurationError(
				'Volume entry without container path or source container',
			);
		}
		if (from.length > 0 && containerPath.length > 0) {
			throw new ConfigurationError(
				'Both a container and a path specified in a volume entry',
			);
		}

		if (from.length > 0) {
			res.volumesFrom.push(from);
		} else if (source.length > 0) {
			const mode = v.readOnly ? 'ro' : 'rw';
			res.volumes[containerPath] = {};
			res.binds.push(`${source}:${containerPath}:${mode}`);
		} else {
			// anonymous volume
			res.volumes[containerPath] = {};
		}
	}
	return res;
}

export function mibToBytes(mib: number): number {
	return mib * MiB;
}

/**
 * Convert a swap limit in MiB, -1 (unlimited) is passed as is
 */
export function toMemorySwap(mib: number): number {
	return mib > 0 ? mibToBytes(mib) : mib;
}

/**
 * Merge soft and hard limits into one entry per limit name. A name
 * missing from one of the maps gets 0 for that side.
 */
export function toUlimits(
	soft: Record<string, number> = {},
	hard: Record<string, number> = {},
): Ulimit[] {
	const names = [...new Set([...Object.keys(soft), ...Object.keys(hard)])];
	return names.sort().map((Name) => ({
		Name,
		Soft: soft[Name] ?? 0,
		Hard: hard[Name] ?? 0,
	}));
}

export function toBuildArgs(args: Record<string, string> = {}): BuildArg[] {
	return Object.keys(args)
		.sort()
		.map((name) => ({ name, value: args[name] }));
}

/**
 * Index registry credentials by registry host
 */
export function toAuthConfigs(
	entries: RegistryAuth[] = [],
): Record<string, AuthConfig> {
	const configs: Record<string, AuthConfig> = {};
	for (const { registry, username, password } of entries) {
		if (registry in configs) {
			throw new ConfigurationError(
				`duplicate auth entry for registry '${registry}'`,
			);
		}
		configs[registry] = { username, password, serveraddress: registry };
	}
	return configs;
}

/**
 * Pack a single file into an in-memory tar archive
 */
export function toArchive({ content, file }: Upload): Promise<Buffer> {
	return toTarball([{ name: file, content: Buffer.from(content) }]);
}

function nonEmpty<T>(list: T[] | undefined): T[] | undefined {
	return list != null && list.length > 0 ? list : undefined;
}

function nonEmptyMap<T>(
	map: Record<string, T> | undefined,
): Record<string, T> | undefined {
	return map != null && Object.keys(map).length > 0 ? map : undefined;
}

/**
 * Build the container create request for a spec. The image is the
 * reference the spec's image resolved to on the daemon.
 */
export function toCreateRequest(
	spec: ContainerSpec,
	image: string,
): ContainerCreateRequest {
	const ports = toPortConfig(
		HashSet.of<Port>(hashPort, spec.ports).values(),
	);
	const volumes = toVolumeConfig(
		HashSet.of<VolumeMount>(hashVolume, spec.volumes).values(),
	);
	const extraHosts = HashSet.of<ExtraHost>(
		hashExtraHost,
		spec.extraHosts,
	).values();
	const { add = [], drop = [] } = spec.capabilities ?? {};

	return {
		name: spec.name,
		Image: image,
		Hostname: spec.hostname,
		Domainname: spec.domainname,
		User: spec.user,
		Env: nonEmpty(spec.env),
		Cmd: nonEmpty(spec.command),
		Entrypoint: nonEmpty(spec.entrypoint),
		ExposedPorts: nonEmptyMap(ports.exposed),
		Volumes: nonEmptyMap(volumes.volumes),
		Labels: nonEmptyMap(spec.labels),
		HostConfig: {
			Privileged: spec.privileged ?? false,
			PublishAllPorts: spec.publishAllPorts ?? false,
			RestartPolicy: {
				Name: spec.restart ?? 'no',
				MaximumRetryCount: spec.maxRetryCount ?? 0,
			},
			LogConfig: {
				Type: spec.logDriver ?? 'json-file',
				Config: spec.logOpts ?? {},
			},
			PortBindings: nonEmptyMap(ports.bindings),
			ExtraHosts: nonEmpty(toExtraHosts(extraHosts)),
			Binds: nonEmpty(volumes.binds),
			VolumesFrom: nonEmpty(volumes.volumesFrom),
			CapAdd: nonEmpty(add),
			CapDrop: nonEmpty(drop),
			Dns: nonEmpty(spec.dns),
			DnsOptions: nonEmpty(spec.dnsOpts),
			DnsSearch: nonEmpty(spec.dnsSearch),
			Links: nonEmpty(spec.links),
			Memory: spec.memory != null ? mibToBytes(spec.memory) : undefined,
			MemorySwap:
				spec.memorySwap != null ? toMemorySwap(spec.memorySwap) : undefined,
			CpuShares: spec.cpuShares,
			NetworkMode: spec.networkMode,
		},
	};
}
