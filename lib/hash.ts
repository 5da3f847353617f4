import { createHash } from 'crypto';

import type { ReadOnly } from './readonly';
import type {
	Capabilities,
	ExtraHost,
	IpamConfig,
	NetworkAttachment,
	Port,
	Upload,
	VolumeMount,
} from './types';

type Value =
	| string
	| number
	| boolean
	| undefined
	| ReadonlyArray<string>
	| ReadOnly<Record<string, string>>;

type Field = [name: string, value: Value];

function isList(v: Value): v is ReadonlyArray<string> {
	return Array.isArray(v);
}

// Lists are sets, so they are sorted and de-duplicated. Map entries
// are sorted by key so the output does not depend on insertion order
function canonical(v: Value): unknown {
	if (isList(v)) {
		return [...new Set(v)].sort();
	}
	if (typeof v === 'object') {
		return Object.keys(v)
			.sort()
			.map((k) => [k, v[k]]);
	}
	return v;
}

/**
 * Serialize a record as a JSON list of `[name, value]` pairs in a fixed
 * order. Absent fields are left out of the output.
 */
export function serialize(fields: Field[]): string {
	return JSON.stringify(
		fields
			.filter(([, v]) => v !== undefined)
			.map(([k, v]) => [k, canonical(v)]),
	);
}

export function hashString(s: string): string {
	return createHash('sha256').update(s).digest('hex');
}

export function hashPort(p: ReadOnly<Port>): string {
	return hashString(
		serialize([
			['internal', p.internal],
			['external', p.external],
			['ip', p.ip],
			['protocol', p.protocol ?? 'tcp'],
		]),
	);
}

export function hashVolume(v: ReadOnly<VolumeMount>): string {
	return hashString(
		serialize([
			['from_container', v.fromContainer],
			['container_path', v.containerPath],
			['host_path', v.hostPath],
			['volume_name', v.volumeName],
			['read_only', v.readOnly],
		]),
	);
}

export function hashExtraHost(h: ReadOnly<ExtraHost>): string {
	return hashString(
		serialize([
			['ip', h.ip],
			['host', h.host],
		]),
	);
}

// Added and dropped capabilities are sets themselves
export function hashCapabilities(c: ReadOnly<Capabilities>): string {
	return hashString(
		serialize([
			['add', c.add],
			['drop', c.drop],
		]),
	);
}

export function hashUpload(u: ReadOnly<Upload>): string {
	return hashString(
		serialize([
			['content', u.content],
			['file', u.file],
		]),
	);
}

export function hashNetworkAttachment(n: ReadOnly<NetworkAttachment>): string {
	return hashString(
		serialize([
			['name', n.name],
			['aliases', n.aliases],
		]),
	);
}

export function hashIpamConfig(c: ReadOnly<IpamConfig>): string {
	return hashString(
		serialize([
			['subnet', c.subnet],
			['ip_range', c.ipRange],
			['gateway', c.gateway],
			['aux_address', c.auxAddress],
		]),
	);
}
