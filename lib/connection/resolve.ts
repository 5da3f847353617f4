import { promises as fs } from 'fs';
import * as path from 'path';

import {
	ConfigurationError,
	ConnectionDeferred,
	IncompleteTlsConfiguration,
} from '../errors';
import type {
	ConnectionOverrides,
	Material,
	ProviderSettings,
} from './settings';

export interface TlsMaterial {
	readonly ca: Buffer;
	readonly cert: Buffer;
	readonly key: Buffer;
}

/**
 * A fully merged endpoint and credential bundle. Resolved connections
 * are frozen and can be shared between concurrent operations.
 */
export interface ResolvedConnection {
	readonly host: string;
	readonly machineName: string;
	readonly ping: boolean;
	readonly tls?: TlsMaterial;
}

export type Resolution =
	| { deferred: false; connection: ResolvedConnection }
	| { deferred: true; reason: string };

const SCHEMES = ['unix:', 'npipe:', 'tcp:', 'http:', 'https:'];

type Credential = 'ca' | 'cert' | 'key';

const CREDENTIALS: Array<{
	name: Credential;
	description: string;
	material: 'caMaterial' | 'certMaterial' | 'keyMaterial';
	file: 'caFile' | 'certFile' | 'keyFile';
}> = [
	{
		name: 'ca',
		description: 'CA certificate',
		material: 'caMaterial',
		file: 'caFile',
	},
	{
		name: 'cert',
		description: 'client certificate',
		material: 'certMaterial',
		file: 'certFile',
	},
	{
		name: 'key',
		description: 'client key',
		material: 'keyMaterial',
		file: 'keyFile',
	},
];

function isSet(s: string | undefined): s is string {
	return s != null && s.length > 0;
}

function toBuffer(m: Material | undefined): Buffer | undefined {
	if (m == null) {
		return;
	}
	const b = typeof m === 'string' ? Buffer.from(m) : m;
	return b.length > 0 ? b : undefined;
}

function isErrnoException(e: unknown): e is NodeJS.ErrnoException {
	return e instanceof Error && 'code' in e;
}

/**
 * Check that the endpoint is a URI with a supported scheme
 */
export function parseHost(host: string): URL {
	let url: URL;
	try {
		url = new URL(host);
	} catch (e) {
		throw new ConfigurationError(`invalid docker host '${host}'`, {
			cause: e,
		});
	}

	if (!SCHEMES.includes(url.protocol)) {
		throw new ConfigurationError(
			`unsupported scheme '${url.protocol}' for docker host '${host}'`,
		);
	}
	return url;
}

async function readExplicit(
	file: string,
	description: string,
): Promise<Buffer> {
	try {
		return await fs.readFile(file);
	} catch (e) {
		throw new ConfigurationError(`error reading ${description} file`, {
			cause: e,
		});
	}
}

// A missing file in the conventional location is not an error, the
// credential is just not given
async function readOptional(
	file: string,
	description: string,
): Promise<Buffer | undefined> {
	try {
		const contents = await fs.readFile(file);
		return contents.length > 0 ? contents : undefined;
	} catch (e) {
		if (isErrnoException(e) && e.code === 'ENOENT') {
			return;
		}
		throw new ConfigurationError(`error reading ${description} file`, {
			cause: e,
		});
	}
}

async function conventionalDir(
	certPath: string,
	machineName: string,
): Promise<string> {
	const dir = path.join(certPath, machineName);
	let isDir: boolean;
	try {
		isDir = (await fs.stat(dir)).isDirectory();
	} catch (e) {
		throw new ConfigurationError(
			`error reading certificate directory '${dir}'`,
			{ cause: e },
		);
	}
	if (!isDir) {
		throw new ConfigurationError(
			`certificate path '${dir}' is not a directory`,
		);
	}
	return dir;
}

/**
 * Merge the resource overrides over the provider settings and load
 * the TLS material the result points to.
 *
 * For each credential the first of the following wins
 * - inline material
 * - an explicit file
 * - `{certPath}/{machineName}/{ca,cert,key}.pem`
 *
 * The result is deferred if the provider has not been given a host
 * or machine name yet. Malformed configuration throws a
 * `ConfigurationError`.
 */
export async function resolve(
	base: Readonly<ProviderSettings>,
	overrides: Readonly<ConnectionOverrides> = {},
): Promise<Resolution> {
	const host = isSet(overrides.host) ? overrides.host : base.host;
	const machineName = isSet(overrides.machineName)
		? overrides.machineName
		: base.machineName;

	if (!isSet(host) || !isSet(machineName)) {
		const missing = !isSet(host) ? 'host' : 'machine name';
		const overridden = Object.values(overrides).some(
			(v) => v != null && v.length > 0,
		);
		if (overridden) {
			throw new ConfigurationError(
				`resource connection settings are missing a ${missing}`,
			);
		}
		return { deferred: true, reason: `no docker ${missing} configured` };
	}

	parseHost(host);

	const certPath = isSet(overrides.certPath)
		? overrides.certPath
		: base.certPath;
	const dir = isSet(certPath)
		? await conventionalDir(certPath, machineName)
		: undefined;

	const material: Partial<Record<Credential, Buffer>> = {};
	for (const { name, description, material: m, file: f } of CREDENTIALS) {
		const inline = toBuffer(overrides[m]) ?? toBuffer(base[m]);
		if (inline != null) {
			material[name] = inline;
			continue;
		}

		const file = isSet(overrides[f]) ? overrides[f] : base[f];
		if (isSet(file)) {
			material[name] = toBuffer(await readExplicit(file, description));
			continue;
		}

		if (dir != null) {
			material[name] = await readOptional(
				path.join(dir, `${name}.pem`),
				description,
			);
		}
	}

	const { ca, cert, key } = material;
	const present = [ca, cert, key].filter((m) => m != null);
	if (present.length > 0 && (ca == null || cert == null || key == null)) {
		throw new IncompleteTlsConfiguration(
			CREDENTIALS.filter(({ name }) => material[name] == null).map(
				({ description }) => description,
			),
		);
	}

	const connection: ResolvedConnection = {
		host,
		machineName,
		ping: base.ping ?? false,
		...(ca != null &&
			cert != null &&
			key != null && { tls: Object.freeze({ ca, cert, key }) }),
	};

	return { deferred: false, connection: Object.freeze(connection) };
}

/**
 * Like `resolve` but throws `ConnectionDeferred` if there is not
 * enough configuration to connect
 */
export async function resolveOrDefer(
	base: Readonly<ProviderSettings>,
	overrides: Readonly<ConnectionOverrides> = {},
): Promise<ResolvedConnection> {
	const res = await resolve(base, overrides);
	if (res.deferred) {
		throw new ConnectionDeferred(res.reason);
	}
	return res.connection;
}
