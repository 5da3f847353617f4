import { compact } from '../utils/object';

/**
 * TLS material may be given inline, as a string or as raw bytes
 */
export type Material = string | Buffer;

/**
 * Connection fields that a single resource may set to
 * target a different daemon than the provider default
 */
export interface ConnectionOverrides {
	/**
	 * Daemon endpoint, e.g. `unix:///var/run/docker.sock` or `tcp://10.0.0.2:2376`
	 */
	host?: string;

	/**
	 * Logical name of the docker host. Used to locate TLS material
	 * under `{certPath}/{machineName}/`
	 */
	machineName?: string;

	/**
	 * Directory holding one sub-directory of TLS material per machine
	 */
	certPath?: string;

	caMaterial?: Material;
	certMaterial?: Material;
	keyMaterial?: Material;

	caFile?: string;
	certFile?: string;
	keyFile?: string;
}

/**
 * Provider wide connection settings
 */
export interface ProviderSettings extends ConnectionOverrides {
	/**
	 * Check that the daemon responds before handing out a client
	 */
	ping?: boolean;
}

export const DEFAULT_HOST = 'unix:///var/run/docker.sock';
export const DEFAULT_MACHINE_NAME = 'default';

type Env = Record<string, string | undefined>;

function nonEmpty(s: string | undefined): string | undefined {
	return s != null && s.length > 0 ? s : undefined;
}

/**
 * Build provider settings from the environment. Settings passed
 * explicitly take precedence over the environment.
 */
function fromEnv(
	settings: ProviderSettings = {},
	env: Env = process.env,
): ProviderSettings {
	return {
		host: nonEmpty(env.DOCKER_HOST) ?? DEFAULT_HOST,
		machineName: nonEmpty(env.DOCKER_MACHINE_NAME) ?? DEFAULT_MACHINE_NAME,
		certPath: nonEmpty(env.DOCKER_CERT_PATH),
		caMaterial: nonEmpty(env.DOCKER_CA_MATERIAL),
		certMaterial: nonEmpty(env.DOCKER_CERT_MATERIAL),
		keyMaterial: nonEmpty(env.DOCKER_KEY_MATERIAL),
		ping: false,
		...compact(settings),
	};
}

/**
 * Return only the connection fields of a resource spec
 */
function overridesOf(spec: Readonly<ConnectionOverrides>): ConnectionOverrides {
	const {
		host,
		machineName,
		certPath,
		caMaterial,
		certMaterial,
		keyMaterial,
		caFile,
		certFile,
		keyFile,
	} = spec;
	return compact({
		host,
		machineName,
		certPath,
		caMaterial,
		certMaterial,
		keyMaterial,
		caFile,
		certFile,
		keyFile,
	});
}

export const ProviderSettings = {
	fromEnv,
};

export const ConnectionOverrides = {
	of: overridesOf,
};
