import type Docker from 'dockerode';

import type { ResolvedConnection } from '../connection';
import { parseHost } from '../connection';

const DOCKER_PORT = 2375;
const DOCKER_TLS_PORT = 2376;

// URL keeps the brackets around IPv6 literals
function hostname(url: URL): string {
	return url.hostname.replace(/^\[(.*)\]$/, '$1');
}

/**
 * Translate a resolved connection into dockerode constructor options
 */
export function toDockerOptions(conn: ResolvedConnection): Docker.DockerOptions {
	const url = parseHost(conn.host);
	const tls = conn.tls != null && {
		ca: conn.tls.ca,
		cert: conn.tls.cert,
		key: conn.tls.key,
	};

	switch (url.protocol) {
		case 'unix:':
		case 'npipe:':
			return { socketPath: url.pathname };
		case 'tcp:':
			return {
				host: hostname(url),
				port: url.port ? Number(url.port) : tls ? DOCKER_TLS_PORT : DOCKER_PORT,
				protocol: tls ? 'https' : 'http',
				...tls,
			};
		default: {
			const protocol = url.protocol === 'https:' ? 'https' : 'http';
			return {
				host: hostname(url),
				port: url.port
					? Number(url.port)
					: protocol === 'https'
						? 443
						: 80,
				protocol,
				...tls,
			};
		}
	}
}
