import { RuntimeError } from '../errors';
import type { ResolvedConnection } from '../connection';
import type { Logger } from '../logger';
import { DockerodeClient } from './dockerode';
import { toDockerOptions } from './options';
import type { DockerClient } from './types';

export * from './types';
export { DockerodeClient } from './dockerode';
export { toDockerOptions } from './options';

/**
 * Opens a client for a resolved connection
 */
export type ClientFactory = (
	conn: ResolvedConnection,
	logger: Logger,
) => Promise<DockerClient>;

/**
 * Open a dockerode backed client, checking that the daemon responds
 * if the connection asks for it
 */
export const connect: ClientFactory = async (conn, logger) => {
	const client = DockerodeClient.from(toDockerOptions(conn), logger);
	if (conn.ping) {
		try {
			await client.ping();
		} catch (e) {
			throw new RuntimeError(`error pinging docker host '${conn.host}'`, e);
		}
		logger.debug(`docker host '${conn.host}' is reachable`);
	}
	return client;
};
