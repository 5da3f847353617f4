import type { ClientFactory, DockerClient } from './client';
import { connect as dockerodeConnect } from './client';
import type {
	ConnectionOverrides,
	Resolution,
	ResolvedConnection,
} from './connection';
import {
	ProviderSettings,
	parseHost,
	resolve,
	resolveOrDefer,
} from './connection';
import defaultLogger from './console';
import type { Logger } from './logger';
import { toLogger } from './logger';
import type { PollOpts, Reconciler, Session } from './resources';
import { Container, Image, Network, Volume } from './resources';
import type {
	ContainerSpec,
	ContainerState,
	ImageSpec,
	ImageState,
	NetworkSpec,
	NetworkState,
	VolumeSpec,
	VolumeState,
} from './types';
import { compact } from './utils/object';

export interface ProviderOpts extends PollOpts {
	/**
	 * Logger used by the provider and every reconciler. Defaults
	 * to a logger on the `debug` package under the `dockside`
	 * namespace.
	 */
	logger: Logger;

	/**
	 * Opens a client for a resolved connection. Defaults to a
	 * dockerode client.
	 */
	connect: ClientFactory;
}

export interface ProviderProps {
	/**
	 * Base connection settings. Read from the environment if
	 * not given.
	 */
	settings?: ProviderSettings;

	opts?: Partial<Omit<ProviderOpts, 'logger'>> & { logger?: Partial<Logger> };
}

export interface Provider {
	readonly settings: Readonly<ProviderSettings>;

	/**
	 * Resolve the connection for a resource, without connecting
	 */
	resolve(overrides?: ConnectionOverrides): Promise<Resolution>;

	/**
	 * Resolve the connection for a resource and open a client. Throws
	 * `ConnectionDeferred` if the provider is not configured yet.
	 */
	connect(overrides?: ConnectionOverrides): Promise<DockerClient>;

	readonly image: Reconciler<ImageSpec, ImageState>;
	readonly container: Reconciler<ContainerSpec, ContainerState>;
	readonly network: Reconciler<NetworkSpec, NetworkState>;
	readonly volume: Reconciler<VolumeSpec, VolumeState>;
}

const DEFAULT_OPTS = {
	pollIntervalMs: 500,
	pollAttempts: 30,
	connect: dockerodeConnect,
};

/**
 * Create a provider from base connection settings. The settings
 * are fixed for the lifetime of the provider.
 */
function from({
	settings = ProviderSettings.fromEnv(),
	opts: userOpts = {},
}: ProviderProps = {}): Provider {
	if (settings.host) {
		parseHost(settings.host);
	}

	const base: Readonly<ProviderSettings> = Object.freeze({ ...settings });
	const logger = toLogger(userOpts.logger ?? defaultLogger);
	const opts: ProviderOpts = {
		...DEFAULT_OPTS,
		...compact(userOpts),
		logger,
	};

	const session: Session = {
		logger,
		opts: {
			pollIntervalMs: opts.pollIntervalMs,
			pollAttempts: opts.pollAttempts,
		},
		async connect(overrides) {
			const conn: ResolvedConnection = await resolveOrDefer(base, overrides);
			logger.debug(`connecting to docker host '${conn.host}'`);
			return opts.connect(conn, logger);
		},
	};

	return {
		settings: base,
		resolve: (overrides = {}) => resolve(base, overrides),
		connect: (overrides = {}) => session.connect(overrides),
		image: Image.bind(session),
		container: Container.bind(session),
		network: Network.bind(session),
		volume: Volume.bind(session),
	};
}

export const Provider = {
	from,
};
