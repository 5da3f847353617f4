import type { DockerClient } from '../client';
import { ConnectionOverrides } from '../connection';
import { ConnectionDeferred } from '../errors';
import type { Logger } from '../logger';
import type { Observed } from '../types';
import { deepEqual } from '../utils/deep-equal';

export interface PollOpts {
	/**
	 * Time to wait between observations of a freshly started container
	 */
	pollIntervalMs: number;

	/**
	 * Number of observations before giving up on a freshly started
	 * container
	 */
	pollAttempts: number;
}

/**
 * Context passed to every resource operation
 */
export interface Context {
	client: DockerClient;
	logger: Logger;
	opts: PollOpts;
}

/**
 * What a reconciler needs from the provider to run operations
 */
export interface Session {
	logger: Logger;
	opts: PollOpts;
	connect(overrides: ConnectionOverrides): Promise<DockerClient>;
}

/**
 * Equality tests for spec fields that cannot be compared
 * structurally, e.g. unordered sets
 */
export type Comparators<TSpec> = Partial<
	Record<keyof TSpec, (prior: TSpec, next: TSpec) => boolean>
>;

/**
 * Resource constructor properties
 */
export interface ResourceProps<TSpec extends ConnectionOverrides, TState> {
	/**
	 * Resource kind, e.g. `container`
	 */
	kind: string;

	/**
	 * Human readable name for a resource instance, used in logs
	 */
	description: (spec: TSpec) => string;

	/**
	 * Pre-flight validation of the spec. Throws a `ConfigurationError`
	 * before any call to the daemon is made.
	 */
	validate: (spec: TSpec) => void;

	create: (spec: TSpec, ctx: Context) => Promise<Observed<TState>>;

	/**
	 * Observe the resource. A `null` return means the resource
	 * is gone
	 */
	read: (
		id: string,
		spec: TSpec,
		ctx: Context,
	) => Promise<Observed<TState> | null>;

	/**
	 * Apply changes to the in-place fields. Resources without in-place
	 * fields just read the current state.
	 */
	update?: (
		id: string,
		prior: TSpec,
		next: TSpec,
		ctx: Context,
	) => Promise<Observed<TState> | null>;

	/**
	 * Remove the resource. Removing a missing resource is not an error
	 */
	delete: (id: string, spec: TSpec, ctx: Context) => Promise<void>;

	exists: (id: string, spec: TSpec, ctx: Context) => Promise<boolean>;

	/**
	 * Fields that can change without replacing the resource, on top
	 * of the TLS settings
	 */
	inPlace?: Array<keyof TSpec>;

	compare?: Comparators<TSpec>;
}

/**
 * A resource bound to a provider session
 */
export interface Reconciler<TSpec extends ConnectionOverrides, TState> {
	readonly kind: string;
	validate(spec: TSpec): void;
	create(spec: TSpec): Promise<Observed<TState>>;
	read(id: string, spec: TSpec): Promise<Observed<TState> | null>;
	update(
		id: string,
		prior: TSpec,
		next: TSpec,
	): Promise<Observed<TState> | null>;
	delete(id: string, spec: TSpec): Promise<void>;

	/**
	 * Returns false without error if the connection cannot be
	 * resolved yet
	 */
	exists(id: string, spec: TSpec): Promise<boolean>;

	/**
	 * List the create-time fields that differ between the specs. A
	 * non empty result means the resource must be replaced.
	 */
	replaces(prior: TSpec, next: TSpec): string[];
}

export interface Resource<TSpec extends ConnectionOverrides, TState> {
	readonly kind: string;
	validate(spec: TSpec): void;
	replaces(prior: TSpec, next: TSpec): string[];
	bind(session: Session): Reconciler<TSpec, TState>;
}

// TLS material can be rotated without replacing the resource, a
// change of daemon cannot
const TLS_FIELDS = [
	'certPath',
	'caMaterial',
	'certMaterial',
	'keyMaterial',
	'caFile',
	'certFile',
	'keyFile',
];

function changedFields<TSpec extends object>(
	prior: TSpec,
	next: TSpec,
	inPlace: string[],
	compare: Comparators<TSpec>,
): string[] {
	const keys = new Set([
		...(Object.keys(prior) as Array<keyof TSpec>),
		...(Object.keys(next) as Array<keyof TSpec>),
	]);

	const changed: string[] = [];
	for (const key of keys) {
		if (inPlace.includes(String(key))) {
			continue;
		}

		const equals = compare[key];
		const same =
			equals != null
				? equals(prior, next)
				: deepEqual(prior[key], next[key]);
		if (!same) {
			changed.push(String(key));
		}
	}
	return changed.sort();
}

function of<TSpec extends ConnectionOverrides, TState>(
	props: ResourceProps<TSpec, TState>,
): Resource<TSpec, TState> {
	const { kind, compare = {} } = props;
	const inPlace = [...TLS_FIELDS, ...(props.inPlace ?? []).map(String)];

	const replaces = (prior: TSpec, next: TSpec) =>
		changedFields(prior, next, inPlace, compare);

	function bind(session: Session): Reconciler<TSpec, TState> {
		const { logger, opts } = session;

		// Connect using the resource overrides and run the operation,
		// logging its progress
		async function run<T>(
			op: string,
			spec: TSpec,
			fn: (ctx: Context) => Promise<T>,
		): Promise<T> {
			const client = await session.connect(ConnectionOverrides.of(spec));
			const description = `${op} ${props.description(spec)}`;
			logger.info(`${description}: running ...`);
			try {
				const res = await fn({ client, logger, opts });
				logger.info(`${description}: success`);
				return res;
			} catch (e) {
				logger.error(`${description}: failed`, e);
				throw e;
			}
		}

		return {
			kind,
			validate: props.validate,
			replaces,
			async create(spec) {
				props.validate(spec);
				return run('create', spec, (ctx) => props.create(spec, ctx));
			},
			read(id, spec) {
				return run('read', spec, (ctx) => props.read(id, spec, ctx));
			},
			async update(id, prior, next) {
				props.validate(next);
				return run('update', next, (ctx) =>
					props.update != null
						? props.update(id, prior, next, ctx)
						: props.read(id, next, ctx),
				);
			},
			delete(id, spec) {
				return run('delete', spec, (ctx) => props.delete(id, spec, ctx));
			},
			async exists(id, spec) {
				try {
					return await run('check', spec, (ctx) =>
						props.exists(id, spec, ctx),
					);
				} catch (e) {
					if (e instanceof ConnectionDeferred) {
						logger.debug(`check ${props.description(spec)}: ${e.reason}`);
						return false;
					}
					throw e;
				}
			},
		};
	}

	return {
		kind,
		validate: props.validate,
		replaces,
		bind,
	};
}

export const Resource = {
	of,
};
