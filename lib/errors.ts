/**
 * Returned when the provider or resource configuration is
 * missing, malformed or contradictory. Configuration errors are
 * never retried.
 */
export class ConfigurationError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'ConfigurationError';
	}
}

/**
 * Some, but not all, of the CA certificate, client certificate and
 * client key could be found
 */
export class IncompleteTlsConfiguration extends ConfigurationError {
	constructor(readonly missing: string[]) {
		super(`incomplete TLS configuration: missing ${missing.join(', ')}`);
		this.name = 'IncompleteTlsConfiguration';
	}
}

/**
 * Returned by the connection resolver if there is not enough
 * configuration yet to open a connection. This is not a failure, the
 * operation can be attempted once the provider is configured.
 */
export class ConnectionDeferred extends Error {
	constructor(readonly reason: string) {
		super(`connection deferred: ${reason}`);
		this.name = 'ConnectionDeferred';
	}
}

/**
 * The daemon reported that the object does not exist
 */
export class NotFound extends Error {
	constructor(
		readonly kind: string,
		readonly ref: string,
		options?: ErrorOptions,
	) {
		super(`no such ${kind}: ${ref}`, options);
		this.name = 'NotFound';
	}

	static is(x: unknown): x is NotFound {
		return x instanceof NotFound;
	}
}

export class ImageNotFound extends Error {
	constructor(readonly image: string) {
		super(`unable to find image ${image}`);
		this.name = 'ImageNotFound';
	}
}

/**
 * The container stopped right after it was started
 */
export class ContainerExited extends Error {
	constructor(
		readonly id: string,
		readonly reason: string,
	) {
		super(`container ${id} exited after creation, error was: ${reason}`);
		this.name = 'ContainerExited';
	}
}

/**
 * The container did not reach the running state within the
 * polling window
 */
export class ContainerNotRunning extends Error {
	constructor(
		readonly id: string,
		readonly attempts: number,
	) {
		super(
			`container ${id} failed to reach running state after ${attempts} attempts`,
		);
		this.name = 'ContainerNotRunning';
	}
}

/**
 * Wraps a failed call to the docker daemon
 */
export class RuntimeError extends Error {
	constructor(message: string, cause: unknown) {
		super(`${message}: ${cause instanceof Error ? cause.message : cause}`, {
			cause,
		});
		this.name = 'RuntimeError';
	}
}

/**
 * A multi-step create failed after the object was created on the
 * daemon. The object is not rolled back, `id` holds its identity so
 * the caller can track it.
 */
export class PartialFailure extends RuntimeError {
	constructor(
		readonly id: string,
		message: string,
		cause: unknown,
	) {
		super(message, cause);
		this.name = 'PartialFailure';
	}
}
