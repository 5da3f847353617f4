export interface Logger {
	debug(...args: unknown[]): void;
	info(...args: unknown[]): void;
	warn(...args: unknown[]): void;
	error(...args: unknown[]): void;
}

export const NullLogger: Logger = {
	debug: () => {
		/* noop*/
	},
	info: () => {
		/* noop*/
	},
	warn: () => {
		/* noop*/
	},
	error: () => {
		/* noop*/
	},
};

/**
 * Fill in the missing methods of a partial logger with no-ops
 */
export function toLogger(logger: Partial<Logger> = {}): Logger {
	return {
		...NullLogger,
		...logger,
	};
}
