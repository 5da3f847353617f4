import Debug from 'debug';
import type { Logger } from './logger';

// Create the default logger
// Send logger.info() and logger.debug() output to stdout
const debug = Debug('dockside');
debug.log = console.log.bind(console);

const logger: Logger = {
	info: debug.extend('info'),
	warn: Debug('dockside:warn'),
	error: Debug('dockside:error'),
	debug: debug.extend('debug'),
};

if (process.env.DEBUG == null) {
	Debug.enable('dockside:error,dockside:warn');
}

export default logger;
