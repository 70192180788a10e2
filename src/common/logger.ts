import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'sharedquery';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('cse:detector') -> returns a debugger for 'sharedquery:cse:detector'
 *
 * Usage:
 * const log = createLogger('graph');
 * log('Added model %s', name);
 * const errorLog = log.extend('error'); // Creates 'sharedquery:graph:error'
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable optimizer debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'sharedquery:*')
 *   Examples:
 *   - 'sharedquery:*' - everything
 *   - 'sharedquery:cse:*' - detection, unification, planning and rewrite
 *   - 'sharedquery:tracker' - incremental re-optimization only
 * @param logFn - Optional custom log function. Defaults to the debug package's stderr writer.
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/**
 * Disable all optimizer debug logging.
 */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check whether logging is enabled for a given sub-namespace.
 */
export function isLoggingEnabled(subNamespace?: string): boolean {
	const namespace = subNamespace ? `${BASE_NAMESPACE}:${subNamespace}` : `${BASE_NAMESPACE}:*`;
	return debug.enabled(namespace);
}
