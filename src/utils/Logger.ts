/**
 * Component-scoped console logger.
 *
 * `error` and `warn` always print; `info` and `debug` only when the
 * RAYTRACER_DEBUG environment variable is "true" (or `setDebug(true)`).
 */

let debugOverride: boolean | null = null;

export function setDebug(enabled: boolean | null): void {
	debugOverride = enabled;
}

export function isDebugEnabled(): boolean {
	if (debugOverride !== null) return debugOverride;
	return process.env.RAYTRACER_DEBUG === "true";
}

function formatError(error: unknown): string {
	if (error instanceof Error) {
		return `${error.name}: ${error.message}`;
	}
	return String(error);
}

export interface Logger {
	error(message: string, error?: unknown): void;
	warn(message: string): void;
	info(message: string): void;
	debug(message: string): void;
}

export function createLogger(component: string): Logger {
	const prefix = `[${component}]`;
	return {
		error(message, error) {
			if (error === undefined) console.error(`${prefix} ${message}`);
			else console.error(`${prefix} ${message}: ${formatError(error)}`);
		},
		warn(message) {
			console.warn(`${prefix} ${message}`);
		},
		info(message) {
			if (isDebugEnabled()) console.info(`${prefix} ${message}`);
		},
		debug(message) {
			if (isDebugEnabled()) console.debug(`${prefix} ${message}`);
		},
	};
}
