export type Verbosity = 0 | 1 | 2;

export const DEFAULT_VERBOSITY: Verbosity = 1;

export type Logger = {
	readonly verbosity: Verbosity;
	info(message: string): void;
	success(message: string): void;
	warn(message: string): void;
	error(message: string): void;
	debug(message: string): void;
};

export function parseVerbosity(value: unknown): Verbosity | null {
	if (value === 0 || value === 1 || value === 2) {
		return value;
	}
	return null;
}

/**
 * Console logger. Errors always print; info, success and warnings need verbosity 1,
 * debug output needs 2. With `jsonOutput`, everything except the final JSON document
 * goes to stderr so stdout stays parseable.
 */
export function createLogger(verbosity: Verbosity = DEFAULT_VERBOSITY, jsonOutput = false): Logger {
	const out = (message: string) => {
		if (jsonOutput) {
			console.error(message);
			return;
		}
		console.log(message);
	};

	return {
		verbosity,
		info(message) {
			if (verbosity >= 1) {
				out(message);
			}
		},
		success(message) {
			if (verbosity >= 1) {
				out(message);
			}
		},
		warn(message) {
			if (verbosity >= 1) {
				console.error(`Warning: ${message}`);
			}
		},
		error(message) {
			console.error(`Error: ${message}`);
		},
		debug(message) {
			if (verbosity >= 2) {
				console.error(`[debug] ${message}`);
			}
		},
	};
}

export const silentLogger: Logger = {
	verbosity: 0,
	info() {},
	success() {},
	warn() {},
	error() {},
	debug() {},
};
