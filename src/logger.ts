export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface Logger {
	debug(message: string): void;
	info(message: string): void;
	warn(message: string): void;
	error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100
};

const noop = (): void => {};

export const silentLogger: Logger = {
	debug: noop,
	info: noop,
	warn: noop,
	error: noop
};

/** debug/info go to stdout, warn/error to stderr */
export function createConsoleLogger(level: LogLevel = "info"): Logger {
	const enabled = (l: Exclude<LogLevel, "silent">) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
	return {
		debug: (message) => {
			if (enabled("debug")) console.log(message);
		},
		info: (message) => {
			if (enabled("info")) console.log(message);
		},
		warn: (message) => {
			if (enabled("warn")) console.error(message);
		},
		error: (message) => {
			if (enabled("error")) console.error(message);
		}
	};
}

export interface LoggerOptions {
	logger?: Logger;
}
