// Logger
// Leveled console logger. Library code receives a Logger through its
// options and never writes to the console on its own: the default is silent.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export interface Logger {
	debug(message: string, ...args: unknown[]): void;
	info(message: string, ...args: unknown[]): void;
	warn(message: string, ...args: unknown[]): void;
	error(message: string, ...args: unknown[]): void;
}

/** Destination of formatted log lines; `console` by default. */
export type LogSink = Pick<Console, "log" | "info" | "warn" | "error">;

export function createLogger(level: LogLevel = "info", sink: LogSink = console): Logger {
	const threshold = LOG_LEVELS[level];

	function log(msgLevel: LogLevel, message: string, args: unknown[]): void {
		if (LOG_LEVELS[msgLevel] < threshold) return;
		const timestamp = new Date().toISOString();
		const prefix = `[${timestamp}] ${msgLevel.toUpperCase()}:`;
		switch (msgLevel) {
		case "debug": sink.log(prefix, message, ...args); break;
		case "info": sink.info(prefix, message, ...args); break;
		case "warn": sink.warn(prefix, message, ...args); break;
		case "error": sink.error(prefix, message, ...args); break;
		}
	}

	return {
		debug: (message, ...args) => { log("debug", message, args); },
		info: (message, ...args) => { log("info", message, args); },
		warn: (message, ...args) => { log("warn", message, args); },
		error: (message, ...args) => { log("error", message, args); },
	};
}

const noop = (): void => undefined;

export const silentLogger: Logger = Object.freeze({
	debug: noop,
	info: noop,
	warn: noop,
	error: noop,
});
