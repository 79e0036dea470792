import pino, { type DestinationStream, type Logger, type LoggerOptions } from "pino";

export type { Logger };

export interface CreateLoggerOptions {
	level?: string;
	destination?: DestinationStream;
}

/**
 * Create a pino logger tagged with this library's name.
 *
 * The level defaults to `XLS_READER_LOG_LEVEL`, then to "silent".
 */
export function createLogger(options: CreateLoggerOptions = {}): Logger {
	const level = options.level ?? process.env.XLS_READER_LOG_LEVEL ?? "silent";
	const opts: LoggerOptions = {
		level,
		base: {
			service: "xls-reader",
		},
	};
	return options.destination ? pino(opts, options.destination) : pino(opts);
}

/** Shared logger used when the caller passes none */
export const defaultLogger: Logger = createLogger();
