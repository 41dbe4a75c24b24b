import pino, { type Logger } from "pino";
import pretty from "pino-pretty";
import type { LogConfig } from "./config.js";

export type { Logger };

/**
 * Terminal output is pretty-printed; when a log path is configured the same records
 * are appended to it as JSON lines. Both destinations are synchronous so a
 * process.exit right after a log call loses nothing.
 */
export function createLogger(options: LogConfig): Logger {
	const terminal = pretty({
		colorize: true,
		sync: true,
		destination: 1,
		translateTime: "SYS:yyyy-mm-dd HH:MM:ss",
		ignore: "pid,hostname",
	});

	if (!options.path) {
		return pino({ level: options.level }, terminal);
	}

	const file = pino.destination({ dest: options.path, mkdir: true, sync: true });
	const streamLevel = options.level === "silent" ? "fatal" : options.level;
	return pino(
		{ level: options.level },
		pino.multistream([
			{ level: streamLevel, stream: terminal },
			{ level: streamLevel, stream: file },
		])
	);
}
