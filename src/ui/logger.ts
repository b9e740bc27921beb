import path from "node:path";
import { Writable } from "node:stream";
import pc from "picocolors";
import pino from "pino";
import pretty from "pino-pretty";
import { statusBar } from "./status-bar.js";

export type LogParams = Record<string, string | number | boolean | null>;

const level = process.env.LOG_LEVEL ?? "info";

// Console lines go through the status bar so the progress line is redrawn below them.
const consoleStream = pretty({
	colorize: pc.isColorSupported,
	translateTime: "HH:MM:ss",
	ignore: "pid,hostname",
	messageFormat: "{msg}",
	singleLine: true,
	destination: new Writable({
		write(chunk: Buffer | string, _encoding, callback) {
			statusBar.log(chunk.toString());
			callback();
		},
	}),
});

const streams = pino.multistream([{ level: "trace", stream: consoleStream }]);

export const logger = pino({ level }, streams);

let attachedLogDir: string | undefined;

/**
 * Adds `info.log` and `error.log` under `logDir`. Calling it again with the
 * same directory is a no-op.
 */
export function attachLogFiles(logDir: string): void {
	const resolved = path.resolve(logDir);
	if (attachedLogDir === resolved) return;
	attachedLogDir = resolved;

	streams.add({
		level: "info",
		stream: pino.destination({
			dest: path.join(resolved, "info.log"),
			mkdir: true,
			sync: true,
		}),
	});
	streams.add({
		level: "error",
		stream: pino.destination({
			dest: path.join(resolved, "error.log"),
			mkdir: true,
			sync: true,
		}),
	});
}

export const log = {
	debug(msg: string, params?: LogParams): void {
		logger.debug(params ?? {}, msg);
	},
	info(msg: string, params?: LogParams): void {
		logger.info(params ?? {}, msg);
	},
	warn(msg: string, params?: LogParams): void {
		logger.warn(params ?? {}, msg);
	},
	error(msg: string, params?: LogParams): void {
		logger.error(params ?? {}, msg);
	},
};

export function formatTitle(title: string, max = 80): string {
	const cleaned = title.trim().replace(/\s+/g, " ");
	if (!cleaned) return pc.dim("'(untitled)'");
	const short = cleaned.length > max ? `${cleaned.slice(0, max - 3)}...` : cleaned;
	return pc.cyan(`'${short}'`);
}

export function formatDuration(ms: number): string {
	if (ms < 1000) return `${Math.round(ms)}ms`;
	return `${(ms / 1000).toFixed(1)}s`;
}
