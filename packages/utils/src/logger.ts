/**
 * Centralized file logger for fuzzpick.
 *
 * Logs to ~/.fuzzpick/logs/ with size-based rotation. The picker owns the
 * terminal while it runs, so nothing is ever logged to stdout or stderr.
 * Each log entry includes process.pid for traceability.
 */
import * as fs from "node:fs";
import winston from "winston";
import DailyRotateFile from "winston-daily-rotate-file";
import { getLogsDir } from "./dirs";
import { $env } from "./env";

/** Ensure logs directory exists */
function ensureLogsDir(): string {
	const logsDir = getLogsDir();
	if (!fs.existsSync(logsDir)) {
		fs.mkdirSync(logsDir, { recursive: true });
	}
	return logsDir;
}

/** Custom format that includes pid and flattens metadata */
const logFormat = winston.format.combine(
	winston.format.timestamp({ format: "YYYY-MM-DDTHH:mm:ss.SSSZ" }),
	winston.format.printf(({ timestamp, level, message, ...meta }) => {
		const entry: Record<string, unknown> = {
			timestamp,
			level,
			pid: process.pid,
			message,
		};
		// Flatten metadata into entry
		for (const [key, value] of Object.entries(meta)) {
			entry[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
		}
		return JSON.stringify(entry);
	}),
);

let winstonLogger: winston.Logger | undefined;
let lastLoggingFailure: unknown;

/** Whether FUZZPICK_LOG disables logging entirely. */
export function isLoggingDisabled(): boolean {
	const value = $env.FUZZPICK_LOG?.trim().toLowerCase();
	return value === "off" || value === "0" || value === "false";
}

/** The winston logger instance, created on first use */
function getWinstonLogger(): winston.Logger {
	if (winstonLogger) return winstonLogger;

	const silent = isLoggingDisabled();
	const transports: winston.transport[] = silent
		? [new winston.transports.Console({ silent: true })]
		: [
				new DailyRotateFile({
					dirname: ensureLogsDir(),
					filename: "fuzzpick.%DATE%.log",
					datePattern: "YYYY-MM-DD",
					maxSize: "10m",
					maxFiles: 5,
					zippedArchive: true,
				}),
			];

	winstonLogger = winston.createLogger({
		level: $env.FUZZPICK_LOG_LEVEL || "debug",
		format: logFormat,
		silent,
		transports,
		// Don't exit on error - logging failures shouldn't crash the picker
		exitOnError: false,
	});
	return winstonLogger;
}

/**
 * Log through the shared winston instance.
 *
 * @example
 * ```typescript
 * import { logger } from "@fuzzpick/utils";
 *
 * logger.error("terminal flush failed", { bytes });
 * logger.debug("session finished", { selected: 2 });
 * ```
 */
function write(level: "error" | "warn" | "debug", message: string, context?: Record<string, unknown>): void {
	try {
		getWinstonLogger().log(level, message, context);
	} catch (err) {
		// Logging must never take the picker down; remember the failure for the crash path
		lastLoggingFailure = err;
	}
}

/** The most recent error raised by the logging backend, if any. */
export function getLastLoggingFailure(): unknown {
	return lastLoggingFailure;
}

/**
 * Log an error message.
 * @param message - The message to log.
 * @param context - The context to log.
 */
export function error(message: string, context?: Record<string, unknown>): void {
	write("error", message, context);
}

/**
 * Log a warning message.
 * @param message - The message to log.
 * @param context - The context to log.
 */
export function warn(message: string, context?: Record<string, unknown>): void {
	write("warn", message, context);
}

/**
 * Log a debug message.
 * @param message - The message to log.
 * @param context - The context to log.
 */
export function debug(message: string, context?: Record<string, unknown>): void {
	write("debug", message, context);
}

const LOGGED_TIMING_THRESHOLD_MS = 5;

function logTiming(op: string, duration: number): void {
	duration = Math.round(duration * 100) / 100;
	if (duration > LOGGED_TIMING_THRESHOLD_MS) {
		warn(`${op} done`, { duration, op });
	} else {
		debug(`${op} done`, { duration, op });
	}
}

/**
 * Time a synchronous operation and log the duration.
 * @param op - The operation name.
 * @param fn - The function to time.
 * @returns The result of the function.
 */
export function time<T, A extends unknown[]>(op: string, fn: (...args: A) => T, ...args: A): T {
	const start = performance.now();
	try {
		return fn(...args);
	} finally {
		logTiming(op, performance.now() - start);
	}
}

/**
 * Time an asynchronous operation and log the duration.
 * @param op - The operation name.
 * @param fn - The function to time.
 * @returns The result of the function.
 */
export async function timeAsync<R, A extends unknown[]>(
	op: string,
	fn: (...args: A) => R,
	...args: A
): Promise<Awaited<R>> {
	const start = performance.now();
	try {
		return await fn(...args);
	} finally {
		logTiming(op, performance.now() - start);
	}
}
