#!/usr/bin/env tsx
import * as fs from "node:fs";
import { describeError, emergencyTerminalRestore, select } from "@fuzzpick/tui";
import { APP_NAME, logger } from "@fuzzpick/utils";
import { type CliArgs, HELP, parseCliArgs } from "./args";

function readVersion(): string {
	const raw = fs.readFileSync(new URL("../package.json", import.meta.url), "utf-8");
	const parsed: unknown = JSON.parse(raw);
	if (parsed && typeof parsed === "object" && "version" in parsed && typeof parsed.version === "string") {
		return parsed.version;
	}
	return "unknown";
}

function installCrashHandlers(): void {
	process.on("uncaughtException", err => {
		emergencyTerminalRestore();
		logger.error("uncaught exception", { error: describeError(err) });
		process.stderr.write(`${APP_NAME}: ${describeError(err)}\n`);
		process.exit(1);
	});
	for (const signal of ["SIGTERM", "SIGHUP"] as const) {
		process.on(signal, () => {
			emergencyTerminalRestore();
			process.exit(128 + (signal === "SIGTERM" ? 15 : 1));
		});
	}
}

export async function main(argv: string[]): Promise<number> {
	let args: CliArgs;
	try {
		args = parseCliArgs(argv);
	} catch (err) {
		process.stderr.write(`${APP_NAME}: ${describeError(err)}\n${HELP}`);
		return 2;
	}

	if (args.help) {
		process.stdout.write(HELP);
		return 0;
	}
	if (args.version) {
		process.stdout.write(`${readVersion()}\n`);
		return 0;
	}

	installCrashHandlers();
	const output = args.stderr ? process.stderr : process.stdout;
	try {
		const selected = await select(output, args.candidates);
		for (const item of selected) {
			process.stdout.write(`${item}\n`);
		}
		return 0;
	} catch (err) {
		logger.error("selection failed", { error: describeError(err) });
		process.stderr.write(`${APP_NAME}: ${describeError(err)}\n`);
		const loggingFailure = logger.getLastLoggingFailure();
		if (loggingFailure !== undefined) {
			process.stderr.write(`${APP_NAME}: logging failed: ${describeError(loggingFailure)}\n`);
		}
		return 1;
	}
}

main(process.argv.slice(2)).then(
	code => {
		process.exitCode = code;
	},
	(err: unknown) => {
		process.stderr.write(`${APP_NAME}: ${describeError(err)}\n`);
		process.exitCode = 1;
	},
);
