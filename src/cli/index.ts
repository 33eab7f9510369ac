import process from "node:process";
import pc from "picocolors";
import type { SyncLogger } from "../sync/logger";
import { ExitCode } from "./exit-code";
import { CLI_NAME, InvalidArgumentError, parseArgs } from "./parse-args";
import { TaskReporter } from "./task-reporter";
import type { CliCommand, CliOptions } from "./types";
import { createUiLogger, setSilentMode, symbols, ui } from "./ui";

const HELP_TEXT = `
Usage: ${CLI_NAME} <command> [options]

Commands:
  sync [id...]    Mirror configured repositories
  status          Show storage status
  verify [id...]  Re-hash stored packages against metadata
  clean           Remove the storage directory

Global options:
  --config <path>
  --storage-dir <path>
  --dry-run (sync only)
  --json
  --timeout-ms <n>
  --silent
  --verbose
`;

const printHelp = () => {
	process.stdout.write(HELP_TEXT.trimStart());
};

const printError = (message: string) => {
	process.stderr.write(`${symbols.error} ${message}\n`);
};

const printJson = (value: unknown) => {
	process.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
};

// JSON output owns stdout; warnings still reach the user.
const jsonLogger: SyncLogger = {
	debug: () => {},
	info: () => {},
	warn: (message) => process.stderr.write(`${symbols.warn} ${message}\n`),
};

const useLiveOutput = (options: CliOptions) =>
	Boolean(process.stdout.isTTY) &&
	!options.json &&
	!options.silent &&
	!options.verbose &&
	!options.dryRun;

const runSyncCommand = async (ids: string[], options: CliOptions) => {
	const { printSyncResult, runSync } = await import("../sync");
	const syncOptions = {
		configPath: options.config,
		storageDirOverride: options.storageDir,
		dryRun: options.dryRun,
		verbose: options.verbose,
		repositoryFilter: ids,
		timeoutMs: options.timeoutMs,
	};
	if (options.json) {
		printJson(await runSync(syncOptions, { logger: jsonLogger }));
		return;
	}
	if (!useLiveOutput(options)) {
		printSyncResult(
			await runSync(syncOptions, {
				logger: createUiLogger({ verbose: options.verbose }),
			}),
		);
		return;
	}
	const reporter = new TaskReporter();
	try {
		const run = await runSync(syncOptions, {
			logger: reporter,
			onRepositoryStart: (repository) => reporter.start(repository.id),
			onRepositoryComplete: (summary) => reporter.complete(summary),
		});
		reporter.finish();
		ui.line(
			`${symbols.info} Stored in ${pc.gray(ui.path(run.storageDir))}`,
		);
	} catch (error) {
		reporter.stop();
		throw error;
	}
};

const runCommand = async (parsed: CliCommand) => {
	const { options } = parsed;
	switch (parsed.command) {
		case "sync":
			await runSyncCommand(parsed.ids, options);
			return;
		case "status": {
			const { getStatus, printStatus } = await import("../status");
			const status = await getStatus({
				configPath: options.config,
				storageDirOverride: options.storageDir,
			});
			if (options.json) {
				printJson(status);
			} else {
				printStatus(status);
			}
			return;
		}
		case "verify": {
			const { printVerify, verifyStorage } = await import("../verify");
			const report = await verifyStorage({
				configPath: options.config,
				storageDirOverride: options.storageDir,
				repositoryFilter: parsed.ids,
			});
			if (options.json) {
				printJson(report);
			} else {
				printVerify(report);
			}
			if (report.results.some((result) => !result.ok)) {
				process.exit(ExitCode.FatalError);
			}
			return;
		}
		case "clean": {
			const { cleanStorage } = await import("../clean");
			const result = await cleanStorage({
				configPath: options.config,
				storageDirOverride: options.storageDir,
			});
			if (options.json) {
				printJson(result);
			} else if (result.removed) {
				ui.line(
					`${symbols.success} Removed storage at ${ui.path(result.storageDir)}`,
				);
			} else {
				ui.line(
					`${symbols.info} Storage already missing at ${ui.path(result.storageDir)}`,
				);
			}
			return;
		}
		default:
			printHelp();
			process.exit(ExitCode.InvalidArgument);
	}
};

/**
 * The main entry point of the CLI
 */
export async function main(argv = process.argv): Promise<void> {
	process.on("uncaughtException", errorHandler);
	process.on("unhandledRejection", errorHandler);
	try {
		const parsed = parseArgs(argv);
		setSilentMode(parsed.options.silent);

		if (parsed.help) {
			process.exit(ExitCode.Success);
		}

		await runCommand(parsed.parsed);
	} catch (error) {
		errorHandler(error);
	}
}

function errorHandler(error: unknown): void {
	const message = error instanceof Error ? error.message : String(error);
	printError(message);
	process.exit(
		error instanceof InvalidArgumentError
			? ExitCode.InvalidArgument
			: ExitCode.FatalError,
	);
}
