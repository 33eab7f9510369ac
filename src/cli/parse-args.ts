import process from "node:process";

import cac from "cac";
import type { CliCommand, CliOptions } from "./types";

export const CLI_NAME = "repo-mirror";

const COMMANDS = ["sync", "status", "verify", "clean"] as const;
type Command = (typeof COMMANDS)[number];

const isCommand = (value: string): value is Command =>
	COMMANDS.some((command) => command === value);

const toCommand = (value: string): Command => {
	if (!isCommand(value)) {
		throw new InvalidArgumentError(`Unknown command '${value}'.`);
	}
	return value;
};

const VALUE_FLAGS = new Set(["--config", "--storage-dir", "--timeout-ms"]);
const COMMANDS_WITH_IDS = new Set<Command>(["sync", "verify"]);
const SYNC_ONLY_OPTIONS = new Set(["--dry-run"]);

export type ParsedArgs = {
	command: Command | null;
	options: CliOptions;
	positionals: string[];
	rawArgs: string[];
	help: boolean;
	parsed: CliCommand;
};

/** Bad command line; the CLI exits with ExitCode.InvalidArgument. */
export class InvalidArgumentError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "InvalidArgumentError";
	}
}

const splitArgs = (rawArgs: string[]) => {
	let command: string | null = null;
	const positionals: string[] = [];
	for (let index = 0; index < rawArgs.length; index += 1) {
		const arg = rawArgs[index];
		if (arg.startsWith("-")) {
			if (VALUE_FLAGS.has(arg)) {
				index += 1;
			}
			continue;
		}
		if (command === null) {
			command = arg;
		} else {
			positionals.push(arg);
		}
	}
	return { command, positionals };
};

const readStringOption = (value: unknown, flag: string) => {
	if (value === undefined) {
		return undefined;
	}
	// numeric-looking values arrive as numbers
	if (typeof value === "number") {
		return String(value);
	}
	if (typeof value !== "string" || value.length === 0) {
		throw new InvalidArgumentError(`${flag} expects a value.`);
	}
	return value;
};

const buildOptions = (
	parsedOptions: Record<string, unknown>,
): CliOptions => {
	const options: CliOptions = {
		config: readStringOption(parsedOptions.config, "--config"),
		storageDir: readStringOption(parsedOptions.storageDir, "--storage-dir"),
		dryRun: Boolean(parsedOptions.dryRun),
		json: Boolean(parsedOptions.json),
		timeoutMs:
			parsedOptions.timeoutMs === undefined
				? undefined
				: Number(parsedOptions.timeoutMs),
		silent: Boolean(parsedOptions.silent),
		verbose: Boolean(parsedOptions.verbose),
	};

	if (
		options.timeoutMs !== undefined &&
		(!Number.isFinite(options.timeoutMs) || options.timeoutMs < 1)
	) {
		throw new InvalidArgumentError("--timeout-ms must be a positive number.");
	}

	return options;
};

const buildParsedCommand = (
	command: Command | null,
	options: CliOptions,
	positionals: string[],
): CliCommand => {
	switch (command) {
		case "sync":
			return { command: "sync", ids: positionals, options };
		case "verify":
			return { command: "verify", ids: positionals, options };
		case "status":
			return { command: "status", options };
		case "clean":
			return { command: "clean", options };
		default:
			return { command: null, options };
	}
};

export const parseArgs = (argv = process.argv): ParsedArgs => {
	const cli = cac(CLI_NAME);

	cli
		.option("--config <path>", "Path to config file")
		.option("--storage-dir <path>", "Override storage directory")
		.option("--dry-run", "Classify packages without downloading (sync only)")
		.option("--json", "Output JSON")
		.option("--timeout-ms <n>", "Deadline for each response in milliseconds")
		.option("--silent", "Suppress non-error output")
		.option("--verbose", "Enable verbose logging")
		.help();

	cli.command("sync [id...]", "Mirror configured repositories");
	cli.command("status", "Show storage status");
	cli.command("verify [id...]", "Re-hash stored packages against metadata");
	cli.command("clean", "Remove the storage directory");

	const result = cli.parse(argv, { run: false });
	const rawArgs = argv.slice(2);
	const split = splitArgs(rawArgs);
	const command = split.command === null ? null : toCommand(split.command);
	const options = buildOptions(result.options);
	if (command && !COMMANDS_WITH_IDS.has(command) && split.positionals.length) {
		throw new InvalidArgumentError(`${CLI_NAME} ${command}: unexpected arguments.`);
	}
	if (command !== "sync") {
		const scoped = rawArgs.find((arg) => SYNC_ONLY_OPTIONS.has(arg));
		if (scoped) {
			throw new InvalidArgumentError(`${scoped} is only valid for sync.`);
		}
	}
	return {
		command,
		options,
		positionals: split.positionals,
		rawArgs,
		help: Boolean(result.options.help),
		parsed: buildParsedCommand(command, options, split.positionals),
	};
};
