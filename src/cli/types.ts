export type CliOptions = {
	config?: string;
	storageDir?: string;
	dryRun: boolean;
	json: boolean;
	timeoutMs?: number;
	silent: boolean;
	verbose: boolean;
};

export type CliCommand =
	| { command: "sync"; ids: string[]; options: CliOptions }
	| { command: "status"; options: CliOptions }
	| { command: "verify"; ids: string[]; options: CliOptions }
	| { command: "clean"; options: CliOptions }
	| { command: null; options: CliOptions };
