import { access, readFile } from "node:fs/promises";
import path from "node:path";
import type {
	MirrorConfig,
	MirrorDefaults,
	MirrorRepository,
	MirrorResolvedRepository,
} from "./config-schema";
import { ConfigSchema } from "./config-schema";

export type {
	MirrorConfig,
	MirrorDefaults,
	MirrorRepository,
	MirrorResolvedRepository,
};

export const DEFAULT_CONFIG_FILENAME = "mirror.config.json";
export const DEFAULT_STORAGE_DIR = ".mirror";
export const PACKAGE_CONFIG_KEY = "repo-mirror";
const PACKAGE_JSON_FILENAME = "package.json";
export const DEFAULT_TIMEOUT_MS = 120000;
export const DEFAULT_CONFIG = {
	storageDir: DEFAULT_STORAGE_DIR,
	defaults: {
		archs: [],
		timeoutMs: DEFAULT_TIMEOUT_MS,
	},
	repositories: [],
} satisfies MirrorConfig;

const isObject = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const normalizeRepositoryUrl = (url: string) => url.replace(/\/+$/, "");

export const validateConfig = (input: unknown): MirrorConfig => {
	if (!isObject(input)) {
		throw new Error("Config must be a JSON object.");
	}
	const parsed = ConfigSchema.safeParse(input);
	if (!parsed.success) {
		const details = parsed.error.issues
			.map((issue) => `${issue.path.join(".") || "config"} ${issue.message}`)
			.join("; ");
		throw new Error(`Config does not match schema: ${details}`);
	}
	const configInput = parsed.data;
	const defaults: MirrorDefaults = {
		...DEFAULT_CONFIG.defaults,
		...(configInput.defaults ?? {}),
	};
	return {
		...(configInput.$schema ? { $schema: configInput.$schema } : {}),
		storageDir: configInput.storageDir ?? DEFAULT_STORAGE_DIR,
		defaults,
		repositories: configInput.repositories,
	};
};

export const resolveRepositories = (
	config: MirrorConfig,
): MirrorResolvedRepository[] => {
	const defaults: MirrorDefaults = {
		...DEFAULT_CONFIG.defaults,
		...(config.defaults ?? {}),
	};
	return config.repositories.map((repository) => ({
		...repository,
		url: normalizeRepositoryUrl(repository.url),
		archs: repository.archs ?? defaults.archs,
		timeoutMs: repository.timeoutMs ?? defaults.timeoutMs,
	}));
};

/**
 * Keep the repositories named in `filter`, in config order. An empty or
 * missing filter selects all of them.
 */
export const selectRepositories = (
	repositories: MirrorResolvedRepository[],
	filter?: string[],
) => {
	if (!filter?.length) {
		return repositories;
	}
	const known = new Set(repositories.map((repository) => repository.id));
	const unknown = filter.filter((id) => !known.has(id));
	if (unknown.length > 0) {
		throw new Error(`Unknown repository id(s): ${unknown.join(", ")}.`);
	}
	return repositories.filter((repository) => filter.includes(repository.id));
};

export const resolveConfigPath = (configPath?: string) =>
	configPath
		? path.resolve(configPath)
		: path.resolve(process.cwd(), DEFAULT_CONFIG_FILENAME);

const resolvePackagePath = () =>
	path.resolve(process.cwd(), PACKAGE_JSON_FILENAME);

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

class MissingPackageConfigError extends Error {}

const loadConfigFromFile = async (
	filePath: string,
	mode: "config" | "package",
) => {
	let raw: string;
	try {
		raw = await readFile(filePath, "utf8");
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Failed to read config at ${filePath}: ${message}`);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid JSON in ${filePath}: ${message}`);
	}
	const configInput =
		mode === "package"
			? isObject(parsed)
				? parsed[PACKAGE_CONFIG_KEY]
				: undefined
			: parsed;
	if (mode === "package" && configInput === undefined) {
		throw new MissingPackageConfigError(
			`Missing ${PACKAGE_CONFIG_KEY} config in ${filePath}.`,
		);
	}
	const config = validateConfig(configInput);
	return {
		config,
		resolvedPath: filePath,
		repositories: resolveRepositories(config),
	};
};

export const loadConfig = async (configPath?: string) => {
	const resolvedPath = resolveConfigPath(configPath);
	const isPackageConfig = path.basename(resolvedPath) === PACKAGE_JSON_FILENAME;
	if (configPath) {
		return loadConfigFromFile(
			resolvedPath,
			isPackageConfig ? "package" : "config",
		);
	}
	if (await exists(resolvedPath)) {
		return loadConfigFromFile(resolvedPath, "config");
	}
	const packagePath = resolvePackagePath();
	if (await exists(packagePath)) {
		try {
			return await loadConfigFromFile(packagePath, "package");
		} catch (error) {
			if (!(error instanceof MissingPackageConfigError)) {
				throw error;
			}
		}
	}
	throw new Error(
		`No ${DEFAULT_CONFIG_FILENAME} found at ${resolvedPath} and no ${PACKAGE_CONFIG_KEY} config in ${packagePath}.`,
	);
};
