import { access, rm } from "node:fs/promises";
import { DEFAULT_STORAGE_DIR, loadConfig } from "./config";
import { resolveStorageDir } from "./paths";

type CleanOptions = {
	configPath?: string;
	storageDirOverride?: string;
};

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

/**
 * Remove the whole storage directory, every committed generation included.
 * The lock file beside the config is left alone.
 */
export const cleanStorage = async (options: CleanOptions) => {
	const { config, resolvedPath } = await loadConfig(options.configPath);
	const storageDir = resolveStorageDir(
		resolvedPath,
		config.storageDir ?? DEFAULT_STORAGE_DIR,
		options.storageDirOverride,
	);
	const storageDirExists = await exists(storageDir);
	if (storageDirExists) {
		await rm(storageDir, { recursive: true, force: true });
	}
	return {
		storageDir,
		removed: storageDirExists,
	};
};
