import path from "node:path";
import { UnsafePathError } from "./errors";
import { assertSafeRepositoryId } from "./repo-id";

export const DEFAULT_LOCK_FILENAME = "mirror.lock";

export const toPosixPath = (value: string) => value.replace(/\\/g, "/");

export const resolveStorageDir = (
	configPath: string,
	storageDir: string,
	overrideStorageDir?: string,
) => {
	const resolvedDir = overrideStorageDir
		? path.resolve(overrideStorageDir)
		: path.resolve(path.dirname(configPath), storageDir);

	// Security: Validate storage directory path doesn't contain path traversal
	const normalized = path.normalize(resolvedDir);
	if (normalized !== resolvedDir || normalized.includes("..")) {
		throw new Error(
			`Security: Invalid storage directory path (path traversal detected): ${storageDir}`,
		);
	}

	return resolvedDir;
};

export type StorageLayout = {
	storageDir: string;
	/** Committed generation. */
	currentDir: string;
	/** Generation being built by the running sync. */
	stagingDir: string;
	lockPath: string;
	backupPrefix: string;
};

export const getStorageLayout = (
	storageDir: string,
	repositoryId: string,
): StorageLayout => {
	assertSafeRepositoryId(repositoryId, "repositoryId");
	return {
		storageDir,
		currentDir: path.join(storageDir, repositoryId),
		stagingDir: path.join(storageDir, `.staging-${repositoryId}`),
		lockPath: path.join(storageDir, `${repositoryId}.lock`),
		backupPrefix: `${repositoryId}.bak-`,
	};
};

/**
 * Resolve a repo-relative path (as found in remote metadata) under `root`.
 * Throws UnsafePathError for absolute paths and anything escaping `root`.
 */
export const resolveInside = (root: string, relativePath: string) => {
	const posix = toPosixPath(relativePath);
	if (
		posix.length === 0 ||
		posix.includes("\0") ||
		path.posix.isAbsolute(posix) ||
		path.win32.isAbsolute(relativePath)
	) {
		throw new UnsafePathError(relativePath);
	}
	const resolvedRoot = path.resolve(root);
	const resolvedTarget = path.resolve(resolvedRoot, posix);
	if (!resolvedTarget.startsWith(resolvedRoot + path.sep)) {
		throw new UnsafePathError(relativePath);
	}
	return resolvedTarget;
};
