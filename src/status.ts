import { access } from "node:fs/promises";
import fg from "fast-glob";
import pc from "picocolors";
import { symbols, ui } from "./cli/ui";
import { DEFAULT_STORAGE_DIR, loadConfig } from "./config";
import { type MirrorLock, readLock, resolveLockPath } from "./lock";
import { getStorageLayout, resolveStorageDir } from "./paths";

type StatusOptions = {
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

const countFiles = async (directory: string) => {
	const files = await fg("**/*", {
		cwd: directory,
		onlyFiles: true,
		dot: true,
		followSymbolicLinks: false,
	});
	return files.length;
};

export const getStatus = async (options: StatusOptions) => {
	const { config, resolvedPath, repositories } = await loadConfig(
		options.configPath,
	);
	const storageDir = resolveStorageDir(
		resolvedPath,
		config.storageDir ?? DEFAULT_STORAGE_DIR,
		options.storageDirOverride,
	);
	const storageDirExists = await exists(storageDir);
	const lockPath = resolveLockPath(resolvedPath);
	const lockExists = await exists(lockPath);

	let lockError: string | null = null;
	let lockData: MirrorLock | null = null;
	if (lockExists) {
		try {
			lockData = await readLock(lockPath);
		} catch (error) {
			lockError = error instanceof Error ? error.message : String(error);
		}
	}

	const repositoryStatus = await Promise.all(
		repositories.map(async (repository) => {
			const layout = getStorageLayout(storageDir, repository.id);
			const committed = await exists(layout.currentDir);
			return {
				id: repository.id,
				url: repository.url,
				path: layout.currentDir,
				committed,
				files: committed ? await countFiles(layout.currentDir) : 0,
				syncInProgress: await exists(layout.lockPath),
				lockEntry: lockData?.repositories[repository.id] ?? null,
			};
		}),
	);

	return {
		configPath: resolvedPath,
		storageDir,
		storageDirExists,
		lockPath,
		lockExists,
		lockValid: lockExists && lockError === null,
		lockError,
		repositories: repositoryStatus,
	};
};

export const printStatus = (status: Awaited<ReturnType<typeof getStatus>>) => {
	const lockState = status.lockExists
		? status.lockValid
			? "present"
			: `invalid (${status.lockError})`
		: "missing";
	const storageState = status.storageDirExists ? "present" : "missing";

	ui.line(
		`${symbols.info} Storage: ${pc.gray(ui.path(status.storageDir))} (${storageState})`,
	);
	ui.line(`${symbols.info} Lock: ${pc.gray(ui.path(status.lockPath))} (${lockState})`);
	for (const repository of status.repositories) {
		if (!repository.committed) {
			ui.item(symbols.warn, repository.id, "not synced");
			continue;
		}
		const details = [
			ui.plural(repository.files, "file"),
			repository.lockEntry
				? `synced ${repository.lockEntry.syncedAt}`
				: "no lock entry",
			repository.syncInProgress ? "sync in progress" : null,
		]
			.filter(Boolean)
			.join(", ");
		ui.item(symbols.success, repository.id, details);
	}
};
