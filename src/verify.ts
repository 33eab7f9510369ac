import { createReadStream } from "node:fs";
import { access } from "node:fs/promises";
import { symbols, ui } from "./cli/ui";
import {
	DEFAULT_STORAGE_DIR,
	type MirrorResolvedRepository,
	loadConfig,
	selectRepositories,
} from "./config";
import { FileNotFoundError, toErrorMessage } from "./errors";
import { decodeManifest } from "./metadata/primary";
import { decodeIndex } from "./metadata/repomd";
import { PRIMARY_METADATA_TYPE, type PackageRecord } from "./metadata/types";
import { getStorageLayout, resolveInside, resolveStorageDir } from "./paths";
import { FileContentStore } from "./storage/file-store";
import { acceptsArchitecture, createArchitectureFilter } from "./sync/classify";
import { REPOMD_PATH } from "./sync/syncer";

type VerifyOptions = {
	configPath?: string;
	storageDirOverride?: string;
	repositoryFilter?: string[];
};

export type VerifyResult = {
	id: string;
	ok: boolean;
	packages: number;
	missing: string[];
	mismatched: string[];
	unreadable: string[];
	issues: string[];
};

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

const failed = (id: string, issue: string): VerifyResult => ({
	id,
	ok: false,
	packages: 0,
	missing: [],
	mismatched: [],
	unreadable: [],
	issues: [issue],
});

/**
 * Check one committed generation against the metadata it was committed with.
 */
export const verifyRepository = async (
	storageDir: string,
	repository: Pick<MirrorResolvedRepository, "id" | "archs">,
): Promise<VerifyResult> => {
	const layout = getStorageLayout(storageDir, repository.id);
	if (!(await exists(layout.currentDir))) {
		return failed(repository.id, "not synced");
	}
	const readStored = (relativePath: string) =>
		createReadStream(resolveInside(layout.currentDir, relativePath));

	const indexPath = resolveInside(layout.currentDir, REPOMD_PATH);
	if (!(await exists(indexPath))) {
		return failed(repository.id, `missing ${REPOMD_PATH}`);
	}
	const records: PackageRecord[] = [];
	const metadataIssues: string[] = [];
	try {
		const index = await decodeIndex(readStored(REPOMD_PATH));
		for (const entry of index) {
			if (!(await exists(resolveInside(layout.currentDir, entry.location)))) {
				metadataIssues.push(`missing metadata ${entry.location}`);
				continue;
			}
			if (entry.type === PRIMARY_METADATA_TYPE) {
				records.push(...(await decodeManifest(readStored(entry.location))));
			}
		}
	} catch (error) {
		return failed(repository.id, `unreadable metadata: ${toErrorMessage(error)}`);
	}

	const store = new FileContentStore(layout);
	const filter = createArchitectureFilter(repository.archs);
	const seen = new Set<string>();
	const missing: string[] = [];
	const mismatched: string[] = [];
	const unreadable: string[] = [];
	for (const record of records) {
		if (seen.has(record.location) || !acceptsArchitecture(filter, record.architecture)) {
			continue;
		}
		seen.add(record.location);
		if (record.checksumAlgorithm === "unknown") {
			if (!(await exists(resolveInside(layout.currentDir, record.location)))) {
				missing.push(record.location);
			}
			continue;
		}
		try {
			const stored = await store.checksum(record.location, record.checksumAlgorithm);
			if (stored !== record.checksumValue) {
				mismatched.push(record.location);
			}
		} catch (error) {
			if (error instanceof FileNotFoundError) {
				missing.push(record.location);
			} else {
				unreadable.push(record.location);
			}
		}
	}

	const issues = [...metadataIssues];
	if (missing.length > 0) {
		issues.push(`missing packages: ${missing.length}`);
	}
	if (mismatched.length > 0) {
		issues.push(`checksum mismatch: ${mismatched.length}`);
	}
	if (unreadable.length > 0) {
		issues.push(`unreadable packages: ${unreadable.length}`);
	}
	return {
		id: repository.id,
		ok: issues.length === 0,
		packages: seen.size,
		missing,
		mismatched,
		unreadable,
		issues,
	};
};

export const verifyStorage = async (options: VerifyOptions) => {
	const { config, resolvedPath, repositories } = await loadConfig(
		options.configPath,
	);
	const storageDir = resolveStorageDir(
		resolvedPath,
		config.storageDir ?? DEFAULT_STORAGE_DIR,
		options.storageDirOverride,
	);
	const selected = selectRepositories(repositories, options.repositoryFilter);
	const results: VerifyResult[] = [];
	for (const repository of selected) {
		results.push(await verifyRepository(storageDir, repository));
	}
	return {
		storageDir,
		results,
	};
};

export const printVerify = (
	report: Awaited<ReturnType<typeof verifyStorage>>,
) => {
	const okCount = report.results.filter((r) => r.ok).length;
	const failCount = report.results.length - okCount;

	if (report.results.length === 0) {
		ui.line(`${symbols.warn} No repositories to verify.`);
		return;
	}

	ui.line(
		`${symbols.info} Verified ${ui.plural(report.results.length, "repository", "repositories")} (${okCount} ok, ${failCount} failed)`,
	);

	for (const result of report.results) {
		if (result.ok) {
			ui.item(symbols.success, result.id, ui.plural(result.packages, "package"));
		} else {
			ui.item(symbols.warn, result.id, result.issues.join(", "));
		}
	}
};
