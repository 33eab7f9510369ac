import { access, mkdir, readFile } from "node:fs/promises";
import pc from "picocolors";
import { createUiLogger, symbols, ui } from "./cli/ui";
import {
	DEFAULT_STORAGE_DIR,
	type MirrorResolvedRepository,
	loadConfig,
	selectRepositories,
} from "./config";
import type { FetchLike } from "./http/fetch-stream";
import {
	type MirrorLock,
	type MirrorLockRepository,
	readLock,
	resolveLockPath,
	writeLock,
} from "./lock";
import { type StorageLayout, getStorageLayout, resolveStorageDir } from "./paths";
import type { ContentStore } from "./storage/content-store";
import { FileContentStore } from "./storage/file-store";
import type { SyncLogger } from "./sync/logger";
import { Syncer } from "./sync/syncer";
import type { SyncOptions, SyncPlanSummary, SyncSummary } from "./types/sync";

export type SyncDeps = {
	fetch?: FetchLike;
	logger?: SyncLogger;
	createStore?: (layout: StorageLayout) => ContentStore;
	onRepositoryStart?: (repository: MirrorResolvedRepository) => void;
	onRepositoryComplete?: (summary: SyncSummary) => void;
};

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

const loadToolVersion = async () => {
	const raw = await readFile(
		new URL("../package.json", import.meta.url),
		"utf8",
	);
	const pkg: unknown = JSON.parse(raw);
	return typeof pkg === "object" &&
		pkg !== null &&
		"version" in pkg &&
		typeof pkg.version === "string"
		? pkg.version
		: "0.0.0";
};

const toLockEntry = (
	summary: SyncSummary,
	syncedAt: string,
): MirrorLockRepository => ({
	url: summary.url,
	archs: summary.archs,
	downloaded: summary.downloaded,
	recycled: summary.recycled,
	skipped: summary.skipped,
	metadataFiles: summary.metadataFiles,
	bytesDownloaded: summary.bytesDownloaded,
	syncedAt,
});

export const getSyncContext = async (options: {
	configPath?: string;
	storageDirOverride?: string;
	repositoryFilter?: string[];
}) => {
	const { config, resolvedPath, repositories } = await loadConfig(
		options.configPath,
	);
	const storageDir = resolveStorageDir(
		resolvedPath,
		config.storageDir ?? DEFAULT_STORAGE_DIR,
		options.storageDirOverride,
	);
	return {
		configPath: resolvedPath,
		storageDir,
		lockPath: resolveLockPath(resolvedPath),
		repositories: selectRepositories(repositories, options.repositoryFilter),
	};
};

/**
 * Sync every selected repository, one after the other. The lock file is
 * updated after each successful commit, so a failure later on keeps the
 * records of the repositories already mirrored.
 */
export const runSync = async (options: SyncOptions, deps: SyncDeps = {}) => {
	const context = await getSyncContext(options);
	const logger = deps.logger ?? createUiLogger({ verbose: options.verbose });
	const createStore =
		deps.createStore ?? ((layout: StorageLayout) => new FileContentStore(layout));
	await mkdir(context.storageDir, { recursive: true });

	const createSyncer = (repository: MirrorResolvedRepository) =>
		new Syncer({
			repositoryId: repository.id,
			url: repository.url,
			archs: repository.archs,
			store: createStore(getStorageLayout(context.storageDir, repository.id)),
			logger,
			fetch: deps.fetch,
			timeoutMs: options.timeoutMs ?? repository.timeoutMs,
		});

	if (options.dryRun) {
		const plans: SyncPlanSummary[] = [];
		for (const repository of context.repositories) {
			logger.info(`Planning ${repository.id} (${repository.url})`);
			const classification = await createSyncer(repository).plan();
			plans.push({
				repositoryId: repository.id,
				url: repository.url,
				archs: repository.archs,
				toDownload: classification.toDownload.map((record) => record.location),
				toRecycle: classification.toRecycle.map((record) => record.location),
				skipped: classification.skipped.map(({ record, reason }) => ({
					location: record.location,
					reason,
				})),
			});
		}
		return { ...context, dryRun: true as const, plans };
	}

	let lock: MirrorLock | null = (await exists(context.lockPath))
		? await readLock(context.lockPath)
		: null;
	const toolVersion = await loadToolVersion();
	const results: SyncSummary[] = [];
	for (const repository of context.repositories) {
		deps.onRepositoryStart?.(repository);
		logger.info(`Syncing ${repository.id} (${repository.url})`);
		const summary = await createSyncer(repository).storeRepo();
		results.push(summary);
		deps.onRepositoryComplete?.(summary);
		const now = new Date().toISOString();
		lock = {
			version: 1,
			generatedAt: now,
			toolVersion,
			repositories: {
				...(lock?.repositories ?? {}),
				[repository.id]: toLockEntry(summary, now),
			},
		};
		await writeLock(context.lockPath, lock);
	}
	return { ...context, dryRun: false as const, results };
};

export type SyncRun = Awaited<ReturnType<typeof runSync>>;

export const printSyncResult = (run: SyncRun) => {
	if (run.dryRun) {
		for (const plan of run.plans) {
			ui.item(
				symbols.info,
				plan.repositoryId,
				`${ui.plural(plan.toDownload.length, "download")}, ${ui.plural(plan.toRecycle.length, "recycle")}, ${plan.skipped.length} skipped`,
			);
			for (const location of plan.toDownload) {
				ui.step("download", location);
			}
			for (const { location, reason } of plan.skipped) {
				ui.step("skip", location, reason);
			}
		}
		return;
	}
	ui.line(
		`${symbols.info} ${ui.plural(run.results.length, "repository", "repositories")} synced into ${pc.gray(ui.path(run.storageDir))}`,
	);
	for (const result of run.results) {
		const details = [
			`${result.downloaded} downloaded`,
			`${result.recycled} recycled`,
			result.skipped ? `${result.skipped} skipped` : null,
			ui.bytes(result.bytesDownloaded),
		]
			.filter(Boolean)
			.join(", ");
		ui.item(
			result.skipped || result.checksumWarnings ? symbols.warn : symbols.success,
			result.repositoryId,
			details,
		);
	}
};
