import { isHttpStatus } from "../errors";
import {
	type FetchLike,
	type StreamConsumer,
	downloadApply,
	drain,
	joinUrl,
} from "../http/fetch-stream";
import { decodeManifest } from "../metadata/primary";
import { decodeIndex } from "../metadata/repomd";
import {
	PRIMARY_METADATA_TYPE,
	type PackageRecord,
	type RepositoryIndex,
} from "../metadata/types";
import type {
	ContentStore,
	ExpectedChecksum,
	WriteResult,
} from "../storage/content-store";
import type { SyncSummary } from "../types/sync";
import {
	type ArchitectureFilter,
	type Classification,
	classifyPackages,
	createArchitectureFilter,
	emptyClassification,
} from "./classify";
import { type SyncLogger, silentLogger } from "./logger";

export const REPOMD_PATH = "repodata/repomd.xml";
export const SIGNATURE_PATHS = [`${REPOMD_PATH}.asc`, `${REPOMD_PATH}.key`];

export type SyncerOptions = {
	repositoryId: string;
	/** Repository base URL, without trailing slash. */
	url: string;
	archs?: Iterable<string>;
	store: ContentStore;
	logger?: SyncLogger;
	fetch?: FetchLike;
	timeoutMs?: number;
};

type Progress = {
	metadataFiles: number;
	bytesDownloaded: number;
};

/**
 * Mirrors one repository into its ContentStore. Stages run one after the
 * other; the first fatal error aborts the staging generation and is rethrown
 * as is.
 */
export class Syncer {
	private readonly filter: ArchitectureFilter;
	private readonly logger: SyncLogger;

	constructor(private readonly options: SyncerOptions) {
		this.filter = createArchitectureFilter(options.archs);
		this.logger = options.logger ?? silentLogger;
	}

	async storeRepo(): Promise<SyncSummary> {
		const { store } = this.options;
		await store.begin();
		try {
			const progress: Progress = { metadataFiles: 0, bytesDownloaded: 0 };
			const { toDownload, toRecycle, skipped } =
				await this.processMetadata(progress);

			this.logger.info(`Downloading ${toDownload.length} packages...`);
			let checksumWarnings = 0;
			for (const record of toDownload) {
				const { written } = await this.downloadStoreApply(
					record.location,
					drain,
					progress,
					{ algorithm: record.checksumAlgorithm, value: record.checksumValue },
				);
				if (written.checksum && written.checksum.value !== record.checksumValue) {
					checksumWarnings += 1;
					this.logger.warn(
						`Downloaded '${record.location}' does not match its ${written.checksum.algorithm} checksum [repo '${record.checksumValue}' vs downloaded '${written.checksum.value}']`,
					);
				}
			}

			this.logger.info(`Recycling ${toRecycle.length} packages...`);
			for (const record of toRecycle) {
				await store.recycle(record.location);
			}

			this.logger.info("Committing changes...");
			await store.commit();
			return {
				repositoryId: this.options.repositoryId,
				url: this.options.url,
				archs: Array.from(this.filter),
				downloaded: toDownload.length,
				recycled: toRecycle.length,
				skipped: skipped.length,
				metadataFiles: progress.metadataFiles,
				bytesDownloaded: progress.bytesDownloaded,
				checksumWarnings,
			};
		} catch (error) {
			try {
				await store.abort();
			} catch {
				// Ignore cleanup errors to preserve root cause.
			}
			throw error;
		}
	}

	/**
	 * Classify the remote packages against the committed generation without
	 * storing or committing anything.
	 */
	async plan(): Promise<Classification> {
		const fetchOptions = this.fetchOptions();
		const index = await downloadApply(
			this.remoteUrl(REPOMD_PATH),
			[],
			decodeIndex,
			fetchOptions,
		);
		const classification = emptyClassification();
		const seen = new Set<string>();
		for (const entry of index) {
			if (entry.type !== PRIMARY_METADATA_TYPE) {
				continue;
			}
			const records = await downloadApply(
				this.remoteUrl(entry.location),
				[],
				decodeManifest,
				fetchOptions,
			);
			await this.classify(records, classification, seen);
		}
		return classification;
	}

	private async processMetadata(progress: Progress) {
		const classification = emptyClassification();
		const seen = new Set<string>();
		const { result: index } = await this.downloadStoreApply<RepositoryIndex>(
			REPOMD_PATH,
			decodeIndex,
			progress,
		);
		for (const entry of index) {
			if (entry.type === PRIMARY_METADATA_TYPE) {
				const { result: records } = await this.downloadStoreApply(
					entry.location,
					decodeManifest,
					progress,
				);
				await this.classify(records, classification, seen);
			} else {
				await this.downloadStoreApply(entry.location, drain, progress);
			}
		}

		for (const signaturePath of SIGNATURE_PATHS) {
			try {
				await this.downloadStoreApply(signaturePath, drain, progress);
			} catch (error) {
				if (!isHttpStatus(error, 404)) {
					throw error;
				}
				this.logger.debug(`Got 404 for ${signaturePath}, ignoring...`);
			}
		}
		return classification;
	}

	private async classify(
		records: PackageRecord[],
		classification: Classification,
		seen: Set<string>,
	) {
		// a later primary manifest may list a location again
		const fresh = records.filter((record) => {
			if (seen.has(record.location)) {
				return false;
			}
			seen.add(record.location);
			return true;
		});
		await classifyPackages(
			fresh,
			this.filter,
			this.options.store,
			this.logger,
			classification,
		);
	}

	/** Download a repo-relative path into the store while `consume` reads it. */
	private async downloadStoreApply<T>(
		relativePath: string,
		consume: StreamConsumer<T>,
		progress: Progress,
		expected?: ExpectedChecksum,
	): Promise<{ result: T; written: WriteResult }> {
		this.logger.debug(`Downloading ${relativePath}...`);
		const sink = this.options.store.streamingWriter(relativePath, expected);
		const result = await downloadApply(
			this.remoteUrl(relativePath),
			[sink],
			consume,
			this.fetchOptions(),
		);
		const written = sink.result();
		progress.bytesDownloaded += written.bytes;
		if (!expected) {
			progress.metadataFiles += 1;
		}
		return { result, written };
	}

	private remoteUrl(relativePath: string) {
		return joinUrl(this.options.url, relativePath);
	}

	private fetchOptions() {
		return { fetch: this.options.fetch, timeoutMs: this.options.timeoutMs };
	}
}
