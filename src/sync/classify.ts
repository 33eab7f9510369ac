import { FileNotFoundError, toErrorMessage } from "../errors";
import type { PackageRecord } from "../metadata/types";
import type { ContentStore } from "../storage/content-store";
import type { SyncLogger } from "./logger";

export const NOARCH = "noarch";

/** Accepted architectures; empty accepts everything. */
export type ArchitectureFilter = ReadonlySet<string>;

export const createArchitectureFilter = (
	archs: Iterable<string> = [],
): ArchitectureFilter => new Set(archs);

export const acceptsArchitecture = (
	filter: ArchitectureFilter,
	architecture: string,
) => filter.size === 0 || architecture === NOARCH || filter.has(architecture);

export type SkippedPackage = {
	record: PackageRecord;
	reason: string;
};

export type Classification = {
	toDownload: PackageRecord[];
	toRecycle: PackageRecord[];
	skipped: SkippedPackage[];
};

export const emptyClassification = (): Classification => ({
	toDownload: [],
	toRecycle: [],
	skipped: [],
});

/**
 * Decide, per package, whether to download it, keep the stored copy or skip
 * it. The remote checksum is authoritative; a stored file is only kept when
 * its digest matches.
 */
export const classifyPackages = async (
	records: Iterable<PackageRecord>,
	filter: ArchitectureFilter,
	store: Pick<ContentStore, "checksum">,
	logger: SyncLogger,
	into: Classification = emptyClassification(),
): Promise<Classification> => {
	for (const record of records) {
		if (!acceptsArchitecture(filter, record.architecture)) {
			continue;
		}
		const { location } = record;
		if (record.checksumAlgorithm === "unknown") {
			logger.debug(
				`...package '${location}' has an unknown checksum type, will be downloaded`,
			);
			into.toDownload.push(record);
			continue;
		}
		let stored: string;
		try {
			stored = await store.checksum(location, record.checksumAlgorithm);
		} catch (error) {
			if (error instanceof FileNotFoundError) {
				logger.debug(`...package '${location}' not found, will be downloaded`);
				into.toDownload.push(record);
				continue;
			}
			const reason = toErrorMessage(error);
			logger.warn(`Checksum of package '${location}' failed, skipped: ${reason}`);
			into.skipped.push({ record, reason });
			continue;
		}
		if (stored !== record.checksumValue) {
			logger.debug(
				`...package '${location}' has a checksum mismatch, will be redownloaded [repo '${record.checksumValue}' vs local '${stored}']`,
			);
			into.toDownload.push(record);
			continue;
		}
		logger.debug(`...package '${location}' is up to date, will be recycled`);
		into.toRecycle.push(record);
	}
	return into;
};
