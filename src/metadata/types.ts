export type MetadataEntry = {
	type: string;
	/** Repo-relative path of the metadata file. */
	location: string;
};

export type RepositoryIndex = MetadataEntry[];

export type ChecksumAlgorithm = "sha1" | "sha256" | "unknown";

export type KnownChecksumAlgorithm = Exclude<ChecksumAlgorithm, "unknown">;

export type PackageRecord = {
	architecture: string;
	/** Repo-relative path; unique within a manifest. */
	location: string;
	checksumAlgorithm: ChecksumAlgorithm;
	checksumValue: string;
};

export type PackageManifest = PackageRecord[];

export const PRIMARY_METADATA_TYPE = "primary";

const CHECKSUM_ALGORITHMS = new Map<string, KnownChecksumAlgorithm>([
	["sha", "sha1"],
	["sha1", "sha1"],
	["sha256", "sha256"],
]);

export const toChecksumAlgorithm = (name: string): ChecksumAlgorithm =>
	CHECKSUM_ALGORITHMS.get(name.trim().toLowerCase()) ?? "unknown";

export const isKnownChecksumAlgorithm = (
	algorithm: ChecksumAlgorithm,
): algorithm is KnownChecksumAlgorithm => algorithm !== "unknown";
