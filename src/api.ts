export { cleanStorage } from "./clean";
export {
	DEFAULT_CONFIG_FILENAME,
	DEFAULT_STORAGE_DIR,
	loadConfig,
	validateConfig,
} from "./config";
export type {
	MirrorConfig,
	MirrorDefaults,
	MirrorRepository,
	MirrorResolvedRepository,
} from "./config";
export * from "./errors";
export {
	type FetchLike,
	type FetchOptions,
	type StreamConsumer,
	downloadApply,
	drain,
	fetchStream,
	joinUrl,
} from "./http/fetch-stream";
export { type MirrorLock, readLock, writeLock } from "./lock";
export { decodeManifest } from "./metadata/primary";
export { decodeIndex } from "./metadata/repomd";
export {
	type ChecksumAlgorithm,
	type MetadataEntry,
	type PackageManifest,
	type PackageRecord,
	type RepositoryIndex,
	toChecksumAlgorithm,
} from "./metadata/types";
export { getStorageLayout, type StorageLayout } from "./paths";
export { getStatus } from "./status";
export type {
	ContentStore,
	ExpectedChecksum,
	WriteResult,
	WriteSink,
} from "./storage/content-store";
export { FileContentStore } from "./storage/file-store";
export { MemoryContentStore } from "./storage/memory-store";
export {
	type ArchitectureFilter,
	type Classification,
	classifyPackages,
	createArchitectureFilter,
} from "./sync/classify";
export { type SyncLogger, silentLogger } from "./sync/logger";
export { Syncer, type SyncerOptions } from "./sync/syncer";
export { runSync, type SyncDeps } from "./sync";
export type { SyncOptions, SyncPlanSummary, SyncSummary } from "./types/sync";
export { verifyStorage } from "./verify";
