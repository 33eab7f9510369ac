import type { Transform } from "node:stream";
import type {
	ChecksumAlgorithm,
	KnownChecksumAlgorithm,
} from "../metadata/types";

export type ExpectedChecksum = {
	algorithm: ChecksumAlgorithm;
	value: string;
};

export type WriteResult = {
	bytes: number;
	/** Digest of the written bytes, when an expected checksum named a known algorithm. */
	checksum: { algorithm: KnownChecksumAlgorithm; value: string } | null;
};

/**
 * Pass-through stream that persists every chunk it forwards. `result()` is
 * meaningful once the stream has finished.
 */
export interface WriteSink extends Transform {
	result(): WriteResult;
}

/**
 * Storage for one mirrored repository, keyed by repo-relative path.
 *
 * Writes and recycles go to a staging generation; reads (`checksum`) see the
 * committed one. At most one sync may run against a store at a time.
 */
export interface ContentStore {
	begin(): Promise<void>;
	/** `expected` is advisory; the store never rejects a write because of it. */
	streamingWriter(path: string, expected?: ExpectedChecksum): WriteSink;
	/**
	 * Rejects with FileNotFoundError when `path` is not stored, ChecksumError
	 * for anything else that prevents hashing it.
	 */
	checksum(path: string, algorithm: ChecksumAlgorithm): Promise<string>;
	recycle(path: string): Promise<void>;
	commit(): Promise<void>;
	abort(): Promise<void>;
}
