import { Transform, type TransformCallback } from "node:stream";
import {
	ChecksumError,
	FileNotFoundError,
	RecycleError,
} from "../errors";
import {
	type ChecksumAlgorithm,
	type KnownChecksumAlgorithm,
	isKnownChecksumAlgorithm,
} from "../metadata/types";
import { createChecksumHash } from "./checksum";
import type {
	ContentStore,
	ExpectedChecksum,
	WriteResult,
	WriteSink,
} from "./content-store";

class MemorySink extends Transform implements WriteSink {
	private readonly chunks: Buffer[] = [];
	private readonly algorithm: KnownChecksumAlgorithm | null;
	private bytes = 0;
	private digest: string | null = null;

	constructor(
		private readonly save: (data: Buffer) => void,
		expected?: ExpectedChecksum,
	) {
		super();
		this.algorithm =
			expected && isKnownChecksumAlgorithm(expected.algorithm)
				? expected.algorithm
				: null;
	}

	_transform(
		chunk: Buffer,
		_encoding: BufferEncoding,
		callback: TransformCallback,
	) {
		this.chunks.push(chunk);
		this.bytes += chunk.length;
		callback(null, chunk);
	}

	_flush(callback: TransformCallback) {
		const data = Buffer.concat(this.chunks);
		if (this.algorithm) {
			this.digest = createChecksumHash(this.algorithm)
				.update(data)
				.digest("hex");
		}
		this.save(data);
		callback();
	}

	result(): WriteResult {
		return {
			bytes: this.bytes,
			checksum:
				this.algorithm && this.digest
					? { algorithm: this.algorithm, value: this.digest }
					: null,
		};
	}
}

/**
 * ContentStore kept in memory, for tests and embedding.
 */
export class MemoryContentStore implements ContentStore {
	private committed = new Map<string, Buffer>();
	private staging: Map<string, Buffer> | null = null;

	constructor(files: Record<string, string | Buffer> = {}) {
		for (const [filePath, data] of Object.entries(files)) {
			this.committed.set(filePath, Buffer.from(data));
		}
	}

	/** Paths of the committed generation, sorted. */
	paths() {
		return Array.from(this.committed.keys()).sort();
	}

	read(filePath: string) {
		return this.committed.get(filePath) ?? null;
	}

	get syncInProgress() {
		return this.staging !== null;
	}

	async begin() {
		if (this.staging) {
			throw new Error("A sync is already running in this store.");
		}
		this.staging = new Map();
	}

	streamingWriter(filePath: string, expected?: ExpectedChecksum): WriteSink {
		const staging = this.assertStarted();
		return new MemorySink((data) => staging.set(filePath, data), expected);
	}

	async checksum(filePath: string, algorithm: ChecksumAlgorithm) {
		if (!isKnownChecksumAlgorithm(algorithm)) {
			throw new ChecksumError(
				filePath,
				`unsupported checksum algorithm '${algorithm}'`,
			);
		}
		const data = this.committed.get(filePath);
		if (!data) {
			throw new FileNotFoundError(filePath);
		}
		return createChecksumHash(algorithm).update(data).digest("hex");
	}

	async recycle(filePath: string) {
		const staging = this.assertStarted();
		const data = this.committed.get(filePath);
		if (!data) {
			throw new RecycleError(filePath, {
				cause: new FileNotFoundError(filePath),
			});
		}
		staging.set(filePath, data);
	}

	async commit() {
		this.committed = this.assertStarted();
		this.staging = null;
	}

	async abort() {
		this.staging = null;
	}

	private assertStarted() {
		if (!this.staging) {
			throw new Error("No sync in progress; call begin() first.");
		}
		return this.staging;
	}
}
