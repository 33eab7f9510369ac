import type { Hash } from "node:crypto";
import { createWriteStream, type WriteStream } from "node:fs";
import { mkdir } from "node:fs/promises";
import path from "node:path";
import { Transform, type TransformCallback } from "node:stream";
import { finished } from "node:stream/promises";
import {
	type KnownChecksumAlgorithm,
	isKnownChecksumAlgorithm,
} from "../metadata/types";
import { createChecksumHash } from "./checksum";
import type { ExpectedChecksum, WriteResult, WriteSink } from "./content-store";

/**
 * Tee into a file: each chunk is written to `filePath` and pushed on
 * unchanged. The file is flushed and closed before the stream finishes.
 */
export class StoringSink extends Transform implements WriteSink {
	private file: WriteStream | null = null;
	private readonly hash: Hash | null;
	private readonly algorithm: KnownChecksumAlgorithm | null;
	private bytes = 0;
	private digest: string | null = null;

	constructor(
		private readonly filePath: string,
		expected?: ExpectedChecksum,
	) {
		super();
		this.algorithm =
			expected && isKnownChecksumAlgorithm(expected.algorithm)
				? expected.algorithm
				: null;
		this.hash = this.algorithm ? createChecksumHash(this.algorithm) : null;
	}

	_transform(
		chunk: Buffer,
		_encoding: BufferEncoding,
		callback: TransformCallback,
	) {
		this.bytes += chunk.length;
		this.hash?.update(chunk);
		this.push(chunk);
		this.openFile().then((file) => {
			if (file.write(chunk)) {
				callback();
			} else {
				file.once("drain", () => callback());
			}
		}, callback);
	}

	_flush(callback: TransformCallback) {
		const close = async () => {
			const file = await this.openFile();
			file.end();
			await finished(file);
			this.digest = this.hash ? this.hash.digest("hex") : null;
		};
		close().then(() => callback(), callback);
	}

	_destroy(
		error: Error | null,
		callback: (error?: Error | null) => void,
	) {
		if (this.file && !this.file.destroyed) {
			this.file.destroy();
		}
		callback(error);
	}

	/** The file is created on the first chunk (or at the end, when empty). */
	private async openFile() {
		if (this.file) {
			return this.file;
		}
		await mkdir(path.dirname(this.filePath), { recursive: true });
		const file = createWriteStream(this.filePath);
		file.on("error", (error) => this.destroy(error));
		this.file = file;
		return file;
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
