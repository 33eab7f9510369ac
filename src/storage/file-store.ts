import { randomBytes } from "node:crypto";
import {
	access,
	copyFile,
	link,
	mkdir,
	readdir,
	rename,
	rm,
} from "node:fs/promises";
import path from "node:path";
import {
	ChecksumError,
	CommitError,
	FileNotFoundError,
	RecycleError,
	getErrnoCode,
	isNotFoundError,
	toErrorMessage,
} from "../errors";
import {
	type ChecksumAlgorithm,
	isKnownChecksumAlgorithm,
} from "../metadata/types";
import { type StorageLayout, resolveInside } from "../paths";
import { hashFile } from "./checksum";
import type { ContentStore, ExpectedChecksum, WriteSink } from "./content-store";
import { type StoreLock, acquireLock } from "./store-lock";
import { StoringSink } from "./storing-sink";

type FileContentStoreOptions = {
	lockTimeoutMs?: number;
};

const exists = async (target: string) => {
	try {
		await access(target);
		return true;
	} catch {
		return false;
	}
};

// link(2) cannot cross devices or is unsupported on some filesystems
const COPY_FALLBACK_CODES = new Set(["EXDEV", "EPERM", "ENOTSUP", "EMLINK"]);

/**
 * Directory-backed store. The committed generation lives in
 * `layout.currentDir`; a sync builds the next one in `layout.stagingDir` and
 * swaps it in on commit.
 */
export class FileContentStore implements ContentStore {
	private lock: StoreLock | null = null;

	constructor(
		readonly layout: StorageLayout,
		private readonly options: FileContentStoreOptions = {},
	) {}

	async begin() {
		if (this.lock) {
			throw new Error(`A sync is already running in ${this.layout.currentDir}.`);
		}
		await mkdir(this.layout.storageDir, { recursive: true });
		const lock = await acquireLock(
			this.layout.lockPath,
			this.options.lockTimeoutMs,
		);
		try {
			await this.recoverInterruptedCommit();
			await rm(this.layout.stagingDir, { recursive: true, force: true });
			await mkdir(this.layout.stagingDir, { recursive: true });
		} catch (error) {
			await lock.release();
			throw error;
		}
		this.lock = lock;
	}

	streamingWriter(relativePath: string, expected?: ExpectedChecksum): WriteSink {
		this.assertStarted();
		return new StoringSink(
			resolveInside(this.layout.stagingDir, relativePath),
			expected,
		);
	}

	async checksum(relativePath: string, algorithm: ChecksumAlgorithm) {
		if (!isKnownChecksumAlgorithm(algorithm)) {
			throw new ChecksumError(
				relativePath,
				`unsupported checksum algorithm '${algorithm}'`,
			);
		}
		let filePath: string;
		try {
			filePath = resolveInside(this.layout.currentDir, relativePath);
		} catch (error) {
			throw new ChecksumError(relativePath, toErrorMessage(error), {
				cause: error,
			});
		}
		try {
			return await hashFile(filePath, algorithm);
		} catch (error) {
			if (isNotFoundError(error)) {
				throw new FileNotFoundError(relativePath, { cause: error });
			}
			throw new ChecksumError(relativePath, toErrorMessage(error), {
				cause: error,
			});
		}
	}

	async recycle(relativePath: string) {
		this.assertStarted();
		try {
			const source = resolveInside(this.layout.currentDir, relativePath);
			const target = resolveInside(this.layout.stagingDir, relativePath);
			await mkdir(path.dirname(target), { recursive: true });
			try {
				await link(source, target);
			} catch (error) {
				const code = getErrnoCode(error);
				if (code === "EEXIST") {
					return;
				}
				if (!code || !COPY_FALLBACK_CODES.has(code)) {
					throw error;
				}
				await copyFile(source, target);
			}
		} catch (error) {
			throw new RecycleError(relativePath, { cause: error });
		}
	}

	async commit() {
		const lock = this.assertStarted();
		const { currentDir, stagingDir, storageDir, backupPrefix } = this.layout;
		const hasCurrent = await exists(currentDir);
		const backupPath = path.join(
			storageDir,
			`${backupPrefix}${randomBytes(8).toString("hex")}`,
		);
		try {
			if (hasCurrent) {
				await rename(currentDir, backupPath);
			}
			try {
				await rename(stagingDir, currentDir);
			} catch (error) {
				if (hasCurrent) {
					await rename(backupPath, currentDir);
				}
				throw error;
			}
		} catch (error) {
			throw new CommitError(
				`Failed to commit ${currentDir}: ${toErrorMessage(error)}`,
				{ cause: error },
			);
		}
		this.lock = null;
		try {
			if (hasCurrent) {
				await rm(backupPath, { recursive: true, force: true });
			}
		} finally {
			await lock.release();
		}
	}

	async abort() {
		const lock = this.lock;
		if (!lock) {
			return;
		}
		this.lock = null;
		try {
			await rm(this.layout.stagingDir, { recursive: true, force: true });
		} finally {
			await lock.release();
		}
	}

	/**
	 * A commit interrupted between its two renames leaves the committed
	 * generation in a backup slot; put it back. Backups next to a committed
	 * generation are leftovers and get removed.
	 */
	private async recoverInterruptedCommit() {
		const { storageDir, currentDir, backupPrefix } = this.layout;
		const backups = (await readdir(storageDir, { withFileTypes: true }))
			.filter((entry) => entry.isDirectory())
			.map((entry) => entry.name)
			.filter((name) => name.startsWith(backupPrefix));
		if (backups.length === 0) {
			return;
		}
		let remaining = backups;
		if (!(await exists(currentDir))) {
			const [restore, ...rest] = backups;
			await rename(path.join(storageDir, restore), currentDir);
			remaining = rest;
		}
		await Promise.all(
			remaining.map((name) =>
				rm(path.join(storageDir, name), { recursive: true, force: true }),
			),
		);
	}

	private assertStarted() {
		if (!this.lock) {
			throw new Error(
				`No sync in progress for ${this.layout.currentDir}; call begin() first.`,
			);
		}
		return this.lock;
	}
}
