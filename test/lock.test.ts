import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	type MirrorLock,
	readLock,
	resolveLockPath,
	validateLock,
	writeLock,
} from "../src/lock";

const lock: MirrorLock = {
	version: 1,
	generatedAt: "2026-01-02T03:04:05.000Z",
	toolVersion: "0.1.0",
	repositories: {
		base: {
			url: "https://example.test/repo",
			archs: ["x86_64"],
			downloaded: 2,
			recycled: 5,
			skipped: 0,
			metadataFiles: 3,
			bytesDownloaded: 4096,
			syncedAt: "2026-01-02T03:04:05.000Z",
		},
	},
};

describe("lock file", () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(path.join(tmpdir(), "repo-mirror-lock-"));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it("resolves beside the config", () => {
		expect(resolveLockPath("/project/mirror.config.json")).toBe(
			path.resolve("/project/mirror.lock"),
		);
	});

	it("writes pretty JSON and reads it back", async () => {
		const lockPath = path.join(dir, "mirror.lock");
		await writeLock(lockPath, lock);
		const raw = await readFile(lockPath, "utf8");
		expect(raw.endsWith("}\n")).toBe(true);
		expect(raw.split("\n")[1]).toBe('  "version": 1,');
		await expect(readLock(lockPath)).resolves.toEqual(lock);
	});

	it("rejects an unsupported version", () => {
		expect(() => validateLock({ ...lock, version: 2 })).toThrow(
			"Lock file version must be 1.",
		);
	});

	it("rejects negative counters", () => {
		expect(() =>
			validateLock({
				...lock,
				repositories: { base: { ...lock.repositories.base, downloaded: -1 } },
			}),
		).toThrow("repositories.base.downloaded must be zero or greater.");
	});

	it("reports invalid JSON", async () => {
		const lockPath = path.join(dir, "mirror.lock");
		await writeFile(lockPath, "{");
		await expect(readLock(lockPath)).rejects.toThrow(
			`Invalid JSON in ${lockPath}:`,
		);
	});
});
