import { describe, expect, it, vi } from "vitest";
import { ChecksumError } from "../src/errors";
import type { PackageRecord } from "../src/metadata/types";
import { MemoryContentStore } from "../src/storage/memory-store";
import {
	acceptsArchitecture,
	classifyPackages,
	createArchitectureFilter,
} from "../src/sync/classify";
import { createRecordingLogger } from "./support/recording-logger";
import { sha256 } from "./support/repository";

const record = (
	location: string,
	overrides: Partial<PackageRecord> = {},
): PackageRecord => ({
	architecture: "x86_64",
	location,
	checksumAlgorithm: "sha256",
	checksumValue: sha256(location),
	...overrides,
});

const locations = (records: PackageRecord[]) =>
	records.map((entry) => entry.location);

describe("acceptsArchitecture", () => {
	it("accepts everything with an empty filter", () => {
		const filter = createArchitectureFilter();
		expect(acceptsArchitecture(filter, "i386")).toBe(true);
		expect(acceptsArchitecture(filter, "")).toBe(true);
	});

	it("always accepts noarch", () => {
		const filter = createArchitectureFilter(["x86_64"]);
		expect(acceptsArchitecture(filter, "noarch")).toBe(true);
		expect(acceptsArchitecture(filter, "x86_64")).toBe(true);
		expect(acceptsArchitecture(filter, "i386")).toBe(false);
	});
});

describe("classifyPackages", () => {
	it("downloads packages missing from the store", async () => {
		const store = new MemoryContentStore();
		const result = await classifyPackages(
			[record("a.rpm"), record("b.rpm")],
			createArchitectureFilter(),
			store,
			createRecordingLogger(),
		);
		expect(locations(result.toDownload)).toEqual(["a.rpm", "b.rpm"]);
		expect(result.toRecycle).toEqual([]);
		expect(result.skipped).toEqual([]);
	});

	it("recycles packages whose stored checksum matches", async () => {
		const store = new MemoryContentStore({ "a.rpm": "a.rpm" });
		const logger = createRecordingLogger();
		const result = await classifyPackages(
			[record("a.rpm")],
			createArchitectureFilter(),
			store,
			logger,
		);
		expect(locations(result.toRecycle)).toEqual(["a.rpm"]);
		expect(result.toDownload).toEqual([]);
		expect(logger.messages("debug")).toEqual([
			"...package 'a.rpm' is up to date, will be recycled",
		]);
	});

	it("redownloads packages whose stored checksum differs", async () => {
		const store = new MemoryContentStore({ "a.rpm": "stale bytes" });
		const logger = createRecordingLogger();
		const result = await classifyPackages(
			[record("a.rpm")],
			createArchitectureFilter(),
			store,
			logger,
		);
		expect(locations(result.toDownload)).toEqual(["a.rpm"]);
		expect(result.toRecycle).toEqual([]);
		expect(logger.messages("debug")).toEqual([
			`...package 'a.rpm' has a checksum mismatch, will be redownloaded [repo '${sha256("a.rpm")}' vs local '${sha256("stale bytes")}']`,
		]);
	});

	it("downloads packages with an unknown algorithm without asking the store", async () => {
		const store = new MemoryContentStore({ "a.rpm": "a.rpm" });
		const checksum = vi.spyOn(store, "checksum");
		const result = await classifyPackages(
			[record("a.rpm", { checksumAlgorithm: "unknown" })],
			createArchitectureFilter(),
			store,
			createRecordingLogger(),
		);
		expect(locations(result.toDownload)).toEqual(["a.rpm"]);
		expect(result.toRecycle).toEqual([]);
		expect(checksum).not.toHaveBeenCalled();
	});

	it("skips packages whose checksum cannot be computed", async () => {
		const logger = createRecordingLogger();
		const store = {
			checksum: async (path: string) => {
				throw new ChecksumError(path, "permission denied");
			},
		};
		const result = await classifyPackages(
			[record("a.rpm")],
			createArchitectureFilter(),
			store,
			logger,
		);
		expect(result.toDownload).toEqual([]);
		expect(result.toRecycle).toEqual([]);
		expect(result.skipped).toEqual([
			{
				record: record("a.rpm"),
				reason: "Cannot compute checksum of a.rpm: permission denied",
			},
		]);
		expect(logger.messages("warn")).toEqual([
			"Checksum of package 'a.rpm' failed, skipped: Cannot compute checksum of a.rpm: permission denied",
		]);
	});

	it("excludes architectures outside the filter silently", async () => {
		const logger = createRecordingLogger();
		const result = await classifyPackages(
			[
				record("x.rpm"),
				record("n.rpm", { architecture: "noarch" }),
				record("i.rpm", { architecture: "i386" }),
			],
			createArchitectureFilter(["x86_64"]),
			new MemoryContentStore(),
			logger,
		);
		expect(locations(result.toDownload)).toEqual(["x.rpm", "n.rpm"]);
		expect(logger.lines.some((line) => line.message.includes("i.rpm"))).toBe(
			false,
		);
	});

	it("appends to an existing classification", async () => {
		const store = new MemoryContentStore({ "a.rpm": "a.rpm" });
		const filter = createArchitectureFilter();
		const logger = createRecordingLogger();
		const first = await classifyPackages([record("a.rpm")], filter, store, logger);
		const second = await classifyPackages(
			[record("b.rpm")],
			filter,
			store,
			logger,
			first,
		);
		expect(second).toBe(first);
		expect(locations(second.toRecycle)).toEqual(["a.rpm"]);
		expect(locations(second.toDownload)).toEqual(["b.rpm"]);
	});
});
