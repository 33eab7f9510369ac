import { readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { DEFAULT_LOCK_FILENAME } from "./paths";

export interface MirrorLockRepository {
	url: string;
	archs: string[];
	downloaded: number;
	recycled: number;
	skipped: number;
	metadataFiles: number;
	bytesDownloaded: number;
	syncedAt: string;
}

export interface MirrorLock {
	version: 1;
	generatedAt: string;
	toolVersion: string;
	repositories: Record<string, MirrorLockRepository>;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

const assertString = (value: unknown, label: string): string => {
	if (typeof value !== "string" || value.length === 0) {
		throw new Error(`${label} must be a non-empty string.`);
	}
	return value;
};

const assertNumber = (value: unknown, label: string): number => {
	if (typeof value !== "number" || Number.isNaN(value)) {
		throw new Error(`${label} must be a number.`);
	}
	return value;
};

const assertPositiveNumber = (value: unknown, label: string): number => {
	const numberValue = assertNumber(value, label);
	if (numberValue < 0) {
		throw new Error(`${label} must be zero or greater.`);
	}
	return numberValue;
};

const assertStringArray = (value: unknown, label: string): string[] => {
	if (!Array.isArray(value)) {
		throw new Error(`${label} must be an array.`);
	}
	return value.map((entry, index) => assertString(entry, `${label}[${index}]`));
};

export const validateLock = (input: unknown): MirrorLock => {
	if (!isRecord(input)) {
		throw new Error("Lock file must be a JSON object.");
	}
	const version = input.version;
	if (version !== 1) {
		throw new Error("Lock file version must be 1.");
	}
	const generatedAt = assertString(input.generatedAt, "generatedAt");
	const toolVersion = assertString(input.toolVersion, "toolVersion");
	if (!isRecord(input.repositories)) {
		throw new Error("repositories must be an object.");
	}
	const repositories: Record<string, MirrorLockRepository> = {};
	for (const [key, value] of Object.entries(input.repositories)) {
		if (!isRecord(value)) {
			throw new Error(`repositories.${key} must be an object.`);
		}
		const label = `repositories.${key}`;
		repositories[key] = {
			url: assertString(value.url, `${label}.url`),
			archs: assertStringArray(value.archs, `${label}.archs`),
			downloaded: assertPositiveNumber(value.downloaded, `${label}.downloaded`),
			recycled: assertPositiveNumber(value.recycled, `${label}.recycled`),
			skipped: assertPositiveNumber(value.skipped, `${label}.skipped`),
			metadataFiles: assertPositiveNumber(
				value.metadataFiles,
				`${label}.metadataFiles`,
			),
			bytesDownloaded: assertPositiveNumber(
				value.bytesDownloaded,
				`${label}.bytesDownloaded`,
			),
			syncedAt: assertString(value.syncedAt, `${label}.syncedAt`),
		};
	}
	return {
		version: 1,
		generatedAt,
		toolVersion,
		repositories,
	};
};

export const resolveLockPath = (configPath: string, lockName?: string) =>
	path.resolve(path.dirname(configPath), lockName ?? DEFAULT_LOCK_FILENAME);

export const readLock = async (lockPath: string) => {
	let raw: string;
	try {
		raw = await readFile(lockPath, "utf8");
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Failed to read lock file at ${lockPath}: ${message}`);
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(raw);
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw new Error(`Invalid JSON in ${lockPath}: ${message}`);
	}
	return validateLock(parsed);
};

export const writeLock = async (lockPath: string, lock: MirrorLock) => {
	const data = `${JSON.stringify(lock, null, 2)}\n`;
	await writeFile(lockPath, data, "utf8");
};
