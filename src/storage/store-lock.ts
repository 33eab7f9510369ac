import { open, rm } from "node:fs/promises";
import { getErrnoCode } from "../errors";

export type StoreLock = {
	release: () => Promise<void>;
};

export const DEFAULT_LOCK_TIMEOUT_MS = 5000;

export const acquireLock = async (
	lockPath: string,
	timeoutMs = DEFAULT_LOCK_TIMEOUT_MS,
): Promise<StoreLock> => {
	const start = Date.now();
	do {
		try {
			const fd = await open(lockPath, "wx");
			await fd.writeFile(`${process.pid}\n`, "utf8");
			return {
				release: async () => {
					await fd.close();
					await rm(lockPath, { force: true });
				},
			};
		} catch (error) {
			const code = getErrnoCode(error);
			if (code !== "EEXIST") {
				throw error;
			}
			await new Promise((resolve) => setTimeout(resolve, 100));
		}
	} while (Date.now() - start < timeoutMs);
	throw new Error(
		`Failed to acquire lock ${lockPath}. Another sync may be running; remove the file if it is stale.`,
	);
};
