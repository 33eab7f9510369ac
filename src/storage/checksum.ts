import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import type { KnownChecksumAlgorithm } from "../metadata/types";

export const createChecksumHash = (algorithm: KnownChecksumAlgorithm) =>
	createHash(algorithm);

export const hashFile = async (
	filePath: string,
	algorithm: KnownChecksumAlgorithm,
) => {
	const hash = createChecksumHash(algorithm);
	for await (const chunk of createReadStream(filePath)) {
		hash.update(chunk);
	}
	return hash.digest("hex");
};
