import type { SyncLogger } from "../../src/sync/logger";

export type RecordingLogger = SyncLogger & {
	lines: Array<{ level: "debug" | "info" | "warn"; message: string }>;
	messages: (level: "debug" | "info" | "warn") => string[];
};

export const createRecordingLogger = (): RecordingLogger => {
	const lines: RecordingLogger["lines"] = [];
	return {
		lines,
		debug: (message) => lines.push({ level: "debug", message }),
		info: (message) => lines.push({ level: "info", message }),
		warn: (message) => lines.push({ level: "warn", message }),
		messages: (level) =>
			lines.filter((line) => line.level === level).map((line) => line.message),
	};
};
