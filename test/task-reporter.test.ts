import { describe, expect, it } from "vitest";
import type { LiveOutput } from "../src/cli/live-output";
import { TaskReporter } from "../src/cli/task-reporter";

const stripAnsi = (line: string) => line.replace(/\u001b\[[0-9;]*m/g, "");

const createRecordingOutput = () => {
	const frames: string[][] = [];
	const persisted: string[][] = [];
	const output: LiveOutput = {
		render: (lines) => frames.push(lines.map(stripAnsi)),
		persist: (lines) => persisted.push(lines.map(stripAnsi)),
		stop: () => {},
	};
	return { output, frames, persisted };
};

describe("TaskReporter", () => {
	it("shows the running repository with its latest log lines", () => {
		const { output, frames } = createRecordingOutput();
		const reporter = new TaskReporter({
			output,
			live: true,
			maxLiveLines: 2,
			now: () => 0,
		});
		reporter.start("base");
		reporter.debug("Downloading repodata/repomd.xml...");
		reporter.info("Downloading 3 packages...");
		reporter.info("Recycling 0 packages...");
		reporter.stop();

		expect(frames.at(-1)).toEqual([
			"→ base",
			"    Downloading 3 packages...",
			"    Recycling 0 packages...",
			"time: 0.0s",
		]);
	});

	it("persists finished repositories and warnings", () => {
		const { output, persisted } = createRecordingOutput();
		let clock = 0;
		const reporter = new TaskReporter({ output, live: true, now: () => clock });
		reporter.start("base");
		reporter.warn("Checksum of package 'a.rpm' failed, skipped: denied");
		reporter.complete({
			repositoryId: "base",
			url: "http://mirror.test/repo",
			archs: [],
			downloaded: 1,
			recycled: 2,
			skipped: 1,
			metadataFiles: 3,
			bytesDownloaded: 2048,
			checksumWarnings: 0,
		});
		clock = 1500;
		reporter.finish();

		expect(persisted).toEqual([
			[
				"  ⚠ Checksum of package 'a.rpm' failed, skipped: denied",
				"  ⚠ base 1 downloaded, 2 recycled, 1 skipped, 2.0 KiB",
				"ℹ Completed in 1.5s · 1 warning",
			],
		]);
	});

	it("does not redraw when output is not live", () => {
		const { output, frames } = createRecordingOutput();
		const reporter = new TaskReporter({ output, live: false });
		reporter.start("base");
		reporter.info("Downloading 1 packages...");
		reporter.stop();
		expect(frames).toEqual([]);
	});
});
