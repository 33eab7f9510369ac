import pc from "picocolors";
import type { SyncLogger } from "../sync/logger";
import type { SyncSummary } from "../types/sync";
import { createLiveOutput, type LiveOutput } from "./live-output";
import { symbols, ui } from "./ui";

const formatDuration = (ms: number) => {
	const seconds = Math.max(0, ms / 1000);
	if (seconds < 60) {
		return `${seconds.toFixed(1)}s`;
	}
	const minutes = Math.floor(seconds / 60);
	const remainder = seconds % 60;
	return `${minutes}m ${remainder.toFixed(1)}s`;
};

export type TaskReporterOptions = {
	maxLiveLines?: number;
	output?: LiveOutput;
	/** Redraw on every update; defaults to whether stdout is a terminal. */
	live?: boolean;
	now?: () => number;
};

/**
 * Live view of a multi-repository sync: one line per finished repository,
 * the running one with its latest log lines underneath.
 */
export class TaskReporter implements SyncLogger {
	private readonly output: LiveOutput;
	private readonly maxLiveLines: number;
	private readonly now: () => number;
	private readonly startTime: number;
	private readonly live: boolean;
	private readonly results: string[] = [];
	private readonly liveLines: string[] = [];
	private running: string | null = null;
	private timer: NodeJS.Timeout | null = null;
	private warnings = 0;

	constructor(options: TaskReporterOptions = {}) {
		this.output = options.output ?? createLiveOutput();
		this.maxLiveLines = options.maxLiveLines ?? 4;
		this.now = options.now ?? Date.now;
		this.startTime = this.now();
		this.live = options.live ?? Boolean(process.stdout.isTTY);
		this.startTimer();
	}

	start(repositoryId: string) {
		this.running = repositoryId;
		this.liveLines.length = 0;
		this.render();
	}

	complete(summary: SyncSummary) {
		const details = [
			`${summary.downloaded} downloaded`,
			`${summary.recycled} recycled`,
			summary.skipped ? `${summary.skipped} skipped` : null,
			ui.bytes(summary.bytesDownloaded),
		]
			.filter(Boolean)
			.join(", ");
		const icon =
			summary.skipped || summary.checksumWarnings
				? symbols.warn
				: symbols.success;
		this.results.push(this.formatLine(icon, summary.repositoryId, details));
		this.running = null;
		this.liveLines.length = 0;
		this.render();
	}

	debug(message: string) {
		this.pushLive(pc.dim(message));
	}

	info(message: string) {
		this.pushLive(message);
	}

	warn(message: string) {
		this.warnings += 1;
		this.results.push(`  ${symbols.warn} ${message}`);
		this.render();
	}

	finish() {
		this.liveLines.length = 0;
		this.running = null;
		const parts = [
			`Completed in ${formatDuration(this.now() - this.startTime)}`,
			this.warnings ? ui.plural(this.warnings, "warning") : null,
		].filter(Boolean);
		this.output.persist(
			this.composeView([`${symbols.info} ${parts.join(" · ")}`]),
		);
		this.stopTimer();
	}

	stop() {
		this.output.stop();
		this.stopTimer();
	}

	private pushLive(line: string) {
		this.liveLines.push(line);
		if (this.liveLines.length > this.maxLiveLines) {
			this.liveLines.splice(0, this.liveLines.length - this.maxLiveLines);
		}
		this.render();
	}

	private render() {
		if (!this.live) return;
		this.output.render(this.composeView());
	}

	private startTimer() {
		if (!this.live) return;
		this.timer = setInterval(() => {
			if (this.running) {
				this.render();
			}
		}, 250);
		this.timer.unref?.();
	}

	private stopTimer() {
		if (!this.timer) return;
		clearInterval(this.timer);
		this.timer = null;
	}

	private composeView(extraFooter: string[] = []) {
		const running = this.running
			? [
					`${pc.cyan("→")} ${this.running}`,
					...this.liveLines.map((line) => `    ${line}`),
					pc.dim(`time: ${formatDuration(this.now() - this.startTime)}`),
				]
			: [];
		const lines = [...this.results, ...running, ...extraFooter];
		return lines.length > 0 ? lines : [" "];
	}

	private formatLine(icon: string, label: string, details?: string) {
		const partLabel = pc.bold(label);
		const partDetails = details ? pc.gray(details) : "";
		return `  ${icon} ${partLabel} ${partDetails}`.trimEnd();
	}
}
