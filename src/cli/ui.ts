import path from "node:path";
import pc from "picocolors";
import { toPosixPath } from "../paths";
import type { SyncLogger } from "../sync/logger";

export const symbols = {
	error: pc.red("✖"),
	success: pc.green("✔"),
	info: pc.blue("ℹ"),
	warn: pc.yellow("⚠"),
};

let _silentMode = false;

export const setSilentMode = (silent: boolean) => {
	_silentMode = silent;
};

export const ui = {
	// Formatters
	path: (value: string) => {
		const rel = path.relative(process.cwd(), value);
		const selected = rel.length < value.length ? rel : value;
		return toPosixPath(selected);
	},
	bytes: (value: number) => {
		if (value < 1024) {
			return `${value} B`;
		}
		const units = ["KiB", "MiB", "GiB", "TiB"];
		let scaled = value / 1024;
		let unit = 0;
		while (scaled >= 1024 && unit < units.length - 1) {
			scaled /= 1024;
			unit += 1;
		}
		return `${scaled.toFixed(1)} ${units[unit]}`;
	},
	plural: (count: number, noun: string, nounPlural = `${noun}s`) =>
		`${count} ${count === 1 ? noun : nounPlural}`,

	// Components
	line: (text: string = "") => {
		if (_silentMode) return;
		process.stdout.write(`${text}\n`);
	},

	item: (icon: string, label: string, details?: string) => {
		if (_silentMode) return;
		const partLabel = pc.bold(label);
		const partDetails = details ? pc.gray(details) : "";
		process.stdout.write(`  ${icon} ${partLabel} ${partDetails}\n`);
	},

	step: (action: string, subject: string, details?: string) => {
		if (_silentMode) return;
		const icon = pc.cyan("→");
		process.stdout.write(
			`  ${icon} ${action} ${pc.bold(subject)}${details ? ` ${pc.dim(details)}` : ""}\n`,
		);
	},
};

/**
 * Plain line-per-message logger; debug lines only with `verbose`.
 */
export const createUiLogger = (options: { verbose?: boolean } = {}) =>
	({
		debug: (message) => {
			if (options.verbose) {
				ui.line(pc.dim(message));
			}
		},
		info: (message) => ui.line(`${symbols.info} ${message}`),
		warn: (message) => ui.line(`${symbols.warn} ${message}`),
	}) satisfies SyncLogger;
