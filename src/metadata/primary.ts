import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { createGunzip } from "node:zlib";
import {
	DecompressionError,
	MalformedMetadataError,
	getErrnoCode,
	toErrorMessage,
} from "../errors";
import { type PackageRecord, toChecksumAlgorithm } from "./types";
import {
	assertWellFormed,
	attribute,
	childNode,
	createMetadataParser,
	textContent,
} from "./xml";

const ROOT_OPEN = /<(?:[\w.-]+:)?metadata[\s>/]/;
const PACKAGE_OPEN = /<(?:[\w.-]+:)?package[\s>]/g;
const PACKAGE_CLOSE = /<\/(?:[\w.-]+:)?package\s*>/g;
const ROOT_CLOSE = /<\/(?:[\w.-]+:)?metadata\s*>/;

const parser = createMetadataParser();

export const parsePackage = (fragment: string): PackageRecord => {
	assertWellFormed(fragment, "primary <package>");
	const element = childNode(parser.parse(fragment), "package");
	if (!element) {
		throw new MalformedMetadataError("primary <package> element is empty.");
	}
	const location = childNode(element, "location");
	const href = location ? attribute(location, "href") : null;
	if (!href) {
		throw new MalformedMetadataError(
			"primary <package> has no location href.",
		);
	}
	const checksum = childNode(element, "checksum");
	return {
		architecture: (textContent(element, "arch") ?? "").trim(),
		location: href,
		checksumAlgorithm: toChecksumAlgorithm(
			(checksum ? attribute(checksum, "type") : null) ?? "",
		),
		checksumValue: (textContent(element, "checksum") ?? "")
			.trim()
			.toLowerCase(),
	};
};

/**
 * Cuts complete <package> elements out of primary.xml text as it arrives, so
 * only the element being read is held in memory. Everything around the
 * packages is kept as a skeleton, each package reduced to `<package/>`, and
 * checked for well-formedness once the text ends.
 */
export class PackageScanner {
	private buffer = "";
	private skeleton = "";
	private state: "prolog" | "packages" | "done" = "prolog";

	constructor(private readonly onPackage: (record: PackageRecord) => void) {}

	push(text: string) {
		if (this.state === "done") {
			this.skeleton += text;
			return;
		}
		this.buffer += text;
		if (this.state === "prolog") {
			const rootMatch = ROOT_OPEN.exec(this.buffer);
			if (!rootMatch) {
				return;
			}
			const tagEnd = this.buffer.indexOf(">", rootMatch.index);
			if (tagEnd === -1) {
				return;
			}
			if (this.buffer[tagEnd - 1] === "/") {
				this.finish();
				return;
			}
			this.keep(tagEnd + 1);
			this.state = "packages";
		}
		this.drainPackages();
	}

	end() {
		if (this.state === "prolog") {
			throw new MalformedMetadataError("primary.xml has no <metadata> root.");
		}
		if (this.state === "packages") {
			throw new MalformedMetadataError(
				"primary.xml ended before </metadata>.",
			);
		}
		assertWellFormed(this.skeleton, "primary.xml");
	}

	/** Move `buffer[0, length)` into the skeleton. */
	private keep(length: number) {
		this.skeleton += this.buffer.slice(0, length);
		this.buffer = this.buffer.slice(length);
	}

	private finish() {
		this.keep(this.buffer.length);
		this.state = "done";
	}

	private drainPackages() {
		while (this.state === "packages") {
			PACKAGE_OPEN.lastIndex = 0;
			const open = PACKAGE_OPEN.exec(this.buffer);
			const rootClose = ROOT_CLOSE.exec(this.buffer);
			if (rootClose && (!open || rootClose.index < open.index)) {
				this.finish();
				return;
			}
			if (!open) {
				// keep a tail long enough to hold a split opening tag
				this.keep(Math.max(0, this.buffer.length - 64));
				return;
			}
			this.keep(open.index);
			PACKAGE_CLOSE.lastIndex = 0;
			const close = PACKAGE_CLOSE.exec(this.buffer);
			if (!close) {
				return;
			}
			const end = close.index + close[0].length;
			this.onPackage(parsePackage(this.buffer.slice(0, end)));
			this.skeleton += "<package/>";
			this.buffer = this.buffer.slice(end);
		}
	}
}

const isZlibError = (error: unknown) =>
	getErrnoCode(error)?.startsWith("Z_") ?? false;

/**
 * Decode a gzip-compressed primary manifest.
 */
export const decodeManifest = async (stream: Readable) => {
	const records: PackageRecord[] = [];
	const scanner = new PackageScanner((record) => records.push(record));
	const gunzip = createGunzip();
	gunzip.setEncoding("utf8");
	try {
		await pipeline(stream, gunzip, async (source: AsyncIterable<unknown>) => {
			for await (const chunk of source) {
				scanner.push(String(chunk));
			}
		});
	} catch (error) {
		if (isZlibError(error)) {
			throw new DecompressionError(
				`primary metadata is not valid gzip: ${toErrorMessage(error)}`,
				{ cause: error },
			);
		}
		throw error;
	}
	scanner.end();
	return records;
};
