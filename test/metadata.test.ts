import { Readable } from "node:stream";
import { gzipSync } from "node:zlib";
import { describe, expect, it } from "vitest";
import { DecompressionError, MalformedMetadataError } from "../src/errors";
import {
	PackageScanner,
	decodeManifest,
	parsePackage,
} from "../src/metadata/primary";
import { decodeIndex, parseIndex } from "../src/metadata/repomd";
import {
	type PackageRecord,
	toChecksumAlgorithm,
} from "../src/metadata/types";
import { primaryXml, repomdXml, sha256 } from "./support/repository";

const streamOf = (...chunks: Array<string | Buffer>) =>
	Readable.from(chunks.map((chunk) => Buffer.from(chunk)));

describe("toChecksumAlgorithm", () => {
	it("maps sha and sha1 to sha1", () => {
		expect(toChecksumAlgorithm("sha")).toBe("sha1");
		expect(toChecksumAlgorithm("sha1")).toBe("sha1");
	});

	it("ignores case and surrounding whitespace", () => {
		expect(toChecksumAlgorithm(" SHA256 ")).toBe("sha256");
	});

	it("treats every other name as unknown", () => {
		expect(toChecksumAlgorithm("md5")).toBe("unknown");
		expect(toChecksumAlgorithm("sha512")).toBe("unknown");
		expect(toChecksumAlgorithm("")).toBe("unknown");
		expect(toChecksumAlgorithm("constructor")).toBe("unknown");
	});
});

describe("parseIndex", () => {
	it("lists data entries in document order", () => {
		const xml = repomdXml([
			{ type: "primary", href: "repodata/p.xml.gz" },
			{ type: "other", href: "repodata/o.xml.gz" },
		]);
		expect(parseIndex(xml)).toEqual([
			{ type: "primary", location: "repodata/p.xml.gz" },
			{ type: "other", location: "repodata/o.xml.gz" },
		]);
	});

	it("returns an empty index for a repomd without data", () => {
		expect(parseIndex("<repomd><revision>1</revision></repomd>")).toEqual([]);
	});

	it("rejects a document without a repomd root", () => {
		expect(() => parseIndex("<metadata/>")).toThrow(
			"repomd.xml has no <repomd> root.",
		);
	});

	it("rejects a data entry without a type", () => {
		expect(() =>
			parseIndex('<repomd><data><location href="a.xml"/></data></repomd>'),
		).toThrow("repomd.xml <data> #1 has no type attribute.");
	});

	it("rejects a data entry without a location href", () => {
		expect(() =>
			parseIndex('<repomd><data type="primary"><location/></data></repomd>'),
		).toThrow('repomd.xml <data type="primary"> has no location href.');
	});

	it("rejects XML that is not well formed", () => {
		expect(() => parseIndex("<repomd><data></repomd>")).toThrow(
			MalformedMetadataError,
		);
	});
});

describe("decodeIndex", () => {
	it("reads the index from a chunked stream", async () => {
		const xml = repomdXml([{ type: "primary", href: "repodata/p.xml.gz" }]);
		const stream = streamOf(xml.slice(0, 40), xml.slice(40));
		await expect(decodeIndex(stream)).resolves.toEqual([
			{ type: "primary", location: "repodata/p.xml.gz" },
		]);
	});
});

describe("parsePackage", () => {
	it("reads arch, location and checksum", () => {
		const record = parsePackage(
			[
				'<package type="rpm">',
				"<arch> noarch </arch>",
				'<checksum type="SHA256" pkgid="YES"> ABCDEF </checksum>',
				'<location href="pkgs/a-1.0.rpm"/>',
				"</package>",
			].join(""),
		);
		expect(record).toEqual({
			architecture: "noarch",
			location: "pkgs/a-1.0.rpm",
			checksumAlgorithm: "sha256",
			checksumValue: "abcdef",
		});
	});

	it("marks a missing checksum as unknown", () => {
		expect(
			parsePackage('<package><arch>i386</arch><location href="b.rpm"/></package>'),
		).toEqual({
			architecture: "i386",
			location: "b.rpm",
			checksumAlgorithm: "unknown",
			checksumValue: "",
		});
	});

	it("rejects a package without a location href", () => {
		expect(() => parsePackage("<package><arch>x86_64</arch></package>")).toThrow(
			"primary <package> has no location href.",
		);
	});
});

describe("PackageScanner", () => {
	it("emits packages split across arbitrary chunk boundaries", () => {
		const xml = primaryXml([
			{ location: "pkgs/a-1.0.rpm", content: "a" },
			{ location: "pkgs/b-2.0.rpm", arch: "noarch", content: "b" },
		]);
		const records: PackageRecord[] = [];
		const scanner = new PackageScanner((record) => records.push(record));
		for (let index = 0; index < xml.length; index += 5) {
			scanner.push(xml.slice(index, index + 5));
		}
		scanner.end();
		expect(records).toEqual([
			{
				architecture: "x86_64",
				location: "pkgs/a-1.0.rpm",
				checksumAlgorithm: "sha256",
				checksumValue: sha256("a"),
			},
			{
				architecture: "noarch",
				location: "pkgs/b-2.0.rpm",
				checksumAlgorithm: "sha256",
				checksumValue: sha256("b"),
			},
		]);
	});

	it("accepts an empty self-closing metadata root", () => {
		const records: PackageRecord[] = [];
		const scanner = new PackageScanner((record) => records.push(record));
		scanner.push('<?xml version="1.0"?>\n<metadata packages="0"/>\n');
		scanner.end();
		expect(records).toEqual([]);
	});

	it("rejects text without a metadata root", () => {
		const scanner = new PackageScanner(() => {});
		scanner.push("<repomd></repomd>");
		expect(() => scanner.end()).toThrow("primary.xml has no <metadata> root.");
	});

	it("rejects a document cut off before its end tag", () => {
		const xml = primaryXml([{ location: "a.rpm", content: "a" }]);
		const scanner = new PackageScanner(() => {});
		scanner.push(xml.slice(0, xml.indexOf("</metadata>")));
		expect(() => scanner.end()).toThrow("primary.xml ended before </metadata>.");
	});

	it("rejects a package element that is not well formed", () => {
		const scanner = new PackageScanner(() => {});
		expect(() =>
			scanner.push(
				'<metadata><package><arch>x86_64<location href="a.rpm"/></package></metadata>',
			),
		).toThrow(MalformedMetadataError);
	});
});

describe("decodeManifest", () => {
	it("gunzips and decodes the manifest", async () => {
		const compressed = gzipSync(
			primaryXml([
				{
					location: "pkgs/a-1.0.rpm",
					content: "a",
					checksumType: "sha",
					checksum: "AAA",
				},
			]),
		);
		const stream = streamOf(compressed.subarray(0, 10), compressed.subarray(10));
		await expect(decodeManifest(stream)).resolves.toEqual([
			{
				architecture: "x86_64",
				location: "pkgs/a-1.0.rpm",
				checksumAlgorithm: "sha1",
				checksumValue: "aaa",
			},
		]);
	});

	it("rejects input that is not gzip", async () => {
		await expect(
			decodeManifest(streamOf(primaryXml([]))),
		).rejects.toBeInstanceOf(DecompressionError);
	});

	const PKG =
		'<package><arch>x86_64</arch><location href="a.rpm"/></package>';

	it.each([
		["broken markup between packages", `<metadata>${PKG}<<oops ${PKG}</metadata>`],
		["an unclosed element around a package", `<metadata><bogus>${PKG}</metadata>`],
		["junk after the root", `<metadata>${PKG}</metadata><<<junk`],
	])("rejects a manifest with %s", async (_name, xml) => {
		await expect(
			decodeManifest(streamOf(gzipSync(xml))),
		).rejects.toBeInstanceOf(MalformedMetadataError);
	});

	it("rejects gzip content that is not a manifest", async () => {
		await expect(
			decodeManifest(streamOf(gzipSync("<repomd></repomd>"))),
		).rejects.toThrow("primary.xml has no <metadata> root.");
	});
});
