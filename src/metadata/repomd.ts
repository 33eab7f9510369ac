import type { Readable } from "node:stream";
import { MalformedMetadataError } from "../errors";
import type { MetadataEntry, RepositoryIndex } from "./types";
import {
	assertWellFormed,
	attribute,
	childNode,
	childNodes,
	createMetadataParser,
	readText,
} from "./xml";

const parser = createMetadataParser(["data"]);

export const parseIndex = (xml: string): RepositoryIndex => {
	assertWellFormed(xml, "repomd.xml");
	const document = parser.parse(xml);
	const root = childNode(document, "repomd");
	if (!root) {
		throw new MalformedMetadataError("repomd.xml has no <repomd> root.");
	}
	return childNodes(root, "data").map((data, index): MetadataEntry => {
		const type = attribute(data, "type");
		if (!type) {
			throw new MalformedMetadataError(
				`repomd.xml <data> #${index + 1} has no type attribute.`,
			);
		}
		const location = childNode(data, "location");
		const href = location ? attribute(location, "href") : null;
		if (!href) {
			throw new MalformedMetadataError(
				`repomd.xml <data type="${type}"> has no location href.`,
			);
		}
		return { type, location: href };
	});
};

/**
 * Decode a repository index (repodata/repomd.xml). The document is small, so
 * it is read whole before parsing.
 */
export const decodeIndex = async (stream: Readable) => {
	stream.setEncoding("utf8");
	return parseIndex(await readText(stream));
};
