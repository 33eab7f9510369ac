import { XMLParser, XMLValidator } from "fast-xml-parser";
import { MalformedMetadataError } from "../errors";

export type XmlNode = Record<string, unknown>;

export const ATTRIBUTE_PREFIX = "@_";
const TEXT_NODE = "#text";

export const createMetadataParser = (arrayTags: string[] = []) => {
	const arrays = new Set(arrayTags);
	return new XMLParser({
		ignoreAttributes: false,
		attributeNamePrefix: ATTRIBUTE_PREFIX,
		textNodeName: TEXT_NODE,
		removeNSPrefix: true,
		parseTagValue: false,
		parseAttributeValue: false,
		trimValues: true,
		isArray: (name) => arrays.has(name),
	});
};

/**
 * Throws MalformedMetadataError unless `xml` is a well-formed document.
 */
export const assertWellFormed = (xml: string, label: string) => {
	const result = XMLValidator.validate(xml);
	if (result === true) {
		return;
	}
	const { msg, line, col } = result.err;
	throw new MalformedMetadataError(
		`Malformed ${label}: ${msg} (line ${line}, column ${col})`,
	);
};

export const isXmlNode = (value: unknown): value is XmlNode =>
	typeof value === "object" && value !== null && !Array.isArray(value);

export const childNode = (node: XmlNode, name: string): XmlNode | null => {
	const value = node[name];
	if (isXmlNode(value)) {
		return value;
	}
	// <tag/> parses to an empty string
	return value === "" ? {} : null;
};

export const childNodes = (node: XmlNode, name: string): XmlNode[] => {
	const value = node[name];
	const list = Array.isArray(value) ? value : value === undefined ? [] : [value];
	return list.map((entry) => (isXmlNode(entry) ? entry : {}));
};

export const attribute = (node: XmlNode, name: string): string | null => {
	const value = node[`${ATTRIBUTE_PREFIX}${name}`];
	return typeof value === "string" ? value : null;
};

/** Text content of `node[name]`, whether it carries attributes or not. */
export const textContent = (node: XmlNode, name: string): string | null => {
	const value = node[name];
	if (typeof value === "string") {
		return value;
	}
	if (isXmlNode(value)) {
		const text = value[TEXT_NODE];
		return typeof text === "string" ? text : "";
	}
	return null;
};

export const readText = async (stream: AsyncIterable<unknown>) => {
	let text = "";
	for await (const chunk of stream) {
		text += String(chunk);
	}
	return text;
};
