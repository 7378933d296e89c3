import { BlockParser, type BlockNode } from "./block-parser";
import { assignIdentifiers } from "./cleanup";
import { Cursor, EOS } from "./cursor";
import type { InlineNode } from "./inline-parser";
import { normalizeBlocks, normalizeInlines } from "./normalizer";
import type { ResolvedParseOptions } from "./options";

/**
 * Turns text written in one syntax into a normalized document tree.
 */
export interface SyntaxParser {
	name: string;
	altNames?: Array<string>;
	parseBlocks(
		text: string,
		syntax: string,
		options: ResolvedParseOptions,
	): Array<BlockNode>;
	parseInlines(
		text: string,
		syntax: string,
		options: ResolvedParseOptions,
	): Array<InlineNode> | undefined;
}

const FALLBACK_SYNTAX = "plain";

const registry = new Map<string, SyntaxParser>();

/**
 * Makes a parser available under its name and all of its alternative names.
 * @throws {Error} If one of the names is already taken.
 */
export function registerSyntax(parser: SyntaxParser): void {
	const names = [parser.name, ...(parser.altNames ?? [])];
	for (const name of names) {
		if (registry.has(name)) {
			throw new Error(`Syntax "${name}" is already registered`);
		}
	}
	for (const name of names) registry.set(name, parser);
}

/**
 * Returns the parser for `name`, or the plain text parser if no parser is registered under that name.
 */
export function getSyntax(name: string): SyntaxParser {
	const parser = registry.get(name) ?? registry.get(FALLBACK_SYNTAX);
	if (parser === undefined) {
		throw new Error(`No parser for "${name}" and no fallback parser registered`);
	}
	return parser;
}

export function isSyntaxRegistered(name: string): boolean {
	return registry.has(name);
}

const notemarkSyntax: SyntaxParser = {
	name: "zmk",
	altNames: ["notemark"],
	parseBlocks(text, _syntax, options) {
		const blocks = new BlockParser(new Cursor(text), options).parse();
		return assignIdentifiers(normalizeBlocks(blocks));
	},
	parseInlines(text, _syntax, options) {
		const inlines = new BlockParser(new Cursor(text), options).parseInlines();
		return normalizeInlines(inlines);
	},
};

// Text that is shown as is: the whole text becomes one verbatim block, tagged with its syntax.
const plainSyntax = (name: string, altNames?: Array<string>): SyntaxParser => ({
	name,
	altNames,
	parseBlocks(text, syntax) {
		return [{ type: "verbatim", lines: readLines(text), attributes: { "": syntax } }];
	},
	parseInlines(text, syntax) {
		const cursor = new Cursor(text);
		cursor.skipToEOL();
		return [
			{
				type: "literal",
				kind: "code",
				text: cursor.sliceFrom(0),
				attributes: { "": syntax },
			},
		];
	},
});

// An SVG image is embedded as a BLOB, provided the text really starts with an "<svg" element.
const svgSyntax: SyntaxParser = {
	name: "svg",
	parseBlocks(text, syntax) {
		const inlines = parseSVG(text, syntax);
		if (inlines === undefined) return [];
		return [{ type: "paragraph", inlines }];
	},
	parseInlines: (text, syntax) => parseSVG(text, syntax),
};

function parseSVG(text: string, syntax: string): Array<InlineNode> | undefined {
	const source = text.trimStart();
	if (!source.startsWith("<svg ")) return undefined;
	return [
		{
			type: "blob",
			syntax,
			data: new Uint8Array(Buffer.from(source, "utf8")),
		},
	];
}

function readLines(text: string): Array<string> {
	const cursor = new Cursor(text);
	const lines: Array<string> = [];
	while (cursor.ch !== EOS) {
		const lineStartPos = cursor.pos;
		cursor.skipToEOL();
		lines.push(cursor.sliceFrom(lineStartPos));
		cursor.eatEOL();
	}
	return lines;
}

registerSyntax(notemarkSyntax);
registerSyntax(plainSyntax("txt", ["plain", "text"]));
registerSyntax(plainSyntax("css"));
registerSyntax(plainSyntax("template", ["template-html"]));
registerSyntax(plainSyntax("template-text"));
registerSyntax(svgSyntax);
