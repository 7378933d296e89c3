import { describe, expect, it } from "vitest";
import { parseBlocks, parseInlines } from "../index";

describe("parseBlocks", () => {
	it("parses, normalizes and assigns heading slugs", () => {
		expect(parseBlocks("=== Hello\nSome //text//.")).toEqual([
			{
				type: "heading",
				level: 1,
				inlines: [{ type: "text", text: "Hello" }],
				slug: "hello",
			},
			{
				type: "paragraph",
				inlines: [
					{ type: "text", text: "Some" },
					{ type: "space", lexeme: " " },
					{ type: "format", kind: "italic", inlines: [{ type: "text", text: "text" }] },
					{ type: "text", text: "." },
				],
			},
		]);
	});

	it("makes repeated heading slugs unique", () => {
		const slugs = parseBlocks("=== Intro\n=== Intro\n=== Intro").map((block) =>
			block.type === "heading" ? block.slug : undefined,
		);
		expect(slugs).toEqual(["intro", "intro-1", "intro-2"]);
	});

	it("names empty and duplicate marks", () => {
		expect(parseBlocks("=== a [!x] b\n[!x] [!]")).toEqual([
			{
				type: "heading",
				level: 1,
				inlines: [
					{ type: "text", text: "a" },
					{ type: "space", lexeme: " " },
					{ type: "mark", text: "x" },
					{ type: "space", lexeme: " " },
					{ type: "text", text: "b" },
				],
				slug: "a-b",
			},
			{
				type: "paragraph",
				inlines: [
					{ type: "mark", text: "*" },
					{ type: "space", lexeme: " " },
					{ type: "mark", text: "*-1" },
				],
			},
		]);
	});

	it("hands plain text to the plain text parser", () => {
		expect(parseBlocks("a\nb", { syntax: "txt" })).toEqual([
			{ type: "verbatim", lines: ["a", "b"], attributes: { "": "txt" } },
		]);
	});

	it("tags plain text with the requested alias", () => {
		expect(parseBlocks("a", { syntax: "plain" })).toEqual([
			{ type: "verbatim", lines: ["a"], attributes: { "": "plain" } },
		]);
	});

	it("falls back to plain text for an unknown syntax", () => {
		const messages: Array<string> = [];
		const blocks = parseBlocks("x", {
			syntax: "markdown",
			debug: (message) => messages.push(message),
		});
		expect(blocks).toEqual([
			{ type: "verbatim", lines: ["x"], attributes: { "": "markdown" } },
		]);
		expect(messages).toEqual(['unknown syntax "markdown", using "txt"']);
	});

	it("embeds an SVG image as a BLOB", () => {
		const source = '<svg width="1"></svg>';
		expect(parseBlocks(source, { syntax: "svg" })).toEqual([
			{
				type: "paragraph",
				inlines: [{ type: "blob", syntax: "svg", data: new TextEncoder().encode(source) }],
			},
		]);
	});

	it("ignores SVG content that does not start with an svg element", () => {
		expect(parseBlocks("<p>no</p>", { syntax: "svg" })).toEqual([]);
	});

	it("passes the nesting limit on to the parser", () => {
		expect(parseBlocks("<<<\nx\n<<<", { maxNestingLevel: 0 })).toEqual([
			{
				type: "paragraph",
				inlines: [
					{ type: "text", text: "<<<" },
					{ type: "break", hard: false },
					{ type: "text", text: "x" },
					{ type: "break", hard: false },
					{ type: "text", text: "<<<" },
				],
			},
		]);
	});
});

describe("parseInlines", () => {
	it("removes white space around the content", () => {
		expect(parseInlines("  Title  ")).toEqual([{ type: "text", text: "Title" }]);
	});

	it("returns undefined for text without content", () => {
		expect(parseInlines("")).toBeUndefined();
		expect(parseInlines(" \n ")).toBeUndefined();
	});

	it("reads the first line of plain text as code", () => {
		expect(parseInlines("first\nsecond", { syntax: "css" })).toEqual([
			{ type: "literal", kind: "code", text: "first", attributes: { "": "css" } },
		]);
	});
});
