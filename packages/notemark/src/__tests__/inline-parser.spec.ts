import { describe, expect, it } from "vitest";
import { Cursor } from "../cursor";
import { type InlineNode, InlineParser } from "../inline-parser";

function parseInline(text: string): Array<InlineNode> {
	return new InlineParser(new Cursor(text)).parseAll();
}

describe("InlineParser", () => {
	describe("Text, spaces and breaks", () => {
		it("splits text at blanks and keeps the exact blank run", () => {
			expect(parseInline("Hello \t world")).toEqual([
				{ type: "text", text: "Hello" },
				{ type: "space", lexeme: " \t " },
				{ type: "text", text: "world" },
			]);
		});

		it("turns a backslash at the end of a line into a hard break", () => {
			expect(parseInline("a\\\nb")).toEqual([
				{ type: "text", text: "a" },
				{ type: "break", hard: true },
				{ type: "text", text: "b" },
			]);
		});

		it("treats a CRLF line ending as one soft break", () => {
			expect(parseInline("a\r\nb")).toEqual([
				{ type: "text", text: "a" },
				{ type: "break", hard: false },
				{ type: "text", text: "b" },
			]);
		});

		it("takes an escaped character literally", () => {
			expect(parseInline("\\**x")).toEqual([
				{ type: "text", text: "*" },
				{ type: "text", text: "*x" },
			]);
		});
	});

	describe("Entities", () => {
		it("decodes named and numeric entities", () => {
			expect(parseInline("&amp;&#65;&#x42;")).toEqual([
				{ type: "text", text: "&" },
				{ type: "text", text: "A" },
				{ type: "text", text: "B" },
			]);
		});

		it("keeps an unknown entity as text", () => {
			expect(parseInline("&foo;")).toEqual([
				{ type: "text", text: "&foo" },
				{ type: "text", text: ";" },
			]);
		});
	});

	describe("Links and images", () => {
		it("parses a link with text to a note", () => {
			expect(parseInline("[[Home|20201231235959]]")).toEqual([
				{
					type: "link",
					reference: { value: "20201231235959", state: "note" },
					inlines: [{ type: "text", text: "Home" }],
				},
			]);
		});

		it("parses a link without text and its attributes", () => {
			expect(parseInline("[[https://example.com]]{lang=en}")).toEqual([
				{
					type: "link",
					reference: { value: "https://example.com", state: "material" },
					attributes: { lang: "en" },
				},
			]);
		});

		it("does not let a link span lines", () => {
			expect(parseInline("[[a\nb]]")).toEqual([
				{ type: "text", text: "[" },
				{ type: "text", text: "[a" },
				{ type: "break", hard: false },
				{ type: "text", text: "b" },
				{ type: "text", text: "]" },
				{ type: "text", text: "]" },
			]);
		});

		it("parses an image", () => {
			expect(parseInline("{{pic.png}}")).toEqual([
				{ type: "image", reference: { value: "pic.png", state: "material" } },
			]);
		});

		it("embeds a base64 data URL as a BLOB", () => {
			expect(parseInline("{{Dots|data:image/png;base64,AAEC}}")).toEqual([
				{
					type: "blob",
					syntax: "png",
					data: new Uint8Array([0, 1, 2]),
					inlines: [{ type: "text", text: "Dots" }],
				},
			]);
		});
	});

	describe("Bracketed constructs", () => {
		it("parses a citation with text", () => {
			expect(parseInline("[@Doe2020 p. 3]")).toEqual([
				{
					type: "citation",
					key: "Doe2020",
					inlines: [
						{ type: "text", text: "p." },
						{ type: "space", lexeme: " " },
						{ type: "text", text: "3" },
					],
				},
			]);
		});

		it("parses a footnote", () => {
			expect(parseInline("[^note]")).toEqual([
				{ type: "footnote", inlines: [{ type: "text", text: "note" }] },
			]);
		});

		it("parses a mark", () => {
			expect(parseInline("[!anchor]")).toEqual([{ type: "mark", text: "anchor" }]);
		});

		it("parses an edit with deleted and inserted text", () => {
			expect(parseInline("[-old|new-]")).toEqual([
				{
					type: "edit",
					deletes: [{ type: "text", text: "old" }],
					inserts: [{ type: "text", text: "new" }],
				},
			]);
		});

		it("parses an edit that only inserts", () => {
			expect(parseInline("[-|new-]")).toEqual([
				{ type: "edit", inserts: [{ type: "text", text: "new" }] },
			]);
		});
	});

	describe("Tags", () => {
		it("parses a tag at the start of a word", () => {
			expect(parseInline("see #topic")).toEqual([
				{ type: "text", text: "see" },
				{ type: "space", lexeme: " " },
				{ type: "tag", tag: "topic" },
			]);
		});

		it("ignores a hash inside a word", () => {
			expect(parseInline("C#x")).toEqual([
				{ type: "text", text: "C" },
				{ type: "text", text: "#x" },
			]);
		});
	});

	describe("Formats", () => {
		it("nests formats", () => {
			expect(parseInline("**a //b// c**")).toEqual([
				{
					type: "format",
					kind: "bold",
					inlines: [
						{ type: "text", text: "a" },
						{ type: "space", lexeme: " " },
						{ type: "format", kind: "italic", inlines: [{ type: "text", text: "b" }] },
						{ type: "space", lexeme: " " },
						{ type: "text", text: "c" },
					],
				},
			]);
		});

		it("reads an attribute list directly after the closing delimiter", () => {
			expect(parseInline("__u__{-}")).toEqual([
				{
					type: "format",
					kind: "underline",
					inlines: [{ type: "text", text: "u" }],
					attributes: { "-": "" },
				},
			]);
		});

		it("reads an unclosed format as text", () => {
			expect(parseInline("//open")).toEqual([
				{ type: "text", text: "/" },
				{ type: "text", text: "/open" },
			]);
		});

		it("does not let a format span a blank line", () => {
			expect(parseInline("//a\n\nb//")).toEqual([
				{ type: "text", text: "/" },
				{ type: "text", text: "/a" },
				{ type: "break", hard: false },
				{ type: "break", hard: false },
				{ type: "text", text: "b" },
				{ type: "text", text: "/" },
				{ type: "text", text: "/" },
			]);
		});

		it("stops nesting at the nesting limit", () => {
			const parser = new InlineParser(new Cursor("^^,,x,,^^"), { maxNestingLevel: 1 });
			expect(parser.parseAll()).toEqual([
				{
					type: "format",
					kind: "superscript",
					inlines: [
						{ type: "text", text: "," },
						{ type: "text", text: ",x" },
						{ type: "text", text: "," },
						{ type: "text", text: "," },
					],
				},
			]);
		});
	});

	describe("Literals", () => {
		it("parses code, input and output literals", () => {
			expect(parseInline("``a*b``++in++==out==")).toEqual([
				{ type: "literal", kind: "code", text: "a*b" },
				{ type: "literal", kind: "input", text: "in" },
				{ type: "literal", kind: "output", text: "out" },
			]);
		});

		it("parses a comment up to the end of the line", () => {
			expect(parseInline("x %% note\ny")).toEqual([
				{ type: "text", text: "x" },
				{ type: "space", lexeme: " " },
				{ type: "literal", kind: "comment", text: "note" },
				{ type: "break", hard: false },
				{ type: "text", text: "y" },
			]);
		});
	});

	describe("parseAttributes", () => {
		it("parses keys, quoted values, classes and the default marker", () => {
			const cursor = new Cursor('{lang=en title="a \\"b\\"" .x .y -}rest');
			const attributes = new InlineParser(cursor).parseAttributes(false);
			expect(attributes).toEqual({
				lang: "en",
				title: 'a "b"',
				class: "x y",
				"-": "",
			});
			expect(cursor.ch).toBe("r");
		});

		it("accepts a bare word followed by a braced list on the same line", () => {
			const cursor = new Cursor("  js {.numbered}");
			expect(new InlineParser(cursor).parseAttributes(true)).toEqual({
				"": "js",
				class: "numbered",
			});
		});

		it("restores the cursor when the list is not closed", () => {
			const cursor = new Cursor("{bad");
			expect(new InlineParser(cursor).parseAttributes(false)).toBeUndefined();
			expect(cursor.pos).toBe(0);
		});

		it("consumes an empty list", () => {
			const cursor = new Cursor("{}x");
			expect(new InlineParser(cursor).parseAttributes(false)).toBeUndefined();
			expect(cursor.ch).toBe("x");
		});
	});
});
