import { describe, expect, it } from "vitest";
import type { BlockNode } from "../block-parser";
import { assignIdentifiers, slugify, toPlainText } from "../cleanup";

describe("slugify", () => {
	it("joins words with single dashes", () => {
		expect(slugify("Hello, World!")).toBe("hello-world");
	});

	it("drops accents", () => {
		expect(slugify("Café au lait!")).toBe("cafe-au-lait");
		expect(slugify("Über 9000")).toBe("uber-9000");
	});

	it("returns an empty string for punctuation only", () => {
		expect(slugify("  --  ")).toBe("");
	});
});

describe("toPlainText", () => {
	it("keeps the visible text of nested inline nodes", () => {
		expect(
			toPlainText([
				{ type: "text", text: "a" },
				{ type: "space", lexeme: "  " },
				{ type: "format", kind: "bold", inlines: [{ type: "text", text: "b" }] },
				{ type: "break", hard: true },
				{ type: "literal", kind: "code", text: "c" },
				{ type: "space", lexeme: " " },
				{
					type: "edit",
					deletes: [{ type: "text", text: "old" }],
					inserts: [{ type: "text", text: "new" }],
				},
				{ type: "space", lexeme: " " },
				{ type: "tag", tag: "t" },
				{ type: "footnote", inlines: [{ type: "text", text: "note" }] },
				{ type: "literal", kind: "comment", text: "hidden" },
				{ type: "mark", text: "m" },
			]),
		).toBe("a b c new t");
	});
});

describe("assignIdentifiers", () => {
	it("assigns unique slugs to headings at any depth", () => {
		const blocks: Array<BlockNode> = [
			{ type: "heading", level: 1, inlines: [{ type: "text", text: "A" }] },
			{
				type: "region",
				kind: "quote",
				children: [{ type: "heading", level: 2, inlines: [{ type: "text", text: "A" }] }],
			},
			{ type: "heading", level: 1 },
			{ type: "heading", level: 1, inlines: [{ type: "text", text: "!!!" }] },
		];
		expect(assignIdentifiers(blocks)).toEqual([
			{ type: "heading", level: 1, inlines: [{ type: "text", text: "A" }], slug: "a" },
			{
				type: "region",
				kind: "quote",
				children: [
					{ type: "heading", level: 2, inlines: [{ type: "text", text: "A" }], slug: "a-1" },
				],
			},
			{ type: "heading", level: 1 },
			{ type: "heading", level: 1, inlines: [{ type: "text", text: "!!!" }] },
		]);
	});

	it("does not modify the given headings", () => {
		const heading: BlockNode = {
			type: "heading",
			level: 1,
			inlines: [{ type: "text", text: "A" }],
		};
		assignIdentifiers([heading]);
		expect(heading).toEqual({ type: "heading", level: 1, inlines: [{ type: "text", text: "A" }] });
	});

	it("names every mark uniquely, sharing the identifiers of the headings", () => {
		const blocks: Array<BlockNode> = [
			{ type: "heading", level: 1, inlines: [{ type: "text", text: "Intro" }] },
			{
				type: "paragraph",
				inlines: [
					{ type: "mark", text: "intro" },
					{ type: "space", lexeme: " " },
					{ type: "mark", text: "" },
					{ type: "space", lexeme: " " },
					{ type: "mark", text: "" },
				],
			},
			{ type: "heading", level: 2, inlines: [{ type: "text", text: "Notes" }] },
		];
		expect(assignIdentifiers(blocks)).toEqual([
			{ type: "heading", level: 1, inlines: [{ type: "text", text: "Intro" }], slug: "intro" },
			{
				type: "paragraph",
				inlines: [
					{ type: "mark", text: "intro-1" },
					{ type: "space", lexeme: " " },
					{ type: "mark", text: "*" },
					{ type: "space", lexeme: " " },
					{ type: "mark", text: "*-1" },
				],
			},
			{ type: "heading", level: 2, inlines: [{ type: "text", text: "Notes" }], slug: "notes" },
		]);
	});

	it("finds marks in terms and nested inline content", () => {
		const blocks: Array<BlockNode> = [
			{
				type: "definition-list",
				definitions: [{ term: [{ type: "mark", text: "a" }], descriptions: [] }],
			},
			{
				type: "table",
				alignments: ["default"],
				rows: [
					[
						{
							align: "default",
							inlines: [{ type: "footnote", inlines: [{ type: "mark", text: "a" }] }],
						},
					],
				],
			},
		];
		expect(assignIdentifiers(blocks)).toEqual([
			{
				type: "definition-list",
				definitions: [{ term: [{ type: "mark", text: "a" }], descriptions: [] }],
			},
			{
				type: "table",
				alignments: ["default"],
				rows: [
					[
						{
							align: "default",
							inlines: [{ type: "footnote", inlines: [{ type: "mark", text: "a-1" }] }],
						},
					],
				],
			},
		]);
	});
});
