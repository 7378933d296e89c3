import { describe, expect, it } from "vitest";
import { parseBlocks } from "../index";
import { getSyntax, isSyntaxRegistered, registerSyntax } from "../syntax";

describe("Syntax registry", () => {
	it("finds parsers by name and by alternative name", () => {
		expect(getSyntax("zmk").name).toBe("zmk");
		expect(getSyntax("notemark").name).toBe("zmk");
		expect(getSyntax("text").name).toBe("txt");
		expect(getSyntax("template-html").name).toBe("template");
	});

	it("falls back to the plain text parser", () => {
		expect(isSyntaxRegistered("nope")).toBe(false);
		expect(getSyntax("nope").name).toBe("txt");
	});

	it("refuses to register a name twice", () => {
		expect(() =>
			registerSyntax({
				name: "zmk",
				parseBlocks: () => [],
				parseInlines: () => undefined,
			}),
		).toThrowError('Syntax "zmk" is already registered');
	});

	it("registers none of the names if one of them is taken", () => {
		expect(() =>
			registerSyntax({
				name: "fresh",
				altNames: ["txt"],
				parseBlocks: () => [],
				parseInlines: () => undefined,
			}),
		).toThrowError('Syntax "txt" is already registered');
		expect(isSyntaxRegistered("fresh")).toBe(false);
	});

	it("makes a registered parser available to parseBlocks", () => {
		registerSyntax({
			name: "shout",
			parseBlocks: (text) => [{ type: "paragraph", inlines: [{ type: "text", text: text.toUpperCase() }] }],
			parseInlines: () => undefined,
		});
		expect(parseBlocks("hi", { syntax: "shout" })).toEqual([
			{ type: "paragraph", inlines: [{ type: "text", text: "HI" }] },
		]);
	});
});
