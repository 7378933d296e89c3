import { describe, expect, it } from "vitest";
import { isNoteReference, isValidReference, parseReference } from "../reference";

describe("parseReference", () => {
	it("recognizes note identifiers", () => {
		expect(parseReference("20201231235959")).toEqual({ value: "20201231235959", state: "note" });
		expect(parseReference("2020123123595")).toEqual({ value: "2020123123595", state: "material" });
	});

	it("accepts URLs and relative paths as material", () => {
		expect(parseReference("https://example.com/a?b=c").state).toBe("material");
		expect(parseReference("../img.png").state).toBe("material");
	});

	it("rejects empty references and references with blanks", () => {
		expect(parseReference("").state).toBe("invalid");
		expect(parseReference("a b").state).toBe("invalid");
	});

	it("classifies references", () => {
		expect(isNoteReference(parseReference("20201231235959"))).toBe(true);
		expect(isNoteReference(parseReference("x.png"))).toBe(false);
		expect(isValidReference(parseReference("x.png"))).toBe(true);
		expect(isValidReference(parseReference("<x>"))).toBe(false);
	});
});
