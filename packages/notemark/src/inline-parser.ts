import { decodeHTMLStrict } from "entities";
import { type Attributes, addClass } from "./attributes";
import { Cursor, EOS, isBlank, isEOL } from "./cursor";
import { DEFAULT_MAX_NESTING_LEVEL } from "./options";
import { type Reference, parseReference } from "./reference";

/**
 * Produces inline nodes, one at a time, from a {@link Cursor}.
 *
 * The block parser owns the cursor and decides where a line ends; this parser only ever consumes what belongs to a
 * single inline construct (a text run, a run of blanks, one line terminator, a link, a format span, ...).
 */
export class InlineParser {
	readonly #cursor: Cursor;
	readonly #maxNestingLevel: number;
	#nestingLevel = 0;

	constructor(cursor: Cursor, options?: { maxNestingLevel?: number }) {
		this.#cursor = cursor;
		this.#maxNestingLevel =
			options?.maxNestingLevel ?? DEFAULT_MAX_NESTING_LEVEL;
	}

	/**
	 * Parses the next inline node at the cursor.
	 * @returns The parsed node, or `null` at the end of the source.
	 */
	next(): InlineNode | null {
		const cursor = this.#cursor;
		const marker = cursor.ch;
		switch (marker) {
			case EOS:
				return null;
			case "\n":
			case "\r":
				cursor.eatEOL();
				return { type: "break", hard: false };
			case " ":
			case "\t":
				return this.#parseSpace();
			case "\\":
				return this.#parseEscape();
			// If a special character does not start its construct, we read it as text.
			case "&":
				return this.#parseEntity() ?? this.#parseText();
			case "[":
				return this.#parseBracket() ?? this.#parseText();
			case "{":
				return this.#parseImage() ?? this.#parseText();
			case "#":
				return this.#parseTag() ?? this.#parseText();
			case "%":
				return this.#parseComment() ?? this.#parseText();
		}

		const literalKind = LITERAL_KINDS[marker];
		if (literalKind !== undefined) {
			return this.#parseLiteral(marker, literalKind) ?? this.#parseText();
		}
		const formatKind = FORMAT_KINDS[marker];
		if (formatKind !== undefined) {
			return this.#parseFormat(marker, formatKind) ?? this.#parseText();
		}
		return this.#parseText();
	}

	/**
	 * Parses all remaining inline nodes of the source.
	 */
	parseAll(): Array<InlineNode> {
		const nodes: Array<InlineNode> = [];
		while (true) {
			const node = this.next();
			if (node === null) return nodes;
			nodes.push(node);
		}
	}

	/**
	 * Parses an attribute list, e.g. `{lang=en .warning -}`, at the cursor.
	 *
	 * @param sameLine - When true, leading blanks are skipped and a bare word (without braces) is accepted as the value
	 * of the `""` key; this is the form used directly after the delimiters of a block construct, e.g. "```js".
	 * @returns The parsed attributes, or `undefined` if there is none. The cursor is restored if no attribute list could
	 * be parsed; an empty list (`{}`) is consumed.
	 */
	parseAttributes(sameLine: boolean): Attributes | undefined {
		const cursor = this.#cursor;
		const startPos = cursor.pos;
		if (sameLine) {
			while (isBlank(cursor.ch)) cursor.next();
		}

		if (cursor.ch === "{") {
			const attributes = this.#parseBracedAttributes();
			// An unclosed list is no list at all, so we leave the cursor where it was.
			if (attributes === null) {
				cursor.setPos(startPos);
				return undefined;
			}
			return attributes;
		}

		if (!sameLine) return undefined;

		const wordStartPos = cursor.pos;
		while (
			cursor.ch !== EOS &&
			!isEOL(cursor.ch) &&
			!isBlank(cursor.ch) &&
			cursor.ch !== "{"
		) {
			cursor.next();
		}
		if (cursor.pos === wordStartPos) {
			cursor.setPos(startPos);
			return undefined;
		}
		const attributes: Attributes = { "": cursor.sliceFrom(wordStartPos) };

		// A bare word may still be followed by a braced list on the same line, e.g. "```js {.numbered}".
		const braceStartPos = cursor.pos;
		while (isBlank(cursor.ch)) cursor.next();
		if (cursor.ch === "{") {
			const braced = this.#parseBracedAttributes();
			if (braced !== null) return { ...braced, ...attributes };
		}
		cursor.setPos(braceStartPos);
		return attributes;
	}

	#parseBracedAttributes(): Attributes | undefined | null {
		const cursor = this.#cursor;
		cursor.next(); // Skip "{"

		let attributes: Attributes = {};
		let isEmpty = true;
		while (true) {
			while (isBlank(cursor.ch)) cursor.next();

			const current = cursor.ch;
			if (current === "}") {
				cursor.next();
				return isEmpty ? undefined : attributes;
			}
			if (current === EOS || isEOL(current)) return null;

			// A lone "-" is the default marker.
			if (current === "-" && (isBlank(cursor.peek(1)) || cursor.peek(1) === "}")) {
				cursor.next();
				attributes["-"] = "";
				isEmpty = false;
				continue;
			}

			if (current === ".") {
				cursor.next();
				const name = this.#readAttributeName();
				if (name.length === 0) return null;
				attributes = addClass(attributes, name);
				isEmpty = false;
				continue;
			}

			const key = this.#readAttributeName();
			if (key.length === 0) return null;
			// A key without "=" is a flag with an empty value.
			if (cursor.ch !== "=") {
				attributes[key] = "";
				isEmpty = false;
				continue;
			}

			cursor.next(); // Skip "="
			const value = this.#readAttributeValue();
			if (value === null) return null;
			attributes[key] = value;
			isEmpty = false;
		}
	}

	#readAttributeName(): string {
		const cursor = this.#cursor;
		const startPos = cursor.pos;
		while (ATTRIBUTE_NAME_REGEX.test(cursor.ch)) cursor.next();
		return cursor.sliceFrom(startPos);
	}

	#readAttributeValue(): string | null {
		const cursor = this.#cursor;
		if (cursor.peek(0) !== '"') {
			const startPos = cursor.pos;
			while (
				cursor.ch !== EOS &&
				!isEOL(cursor.ch) &&
				!isBlank(cursor.ch) &&
				cursor.ch !== "}"
			) {
				cursor.next();
			}
			return cursor.sliceFrom(startPos);
		}

		// A quoted value may contain blanks and "}", and a backslash escapes the next character.
		cursor.next(); // Skip the opening quote
		let value = "";
		while (true) {
			const current = cursor.ch;
			if (current === EOS || isEOL(current)) return null;
			cursor.next();
			if (current === '"') return value;
			if (current === "\\" && cursor.ch !== EOS && !isEOL(cursor.ch)) {
				value += cursor.ch;
				cursor.next();
				continue;
			}
			value += current;
		}
	}

	// Attribute lists directly after an inline construct must be braced, and "{{" starts an image instead.
	#parseTrailingAttributes(): Attributes | undefined {
		if (this.#cursor.ch !== "{" || this.#cursor.peek(1) === "{") return undefined;
		return this.parseAttributes(false);
	}

	#parseText(): TextNode {
		const cursor = this.#cursor;
		const startPos = cursor.pos;
		// The first character is always consumed: it is either ordinary text or a special character that failed to start a construct.
		cursor.next();
		while (cursor.ch !== EOS && !TEXT_STOP_CHARACTERS.has(cursor.ch)) {
			cursor.next();
		}
		return { type: "text", text: cursor.sliceFrom(startPos) };
	}

	#parseSpace(): SpaceNode {
		const cursor = this.#cursor;
		const startPos = cursor.pos;
		while (isBlank(cursor.ch)) cursor.next();
		return { type: "space", lexeme: cursor.sliceFrom(startPos) };
	}

	#parseEscape(): InlineNode {
		const cursor = this.#cursor;
		cursor.next(); // Skip "\"
		const escaped = cursor.ch;

		// A backslash at the end of a line forces a hard line break.
		if (isEOL(escaped)) {
			cursor.eatEOL();
			return { type: "break", hard: true };
		}
		if (escaped === EOS) return { type: "text", text: "\\" };

		cursor.next();
		return { type: "text", text: escaped };
	}

	#parseEntity(): TextNode | null {
		const cursor = this.#cursor;
		const match = ENTITY_REGEX.exec(
			cursor.source.slice(cursor.pos, cursor.pos + MAX_ENTITY_LENGTH),
		);
		if (match === null) return null;

		const decoded = decodeHTMLStrict(match[0]);
		// Unknown named entities are returned unchanged by the decoder; those stay plain text.
		if (decoded === match[0]) return null;

		cursor.setPos(cursor.pos + match[0].length);
		return { type: "text", text: decoded };
	}

	#parseTag(): TagNode | null {
		const cursor = this.#cursor;
		// A tag must start a word, so "C#" or "a#b" are plain text.
		const previous = cursor.peek(-1);
		if (previous !== EOS && !isBlank(previous) && !isEOL(previous)) return null;

		const startPos = cursor.pos;
		cursor.next(); // Skip "#"
		const tagStartPos = cursor.pos;
		while (TAG_CHARACTER_REGEX.test(cursor.ch)) cursor.next();
		if (cursor.pos === tagStartPos) {
			cursor.setPos(startPos);
			return null;
		}
		return { type: "tag", tag: cursor.sliceFrom(tagStartPos) };
	}

	#parseComment(): LiteralNode | null {
		const cursor = this.#cursor;
		if (cursor.peek(1) !== "%") return null;
		cursor.next();
		cursor.next();
		while (isBlank(cursor.ch)) cursor.next();
		const startPos = cursor.pos;
		cursor.skipToEOL();
		return { type: "literal", kind: "comment", text: cursor.sliceFrom(startPos) };
	}

	/**
	 * Parses a literal such as "``code``", "++input++" or "==output==". The content is taken verbatim and must end on
	 * the same line.
	 */
	#parseLiteral(marker: string, kind: LiteralNode["kind"]): LiteralNode | null {
		const cursor = this.#cursor;
		if (cursor.peek(1) !== marker) return null;

		const startPos = cursor.pos;
		cursor.next();
		cursor.next();
		const contentStartPos = cursor.pos;
		while (true) {
			const current = cursor.ch;
			if (current === EOS || isEOL(current)) {
				cursor.setPos(startPos);
				return null;
			}
			if (current === marker && cursor.peek(1) === marker) break;
			cursor.next();
		}
		const text = cursor.sliceFrom(contentStartPos);
		cursor.next();
		cursor.next();

		const node: LiteralNode = { type: "literal", kind, text };
		const attributes = this.#parseTrailingAttributes();
		if (attributes !== undefined) node.attributes = attributes;
		return node;
	}

	/**
	 * Parses a format span such as "//italic//" or "**bold**", optionally followed by an attribute list.
	 */
	#parseFormat(marker: string, kind: FormatKind): FormatNode | null {
		const cursor = this.#cursor;
		if (cursor.peek(1) !== marker) return null;
		const delimiter = marker + marker;

		// Without a closing delimiter anywhere ahead there is nothing to try.
		if (!this.#hasAhead(delimiter)) return null;
		// An immediately closed span ("////") is plain text.
		if (cursor.peek(2) === marker && cursor.peek(3) === marker) return null;

		const startPos = cursor.pos;
		cursor.next();
		cursor.next();
		const inlines = this.#parseNested(() => this.#isAt(delimiter));
		if (inlines === null) {
			cursor.setPos(startPos);
			return null;
		}
		cursor.next();
		cursor.next();

		const node: FormatNode = { type: "format", kind, inlines };
		const attributes = this.#parseTrailingAttributes();
		if (attributes !== undefined) node.attributes = attributes;
		return node;
	}

	#parseBracket(): InlineNode | null {
		switch (this.#cursor.peek(1)) {
			case "[":
				return this.#parseLink();
			case "@":
				return this.#parseCitation();
			case "^":
				return this.#parseFootnote();
			case "!":
				return this.#parseMark();
			case "-":
				return this.#parseEdit();
			default:
				return null;
		}
	}

	/**
	 * Parses "[[reference]]" or "[[text|reference]]". The reference is raw text, and the whole link must end on the
	 * same line.
	 */
	#parseLink(): LinkNode | null {
		const parts = this.#scanReferenceConstruct("]]");
		if (parts === null) return null;

		const node: LinkNode = { type: "link", reference: parts.reference };
		if (parts.inlines !== undefined) node.inlines = parts.inlines;
		const attributes = this.#parseTrailingAttributes();
		if (attributes !== undefined) node.attributes = attributes;
		return node;
	}

	/**
	 * Parses "{{reference}}" or "{{text|reference}}". A `data:` URL with base64 content is embedded as a BLOB node.
	 */
	#parseImage(): ImageNode | BlobNode | null {
		if (this.#cursor.peek(1) !== "{") return null;
		const parts = this.#scanReferenceConstruct("}}");
		if (parts === null) return null;

		const blob = parseDataURL(parts.reference.value);
		if (blob !== null) {
			const node: BlobNode = { type: "blob", syntax: blob.syntax, data: blob.data };
			if (parts.inlines !== undefined) node.inlines = parts.inlines;
			return node;
		}

		const node: ImageNode = { type: "image", reference: parts.reference };
		if (parts.inlines !== undefined) node.inlines = parts.inlines;
		const attributes = this.#parseTrailingAttributes();
		if (attributes !== undefined) node.attributes = attributes;
		return node;
	}

	#scanReferenceConstruct(closer: "]]" | "}}"): {
		reference: Reference;
		inlines?: Array<InlineNode>;
	} | null {
		const cursor = this.#cursor;
		const contentStartPos = cursor.pos + 2;
		const closerIndex = cursor.source.indexOf(closer, contentStartPos);
		if (closerIndex === -1) return null;

		const content = cursor.source.slice(contentStartPos, closerIndex);
		// The whole construct must be on one line.
		if (/[\n\r]/.test(content)) return null;

		cursor.setPos(closerIndex + 2);

		// The text may itself contain "|", so only the last one separates it from the reference.
		const separatorIndex = content.lastIndexOf("|");
		if (separatorIndex === -1) {
			return { reference: parseReference(content.trim()) };
		}
		return {
			reference: parseReference(content.slice(separatorIndex + 1).trim()),
			inlines: this.#parseSubText(content.slice(0, separatorIndex)),
		};
	}

	/**
	 * Parses "[@key]" or "[@key text]".
	 */
	#parseCitation(): CitationNode | null {
		const cursor = this.#cursor;
		if (!this.#hasAhead("]")) return null;
		const startPos = cursor.pos;
		cursor.next();
		cursor.next();

		const keyStartPos = cursor.pos;
		while (
			cursor.ch !== EOS &&
			cursor.ch !== "]" &&
			!isBlank(cursor.ch) &&
			!isEOL(cursor.ch)
		) {
			cursor.next();
		}
		const key = cursor.sliceFrom(keyStartPos);
		if (key.length === 0) {
			cursor.setPos(startPos);
			return null;
		}
		while (isBlank(cursor.ch)) cursor.next();

		const inlines = this.#parseNested(() => cursor.ch === "]");
		if (inlines === null) {
			cursor.setPos(startPos);
			return null;
		}
		cursor.next(); // Skip "]"

		const node: CitationNode = { type: "citation", key };
		if (inlines.length > 0) node.inlines = inlines;
		const attributes = this.#parseTrailingAttributes();
		if (attributes !== undefined) node.attributes = attributes;
		return node;
	}

	/**
	 * Parses "[^footnote text]".
	 */
	#parseFootnote(): FootnoteNode | null {
		const cursor = this.#cursor;
		if (!this.#hasAhead("]")) return null;
		const startPos = cursor.pos;
		cursor.next();
		cursor.next();
		while (isBlank(cursor.ch)) cursor.next();

		const inlines = this.#parseNested(() => cursor.ch === "]");
		if (inlines === null) {
			cursor.setPos(startPos);
			return null;
		}
		cursor.next(); // Skip "]"

		const node: FootnoteNode = { type: "footnote", inlines };
		const attributes = this.#parseTrailingAttributes();
		if (attributes !== undefined) node.attributes = attributes;
		return node;
	}

	/**
	 * Parses "[!name]", a named anchor.
	 */
	#parseMark(): MarkNode | null {
		const cursor = this.#cursor;
		const startPos = cursor.pos;
		cursor.next();
		cursor.next();

		const nameStartPos = cursor.pos;
		while (MARK_CHARACTER_REGEX.test(cursor.ch)) cursor.next();
		if (cursor.ch !== "]") {
			cursor.setPos(startPos);
			return null;
		}
		const text = cursor.sliceFrom(nameStartPos);
		cursor.next(); // Skip "]"
		return { type: "mark", text };
	}

	/**
	 * Parses "[-deleted-]", "[-deleted|inserted-]" or "[-|inserted-]".
	 */
	#parseEdit(): EditNode | null {
		const cursor = this.#cursor;
		if (!this.#hasAhead("-]")) return null;
		const startPos = cursor.pos;
		cursor.next();
		cursor.next();

		const isEditCloser = () => this.#isAt("-]");
		const deletes = this.#parseNested(() => cursor.ch === "|" || isEditCloser());
		if (deletes === null) {
			cursor.setPos(startPos);
			return null;
		}

		// If the deleted text is followed by "|", the inserted text comes next.
		let inserts: Array<InlineNode> = [];
		if (cursor.ch === "|") {
			cursor.next();
			const parsed = this.#parseNested(isEditCloser);
			if (parsed === null) {
				cursor.setPos(startPos);
				return null;
			}
			inserts = parsed;
		}
		cursor.next();
		cursor.next();

		const node: EditNode = { type: "edit" };
		if (deletes.length > 0) node.deletes = deletes;
		if (inserts.length > 0) node.inserts = inserts;
		const attributes = this.#parseTrailingAttributes();
		if (attributes !== undefined) node.attributes = attributes;
		return node;
	}

	/**
	 * Collects inline nodes until `isCloser` reports the closing delimiter at the cursor. The closer itself is not
	 * consumed.
	 * @returns The collected nodes, or `null` if the end of the source, a blank line or the nesting limit is reached first.
	 */
	#parseNested(isCloser: () => boolean): Array<InlineNode> | null {
		if (this.#nestingLevel >= this.#maxNestingLevel) return null;
		this.#nestingLevel++;
		try {
			const nodes: Array<InlineNode> = [];
			while (true) {
				if (isCloser()) return nodes;
				// A construct never spans a blank line.
				if (this.#cursor.ch === EOS || this.#isAtBlankLine()) return null;
				const node = this.next();
				if (node === null) return null;
				nodes.push(node);
			}
		} finally {
			this.#nestingLevel--;
		}
	}

	// Parses a piece of text that was cut out of the source, e.g. the text of a link.
	#parseSubText(text: string): Array<InlineNode> {
		const parser = new InlineParser(new Cursor(text), {
			maxNestingLevel: this.#maxNestingLevel,
		});
		// The text is nested within the construct it was cut from.
		parser.#nestingLevel = this.#nestingLevel + 1;
		if (parser.#nestingLevel > this.#maxNestingLevel) {
			return [{ type: "text", text }];
		}
		return parser.parseAll();
	}

	// Looks for `delimiter` after the two-character opener at the cursor.
	#hasAhead(delimiter: string): boolean {
		const cursor = this.#cursor;
		return cursor.source.indexOf(delimiter, cursor.pos + 2) !== -1;
	}

	#isAt(delimiter: string): boolean {
		const cursor = this.#cursor;
		return cursor.source.startsWith(delimiter, cursor.pos);
	}

	#isAtBlankLine(): boolean {
		const cursor = this.#cursor;
		if (!isEOL(cursor.ch)) return false;
		const startPos = cursor.pos;
		cursor.eatEOL();
		while (isBlank(cursor.ch)) cursor.next();
		const isBlankLine = cursor.ch === EOS || isEOL(cursor.ch);
		cursor.setPos(startPos);
		return isBlankLine;
	}
}

function parseDataURL(value: string): { syntax: string; data: Uint8Array } | null {
	const match = DATA_URL_REGEX.exec(value);
	if (match === null) return null;
	const subtype = match[1] ?? "";
	const payload = match[2] ?? "";
	// "image/svg+xml" is known as "svg", "image/png" as "png".
	const syntax = subtype.replace(/\+xml$/, "");
	return {
		syntax,
		data: new Uint8Array(Buffer.from(payload, "base64")),
	};
}

// Every character that may start an inline construct ends a text run.
const TEXT_STOP_CHARACTERS = new Set([
	" ",
	"\t",
	"\n",
	"\r",
	"\\",
	"&",
	"[",
	"]",
	"{",
	"}",
	"|",
	"#",
	"%",
	"-",
	"`",
	"+",
	"=",
	"/",
	"*",
	"_",
	"~",
	"^",
	",",
	";",
	"'",
]);

const FORMAT_KINDS: Record<string, FormatKind | undefined> = {
	"/": "italic",
	"*": "bold",
	_: "underline",
	"~": "strike",
	"^": "superscript",
	",": "subscript",
	"'": "quotation",
	";": "small",
};

const LITERAL_KINDS: Record<string, LiteralNode["kind"] | undefined> = {
	"`": "code",
	"+": "input",
	"=": "output",
};

const ENTITY_REGEX = /^&(?:#x[a-f0-9]{1,6}|#[0-9]{1,7}|[a-z][a-z0-9]{1,31});/i;
const MAX_ENTITY_LENGTH = 34;

const ATTRIBUTE_NAME_REGEX = /^[\p{L}\p{N}_:-]$/u;
const TAG_CHARACTER_REGEX = /^[\p{L}\p{N}_-]$/u;
const MARK_CHARACTER_REGEX = /^[\p{L}\p{N}_-]$/u;

const DATA_URL_REGEX = /^data:[a-z]+\/([a-z0-9.+-]+);base64,([A-Za-z0-9+/=]*)$/i;

export interface TextNode {
	type: "text";
	text: string;
}

export interface SpaceNode {
	type: "space";
	lexeme: string;
}

export interface BreakNode {
	type: "break";
	hard: boolean;
}

export interface LinkNode {
	type: "link";
	reference: Reference;
	inlines?: Array<InlineNode>;
	attributes?: Attributes;
}

export interface ImageNode {
	type: "image";
	reference: Reference;
	inlines?: Array<InlineNode>;
	attributes?: Attributes;
}

export interface BlobNode {
	type: "blob";
	syntax: string;
	data: Uint8Array;
	inlines?: Array<InlineNode>;
}

export interface CitationNode {
	type: "citation";
	key: string;
	inlines?: Array<InlineNode>;
	attributes?: Attributes;
}

export interface FootnoteNode {
	type: "footnote";
	inlines?: Array<InlineNode>;
	attributes?: Attributes;
}

export interface MarkNode {
	type: "mark";
	text: string;
}

export type FormatKind =
	| "italic"
	| "emphasis"
	| "bold"
	| "strong"
	| "underline"
	| "strike"
	| "superscript"
	| "subscript"
	| "quotation"
	| "small";

export interface FormatNode {
	type: "format";
	kind: FormatKind;
	inlines?: Array<InlineNode>;
	attributes?: Attributes;
}

export interface EditNode {
	type: "edit";
	deletes?: Array<InlineNode>;
	inserts?: Array<InlineNode>;
	attributes?: Attributes;
}

export interface LiteralNode {
	type: "literal";
	kind: "code" | "input" | "output" | "comment";
	text: string;
	attributes?: Attributes;
}

export interface TagNode {
	type: "tag";
	tag: string;
}

export type InlineNode =
	| TextNode
	| SpaceNode
	| BreakNode
	| LinkNode
	| ImageNode
	| BlobNode
	| CitationNode
	| FootnoteNode
	| MarkNode
	| FormatNode
	| EditNode
	| LiteralNode
	| TagNode;
