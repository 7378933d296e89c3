import type { Attributes } from "./attributes";
import { Cursor, EOS, isEOL } from "./cursor";
import { type InlineNode, InlineParser } from "./inline-parser";
import { DEFAULT_MAX_NESTING_LEVEL, type ParseOptions, trace } from "./options";

/**
 * Thrown when the block nesting counter is not back at zero after a complete parse. This can only happen through a bug
 * in the parser itself, never through malformed markup.
 */
export class NestingLevelError extends Error {
	readonly nestingLevel: number;

	constructor(nestingLevel: number) {
		super(`Nesting level was not decremented (still at ${nestingLevel})`);
		this.name = "NestingLevelError";
		this.nestingLevel = nestingLevel;
	}
}

/**
 * A recursive descent parser for the block structure of a note.
 *
 * Blocks are recognized by the first character of a line. Whenever a recognizer fails, the cursor is restored to the
 * start of the line and the line is read as paragraph text instead; this is the only point where the parser backtracks.
 *
 * Lists, definition lists and tables span several lines but are built one line at a time, so the parser keeps the
 * currently open ones around between lines. At most one kind of them is open at any time.
 *
 * The result is a raw tree: it still contains `null-item` / `null-description` placeholders for blank lines and
 * unmerged inline runs. Pass it through the normalizer before handing it to anyone else.
 */
export class BlockParser {
	readonly #cursor: Cursor;
	readonly #inlineParser: InlineParser;
	readonly #maxNestingLevel: number;
	readonly #options: Pick<ParseOptions, "debug">;

	#nestingLevel = 0;
	#lists: Array<ListNode<RawBlockNode>> = [];
	#definitionList: DefinitionListNode<RawBlockNode> | null = null;
	#table: TableNode_internal | null = null;
	// Line starts at which a verbatim block or a region already ran into the end of the source without being closed.
	#unterminatedOpeners = new Set<number>();

	constructor(cursor: Cursor, options?: Pick<ParseOptions, "maxNestingLevel" | "debug">) {
		this.#cursor = cursor;
		this.#maxNestingLevel = options?.maxNestingLevel ?? DEFAULT_MAX_NESTING_LEVEL;
		this.#options = { debug: options?.debug };
		this.#inlineParser = new InlineParser(cursor, {
			maxNestingLevel: this.#maxNestingLevel,
		});
	}

	/**
	 * Parses the whole remaining source as a sequence of blocks.
	 * @throws {NestingLevelError} If the nesting counter is unbalanced at the end.
	 */
	parse(): Array<RawBlockNode> {
		const blocks = this.#parseBlockSequence();
		if (this.#nestingLevel !== 0) {
			throw new NestingLevelError(this.#nestingLevel);
		}
		return blocks;
	}

	/**
	 * Parses the whole remaining source as inline content, without any block structure.
	 */
	parseInlines(): Array<InlineNode> {
		return this.#inlineParser.parseAll();
	}

	#parseBlockSequence(): Array<RawBlockNode> {
		const cursor = this.#cursor;
		const blocks: Array<RawBlockNode> = [];
		let lastParagraph: ParagraphNode | null = null;
		while (cursor.ch !== EOS) {
			const { block, merged } = this.#parseBlock(lastParagraph);
			if (block !== null) blocks.push(block);
			if (!merged) lastParagraph = block?.type === "paragraph" ? block : null;
		}
		return blocks;
	}

	/**
	 * Parses one block at the start of a line.
	 *
	 * @param lastParagraph - The paragraph directly before this line, if any. A line that ends up as paragraph text is
	 * appended to it instead of starting a new paragraph.
	 * @returns The new block (or `null` if the line only extended an open list, definition list or table) and whether
	 * the line was merged into `lastParagraph`.
	 */
	#parseBlock(lastParagraph: ParagraphNode | null): {
		block: RawBlockNode | null;
		merged: boolean;
	} {
		const cursor = this.#cursor;
		const lineStartPos = cursor.pos;

		// If we are still below the nesting limit, we try to recognize a block construct at the start of the line.
		if (this.#nestingLevel < this.#maxNestingLevel) {
			this.#nestingLevel++;
			try {
				const recognized = this.#recognizeBlock();
				if (recognized !== null) {
					return { block: recognized.block, merged: false };
				}
			} finally {
				this.#nestingLevel--;
			}
		} else {
			trace(
				this.#options,
				() => `nesting level ${this.#nestingLevel} reached at ${lineStartPos}, reading the line as paragraph text`,
			);
		}

		// No block construct matched (or we are too deep), so we go back to the start of the line and read it as paragraph
		// text. Any open list, definition list or table ends here.
		cursor.setPos(lineStartPos);
		this.#clearStacked();
		const paragraph = this.#parseParagraph();
		// If the line directly follows a paragraph, it continues that paragraph instead of starting a new one.
		if (lastParagraph !== null) {
			lastParagraph.inlines.push(...paragraph.inlines);
			return { block: null, merged: true };
		}
		return { block: paragraph, merged: false };
	}

	/**
	 * Dispatches on the first character of the line.
	 * @returns `null` if no block construct could be recognized; otherwise the recognized block, which is `null` itself
	 * when the line only extended a construct that is already part of the tree.
	 */
	#recognizeBlock(): { block: RawBlockNode | null } | null {
		const cursor = this.#cursor;
		const lineStartPos = cursor.pos;
		const marker = cursor.ch;

		let recognized: { block: RawBlockNode | null } | null = null;
		switch (marker) {
			case EOS:
				return { block: null };
			case "\n":
			case "\r":
				cursor.eatEOL();
				this.#markBlankLine();
				return { block: null };
			case ":":
				// A single ":" starts a description, a run of them a span region.
				if (cursor.peek(1) === ":") {
					this.#clearStacked();
					recognized = this.#parseRegion();
				} else {
					recognized = this.#parseDescription();
				}
				break;
			case "`":
				this.#clearStacked();
				recognized = this.#parseVerbatim();
				break;
			case '"':
			case "<":
				this.#clearStacked();
				recognized = this.#parseRegion();
				break;
			case "=":
				this.#clearStacked();
				recognized = this.#parseHeading();
				break;
			case "-":
				this.#clearStacked();
				recognized = this.#parseHorizontalRule();
				break;
			// List, definition and table lines only close the open constructs of the other two kinds; their own kind is
			// continued by the recognizer.
			case "*":
			case "#":
			case ">":
				this.#table = null;
				this.#definitionList = null;
				recognized = this.#parseList();
				break;
			case ";":
				this.#lists = [];
				this.#table = null;
				recognized = this.#parseTerm();
				break;
			case " ":
				this.#table = null;
				recognized = this.#parseIndent();
				break;
			case "|":
				this.#lists = [];
				this.#definitionList = null;
				recognized = this.#parseRow();
				break;
		}

		if (recognized === null) {
			if (PARAGRAPH_BREAKING_CHARACTERS.has(marker)) {
				trace(this.#options, () => `no block construct for "${marker}" at ${lineStartPos}`);
			}
			return null;
		}
		if (recognized.block !== null) {
			const { type } = recognized.block;
			trace(this.#options, () => `${type} at ${lineStartPos}`);
		}
		return recognized;
	}

	// A blank line ends the current item of every open list and the current description of the open definition.
	#markBlankLine(): void {
		for (const list of this.#lists) {
			const lastItem = list.items.at(-1);
			if (lastItem !== undefined) lastItem.push({ type: "null-item" });
		}
		const lastDescription = this.#definitionList?.definitions.at(-1)?.descriptions.at(-1);
		if (lastDescription !== undefined) {
			lastDescription.push({ type: "null-description" });
		}
	}

	#clearStacked(): void {
		this.#lists = [];
		this.#definitionList = null;
		this.#table = null;
	}

	/**
	 * Reads inline content until a line break that is followed by the start of another block (or the end of the source).
	 */
	#parseParagraph(): ParagraphNode {
		const cursor = this.#cursor;
		const paragraph: ParagraphNode = { type: "paragraph", inlines: [] };
		while (true) {
			const inline = this.#inlineParser.next();
			if (inline === null) return paragraph;
			paragraph.inlines.push(inline);
			// We stop after a line break only if the next line may start another block; otherwise the paragraph goes on.
			if (inline.type === "break" && PARAGRAPH_BREAKING_CHARACTERS.has(cursor.ch)) {
				return paragraph;
			}
		}
	}

	/**
	 * Reads the inline content of a single line, including its trailing line break.
	 * @returns The paragraph, or `null` if the cursor is at the end of the source.
	 */
	#parseLineParagraph(): ParagraphNode | null {
		const inlines: Array<InlineNode> = [];
		while (true) {
			const inline = this.#inlineParser.next();
			if (inline === null) {
				return inlines.length === 0 ? null : { type: "paragraph", inlines };
			}
			inlines.push(inline);
			if (inline.type === "break") return { type: "paragraph", inlines };
		}
	}

	/**
	 * Parses a verbatim block:
	 *
	 * ```
	 * ```js {.numbered}
	 * const x = 1;
	 * ```
	 * ```
	 *
	 * The block ends on a line that starts with at least as many delimiters as the opening line.
	 */
	#parseVerbatim(): { block: VerbatimNode } | null {
		const cursor = this.#cursor;
		const openerPos = cursor.pos;
		if (this.#unterminatedOpeners.has(openerPos)) return null;

		const delimiter = cursor.ch;
		const count = cursor.countRun(delimiter);
		if (count < 3) return null;

		const attributes = this.#inlineParser.parseAttributes(true);
		cursor.skipToEOL();
		if (cursor.ch === EOS) return null;

		const lines: Array<string> = [];
		while (true) {
			cursor.eatEOL();
			const lineStartPos = cursor.pos;
			// If we run into the end of the source, the block was never closed and the opening line is paragraph text.
			if (cursor.ch === EOS) {
				this.#unterminatedOpeners.add(openerPos);
				return null;
			}
			if (cursor.ch === delimiter) {
				if (cursor.countRun(delimiter) >= count) {
					cursor.skipToEOL();
					const block: VerbatimNode = { type: "verbatim", lines };
					if (attributes !== undefined) block.attributes = attributes;
					return { block };
				}
				// A shorter run is content.
				cursor.setPos(lineStartPos);
			}
			cursor.skipToEOL();
			lines.push(cursor.sliceFrom(lineStartPos));
		}
	}

	/**
	 * Parses a region: a sequence of blocks enclosed by two lines of at least three `:` (span), `<` (quote) or `"`
	 * (verse). The closing line may carry inline content, e.g. the source of a quotation.
	 */
	#parseRegion(): { block: RegionNode<RawBlockNode> } | null {
		const cursor = this.#cursor;
		const openerPos = cursor.pos;
		if (this.#unterminatedOpeners.has(openerPos)) return null;

		const delimiter = cursor.ch;
		const kind = REGION_KINDS[delimiter];
		if (kind === undefined) return null;
		const count = cursor.countRun(delimiter);
		if (count < 3) return null;

		const attributes = this.#inlineParser.parseAttributes(true);
		cursor.skipToEOL();
		if (cursor.ch === EOS) return null;

		const region: RegionNode<RawBlockNode> = { type: "region", kind, children: [] };
		if (attributes !== undefined) region.attributes = attributes;

		// The lines up to the closing delimiter are parsed as a block sequence of their own, one nesting level deeper.
		let lastParagraph: ParagraphNode | null = null;
		cursor.eatEOL();
		while (true) {
			const lineStartPos = cursor.pos;
			if (cursor.ch === EOS) {
				this.#unterminatedOpeners.add(openerPos);
				return null;
			}
			if (cursor.ch === delimiter) {
				if (cursor.countRun(delimiter) >= count) {
					// Lists opened inside the region must not continue after it.
					this.#clearStacked();
					this.#parseRegionInlines(region);
					return { block: region };
				}
				cursor.setPos(lineStartPos);
			}

			const { block, merged } = this.#parseBlock(lastParagraph);
			if (block !== null) region.children.push(block);
			if (!merged) lastParagraph = block?.type === "paragraph" ? block : null;
		}
	}

	#parseRegionInlines(region: RegionNode<RawBlockNode>): void {
		const cursor = this.#cursor;
		while (cursor.ch === " ") cursor.next();
		const inlines: Array<InlineNode> = [];
		while (cursor.ch !== EOS && !isEOL(cursor.ch)) {
			const inline = this.#inlineParser.next();
			if (inline === null) break;
			inlines.push(inline);
		}
		if (inlines.length > 0) region.inlines = inlines;
	}

	/**
	 * Parses a heading such as `=== Title {#anchor}`. Three `=` give a level 1 heading, eight or more a level 6 heading.
	 */
	#parseHeading(): { block: HeadingNode } | null {
		const cursor = this.#cursor;
		const count = cursor.countRun("=");
		if (count < 3) return null;
		if (cursor.ch !== " ") return null;
		while (cursor.ch === " ") cursor.next();

		const heading: HeadingNode = {
			type: "heading",
			level: HEADING_LEVELS[Math.min(count, 8) - 3] ?? 6,
		};
		const inlines: Array<InlineNode> = [];
		while (cursor.ch !== EOS && !isEOL(cursor.ch)) {
			// If an attribute list can be read here, it ends the heading; otherwise the "{" is ordinary inline content.
			if (cursor.ch === "{") {
				const attributesStartPos = cursor.pos;
				const attributes = this.#inlineParser.parseAttributes(true);
				if (cursor.pos !== attributesStartPos) {
					if (attributes !== undefined) heading.attributes = attributes;
					cursor.skipToEOL();
					break;
				}
			}
			const inline = this.#inlineParser.next();
			if (inline === null) break;
			inlines.push(inline);
		}
		if (inlines.length > 0) heading.inlines = inlines;
		return { block: heading };
	}

	#parseHorizontalRule(): { block: HorizontalRuleNode } | null {
		const cursor = this.#cursor;
		if (cursor.countRun("-") < 3) return null;
		const attributes = this.#inlineParser.parseAttributes(true);
		cursor.skipToEOL();
		const block: HorizontalRuleNode = { type: "horizontal-rule" };
		if (attributes !== undefined) block.attributes = attributes;
		return { block };
	}

	/**
	 * Parses one list line such as `*# item`. Each marker character is one nesting level: `*` unordered, `#` ordered
	 * and `>` quote.
	 *
	 * The open lists form a stack with one entry per level. Levels whose marker matches the open list are reused, a
	 * different marker replaces the list at that level (and drops everything below it), and missing levels are created.
	 * A newly created nested list is attached as a block of the last item of its parent list.
	 */
	#parseList(): { block: ListNode<RawBlockNode> | null } | null {
		const cursor = this.#cursor;
		const kinds: Array<ListKind> = [];
		while (true) {
			const kind = LIST_KINDS[cursor.ch];
			if (kind === undefined) return null;
			kinds.push(kind);
			cursor.next();
			if (cursor.ch === " ") break;
		}
		while (cursor.ch === " ") cursor.next();
		// Markers without content do not make an item.
		if (cursor.ch === EOS || isEOL(cursor.ch)) return null;

		// If the line has fewer markers than there are open lists, the deeper lists end here.
		const lists = this.#lists;
		if (kinds.length < lists.length) lists.length = kinds.length;

		let list: ListNode<RawBlockNode> | undefined;
		let createdCount = 0;
		// We walk the markers level by level. The deepest list we end up with receives the new item.
		for (const [level, kind] of kinds.entries()) {
			const openList = lists[level];
			if (openList !== undefined && openList.kind === kind) {
				list = openList;
				continue;
			}
			// If there is no open list at this level, or one of another kind, we start a new one and drop everything below it.
			list = { type: "list", kind, items: [] };
			createdCount++;
			lists[level] = list;
			lists.length = level + 1;
		}
		if (list === undefined) return null;

		const paragraph = this.#parseLineParagraph();
		list.items.push(paragraph === null ? [] : [paragraph]);

		// Every list created above still has to be attached to the tree. We go from the deepest one upwards: a nested list
		// becomes a block of the last item of its parent, and a new top-level list is the block this line returns.
		for (let i = 0; i < createdCount; i++) {
			const childLevel = lists.length - i - 1;
			const child = lists[childLevel];
			const parent = lists[childLevel - 1];
			if (child === undefined) break;
			if (parent === undefined) return { block: child };

			const lastItem = parent.items.at(-1);
			if (lastItem !== undefined) {
				lastItem.push(child);
			} else {
				// The parent was created on this very line, e.g. for "** item" without an open list.
				parent.items.push([child]);
			}
		}
		return { block: null };
	}

	/**
	 * Parses `; term`. The first term opens a new definition list; later terms add definitions to it.
	 */
	#parseTerm(): { block: DefinitionListNode<RawBlockNode> | null } | null {
		const cursor = this.#cursor;
		cursor.next(); // Skip ";"
		if (cursor.ch !== " ") return null;
		while (cursor.ch === " ") cursor.next();

		let definitionList = this.#definitionList;
		const isNewList = definitionList === null;
		if (definitionList === null) {
			definitionList = { type: "definition-list", definitions: [] };
			this.#definitionList = definitionList;
		}
		const definition: Definition<RawBlockNode> = { descriptions: [] };
		definitionList.definitions.push(definition);

		while (true) {
			const inline = this.#inlineParser.next();
			if (inline === null) {
				if (definition.term !== undefined) break;
				// An empty term is no term at all, so we take the definition back out.
				definitionList.definitions.pop();
				return null;
			}
			(definition.term ??= []).push(inline);
			if (inline.type === "break") break;
		}
		return { block: isNewList ? definitionList : null };
	}

	/**
	 * Parses `: description`, which belongs to the term of the most recent definition.
	 */
	#parseDescription(): { block: null } | null {
		const cursor = this.#cursor;
		cursor.next(); // Skip ":"
		if (cursor.ch !== " ") return null;
		while (cursor.ch === " ") cursor.next();

		const definition = this.#definitionList?.definitions.at(-1);
		if (definition?.term === undefined) return null;

		const paragraph = this.#parseLineParagraph();
		if (paragraph === null) return null;

		this.#lists = [];
		this.#table = null;
		definition.descriptions.push([paragraph]);
		return { block: null };
	}

	/**
	 * Parses an indented line, which continues the item of an open list (the number of spaces selects the list level)
	 * or the term or description of an open definition.
	 */
	#parseIndent(): { block: null } | null {
		const cursor = this.#cursor;
		// The first space only marks the line as indented; every further space is one list level deeper.
		let depth = 0;
		while (true) {
			cursor.next();
			if (cursor.ch !== " ") break;
			depth++;
		}

		const lists = this.#lists;
		// If lists are open, the depth selects the list whose last item the line continues. Deeper lists end here.
		if (lists.length > 0) {
			if (depth < lists.length) lists.length = depth;
			const list = lists.at(-1);
			const lastItem = list?.items.at(-1);
			if (lastItem === undefined) return null;

			const paragraph = this.#parseLineParagraph();
			if (paragraph === null) return null;
			appendToLastParagraph(lastItem, paragraph);
			return { block: null };
		}

		const definition = this.#definitionList?.definitions.at(-1);
		if (definition === undefined || depth < 1) return null;

		// Without a description yet, the line continues the term; otherwise it continues the last description.
		const lastDescription = definition.descriptions.at(-1);
		if (lastDescription === undefined) {
			while (true) {
				const inline = this.#inlineParser.next();
				if (inline === null) return { block: null };
				(definition.term ??= []).push(inline);
				if (inline.type === "break") return { block: null };
			}
		}

		const paragraph = this.#parseLineParagraph();
		if (paragraph === null) return null;
		appendToLastParagraph(lastDescription, paragraph);
		return { block: null };
	}

	/**
	 * Parses one table row, `| cell | cell |`. The first row opens a new table; later rows are appended to it.
	 */
	#parseRow(): { block: TableNode_internal | null } {
		const cursor = this.#cursor;
		const row: Array<Array<InlineNode>> = [];
		while (true) {
			cursor.next(); // Skip "|"
			const cell = this.#parseCell();
			// Nothing but the end of the line after a "|" closes the row rather than opening an empty cell.
			if (cell !== null) row.push(cell);

			if (cursor.ch === EOS || isEOL(cursor.ch)) {
				cursor.eatEOL();
				if (this.#table === null) {
					this.#table = { type: "table", rows: [row] };
					return { block: this.#table };
				}
				this.#table.rows.push(row);
				return { block: null };
			}
		}
	}

	/**
	 * @returns The inline content up to the next `|`, or `null` for nothing but the end of the line.
	 */
	#parseCell(): Array<InlineNode> | null {
		const cursor = this.#cursor;
		const inlines: Array<InlineNode> = [];
		while (true) {
			if (cursor.ch === EOS || isEOL(cursor.ch)) {
				return inlines.length === 0 ? null : inlines;
			}
			if (cursor.ch === "|") return inlines;
			const inline = this.#inlineParser.next();
			if (inline === null) return inlines;
			inlines.push(inline);
		}
	}
}

/**
 * Continues the last paragraph of `blocks` with the content of `paragraph`, or appends `paragraph` if the last block is
 * something else (e.g. a blank line placeholder or a nested list).
 */
function appendToLastParagraph(blocks: Array<RawBlockNode>, paragraph: ParagraphNode): void {
	const lastBlock = blocks.at(-1);
	if (lastBlock?.type === "paragraph") {
		lastBlock.inlines.push(...paragraph.inlines);
	} else {
		blocks.push(paragraph);
	}
}

// A line break followed by one of these ends a paragraph, since the next line may start another block.
const PARAGRAPH_BREAKING_CHARACTERS = new Set([
	EOS,
	"\n",
	"\r",
	"`",
	'"',
	"<",
	"=",
	"-",
	"*",
	"#",
	">",
	";",
	":",
	" ",
	"|",
]);

const REGION_KINDS: Record<string, RegionKind | undefined> = {
	":": "span",
	"<": "quote",
	'"': "verse",
};

const LIST_KINDS: Record<string, ListKind | undefined> = {
	"*": "unordered",
	"#": "ordered",
	">": "quote",
};

const HEADING_LEVELS = [1, 2, 3, 4, 5, 6] as const;

export interface ParagraphNode {
	type: "paragraph";
	inlines: Array<InlineNode>;
}

export interface VerbatimNode {
	type: "verbatim";
	lines: Array<string>;
	attributes?: Attributes;
}

export type RegionKind = "span" | "quote" | "verse";

export interface RegionNode<TBlock> {
	type: "region";
	kind: RegionKind;
	children: Array<TBlock>;
	inlines?: Array<InlineNode>;
	attributes?: Attributes;
}

export interface HeadingNode {
	type: "heading";
	level: 1 | 2 | 3 | 4 | 5 | 6;
	inlines?: Array<InlineNode>;
	attributes?: Attributes;
	slug?: string;
}

export interface HorizontalRuleNode {
	type: "horizontal-rule";
	attributes?: Attributes;
}

export type ListKind = "unordered" | "ordered" | "quote";

export interface ListNode<TBlock> {
	type: "list";
	kind: ListKind;
	items: Array<Array<TBlock>>;
}

export interface Definition<TBlock> {
	term?: Array<InlineNode>;
	descriptions: Array<Array<TBlock>>;
}

export interface DefinitionListNode<TBlock> {
	type: "definition-list";
	definitions: Array<Definition<TBlock>>;
}

export type Alignment = "default" | "left" | "center" | "right";

export interface TableCell {
	align: Alignment;
	inlines?: Array<InlineNode>;
}

export interface TableNode {
	type: "table";
	header?: Array<TableCell>;
	alignments: Array<Alignment>;
	rows: Array<Array<TableCell>>;
}

export type BlockNode =
	| ParagraphNode
	| VerbatimNode
	| RegionNode<BlockNode>
	| HeadingNode
	| HorizontalRuleNode
	| ListNode<BlockNode>
	| DefinitionListNode<BlockNode>
	| TableNode;

// A table as the parser builds it: rows of cells, each cell being the raw inline content between two "|".
export interface TableNode_internal {
	type: "table";
	rows: Array<Array<Array<InlineNode>>>;
}

// Left in a list item for a blank line, so that the normalizer can tell where an item's paragraphs were separated.
export interface NullItemNode_internal {
	type: "null-item";
}

// Left in a description for a blank line.
export interface NullDescriptionNode_internal {
	type: "null-description";
}

/**
 * The block tree produced by {@link BlockParser}. A normalized {@link BlockNode} tree is a valid raw tree, too.
 */
export type RawBlockNode =
	| ParagraphNode
	| VerbatimNode
	| RegionNode<RawBlockNode>
	| HeadingNode
	| HorizontalRuleNode
	| ListNode<RawBlockNode>
	| DefinitionListNode<RawBlockNode>
	| TableNode
	| TableNode_internal
	| NullItemNode_internal
	| NullDescriptionNode_internal;
