import {
	type Attributes,
	cloneAttributes,
	hasDefaultAttribute,
	removeDefaultAttribute,
} from "./attributes";
import type {
	Alignment,
	BlockNode,
	Definition,
	RawBlockNode,
	TableCell,
	TableNode,
	TableNode_internal,
} from "./block-parser";
import type { FormatKind, InlineNode, MarkNode, TextNode } from "./inline-parser";

/**
 * Turns the raw tree of the block parser into its canonical form: placeholders and empty paragraphs are dropped,
 * tables get their header and column alignments, adjacent text is merged and leading/trailing white space is removed.
 *
 * The input is never modified; every call returns a new tree, so callers must use the return value. Normalizing an
 * already normalized tree returns an equal tree.
 */
export function normalizeBlocks(blocks: ReadonlyArray<RawBlockNode>): Array<BlockNode> {
	return new Normalizer().normalizeBlocks(blocks);
}

/**
 * Normalizes an inline sequence outside of any block, e.g. the title of a note.
 * @returns The normalized sequence, or `undefined` if nothing is left of it.
 */
export function normalizeInlines(
	inlines: ReadonlyArray<InlineNode> | undefined,
): Array<InlineNode> | undefined {
	return new Normalizer().normalizeInlines(inlines);
}

/**
 * One normalization pass. An instance must not be reused for another document, since it remembers the mark names it
 * has seen.
 */
export class Normalizer {
	#marks = new Set<string>();
	#inVerse = false;

	normalizeBlocks(blocks: ReadonlyArray<RawBlockNode>): Array<BlockNode> {
		const result: Array<BlockNode> = [];
		for (const block of blocks) {
			const normalized = this.#normalizeBlock(block);
			if (normalized !== null) result.push(normalized);
		}
		return result;
	}

	/**
	 * @returns The normalized block, or `null` if the block does not survive normalization (placeholders and
	 * paragraphs without content).
	 */
	#normalizeBlock(block: RawBlockNode): BlockNode | null {
		switch (block.type) {
			case "null-item":
			case "null-description":
				return null;
			case "paragraph": {
				const inlines = this.normalizeInlines(block.inlines);
				if (inlines === undefined) return null;
				return { type: "paragraph", inlines };
			}
			case "verbatim":
				return {
					type: "verbatim",
					lines: [...block.lines],
					attributes: cloneAttributes(block.attributes),
				};
			case "region": {
				// Verse rules apply to the blocks of a verse region, but not to the inline content of its closing line.
				const wasInVerse = this.#inVerse;
				if (block.kind === "verse") this.#inVerse = true;
				const children = this.normalizeBlocks(block.children);
				this.#inVerse = wasInVerse;
				return {
					type: "region",
					kind: block.kind,
					children,
					inlines: this.normalizeInlines(block.inlines),
					attributes: cloneAttributes(block.attributes),
				};
			}
			case "heading":
				return {
					type: "heading",
					level: block.level,
					inlines: this.normalizeInlines(block.inlines),
					attributes: cloneAttributes(block.attributes),
					slug: block.slug,
				};
			case "horizontal-rule":
				return {
					type: "horizontal-rule",
					attributes: cloneAttributes(block.attributes),
				};
			case "list":
				return {
					type: "list",
					kind: block.kind,
					items: block.items.map((item) => this.normalizeBlocks(item)),
				};
			case "definition-list":
				return {
					type: "definition-list",
					definitions: block.definitions.map(
						(definition): Definition<BlockNode> => ({
							term: this.normalizeInlines(definition.term),
							descriptions: definition.descriptions.map((description) =>
								this.normalizeBlocks(description),
							),
						}),
					),
				};
			case "table":
				if ("alignments" in block) return this.#renormalizeTable(block);
				return this.#normalizeTable(block);
		}
	}

	/**
	 * Shapes a table as the parser built it.
	 *
	 * The table is as wide as its longest row; shorter rows (and the header) are padded with empty cells. If any cell
	 * of the first row starts with `=`, that row is the header. A header cell may end with an alignment marker (`<`
	 * left, `:` center, `>` right) that sets the alignment of its column. Any cell may start with such a marker to
	 * override the alignment of its column.
	 */
	#normalizeTable(table: TableNode_internal): TableNode {
		const width = Math.max(0, ...table.rows.map((row) => row.length));
		let rows = table.rows;
		const alignments: Array<Alignment> = [];

		// If the first row is a header, its markers give the alignments of the columns and the row leaves the body.
		let header: Array<Array<InlineNode>> | undefined;
		const firstRow = rows[0];
		if (firstRow !== undefined && isHeaderRow(firstRow)) {
			header = firstRow.map((cell, column) => {
				const { inlines, align } = stripHeaderMarkers(cell);
				alignments[column] = align;
				return inlines;
			});
			rows = rows.slice(1);
		}
		// Columns beyond the header, or all of them without a header, have no alignment of their own.
		for (let column = 0; column < width; column++) {
			alignments[column] ??= "default";
		}

		return {
			type: "table",
			header:
				header === undefined ? undefined : this.#normalizeRow(header, alignments),
			alignments,
			rows: rows.map((row) => this.#normalizeRow(row, alignments)),
		};
	}

	#normalizeRow(
		row: ReadonlyArray<ReadonlyArray<InlineNode>>,
		alignments: ReadonlyArray<Alignment>,
	): Array<TableCell> {
		return alignments.map((columnAlignment, column) => {
			const cell = row[column];
			// Padding for a short row.
			if (cell === undefined) return { align: columnAlignment };

			const { inlines, align } = stripLeadingAlignment(cell);
			return {
				align: align ?? columnAlignment,
				inlines: this.normalizeInlines(inlines),
			};
		});
	}

	// A table that was normalized before already has its final shape.
	#renormalizeTable(table: TableNode): TableNode {
		const normalizeCell = (cell: TableCell): TableCell => ({
			align: cell.align,
			inlines: this.normalizeInlines(cell.inlines),
		});
		return {
			type: "table",
			header: table.header?.map(normalizeCell),
			alignments: [...table.alignments],
			rows: table.rows.map((row) => row.map(normalizeCell)),
		};
	}

	/**
	 * Normalizes an inline sequence, after normalizing the content of every node in it.
	 *
	 * Outside of verse regions, leading white space is removed. Adjacent text is merged, a run of two or more blanks
	 * before a line break turns it into a hard break, and trailing white space is removed. Within a verse region, every
	 * line break is hard and the blanks before text are kept as no-break spaces.
	 */
	normalizeInlines(
		inlines: ReadonlyArray<InlineNode> | undefined,
	): Array<InlineNode> | undefined {
		if (inlines === undefined || inlines.length === 0) return undefined;

		// The children come first, so that marks are seen in document order.
		let nodes = inlines.map((inline) => this.#normalizeInline(inline));
		if (!this.#inVerse) nodes = stripLeadingSpace(nodes);
		nodes = nodes.filter((node) => node.type !== "text" || node.text.length > 0);
		nodes = this.#mergeAdjacent(nodes);
		nodes = stripTrailingSpace(nodes);
		nodes = nodes.map((node) =>
			node.type === "text" ? substituteEllipsis(node) : node,
		);
		return nodes.length === 0 ? undefined : nodes;
	}

	#normalizeInline(inline: InlineNode): InlineNode {
		switch (inline.type) {
			case "text":
			case "space":
			case "break":
			case "tag":
				return { ...inline };
			case "literal":
				return { ...inline, attributes: cloneAttributes(inline.attributes) };
			case "mark":
				return this.#normalizeMark(inline);
			case "link":
			case "image":
				return {
					...inline,
					reference: { ...inline.reference },
					inlines: this.normalizeInlines(inline.inlines),
					attributes: cloneAttributes(inline.attributes),
				};
			case "blob":
				return { ...inline, inlines: this.normalizeInlines(inline.inlines) };
			case "citation":
			case "footnote":
				return {
					...inline,
					inlines: this.normalizeInlines(inline.inlines),
					attributes: cloneAttributes(inline.attributes),
				};
			case "format": {
				const { kind, attributes } = recodeDefaultFormat(
					inline.kind,
					cloneAttributes(inline.attributes),
				);
				return {
					type: "format",
					kind,
					inlines: this.normalizeInlines(inline.inlines),
					attributes,
				};
			}
			case "edit":
				return {
					type: "edit",
					deletes: this.normalizeInlines(inline.deletes),
					inserts: this.normalizeInlines(inline.inserts),
					attributes: cloneAttributes(inline.attributes),
				};
		}
	}

	// The first mark with a given name wins; later ones lose their name.
	#normalizeMark(mark: MarkNode): MarkNode {
		if (mark.text.length === 0) return { ...mark };
		if (this.#marks.has(mark.text)) return { type: "mark", text: "" };
		this.#marks.add(mark.text);
		return { ...mark };
	}

	#mergeAdjacent(inlines: Array<InlineNode>): Array<InlineNode> {
		let nodes = inlines;
		while (true) {
			// In verse regions, turning blanks into text may create new neighbours of text, so repeat until stable.
			let again = false;
			const merged: Array<InlineNode> = [];
			for (let i = 0; i < nodes.length; i++) {
				const node = nodes[i];
				if (node === undefined) break;
				const next = nodes[i + 1];
				switch (node.type) {
					// A run of text nodes becomes one.
					case "text": {
						let text = node.text;
						let following = next;
						while (following?.type === "text") {
							text += following.text;
							i++;
							following = nodes[i + 1];
						}
						merged.push({ type: "text", text });
						break;
					}
					case "space":
						// If two or more blanks end the line, we replace them and the soft break with a hard break.
						if (next?.type === "break" && node.lexeme.length > 1) {
							merged.push({ type: "break", hard: true });
							i++;
						} else if (next?.type === "text" && this.#inVerse) {
							// In verse, blanks before text are kept as no-break spaces that are part of the text.
							merged.push({
								type: "text",
								text: NO_BREAK_SPACE.repeat(node.lexeme.length) + next.text,
							});
							i++;
							again = true;
						} else {
							merged.push(node);
						}
						break;
					case "break":
						merged.push(this.#inVerse ? { type: "break", hard: true } : node);
						break;
					default:
						merged.push(node);
				}
			}
			if (!again) return merged;
			nodes = merged;
		}
	}
}

const NO_BREAK_SPACE = "\u00a0";
const ELLIPSIS = "\u2026";

// Three periods at the end of a text run, optionally followed by one punctuation character, but not four periods.
const ELLIPSIS_REGEX = /(^|[^.])\.\.\.([,;:!?]?)$/;

const DEFAULT_FORMAT_KINDS: Partial<Record<FormatKind, FormatKind>> = {
	italic: "emphasis",
	bold: "strong",
};

function recodeDefaultFormat(
	kind: FormatKind,
	attributes: Attributes | undefined,
): { kind: FormatKind; attributes: Attributes | undefined } {
	const recoded = DEFAULT_FORMAT_KINDS[kind];
	if (recoded === undefined || !hasDefaultAttribute(attributes)) {
		return { kind, attributes };
	}
	removeDefaultAttribute(attributes);
	if (attributes !== undefined && Object.keys(attributes).length === 0) {
		return { kind: recoded, attributes: undefined };
	}
	return { kind: recoded, attributes };
}

function substituteEllipsis(node: TextNode): TextNode {
	if (!ELLIPSIS_REGEX.test(node.text)) return node;
	return { type: "text", text: node.text.replace(ELLIPSIS_REGEX, `$1${ELLIPSIS}$2`) };
}

function stripLeadingSpace(inlines: Array<InlineNode>): Array<InlineNode> {
	const start = inlines.findIndex((inline) => !isWhiteSpace(inline));
	return start === -1 ? [] : inlines.slice(start);
}

function stripTrailingSpace(inlines: Array<InlineNode>): Array<InlineNode> {
	let end = inlines.length;
	while (end > 0) {
		const inline = inlines[end - 1];
		if (inline === undefined || !isWhiteSpace(inline)) break;
		end--;
	}
	return inlines.slice(0, end);
}

function isWhiteSpace(inline: InlineNode): boolean {
	switch (inline.type) {
		case "space":
		case "break":
			return true;
		case "text":
			return inline.text.length === 0;
		default:
			return false;
	}
}

function isHeaderRow(row: ReadonlyArray<ReadonlyArray<InlineNode>>): boolean {
	return row.some((cell) => {
		const first = cell[0];
		return first?.type === "text" && first.text.startsWith("=");
	});
}

function getAlignment(character: string | undefined): Alignment {
	switch (character) {
		case ":":
			return "center";
		case "<":
			return "left";
		case ">":
			return "right";
		default:
			return "default";
	}
}

/**
 * Removes the `=` that marks a header cell and the alignment marker at its end.
 * @returns The remaining content and the alignment of the cell's column.
 */
function stripHeaderMarkers(cell: ReadonlyArray<InlineNode>): {
	inlines: Array<InlineNode>;
	align: Alignment;
} {
	const inlines = [...cell];
	const first = inlines[0];
	if (first?.type === "text" && first.text.startsWith("=")) {
		inlines[0] = { type: "text", text: first.text.slice(1) };
	}

	const lastIndex = inlines.length - 1;
	const last = inlines[lastIndex];
	if (last?.type !== "text" || last.text.length === 0) {
		return { inlines, align: "default" };
	}
	const align = getAlignment(last.text.at(-1));
	if (align !== "default") {
		inlines[lastIndex] = { type: "text", text: last.text.slice(0, -1) };
	}
	return { inlines, align };
}

/**
 * Removes an alignment marker at the start of a cell.
 * @returns The remaining content and the alignment the marker selects, if there was one.
 */
function stripLeadingAlignment(cell: ReadonlyArray<InlineNode>): {
	inlines: Array<InlineNode>;
	align: Alignment | undefined;
} {
	const inlines = [...cell];
	const first = inlines[0];
	if (first?.type !== "text" || first.text.length === 0) {
		return { inlines, align: undefined };
	}
	const align = getAlignment(first.text.charAt(0));
	if (align === "default") return { inlines, align: undefined };
	inlines[0] = { type: "text", text: first.text.slice(1) };
	return { inlines, align };
}
