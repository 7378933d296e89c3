import type { BlockNode, HeadingNode, TableCell } from "./block-parser";
import type { InlineNode, MarkNode } from "./inline-parser";

/**
 * Gives every heading with text content a `slug` and every mark a unique name, so that both can be used as URL
 * fragments. Headings and marks share one set of identifiers: a repeated identifier gets a numeric suffix, e.g. `intro`,
 * `intro-1`, `intro-2`. A mark without a name is named `*`.
 *
 * The blocks are expected to be normalized. They are not modified; the result is a new tree.
 */
export function assignIdentifiers(blocks: ReadonlyArray<BlockNode>): Array<BlockNode> {
	const identifiers = new Set<string>();
	let hasMark = false;

	// Headings come first, so that a mark never takes the slug of a heading further down.
	const withSlugs = rewriteBlocks(blocks, {
		heading: (heading) => withSlug(heading, identifiers),
		mark: (mark) => {
			hasMark = true;
			return mark;
		},
	});
	if (!hasMark) return withSlugs;

	return rewriteBlocks(withSlugs, {
		heading: (heading) => heading,
		mark: (mark) => ({
			...mark,
			text: addIdentifier(mark.text.length === 0 ? "*" : mark.text, identifiers),
		}),
	});
}

interface Rewriter {
	heading(heading: HeadingNode): HeadingNode;
	mark(mark: MarkNode): MarkNode;
}

// Copies the tree in document order, passing every heading and every mark through the rewriter.
function rewriteBlocks(blocks: ReadonlyArray<BlockNode>, rewriter: Rewriter): Array<BlockNode> {
	const rewriteCell = (cell: TableCell): TableCell => ({
		...cell,
		inlines: rewriteInlines(cell.inlines, rewriter),
	});
	const visit = (block: BlockNode): BlockNode => {
		switch (block.type) {
			case "paragraph":
				return { ...block, inlines: rewriteInlines(block.inlines, rewriter) ?? [] };
			case "heading":
				return rewriter.heading({ ...block, inlines: rewriteInlines(block.inlines, rewriter) });
			case "region":
				return {
					...block,
					children: block.children.map(visit),
					inlines: rewriteInlines(block.inlines, rewriter),
				};
			case "list":
				return { ...block, items: block.items.map((item) => item.map(visit)) };
			case "definition-list":
				return {
					...block,
					definitions: block.definitions.map((definition) => ({
						term: rewriteInlines(definition.term, rewriter),
						descriptions: definition.descriptions.map((description) =>
							description.map(visit),
						),
					})),
				};
			case "table":
				return {
					...block,
					header: block.header?.map(rewriteCell),
					rows: block.rows.map((row) => row.map(rewriteCell)),
				};
			case "verbatim":
			case "horizontal-rule":
				return block;
		}
	};
	return blocks.map(visit);
}

function rewriteInlines(
	inlines: ReadonlyArray<InlineNode> | undefined,
	rewriter: Rewriter,
): Array<InlineNode> | undefined {
	if (inlines === undefined) return undefined;
	return inlines.map((inline): InlineNode => {
		switch (inline.type) {
			case "mark":
				return rewriter.mark(inline);
			case "link":
			case "image":
			case "blob":
			case "citation":
			case "footnote":
			case "format":
				return { ...inline, inlines: rewriteInlines(inline.inlines, rewriter) };
			case "edit":
				return {
					...inline,
					deletes: rewriteInlines(inline.deletes, rewriter),
					inserts: rewriteInlines(inline.inserts, rewriter),
				};
			default:
				return inline;
		}
	});
}

function withSlug(heading: HeadingNode, identifiers: Set<string>): HeadingNode {
	if (heading.inlines === undefined) return heading;
	const slug = slugify(toPlainText(heading.inlines));
	if (slug.length === 0) return heading;
	return { ...heading, slug: addIdentifier(slug, identifiers) };
}

function addIdentifier(identifier: string, identifiers: Set<string>): string {
	let candidate = identifier;
	for (let count = 1; identifiers.has(candidate); count++) {
		candidate = `${identifier}-${count}`;
	}
	identifiers.add(candidate);
	return candidate;
}

/**
 * Turns a piece of text into a lowercase string of letters and digits separated by single dashes. Accents are
 * dropped, e.g. "Café au lait!" becomes "cafe-au-lait".
 */
export function slugify(text: string): string {
	return text
		.trim()
		.normalize("NFKD")
		.replace(/[\p{M}\p{Sk}]/gu, "") // Drop combining accents left over by the decomposition
		.replace(/[^\p{L}\p{N}]+/gu, "-")
		.replace(/^-+|-+$/g, "")
		.toLowerCase();
}

/**
 * Returns the text a reader would see, without any markup.
 */
export function toPlainText(inlines: ReadonlyArray<InlineNode>): string {
	let text = "";
	for (const inline of inlines) {
		switch (inline.type) {
			case "text":
				text += inline.text;
				break;
			case "space":
			case "break":
				text += " ";
				break;
			case "tag":
				text += inline.tag;
				break;
			case "literal":
				if (inline.kind !== "comment") text += inline.text;
				break;
			case "edit":
				text += toPlainText(inline.inserts ?? []);
				break;
			case "link":
			case "image":
			case "blob":
			case "citation":
			case "format":
				text += toPlainText(inline.inlines ?? []);
				break;
			case "footnote":
			case "mark":
				break;
		}
	}
	return text;
}
