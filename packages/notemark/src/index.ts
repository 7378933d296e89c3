import type { BlockNode } from "./block-parser";
import type { InlineNode } from "./inline-parser";
import { type ParseOptions, resolveOptions, trace } from "./options";
import { getSyntax, isSyntaxRegistered } from "./syntax";

/**
 * Parses the content of a note into a normalized block tree.
 *
 * @example
 * ```ts
 * const blocks = parseBlocks("=== Hello\nSome //text//.");
 * // [{ type: "heading", level: 1, inlines: [{ type: "text", text: "Hello" }], slug: "hello" }, { type: "paragraph", ... }]
 * ```
 */
export function parseBlocks(text: string, options?: ParseOptions): Array<BlockNode> {
	const resolved = resolveOptions(options);
	const parser = getSyntax(resolved.syntax);
	if (!isSyntaxRegistered(resolved.syntax)) {
		trace(resolved, () => `unknown syntax "${resolved.syntax}", using "${parser.name}"`);
	}
	return parser.parseBlocks(text, resolved.syntax, resolved);
}

/**
 * Parses a single piece of inline content, e.g. the title of a note.
 * @returns The normalized inline nodes, or `undefined` if the text has no content.
 */
export function parseInlines(
	text: string,
	options?: ParseOptions,
): Array<InlineNode> | undefined {
	const resolved = resolveOptions(options);
	const parser = getSyntax(resolved.syntax);
	if (!isSyntaxRegistered(resolved.syntax)) {
		trace(resolved, () => `unknown syntax "${resolved.syntax}", using "${parser.name}"`);
	}
	return parser.parseInlines(text, resolved.syntax, resolved);
}

export * from "./attributes";
export {
	type Alignment,
	BlockParser,
	type BlockNode,
	type Definition,
	type DefinitionListNode,
	type HeadingNode,
	type HorizontalRuleNode,
	type ListKind,
	type ListNode,
	NestingLevelError,
	type ParagraphNode,
	type RawBlockNode,
	type RegionKind,
	type RegionNode,
	type TableCell,
	type TableNode,
	type VerbatimNode,
} from "./block-parser";
export { assignIdentifiers, slugify, toPlainText } from "./cleanup";
export { Cursor, EOS } from "./cursor";
export * from "./inline-parser";
export { Normalizer, normalizeBlocks, normalizeInlines } from "./normalizer";
export {
	DEFAULT_MAX_NESTING_LEVEL,
	DEFAULT_SYNTAX,
	type ParseOptions,
} from "./options";
export * from "./reference";
export {
	getSyntax,
	isSyntaxRegistered,
	registerSyntax,
	type SyntaxParser,
} from "./syntax";
