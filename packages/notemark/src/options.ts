/**
 * Options accepted by the public parse entry points.
 */
export interface ParseOptions {
	/** Name of the syntax the text is written in. Defaults to the notemark markup (`"zmk"`). */
	syntax?: string;
	/** Deepest block (and inline construct) nesting that is still recognized. Defaults to 100. */
	maxNestingLevel?: number;
	/** Receives a trace message for every block construct that is recognized or rejected. */
	debug?: (message: string) => void;
}

export type ResolvedParseOptions = Required<Omit<ParseOptions, "debug">> &
	Pick<ParseOptions, "debug">;

export const DEFAULT_SYNTAX = "zmk";
export const DEFAULT_MAX_NESTING_LEVEL = 100;

export function resolveOptions(options?: ParseOptions): ResolvedParseOptions {
	return {
		syntax: DEFAULT_SYNTAX,
		maxNestingLevel: DEFAULT_MAX_NESTING_LEVEL,
		...withoutUndefined(options),
	};
}

/**
 * Sends a trace message to the `debug` hook. The message is built lazily so that tracing costs nothing when it is off.
 */
export function trace(
	options: Pick<ParseOptions, "debug">,
	message: () => string,
): void {
	if (options.debug === undefined) return;
	options.debug(message());
}

// Spreading `{ maxNestingLevel: undefined }` over the defaults would erase them.
function withoutUndefined(options: ParseOptions | undefined): ParseOptions {
	const result: ParseOptions = {};
	if (options?.syntax !== undefined) result.syntax = options.syntax;
	if (options?.maxNestingLevel !== undefined)
		result.maxNestingLevel = options.maxNestingLevel;
	if (options?.debug !== undefined) result.debug = options.debug;
	return result;
}
