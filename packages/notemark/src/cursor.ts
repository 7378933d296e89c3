/**
 * Sentinel returned by {@link Cursor.ch} and {@link Cursor.peek} once the end of the source has been reached.
 */
export const EOS = "";

/**
 * A character cursor over a fully materialized note body.
 *
 * Supported line endings:
 *   - LF      -> "\n"   (line feed)
 *   - CRLF    -> "\r\n" (carriage return + line feed)
 *   - CR      -> "\r"   (carriage return)
 *
 * @example
 * ```ts
 * const cursor = new Cursor("Hello\r\nWorld");
 * cursor.skipToEOL();
 * cursor.eatEOL();
 * console.log(cursor.ch); // "W"
 * ```
 */
export class Cursor {
	readonly source: string;
	#pos = 0;

	constructor(source: string) {
		this.source = source;
	}

	/** Offset of the current character within the source. */
	get pos(): number {
		return this.#pos;
	}

	/** The current character, or {@link EOS} past the end of the source. */
	get ch(): string {
		return this.source.charAt(this.#pos);
	}

	/** Advances by one character. Does nothing at the end of the source. */
	next(): void {
		if (this.#pos < this.source.length) this.#pos++;
	}

	/**
	 * Returns the character `offset` positions ahead of the current one without consuming anything.
	 * `peek(0)` is the current character.
	 */
	peek(offset: number): string {
		return this.source.charAt(this.#pos + offset);
	}

	/** Restores a position previously read from {@link pos}. */
	setPos(pos: number): void {
		this.#pos = Math.max(0, Math.min(pos, this.source.length));
	}

	/** Moves to the line terminator of the current line (or the end of the source). */
	skipToEOL(): void {
		while (this.#pos < this.source.length && !isEOL(this.ch)) {
			this.#pos++;
		}
	}

	/**
	 * Consumes exactly one line terminator at the current position.
	 * A CRLF sequence counts as one terminator; anywhere else this is a no-op.
	 */
	eatEOL(): void {
		const ch = this.ch;
		if (ch === "\r") {
			this.#pos++;
			// Swallow the LF of a CRLF pair so that it is not seen as a second (empty) line.
			if (this.ch === "\n") this.#pos++;
		} else if (ch === "\n") {
			this.#pos++;
		}
	}

	/** Counts and consumes the run of `character` starting at the current position. */
	countRun(character: string): number {
		let count = 0;
		while (this.#pos < this.source.length && this.ch === character) {
			count++;
			this.#pos++;
		}
		return count;
	}

	/** Returns the source text between `start` and the current position. */
	sliceFrom(start: number): string {
		return this.source.slice(start, this.#pos);
	}
}

export function isEOL(character: string): boolean {
	return character === "\n" || character === "\r";
}

export function isBlank(character: string): boolean {
	return character === " " || character === "\t";
}
