/**
 * The target of a link or an image.
 *
 * - `invalid`: the reference is empty or cannot be interpreted.
 * - `note`: the reference is the identifier of another note (14 digits, e.g. `20201231235959`).
 * - `material`: the reference points to external material (a URL or a path).
 */
export interface Reference {
	value: string;
	state: "invalid" | "note" | "material";
}

const NOTE_ID_REGEX = /^\d{14}$/;

// Characters that can never be part of a URL or path, even a relative one.
const INVALID_REFERENCE_REGEX = /[\s<>"{}|\\^`]/;

export function parseReference(value: string): Reference {
	if (value.length === 0) return { value, state: "invalid" };
	if (NOTE_ID_REGEX.test(value)) return { value, state: "note" };
	if (INVALID_REFERENCE_REGEX.test(value)) return { value, state: "invalid" };
	return { value, state: "material" };
}

export function isNoteReference(reference: Reference): boolean {
	return reference.state === "note";
}

export function isValidReference(reference: Reference): boolean {
	return reference.state !== "invalid";
}
