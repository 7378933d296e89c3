/**
 * Additional key/value information attached to a node, written as `{key=value .class -}` in a note.
 *
 * Two keys have a special meaning:
 *   - `"-"` is the *default* marker (written as a lone `-`), used e.g. to turn italic into emphasis.
 *   - `""` holds a bare value written right after a block delimiter, e.g. the language of a verbatim block.
 */
export type Attributes = Record<string, string>;

export const DEFAULT_ATTRIBUTE_KEY = "-";

const CLASS_ATTRIBUTE_KEY = "class";

export function hasDefaultAttribute(attributes: Attributes | undefined): boolean {
	return attributes !== undefined && Object.hasOwn(attributes, DEFAULT_ATTRIBUTE_KEY);
}

export function removeDefaultAttribute(attributes: Attributes | undefined): void {
	if (attributes === undefined) return;
	delete attributes[DEFAULT_ATTRIBUTE_KEY];
}

export function getAttribute(
	attributes: Attributes | undefined,
	key: string,
): string | undefined {
	if (attributes === undefined || !Object.hasOwn(attributes, key)) return undefined;
	return attributes[key];
}

export function cloneAttributes(
	attributes: Attributes | undefined,
): Attributes | undefined {
	if (attributes === undefined) return undefined;
	return { ...attributes };
}

/**
 * Sets `key` to `value`, creating the attribute record if there is none yet.
 * @returns The (possibly new) attribute record.
 */
export function setAttribute(
	attributes: Attributes | undefined,
	key: string,
	value: string,
): Attributes {
	if (attributes === undefined) return { [key]: value };
	attributes[key] = value;
	return attributes;
}

export function getClasses(attributes: Attributes | undefined): string[] {
	const classes = getAttribute(attributes, CLASS_ATTRIBUTE_KEY);
	if (classes === undefined) return [];
	return classes.split(/\s+/).filter((name) => name.length > 0);
}

/**
 * Adds `name` to the space-separated class list unless it is already present.
 * @returns The (possibly new) attribute record.
 */
export function addClass(
	attributes: Attributes | undefined,
	name: string,
): Attributes {
	const classes = getClasses(attributes);
	if (attributes !== undefined && classes.includes(name)) return attributes;
	classes.push(name);
	return setAttribute(attributes, CLASS_ATTRIBUTE_KEY, classes.join(" "));
}
