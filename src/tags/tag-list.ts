/**
 * Columns of a string table that hold metadata rather than a language.
 */
export const RESERVED_NAMES: readonly string[] = Object.freeze(["key", "context"]);

export type TagListOptions = {
    /** Replaces the default reserved names. Matching is exact and case-sensitive. */
    reservedNames?: readonly string[]
};

/**
 * Collect the language tags named in a header row.
 * Empty fields and reserved names are dropped; order and duplicates are kept.
 */
export function extractTags(header: readonly string[], options: TagListOptions = {}): string[] {
    const reserved = new Set(options.reservedNames ?? RESERVED_NAMES);
    return header.filter(field => field !== "" && !reserved.has(field));
}
