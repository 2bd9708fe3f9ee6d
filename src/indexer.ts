import { Trace } from "jinaga";

import { readHeaderRow } from "./csv/header-reader";
import { writeManifest } from "./manifest/manifest";
import { extractTags, TagListOptions } from "./tags/tag-list";

export type IndexTagsOptions = TagListOptions;

export type TagIndexResult = {
    inputPath: string,
    outputPath: string,
    header: string[],
    tags: string[]
};

/**
 * Write the language tags found in the header of a CSV string table
 * to a manifest, one tag per line.
 *
 * The input is read in full before the output is opened, so a failed
 * read leaves any existing manifest untouched.
 */
export async function indexTags(inputPath: string, outputPath: string, options: IndexTagsOptions = {}): Promise<TagIndexResult> {
    const header = await readHeaderRow(inputPath);
    const tags = extractTags(header, options);
    if (tags.length === 0) {
        Trace.warn(`No language tags found in the header of ${inputPath}`);
    }

    await writeManifest(outputPath, tags);
    Trace.info(`Indexed ${tags.length} language tags from ${inputPath} into ${outputPath}`);

    return { inputPath, outputPath, header, tags };
}
