export { parseHeaderRow, readHeaderRow } from "./csv/header-reader";
export { IndexTagsOptions, indexTags, TagIndexResult } from "./indexer";
export { formatManifest, parseManifest, readManifest, writeManifest } from "./manifest/manifest";
export { extractTags, RESERVED_NAMES, TagListOptions } from "./tags/tag-list";
