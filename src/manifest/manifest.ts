import { readFile, writeFile } from "fs/promises";

export function formatManifest(tags: readonly string[]): string {
    return tags.join("\n");
}

/**
 * Split manifest text back into tags.
 * Accepts CRLF line endings.
 * Text is read as CRLF only when every line break is CRLF, so a tag ending
 * in a carriage return survives unless all tags but the last do.
 */
export function parseManifest(text: string): string[] {
    if (text === "") {
        return [];
    }
    const lines = text.split("\n");
    const crlf = lines.length > 1 && lines.slice(0, -1).every(line => line.endsWith("\r"));
    return crlf
        ? lines.map((line, index) => index < lines.length - 1 ? line.slice(0, -1) : line)
        : lines;
}

export async function writeManifest(path: string, tags: readonly string[]): Promise<void> {
    await writeFile(path, formatManifest(tags), { encoding: "utf-8" });
}

export async function readManifest(path: string): Promise<string[]> {
    const text = await readFile(path, { encoding: "utf-8" });
    return parseManifest(text);
}
