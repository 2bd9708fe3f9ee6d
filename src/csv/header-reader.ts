import { parse } from "csv-parse";
import { readFile } from "fs/promises";

/**
 * Parse the first record of a CSV document.
 * Quoting follows RFC 4180. A leading byte-order mark is dropped.
 * An empty document has an empty header row.
 */
export function parseHeaderRow(text: string): Promise<string[]> {
    return new Promise<string[]>((resolve, reject) => {
        parse(text, {
            bom: true,
            to: 1,
            // Rows after the header are never inspected
            relax_column_count: true
        }, (error: Error | undefined, records: unknown) => {
            if (error) {
                reject(error);
                return;
            }
            try {
                resolve(firstRecord(records));
            }
            catch (e) {
                reject(e);
            }
        });
    });
}

export async function readHeaderRow(path: string): Promise<string[]> {
    const text = await readFile(path, { encoding: "utf-8" });
    return parseHeaderRow(text);
}

function firstRecord(records: unknown): string[] {
    if (!Array.isArray(records) || records.length === 0) {
        return [];
    }
    const record: unknown = records[0];
    if (!isRecord(record)) {
        throw new Error("Expected the header row to be a list of strings.");
    }
    return record;
}

function isRecord(value: unknown): value is string[] {
    return Array.isArray(value) && value.every(field => typeof field === "string");
}
