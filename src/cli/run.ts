import { Trace } from "jinaga";

import { indexTags } from "../indexer";
import { parseArguments, UsageError } from "./arguments";

/**
 * Run the command line and resolve to the process exit code.
 * Failures are reported on stderr; nothing is retried.
 */
export async function runIndexTags(args: string[]): Promise<number> {
    Trace.on();
    try {
        const { inputFile, outputFile } = await parseArguments(args);
        await indexTags(inputFile, outputFile);
        return 0;
    }
    catch (error) {
        console.error(`index-tags: ${describeError(error)}`);
        if (error instanceof UsageError) {
            console.error("Run index-tags --help for usage.");
        }
        return 1;
    }
}

function describeError(error: unknown) {
    if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
        return error.message;
    }
    return String(error);
}
