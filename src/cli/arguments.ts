import yargs from "yargs";

export type IndexTagsArguments = {
    inputFile: string,
    outputFile: string
};

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = "UsageError";
    }
}

export async function parseArguments(args: string[]): Promise<IndexTagsArguments> {
    const argv = await yargs(args)
        .scriptName("index-tags")
        .usage("$0 <input_file> <output_file>\n\nGenerate a list of language tags in the header of a CSV file.")
        .parserConfiguration({ "parse-positional-numbers": false })
        .demandCommand(2, 2)
        .strict()
        .fail((message, error) => {
            throw error instanceof Error ? error : new UsageError(message);
        })
        .help()
        .alias("help", "h")
        .parseAsync();

    const [inputFile, outputFile] = argv._.map(String);
    return { inputFile, outputFile };
}
