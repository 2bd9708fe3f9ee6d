#!/usr/bin/env node
import { hideBin } from "yargs/helpers";

import { runIndexTags } from "./run";

runIndexTags(hideBin(process.argv))
    .then(exitCode => {
        process.exitCode = exitCode;
    }, error => {
        console.error("Error during indexing:", error);
        process.exitCode = 1;
    });
