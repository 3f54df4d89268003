#!/usr/bin/env node
import * as dotenv from "dotenv"
import { Color } from "./console"
import { EXIT_FAILURE, runCli } from "./cli"
dotenv.config()

const controller = new AbortController();
// first Ctrl-C: finish the current entity and write what we have; second: leave now
process.once('SIGINT', () => {
    console.error(Color.yellow + 'Interrupted, writing what has been fetched so far' + '\x1b[0m');
    controller.abort();
    process.once('SIGINT', () => process.exit(EXIT_FAILURE));
});

runCli(process.argv.slice(2), { signal: controller.signal })
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error(Color.red + `Error: ${error instanceof Error ? error.message : String(error)}` + '\x1b[0m');
        process.exitCode = EXIT_FAILURE;
    });
