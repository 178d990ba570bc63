#!/usr/bin/env node
import { main } from "./cli.js";
import { MacroError } from "./errors.js";

main(process.argv.slice(2)).then(
    code => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error instanceof MacroError ? `keymacro: ${error.message}` : error);
        process.exitCode = 1;
    },
);
