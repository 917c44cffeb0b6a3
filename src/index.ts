#!/usr/bin/env node
import { CommanderError } from 'commander';
import { createProgram } from './cli';

async function main() {
    await createProgram().parseAsync(process.argv);
};

main().catch(err => {
    // Commander has already written help, the version or its usage error by now
    if(err instanceof CommanderError) {
        process.exit(err.exitCode);
    }

    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);

    if(process.env.DEBUG && err instanceof Error) {
        console.error(err.stack);
    }

    process.exit(1);
});
