#!/usr/bin/env node
/**
 * trickle-json CLI
 * Parse a string-only JSON object from a file or stdin and print its snapshots
 */

import { Command } from 'commander';
import { InvalidOptionsError, StreamSyntaxError } from '../errors.js';
import { openSource, printSnapshots } from './run.js';

interface CommandOptions {
    strict?: boolean;
    every?: boolean;
    chunkSize?: string;
}

const program = new Command();

program
    .name('trickle-json')
    .description('Parse a string-only JSON object incrementally and print what has been parsed')
    .version('0.1.0')
    .argument('[file]', 'input file; stdin when omitted or "-"')
    .option('-s, --strict', 'reject characters the grammar does not allow')
    .option('-c, --chunk-size <n>', 'feed the input in fragments of n characters')
    .option('-e, --every', 'print a snapshot after every fragment')
    .action(async (file: string | undefined, options: CommandOptions) => {
        await printSnapshots(openSource(file), options, line => console.log(line));
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    if (error instanceof StreamSyntaxError || error instanceof InvalidOptionsError) {
        console.error(`error: ${error.message}`);
    } else {
        console.error(error);
    }
    process.exitCode = 1;
});
