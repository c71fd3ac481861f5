#!/usr/bin/env node
/**
 * ontograph - CLI entry point
 */

import { runCli } from './cli/run.js';

runCli(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch(e => {
        console.error('Error:', e instanceof Error ? e.message : e);
        process.exitCode = 1;
    });
