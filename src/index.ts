#!/usr/bin/env node
import { main } from './cli';
import { ExitCode } from './enrolltypes/EnrollError';

main(process.argv.slice(2))
    .then((exitCode) => {
        process.exitCode = exitCode;
    })
    .catch((err) => {
        console.error(`certbatch failed: ${err}`);
        process.exitCode = ExitCode.Unexpected;
    });
