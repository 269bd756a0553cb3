#!/usr/bin/env node
import { main } from './cli';

main(process.argv).then(code => {
    // Let the log transport drain before the process ends
    process.exitCode = code;
});
