#!/usr/bin/env node
import chalk from 'chalk';

import { parseCommandLine, USAGE } from './config';
import { Deduplicator, installInterruptHandler } from './deduplicator';
import { EXIT_OK, exitCodeFor, failureMessages } from './errors';
import { ScreenLogger } from './logger';

async function main(argv: string[]): Promise<number> {
    const request = parseCommandLine(argv);

    if (request.kind === 'help') {
        console.log('jdupes-sidecar - remove duplicates found by jdupes, remember them in sidecar files');
        console.log(USAGE);
        return EXIT_OK;
    }

    const logger = new ScreenLogger(request.config.verbosity);
    const runner = new Deduplicator(request.config, { logger });
    installInterruptHandler(runner, logger);

    await runner.process();
    return EXIT_OK;
}

main(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (e: unknown) => {
        const [first, ...rest] = failureMessages(e);
        console.error(chalk.red(first));
        rest.forEach((line) => console.error(line));
        process.exitCode = exitCodeFor(e);
    },
);
