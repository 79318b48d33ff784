import nodeCleanup from 'node-cleanup';
import * as readlineSync from 'readline-sync';

import { RunConfig } from './config';
import { buildInvocation, conflictingArgs, formatInvocation, runJdupes } from './jdupes';
import { FileLogger, ScreenLogger } from './logger';
import { parseGroups } from './parser';
import { ProgressDisplay } from './progress';
import { DryRunReporter } from './reporter';
import { FilesystemActions, SidecarActions, SidecarManager } from './sidecar';
import { orderByDirectory, shortenStr } from './utils/utils';

export type Confirm = (question: string) => boolean;

// stdout of the duplicate finder, line by line; stderr goes to onStderr
export type LineSource = (config: RunConfig, onStderr: (line: string) => void) => AsyncIterable<string>;

export const askYesNo: Confirm = (question) => readlineSync.keyInYN(question) === true;

export const jdupesSource: LineSource = (config, onStderr) => runJdupes(buildInvocation(config), { onStderr });

export interface RunSummary {
    groups: number;
    duplicates: number;
    failures: number;
}

export type RunOutcome =
    | { status: 'cancelled' }
    | { status: 'completed'; summary: RunSummary };

export interface DeduplicatorOptions {
    logger?: ScreenLogger;
    confirm?: Confirm;
    source?: LineSource;
    progress?: ProgressDisplay;
}

export function formatSummary({ groups, duplicates, failures }: RunSummary): string {
    return `Processed ${groups} duplicate groups, ${duplicates} duplicates (${failures} failures).`;
}

export class Deduplicator {
    private logger: ScreenLogger;
    private confirm: Confirm;
    private source: LineSource;
    private progress: ProgressDisplay | undefined;
    private report: FileLogger | undefined;
    private summary: RunSummary = { groups: 0, duplicates: 0, failures: 0 };

    constructor(private config: RunConfig, options: DeduplicatorOptions = {}) {
        this.logger = options.logger ?? new ScreenLogger(config.verbosity);
        this.confirm = options.confirm ?? askYesNo;
        this.source = options.source ?? jdupesSource;
        this.progress = options.progress ?? (config.progress ? new ProgressDisplay() : undefined);
    }

    getSummary(): RunSummary {
        return { ...this.summary };
    }

    public async process(): Promise<RunOutcome> {
        const { config, logger } = this;

        if (config.dryRun) {
            logger.info('Starting in dry run mode.');
            logger.log('Dry run mode: No files will be deleted or modified.');
        } else {
            logger.info('Starting in normal mode.');
            logger.log('Normal mode: Files may be deleted and sidecar files created.');

            if (!this.confirm('Do you want to proceed?')) {
                logger.log('Operation cancelled by user.');
                return { status: 'cancelled' };
            }
        }

        const conflicts = conflictingArgs(config.extraArgs);
        if (conflicts.length > 0) {
            logger.warn(`Conflicting options in --jdupes-extra-cmds (${conflicts.join(' ')}) may override the sidecar exclusion.`);
        }
        logger.debug(`Running command: ${formatInvocation(buildInvocation(config))}`);

        let actions: SidecarActions;
        if (config.dryRun) {
            this.report = new FileLogger(config.output, 'w');
            this.report.open();
            actions = new DryRunReporter(this.report);
        } else {
            actions = new FilesystemActions(logger);
        }
        const manager = new SidecarManager(config, actions, logger);

        const onStatus = (line: string): void => {
            if (this.progress) {
                this.progress.status(line);
            } else {
                logger.debug(`jdupes: ${line}`);
            }
        };

        try {
            const groups = parseGroups(this.source(config, onStatus), onStatus);

            for await (const group of groups) {
                const ordered = orderByDirectory(group, config.directories);
                logger.debug(`Duplicate set of ${ordered.length} files, keeping ${shortenStr(ordered[0], 60)}`);

                const result = manager.process(ordered);
                this.summary.groups++;
                this.summary.duplicates += result.duplicates;
                this.summary.failures += result.failures;

                this.progress?.groups(this.summary.groups, this.summary.duplicates);
            }
        } finally {
            this.progress?.finish();
            this.closeReport();
        }

        if (this.summary.groups === 0) {
            logger.info('No duplicates found.');
        }
        logger.log(formatSummary(this.summary));
        if (config.dryRun) {
            logger.info(`Dry run completed. Report written to ${config.output}`);
        }

        return { status: 'completed', summary: this.getSummary() };
    }

    /**
     * Stop after an interrupt. Nothing is rolled back: finished sets stay finished and the report
     * keeps what was written so far.
     */
    public abort(): void {
        this.progress?.finish();
        this.closeReport();
    }

    private closeReport(): void {
        this.report?.close();
        this.report = undefined;
    }
}

/**
 * cleanup is called even when app exits correctly just with exit code of 0, so only a signal
 * needs handling: close what's open, tell how far the run got and re-raise the signal.
 */
export function installInterruptHandler(runner: Deduplicator, logger: ScreenLogger): void {
    nodeCleanup((_exitCode, signal) => {
        if (signal === null) {
            return true;
        }

        runner.abort();
        logger.error('Aborting...');
        logger.log(formatSummary(runner.getSummary()));

        nodeCleanup.uninstall();
        process.kill(process.pid, signal);
        return false;
    });
}
