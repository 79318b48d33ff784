import fs from 'fs';
import { EOL as endOfLine } from 'os';
import chalk from 'chalk';

export interface Logger {
    open(): void;
    close(): void;
    log(message: string): void;
}

export enum LogLevel {
    Warn = 0,
    Info = 1,
    Debug = 2,
}

/**
 * Line oriented file output. Writes go straight to the file descriptor so that whatever
 * was logged before an interrupt is already on disk.
 */
export class FileLogger implements Logger {
    private fd: number | undefined;

    constructor(private path: string, private flags: 'a' | 'w' = 'a') {
    }

    log(message: string): void {
        console.assert(this.fd !== undefined, 'FileLogger must be opened before logging');
        if (this.fd !== undefined) {
            fs.writeSync(this.fd, message + endOfLine, null, 'utf8');
        }
    }

    close(): void {
        if (this.fd !== undefined) {
            fs.closeSync(this.fd);
            this.fd = undefined;
        }
    }

    open(): void {
        this.fd = fs.openSync(this.path, this.flags);
    }
}

export type Sink = (message: string) => void;

/**
 * Console logger filtered by verbosity: warnings and errors always show,
 * info from -v, debug from -vv. `log` is unconditional.
 */
export class ScreenLogger implements Logger {
    constructor(
        private verbosity: number = LogLevel.Warn,
        private out: Sink = (message) => console.log(message),
        private err: Sink = (message) => console.error(message),
    ) {}

    log(message: string): void {
        this.out(message);
    }

    error(message: string): void {
        this.err(chalk.red(message));
    }

    warn(message: string): void {
        this.err(chalk.yellow(message));
    }

    info(message: string): void {
        if (this.verbosity >= LogLevel.Info) {
            this.out(message);
        }
    }

    debug(message: string): void {
        if (this.verbosity >= LogLevel.Debug) {
            this.out(chalk.gray(message));
        }
    }

    close(): void {}
    open(): void {}
}
