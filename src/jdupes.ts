import { spawn } from 'child_process';
import readline from 'readline';

import { RunConfig } from './config';
import { ExternalToolError } from './errors';

// how many stderr lines are kept to explain a failed run
const DIAGNOSTIC_LINES = 20;

export interface Invocation {
    command: string;
    args: string[];
}

export interface RunOptions {
    onStderr?: (line: string) => void;
}

export function buildInvocation(config: RunConfig): Invocation {
    const args = ['--param-order', '--recurse'];

    if (config.hashDb) {
        args.push(`--hash-db=${config.hashDb}`);
    }

    if (config.excludeSidecars) {
        args.push(`--ext-filter=noext:${config.sidecarExtension.replace(/^\.+/, '')}`);
    }

    args.push(...config.extraArgs, ...config.directories);

    return { command: config.jdupesPath, args };
}

// extra arguments that override what buildInvocation sets
export function conflictingArgs(extraArgs: readonly string[]): string[] {
    return extraArgs.filter((arg) => arg === '--ext-filter' || arg.startsWith('--ext-filter=') || arg === '-X');
}

export function formatInvocation({ command, args }: Invocation): string {
    return [command, ...args].map((a) => (/\s/.test(a) ? JSON.stringify(a) : a)).join(' ');
}

/**
 * Run jdupes and yield its stdout line by line while it runs. stderr lines go to `onStderr` as
 * they arrive. Once stdout is drained a non-zero exit becomes an ExternalToolError carrying the
 * tail of stderr.
 */
export async function* runJdupes(invocation: Invocation, options: RunOptions = {}): AsyncGenerator<string> {
    const child = spawn(invocation.command, invocation.args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const diagnostics: string[] = [];

    const finished = new Promise<{ code: number | null; error?: Error }>((resolve) => {
        child.once('error', (error) => resolve({ code: null, error }));
        child.once('close', (code) => resolve({ code }));
    });

    readline.createInterface({ input: child.stderr, crlfDelay: Infinity }).on('line', (line: string) => {
        if (line.trim() === '') {
            return;
        }

        diagnostics.push(line);
        if (diagnostics.length > DIAGNOSTIC_LINES) {
            diagnostics.shift();
        }
        options.onStderr?.(line);
    });

    const lineReader = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });

    try {
        for await (const line of lineReader) {
            yield line;
        }

        const { code, error } = await finished;
        if (error) {
            throw new ExternalToolError(`Error running jdupes: ${error.message}`, code, diagnostics);
        }
        if (code !== 0) {
            throw new ExternalToolError(`jdupes exited with status ${code}`, code, diagnostics);
        }
    } finally {
        lineReader.close();
        if (child.exitCode === null && child.signalCode === null) {
            child.kill();
        }
    }
}
