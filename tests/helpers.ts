import fs from 'fs';
import os from 'os';
import path from 'path';

import { RunConfig } from '../src/config';
import { ScreenLogger } from '../src/logger';

export function tempDir(): string {
    return fs.mkdtempSync(path.join(os.tmpdir(), 'jdupes-sidecar-'));
}

export function writeFile(file: string, content: string = 'same content\n'): string {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, content);
    return file;
}

export function readLines(file: string): string[] {
    return fs.readFileSync(file, 'utf8').split(os.EOL).filter((line) => line !== '');
}

export function listTree(dir: string): string[] {
    return fs.readdirSync(dir, { recursive: true, encoding: 'utf8' })
        .filter((entry) => fs.statSync(path.join(dir, entry)).isFile())
        .sort();
}

export function testConfig(overrides: Partial<RunConfig> = {}): RunConfig {
    return {
        directories: [],
        dryRun: false,
        output: 'dry_run_output.txt',
        verbosity: 0,
        progress: false,
        jdupesPath: '/usr/bin/jdupes',
        extraArgs: [],
        sidecarExtension: '.dupes',
        excludeSidecars: true,
        mergeExistingSidecars: true,
        deleteDuplicateSidecars: true,
        ...overrides,
    };
}

export function quietLogger(): { logger: ScreenLogger; out: jest.Mock; err: jest.Mock } {
    const out = jest.fn();
    const err = jest.fn();
    return { logger: new ScreenLogger(2, out, err), out, err };
}

// canned jdupes output, line by line like the live stream
export async function* linesOf(text: string): AsyncGenerator<string> {
    for (const line of text.split(/\r?\n/)) {
        yield line;
    }
}
