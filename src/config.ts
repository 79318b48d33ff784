import fs from 'fs';
import path from 'path';
import minimist from 'minimist';
import { parseArgsStringToArgv } from 'string-argv';

import { ConfigError } from './errors';

export const DEFAULT_REPORT_FILE = 'dry_run_output.txt';
export const DEFAULT_SIDECAR_EXTENSION = '.dupes';
export const DEFAULT_JDUPES = 'jdupes';

export interface RunConfig {
    readonly directories: readonly string[];
    readonly dryRun: boolean;
    readonly output: string;
    readonly verbosity: number;
    readonly progress: boolean;
    readonly jdupesPath: string;
    readonly hashDb?: string;
    readonly extraArgs: readonly string[];
    readonly sidecarExtension: string;
    readonly excludeSidecars: boolean;
    readonly mergeExistingSidecars: boolean;
    readonly deleteDuplicateSidecars: boolean;
}

export type CliRequest =
    | { kind: 'help' }
    | { kind: 'run'; config: RunConfig };

export const USAGE = `
usage: jdupes-sidecar [options] <directory> [<directory> ...]

Directories are listed in priority order: of every set of duplicates the copy in the
first listed directory is kept, the others are deleted and recorded in a sidecar file
next to the kept copy.

option                            meaning
-n, --dry-run                  -  don't touch anything, write the planned actions to a report
-o, --output <path>            -  dry run report file (default: ${DEFAULT_REPORT_FILE})
-v, --verbose                  -  more output, repeat for debug details
--progress                     -  show jdupes progress and processed duplicate sets
--jdupes-path <path>           -  jdupes binary (default: $JDUPES_PATH or jdupes on PATH)
--jdupes-hashdb <path>         -  hash database file passed to jdupes
--jdupes-extra-cmds <args>     -  extra arguments for jdupes, quoted as in a shell
--sidecar-extension <ext>      -  sidecar file extension (default: ${DEFAULT_SIDECAR_EXTENSION})
--no-exclude-sidecar           -  let jdupes look at sidecar files too
--no-merge-existing-sidecars   -  don't merge sidecar files of deleted duplicates
--no-delete-duplicate-sidecar  -  keep sidecar files of deleted duplicates after merging
-h, --help                     -  this list
`;

const STRING_OPTIONS = ['output', 'jdupes-path', 'jdupes-hashdb', 'jdupes-extra-cmds', 'sidecar-extension'];
const BOOLEAN_OPTIONS = [
    'dry-run', 'verbose', 'progress', 'help',
    'exclude-sidecar', 'merge-existing-sidecars', 'delete-duplicate-sidecar',
];
const ALIASES: Record<string, string> = { n: 'dry-run', o: 'output', v: 'verbose', h: 'help' };
const KNOWN_OPTIONS = new Set([...STRING_OPTIONS, ...BOOLEAN_OPTIONS, ...Object.keys(ALIASES)]);
// short options whose value may be glued on, as in -oreport.txt
const SHORT_STRING_OPTIONS = new Set(Object.keys(ALIASES).filter((short) => STRING_OPTIONS.includes(ALIASES[short])));

function optionName(arg: string): string | undefined {
    if (arg.startsWith('--')) {
        const name = arg.slice(2).split('=')[0];
        return name.startsWith('no-') && BOOLEAN_OPTIONS.includes(name.slice(3)) ? name.slice(3) : name;
    }

    if (arg.startsWith('-') && arg.length > 1) {
        return arg.slice(1);
    }

    return undefined;
}

/**
 * minimist reads `-oreport.txt` as the flags o, r, e, p... so a value glued to a short string
 * option is split off first: `-oreport.txt` becomes `-o report.txt`, `-o=report.txt` too.
 */
export function splitGluedValues(argv: readonly string[]): string[] {
    const result: string[] = [];

    for (let n = 0; n < argv.length; n++) {
        const arg = argv[n];
        if (arg === '--') {
            result.push(...argv.slice(n));
            break;
        }

        const at = /^-[a-z]/i.test(arg) ? arg.split('').findIndex((c, i) => i > 0 && SHORT_STRING_OPTIONS.has(c)) : -1;
        if (at > 0 && at < arg.length - 1) {
            result.push(arg.slice(0, at + 1), arg.slice(at + 1).replace(/^=/, ''));
        } else {
            result.push(arg);
        }
    }

    return result;
}

/**
 * minimist keeps only the last value of a boolean flag, so -v occurrences are counted on the raw
 * arguments: `-v -v`, `-vv` and `--verbose --verbose` are all verbosity 2. A cluster ends at a
 * short string option, the rest of it is that option's value.
 */
export function countVerbosity(argv: readonly string[]): number {
    let count = 0;
    let valueNext = false;

    for (const arg of splitGluedValues(argv)) {
        // minimist only takes the next argument as value when it isn't an option itself
        if (valueNext) {
            valueNext = false;
            if (!arg.startsWith('-')) {
                continue;
            }
        }

        if (arg === '--') {
            break;
        }

        if (arg === '--verbose') {
            count++;
        } else if (/^-[a-z]/i.test(arg)) {
            for (let i = 1; i < arg.length; i++) {
                if (SHORT_STRING_OPTIONS.has(arg[i])) {
                    valueNext = i === arg.length - 1;
                    break;
                }
                if (arg[i] === 'v') {
                    count++;
                }
            }
        }
    }

    return count;
}

function stringOption(args: minimist.ParsedArgs, name: string): string | undefined {
    const value: unknown = args[name];

    if (value === undefined) {
        return undefined;
    }

    // a repeated option ends up as an array, the last one wins
    const last: unknown = Array.isArray(value) ? value[value.length - 1] : value;
    if (typeof last !== 'string' || last.trim() === '') {
        throw new ConfigError(`Option --${name} needs a value`);
    }

    return last;
}

function isExecutable(file: string): boolean {
    try {
        fs.accessSync(file, fs.constants.X_OK);
        return fs.statSync(file).isFile();
    } catch {
        return false;
    }
}

/**
 * A name with a path separator is checked as is, a bare name is looked up on PATH.
 */
export function resolveExecutable(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
    if (name.includes('/') || name.includes(path.sep)) {
        return isExecutable(name) ? path.resolve(name) : undefined;
    }

    const dirs = (env.PATH ?? '').split(path.delimiter).filter((dir) => dir !== '');
    for (const dir of dirs) {
        const candidate = path.join(dir, name);
        if (isExecutable(candidate)) {
            return candidate;
        }
    }

    return undefined;
}

function checkDirectories(directories: string[]): void {
    const missing = directories.filter((dir) => {
        try {
            return !fs.statSync(dir).isDirectory();
        } catch {
            return true;
        }
    });

    if (missing.length > 0) {
        throw new ConfigError(`Not a directory: ${missing.join(', ')}`);
    }
}

function splitExtraArgs(extra: string | undefined): string[] {
    if (extra === undefined) {
        return [];
    }

    return parseArgsStringToArgv(extra);
}

/**
 * Turn the command line into a validated, frozen run configuration. Fails with a ConfigError on
 * unknown options, missing directories or a jdupes binary that can't be found.
 */
export function parseCommandLine(argv: string[], env: NodeJS.ProcessEnv = process.env): CliRequest {
    const unknown: string[] = [];

    const args = minimist(splitGluedValues(argv), {
        string: STRING_OPTIONS,
        boolean: BOOLEAN_OPTIONS,
        alias: ALIASES,
        default: {
            'exclude-sidecar': true,
            'merge-existing-sidecars': true,
            'delete-duplicate-sidecar': true,
        },
        unknown: (arg) => {
            const name = optionName(arg);
            if (name === undefined) {
                return true;
            }

            const letters = arg.startsWith('--') ? [name] : name.split('');
            if (letters.every((letter) => KNOWN_OPTIONS.has(letter))) {
                return true;
            }

            unknown.push(arg);
            return false;
        },
    });

    if (unknown.length > 0) {
        throw new ConfigError(`Unknown option: ${unknown.join(', ')}`);
    }

    if (args.help) {
        return { kind: 'help' };
    }

    const directories = args._.map(String);
    if (directories.length === 0) {
        throw new ConfigError('At least one directory is required');
    }
    checkDirectories(directories);

    const requested = stringOption(args, 'jdupes-path') ?? env.JDUPES_PATH ?? DEFAULT_JDUPES;
    const jdupesPath = resolveExecutable(requested, env);
    if (jdupesPath === undefined) {
        throw new ConfigError(`jdupes binary not found: ${requested}`);
    }

    let sidecarExtension = stringOption(args, 'sidecar-extension') ?? DEFAULT_SIDECAR_EXTENSION;
    if (!sidecarExtension.startsWith('.')) {
        sidecarExtension = '.' + sidecarExtension;
    }

    const config: RunConfig = {
        directories,
        dryRun: Boolean(args['dry-run']),
        output: stringOption(args, 'output') ?? DEFAULT_REPORT_FILE,
        verbosity: countVerbosity(argv),
        progress: Boolean(args.progress),
        jdupesPath,
        hashDb: stringOption(args, 'jdupes-hashdb'),
        extraArgs: splitExtraArgs(stringOption(args, 'jdupes-extra-cmds')),
        sidecarExtension,
        excludeSidecars: args['exclude-sidecar'] !== false,
        mergeExistingSidecars: args['merge-existing-sidecars'] !== false,
        deleteDuplicateSidecars: args['delete-duplicate-sidecar'] !== false,
    };

    return { kind: 'run', config: Object.freeze({ ...config, directories: Object.freeze([...directories]) }) };
}
