import fs from 'fs';

export type DuplicateGroup = readonly string[];

export type StatusHandler = (line: string) => void;

// lines jdupes prints around the duplicate sets that are not file names
const STATUS_PATTERNS: RegExp[] = [
    /^Progress \[\d+\/\d+\]/,
    /^Scanning: \d+ files/,
    /^Examining \d+ files/,
    /^Loading hash ?database/i,
    /^Hash ?database: /i,
    /^No duplicates found\.?$/,
    /^\s*\[\d+\/\d+\]/,
];

/**
 * A line that exists on disk is a path, whatever it looks like: jdupes prints paths as the
 * directories were given, so a relative directory can be named like a status message.
 */
export function isStatusLine(line: string): boolean {
    return STATUS_PATTERNS.some((pattern) => pattern.test(line)) && !fs.existsSync(line);
}

/**
 * Group jdupes output into duplicate sets. A set is a run of path lines ended by one or more blank
 * lines, the first path being the one to keep. Status lines go to `onStatus` and never into a set.
 * Sets with less than two paths hold no duplicates and are dropped; so is the last unfinished
 * set when the source fails.
 */
export async function* parseGroups(
    lines: AsyncIterable<string>,
    onStatus: StatusHandler = () => undefined,
    statusLine: (line: string) => boolean = isStatusLine,
): AsyncGenerator<DuplicateGroup> {
    let current: string[] = [];

    for await (const raw of lines) {
        const line = raw.endsWith('\r') ? raw.slice(0, -1) : raw;

        if (line.trim() === '') {
            if (current.length > 1) {
                yield current;
            }
            current = [];
            continue;
        }

        if (statusLine(line)) {
            onStatus(line);
            continue;
        }

        current.push(line);
    }

    if (current.length > 1) {
        yield current;
    }
}

