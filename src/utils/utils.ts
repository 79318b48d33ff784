import path from 'path';

// Emit shortened string with preceding "..."
export function shortenStr(str: string, maxSymbols: number = 40): string {
    if (str.length <= maxSymbols) {
        return str;
    }

    return '...' + str.slice(str.length - maxSymbols);
}

function isInside(file: string, directory: string): boolean {
    const prefix = directory.endsWith(path.sep) ? directory : directory + path.sep;
    return file.startsWith(prefix);
}

/**
 * Resolve every path and order them by the priority of the directory they live in, first listed
 * directory first. Paths under none of the directories keep their relative order at the end.
 * A path is claimed by the first directory that contains it, so nested directories don't duplicate it.
 */
export function orderByDirectory(files: readonly string[], directories: readonly string[]): string[] {
    const roots = directories.map((dir) => path.resolve(dir));
    const remaining = files.map((file) => path.resolve(file));
    const ordered: string[] = [];

    for (const root of roots) {
        for (let i = 0; i < remaining.length; ) {
            if (isInside(remaining[i], root)) {
                ordered.push(...remaining.splice(i, 1));
            } else {
                i++;
            }
        }
    }

    return ordered.concat(remaining);
}
