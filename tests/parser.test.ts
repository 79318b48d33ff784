import path from 'path';

import { DuplicateGroup, isStatusLine, parseGroups } from '../src/parser';
import { linesOf, tempDir, writeFile } from './helpers';

async function collect(text: string, onStatus?: (line: string) => void): Promise<DuplicateGroup[]> {
    const groups: DuplicateGroup[] = [];
    for await (const group of parseGroups(linesOf(text), onStatus)) {
        groups.push(group);
    }
    return groups;
}

async function* failing(lines: string[]): AsyncGenerator<string> {
    yield* lines;
    throw new Error('jdupes exited with status 1');
}

test('Two sets separated by blank lines', async () => {
    const groups = await collect('a/1.txt\nb/1.txt\n\n\n\nc/2.txt\nd/2.txt\ne/2.txt\n\n');

    expect(groups).toEqual([
        ['a/1.txt', 'b/1.txt'],
        ['c/2.txt', 'd/2.txt', 'e/2.txt'],
    ]);
});

test('Status lines are forwarded and never become paths', async () => {
    const status: string[] = [];
    const groups = await collect(
        'Scanning: 12 files, 3 items (in 2 specified)\na/1.txt\nProgress [3/12] 25%\nb/1.txt\n\nc/2.txt\nd/2.txt\n\n',
        (line) => status.push(line),
    );

    expect(groups).toEqual([['a/1.txt', 'b/1.txt'], ['c/2.txt', 'd/2.txt']]);
    expect(status).toEqual(['Scanning: 12 files, 3 items (in 2 specified)', 'Progress [3/12] 25%']);
});

test('Last set without a trailing blank line is kept', async () => {
    expect(await collect('a/1.txt\nb/1.txt')).toEqual([['a/1.txt', 'b/1.txt']]);
});

test('Sets without duplicates are dropped', async () => {
    expect(await collect('\n\nlonely.txt\n\na/1.txt\nb/1.txt\n\nc/2.txt')).toEqual([['a/1.txt', 'b/1.txt']]);
});

test('Empty output yields nothing', async () => {
    expect(await collect('')).toEqual([]);
    expect(await collect('No duplicates found.\n')).toEqual([]);
});

test('Carriage returns are stripped from paths', async () => {
    expect(await collect('a/1.txt\r\nb/1.txt\r\n\r\n')).toEqual([['a/1.txt', 'b/1.txt']]);
});

test('A failing source drops the unfinished set and rethrows', async () => {
    const groups: DuplicateGroup[] = [];
    const parse = async () => {
        for await (const group of parseGroups(failing(['a/1.txt', 'b/1.txt', '', 'c/2.txt', 'd/2.txt']))) {
            groups.push(group);
        }
    };

    await expect(parse()).rejects.toThrow('jdupes exited with status 1');
    expect(groups).toEqual([['a/1.txt', 'b/1.txt']]);
});

test('Status line detection', () => {
    expect(isStatusLine('Progress [10/200] 5%')).toBe(true);
    expect(isStatusLine('Scanning: 4 files, 1 items (in 1 specified)')).toBe(true);
    expect(isStatusLine('/home/user/Progress report.txt')).toBe(false);
    expect(isStatusLine('photos/2021/img_001.jpg')).toBe(false);
});

test('Directories named like status messages stay paths', async () => {
    const groups = await collect('Progress/x.txt\nLoading/x.txt\nExamining/x.txt\nB/x.txt\n\n');

    expect(groups).toEqual([['Progress/x.txt', 'Loading/x.txt', 'Examining/x.txt', 'B/x.txt']]);
});

test('A line that exists on disk is a path even when it reads like status', async () => {
    const cwd = process.cwd();
    process.chdir(tempDir());
    try {
        writeFile(path.join('Scanning: 2 files', 'x.txt'));
        writeFile(path.join('B', 'x.txt'));
        const status: string[] = [];

        const groups = await collect('Scanning: 2 files/x.txt\nB/x.txt\n\n', (line) => status.push(line));

        expect(groups).toEqual([['Scanning: 2 files/x.txt', 'B/x.txt']]);
        expect(status).toEqual([]);
        expect(isStatusLine('Scanning: 2 files/x.txt')).toBe(false);
        expect(isStatusLine('Scanning: 2 files, 1 items (in 1 specified)')).toBe(true);
    } finally {
        process.chdir(cwd);
    }
});
