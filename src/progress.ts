import { shortenStr } from './utils/utils';

const WIDTH = 70;

/**
 * One line on stderr, rewritten in place: the latest jdupes status while it scans, then the count
 * of processed duplicate sets.
 */
export class ProgressDisplay {
    private dirty = false;

    constructor(private write: (chunk: string) => void = (chunk) => { process.stderr.write(chunk); }) {}

    status(line: string): void {
        this.show(shortenStr(line.trim(), WIDTH));
    }

    groups(processed: number, duplicates: number): void {
        this.show(`Processing duplicates: ${processed} sets, ${duplicates} files`);
    }

    finish(): void {
        if (this.dirty) {
            this.write('\n');
            this.dirty = false;
        }
    }

    private show(text: string): void {
        this.write(`\r${text.padEnd(WIDTH + 3)}`);
        this.dirty = true;
    }
}
