import fs from 'fs';
import { EOL as endOfLine } from 'os';

import { RunConfig } from './config';
import { describeError } from './errors';
import { ScreenLogger } from './logger';
import { DuplicateGroup } from './parser';

/**
 * Everything that happens to a duplicate set, one call per action. The filesystem implementation
 * carries them out, the dry run reporter only writes them down.
 */
export interface SidecarActions {
    keep(survivor: string, sidecar: string): void;
    merge(from: string, into: string): void;
    record(entry: string, sidecar: string): void;
    deleteFile(file: string): void;
    deleteSidecar(sidecar: string): void;
}

export interface GroupResult {
    duplicates: number;
    failures: number;
}

export function readSidecar(file: string): string[] {
    return fs.readFileSync(file, 'utf8').split(/\r?\n/).filter((line) => line.trim() !== '');
}

function appendLines(file: string, lines: string[]): void {
    if (lines.length > 0) {
        fs.appendFileSync(file, lines.map((line) => line + endOfLine).join(''), 'utf8');
    }
}

export class FilesystemActions implements SidecarActions {
    constructor(private logger: ScreenLogger) {}

    keep(survivor: string, sidecar: string): void {
        this.logger.debug(`Keeping ${survivor}, ${fs.existsSync(sidecar) ? 'appending to' : 'creating'} ${sidecar}`);
    }

    merge(from: string, into: string): void {
        const lines = readSidecar(from);
        appendLines(into, lines);
        this.logger.debug(`Merged ${lines.length} entries of sidecar file ${from} into ${into}`);
    }

    record(entry: string, sidecar: string): void {
        appendLines(sidecar, [entry]);
        this.logger.debug(`Recorded ${entry} in ${sidecar}`);
    }

    deleteFile(file: string): void {
        fs.unlinkSync(file);
        this.logger.debug(`Deleted duplicate file: ${file}`);
    }

    deleteSidecar(sidecar: string): void {
        fs.unlinkSync(sidecar);
        this.logger.debug(`Deleted sidecar file: ${sidecar}`);
    }
}

/**
 * Applies a duplicate set: merges the duplicates' own sidecars into the survivor's, records every
 * duplicate there, deletes the duplicates and finally the merged sidecars. The survivor's sidecar
 * ends up as: what it held before, the merged entries in set order, then the duplicate paths in
 * set order. A failing file is logged and counted, the rest of the set still goes through; a
 * duplicate that could not be recorded is kept, and so is the sidecar of one that was not deleted.
 */
export class SidecarManager {
    constructor(private config: RunConfig, private actions: SidecarActions, private logger: ScreenLogger) {
    }

    sidecarFor(file: string): string {
        return file + this.config.sidecarExtension;
    }

    process(group: DuplicateGroup): GroupResult {
        const [survivor, ...duplicates] = group;
        const sidecar = this.sidecarFor(survivor);
        const merged = new Map<string, string>();
        let failures = 0;

        const attempt = (what: string, action: () => void): boolean => {
            try {
                action();
                return true;
            } catch (e) {
                failures++;
                this.logger.error(`Error ${what}: ${describeError(e)}`);
                return false;
            }
        };

        this.actions.keep(survivor, sidecar);

        if (this.config.mergeExistingSidecars) {
            for (const duplicate of duplicates) {
                const own = this.sidecarFor(duplicate);
                if (fs.existsSync(own) && attempt(`merging sidecar file ${own}`, () => this.actions.merge(own, sidecar))) {
                    merged.set(duplicate, own);
                }
            }
        }

        // a duplicate is only deleted once it is on record
        const recorded = duplicates.filter((duplicate) =>
            attempt(`recording ${duplicate} in ${sidecar}`, () => this.actions.record(duplicate, sidecar)));

        const deleted = recorded.filter((duplicate) =>
            attempt(`deleting duplicate file ${duplicate}`, () => this.actions.deleteFile(duplicate)));

        if (this.config.deleteDuplicateSidecars) {
            for (const duplicate of deleted) {
                const own = merged.get(duplicate);
                if (own !== undefined) {
                    attempt(`deleting sidecar file ${own}`, () => this.actions.deleteSidecar(own));
                }
            }
        } else if (merged.size > 0) {
            this.logger.info(`Retained ${merged.size} merged sidecar file(s) next to deleted duplicates`);
        }

        return { duplicates: duplicates.length, failures };
    }
}
