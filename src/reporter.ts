import { Logger } from './logger';
import { readSidecar, SidecarActions } from './sidecar';

/**
 * Dry run stand-in for the filesystem actions: every action becomes one line of the report, in
 * the order it would have been carried out. Existing sidecars are only read.
 */
export class DryRunReporter implements SidecarActions {
    constructor(private report: Logger) {}

    keep(survivor: string): void {
        this.report.log(`Would keep file: ${survivor}`);
    }

    merge(from: string, into: string): void {
        const entries = readSidecar(from).length;
        this.report.log(`Would merge existing sidecar file: ${from} into ${into} (${entries} entries)`);
    }

    record(entry: string, sidecar: string): void {
        this.report.log(`Would record ${entry} in ${sidecar}`);
    }

    deleteFile(file: string): void {
        this.report.log(`Would delete duplicate file: ${file}`);
    }

    deleteSidecar(sidecar: string): void {
        this.report.log(`Would delete sidecar file: ${sidecar}`);
    }
}
