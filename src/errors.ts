export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Bad flags, missing directories or a jdupes binary that can't be found.
 * Always raised before anything on disk is touched.
 */
export class ConfigError extends Error {
    readonly exitCode = EXIT_USAGE;

    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

// jdupes could not be started or exited with a non-zero status
export class ExternalToolError extends Error {
    readonly exitCode = EXIT_FAILURE;

    constructor(message: string, readonly code: number | null, readonly diagnostics: string[] = []) {
        super(diagnostics.length > 0 ? `${message}\n${diagnostics.join('\n')}` : message);
        this.name = 'ExternalToolError';
    }
}

export function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }

    return undefined;
}

export function describeError(error: unknown): string {
    if (error instanceof Error) {
        const code = errorCode(error);
        return code ? `${code}: ${error.message}` : error.message;
    }

    return String(error);
}

// configuration problems exit with 2, a failing jdupes and anything unexpected with 1
export function exitCodeFor(error: unknown): number {
    if (error instanceof ConfigError || error instanceof ExternalToolError) {
        return error.exitCode;
    }

    return EXIT_FAILURE;
}

export function failureMessages(error: unknown): string[] {
    if (error instanceof ConfigError) {
        return [error.message, 'Run with --help for usage.'];
    }
    if (error instanceof ExternalToolError) {
        return [error.message];
    }

    return [`Unexpected error: ${describeError(error)}`];
}
