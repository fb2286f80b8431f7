export class MediaServiceError extends Error {
    public readonly statusCode: number;
    public readonly detail?: string;

    constructor(message: string, statusCode = 500, detail?: string) {
        super(message);
        this.name = 'MediaServiceError';
        this.statusCode = statusCode;
        this.detail = detail;
    }
}

export class InvalidRequestError extends MediaServiceError {
    constructor(message: string, detail?: string) {
        super(message, 400, detail);
        this.name = 'InvalidRequestError';
    }
}

export class UnsafePathError extends MediaServiceError {
    constructor(message = 'Invalid file name') {
        super(message, 400);
        this.name = 'UnsafePathError';
    }
}

/** The engine could not resolve the URL (unsupported site, private or removed content). */
export class ExtractionError extends MediaServiceError {
    constructor(message: string, detail?: string) {
        super(message, 400, detail);
        this.name = 'ExtractionError';
    }
}

/** Every selector of a download plan failed. */
export class DownloadFailedError extends MediaServiceError {
    public readonly attempts: number;

    constructor(message: string, attempts: number) {
        super(message, 500);
        this.name = 'DownloadFailedError';
        this.attempts = attempts;
    }
}

export class ArtifactNotFoundError extends MediaServiceError {
    constructor(message = 'File not found') {
        super(message, 404);
        this.name = 'ArtifactNotFoundError';
    }
}

export class EngineTimeoutError extends MediaServiceError {
    public readonly timeoutMs: number;

    constructor(timeoutMs: number, message = `Operation timed out after ${Math.round(timeoutMs / 1000)}s`) {
        super(message, 504);
        this.name = 'EngineTimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/** Non-zero exit of the engine process. `message` is its last diagnostic line. */
export class EngineFailureError extends Error {
    public readonly exitCode: number | null;
    public readonly stderr: string;

    constructor(message: string, exitCode: number | null, stderr = '') {
        super(message);
        this.name = 'EngineFailureError';
        this.exitCode = exitCode;
        this.stderr = stderr;
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
