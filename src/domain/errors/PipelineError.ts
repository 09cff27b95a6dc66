/**
 * Failure categories a pipeline stage can surface.
 */
export type PipelineErrorCode =
    | 'AttachExhausted'
    | 'ProjectUnavailable'
    | 'RenderEngineMissing'
    | 'RenderFailed'
    | 'RenderTimeout'
    | 'UploadInterrupted'
    | 'NotificationFailure';

/**
 * Base error for every pipeline stage.
 * Fatal errors move the pipeline to `failed`; non-fatal ones are logged by the stage that raised them.
 */
export class PipelineError extends Error {
    constructor(
        public readonly code: PipelineErrorCode,
        message: string,
        public readonly fatal: boolean = true,
        cause?: unknown
    ) {
        super(message, { cause });
        this.name = `${code}Error`;
    }
}

/**
 * The render engine never accepted a session within the attempt budget.
 */
export class AttachExhaustedError extends PipelineError {
    constructor(public readonly attempts: number, cause?: unknown) {
        super('AttachExhausted', `Could not attach to the render engine after ${attempts} attempts`, true, cause);
    }
}

/**
 * Neither the named project nor its template could be loaded.
 */
export class ProjectUnavailableError extends PipelineError {
    constructor(public readonly projectName: string, detail?: string) {
        super('ProjectUnavailable', `Project "${projectName}" is unavailable${detail ? `: ${detail}` : ''}`);
    }
}

/**
 * The engine binary or its scripting support is not installed. Never retried.
 */
export class RenderEngineMissingError extends PipelineError {
    constructor(engineName: string, detail?: string) {
        super('RenderEngineMissing', `Render engine "${engineName}" is not installed${detail ? `: ${detail}` : ''}`);
    }
}

export class RenderFailedError extends PipelineError {
    constructor(message: string, cause?: unknown) {
        super('RenderFailed', message, true, cause);
    }
}

export class RenderTimeoutError extends PipelineError {
    constructor(public readonly timeoutMs: number) {
        super('RenderTimeout', `Render did not finish within ${Math.round(timeoutMs / 1000)}s`);
    }
}

/**
 * The transfer gave up after its per-chunk retry budget.
 */
export class UploadInterruptedError extends PipelineError {
    constructor(message: string, cause?: unknown) {
        super('UploadInterrupted', message, true, cause);
    }
}

/**
 * A single recipient could not be reached. Never fatal.
 */
export class NotificationFailureError extends PipelineError {
    constructor(public readonly recipient: string, cause?: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause);
        super('NotificationFailure', `Delivery to ${recipient} failed: ${detail}`, false, cause);
    }
}

export function isPipelineError(error: unknown): error is PipelineError {
    return error instanceof PipelineError;
}
