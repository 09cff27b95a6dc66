import path from 'path';
import { ChunkResult, IRemoteStorageClient, ResumableUploadSession } from '../domain/ports/IRemoteStorageClient';
import {
    UploadProgress,
    advanceUploadProgress,
    completeUploadProgress,
    createUploadProgress,
} from '../domain/entities/UploadProgress';
import { UploadInterruptedError } from '../domain/errors/PipelineError';
import { ObservableValue, ReadonlyObservable } from '../infrastructure/state/ObservableValue';
import { isRetryableHttpError, withRetry } from '../infrastructure/retry/RetryUtils';

export interface TransferUploaderOptions {
    /** Attempts per chunk before the upload is abandoned (default: 5) */
    chunkMaxAttempts?: number;
    /** Delay before the first retry of a chunk (default: 1000ms) */
    chunkRetryDelayMs?: number;
    now?: () => number;
}

/**
 * TransferUploader sends the finished clip to remote storage chunk by chunk and
 * publishes progress. It is the only writer of its UploadProgress.
 */
export class TransferUploader {
    private readonly progressState = new ObservableValue<UploadProgress>(createUploadProgress());
    private readonly chunkMaxAttempts: number;
    private readonly chunkRetryDelayMs: number;
    private readonly now: () => number;

    constructor(
        private readonly storage: IRemoteStorageClient,
        options: TransferUploaderOptions = {}
    ) {
        this.chunkMaxAttempts = options.chunkMaxAttempts ?? 5;
        this.chunkRetryDelayMs = options.chunkRetryDelayMs ?? 1000;
        this.now = options.now ?? Date.now;
    }

    get progress(): ReadonlyObservable<UploadProgress> {
        return this.progressState.asReadonly();
    }

    /**
     * Uploads the file, grants public read access and returns the shareable link.
     */
    async upload(filePath: string): Promise<string> {
        const name = path.basename(filePath);
        console.log(`[Upload] Starting upload of ${filePath}`);

        const session = await this.withChunkRetry(
            () => this.storage.createResumableUpload(filePath, name),
            'create upload session'
        );

        const startedAt = this.now();
        let fileId: string | undefined;

        while (fileId === undefined) {
            const result = await this.withChunkRetry(
                (attempt) => this.sendChunk(session, attempt),
                `upload chunk at byte ${session.offset}`
            );

            if (result.kind === 'complete') {
                fileId = result.fileId;
                console.log(`[Upload] Received file ID: ${fileId}`);
            } else {
                const elapsedSeconds = (this.now() - startedAt) / 1000;
                this.progressState.update((current) => advanceUploadProgress(current, result.fraction, elapsedSeconds));
                this.logProgress(session);
            }
        }

        try {
            await this.storage.grantPublicRead(fileId);
            console.log(`[Upload] Permissions set for ${fileId}`);
        } catch (error) {
            console.error(`[Upload] Could not make ${fileId} public:`, error instanceof Error ? error.message : error);
        }

        const resultReference = this.storage.shareUrl(fileId);
        this.progressState.set(completeUploadProgress(resultReference));
        console.log(`[Upload] ✅ Final upload link: ${resultReference}`);
        return resultReference;
    }

    /**
     * A retried chunk first resyncs with what the service persisted from the failed attempt.
     */
    private async sendChunk(session: ResumableUploadSession, attempt: number): Promise<ChunkResult> {
        if (attempt > 1) {
            const status = await this.storage.queryStatus(session);
            if (status.kind === 'complete') {
                return status;
            }
        }
        return this.storage.nextChunk(session);
    }

    private async withChunkRetry<T>(fn: (attempt: number) => Promise<T>, description: string): Promise<T> {
        try {
            return await withRetry(fn, {
                maxAttempts: this.chunkMaxAttempts,
                initialBackoffMs: this.chunkRetryDelayMs,
                isRetryable: isRetryableHttpError,
                onRetry: (attempt, error, delay) => {
                    const message = error instanceof Error ? error.message : String(error);
                    console.warn(`[Upload] ${description} failed (attempt ${attempt}): ${message}. Retrying in ${Math.round(delay)}ms`);
                },
            });
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            throw new UploadInterruptedError(`Upload interrupted (${description}): ${message}`, error);
        }
    }

    private logProgress(session: ResumableUploadSession): void {
        const { fractionComplete, estimatedSecondsRemaining } = this.progressState.get();
        console.log(
            `[Upload] Progress: ${(fractionComplete * 100).toFixed(1)}% ` +
            `(${session.offset}/${session.totalBytes} bytes), ~${estimatedSecondsRemaining}s remaining`
        );
    }
}
