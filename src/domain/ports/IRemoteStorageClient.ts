/**
 * A resumable upload in progress. `offset` is the next byte the service expects.
 */
export interface ResumableUploadSession {
    readonly uploadUrl: string;
    readonly filePath: string;
    readonly totalBytes: number;
    offset: number;
}

export type ChunkResult =
    | { kind: 'progress'; fraction: number }
    | { kind: 'complete'; fileId: string };

/**
 * Port for the remote storage service receiving the finished clip.
 * Implementations: DriveStorageClient
 */
export interface IRemoteStorageClient {
    createResumableUpload(filePath: string, name: string): Promise<ResumableUploadSession>;

    /** Sends the next chunk. The final chunk yields the durable file id. */
    nextChunk(session: ResumableUploadSession): Promise<ChunkResult>;

    /**
     * Asks the service how much of the upload it holds and moves `session.offset` there.
     * Yields `complete` when the service already has the whole file.
     */
    queryStatus(session: ResumableUploadSession): Promise<ChunkResult>;

    /** Makes the file readable by anyone holding the link. */
    grantPublicRead(fileId: string): Promise<void>;

    shareUrl(fileId: string): string;
}
