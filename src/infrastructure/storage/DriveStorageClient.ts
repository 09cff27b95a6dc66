import axios from 'axios';
import fs from 'fs';
import { ChunkResult, IRemoteStorageClient, ResumableUploadSession } from '../../domain/ports/IRemoteStorageClient';
import { AccessTokenProvider } from '../google/AccessTokenProvider';

const UPLOAD_URL = 'https://www.googleapis.com/upload/drive/v3/files';
const FILES_URL = 'https://www.googleapis.com/drive/v3/files';

/** Drive requires chunk sizes in multiples of 256 KiB. */
export const DRIVE_CHUNK_GRANULARITY = 256 * 1024;
export const DEFAULT_CHUNK_SIZE_BYTES = 1024 * 1024;

export interface DriveStorageClientOptions {
    chunkSizeBytes?: number;
    /** Parent folder for uploads (default: My Drive root) */
    folderId?: string;
    mimeType?: string;
    requestTimeoutMs?: number;
}

/**
 * Parses the `Range: bytes=0-N` header of a 308 response into the next offset (N + 1).
 * A missing header means nothing was persisted yet.
 */
export function nextOffsetFromRange(range: unknown): number {
    if (typeof range !== 'string') {
        return 0;
    }
    const match = range.match(/bytes=0-(\d+)/);
    return match ? Number(match[1]) + 1 : 0;
}

/**
 * Google Drive client using the resumable upload protocol.
 */
export class DriveStorageClient implements IRemoteStorageClient {
    private readonly chunkSizeBytes: number;
    private readonly mimeType: string;
    private readonly timeout: number;

    constructor(
        private readonly tokens: AccessTokenProvider,
        private readonly options: DriveStorageClientOptions = {}
    ) {
        this.chunkSizeBytes = options.chunkSizeBytes ?? DEFAULT_CHUNK_SIZE_BYTES;
        if (this.chunkSizeBytes <= 0 || this.chunkSizeBytes % DRIVE_CHUNK_GRANULARITY !== 0) {
            throw new Error(`Chunk size must be a positive multiple of ${DRIVE_CHUNK_GRANULARITY} bytes`);
        }
        this.mimeType = options.mimeType ?? 'video/mp4';
        this.timeout = options.requestTimeoutMs ?? 60000;
    }

    async createResumableUpload(filePath: string, name: string): Promise<ResumableUploadSession> {
        const { size } = await fs.promises.stat(filePath);
        const metadata = this.options.folderId ? { name, parents: [this.options.folderId] } : { name };

        const response = await axios.post(UPLOAD_URL, metadata, {
            params: { uploadType: 'resumable', fields: 'id' },
            headers: {
                'Authorization': `Bearer ${await this.tokens.getAccessToken()}`,
                'Content-Type': 'application/json; charset=UTF-8',
                'X-Upload-Content-Type': this.mimeType,
                'X-Upload-Content-Length': String(size),
            },
            timeout: this.timeout,
        });

        const location: unknown = response.headers['location'];
        if (typeof location !== 'string' || !location) {
            throw new Error('Drive did not return a resumable session URL');
        }

        console.log(`[Drive] Resumable session created for ${name} (${size} bytes)`);
        return { uploadUrl: location, filePath, totalBytes: size, offset: 0 };
    }

    async nextChunk(session: ResumableUploadSession): Promise<ChunkResult> {
        const { totalBytes } = session;
        const start = session.offset;
        const length = Math.min(this.chunkSizeBytes, totalBytes - start);
        const chunk = await this.readChunk(session.filePath, start, length);
        const contentRange = totalBytes === 0 ? 'bytes */0' : `bytes ${start}-${start + length - 1}/${totalBytes}`;

        return this.putToSession(session, chunk, contentRange);
    }

    /**
     * Empty PUT with an open-ended Content-Range; Drive answers with the range it persisted.
     */
    async queryStatus(session: ResumableUploadSession): Promise<ChunkResult> {
        console.log(`[Drive] Querying upload status (local offset ${session.offset}/${session.totalBytes})`);
        return this.putToSession(session, Buffer.alloc(0), `bytes */${session.totalBytes}`);
    }

    async grantPublicRead(fileId: string): Promise<void> {
        await axios.post(
            `${FILES_URL}/${encodeURIComponent(fileId)}/permissions`,
            { role: 'reader', type: 'anyone' },
            {
                headers: { 'Authorization': `Bearer ${await this.tokens.getAccessToken()}` },
                timeout: this.timeout,
            }
        );
    }

    shareUrl(fileId: string): string {
        return `https://drive.google.com/file/d/${fileId}/view?usp=sharing`;
    }

    private async putToSession(
        session: ResumableUploadSession,
        body: Buffer,
        contentRange: string
    ): Promise<ChunkResult> {
        const { totalBytes } = session;
        const response = await axios.put<{ id?: string }>(session.uploadUrl, body, {
            headers: {
                'Authorization': `Bearer ${await this.tokens.getAccessToken()}`,
                'Content-Length': String(body.length),
                'Content-Range': contentRange,
            },
            maxRedirects: 0,
            validateStatus: (status) => (status >= 200 && status < 300) || status === 308,
            timeout: this.timeout,
        });

        if (response.status === 308) {
            session.offset = nextOffsetFromRange(response.headers['range']);
            return { kind: 'progress', fraction: totalBytes === 0 ? 0 : session.offset / totalBytes };
        }

        const fileId = response.data?.id;
        if (!fileId) {
            throw new Error(`Drive completed the upload without a file id (status ${response.status})`);
        }
        session.offset = totalBytes;
        return { kind: 'complete', fileId };
    }

    private async readChunk(filePath: string, start: number, length: number): Promise<Buffer> {
        const buffer = Buffer.alloc(length);
        if (length === 0) {
            return buffer;
        }
        const handle = await fs.promises.open(filePath, 'r');
        try {
            const { bytesRead } = await handle.read(buffer, 0, length, start);
            return bytesRead === length ? buffer : buffer.subarray(0, bytesRead);
        } finally {
            await handle.close();
        }
    }
}
