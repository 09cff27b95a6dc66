import fs from 'fs';
import os from 'os';
import path from 'path';
import nock from 'nock';
import { DriveStorageClient, nextOffsetFromRange } from '../../../../src/infrastructure/storage/DriveStorageClient';
import { StaticAccessTokenProvider } from '../../../../src/infrastructure/google/AccessTokenProvider';
import { TransferUploader } from '../../../../src/application/TransferUploader';

const GOOGLE = 'https://www.googleapis.com';
const SESSION_URL = `${GOOGLE}/upload/drive/v3/files?uploadType=resumable&upload_id=session-1`;
const CHUNK = 256 * 1024;

describe('DriveStorageClient', () => {
    let workDir: string;
    let clipPath: string;
    const tokens = new StaticAccessTokenProvider('test-token');

    beforeAll(() => {
        nock.disableNetConnect();
    });

    afterAll(() => {
        nock.enableNetConnect();
    });

    beforeEach(async () => {
        nock.cleanAll();
        jest.spyOn(console, 'log').mockImplementation(() => undefined);
        workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'drive-'));
        clipPath = path.join(workDir, 'clip_enhanced.mp4');
        // 1.5 chunks
        await fs.promises.writeFile(clipPath, Buffer.alloc(CHUNK + CHUNK / 2, 7));
    });

    afterEach(async () => {
        nock.cleanAll();
        jest.restoreAllMocks();
        await fs.promises.rm(workDir, { recursive: true, force: true });
    });

    it('should reject chunk sizes Drive does not accept', () => {
        expect(() => new DriveStorageClient(tokens, { chunkSizeBytes: 1000 }))
            .toThrow('Chunk size must be a positive multiple of 262144 bytes');
    });

    describe('createResumableUpload', () => {
        it('should open a session and return the Location URL', async () => {
            const scope = nock(GOOGLE, {
                reqheaders: {
                    'authorization': 'Bearer test-token',
                    'x-upload-content-type': 'video/mp4',
                    'x-upload-content-length': String(CHUNK + CHUNK / 2),
                },
            })
                .post('/upload/drive/v3/files', { name: 'clip_enhanced.mp4', parents: ['folder-1'] })
                .query({ uploadType: 'resumable', fields: 'id' })
                .reply(200, {}, { Location: SESSION_URL });

            const client = new DriveStorageClient(tokens, { chunkSizeBytes: CHUNK, folderId: 'folder-1' });
            const session = await client.createResumableUpload(clipPath, 'clip_enhanced.mp4');

            expect(session).toEqual({
                uploadUrl: SESSION_URL,
                filePath: clipPath,
                totalBytes: CHUNK + CHUNK / 2,
                offset: 0,
            });
            expect(scope.isDone()).toBe(true);
        });

        it('should fail when Drive returns no session URL', async () => {
            nock(GOOGLE)
                .post('/upload/drive/v3/files', { name: 'clip_enhanced.mp4' })
                .query(true)
                .reply(200, {});

            const client = new DriveStorageClient(tokens, { chunkSizeBytes: CHUNK });

            await expect(client.createResumableUpload(clipPath, 'clip_enhanced.mp4'))
                .rejects.toThrow('Drive did not return a resumable session URL');
        });
    });

    describe('nextChunk', () => {
        const total = CHUNK + CHUNK / 2;

        it('should advance by the persisted range and complete with the file id', async () => {
            nock(GOOGLE, { reqheaders: { 'content-range': `bytes 0-${CHUNK - 1}/${total}` } })
                .put('/upload/drive/v3/files')
                .query({ uploadType: 'resumable', upload_id: 'session-1' })
                .reply(308, '', { Range: `bytes=0-${CHUNK - 1}` });
            nock(GOOGLE, { reqheaders: { 'content-range': `bytes ${CHUNK}-${total - 1}/${total}` } })
                .put('/upload/drive/v3/files')
                .query({ uploadType: 'resumable', upload_id: 'session-1' })
                .reply(200, { id: 'file-42' });

            const client = new DriveStorageClient(tokens, { chunkSizeBytes: CHUNK });
            const session = { uploadUrl: SESSION_URL, filePath: clipPath, totalBytes: total, offset: 0 };

            await expect(client.nextChunk(session)).resolves.toEqual({ kind: 'progress', fraction: CHUNK / total });
            expect(session.offset).toBe(CHUNK);

            await expect(client.nextChunk(session)).resolves.toEqual({ kind: 'complete', fileId: 'file-42' });
            expect(session.offset).toBe(total);
        });

        it('should resend from the last persisted byte when Drive kept less', async () => {
            nock(GOOGLE)
                .put('/upload/drive/v3/files')
                .query(true)
                .reply(308, '', { Range: 'bytes=0-99999' });

            const client = new DriveStorageClient(tokens, { chunkSizeBytes: CHUNK });
            const session = { uploadUrl: SESSION_URL, filePath: clipPath, totalBytes: total, offset: 0 };

            await client.nextChunk(session);

            expect(session.offset).toBe(100000);
        });

        it('should leave the offset for a status query when a chunk fails', async () => {
            nock(GOOGLE)
                .put('/upload/drive/v3/files')
                .query(true)
                .reply(503, { error: { message: 'Backend Error' } });

            const client = new DriveStorageClient(tokens, { chunkSizeBytes: CHUNK });
            const session = { uploadUrl: SESSION_URL, filePath: clipPath, totalBytes: total, offset: 0 };

            await expect(client.nextChunk(session)).rejects.toMatchObject({ response: { status: 503 } });
            expect(session.offset).toBe(0);
        });

        it('should upload an empty file in a single request', async () => {
            const emptyPath = path.join(workDir, 'empty.mp4');
            await fs.promises.writeFile(emptyPath, '');
            nock(GOOGLE, { reqheaders: { 'content-range': 'bytes */0' } })
                .put('/upload/drive/v3/files')
                .query(true)
                .reply(201, { id: 'file-empty' });

            const client = new DriveStorageClient(tokens, { chunkSizeBytes: CHUNK });
            const session = { uploadUrl: SESSION_URL, filePath: emptyPath, totalBytes: 0, offset: 0 };

            await expect(client.nextChunk(session)).resolves.toEqual({ kind: 'complete', fileId: 'file-empty' });
        });

        it('should fail when the final response carries no file id', async () => {
            nock(GOOGLE)
                .put('/upload/drive/v3/files')
                .query(true)
                .reply(200, {});

            const client = new DriveStorageClient(tokens, { chunkSizeBytes: 1024 * 1024 });
            const session = { uploadUrl: SESSION_URL, filePath: clipPath, totalBytes: total, offset: 0 };

            await expect(client.nextChunk(session))
                .rejects.toThrow('Drive completed the upload without a file id (status 200)');
        });
    });

    describe('queryStatus', () => {
        const total = CHUNK + CHUNK / 2;

        it('should send an empty range query and adopt the range Drive persisted', async () => {
            const scope = nock(GOOGLE, { reqheaders: { 'content-range': `bytes */${total}` } })
                .put('/upload/drive/v3/files')
                .query({ uploadType: 'resumable', upload_id: 'session-1' })
                .reply(308, '', { Range: 'bytes=0-327679' });

            const client = new DriveStorageClient(tokens, { chunkSizeBytes: CHUNK });
            const session = { uploadUrl: SESSION_URL, filePath: clipPath, totalBytes: total, offset: CHUNK };

            await expect(client.queryStatus(session)).resolves.toEqual({ kind: 'progress', fraction: 327680 / total });
            expect(session.offset).toBe(327680);
            expect(scope.isDone()).toBe(true);
        });

        it('should complete when Drive already stored the whole file', async () => {
            nock(GOOGLE, { reqheaders: { 'content-range': `bytes */${total}` } })
                .put('/upload/drive/v3/files')
                .query(true)
                .reply(201, { id: 'file-42' });

            const client = new DriveStorageClient(tokens, { chunkSizeBytes: CHUNK });
            const session = { uploadUrl: SESSION_URL, filePath: clipPath, totalBytes: total, offset: CHUNK };

            await expect(client.queryStatus(session)).resolves.toEqual({ kind: 'complete', fileId: 'file-42' });
            expect(session.offset).toBe(total);
        });

        it('should resume a TransferUploader upload from the range Drive reports after a failed chunk', async () => {
            jest.spyOn(console, 'warn').mockImplementation(() => undefined);
            const sessionQuery = { uploadType: 'resumable', upload_id: 'session-1' };
            nock(GOOGLE)
                .post('/upload/drive/v3/files', { name: 'clip_enhanced.mp4' })
                .query(true)
                .reply(200, {}, { Location: SESSION_URL });
            nock(GOOGLE, { reqheaders: { 'content-range': `bytes 0-${CHUNK - 1}/${total}` } })
                .put('/upload/drive/v3/files')
                .query(sessionQuery)
                .reply(308, '', { Range: `bytes=0-${CHUNK - 1}` });
            nock(GOOGLE, { reqheaders: { 'content-range': `bytes ${CHUNK}-${total - 1}/${total}` } })
                .put('/upload/drive/v3/files')
                .query(sessionQuery)
                .reply(503, { error: { message: 'Backend Error' } });
            const statusQuery = nock(GOOGLE, { reqheaders: { 'content-range': `bytes */${total}` } })
                .put('/upload/drive/v3/files')
                .query(sessionQuery)
                .reply(308, '', { Range: 'bytes=0-327679' });
            const resumed = nock(GOOGLE, { reqheaders: { 'content-range': `bytes 327680-${total - 1}/${total}` } })
                .put('/upload/drive/v3/files')
                .query(sessionQuery)
                .reply(200, { id: 'file-42' });
            nock(GOOGLE)
                .post('/drive/v3/files/file-42/permissions', { role: 'reader', type: 'anyone' })
                .reply(200, {});

            const uploader = new TransferUploader(new DriveStorageClient(tokens, { chunkSizeBytes: CHUNK }), {
                chunkRetryDelayMs: 1,
            });

            await expect(uploader.upload(clipPath))
                .resolves.toBe('https://drive.google.com/file/d/file-42/view?usp=sharing');
            expect(statusQuery.isDone()).toBe(true);
            expect(resumed.isDone()).toBe(true);
        });
    });

    describe('sharing', () => {
        it('should grant read access to anyone with the link', async () => {
            const scope = nock(GOOGLE, { reqheaders: { authorization: 'Bearer test-token' } })
                .post('/drive/v3/files/file-42/permissions', { role: 'reader', type: 'anyone' })
                .reply(200, { id: 'anyoneWithLink' });

            await new DriveStorageClient(tokens).grantPublicRead('file-42');

            expect(scope.isDone()).toBe(true);
        });

        it('should build the view URL', () => {
            expect(new DriveStorageClient(tokens).shareUrl('file-42'))
                .toBe('https://drive.google.com/file/d/file-42/view?usp=sharing');
        });
    });
});

describe('nextOffsetFromRange', () => {
    it('should return the byte after the persisted range', () => {
        expect(nextOffsetFromRange('bytes=0-262143')).toBe(262144);
    });

    it('should return zero when nothing was persisted', () => {
        expect(nextOffsetFromRange(undefined)).toBe(0);
        expect(nextOffsetFromRange('garbage')).toBe(0);
    });
});
