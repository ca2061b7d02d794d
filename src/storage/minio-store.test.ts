import { describe, it, expect, vi, beforeEach } from 'vitest';
import { MinioStore, type StorageSettings } from './minio-store.js';
import { StorageError } from '../infra/errors.js';

vi.mock('../infra/logger.js', () => ({
    logger: {
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        success: vi.fn(),
    },
}));

const SETTINGS: StorageSettings = {
    endpoint: 'minio:9000',
    accessKey: 'test-access',
    secretKey: 'test-secret',
    bucket: 'captures',
    secure: false,
    publicEndpoint: 'https://cdn.example.test/',
};

describe('MinioStore', () => {
    let client: {
        bucketExists: ReturnType<typeof vi.fn>;
        makeBucket: ReturnType<typeof vi.fn>;
        putObject: ReturnType<typeof vi.fn>;
    };
    let store: MinioStore;

    beforeEach(() => {
        client = {
            bucketExists: vi.fn().mockResolvedValue(true),
            makeBucket: vi.fn().mockResolvedValue(undefined),
            putObject: vi.fn().mockResolvedValue({ etag: 'etag', versionId: null }),
        };
        store = new MinioStore(SETTINGS, client);
    });

    describe('ensureBucket', () => {
        it('leaves an existing bucket alone', async () => {
            await store.ensureBucket();
            expect(client.bucketExists).toHaveBeenCalledWith('captures');
            expect(client.makeBucket).not.toHaveBeenCalled();
        });

        it('creates a missing bucket', async () => {
            client.bucketExists.mockResolvedValue(false);
            await store.ensureBucket();
            expect(client.makeBucket).toHaveBeenCalledWith('captures');
        });

        it('wraps client failures', async () => {
            client.bucketExists.mockRejectedValue(new Error('connect ECONNREFUSED'));
            await expect(store.ensureBucket()).rejects.toThrow(
                new StorageError('Bucket "captures" is unavailable: connect ECONNREFUSED'),
            );
        });
    });

    describe('upload', () => {
        it('puts the object with its size and content type and returns the public url', async () => {
            const data = Buffer.from('jpeg');
            const url = await store.upload('@someone_42_20240101_000000.jpg', data, 'image/jpeg');

            expect(client.putObject).toHaveBeenCalledWith(
                'captures', '@someone_42_20240101_000000.jpg', data, 4, { 'Content-Type': 'image/jpeg' },
            );
            expect(url).toBe('https://cdn.example.test/captures/@someone_42_20240101_000000.jpg');
        });

        it('raises a StorageError on failure', async () => {
            client.putObject.mockRejectedValue(new Error('AccessDenied'));
            const attempt = store.upload('a.jpg', Buffer.from('x'), 'image/jpeg');
            await expect(attempt).rejects.toBeInstanceOf(StorageError);
            await expect(store.upload('a.jpg', Buffer.from('x'), 'image/jpeg'))
                .rejects.toThrow('Failed to upload file: AccessDenied');
        });
    });

    it('builds public urls without doubled slashes', () => {
        expect(store.publicUrl('x.jpg')).toBe('https://cdn.example.test/captures/x.jpg');
    });
});
