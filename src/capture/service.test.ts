import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CaptureService } from './service.js';
import { CaptureRequestSchema } from './schema.js';
import { ConcurrencyLimiter } from '../infra/limiter.js';
import { CaptureError, StorageError } from '../infra/errors.js';

vi.mock('../infra/logger.js', () => ({
    logger: {
        info: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        success: vi.fn(),
    },
}));

const URL = 'https://x.com/someone/status/42';

describe('CaptureService', () => {
    let capturer: { capture: ReturnType<typeof vi.fn> };
    let framer: { toSquareJpeg: ReturnType<typeof vi.fn> };
    let store: { ensureBucket: ReturnType<typeof vi.fn>; upload: ReturnType<typeof vi.fn> };
    let now: number;
    let service: CaptureService;

    beforeEach(() => {
        capturer = { capture: vi.fn().mockResolvedValue(Buffer.from('png')) };
        framer = { toSquareJpeg: vi.fn().mockResolvedValue(Buffer.from('square-jpeg')) };
        store = {
            ensureBucket: vi.fn().mockResolvedValue(undefined),
            upload: vi.fn(async (name: string) => `http://minio:9000/tweetcaptures/${name}`),
        };
        now = 1_000;
        service = new CaptureService({
            capturer,
            framer,
            store,
            limiter: new ConcurrencyLimiter(1),
            jpegQuality: 95,
            clock: () => {
                now += 1_250;
                return now;
            },
        });
    });

    it('captures, frames and uploads', async () => {
        const request = CaptureRequestSchema.parse({ url: URL, filename: 'launch', radius: 20 });
        const response = await service.capture(request);

        expect(capturer.capture).toHaveBeenCalledWith(request);
        expect(framer.toSquareJpeg).toHaveBeenCalledWith(Buffer.from('png'), { radius: 20, quality: 95 });
        const [objectName, data, contentType] = store.upload.mock.calls[0];
        expect(objectName).toMatch(/^launch_\d{8}_\d{6}_[0-9a-f]{8}\.jpg$/);
        expect(data).toEqual(Buffer.from('square-jpeg'));
        expect(contentType).toBe('image/jpeg');

        expect(response).toEqual({
            success: true,
            message: 'Tweet captured successfully',
            file_url: `http://minio:9000/tweetcaptures/${objectName}`,
            filename: objectName,
            file_size: 11,
            processing_time: 1.25,
        });
    });

    it('names status captures after the author and id', async () => {
        const response = await service.capture(CaptureRequestSchema.parse({ url: URL }));
        expect(response.filename).toMatch(/^@someone_42_\d{8}_\d{6}\.jpg$/);
    });

    it('reports capture failures in-band', async () => {
        capturer.capture.mockRejectedValue(new CaptureError('Failed to capture: timeout'));
        const response = await service.capture(CaptureRequestSchema.parse({ url: URL }));

        expect(response).toEqual({
            success: false,
            message: 'Error: Failed to capture: timeout',
            processing_time: 1.25,
        });
        expect(store.upload).not.toHaveBeenCalled();
    });

    it('reports upload failures in-band', async () => {
        store.upload.mockRejectedValue(new StorageError('Failed to upload file: AccessDenied'));
        const response = await service.capture(CaptureRequestSchema.parse({ url: URL }));

        expect(response.success).toBe(false);
        expect(response.message).toBe('Error: Failed to upload file: AccessDenied');
    });

    it('render returns the framed bytes without uploading', async () => {
        const jpeg = await service.render(CaptureRequestSchema.parse({ url: URL }));
        expect(jpeg.toString()).toBe('square-jpeg');
        expect(store.upload).not.toHaveBeenCalled();
    });
});
