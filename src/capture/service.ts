/**
 * CaptureService -- the capture pipeline behind `POST /capture`:
 * screenshot, square framing, upload. Failures come back in-band as
 * `success: false` responses rather than thrown errors.
 */

import { config } from '../config/index.js';
import { logger } from '../infra/logger.js';
import { getErrorMessage } from '../infra/errors.js';
import type { ConcurrencyLimiter } from '../infra/limiter.js';
import type { ArtifactStore } from '../storage/minio-store.js';
import { generateObjectName } from './filename.js';
import type { CaptureRequest, CaptureResponse } from './schema.js';
import type { ImageFramer, TweetCapturer } from './types.js';

export interface CaptureServiceDeps {
    capturer: TweetCapturer;
    framer: ImageFramer;
    store: ArtifactStore;
    limiter: Pick<ConcurrencyLimiter, 'run'>;
    jpegQuality?: number;
    /** Millisecond clock, injectable for tests. */
    clock?: () => number;
}

export class CaptureService {
    private readonly jpegQuality: number;
    private readonly clock: () => number;

    constructor(private readonly deps: CaptureServiceDeps) {
        this.jpegQuality = deps.jpegQuality ?? config.capture.jpegQuality;
        this.clock = deps.clock ?? Date.now;
    }

    /** Screenshot and frame a post, returning the JPEG bytes. */
    render(request: CaptureRequest): Promise<Buffer> {
        return this.deps.limiter.run(async () => {
            const png = await this.deps.capturer.capture(request);
            return this.deps.framer.toSquareJpeg(png, { radius: request.radius, quality: this.jpegQuality });
        });
    }

    /** Full pipeline: render, upload, describe the stored object. */
    async capture(request: CaptureRequest): Promise<CaptureResponse> {
        const startedAt = this.clock();
        const elapsed = () => (this.clock() - startedAt) / 1000;

        try {
            const objectName = generateObjectName(request.url, request.filename);
            logger.info(`Capturing screenshot: ${request.url}`, 'Capture');

            const jpeg = await this.render(request);
            const fileUrl = await this.deps.store.upload(objectName, jpeg, 'image/jpeg');

            const processingTime = elapsed();
            logger.success(`Stored ${objectName} (${jpeg.length} bytes) in ${processingTime.toFixed(2)}s`, 'Capture');
            return {
                success: true,
                message: 'Tweet captured successfully',
                file_url: fileUrl,
                filename: objectName,
                file_size: jpeg.length,
                processing_time: processingTime,
            };
        } catch (error) {
            logger.error(`Capture failed for ${request.url}`, 'Capture', error);
            return {
                success: false,
                message: `Error: ${getErrorMessage(error)}`,
                processing_time: elapsed(),
            };
        }
    }
}
