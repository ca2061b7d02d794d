import type { CaptureRequest } from './schema.js';

/** Renders a post to a PNG screenshot. */
export interface TweetCapturer {
    capture(request: CaptureRequest): Promise<Buffer>;
}

export interface FrameOptions {
    /** Corner radius in image pixels. */
    radius: number;
    /** JPEG quality, 1-100. */
    quality: number;
}

/** Turns a PNG screenshot into a square JPEG. */
export interface ImageFramer {
    toSquareJpeg(png: Buffer, options: FrameOptions): Promise<Buffer>;
}
