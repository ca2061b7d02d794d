/**
 * Square framing done in the same headless browser that took the
 * screenshot: the PNG is painted onto a black page sized to the square and
 * the page is captured as JPEG.
 */

import type { BrowserManager } from '../runtime/browser/manager.js';
import { CaptureError, getErrorMessage } from '../infra/errors.js';
import { framingHtml, readPngSize, squareLayout } from './image.js';
import type { FrameOptions, ImageFramer } from './types.js';

export class PlaywrightImageFramer implements ImageFramer {
    constructor(private readonly browsers: Pick<BrowserManager, 'newContext'>) { }

    async toSquareJpeg(png: Buffer, { radius, quality }: FrameOptions): Promise<Buffer> {
        const size = readPngSize(png);
        const layout = squareLayout(size);

        const context = await this.browsers.newContext({
            viewport: { width: layout.side, height: layout.side },
            deviceScaleFactor: 1,
        });
        try {
            const page = await context.newPage();
            await page.setContent(framingHtml(png, size, layout, radius), { waitUntil: 'load' });
            return await page.screenshot({
                type: 'jpeg',
                quality,
                clip: { x: 0, y: 0, width: layout.side, height: layout.side },
            });
        } catch (error) {
            throw new CaptureError(`Failed to frame screenshot: ${getErrorMessage(error)}`, { cause: error });
        } finally {
            await context.close();
        }
    }
}
