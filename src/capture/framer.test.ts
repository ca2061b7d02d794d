import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PlaywrightImageFramer } from './framer.js';
import { CaptureError } from '../infra/errors.js';

function pngHeader(width: number, height: number): Buffer {
    const buf = Buffer.alloc(33);
    Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]).copy(buf, 0);
    buf.writeUInt32BE(13, 8);
    buf.write('IHDR', 12, 'ascii');
    buf.writeUInt32BE(width, 16);
    buf.writeUInt32BE(height, 20);
    return buf;
}

describe('PlaywrightImageFramer', () => {
    let page: { setContent: ReturnType<typeof vi.fn>; screenshot: ReturnType<typeof vi.fn> };
    let context: { newPage: ReturnType<typeof vi.fn>; close: ReturnType<typeof vi.fn> };
    let newContext: ReturnType<typeof vi.fn>;
    let framer: PlaywrightImageFramer;

    beforeEach(() => {
        page = {
            setContent: vi.fn().mockResolvedValue(undefined),
            screenshot: vi.fn().mockResolvedValue(Buffer.from('jpeg-bytes')),
        };
        context = {
            newPage: vi.fn().mockResolvedValue(page),
            close: vi.fn().mockResolvedValue(undefined),
        };
        newContext = vi.fn().mockResolvedValue(context);
        framer = new PlaywrightImageFramer({ newContext });
    });

    it('renders onto a square viewport and captures a jpeg', async () => {
        const jpeg = await framer.toSquareJpeg(pngHeader(600, 900), { radius: 15, quality: 95 });

        expect(jpeg.toString()).toBe('jpeg-bytes');
        expect(newContext).toHaveBeenCalledWith({ viewport: { width: 900, height: 900 }, deviceScaleFactor: 1 });
        const html = page.setContent.mock.calls[0][0] as string;
        expect(html).toContain('left:150px;top:0px;width:600px;height:900px;border-radius:15px');
        expect(page.screenshot).toHaveBeenCalledWith({
            type: 'jpeg',
            quality: 95,
            clip: { x: 0, y: 0, width: 900, height: 900 },
        });
        expect(context.close).toHaveBeenCalledTimes(1);
    });

    it('rejects non-PNG input before opening a context', async () => {
        await expect(framer.toSquareJpeg(Buffer.from('definitely not an image file'), { radius: 0, quality: 90 }))
            .rejects.toThrow('Not a PNG image');
        expect(newContext).not.toHaveBeenCalled();
    });

    it('wraps render failures and closes the context', async () => {
        page.screenshot.mockRejectedValueOnce(new Error('Target closed'));
        const attempt = framer.toSquareJpeg(pngHeader(10, 10), { radius: 0, quality: 90 });
        await expect(attempt).rejects.toBeInstanceOf(CaptureError);
        await expect(framer.toSquareJpeg(pngHeader(10, 10), { radius: 0, quality: 90 })).resolves.toBeInstanceOf(Buffer);
        expect(context.close).toHaveBeenCalledTimes(2);
    });
});
