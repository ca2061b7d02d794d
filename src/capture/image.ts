/**
 * Pure helpers for framing a screenshot as a square image. The pixel work
 * itself happens in the browser (see framer.ts); this module only does
 * the geometry and markup.
 */

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

export interface ImageSize {
    width: number;
    height: number;
}

export interface SquareLayout {
    side: number;
    offsetX: number;
    offsetY: number;
}

/** Read width and height from a PNG's IHDR chunk. */
export function readPngSize(png: Buffer): ImageSize {
    if (png.length < 24 || !png.subarray(0, 8).equals(PNG_SIGNATURE)) {
        throw new Error('Not a PNG image');
    }
    if (png.toString('ascii', 12, 16) !== 'IHDR') {
        throw new Error('PNG is missing its IHDR chunk');
    }
    return { width: png.readUInt32BE(16), height: png.readUInt32BE(20) };
}

/** Square canvas that fits the image, with the image centred on it. */
export function squareLayout({ width, height }: ImageSize): SquareLayout {
    const side = Math.max(width, height);
    return {
        side,
        offsetX: Math.floor((side - width) / 2),
        offsetY: Math.floor((side - height) / 2),
    };
}

/** Markup that paints the PNG onto a black square at its natural size. */
export function framingHtml(png: Buffer, size: ImageSize, layout: SquareLayout, radius: number): string {
    const img = [
        'position:absolute',
        `left:${layout.offsetX}px`,
        `top:${layout.offsetY}px`,
        `width:${size.width}px`,
        `height:${size.height}px`,
        `border-radius:${radius}px`,
    ].join(';');

    return '<!doctype html><html><head><style>'
        + `html,body{margin:0;padding:0;width:${layout.side}px;height:${layout.side}px;background:#000;overflow:hidden}`
        + '</style></head><body>'
        + `<img alt="" style="${img}" src="data:image/png;base64,${png.toString('base64')}">`
        + '</body></html>';
}
