/**
 * Which posts of a conversation page end up in the screenshot, and the
 * page region that covers them.
 */

import { hiddenMedia, modeVisibility, type CaptureRequest } from './schema.js';
import { ENGAGEMENT_COUNTS, MEDIA, PAGE_CHROME, TIMESTAMP } from './selectors.js';

export interface Box {
    x: number;
    y: number;
    width: number;
    height: number;
}

/**
 * Index range [start, end) of articles to capture around the focused one.
 * A parent limit of -1 keeps every parent.
 */
export function selectArticles(
    total: number,
    focused: number,
    request: Pick<CaptureRequest, 'show_parent_tweets' | 'show_parent_limit' | 'show_mentions'>,
): { start: number; end: number } {
    let start = focused;
    if (request.show_parent_tweets) {
        start = request.show_parent_limit === -1 ? 0 : Math.max(0, focused - request.show_parent_limit);
    }
    const end = Math.min(total, focused + 1 + request.show_mentions);
    return { start, end };
}

/** Smallest box containing every given box, snapped outward to whole pixels. */
export function unionBox(boxes: Box[]): Box {
    if (boxes.length === 0) throw new Error('Cannot take the union of zero boxes');
    const left = Math.min(...boxes.map(b => b.x));
    const top = Math.min(...boxes.map(b => b.y));
    const right = Math.max(...boxes.map(b => b.x + b.width));
    const bottom = Math.max(...boxes.map(b => b.y + b.height));
    const x = Math.floor(left);
    const y = Math.floor(top);
    return { x, y, width: Math.ceil(right) - x, height: Math.ceil(bottom) - y };
}

/** Stylesheet hiding page chrome plus whatever media and metadata the request drops. */
export function hidingCss(request: CaptureRequest): string {
    const selectors = [...PAGE_CHROME];
    for (const kind of hiddenMedia(request)) selectors.push(...MEDIA[kind]);

    const visible = modeVisibility(request.mode);
    if (!visible.counts) selectors.push(...ENGAGEMENT_COUNTS);
    if (!visible.timestamp) selectors.push(...TIMESTAMP);

    return `${selectors.join(',\n')} { display: none !important; }`;
}
