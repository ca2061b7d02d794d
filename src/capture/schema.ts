/**
 * Request and response shapes for the capture endpoint. Field names are
 * snake_case on the wire.
 */

import { z } from 'zod';

const ALLOWED_URL_PREFIXES = ['https://twitter.com/', 'https://x.com/'] as const;

export const CaptureRequestSchema = z.object({
    url: z.string().refine(
        v => ALLOWED_URL_PREFIXES.some(prefix => v.startsWith(prefix)),
        { message: 'URL must be a valid Twitter/X URL' },
    ),
    /** 0 = text only, 1 = counts, 2 = counts + timestamp, 3 = everything, 4 = timestamp. */
    mode: z.number().int().min(0).max(4).default(3),
    /** 0 = light, 1 = dim, 2 = lights out. */
    night_mode: z.number().int().min(0).max(2).default(0),
    lang: z.string().min(1).default('en'),
    show_parent_tweets: z.boolean().default(false),
    /** -1 = unlimited. */
    show_parent_limit: z.number().int().min(-1).default(-1),
    show_mentions: z.number().int().min(0).default(0),
    radius: z.number().int().min(0).default(15),
    scale: z.number().min(0.1).max(14).default(1),
    /** Seconds to wait for the post to render. */
    wait_time: z.number().min(1).max(10).default(5),

    hide_photos: z.boolean().default(false),
    hide_videos: z.boolean().default(false),
    hide_gifs: z.boolean().default(false),
    hide_quotes: z.boolean().default(false),
    hide_link_previews: z.boolean().default(false),
    hide_all_medias: z.boolean().default(false),

    /** Object name prefix, without extension. */
    filename: z.string().regex(/^[\w.-]{1,100}$/, 'filename may only contain letters, digits, "_", "-" and "."').optional(),
});

export type CaptureRequest = z.infer<typeof CaptureRequestSchema>;
export type CaptureRequestInput = z.input<typeof CaptureRequestSchema>;

export interface CaptureResponse {
    success: boolean;
    message: string;
    file_url?: string;
    filename?: string;
    file_size?: number;
    processing_time?: number;
}

export interface HealthResponse {
    status: 'healthy';
    timestamp: string;
    browser: 'connected' | 'idle';
}

export type MediaKind = 'photos' | 'videos' | 'gifs' | 'quotes' | 'linkPreviews';

/** Media kinds the request asks to hide. `hide_all_medias` wins over the individual flags. */
export function hiddenMedia(request: CaptureRequest): MediaKind[] {
    if (request.hide_all_medias) return ['photos', 'videos', 'gifs', 'quotes', 'linkPreviews'];
    const hidden: MediaKind[] = [];
    if (request.hide_photos) hidden.push('photos');
    if (request.hide_videos) hidden.push('videos');
    if (request.hide_gifs) hidden.push('gifs');
    if (request.hide_quotes) hidden.push('quotes');
    if (request.hide_link_previews) hidden.push('linkPreviews');
    return hidden;
}

/** Which metadata rows a display mode keeps. */
export function modeVisibility(mode: number): { counts: boolean; timestamp: boolean } {
    switch (mode) {
        case 0: return { counts: false, timestamp: false };
        case 1: return { counts: true, timestamp: false };
        case 2: return { counts: true, timestamp: true };
        case 4: return { counts: false, timestamp: true };
        default: return { counts: true, timestamp: true };
    }
}
