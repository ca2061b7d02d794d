/**
 * Maps `tweetshot capture` flags onto a validated capture request.
 */

import { CaptureRequestSchema, type CaptureRequest, type CaptureRequestInput, type MediaKind } from '../capture/schema.js';

export interface CaptureCliOptions {
    mode?: number;
    nightMode?: number;
    lang?: string;
    parents?: number | true;
    mentions?: number;
    radius?: number;
    scale?: number;
    waitTime?: number;
    hide?: string[];
    filename?: string;
}

const HIDE_FLAGS: Record<MediaKind | 'all', keyof CaptureRequestInput> = {
    photos: 'hide_photos',
    videos: 'hide_videos',
    gifs: 'hide_gifs',
    quotes: 'hide_quotes',
    linkPreviews: 'hide_link_previews',
    all: 'hide_all_medias',
};

export const HIDE_CHOICES = Object.keys(HIDE_FLAGS);

function isHideChoice(value: string): value is keyof typeof HIDE_FLAGS {
    return Object.prototype.hasOwnProperty.call(HIDE_FLAGS, value);
}

export type BuildResult =
    | { ok: true; request: CaptureRequest }
    | { ok: false; errors: string[] };

/**
 * `--parents` alone shows every parent; `--parents 2` shows the nearest two.
 */
export function buildCaptureRequest(url: string, options: CaptureCliOptions): BuildResult {
    const input: Record<string, unknown> = {
        url,
        mode: options.mode,
        night_mode: options.nightMode,
        lang: options.lang,
        show_mentions: options.mentions,
        radius: options.radius,
        scale: options.scale,
        wait_time: options.waitTime,
        filename: options.filename,
    };

    if (options.parents !== undefined) {
        input.show_parent_tweets = true;
        input.show_parent_limit = options.parents === true ? -1 : options.parents;
    }

    const errors: string[] = [];
    for (const kind of options.hide ?? []) {
        if (isHideChoice(kind)) input[HIDE_FLAGS[kind]] = true;
        else errors.push(`Unknown --hide value "${kind}" (expected one of: ${HIDE_CHOICES.join(', ')})`);
    }

    // Drop unset flags so schema defaults apply.
    for (const key of Object.keys(input)) {
        if (input[key] === undefined) delete input[key];
    }

    const parsed = CaptureRequestSchema.safeParse(input);
    if (!parsed.success) {
        errors.push(...parsed.error.issues.map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`));
    }
    if (errors.length > 0 || !parsed.success) return { ok: false, errors };
    return { ok: true, request: parsed.data };
}
