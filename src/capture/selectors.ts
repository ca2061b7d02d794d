/**
 * DOM selectors for x.com status pages. These track X's markup and are the
 * first thing to check when captures start coming back empty or cluttered.
 */

import type { MediaKind } from './schema.js';

export const TWEET_ARTICLE = 'article[data-testid="tweet"]';

/** The post the status URL points at; parents render above it, replies below. */
export const FOCUSED_TWEET = `${TWEET_ARTICLE}[tabindex="-1"]`;

export const PAGE_CHROME = [
    'header[role="banner"]',
    '[data-testid="sidebarColumn"]',
    '[data-testid="BottomBar"]',
    '#layers',
];

export const MEDIA: Record<MediaKind, string[]> = {
    photos: ['[data-testid="tweetPhoto"]'],
    videos: ['[data-testid="videoPlayer"]', '[data-testid="videoComponent"]'],
    gifs: ['[data-testid="tweetGif"]', '[data-testid="gifPlayer"]'],
    quotes: [`${TWEET_ARTICLE} div[role="link"][tabindex="0"]`],
    linkPreviews: ['[data-testid="card.wrapper"]'],
};

export const ENGAGEMENT_COUNTS = [`${TWEET_ARTICLE} [role="group"]`];

export const TIMESTAMP = [`${FOCUSED_TWEET} a[href*="/status/"]:has(time)`];
