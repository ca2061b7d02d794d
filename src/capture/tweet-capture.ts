/**
 * Playwright capturer for x.com status pages. Opens a fresh context per
 * request on the shared browser, hides what the request asks for and
 * screenshots the selected posts as one PNG.
 */

import { errors, type BrowserContext, type BrowserContextOptions, type Page } from 'playwright-core';
import { config } from '../config/index.js';
import { logger } from '../infra/logger.js';
import { CaptureError, getErrorMessage } from '../infra/errors.js';
import type { BrowserManager } from '../runtime/browser/manager.js';
import { X_COOKIE_DOMAINS } from '../runtime/browser/constants.js';
import type { CaptureRequest } from './schema.js';
import type { TweetCapturer } from './types.js';
import { FOCUSED_TWEET, TWEET_ARTICLE } from './selectors.js';
import { hidingCss, selectArticles, unionBox, type Box } from './selection.js';

type CookieInput = Parameters<BrowserContext['addCookies']>[0][number];

export interface CapturerSettings {
    navigationTimeoutMs: number;
    viewport: { width: number; height: number };
}

/** Browser context options derived from the request. */
export function contextOptions(request: CaptureRequest, viewport: CapturerSettings['viewport']): BrowserContextOptions {
    return {
        viewport,
        locale: request.lang,
        deviceScaleFactor: request.scale,
        colorScheme: request.night_mode > 0 ? 'dark' : 'light',
    };
}

/** X reads its theme (0 light, 1 dim, 2 lights out) from this cookie. */
export function nightModeCookies(nightMode: number): CookieInput[] {
    return X_COOKIE_DOMAINS.map((domain): CookieInput => ({
        name: 'night_mode',
        value: String(nightMode),
        domain,
        path: '/',
        secure: true,
        sameSite: 'Lax',
    }));
}

export class PlaywrightTweetCapturer implements TweetCapturer {
    constructor(
        private readonly browsers: Pick<BrowserManager, 'newContext'>,
        private readonly settings: CapturerSettings = config.browser,
    ) { }

    async capture(request: CaptureRequest): Promise<Buffer> {
        const context = await this.browsers.newContext(contextOptions(request, this.settings.viewport));
        try {
            await context.addCookies(nightModeCookies(request.night_mode));
            const page = await context.newPage();
            page.setDefaultNavigationTimeout(this.settings.navigationTimeoutMs);

            await page.goto(request.url, { waitUntil: 'domcontentloaded' });
            await page.locator(FOCUSED_TWEET).first().waitFor({
                state: 'visible',
                timeout: this.settings.navigationTimeoutMs,
            });
            await this.settle(page, request.wait_time * 1000);

            await page.addStyleTag({ content: hidingCss(request) });
            await page.evaluate('window.scrollTo(0, 0)');

            const clip = await this.clipFor(page, request);
            logger.debug(`Clip ${clip.width}x${clip.height} at ${clip.x},${clip.y}`, 'Capture');
            return await page.screenshot({ type: 'png', fullPage: true, clip });
        } catch (error) {
            if (error instanceof CaptureError) throw error;
            throw new CaptureError(`Failed to capture ${request.url}: ${getErrorMessage(error)}`, { cause: error });
        } finally {
            await context.close();
        }
    }

    /** Give late media up to `ms` to finish loading. Running out of time is fine. */
    private async settle(page: Page, ms: number): Promise<void> {
        try {
            await page.waitForLoadState('networkidle', { timeout: ms });
        } catch (error) {
            if (!(error instanceof errors.TimeoutError)) throw error;
            logger.debug(`Network still busy after ${ms}ms, capturing anyway`, 'Capture');
        }
    }

    private async clipFor(page: Page, request: CaptureRequest): Promise<Box> {
        const articles = await page.locator(TWEET_ARTICLE).all();
        let focused = -1;
        for (let i = 0; i < articles.length; i++) {
            if (await articles[i].getAttribute('tabindex') === '-1') {
                focused = i;
                break;
            }
        }
        if (focused === -1) throw new CaptureError(`No post found at ${request.url}`);

        const { start, end } = selectArticles(articles.length, focused, request);
        const boxes: Box[] = [];
        for (const article of articles.slice(start, end)) {
            const box = await article.boundingBox();
            if (box) boxes.push(box);
        }
        if (boxes.length === 0) throw new CaptureError(`Post at ${request.url} is not visible`);
        return unionBox(boxes);
    }
}
