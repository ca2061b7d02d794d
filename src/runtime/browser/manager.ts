/**
 * BrowserManager — owns the process-wide Chromium instance: lazy launch,
 * relaunch after a crash, per-capture contexts and shutdown.
 */

import { chromium, type Browser, type BrowserContext, type BrowserContextOptions, type LaunchOptions } from 'playwright-core';
import { config } from '../../config/index.js';
import { logger } from '../../infra/logger.js';
import { CHROMIUM_ARGS } from './constants.js';

export type BrowserLauncher = (options: LaunchOptions) => Promise<Browser>;

export interface BrowserSettings {
    executablePath?: string;
    headless: boolean;
}

export class BrowserManager {
    private browser: Browser | null = null;
    /** In-flight launch so concurrent ensureRunning() calls share one browser. */
    private launching: Promise<Browser> | null = null;

    constructor(
        private readonly settings: BrowserSettings = config.browser,
        private readonly launch: BrowserLauncher = options => chromium.launch(options),
    ) { }

    get status(): 'connected' | 'idle' {
        return this.browser?.isConnected() ? 'connected' : 'idle';
    }

    /** Return the running browser, launching it if needed. */
    ensureRunning(): Promise<Browser> {
        if (this.browser?.isConnected()) return Promise.resolve(this.browser);
        if (this.launching) return this.launching;
        this.launching = this.doLaunch().finally(() => {
            this.launching = null;
        });
        return this.launching;
    }

    private async doLaunch(): Promise<Browser> {
        logger.info(`Launching Chromium${this.settings.executablePath ? ` from ${this.settings.executablePath}` : ''}...`, 'Browser');
        const browser = await this.launch({
            executablePath: this.settings.executablePath,
            headless: this.settings.headless,
            args: [...CHROMIUM_ARGS],
        });
        browser.on('disconnected', () => {
            if (this.browser === browser) {
                logger.warn('Chromium disconnected; it will be relaunched on the next capture.', 'Browser');
                this.browser = null;
            }
        });
        this.browser = browser;
        logger.success(`Chromium ${browser.version()} ready.`, 'Browser');
        return browser;
    }

    async newContext(options: BrowserContextOptions): Promise<BrowserContext> {
        const browser = await this.ensureRunning();
        return browser.newContext(options);
    }

    async close(): Promise<void> {
        const pending = this.launching;
        if (pending) await pending.catch(() => undefined);
        const browser = this.browser;
        this.browser = null;
        if (browser) await browser.close();
    }
}
