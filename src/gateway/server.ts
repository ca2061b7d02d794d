/**
 * tweetshot Gateway -- wires the browser, capture pipeline and storage
 * together and serves the HTTP API.
 */

import type { EventEmitter } from 'node:events';
import { serve } from '@hono/node-server';
import { config } from '../config/index.js';
import { logger } from '../infra/logger.js';
import { getErrorMessage } from '../infra/errors.js';
import { ConcurrencyLimiter } from '../infra/limiter.js';
import { printBanner, printStatus, printPending, printReady } from '../infra/banner.js';
import { BrowserManager } from '../runtime/browser/manager.js';
import { PlaywrightTweetCapturer } from '../capture/tweet-capture.js';
import { PlaywrightImageFramer } from '../capture/framer.js';
import { CaptureService } from '../capture/service.js';
import { MinioStore } from '../storage/minio-store.js';
import { createApp } from './app.js';

export interface GatewayOptions {
    port?: number;
    host?: string;
}

/**
 * Central gateway: one shared browser, a bounded capture pipeline and
 * the HTTP server in front of it.
 */
export class CaptureGateway {
    private readonly port: number;
    private readonly host: string;
    private readonly browsers = new BrowserManager();
    private readonly store = new MinioStore();
    private readonly service: CaptureService;
    private server: ReturnType<typeof serve> | null = null;

    constructor({ port = config.server.port, host = config.server.host }: GatewayOptions = {}) {
        this.port = port;
        this.host = host;
        this.service = new CaptureService({
            capturer: new PlaywrightTweetCapturer(this.browsers),
            framer: new PlaywrightImageFramer(this.browsers),
            store: this.store,
            limiter: new ConcurrencyLimiter(config.capture.concurrency),
        });
    }

    /** Boot the gateway: make sure the bucket exists, then start listening. */
    public async start() {
        printBanner('Capture API');

        await this.store.ensureBucket();
        printStatus('Storage', `${this.store.bucket} @ ${config.storage.endpoint}`);
        if (config.browser.executablePath) {
            printPending('Browser', `launches on first capture · ${config.browser.executablePath}`);
        } else {
            logger.warn('CHROME_PATH is not set; captures need Playwright browsers installed on this machine.', 'Gateway');
        }
        printStatus('Captures', `${config.capture.concurrency} at a time · jpeg q${config.capture.jpegQuality}`);

        await this.startHttpServer();
        this.registerShutdownHooks();

        printReady(`http://${this.host}:${this.port}`);
        logger.info('tweetshot API started', 'Gateway');
    }

    /** Resolves once the socket is bound; rejects on a bind error such as EADDRINUSE. */
    private startHttpServer(): Promise<void> {
        const app = createApp({
            service: this.service,
            browserStatus: () => this.browsers.status,
        });
        return new Promise((resolve, reject) => {
            const onError = (err: Error) => {
                this.server = null;
                reject(err);
            };
            const server = serve({ fetch: app.fetch, port: this.port, hostname: this.host }, () => {
                events.off('error', onError);
                resolve();
            });
            const events: EventEmitter = server;
            events.once('error', onError);
            this.server = server;
        });
    }

    private closeServer(): Promise<void> {
        const server = this.server;
        this.server = null;
        if (!server) return Promise.resolve();
        return new Promise((resolve, reject) => {
            server.close(err => (err ? reject(err) : resolve()));
        });
    }

    private registerShutdownHooks() {
        let isShuttingDown = false;
        const shutdown = async () => {
            if (isShuttingDown) return;
            isShuttingDown = true;

            logger.info('Shutting down Gateway...', 'Gateway');

            // Force exit after configured timeout if cleanup hangs
            const forceTimeout = setTimeout(() => {
                logger.warn(`Cleanup timed out after ${config.server.shutdownTimeoutMs}ms, forcing exit.`, 'Gateway');
                process.exit(1);
            }, config.server.shutdownTimeoutMs);

            try {
                await this.closeServer();
                await this.browsers.close();
                logger.success('Cleanup complete.', 'Gateway');
            } catch (err) {
                logger.warn(`Error during cleanup: ${getErrorMessage(err)}`, 'Gateway');
            } finally {
                clearTimeout(forceTimeout);
                process.exit(0);
            }
        };

        process.on('SIGINT', shutdown);
        process.on('SIGTERM', shutdown);
    }
}
