#!/usr/bin/env node
/**
 * tweetshot CLI -- `serve` runs the HTTP API, `capture` renders a single
 * post to a local file (or the bucket), `healthcheck` probes a running instance.
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { writeFile } from 'node:fs/promises';
import path from 'node:path';
import { config } from '../config/index.js';
import { getErrorMessage } from '../infra/errors.js';
import { ConcurrencyLimiter } from '../infra/limiter.js';
import { BrowserManager } from '../runtime/browser/manager.js';
import { PlaywrightTweetCapturer } from '../capture/tweet-capture.js';
import { PlaywrightImageFramer } from '../capture/framer.js';
import { CaptureService } from '../capture/service.js';
import { generateObjectName } from '../capture/filename.js';
import { MinioStore } from '../storage/minio-store.js';
import { probeHealth } from '../gateway/healthcheck.js';
import { buildCaptureRequest, HIDE_CHOICES, type CaptureCliOptions } from './capture-options.js';

function toNumber(value: string): number {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) throw new InvalidArgumentError('Not a number.');
    return parsed;
}

function collect(value: string, previous: string[] = []): string[] {
    return [...previous, value];
}

const program = new Command();

program
    .name('tweetshot')
    .description('Capture Twitter/X posts as square JPEG screenshots.')
    .version(config.version);

program
    .command('serve')
    .description('Start the capture API')
    .option('-p, --port <number>', 'Port to listen on', toNumber, config.server.port)
    .option('-H, --host <address>', 'Address to bind', config.server.host)
    .action(async (options: { port: number; host: string }) => {
        const { CaptureGateway } = await import('../gateway/server.js');
        const gateway = new CaptureGateway({ port: options.port, host: options.host });
        try {
            await gateway.start();
        } catch (err) {
            console.error(`  ${chalk.red('Failed to start:')}`, getErrorMessage(err));
            process.exit(1);
        }
    });

program
    .command('capture')
    .description('Capture a post to a local JPEG, or upload it with --upload')
    .argument('<url>', 'Post URL on x.com or twitter.com')
    .option('-o, --output <file>', 'Output file (default: generated name in the current directory)')
    .option('-u, --upload', 'Upload to the configured bucket and print the API response instead')
    .option('-f, --filename <name>', 'Object name prefix, without extension')
    .option('-m, --mode <n>', 'Display mode 0-4', toNumber)
    .option('-n, --night-mode <n>', 'Theme: 0 light, 1 dim, 2 lights out', toNumber)
    .option('-l, --lang <code>', 'Browser language')
    .option('--parents [limit]', 'Include parent posts, optionally only the nearest <limit>', toNumber)
    .option('--mentions <n>', 'Include the first <n> replies', toNumber)
    .option('-r, --radius <px>', 'Corner radius', toNumber)
    .option('-s, --scale <factor>', 'Device scale factor', toNumber)
    .option('-w, --wait-time <seconds>', 'Extra time for media to load', toNumber)
    .option('--hide <kind>', `Hide media, repeatable (${HIDE_CHOICES.join(', ')})`, collect)
    .action(async (url: string, options: CaptureCliOptions & { output?: string; upload?: boolean }) => {
        const built = buildCaptureRequest(url, options);
        if (!built.ok) {
            for (const error of built.errors) console.error(`  ${chalk.red('x')} ${error}`);
            process.exit(2);
        }

        const browsers = new BrowserManager();
        const store = new MinioStore();
        const service = new CaptureService({
            capturer: new PlaywrightTweetCapturer(browsers),
            framer: new PlaywrightImageFramer(browsers),
            store,
            limiter: new ConcurrencyLimiter(1),
        });

        let exitCode = 0;
        try {
            if (options.upload) {
                await store.ensureBucket();
                const response = await service.capture(built.request);
                console.log(JSON.stringify(response, null, 2));
                if (!response.success) exitCode = 1;
            } else {
                const jpeg = await service.render(built.request);
                const output = path.resolve(options.output ?? generateObjectName(url, built.request.filename));
                await writeFile(output, jpeg);
                console.log(`  ${chalk.green('+')} Saved ${chalk.bold(output)} (${jpeg.length} bytes)`);
            }
        } catch (err) {
            console.error(`  ${chalk.red('Capture failed:')}`, getErrorMessage(err));
            exitCode = 1;
        } finally {
            await browsers.close();
        }
        process.exit(exitCode);
    });

program
    .command('healthcheck')
    .description('Exit 0 when a running instance answers its health endpoint')
    .option('-u, --url <url>', 'Health endpoint', `http://localhost:${config.server.port}/health`)
    .option('-t, --timeout <ms>', 'Request timeout', toNumber, 5_000)
    .action(async (options: { url: string; timeout: number }) => {
        const healthy = await probeHealth(options.url, options.timeout);
        process.exit(healthy ? 0 : 1);
    });

program.parseAsync().catch((err: unknown) => {
    console.error(`  ${chalk.red('Error:')}`, getErrorMessage(err));
    process.exit(1);
});
