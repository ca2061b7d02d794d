/**
 * HTTP routes for the capture API.
 */

import { Hono } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import { config } from '../config/index.js';
import { logger } from '../infra/logger.js';
import { CaptureRequestSchema, type CaptureResponse, type HealthResponse } from '../capture/schema.js';
import type { CaptureService } from '../capture/service.js';

export interface GatewayDeps {
    service: Pick<CaptureService, 'capture'>;
    browserStatus: () => HealthResponse['browser'];
    now?: () => Date;
}

export function createApp({ service, browserStatus, now = () => new Date() }: GatewayDeps): Hono {
    const app = new Hono();

    app.use('*', requestLogger((message, ...rest) => logger.debug([message, ...rest].join(' '), 'HTTP')));

    app.get('/', (c) => c.json({
        name: 'tweetshot',
        version: config.version,
        description: 'Capture tweets, frame them as square JPEGs, and store them in MinIO',
        endpoints: {
            capture: 'POST /capture',
            health: 'GET /health',
        },
    }));

    app.get('/health', (c) => c.json({
        status: 'healthy',
        timestamp: now().toISOString(),
        browser: browserStatus(),
    } satisfies HealthResponse));

    app.post('/capture', async (c) => {
        let raw: unknown;
        try {
            raw = await c.req.json();
        } catch {
            return c.json({ success: false, message: 'Invalid JSON body' } satisfies CaptureResponse, 400);
        }

        const parsed = CaptureRequestSchema.safeParse(raw);
        if (!parsed.success) {
            const issues = parsed.error.issues.map(issue => ({
                path: issue.path.join('.'),
                message: issue.message,
            }));
            const summary = issues.map(i => (i.path ? `${i.path}: ${i.message}` : i.message)).join('; ');
            return c.json({ success: false, message: `Invalid request: ${summary}`, issues }, 422);
        }

        return c.json(await service.capture(parsed.data));
    });

    app.notFound((c) => c.json({ success: false, message: 'Not found' } satisfies CaptureResponse, 404));

    app.onError((err, c) => {
        logger.error(`Unhandled error on ${c.req.method} ${c.req.path}`, 'Gateway', err);
        return c.json({ success: false, message: 'Internal server error' } satisfies CaptureResponse, 500);
    });

    return app;
}
