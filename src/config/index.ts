/**
 * Centralized configuration -- loads environment variables and provides
 * typed, defaulted access to all tweetshot settings.
 */

import dotenv from 'dotenv';
import path from 'node:path';
import { readFileSync } from 'node:fs';

dotenv.config();

const pkgPath = path.join(process.cwd(), 'package.json');
let version = '0.0.0';
try {
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    version = pkg.version || '0.0.0';
} catch { /* fallback to 0.0.0 */ }

/**
 * Parse a numeric env value, warning and falling back when it is not a
 * finite number or falls outside [min, max].
 */
export function parseNumber(
    name: string,
    raw: string | undefined,
    fallback: number,
    bounds: { min?: number; max?: number } = {},
): number {
    if (raw === undefined || raw.trim() === '') return fallback;
    const value = Number(raw);
    const { min = -Infinity, max = Infinity } = bounds;
    if (!Number.isFinite(value) || value < min || value > max) {
        console.warn(`[Config] Invalid ${name} "${raw}", falling back to ${fallback}.`);
        return fallback;
    }
    return value;
}

export function parseBoolean(raw: string | undefined, fallback: boolean): boolean {
    if (raw === undefined || raw.trim() === '') return fallback;
    return raw.trim().toLowerCase() === 'true';
}

interface Endpoint {
    host: string;
    port?: number;
}

function withPort(host: string, port: string | undefined): Endpoint {
    if (port === undefined) return { host };
    const parsed = Number(port);
    return Number.isInteger(parsed) && parsed > 0 && parsed <= 65535 ? { host, port: parsed } : { host };
}

/**
 * Split "host[:port]" into parts. The port is undefined when absent.
 * A URL scheme is dropped with a warning; IPv6 hosts take the "[::1]:9000" form.
 */
export function parseEndpoint(raw: string, name = 'MINIO_ENDPOINT'): Endpoint {
    let value = raw.trim();
    const scheme = /^[a-z][a-z\d+.-]*:\/\//i.exec(value);
    if (scheme) {
        console.warn(`[Config] ${name} "${raw}" should be host[:port], ignoring "${scheme[0]}".`);
        value = value.slice(scheme[0].length);
    }
    value = value.replace(/\/+$/, '');

    const bracketed = /^\[([^\]]+)\](?::(\d*))?$/.exec(value);
    if (bracketed) return withPort(bracketed[1], bracketed[2]);

    const colon = value.lastIndexOf(':');
    // Bare IPv6 address, no port
    if (colon !== value.indexOf(':')) return { host: value };
    if (colon === -1) return { host: value };
    return withPort(value.slice(0, colon), value.slice(colon + 1));
}

export function formatEndpoint({ host, port }: Endpoint): string {
    const shown = host.includes(':') ? `[${host}]` : host;
    return port === undefined ? shown : `${shown}:${port}`;
}

/** CHROME_DRIVER is accepted as an alias of CHROME_PATH. */
export function browserExecutable(env: NodeJS.ProcessEnv = process.env): string | undefined {
    return env.CHROME_PATH || env.CHROME_DRIVER || undefined;
}

const minioEndpoint = formatEndpoint(parseEndpoint(process.env.MINIO_ENDPOINT || 'localhost:9000'));
const minioSecure = parseBoolean(process.env.MINIO_SECURE, false);

export const config = {
    version,

    server: {
        host: process.env.HOST || '0.0.0.0',
        port: parseNumber('PORT', process.env.PORT, 8000, { min: 1, max: 65535 }),
        /** Timeout for graceful cleanup on shutdown before forcing exit. */
        shutdownTimeoutMs: parseNumber('SHUTDOWN_TIMEOUT_MS', process.env.SHUTDOWN_TIMEOUT_MS, 10_000, { min: 0 }),
    },

    browser: {
        /**
         * Chromium binary. playwright-core bundles no browser, so this is
         * required unless Playwright browsers are installed on the machine.
         */
        executablePath: browserExecutable(),
        headless: parseBoolean(process.env.BROWSER_HEADLESS, true),
        navigationTimeoutMs: parseNumber('CAPTURE_NAV_TIMEOUT_MS', process.env.CAPTURE_NAV_TIMEOUT_MS, 30_000, { min: 1_000 }),
        viewport: { width: 1000, height: 4000 },
    },

    capture: {
        concurrency: parseNumber('CAPTURE_CONCURRENCY', process.env.CAPTURE_CONCURRENCY, 2, { min: 1, max: 32 }),
        jpegQuality: parseNumber('JPEG_QUALITY', process.env.JPEG_QUALITY, 95, { min: 1, max: 100 }),
    },

    storage: {
        endpoint: minioEndpoint,
        accessKey: process.env.MINIO_ACCESS_KEY || 'minioadmin',
        secretKey: process.env.MINIO_SECRET_KEY || 'minioadmin',
        bucket: process.env.MINIO_BUCKET || 'tweetcaptures',
        secure: minioSecure,
        publicEndpoint: process.env.MINIO_PUBLIC_ENDPOINT || `${minioSecure ? 'https' : 'http'}://${minioEndpoint}`,
    },

    logging: {
        level: process.env.LOG_LEVEL || 'info',
        silent: process.env.LOG_SILENT === 'true',
    },
} as const;

export type Config = typeof config;
