/**
 * Shared constants for the headless Chromium used by captures.
 */

/** Flags for running Chromium as root inside a slim container. */
export const CHROMIUM_ARGS = [
    '--no-sandbox',
    '--disable-setuid-sandbox',
    '--disable-dev-shm-usage',
    '--disable-gpu',
] as const;

export const X_COOKIE_DOMAINS = ['.x.com', '.twitter.com'] as const;
