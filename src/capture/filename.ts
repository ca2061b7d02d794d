/**
 * Object naming for stored captures.
 */

import { randomUUID } from 'node:crypto';

const STATUS_PATH = /\/(\w+)\/status\/(\d+)/;

const pad = (n: number) => String(n).padStart(2, '0');

/** Local time as YYYYMMDD_HHMMSS. */
export function formatTimestamp(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
        + `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Build the object name for a capture:
 * - `<custom>_<ts>_<id8>.jpg` when a custom name is given
 * - `@<user>_<statusId>_<ts>.jpg` for status URLs
 * - `tweet_<ts>_<id8>.jpg` otherwise
 */
export function generateObjectName(
    tweetUrl: string,
    customName?: string,
    now: Date = new Date(),
    uuid: string = randomUUID(),
): string {
    const timestamp = formatTimestamp(now);
    const shortId = uuid.slice(0, 8);

    if (customName) return `${customName}_${timestamp}_${shortId}.jpg`;

    const match = tweetUrl.match(STATUS_PATH);
    if (match) {
        const [, username, statusId] = match;
        return `@${username}_${statusId}_${timestamp}.jpg`;
    }
    return `tweet_${timestamp}_${shortId}.jpg`;
}
