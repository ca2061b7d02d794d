/**
 * Liveness probe used by the container HEALTHCHECK.
 */

import { logger } from '../infra/logger.js';
import { getErrorMessage } from '../infra/errors.js';

/** True when `url` answers 2xx within `timeoutMs`. */
export async function probeHealth(url: string, timeoutMs: number = 5_000): Promise<boolean> {
    try {
        const res = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
        if (!res.ok) logger.warn(`Health probe got HTTP ${res.status} from ${url}`, 'Health');
        return res.ok;
    } catch (error) {
        logger.warn(`Health probe failed for ${url}: ${getErrorMessage(error)}`, 'Health');
        return false;
    }
}
