/**
 * Health Probe
 * Client side of GET /check, used by the container HEALTHCHECK
 */

import axios from 'axios';
import { z } from 'zod';
import { createLogger } from './logger.js';

const log = createLogger('health-probe');

const healthyBodySchema = z.object({
  status: z.literal('ok'),
});

export interface ProbeOptions {
  timeoutMs?: number;
}

/**
 * Never rejects: network errors, timeouts, non-200 responses and unexpected
 * bodies all resolve to `false`.
 */
export async function probeHealth(baseUrl: string, { timeoutMs = 3000 }: ProbeOptions = {}): Promise<boolean> {
  const url = `${baseUrl.replace(/\/+$/, '')}/check`;

  try {
    const response = await axios.get<unknown>(url, {
      timeout: timeoutMs,
      validateStatus: () => true,
    });

    if (response.status !== 200) {
      log.warn('Health check returned non-200 status', { url, status: response.status });
      return false;
    }

    const body = healthyBodySchema.safeParse(response.data);
    if (!body.success) {
      log.warn('Health check returned unhealthy body', { url, body: response.data });
      return false;
    }

    return true;
  } catch (error) {
    log.warn('Health check request failed', {
      url,
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
