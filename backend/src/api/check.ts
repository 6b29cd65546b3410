/**
 * Health Check Route
 * GET /check - liveness of the connector service
 */

import type { FastifyPluginAsync } from 'fastify';

export interface HealthStatus {
  status: 'ok';
  service: string;
}

export interface CheckRoutesOptions {
  serviceName: string;
}

// ============================================
// Schemas
// ============================================

const healthStatusSchema = {
  type: 'object',
  required: ['status', 'service'],
  properties: {
    status: { type: 'string', enum: ['ok'] },
    service: { type: 'string' },
  },
} as const;

// ============================================
// Routes
// ============================================

export const checkRoutes: FastifyPluginAsync<CheckRoutesOptions> = async (fastify, options) => {
  /**
   * Health check - MUST NOT BLOCK (container HEALTHCHECK depends on this)
   * GET /check
   */
  fastify.get('/check', {
    schema: {
      summary: 'Health check',
      tags: ['health'],
      response: {
        200: healthStatusSchema,
      },
    },
  }, async (): Promise<HealthStatus> => ({
    status: 'ok',
    service: options.serviceName,
  }));
};
