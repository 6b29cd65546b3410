/**
 * Connector Service
 * Fastify instance with docs, routes and error handling
 */

import Fastify, { type FastifyError } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';

import { config, type Config } from './config/index.js';
import { createLogger } from './lib/logger.js';

// Routes
import { checkRoutes } from './api/check.js';

const log = createLogger('server');

export interface ErrorBody {
  detail: string;
}

function resolveStatusCode(error: FastifyError): number {
  const { statusCode } = error;
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 600) {
    return statusCode;
  }
  return 500;
}

// ============================================
// Server Setup
// ============================================

export async function buildServer(appConfig: Config = config) {
  const fastify = Fastify({
    logger: false, // We use our own logger
  });

  // Methods per path, for 405 responses. HEAD routes are implied by GET.
  const routeMethods = new Map<string, Set<string>>();

  fastify.addHook('onRoute', (route) => {
    const methods = Array.isArray(route.method) ? route.method : [route.method];
    const known = routeMethods.get(route.url) ?? new Set<string>();
    for (const method of methods) {
      if (method !== 'HEAD') known.add(method);
    }
    routeMethods.set(route.url, known);
  });

  // ============================================
  // Plugins
  // ============================================

  // OpenAPI document and interactive docs
  if (appConfig.docs.enabled) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: appConfig.service.title,
          version: appConfig.service.version,
        },
        servers: [
          { url: `http://localhost:${appConfig.server.port}` },
        ],
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
    });

    fastify.get('/openapi.json', { schema: { hide: true } }, async () => fastify.swagger());
  }

  // ============================================
  // Routes
  // ============================================

  await fastify.register(checkRoutes, { serviceName: appConfig.service.name });

  // ============================================
  // Error Handling
  // ============================================

  fastify.setNotFoundHandler((request, reply) => {
    const [path = request.url] = request.url.split('?');
    const allowed = routeMethods.get(path);

    if (allowed !== undefined && allowed.size > 0) {
      return reply
        .status(405)
        .header('allow', [...allowed].join(', '))
        .send({ detail: 'Method Not Allowed' } satisfies ErrorBody);
    }

    return reply.status(404).send({ detail: 'Not Found' } satisfies ErrorBody);
  });

  fastify.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = resolveStatusCode(error);

    log.error('Request error', {
      error: error.message,
      stack: error.stack,
      url: request.url,
      method: request.method,
    });

    const detail = statusCode >= 500 && !appConfig.server.isDev
      ? 'Internal Server Error'
      : error.message;

    return reply.status(statusCode).send({ detail } satisfies ErrorBody);
  });

  return fastify;
}
