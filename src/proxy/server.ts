import Fastify, { FastifyInstance, FastifyError } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import type { Logger } from 'pino';
import type { Config } from '../config/index.js';
import type { AuthGuard } from '../auth/index.js';
import type { UpstreamClient } from '../upstream/client.js';

/**
 * Resolve the CORS origin setting.
 * '*' allows any origin, an empty value disables CORS, anything else must be
 * a comma-separated list of http(s) origins.
 */
export function resolveCorsOrigin(setting: string | undefined): string | string[] | false {
  if (!setting) return false;
  if (setting.trim() === '*') return '*';

  const origins = setting
    .split(',')
    .map((o) => o.trim())
    .filter((o) => {
      try {
        const url = new URL(o);
        // Only allow http/https protocols
        return url.protocol === 'http:' || url.protocol === 'https:';
      } catch {
        return false;
      }
    });

  return origins.length > 0 ? origins : false;
}

export interface GatewayServerDeps {
  config: Readonly<Config>;
  authGuard: AuthGuard;
  upstream: Pick<UpstreamClient, 'check' | 'chat'>;
  logger: Logger;
}

export async function createGatewayServer(deps: GatewayServerDeps): Promise<FastifyInstance> {
  const { config, authGuard, upstream, logger } = deps;

  const app = Fastify({
    logger: false, // We use our own logger
    bodyLimit: config.gateway.body_limit,
  });

  // Security headers; the gateway serves JSON only
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        frameAncestors: ["'none'"],
      },
    },
    hsts:
      process.env.NODE_ENV === 'production'
        ? { maxAge: 60 * 60 * 24 * 180, includeSubDomains: true, preload: false }
        : false,
    referrerPolicy: { policy: 'no-referrer' },
  });

  await app.register(cors, {
    origin: resolveCorsOrigin(config.gateway.cors_origin),
    credentials: true,
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });

  // Decorate with dependencies
  app.decorate('gatewayConfig', config);
  app.decorate('authGuard', authGuard);
  app.decorate('upstream', upstream);
  app.decorate('gatewayLogger', logger);

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.debug({ method: request.method, url: request.url }, 'Incoming request');
  });

  app.addHook('onResponse', async (request, reply) => {
    logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTimeMs: Math.round(reply.elapsedTime),
      },
      'Request completed'
    );
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;

    logger.error(
      {
        err: error,
        method: request.method,
        url: request.url,
        statusCode,
      },
      'Request error'
    );

    // Don't expose internal errors to clients
    if (statusCode >= 500) {
      return reply.code(500).send({ message: 'Internal Server Error', error: 'Internal Server Error' });
    }
    return reply.code(statusCode).send({ message: 'Request Error', error: error.message });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.code(404).send({ message: 'Not Found', error: `Route ${request.method} ${request.url} not found` });
  });

  // Register routes
  await app.register(import('./routes/health.js'));
  await app.register(import('./routes/query.js'));

  return app;
}

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    gatewayConfig: Readonly<Config>;
    authGuard: AuthGuard;
    upstream: Pick<UpstreamClient, 'check' | 'chat'>;
    gatewayLogger: Logger;
  }
}
