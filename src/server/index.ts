import Fastify, { FastifyInstance, FastifyError } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import type { Logger } from 'pino';
import type { AuthenticationService } from '../auth/index.js';
import type { EmployeeDirectory } from '../directory/index.js';
import type { KioskStation } from '../station/index.js';
import readerRoutes from './routes/reader.js';
import authRoutes from './routes/auth.js';
import stationRoutes from './routes/station.js';

/**
 * Validate CORS origin - must be empty or a valid URL
 */
function validateCorsOrigin(origin: string | undefined): string | false {
  if (!origin) return false;

  try {
    const url = new URL(origin);
    // Only allow http/https protocols
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return false;
    }
    return origin;
  } catch {
    return false;
  }
}

export interface KioskServerDeps {
  station: KioskStation;
  auth: AuthenticationService;
  directory: EmployeeDirectory;
  stationName: string;
  logger: Logger;
}

export async function createKioskServer(deps: KioskServerDeps): Promise<FastifyInstance> {
  const { station, auth, directory, stationName, logger } = deps;

  const app = Fastify({
    logger: false, // We use our own logger
    bodyLimit: 16384,
  });

  // Security headers
  await app.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        scriptSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:'],
      },
    },
    hsts: false,
    referrerPolicy: { policy: 'no-referrer' },
  });

  // Rate limiting - login is the only route worth hammering, but every API route counts
  const rateLimitMax = parseInt(process.env.RATE_LIMIT_MAX || '120', 10);
  const rateLimitWindow = parseInt(process.env.RATE_LIMIT_WINDOW || '60000', 10);
  await app.register(rateLimit, {
    max: isNaN(rateLimitMax) || rateLimitMax < 1 ? 120 : rateLimitMax,
    timeWindow: isNaN(rateLimitWindow) || rateLimitWindow < 1000 ? 60000 : rateLimitWindow,
    allowList: (request) => !request.url.startsWith('/api/'),
  });

  // CORS - the kiosk UI is served from its own origin, nothing else by default
  await app.register(cors, {
    origin: validateCorsOrigin(process.env.CORS_ORIGIN),
    methods: ['GET', 'POST'],
  });

  // Decorate with dependencies
  app.decorate('station', station);
  app.decorate('authService', auth);
  app.decorate('directory', directory);
  app.decorate('kioskLogger', logger);

  // Request logging
  app.addHook('onRequest', async (request) => {
    logger.debug(
      {
        method: request.method,
        url: request.url,
      },
      'Incoming request'
    );
  });

  // Global error handler
  app.setErrorHandler((error: FastifyError, request, reply) => {
    logger.error(
      {
        err: error,
        method: request.method,
        url: request.url,
      },
      'Request error'
    );

    // Don't expose internal errors to clients
    reply.code(error.statusCode || 500).send({
      error: error.statusCode ? error.message : 'Internal Server Error',
    });
  });

  // Health check endpoint
  app.get('/health', async () => {
    return { status: 'ok', station: stationName, timestamp: new Date().toISOString() };
  });

  // Register routes
  await app.register(readerRoutes);
  await app.register(authRoutes);
  await app.register(stationRoutes);

  return app;
}

// Extend Fastify types
declare module 'fastify' {
  interface FastifyInstance {
    station: KioskStation;
    authService: AuthenticationService;
    directory: EmployeeDirectory;
    kioskLogger: Logger;
  }
}
