import Fastify, { FastifyBaseLogger, FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { Environment, getEnvironment } from '../config/environment.js';
import { errorMessage, type ErrorBody } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

// Stored blob names can exceed Fastify's default of 100 characters
const MAX_FILE_NAME_LENGTH = 1024;

export async function createApp(
  env: Environment = getEnvironment(),
  logger: FastifyBaseLogger = createLogger(env),
): Promise<FastifyInstance> {
  const app = Fastify({
    logger,
    maxParamLength: MAX_FILE_NAME_LENGTH,
    requestIdLogLabel: 'reqId',
    disableRequestLogging: false,
    requestIdHeader: 'x-request-id',
  });

  // JSON bodies that fail to parse reach the handler as undefined so the
  // storage check still runs before payload validation
  app.removeContentTypeParser('application/json');
  app.addContentTypeParser<string>(
    'application/json',
    { parseAs: 'string' },
    (request, body, done) => {
      try {
        done(null, JSON.parse(body));
      } catch (error) {
        request.log.debug({ err: error }, 'Unparseable JSON body');
        done(null, undefined);
      }
    },
  );

  // Form posts, binary bodies and bodies without a content type are not JSON
  // payloads; the handler reports them once storage has been checked
  app.addContentTypeParser('*', { parseAs: 'string' }, (_request, _body, done) => {
    done(null, undefined);
  });

  // CORS plugin
  await app.register(cors, {
    origin: env.CORS_ORIGIN === '*' ? true : env.CORS_ORIGIN.split(','),
  });

  // Rate limiting plugin
  await app.register(rateLimit, {
    max: env.RATE_LIMIT_MAX,
    timeWindow: env.RATE_LIMIT_WINDOW,
    errorResponseBuilder: () => ({
      statusCode: 429,
      error: 'Too many requests',
    }),
  });

  // Swagger documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Historical Weather Data API',
        description: 'Stores Open-Meteo archive responses in object storage',
        version: '1.0.0',
      },
      servers: [
        {
          url: `http://localhost:${env.PORT}`,
          description: 'Development server',
        },
      ],
      tags: [
        { name: 'health', description: 'Health check endpoints' },
        { name: 'weather', description: 'Weather archive endpoints' },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/documentation',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  app.setNotFoundHandler((request, reply) => {
    const body: ErrorBody = { error: `Route ${request.method} ${request.url} not found` };
    return reply.status(404).send(body);
  });

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    const { log } = request;

    if (error.statusCode === 429) {
      log.warn({ err: error }, 'Rate limit exceeded');
      const body: ErrorBody = { error: 'Too many requests' };
      return reply.status(429).send(body);
    }

    // Oversized bodies never reach the handler
    if (error.code === 'FST_ERR_CTP_BODY_TOO_LARGE') {
      log.warn({ err: error }, 'Rejected request body');
      const body: ErrorBody = { error: errorMessage({ kind: 'MalformedPayload' }) };
      return reply.status(400).send(body);
    }

    log.error({ err: error }, 'Unexpected error');

    const body: ErrorBody = {
      error: env.NODE_ENV === 'production' ? 'Internal server error' : error.message,
    };
    return reply.status(500).send(body);
  });

  return app;
}
