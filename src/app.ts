import express, { Application } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import swaggerUi, { JsonObject } from 'swagger-ui-express';
import { readFileSync } from 'fs';
import { join } from 'path';
import yaml from 'js-yaml';
import { env } from '@/config/env';
import { requestLogger } from '@/middlewares/requestLogger';
import { logger } from '@/adapters/logging/LoggerFactory';
import { errorHandler } from '@/middlewares/errorHandler';
import { notFoundHandler } from '@/middlewares/notFound';
import { globalRateLimiter } from '@/middlewares/rateLimiter';
import { metricsMiddleware } from '@/api/middlewares/metricsMiddleware';
import apiRoutes from '@/api/routes';

/**
 * Express Application Setup
 * Configures middleware, routes, and error handlers
 */

const app: Application = express();

// ============================================
// Middleware Configuration
// ============================================

// Only trust X-Forwarded-For when running behind a known proxy
app.set('trust proxy', env.TRUST_PROXY);

// Security headers
app.use(helmet());

// CORS - Disabled in production, any origin without credentials elsewhere
app.use(
  cors({
    origin: env.NODE_ENV === 'production' ? false : '*',
    credentials: false,
  })
);

// Body parser with size limit
app.use(express.json({ limit: '10kb' }));

// HTTP metrics tracking (skips /health and /metrics)
app.use(metricsMiddleware);

// Global rate limiting (skips /health)
app.use(globalRateLimiter);

// Request logging (pino-http)
app.use(requestLogger);

// ============================================
// Routes
// ============================================

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load the OpenAPI document
 * The service still starts without it; only /api-docs is missing then.
 */
function loadOpenApiDocument(): JsonObject | null {
  try {
    const openapiPath = join(__dirname, '../docs/openapi.yaml');
    const document = yaml.load(readFileSync(openapiPath, 'utf8'));
    if (!isJsonObject(document)) {
      logger.warn({ openapiPath }, 'OpenAPI document is not a YAML mapping');
      return null;
    }
    return document;
  } catch (error) {
    logger.warn({ error }, 'Could not load OpenAPI documentation');
    return null;
  }
}

const openapiDocument = loadOpenApiDocument();
if (openapiDocument) {
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(openapiDocument));
}

// Root endpoint
app.get('/', (_req, res) => {
  res.json({
    name: 'User Registry API',
    version: '1.0.0',
    description: 'Create, list and delete users',
    documentation: '/api-docs',
    endpoints: {
      health: '/health',
      metrics: '/metrics',
      createUser: 'POST /user',
      listUsers: 'GET /users',
      deleteUser: 'DELETE /user/:username',
    },
  });
});

app.use(apiRoutes);

// ============================================
// Error Handlers
// ============================================

// 404 handler (must be after all routes)
app.use(notFoundHandler);

// Global error handler (must be last)
app.use(errorHandler);

export default app;
