import Fastify from 'fastify';
import { getLogger } from '../utils/logging.js';
import { auditRoutes, type AuditStats } from './routes/audits.js';
import {
  ConfigError,
  ConnectivityError,
  ReportFormatError,
  SnapshotFormatError,
} from '../core/errors.js';
import { registry } from '../metrics/index.js';

export async function buildServer() {
  const app = Fastify({ logger: getLogger() });
  const stats: AuditStats = { audits: 0, lastAuditCompletedAt: null };

  app.get('/healthz', async () => {
    return {
      status: 'ok',
      time: new Date().toISOString(),
      build: {
        version: process.env.npm_package_version || 'dev',
        node: process.version,
      },
      audits: {
        completed: stats.audits,
        lastCompletedAt: stats.lastAuditCompletedAt?.toISOString() || null,
      },
    };
  });

  app.get('/metrics', async (_req, reply) => {
    const body = await registry.metrics();
    reply.header('Content-Type', registry.contentType);
    return reply.send(body);
  });

  // Unified error handler (fallback)
  app.setErrorHandler((error, _req, reply) => {
    if (error instanceof ConfigError) {
      return reply.status(400).send({ error: { code: 'CONFIG_ERROR', message: error.message } });
    }
    if (error instanceof ConnectivityError) {
      return reply
        .status(502)
        .send({ error: { code: 'CONNECTIVITY_ERROR', message: error.message } });
    }
    if (error instanceof ReportFormatError || error instanceof SnapshotFormatError) {
      return reply
        .status(422)
        .send({ error: { code: 'UNPROCESSABLE', message: error.message } });
    }
    if (isValidationError(error)) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: error.message } });
    }
    app.log.error({ err: error }, 'Unhandled error');
    return reply
      .status(500)
      .send({ error: { code: 'INTERNAL', message: 'Internal Server Error' } });
  });

  await app.register(auditRoutes, { stats });

  function isValidationError(err: unknown): err is { message: string } {
    if (typeof err !== 'object' || err === null) return false;
    return 'validation' in err && 'message' in err && typeof err.message === 'string';
  }
  return app;
}
