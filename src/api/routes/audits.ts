import type { FastifyInstance } from 'fastify';
import { createAuditBodySchema, extractReportBodySchema } from '../schemas/auditSchemas.js';
import { SnapshotContentStore } from '../../store/SnapshotContentStore.js';
import { AuditEngine } from '../../services/auditEngine.js';
import { rateReport } from '../../services/riskRating.js';
import { buildScanConfiguration, loadConfig } from '../../config/index.js';
import { extractEmbeddedReport } from '../../rendering/html.js';
import { parseReport } from '../../core/reportSchema.js';

export interface AuditStats {
  audits: number;
  lastAuditCompletedAt: Date | null;
}

export interface AuditRoutesOptions {
  stats: AuditStats;
}

export async function auditRoutes(app: FastifyInstance, opts: AuditRoutesOptions) {
  app.post('/v1/audits', async (req, reply) => {
    const parsed = createAuditBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
    }
    const { snapshot, siteUrl, ...overrides } = parsed.data;
    const cfg = loadConfig();
    const scanConfig = buildScanConfiguration(siteUrl, overrides, cfg);
    const engine = new AuditEngine(new SnapshotContentStore(snapshot));
    const report = await engine.audit(scanConfig);
    opts.stats.audits += 1;
    opts.stats.lastAuditCompletedAt = new Date();
    return reply.status(200).send({ report, ratings: rateReport(report, cfg.thresholds) });
  });

  app.post('/v1/reports/extract', async (req, reply) => {
    const parsed = extractReportBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply
        .status(400)
        .send({ error: { code: 'VALIDATION_ERROR', message: parsed.error.message } });
    }
    const report = parseReport(extractEmbeddedReport(parsed.data.html));
    return { report };
  });
}
