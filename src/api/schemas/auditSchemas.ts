import { z } from 'zod';
import { snapshotSchema } from '../../store/snapshotSchemas.js';

export const createAuditBodySchema = z.object({
  siteUrl: z.string().trim().min(1),
  internalDomains: z.array(z.string().trim().min(1)).optional(),
  maxItemsToScan: z.number().int().positive().optional(),
  pageSize: z.number().int().positive().optional(),
  snapshot: snapshotSchema,
});

export const extractReportBodySchema = z.object({
  html: z.string().min(1),
});
