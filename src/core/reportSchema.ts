import { z } from 'zod';
import { REPORT_VERSION, type AuditReport } from './types.js';
import { ReportFormatError } from './errors.js';

export const findingSchema = z.object({
  level: z.enum(['Critical', 'High', 'Medium', 'Low']),
  message: z.string(),
  path: z.string().optional(),
});

export const auditReportSchema = z.object({
  version: z.literal(REPORT_VERSION),
  site: z.string(),
  metrics: z.object({
    siteUrl: z.string(),
    scannedAt: z.string().datetime(),
    itemsWithUniquePermissions: z.number().int().nonnegative(),
    externalUsers: z.number().int().nonnegative(),
    webDirectAssignments: z.number().int().nonnegative(),
    orphanedGroups: z.number().int().nonnegative(),
    anyoneOrEveryoneAtWeb: z.boolean(),
    externalOwnerPresent: z.boolean(),
    totalLists: z.number().int().nonnegative(),
    totalItemsScanned: z.number().int().nonnegative(),
  }),
  notes: z.array(z.string()),
  details: z.array(z.object({ list: z.string(), url: z.string(), unique: z.boolean() })),
  findings: z.array(findingSchema),
});

export function parseReport(raw: unknown): AuditReport {
  const parsed = auditReportSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ReportFormatError(`Not an audit report: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}
