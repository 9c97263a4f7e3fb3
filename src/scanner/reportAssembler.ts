import {
  REPORT_VERSION,
  type AuditMetrics,
  type AuditReport,
  type DetailRow,
  type Finding,
  type ScanConfiguration,
} from '../core/types.js';
import type { ScanCounters } from './accumulator.js';

export const NO_INTERNAL_DOMAINS_NOTE =
  'Internal domains not provided: every user identity is treated as external.';

export interface ScanOutcome {
  counters: Readonly<ScanCounters>;
  details: readonly DetailRow[];
  findings: readonly Finding[];
}

/**
 * Freezes a scan outcome into the versioned report. `scannedAt` is the moment
 * of assembly, i.e. when scanning concluded.
 */
export function assembleReport(
  config: ScanConfiguration,
  outcome: ScanOutcome,
  scannedAt: Date = new Date(),
): AuditReport {
  const metrics: Readonly<AuditMetrics> = Object.freeze({
    siteUrl: config.siteUrl,
    scannedAt: scannedAt.toISOString(),
    itemsWithUniquePermissions: outcome.counters.itemsWithUniquePermissions,
    externalUsers: outcome.counters.externalUsers,
    webDirectAssignments: outcome.counters.webDirectAssignments,
    orphanedGroups: outcome.counters.orphanedGroups,
    anyoneOrEveryoneAtWeb: outcome.counters.anyoneOrEveryoneAtWeb,
    externalOwnerPresent: outcome.counters.externalOwnerPresent,
    totalLists: outcome.counters.totalLists,
    totalItemsScanned: outcome.counters.totalItemsScanned,
  });
  const notes: string[] = [];
  if (config.internalDomains.length === 0) notes.push(NO_INTERNAL_DOMAINS_NOTE);
  return Object.freeze({
    version: REPORT_VERSION,
    site: config.siteUrl,
    metrics,
    notes: Object.freeze(notes),
    details: Object.freeze(outcome.details.map((d) => Object.freeze({ ...d }))),
    findings: Object.freeze(outcome.findings.map((f) => Object.freeze({ ...f }))),
  });
}
