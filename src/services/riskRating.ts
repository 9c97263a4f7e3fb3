import type { AuditReport, RiskRating } from '../core/types.js';
import type { RiskThresholds } from '../config/index.js';

export const DEFAULT_THRESHOLDS: RiskThresholds = {
  critical: { anyoneOrEveryone: true, externalOwner: true },
  high: { directWebPermissions: true, uniqueItemsGt: 250 },
  medium: { externalItemIdentitiesGte: 10, groupWithoutOwner: true },
};

/**
 * Threshold-based ratings over a report's metrics, most severe first. These
 * feed the rendered report only; the report's own findings are untouched.
 */
export function rateReport(
  report: AuditReport,
  thresholds: RiskThresholds = DEFAULT_THRESHOLDS,
): RiskRating[] {
  const m = report.metrics;
  const ratings: RiskRating[] = [];
  if (thresholds.critical.anyoneOrEveryone && m.anyoneOrEveryoneAtWeb) {
    ratings.push({
      level: 'Critical',
      message: "'Anyone/Everyone' access detected at web/site scope.",
    });
  }
  if (thresholds.critical.externalOwner && m.externalOwnerPresent) {
    ratings.push({ level: 'Critical', message: 'Guest/external user with Owner role detected.' });
  }
  if (thresholds.high.directWebPermissions && m.webDirectAssignments > 0) {
    ratings.push({
      level: 'High',
      message: `Direct user permissions at web scope: ${m.webDirectAssignments}`,
    });
  }
  if (m.itemsWithUniquePermissions > thresholds.high.uniqueItemsGt) {
    ratings.push({
      level: 'High',
      message: `Items with unique permissions: ${m.itemsWithUniquePermissions}`,
    });
  }
  if (m.externalUsers >= thresholds.medium.externalItemIdentitiesGte) {
    ratings.push({
      level: 'Medium',
      message: `External identities with item-level access: ${m.externalUsers}`,
    });
  }
  if (thresholds.medium.groupWithoutOwner && m.orphanedGroups > 0) {
    ratings.push({ level: 'Medium', message: `SharePoint groups without owners: ${m.orphanedGroups}` });
  }
  return ratings;
}
