import type { AuditReport, RiskRating } from '../core/types.js';

export const RECOMMENDATIONS = [
  'Review anonymous sharing & site sharing settings.',
  'Remove direct web permissions where unjustified.',
  'Reduce item-level unique permissions where possible.',
  'Ensure each group has an owner.',
];

export const PII_NOTICE = '_PII notice: contains user emails and access data. Handle per policy._';

export function renderMarkdown(
  report: AuditReport,
  ratings: RiskRating[],
  generatedAt: Date = new Date(),
): string {
  const m = report.metrics;
  const lines = [
    '# Site Permission Audit: Findings & Recommendations',
    '',
    `_Site: ${report.site}_`,
    `_Generated: ${generatedAt.toISOString()}_`,
    '',
    '## Summary',
    '',
    `- Items scanned: **${m.totalItemsScanned}** across **${m.totalLists}** lists`,
    `- Items with unique permissions: **${m.itemsWithUniquePermissions}**`,
    `- External identities (item-level): **${m.externalUsers}**`,
    `- Direct web assignments: **${m.webDirectAssignments}**`,
    `- Groups without owners: **${m.orphanedGroups}**`,
    `- Anyone/Everyone at web/site: **${m.anyoneOrEveryoneAtWeb}**`,
    `- External Owner present: **${m.externalOwnerPresent}**`,
    '',
    '## Risk Ratings',
    '',
  ];
  if (ratings.length) {
    for (const r of ratings) lines.push(`- **${r.level}**: ${r.message}`);
  } else {
    lines.push('- No risks met the configured thresholds.');
  }
  if (report.notes.length) {
    lines.push('', '## Notes', '');
    for (const n of report.notes) lines.push(`- ${n}`);
  }
  if (report.findings.length) {
    lines.push('', '## Findings', '');
    for (const f of report.findings) {
      lines.push(`- **${f.level}**: ${f.message}` + (f.path ? ` (\`${f.path}\`)` : ''));
    }
  }
  lines.push('', '## Recommendations', '');
  for (const r of RECOMMENDATIONS) lines.push(`- ${r}`);
  lines.push('', '---', PII_NOTICE);
  return lines.join('\n');
}
