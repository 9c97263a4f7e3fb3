import { describe, it, expect } from 'vitest';
import { assembleReport, NO_INTERNAL_DOMAINS_NOTE } from '../../src/scanner/reportAssembler.js';
import { ScanAccumulator } from '../../src/scanner/accumulator.js';
import { parseReport } from '../../src/core/reportSchema.js';
import type { ScanConfiguration } from '../../src/core/types.js';

function config(internalDomains: string[]): ScanConfiguration {
  return Object.freeze({
    siteUrl: 'https://contoso.example/sites/a',
    internalDomains,
    maxItemsToScan: 10,
    pageSize: 5,
  });
}

function populated(): ScanAccumulator {
  const acc = new ScanAccumulator(10);
  acc.counters.totalLists = 2;
  acc.counters.orphanedGroups = 1;
  acc.addFinding(
    'Critical',
    "'Anyone/Everyone' access at web scope: Everyone",
    'https://contoso.example/sites/a',
  );
  acc.addFinding('Critical', 'External identity with Full Control on item', '/sites/a/Docs');
  acc.recordItem({ list: 'Docs', url: '/sites/a/Docs/a.txt', unique: true });
  acc.recordItem({ list: 'Docs', url: '/sites/a/Docs/b.txt', unique: false });
  return acc;
}

describe('assembleReport', () => {
  const at = new Date('2026-03-01T10:15:00.000Z');

  it('wraps the scan outcome in the versioned envelope', () => {
    const report = assembleReport(config(['contoso.example']), populated(), at);
    expect(report.version).toBe('mvp-1');
    expect(report.site).toBe('https://contoso.example/sites/a');
    expect(report.notes).toEqual([]);
    expect(report.metrics).toEqual({
      siteUrl: 'https://contoso.example/sites/a',
      scannedAt: '2026-03-01T10:15:00.000Z',
      itemsWithUniquePermissions: 0,
      externalUsers: 0,
      webDirectAssignments: 0,
      orphanedGroups: 1,
      anyoneOrEveryoneAtWeb: false,
      externalOwnerPresent: false,
      totalLists: 2,
      totalItemsScanned: 2,
    });
    expect(report.findings.map((f) => f.path)).toEqual([
      'https://contoso.example/sites/a',
      '/sites/a/Docs',
    ]);
    expect(report.details).toHaveLength(2);
  });

  it('notes that classification is degraded without internal domains', () => {
    const report = assembleReport(config([]), populated(), at);
    expect(report.notes).toEqual([NO_INTERNAL_DOMAINS_NOTE]);
    expect(report.notes[0]).toMatch(/internal domains not provided/i);
  });

  it('is frozen and detached from the accumulator', () => {
    const acc = populated();
    const report = assembleReport(config([]), acc, at);
    acc.recordItem({ list: 'Docs', url: '/sites/a/Docs/c.txt', unique: false });
    expect(report.details).toHaveLength(2);
    expect(report.metrics.totalItemsScanned).toBe(2);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.metrics)).toBe(true);
    expect(Object.isFrozen(report.findings[0])).toBe(true);
  });

  it('survives a JSON round trip unchanged', () => {
    const report = assembleReport(config([]), populated(), at);
    const parsed = parseReport(JSON.parse(JSON.stringify(report)));
    expect(parsed).toEqual(report);
  });
});
