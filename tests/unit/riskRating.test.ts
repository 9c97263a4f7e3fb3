import { describe, it, expect } from 'vitest';
import { rateReport, DEFAULT_THRESHOLDS } from '../../src/services/riskRating.js';
import { assembleReport } from '../../src/scanner/reportAssembler.js';
import { ScanAccumulator } from '../../src/scanner/accumulator.js';
import type { ScanCounters } from '../../src/scanner/accumulator.js';

function reportWith(counters: Partial<ScanCounters>) {
  const acc = new ScanAccumulator(100000);
  Object.assign(acc.counters, counters);
  return assembleReport(
    Object.freeze({
      siteUrl: 'https://contoso.example/sites/a',
      internalDomains: ['contoso.example'],
      maxItemsToScan: 100000,
      pageSize: 200,
    }),
    acc,
  );
}

describe('rateReport', () => {
  it('returns nothing for a clean site', () => {
    expect(rateReport(reportWith({}))).toEqual([]);
  });

  it('rates every breached threshold, most severe first', () => {
    const ratings = rateReport(
      reportWith({
        anyoneOrEveryoneAtWeb: true,
        externalOwnerPresent: true,
        webDirectAssignments: 3,
        itemsWithUniquePermissions: 251,
        externalUsers: 10,
        orphanedGroups: 2,
      }),
    );
    expect(ratings).toEqual([
      { level: 'Critical', message: "'Anyone/Everyone' access detected at web/site scope." },
      { level: 'Critical', message: 'Guest/external user with Owner role detected.' },
      { level: 'High', message: 'Direct user permissions at web scope: 3' },
      { level: 'High', message: 'Items with unique permissions: 251' },
      { level: 'Medium', message: 'External identities with item-level access: 10' },
      { level: 'Medium', message: 'SharePoint groups without owners: 2' },
    ]);
  });

  it('uses strict and inclusive bounds as configured', () => {
    const ratings = rateReport(reportWith({ itemsWithUniquePermissions: 250, externalUsers: 9 }));
    expect(ratings).toEqual([]);
  });

  it('honours disabled checks and custom limits', () => {
    const ratings = rateReport(
      reportWith({ anyoneOrEveryoneAtWeb: true, externalUsers: 2, orphanedGroups: 1 }),
      {
        ...DEFAULT_THRESHOLDS,
        critical: { anyoneOrEveryone: false, externalOwner: true },
        medium: { externalItemIdentitiesGte: 2, groupWithoutOwner: false },
      },
    );
    expect(ratings).toEqual([
      { level: 'Medium', message: 'External identities with item-level access: 2' },
    ]);
  });
});
