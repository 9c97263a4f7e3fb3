import { describe, it, expect } from 'vitest';
import {
  isBroadGrantTitle,
  isOrphanedGroup,
  scanGroups,
  scanWebScope,
} from '../../src/scanner/sitePasses.js';
import { ScanAccumulator } from '../../src/scanner/accumulator.js';
import { FakeContentStore, user } from '../utils/fakeStore.js';

const site = { url: 'https://contoso.example/sites/a' };

describe('broad grant titles', () => {
  it('matches Everyone and Anyone anywhere in the title, any case', () => {
    expect(isBroadGrantTitle('Everyone')).toBe(true);
    expect(isBroadGrantTitle('Everyone except external users')).toBe(true);
    expect(isBroadGrantTitle('ANYONE with the link')).toBe(true);
    expect(isBroadGrantTitle('Site Members')).toBe(false);
  });
});

describe('orphaned groups', () => {
  it('counts absent, empty and whitespace-only owner titles', () => {
    expect(isOrphanedGroup(undefined)).toBe(true);
    expect(isOrphanedGroup(null)).toBe(true);
    expect(isOrphanedGroup('')).toBe(true);
    expect(isOrphanedGroup('   ')).toBe(true);
    expect(isOrphanedGroup('Site Owners')).toBe(false);
  });
});

describe('scanWebScope', () => {
  it('flags broad grants and counts direct user assignments', async () => {
    const store = new FakeContentStore({
      url: site.url,
      webAssignments: [
        { identity: { title: 'Everyone', kind: 'group' }, bindings: ['Read'] },
        { identity: user('Dana', 'dana@contoso.example'), bindings: ['Edit'] },
        { identity: { title: 'Site Owners', kind: 'group' }, bindings: ['Full Control'] },
        { identity: user('Anyone Guest'), bindings: ['Read'] },
      ],
    });
    const acc = new ScanAccumulator(10);
    await scanWebScope(store, site, acc);
    expect(acc.counters.anyoneOrEveryoneAtWeb).toBe(true);
    expect(acc.counters.webDirectAssignments).toBe(2);
    expect(acc.findings).toEqual([
      { level: 'Critical', message: "'Anyone/Everyone' access at web scope: Everyone", path: site.url },
      {
        level: 'Critical',
        message: "'Anyone/Everyone' access at web scope: Anyone Guest",
        path: site.url,
      },
    ]);
  });

  it('treats an unreadable web scope as no assignments', async () => {
    const store = new FakeContentStore({ url: site.url, webAssignments: new Error('denied') });
    const acc = new ScanAccumulator(10);
    await scanWebScope(store, site, acc);
    expect(acc.counters.anyoneOrEveryoneAtWeb).toBe(false);
    expect(acc.counters.webDirectAssignments).toBe(0);
    expect(acc.findings).toEqual([]);
  });

  it('skips a single assignment whose member cannot be resolved', async () => {
    const store = new FakeContentStore({
      url: site.url,
      webAssignments: [
        { identity: new Error('gone'), bindings: ['Read'] },
        { identity: user('Dana'), bindings: ['Read'] },
      ],
    });
    const acc = new ScanAccumulator(10);
    await scanWebScope(store, site, acc);
    expect(acc.counters.webDirectAssignments).toBe(1);
  });
});

describe('scanGroups', () => {
  it('counts groups without an owner', async () => {
    const store = new FakeContentStore({
      url: site.url,
      groups: [
        { title: 'Owners', ownerTitle: 'Owners' },
        { title: 'Visitors', ownerTitle: '   ' },
        { title: 'Legacy' },
      ],
    });
    const acc = new ScanAccumulator(10);
    await scanGroups(store, site, acc);
    expect(acc.counters.orphanedGroups).toBe(2);
  });

  it('treats an unreadable group collection as zero groups', async () => {
    const store = new FakeContentStore({ url: site.url, groups: new Error('denied') });
    const acc = new ScanAccumulator(10);
    await scanGroups(store, site, acc);
    expect(acc.counters.orphanedGroups).toBe(0);
  });
});
