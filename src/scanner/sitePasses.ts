import type { Identity, SiteHandle } from '../core/types.js';
import type { ContentStore } from '../store/ContentStore.js';
import { attempt } from '../utils/result.js';
import { getLogger } from '../utils/logging.js';
import { scanFaultsTotal } from '../metrics/index.js';
import type { ScanAccumulator } from './accumulator.js';

// Principal titles treated as a broad grant (case-insensitive substring match)
export const BROAD_GRANT_TITLES = ['Everyone', 'Anyone'] as const;

export function isBroadGrantTitle(title: string): boolean {
  const lowered = title.toLowerCase();
  return BROAD_GRANT_TITLES.some((t) => lowered.includes(t.toLowerCase()));
}

export function isOrphanedGroup(ownerTitle: string | null | undefined): boolean {
  return !ownerTitle || ownerTitle.trim().length === 0;
}

export async function scanWebScope(store: ContentStore, site: SiteHandle, acc: ScanAccumulator) {
  const listed = await attempt(() => store.listWebScopeRoleAssignments(site));
  if (!listed.ok) {
    scanFaultsTotal.inc({ category: 'web_role_assignments' });
    getLogger().warn({ err: listed.error, site: site.url }, 'web-role-assignments-unavailable');
    return;
  }
  for (const ra of listed.value) {
    const member = await attempt<Identity>(() => store.member(ra));
    if (!member.ok) {
      scanFaultsTotal.inc({ category: 'web_role_assignments' });
      getLogger().warn(
        { err: member.error, site: site.url, principalId: ra.principalId },
        'web-role-assignment-member-unavailable',
      );
      continue;
    }
    const identity = member.value;
    if (isBroadGrantTitle(identity.title)) {
      acc.counters.anyoneOrEveryoneAtWeb = true;
      acc.addFinding('Critical', `'Anyone/Everyone' access at web scope: ${identity.title}`, site.url);
    }
    if (identity.kind === 'user') acc.counters.webDirectAssignments += 1;
  }
}

export async function scanGroups(store: ContentStore, site: SiteHandle, acc: ScanAccumulator) {
  const groups = await attempt(() => store.listGroups(site));
  if (!groups.ok) {
    scanFaultsTotal.inc({ category: 'groups' });
    getLogger().warn({ err: groups.error, site: site.url }, 'groups-unavailable');
    return;
  }
  for (const g of groups.value) {
    if (isOrphanedGroup(g.ownerTitle)) acc.counters.orphanedGroups += 1;
  }
}
