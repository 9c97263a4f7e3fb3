import type { ItemHandle, ListHandle, ScanConfiguration } from '../core/types.js';
import type { ContentStore } from '../store/ContentStore.js';
import { attempt } from '../utils/result.js';
import { isInternalEmail } from './identityClassifier.js';
import type { ScanAccumulator } from './accumulator.js';

// Raw substring match on the permission-level name; tenant/locale dependent
export const FULL_CONTROL_MARKER = 'Full Control';
export const EXTERNAL_FULL_CONTROL_MESSAGE = 'External identity with Full Control on item';

export type RiskSignal =
  | { kind: 'external-user'; title: string }
  | { kind: 'external-full-control'; title: string; permission: string };

export interface ItemInspection {
  unique: boolean;
  signals: RiskSignal[];
  fault?: { stage: 'unique-flag' | 'role-assignments'; error: Error };
}

/**
 * Reads the permission state of one item. Store faults never escape: an
 * unreadable unique flag counts as inherited, and a fault while walking role
 * assignments ends the walk keeping the signals gathered so far.
 */
export async function inspectItem(
  store: ContentStore,
  item: ItemHandle,
  config: ScanConfiguration,
): Promise<ItemInspection> {
  const flag = await attempt(() => store.hasUniquePermissions(item));
  if (!flag.ok) {
    return { unique: false, signals: [], fault: { stage: 'unique-flag', error: flag.error } };
  }
  const unique = flag.value;
  const signals: RiskSignal[] = [];
  if (!unique) return { unique, signals };

  const walk = await attempt(async () => {
    const assignments = await store.roleAssignments(item);
    for (const ra of assignments) {
      const identity = await store.member(ra);
      // Classified once per assignment; every binding below reuses it
      const isExternal =
        identity.kind === 'user' && !!identity.email
          ? !isInternalEmail(identity.email, config.internalDomains)
          : false;
      if (isExternal) signals.push({ kind: 'external-user', title: identity.title });
      const bindings = await store.permissionBindings(ra);
      for (const binding of bindings) {
        if (binding.name.includes(FULL_CONTROL_MARKER) && isExternal) {
          signals.push({
            kind: 'external-full-control',
            title: identity.title,
            permission: binding.name,
          });
        }
      }
    }
  });
  if (!walk.ok) {
    return { unique, signals, fault: { stage: 'role-assignments', error: walk.error } };
  }
  return { unique, signals };
}

/** Folds one inspection into the scan state and records the item's detail row. */
export function applyInspection(
  acc: ScanAccumulator,
  list: ListHandle,
  item: ItemHandle,
  inspection: ItemInspection,
) {
  if (inspection.unique) acc.counters.itemsWithUniquePermissions += 1;
  for (const signal of inspection.signals) {
    if (signal.kind === 'external-user') {
      acc.counters.externalUsers += 1;
    } else {
      acc.counters.externalOwnerPresent = true;
      acc.addFinding('Critical', EXTERNAL_FULL_CONTROL_MESSAGE, list.url);
    }
  }
  acc.recordItem({ list: list.title, url: item.url, unique: inspection.unique });
}
