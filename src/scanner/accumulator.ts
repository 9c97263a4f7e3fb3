import type { DetailRow, Finding, FindingLevel, ScanConfiguration } from '../core/types.js';

export interface ScanCounters {
  itemsWithUniquePermissions: number;
  externalUsers: number;
  webDirectAssignments: number;
  orphanedGroups: number;
  anyoneOrEveryoneAtWeb: boolean;
  externalOwnerPresent: boolean;
  totalLists: number;
  totalItemsScanned: number;
}

/**
 * Mutable state of one scan invocation. Created empty at scan start, passed by
 * reference to every pass, and frozen into the report at the end. Counters only
 * ever move up; findings and details are append-only in discovery order.
 */
export class ScanAccumulator {
  readonly counters: ScanCounters = {
    itemsWithUniquePermissions: 0,
    externalUsers: 0,
    webDirectAssignments: 0,
    orphanedGroups: 0,
    anyoneOrEveryoneAtWeb: false,
    externalOwnerPresent: false,
    totalLists: 0,
    totalItemsScanned: 0,
  };
  private readonly findingList: Finding[] = [];
  private readonly detailList: DetailRow[] = [];

  constructor(private readonly maxItemsToScan: number) {}

  static forScan(config: ScanConfiguration): ScanAccumulator {
    return new ScanAccumulator(config.maxItemsToScan);
  }

  get budgetExhausted(): boolean {
    return this.counters.totalItemsScanned >= this.maxItemsToScan;
  }

  get findings(): readonly Finding[] {
    return this.findingList;
  }

  get details(): readonly DetailRow[] {
    return this.detailList;
  }

  addFinding(level: FindingLevel, message: string, path?: string) {
    this.findingList.push(path === undefined ? { level, message } : { level, message, path });
  }

  /** Records a visited item and advances the shared budget counter. */
  recordItem(row: DetailRow) {
    this.detailList.push(row);
    this.counters.totalItemsScanned += 1;
  }
}
