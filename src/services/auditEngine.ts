import type { AuditReport, ListHandle, ScanConfiguration, SiteHandle } from '../core/types.js';
import { ConnectivityError } from '../core/errors.js';
import type { ContentStore } from '../store/ContentStore.js';
import { ScanAccumulator } from '../scanner/accumulator.js';
import { pageItems } from '../scanner/pagedItems.js';
import { applyInspection, inspectItem } from '../scanner/permissionInspector.js';
import { scanGroups, scanWebScope } from '../scanner/sitePasses.js';
import { assembleReport } from '../scanner/reportAssembler.js';
import { attempt } from '../utils/result.js';
import { getLogger } from '../utils/logging.js';
import {
  budgetExhaustedTotal,
  findingsTotal,
  itemsScannedTotal,
  scanDurationSeconds,
  scanFaultsTotal,
  scansTotal,
} from '../metrics/index.js';

export interface AuditEngineOptions {
  clock?: () => Date;
}

/**
 * Audits one site per call: web-scope pass, group hygiene pass, then every
 * non-hidden list item by item until the item budget runs out. All scan state
 * lives in a fresh accumulator per call; nothing is carried between scans.
 */
export class AuditEngine {
  private clock: () => Date;

  constructor(
    private store: ContentStore,
    opts?: AuditEngineOptions,
  ) {
    this.clock = opts?.clock || (() => new Date());
  }

  async audit(config: ScanConfiguration): Promise<AuditReport> {
    const log = getLogger();
    const start = process.hrtime.bigint();
    log.info(
      { site: config.siteUrl, maxItemsToScan: config.maxItemsToScan, pageSize: config.pageSize },
      'scan-started',
    );

    const connected = await attempt(() => this.store.connect(config.siteUrl));
    if (!connected.ok) {
      scansTotal.inc({ result: 'connect_failed' });
      const err = connected.error;
      throw err instanceof ConnectivityError
        ? err
        : new ConnectivityError(`Failed to connect to ${config.siteUrl}: ${err.message}`, err);
    }
    const site = connected.value;
    const acc = ScanAccumulator.forScan(config);

    await scanWebScope(this.store, site, acc);
    await scanGroups(this.store, site, acc);
    const lists = await this.discoverLists(site, acc);
    for (const list of lists) {
      if (acc.budgetExhausted) break;
      await this.scanList(list, config, acc);
    }

    const report = assembleReport(config, acc, this.clock());
    const seconds = Number(process.hrtime.bigint() - start) / 1e9;
    scanDurationSeconds.observe(seconds);
    scansTotal.inc({ result: 'completed' });
    itemsScannedTotal.inc(report.metrics.totalItemsScanned);
    for (const f of report.findings) findingsTotal.inc({ level: f.level });
    if (acc.budgetExhausted) budgetExhaustedTotal.inc();
    log.info(
      {
        site: config.siteUrl,
        lists: report.metrics.totalLists,
        items: report.metrics.totalItemsScanned,
        uniqueItems: report.metrics.itemsWithUniquePermissions,
        findings: report.findings.length,
        budgetExhausted: acc.budgetExhausted,
        seconds,
      },
      'scan-completed',
    );
    return report;
  }

  private async discoverLists(site: SiteHandle, acc: ScanAccumulator): Promise<ListHandle[]> {
    const lists = await attempt(() => this.store.listNonHiddenLists(site));
    if (!lists.ok) {
      scanFaultsTotal.inc({ category: 'lists' });
      getLogger().warn({ err: lists.error, site: site.url }, 'lists-unavailable');
      return [];
    }
    acc.counters.totalLists += lists.value.length;
    return lists.value;
  }

  private async scanList(list: ListHandle, config: ScanConfiguration, acc: ScanAccumulator) {
    for await (const step of pageItems(this.store, list, config.pageSize, acc)) {
      if (step.kind === 'failed') {
        scanFaultsTotal.inc({ category: 'list_stream' });
        getLogger().warn(
          { err: step.error, list: list.title, pagesRead: step.pagesRead },
          'list-scan-aborted',
        );
        return;
      }
      const inspection = await inspectItem(this.store, step.item, config);
      if (inspection.fault) {
        scanFaultsTotal.inc({ category: 'item_property' });
        getLogger().debug(
          { err: inspection.fault.error, stage: inspection.fault.stage, item: step.item.url },
          'item-inspection-fault',
        );
      }
      applyInspection(acc, list, step.item, inspection);
    }
  }
}
