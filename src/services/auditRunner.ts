import fs from 'fs';
import path from 'path';
import { format } from 'date-fns';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import type { AuditReport, RiskRating } from '../core/types.js';
import { AuditError, ConnectivityError } from '../core/errors.js';
import type { ContentStore } from '../store/ContentStore.js';
import {
  buildScanConfiguration,
  loadConfig,
  type AppConfig,
  type ScanOverrides,
} from '../config/index.js';
import { AuditEngine } from './auditEngine.js';
import { rateReport } from './riskRating.js';
import { renderMarkdown } from '../rendering/markdown.js';
import { renderHtml } from '../rendering/html.js';
import { getLogger } from '../utils/logging.js';
import { scanFaultsTotal } from '../metrics/index.js';

export interface SiteOutcome {
  site: string;
  dir: string;
  status: 'audited' | 'skipped';
  report?: AuditReport;
  ratings?: RiskRating[];
  written: string[];
  error?: string;
}

export interface RunAuditOptions {
  sites: string[];
  store: ContentStore;
  config?: AppConfig;
  overrides?: ScanOverrides;
  outputDir?: string;
  now?: Date;
}

export interface RunResult {
  runDir: string;
  outcomes: SiteOutcome[];
}

export function runStamp(date: Date): string {
  return format(date, 'yyyy-MM-dd_HH-mm-ss');
}

export function safeSiteName(siteUrl: string): string {
  return siteUrl.replace(/^\/+|\/+$/g, '').replace(/[^a-zA-Z0-9._-]+/g, '_');
}

const csvRowsSchema = z.array(z.record(z.string()));

/** Site URLs from the `SiteUrl` column of a CSV file; blank cells are skipped. */
export function readSitesCsv(filePath: string): string[] {
  let rows: z.infer<typeof csvRowsSchema>;
  try {
    rows = csvRowsSchema.parse(
      parse(fs.readFileSync(filePath, 'utf8'), {
        columns: true,
        bom: true,
        trim: true,
        skip_empty_lines: true,
        relax_column_count: true,
      }),
    );
  } catch (err) {
    throw new AuditError(`Failed to read sites CSV ${filePath}`, err);
  }
  const sites: string[] = [];
  for (const row of rows) {
    const cell = row.SiteUrl;
    if (cell) sites.push(cell);
  }
  return sites;
}

/**
 * Writes audit.json, report.md and report.html for one site. A failed write is
 * logged and skipped; the caller keeps the in-memory report either way.
 */
export function writeReportFiles(
  dir: string,
  report: AuditReport,
  ratings: RiskRating[],
  generatedAt: Date,
): string[] {
  const files: [string, () => string][] = [
    ['audit.json', () => JSON.stringify(report, null, 2)],
    ['report.md', () => renderMarkdown(report, ratings, generatedAt)],
    ['report.html', () => renderHtml(report, ratings, generatedAt)],
  ];
  const written: string[] = [];
  for (const [name, render] of files) {
    const target = path.join(dir, name);
    try {
      fs.mkdirSync(dir, { recursive: true });
      fs.writeFileSync(target, render(), 'utf8');
      written.push(target);
    } catch (err) {
      scanFaultsTotal.inc({ category: 'report_write' });
      getLogger().warn({ err, file: target }, 'report-write-failed');
    }
  }
  return written;
}

/**
 * Audits each site in turn into a timestamped run directory. A site whose
 * session cannot be opened is skipped; the remaining sites still run.
 */
export async function runAudit(opts: RunAuditOptions): Promise<RunResult> {
  const cfg = opts.config ?? loadConfig();
  const now = opts.now ?? new Date();
  const runDir = path.resolve(opts.outputDir ?? cfg.output.dir, runStamp(now));
  fs.mkdirSync(runDir, { recursive: true });
  const engine = new AuditEngine(opts.store);
  const outcomes: SiteOutcome[] = [];

  for (const site of opts.sites) {
    const dir = path.join(runDir, `site-${safeSiteName(site)}`);
    try {
      const scanConfig = buildScanConfiguration(site, opts.overrides, cfg);
      const report = await engine.audit(scanConfig);
      const ratings = rateReport(report, cfg.thresholds);
      const written = writeReportFiles(dir, report, ratings, new Date());
      outcomes.push({ site, dir, status: 'audited', report, ratings, written });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      getLogger().error(
        { err, site, connectivity: err instanceof ConnectivityError },
        'site-audit-failed',
      );
      outcomes.push({ site, dir, status: 'skipped', written: [], error: message });
    }
  }
  getLogger().info(
    {
      runDir,
      audited: outcomes.filter((o) => o.status === 'audited').length,
      skipped: outcomes.filter((o) => o.status === 'skipped').length,
    },
    'run-complete',
  );
  return { runDir, outcomes };
}
