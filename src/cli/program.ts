import fs from 'fs';
import path from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import { loadConfig } from '../config/index.js';
import { getLogger } from '../utils/logging.js';
import { SnapshotContentStore } from '../store/SnapshotContentStore.js';
import { readSitesCsv, runAudit, writeReportFiles } from '../services/auditRunner.js';
import { rateReport } from '../services/riskRating.js';
import { extractEmbeddedReport } from '../rendering/html.js';
import { parseReport } from '../core/reportSchema.js';

const positiveIntSchema = z.coerce.number().int().positive();

function positiveInt(raw: string | undefined, flag: string): number | undefined | null {
  if (raw === undefined) return undefined;
  const parsed = positiveIntSchema.safeParse(raw);
  if (!parsed.success) {
    console.error(`${flag} must be a positive integer`);
    process.exitCode = 2; // validation error
    return null;
  }
  return parsed.data;
}

export function buildProgram(): Command {
  const program = new Command();
  program
    .name('site-audit')
    .description('Point-in-time permission risk audit for content sites (MVP)')
    .version('0.1.0');

  program
    .command('scan')
    .description('Audit one site (--site-url) or every SiteUrl in a CSV file (--csv)')
    .requiredOption('--snapshot <file>', 'Exported site permission snapshot (JSON)')
    .option('--site-url <url>', 'Single site to audit')
    .option('--csv <file>', 'CSV file with a SiteUrl column')
    .option('--internal-domains <domains...>', 'Email domains treated as internal')
    .option('--output <dir>', 'Base directory for run output')
    .option('--max-items <n>', 'Item scan budget per site')
    .option('--batch-size <n>', 'Items requested per page')
    .option('--config <file>', 'Config file path', 'audit.config.json')
    .action(
      async (opts: {
        snapshot: string;
        siteUrl?: string;
        csv?: string;
        internalDomains?: string[];
        output?: string;
        maxItems?: string;
        batchSize?: string;
        config: string;
      }) => {
        if (!!opts.siteUrl === !!opts.csv) {
          console.error('Exactly one of --site-url or --csv is required');
          process.exitCode = 2;
          return;
        }
        const maxItemsToScan = positiveInt(opts.maxItems, '--max-items');
        const pageSize = positiveInt(opts.batchSize, '--batch-size');
        if (maxItemsToScan === null || pageSize === null) return;

        const cfg = loadConfig(opts.config);
        const sites = opts.siteUrl ? [opts.siteUrl] : readSitesCsv(path.resolve(opts.csv ?? ''));
        if (!sites.length) {
          console.error('No sites provided.');
          process.exitCode = 2;
          return;
        }
        const store = SnapshotContentStore.fromFile(path.resolve(opts.snapshot));
        const { runDir, outcomes } = await runAudit({
          sites,
          store,
          config: cfg,
          outputDir: opts.output,
          overrides: { internalDomains: opts.internalDomains, maxItemsToScan, pageSize },
        });
        console.log(
          JSON.stringify(
            {
              runDir,
              sites: outcomes.map((o) => ({
                site: o.site,
                status: o.status,
                dir: o.dir,
                metrics: o.report?.metrics,
                ratings: o.ratings,
                error: o.error,
              })),
            },
            null,
            2,
          ),
        );
        if (outcomes.some((o) => o.status === 'skipped')) process.exitCode = 2; // partial failure
      },
    );

  program
    .command('render')
    .description('Re-render report.md and report.html from an audit.json')
    .requiredOption('--input <file>', 'audit.json produced by scan')
    .option('--output <dir>', 'Target directory (defaults to the input directory)')
    .option('--config <file>', 'Config file path', 'audit.config.json')
    .action((opts: { input: string; output?: string; config: string }) => {
      const cfg = loadConfig(opts.config);
      const input = path.resolve(opts.input);
      const report = parseReport(JSON.parse(fs.readFileSync(input, 'utf8')));
      const dir = path.resolve(opts.output ?? path.dirname(input));
      const written = writeReportFiles(dir, report, rateReport(report, cfg.thresholds), new Date());
      getLogger().info({ written }, 'render-complete');
      console.log(JSON.stringify({ written }, null, 2));
    });

  program
    .command('extract')
    .description('Print the audit report embedded in a rendered report.html')
    .requiredOption('--html <file>', 'Rendered HTML report')
    .action((opts: { html: string }) => {
      const html = fs.readFileSync(path.resolve(opts.html), 'utf8');
      const report = parseReport(extractEmbeddedReport(html));
      console.log(JSON.stringify(report, null, 2));
    });

  return program;
}
