import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import { ConfigError } from '../core/errors.js';
import type { ScanConfiguration } from '../core/types.js';

dotenv.config();

export const DEFAULT_MAX_ITEMS_TO_SCAN = 50000;
export const DEFAULT_PAGE_SIZE = 200;

const ScanSchema = z.object({
  internalDomains: z.array(z.string().trim().min(1)).default([]),
  maxItemsToScan: z.number().int().positive().default(DEFAULT_MAX_ITEMS_TO_SCAN),
  pageSize: z.number().int().positive().default(DEFAULT_PAGE_SIZE),
});

const ThresholdsSchema = z.object({
  critical: z
    .object({
      anyoneOrEveryone: z.boolean().default(true),
      externalOwner: z.boolean().default(true),
    })
    .default({}),
  high: z
    .object({
      directWebPermissions: z.boolean().default(true),
      uniqueItemsGt: z.number().int().nonnegative().default(250),
    })
    .default({}),
  medium: z
    .object({
      externalItemIdentitiesGte: z.number().int().nonnegative().default(10),
      groupWithoutOwner: z.boolean().default(true),
    })
    .default({}),
});

const ConfigSchema = z.object({
  scan: ScanSchema,
  thresholds: ThresholdsSchema.default({}),
  output: z.object({
    dir: z.string().min(1),
  }),
  logging: z.object({
    level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
    json: z.boolean().default(true),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type RiskThresholds = z.infer<typeof ThresholdsSchema>;

function envList(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  return raw
    .split(',')
    .map((d) => d.trim())
    .filter((d) => d.length > 0);
}

function envInt(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isNaN(n) ? undefined : n;
}

function section(raw: Record<string, unknown>, key: string): Record<string, unknown> {
  const parsed = z.record(z.unknown()).safeParse(raw[key]);
  return parsed.success ? parsed.data : {};
}

export function loadConfig(configPath = 'audit.config.json'): AppConfig {
  const full = path.resolve(process.cwd(), configPath);
  let fileRaw: Record<string, unknown> = {};
  if (fs.existsSync(full)) {
    try {
      fileRaw = JSON.parse(fs.readFileSync(full, 'utf8'));
    } catch (e) {
      const reason = e instanceof Error ? e.message : String(e);
      throw new ConfigError(`Failed to parse config file ${full}: ${reason}`, e);
    }
  }
  const merged = {
    scan: {
      internalDomains: envList(process.env.AUDIT_INTERNAL_DOMAINS),
      maxItemsToScan: envInt(process.env.AUDIT_MAX_ITEMS),
      pageSize: envInt(process.env.AUDIT_PAGE_SIZE),
      ...section(fileRaw, 'scan'),
    },
    thresholds: section(fileRaw, 'thresholds'),
    output: {
      dir: process.env.AUDIT_OUTPUT_DIR || './audit-runs',
      ...section(fileRaw, 'output'),
    },
    logging: {
      level: process.env.LOG_LEVEL || 'info',
      json: true,
      ...section(fileRaw, 'logging'),
    },
  };
  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${parsed.error.message}`, parsed.error);
  }
  return parsed.data;
}

const ScanOverridesSchema = z.object({
  siteUrl: z.string().trim().min(1),
  internalDomains: z.array(z.string().trim().min(1)).optional(),
  maxItemsToScan: z.number().int().positive().optional(),
  pageSize: z.number().int().positive().optional(),
});

export type ScanOverrides = Omit<z.input<typeof ScanOverridesSchema>, 'siteUrl'>;

/**
 * Per-scan configuration: explicit overrides win over the loaded defaults.
 * The result is frozen for the lifetime of the scan.
 */
export function buildScanConfiguration(
  siteUrl: string,
  overrides: ScanOverrides = {},
  cfg: AppConfig = loadConfig(),
): ScanConfiguration {
  const parsed = ScanOverridesSchema.safeParse({ siteUrl, ...overrides });
  if (!parsed.success) {
    throw new ConfigError(`Invalid scan configuration: ${parsed.error.message}`, parsed.error);
  }
  const o = parsed.data;
  return Object.freeze({
    siteUrl: o.siteUrl,
    internalDomains: Object.freeze([...(o.internalDomains ?? cfg.scan.internalDomains)]),
    maxItemsToScan: o.maxItemsToScan ?? cfg.scan.maxItemsToScan,
    pageSize: o.pageSize ?? cfg.scan.pageSize,
  });
}
