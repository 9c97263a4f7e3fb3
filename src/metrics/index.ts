import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const registry = new Registry();
collectDefaultMetrics({ register: registry });

export const scansTotal = new Counter({
  name: 'audit_scans_total',
  help: 'Site scans by outcome',
  labelNames: ['result'] as const, // result=completed|connect_failed
  registers: [registry],
});

export const itemsScannedTotal = new Counter({
  name: 'audit_items_scanned_total',
  help: 'Items examined across all scans',
  registers: [registry],
});

// category=web_role_assignments|groups|lists|list_stream|item_property|report_write
export const scanFaultsTotal = new Counter({
  name: 'audit_scan_faults_total',
  help: 'Recovered content-store and output faults by category',
  labelNames: ['category'] as const,
  registers: [registry],
});

export const findingsTotal = new Counter({
  name: 'audit_findings_total',
  help: 'Findings recorded by severity level',
  labelNames: ['level'] as const,
  registers: [registry],
});

export const budgetExhaustedTotal = new Counter({
  name: 'audit_budget_exhausted_total',
  help: 'Scans that stopped on the item budget',
  registers: [registry],
});

export const scanDurationSeconds = new Histogram({
  name: 'audit_scan_duration_seconds',
  help: 'Wall time of a single site scan (seconds)',
  buckets: [0.01, 0.1, 0.5, 1, 5, 30, 120, 600],
  registers: [registry],
});
