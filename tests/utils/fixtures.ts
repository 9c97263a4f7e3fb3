import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const SNAPSHOT_PATH = path.resolve(__dirname, '../fixtures/site-snapshot.json');
export const FINANCE_SITE = 'https://contoso.example/sites/finance';
export const HR_SITE = 'https://contoso.example/sites/hr/';

export function loadSnapshotJson(): unknown {
  return JSON.parse(fs.readFileSync(SNAPSHOT_PATH, 'utf8'));
}
