import type { AuditReport, RiskRating } from '../core/types.js';
import { ReportFormatError } from '../core/errors.js';
import { renderMarkdown } from './markdown.js';

const CSS =
  'body{font-family:system-ui,Segoe UI,Roboto,Helvetica,Arial,sans-serif;max-width:960px;margin:2rem auto;padding:0 1rem} ' +
  'h1{font-size:1.8rem} h2{font-size:1.3rem;margin-top:2rem} ' +
  'code,pre{background:#f6f8fa;border:1px solid #eaecef;border-radius:6px;padding:.2rem .4rem} ' +
  'pre{white-space:pre-wrap}';

// Single match over the whole document; attribute order is not significant
const EMBEDDED_REPORT_RE =
  /<script(?=[^>]*\bid=["']report-data["'])(?=[^>]*\btype=["']application\/json["'])[^>]*>(.*?)<\/script>/is;

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

// `<` escaped so no report value can close the script element early
export function embedJson(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

export function renderHtml(
  report: AuditReport,
  ratings: RiskRating[],
  generatedAt: Date = new Date(),
): string {
  const md = renderMarkdown(report, ratings, generatedAt);
  return [
    '<!doctype html>',
    '<html><head><meta charset="utf-8">',
    `<title>Site Permission Audit: ${escapeHtml(report.site)}</title>`,
    `<style>${CSS}</style></head><body>`,
    `<pre>${escapeHtml(md)}</pre>`,
    `<script id="report-data" type="application/json">${embedJson(report)}</script>`,
    '</body></html>',
  ].join('\n');
}

/** Pulls the report JSON back out of a rendered HTML page. */
export function extractEmbeddedReport(html: string): unknown {
  const match = EMBEDDED_REPORT_RE.exec(html);
  if (!match) throw new ReportFormatError('No embedded report-data script found');
  try {
    return JSON.parse(match[1]);
  } catch (err) {
    throw new ReportFormatError('Embedded report-data is not valid JSON', err);
  }
}
