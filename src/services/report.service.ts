import dayjs from 'dayjs';
import { compareByActionAndName, resolvePolicyThresholds } from '../lifecycle/classifier';
import {
  AccountKind,
  ClassificationResult,
  LIFECYCLE_ACTIONS,
  LifecycleAction
} from '../lifecycle/types';
import { AccountOutcome, LifecycleRunSummary } from '../types/shared-types';
import { parseOrganizationalUnit } from '../utils/ldap-utils';

export interface OuSummaryRow {
  ou: string;
  total: number;
  counts: Record<LifecycleAction, number>;
}

const KIND_TITLES: Record<AccountKind, string> = {
  computer: 'Computers',
  user: 'Users'
};

const STYLES = `
  body { font-family: Segoe UI, Arial, sans-serif; font-size: 13px; color: #222; }
  h1 { font-size: 18px; margin-bottom: 4px; }
  p.meta { color: #555; margin-top: 0; }
  table { border-collapse: collapse; width: 100%; }
  th { background: #1f4e79; color: #fff; text-align: left; padding: 6px 8px; }
  td { border-bottom: 1px solid #ddd; padding: 4px 8px; vertical-align: top; }
  tr.failed td { background: #f8d7da; }
  tr.highlight td { background: #fff3cd; font-weight: bold; }
  div.alert { background: #f8d7da; border: 1px solid #f5c2c7; padding: 8px; margin: 8px 0; }
`;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function formatReportDate(date: Date | null): string {
  return date ? dayjs(date).format('YYYY-MM-DD') : 'Never';
}

export function emptyActionCounts(): Record<LifecycleAction, number> {
  return { None: 0, Disable: 0, Wait: 0, Remove: 0, Keep: 0, Svc: 0, New: 0 };
}

function wrapDocument(title: string, body: string): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${escapeHtml(title)}</title>`,
    `<style>${STYLES}</style>`,
    '</head>',
    '<body>',
    body,
    '</body>',
    '</html>'
  ].join('\n');
}

function renderTable(headers: string[], rows: Array<{ cells: string[]; className?: string }>): string {
  const head = `<tr>${headers.map(header => `<th>${escapeHtml(header)}</th>`).join('')}</tr>`;
  const body = rows.map(row => {
    const attr = row.className ? ` class="${row.className}"` : '';
    return `<tr${attr}>${row.cells.map(cell => `<td>${escapeHtml(cell)}</td>`).join('')}</tr>`;
  });
  return `<table>\n${head}\n${body.join('\n')}\n</table>`;
}

function detailColumn(result: ClassificationResult): string {
  return result.kind === 'computer'
    ? result.operatingSystem || ''
    : formatReportDate(result.whenCreated);
}

function outcomeText(outcome: AccountOutcome): string {
  return outcome.message ? `${outcome.status}: ${outcome.message}` : outcome.status;
}

export function buildReportSubject(prefix: string, kind: AccountKind, generatedAt: Date): string {
  return `${prefix} - ${KIND_TITLES[kind]} - ${dayjs(generatedAt).format('YYYY-MM-DD')}`;
}

/**
 * Render the per-account report of a run, sorted by action then name
 */
export function renderLifecycleReport(summary: LifecycleRunSummary): string {
  const title = `Account lifecycle report - ${KIND_TITLES[summary.kind]}`;
  const thresholds = resolvePolicyThresholds(summary.policy, summary.startedAt);
  const sorted = [...summary.outcomes].sort((a, b) => compareByActionAndName(a.result, b.result));

  const parts: string[] = [
    `<h1>${escapeHtml(title)}</h1>`,
    `<p class="meta">Generated ${escapeHtml(dayjs(summary.finishedAt).format('YYYY-MM-DD HH:mm'))}` +
      ` | ${summary.applied ? 'Actions applied' : 'Report only'}` +
      ` | Disable after ${summary.policy.disableDays} days (before ${formatReportDate(thresholds.disableDate)})` +
      ` | Remove after ${summary.policy.removeDays} more days (before ${formatReportDate(thresholds.removeDate)})</p>`
  ];

  if (summary.removalAborted) {
    parts.push(
      `<div class="alert">Removals aborted: ${escapeHtml(summary.removalAbortReason || 'archive unavailable')}</div>`
    );
  }

  const totals = LIFECYCLE_ACTIONS
    .filter(action => summary.counts[action] > 0)
    .map(action => `${action}: ${summary.counts[action]}`);
  parts.push(`<p>${escapeHtml(totals.length ? totals.join(', ') : 'No accounts evaluated')}</p>`);

  if (summary.lookupFailures.length > 0) {
    const items = summary.lookupFailures
      .map(failure => `<li>${escapeHtml(failure.name)}: ${escapeHtml(failure.message)}</li>`)
      .join('');
    parts.push(`<p>Accounts not found:</p><ul>${items}</ul>`);
  }

  parts.push(renderTable(
    ['Name', 'Action', 'Outcome', 'Enabled', 'Last logon', summary.kind === 'computer' ? 'Operating system' : 'Created', 'Description'],
    sorted.map(outcome => ({
      className: outcome.status === 'failed' || outcome.status === 'aborted' ? 'failed' : undefined,
      cells: [
        outcome.result.name,
        outcome.result.action,
        outcomeText(outcome),
        outcome.result.enabled ? 'Yes' : 'No',
        formatReportDate(outcome.result.lastLogonDate),
        detailColumn(outcome.result),
        outcome.result.description
      ]
    }))
  ));

  return wrapDocument(title, parts.join('\n'));
}

/**
 * Count actions per organizational unit, ordered by OU name
 */
export function summarizeByOrganizationalUnit(results: readonly ClassificationResult[]): OuSummaryRow[] {
  const rows = new Map<string, OuSummaryRow>();

  for (const result of results) {
    const ou = parseOrganizationalUnit(result.distinguishedName) || '(none)';
    let row = rows.get(ou);
    if (!row) {
      row = { ou, total: 0, counts: emptyActionCounts() };
      rows.set(ou, row);
    }
    row.total++;
    row.counts[result.action]++;
  }

  return Array.from(rows.values()).sort((a, b) => a.ou.localeCompare(b.ou));
}

/**
 * Render per-OU counts; OUs with accounts to disable are highlighted
 */
export function renderOuSummaryReport(kind: AccountKind, rows: readonly OuSummaryRow[], generatedAt: Date): string {
  const title = `Account lifecycle summary by OU - ${KIND_TITLES[kind]}`;
  const table = renderTable(
    ['OU', 'Total', ...LIFECYCLE_ACTIONS],
    rows.map(row => ({
      className: row.counts.Disable > 0 ? 'highlight' : undefined,
      cells: [row.ou, String(row.total), ...LIFECYCLE_ACTIONS.map(action => String(row.counts[action]))]
    }))
  );

  return wrapDocument(title, [
    `<h1>${escapeHtml(title)}</h1>`,
    `<p class="meta">Generated ${escapeHtml(dayjs(generatedAt).format('YYYY-MM-DD HH:mm'))}</p>`,
    table
  ].join('\n'));
}
