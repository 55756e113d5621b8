import type { TrialRecord } from '../types/record.js';

export const CSV_COLUMNS = [
  'sessionId',
  'participantId',
  'boxCount',
  'payoffPerBox',
  'openedCount',
  'bombIndex',
  'outcome',
  'payoff',
  'startedAt',
  'revealedAt',
  'decisionMs',
  'receivedAt'
] as const satisfies readonly (keyof TrialRecord)[];

function cell(v: string | number | null) {
  if (v === null) return '';
  const s = String(v);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function toCsv(rows: TrialRecord[]) {
  const lines = [CSV_COLUMNS.join(',')];
  for (const r of rows) lines.push(CSV_COLUMNS.map(c => cell(r[c])).join(','));
  return lines.join('\n') + '\n';
}
