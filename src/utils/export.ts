import type { BatchResult } from '../types.js';

/**
 * Flat serializations of a batch result for spreadsheet download.
 */

export type ExportFormat = 'csv' | 'tsv' | 'json';

export const EXPORT_COLUMNS = [
  'Index',
  'Designation Relevance',
  'How Relevant',
  'Geography',
  'Who Is Relevant Then',
  'Next Step',
] as const;

function toRow(entry: BatchResult[number]): string[] {
  const { verdict } = entry;
  return [
    String(entry.index + 1),
    verdict.tier,
    verdict.rationale,
    verdict.geography ?? '',
    verdict.recommendedTargetPersona ?? '',
    verdict.recommendedNextStep ?? '',
  ];
}

function csvCell(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

function tsvCell(value: string): string {
  return value.replace(/[\t\r\n]+/g, ' ');
}

export function toCsv(result: BatchResult): string {
  const lines = [EXPORT_COLUMNS.map(csvCell).join(',')];
  for (const entry of result) lines.push(toRow(entry).map(csvCell).join(','));
  return lines.join('\r\n') + '\r\n';
}

export function toTsv(result: BatchResult): string {
  const lines = [EXPORT_COLUMNS.join('\t')];
  for (const entry of result) lines.push(toRow(entry).map(tsvCell).join('\t'));
  return lines.join('\n') + '\n';
}

export function toJson(result: BatchResult): string {
  const records = result.map((entry) => ({ index: entry.index, ...entry.verdict }));
  return JSON.stringify(records, null, 2) + '\n';
}

export function serializeBatch(result: BatchResult, format: ExportFormat): string {
  switch (format) {
    case 'csv':
      return toCsv(result);
    case 'tsv':
      return toTsv(result);
    case 'json':
      return toJson(result);
  }
}
