/**
 * Matchflow — Tracker Export
 *
 * Serializes tracked records to CSV (one row per record) or JSON.
 */

import type { ExportFormat, TrackedRecord } from '../types';

export const CSV_COLUMNS = [
  'fingerprint',
  'title',
  'link',
  'source',
  'status',
  'created_at',
  'updated_at',
] as const;

type CsvColumn = (typeof CSV_COLUMNS)[number];

/**
 * Quote a field when it holds a comma, a quote or a line break.
 */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function csvRow(record: TrackedRecord): Record<CsvColumn, string> {
  return {
    fingerprint: record.fingerprint,
    title: record.item.title,
    link: record.item.link,
    source: record.item.source,
    status: record.status,
    created_at: record.createdAt,
    updated_at: record.updatedAt,
  };
}

export function exportRecordsAsCsv(records: TrackedRecord[]): string {
  const lines = [CSV_COLUMNS.join(',')];

  for (const record of records) {
    const row = csvRow(record);
    lines.push(CSV_COLUMNS.map(column => escapeCsvField(row[column])).join(','));
  }

  return `${lines.join('\n')}\n`;
}

export function exportRecordsAsJson(
  records: TrackedRecord[],
  options?: { includeMetadata?: boolean; exportedAt?: string }
): string {
  if (!options?.includeMetadata) {
    return JSON.stringify(records, null, 2);
  }

  return JSON.stringify(
    {
      _metadata: {
        exportedAt: options.exportedAt ?? new Date().toISOString(),
        format: 'json',
        count: records.length,
        version: '1.0',
      },
      records,
    },
    null,
    2
  );
}

export function exportRecords(records: TrackedRecord[], format: ExportFormat): string {
  switch (format) {
    case 'csv':
      return exportRecordsAsCsv(records);
    case 'json':
      return exportRecordsAsJson(records);
  }
}
