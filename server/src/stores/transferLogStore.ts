import fs from 'node:fs';
import path from 'node:path';

import { formatZonedTimestamp } from '../../../shared/datetime/zoned.js';
import { isRowSelected } from '../../../shared/transfers/formState.js';
import { splitPartLabel } from '../../../shared/transfers/labels.js';
import {
  RECENT_TRANSFERS_LIMIT,
  TRANSFER_LOG_COLUMNS,
  type DraftTransferRow,
  type TransferLogColumn,
  type TransferRecord,
} from '../../../shared/transfers/types.js';
import { readCsvFile, writeCsvFile, type CsvTable } from '../lib/csv.js';

export interface AppendTransfersOptions {
  timeZone: string;
  now?: Date;
}

export interface RecentTransfers {
  items: TransferRecord[];
  total: number;
}

export const selectSubmittableRows = (rows: DraftTransferRow[]): DraftTransferRow[] =>
  rows.filter((row) => isRowSelected(row) && row.quantity > 0);

export function toTransferRecord(row: DraftTransferRow, timestamp: { date: string; time: string }): TransferRecord {
  const { code, name } = splitPartLabel(row.partLabel);
  return {
    date: timestamp.date,
    time: timestamp.time,
    itemNo: code,
    itemDescription: name,
    quantity: row.quantity,
    fromLocation: row.fromLocation,
    toLocation: row.toLocation,
  };
}

const toColumnValues = (record: TransferRecord): Record<TransferLogColumn, string> => ({
  Date: record.date,
  Time: record.time,
  'Item No': record.itemNo,
  'Item Description': record.itemDescription,
  Quantity: String(record.quantity),
  'From Location': record.fromLocation,
  'To Location': record.toLocation,
});

const parseQuantity = (value: string | undefined): number => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) ? parsed : 0;
};

const fromColumnValues = (row: Record<string, string>): TransferRecord => ({
  date: row.Date ?? '',
  time: row.Time ?? '',
  itemNo: row['Item No'] ?? '',
  itemDescription: row['Item Description'] ?? '',
  quantity: parseQuantity(row.Quantity),
  fromLocation: row['From Location'] ?? '',
  toLocation: row['To Location'] ?? '',
});

/**
 * Appends the submittable rows to the log and returns the records written.
 * Existing rows are carried over untouched, including columns the log does
 * not know about. Nothing is written when no row qualifies.
 */
export function appendTransfers(
  file: string,
  rows: DraftTransferRow[],
  options: AppendTransfersOptions,
): TransferRecord[] {
  const submittable = selectSubmittableRows(rows);
  if (submittable.length === 0) {
    return [];
  }

  const timestamp = formatZonedTimestamp(options.now ?? new Date(), options.timeZone);
  const records = submittable.map((row) => toTransferRecord(row, timestamp));

  const existing: CsvTable = fs.existsSync(file) ? readCsvFile(file) : { headers: [], rows: [] };
  const headers = [
    ...existing.headers,
    ...TRANSFER_LOG_COLUMNS.filter((column) => !existing.headers.includes(column)),
  ];

  const existingCells = existing.rows.map((row) => headers.map((header) => row[header] ?? ''));
  const newCells = records.map((record) => {
    const values: Record<string, string> = toColumnValues(record);
    return headers.map((header) => values[header] ?? '');
  });

  fs.mkdirSync(path.dirname(file), { recursive: true });
  writeCsvFile(file, headers, [...existingCells, ...newCells]);
  return records;
}

export function readTransferLog(file: string): TransferRecord[] {
  if (!fs.existsSync(file)) {
    return [];
  }
  return readCsvFile(file).rows.map(fromColumnValues);
}

export function readRecentTransfers(file: string, limit = RECENT_TRANSFERS_LIMIT): RecentTransfers {
  const records = readTransferLog(file);
  return {
    items: limit > 0 ? records.slice(-limit) : [],
    total: records.length,
  };
}
