import fs from 'node:fs';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { createFormState, updateRow } from '../../../shared/transfers/formState.js';
import type { DraftTransferRow, ReferenceData } from '../../../shared/transfers/types.js';
import { EMPTY_SUBMISSION_WARNING, submitTransfers } from '../services/transferSubmission.js';
import {
  appendTransfers,
  readRecentTransfers,
  readTransferLog,
  selectSubmittableRows,
} from '../stores/transferLogStore.js';
import { createDataDir, removeDataDir } from './testData.js';

const NOW = new Date(Date.UTC(2024, 4, 31, 23, 30, 5));
const HEADER = 'Date,Time,Item No,Item Description,Quantity,From Location,To Location';
const HISTORY = [
  HEADER,
  '2024-01-02,09:00:00,OLD1,Old part,2,Shelf A,Shelf B',
  '2024-01-03,10:15:00,OLD2,,5,Shelf B,Back Store',
].join('\n');

const reference: ReferenceData = {
  locations: ['Back Store', 'Shelf A', 'Shelf B'],
  parts: [
    { code: 'ABC123', name: 'Widget', label: 'ABC123 - Widget' },
    { code: 'XYZ9', name: 'Gasket', label: 'XYZ9 - Gasket' },
  ],
};

const draft = (partLabel: string, quantity: number, overrides: Partial<DraftTransferRow> = {}): DraftTransferRow => ({
  id: `${partLabel}-${quantity}`,
  partLabel,
  quantity,
  fromLocation: 'Shelf A',
  toLocation: 'Back Store',
  ...overrides,
});

describe('transfer log writer', () => {
  let dataDir = '';
  let logFile = '';

  beforeEach(() => {
    dataDir = createDataDir();
    logFile = path.join(dataDir, 'stock_transfers.csv');
  });

  afterEach(() => {
    removeDataDir(dataDir);
  });

  test('only selected rows with a positive quantity are submittable', () => {
    const rows = [draft('ABC123 - Widget', 3), draft('ABC123 - Widget', 0), draft('', 4), draft('  ', 2)];

    expect(selectSubmittableRows(rows)).toEqual([rows[0]]);
  });

  test('creates the log with a header on first submit', () => {
    const records = appendTransfers(logFile, [draft('ABC123 - Widget', 3), draft('XYZ9 - Gasket', 0), draft('', 1)], {
      timeZone: 'UTC',
      now: NOW,
    });

    expect(records).toEqual([
      {
        date: '2024-05-31',
        time: '23:30:05',
        itemNo: 'ABC123',
        itemDescription: 'Widget',
        quantity: 3,
        fromLocation: 'Shelf A',
        toLocation: 'Back Store',
      },
    ]);
    expect(fs.readFileSync(logFile, 'utf8')).toBe(
      `\uFEFF${HEADER}\n2024-05-31,23:30:05,ABC123,Widget,3,Shelf A,Back Store\n`,
    );
  });

  test('stamps records in the configured time zone', () => {
    const [record] = appendTransfers(logFile, [draft('ABC123 - Widget', 1)], { timeZone: 'Asia/Seoul', now: NOW });

    expect(record.date).toBe('2024-06-01');
    expect(record.time).toBe('08:30:05');
  });

  test('keeps a label without separator as the item number', () => {
    const [record] = appendTransfers(logFile, [draft('LEGACY-77', 2)], { timeZone: 'UTC', now: NOW });

    expect(record.itemNo).toBe('LEGACY-77');
    expect(record.itemDescription).toBe('');
  });

  test('appends after existing history and keeps it intact', () => {
    fs.writeFileSync(logFile, HISTORY, 'utf8');
    const before = readTransferLog(logFile);

    appendTransfers(logFile, [draft('ABC123 - Widget', 3), draft('XYZ9 - Gasket', 6)], { timeZone: 'UTC', now: NOW });
    const after = readTransferLog(logFile);

    expect(before).toHaveLength(2);
    expect(after).toHaveLength(4);
    expect(after.slice(0, 2)).toEqual(before);
    expect(after[1]).toEqual({
      date: '2024-01-03',
      time: '10:15:00',
      itemNo: 'OLD2',
      itemDescription: '',
      quantity: 5,
      fromLocation: 'Shelf B',
      toLocation: 'Back Store',
    });
    expect(after.slice(2).map((record) => record.itemNo)).toEqual(['ABC123', 'XYZ9']);
  });

  test('leaves padded historical cells byte for byte', () => {
    const history = `\uFEFF${HEADER}\n2024-01-02,09:00:00,OLD1," Widget, 3/8 in ",2,Shelf A,Shelf B\n`;
    fs.writeFileSync(logFile, history, 'utf8');

    appendTransfers(logFile, [draft('ABC123 - Widget', 3)], { timeZone: 'UTC', now: NOW });

    expect(fs.readFileSync(logFile, 'utf8')).toBe(
      `${history}2024-05-31,23:30:05,ABC123,Widget,3,Shelf A,Back Store\n`,
    );
    expect(readTransferLog(logFile)[0].itemDescription).toBe(' Widget, 3/8 in ');
  });

  test('carries extra columns of an existing log', () => {
    fs.writeFileSync(logFile, `${HEADER},Note\n2024-01-02,09:00:00,OLD1,Old part,2,Shelf A,Shelf B,recount`, 'utf8');

    appendTransfers(logFile, [draft('XYZ9 - Gasket', 1)], { timeZone: 'UTC', now: NOW });

    expect(fs.readFileSync(logFile, 'utf8')).toBe(
      [
        `\uFEFF${HEADER},Note`,
        '2024-01-02,09:00:00,OLD1,Old part,2,Shelf A,Shelf B,recount',
        '2024-05-31,23:30:05,XYZ9,Gasket,1,Shelf A,Back Store,',
        '',
      ].join('\n'),
    );
  });

  test('writes nothing when no row qualifies', () => {
    const records = appendTransfers(logFile, [draft('', 3), draft('ABC123 - Widget', 0)], { timeZone: 'UTC', now: NOW });

    expect(records).toEqual([]);
    expect(fs.existsSync(logFile)).toBe(false);
  });

  test('reads back the last ten records', () => {
    const lines = Array.from({ length: 12 }, (_, index) => `2024-02-01,08:00:00,P${index},Part ${index},1,Shelf A,Shelf B`);
    fs.writeFileSync(logFile, [HEADER, ...lines].join('\n'), 'utf8');

    const recent = readRecentTransfers(logFile);

    expect(recent.total).toBe(12);
    expect(recent.items.map((record) => record.itemNo)).toEqual([
      'P2', 'P3', 'P4', 'P5', 'P6', 'P7', 'P8', 'P9', 'P10', 'P11',
    ]);
  });

  test('reads an absent log as empty', () => {
    expect(readRecentTransfers(logFile)).toEqual({ items: [], total: 0 });
  });
});

describe('submitTransfers', () => {
  let dataDir = '';
  let logFile = '';

  beforeEach(() => {
    dataDir = createDataDir({ transfers: HISTORY });
    logFile = path.join(dataDir, 'stock_transfers.csv');
  });

  afterEach(() => {
    removeDataDir(dataDir);
  });

  test('appends N records and resets the form to one blank row', () => {
    const state = createFormState(reference);
    updateRow(state, 0, { partLabel: 'ABC123 - Widget', quantity: 2 }, reference);
    updateRow(state, 1, { partLabel: 'XYZ9 - Gasket', quantity: 5, toLocation: 'Shelf B' }, reference);
    expect(state.rows).toHaveLength(3);

    const result = submitTransfers(state, reference, { transfersFile: logFile, timeZone: 'UTC', now: NOW });

    expect(result.status).toBe('submitted');
    expect(result.records).toHaveLength(2);
    expect(readTransferLog(logFile)).toHaveLength(4);
    expect(state.rows).toHaveLength(1);
    expect(state.rows[0]).toMatchObject({ partLabel: '', quantity: 1, fromLocation: 'Back Store', toLocation: 'Back Store' });
  });

  test('warns and keeps the form when nothing is valid', () => {
    const state = createFormState(reference);
    updateRow(state, 0, { partLabel: 'ABC123 - Widget', quantity: 0 }, reference);
    const rowsBefore = state.rows.map((row) => ({ ...row }));

    const result = submitTransfers(state, reference, { transfersFile: logFile, timeZone: 'UTC', now: NOW });

    expect(result).toEqual({ status: 'empty', warning: EMPTY_SUBMISSION_WARNING, records: [] });
    expect(state.rows).toEqual(rowsBefore);
    expect(readTransferLog(logFile)).toHaveLength(2);
  });
});
