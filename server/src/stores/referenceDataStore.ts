import fs from 'node:fs';
import path from 'node:path';
import type { FastifyBaseLogger } from 'fastify';

import { buildPartLabel } from '../../../shared/transfers/labels.js';
import type { Part, ReferenceData } from '../../../shared/transfers/types.js';
import { parseCsv, toCsvTable, type CsvTable } from '../lib/csv.js';

export const LOCATION_COLUMN = 'Bin Location Description';
export const ITEM_CODE_COLUMN = 'Item Code';
export const ITEM_NAME_COLUMN = 'ItemName';

export class ReferenceDataError extends Error {
  file: string;

  constructor(message: string, file: string) {
    super(message);
    this.name = 'ReferenceDataError';
    this.file = file;
  }
}

export interface ReferenceDataFiles {
  locationsFile: string;
  catalogueFile: string;
}

function readTable(file: string): CsvTable {
  if (!fs.existsSync(file)) {
    throw new ReferenceDataError(`Reference file not found: ${file}`, file);
  }
  const [headerRow = [], ...dataRows] = parseCsv(fs.readFileSync(file, 'utf8'));
  return toCsvTable([headerRow.map((header) => header.trim()), ...dataRows]);
}

function requireColumns(table: CsvTable, columns: string[], file: string): void {
  const missing = columns.filter((column) => !table.headers.includes(column));
  if (missing.length > 0) {
    const names = missing.map((column) => `'${column}'`).join(', ');
    throw new ReferenceDataError(`${names} column not found in ${path.basename(file)}.`, file);
  }
}

export function loadLocations(file: string): string[] {
  const table = readTable(file);
  requireColumns(table, [LOCATION_COLUMN], file);

  const unique = new Set<string>();
  table.rows.forEach((row) => {
    const value = (row[LOCATION_COLUMN] ?? '').trim();
    if (value) {
      unique.add(value);
    }
  });

  if (unique.size === 0) {
    throw new ReferenceDataError(`No values in '${LOCATION_COLUMN}' column of ${path.basename(file)}.`, file);
  }

  return Array.from(unique).sort();
}

export function loadParts(file: string): Part[] {
  const table = readTable(file);
  requireColumns(table, [ITEM_CODE_COLUMN, ITEM_NAME_COLUMN], file);

  const byLabel = new Map<string, Part>();
  table.rows.forEach((row) => {
    const code = (row[ITEM_CODE_COLUMN] ?? '').trim();
    if (!code) return;
    const name = (row[ITEM_NAME_COLUMN] ?? '').trim();
    const label = buildPartLabel(code, name);
    if (!byLabel.has(label)) {
      byLabel.set(label, { code, name, label });
    }
  });

  return Array.from(byLabel.values());
}

export function loadReferenceData(files: ReferenceDataFiles, log?: FastifyBaseLogger): ReferenceData {
  const locations = loadLocations(files.locationsFile);
  const parts = loadParts(files.catalogueFile);

  if (parts.length === 0) {
    log?.warn({ file: files.catalogueFile }, 'Part catalogue is empty');
  }
  log?.info({ locations: locations.length, parts: parts.length }, 'Reference data loaded');

  return { locations, parts };
}
