import { randomUUID } from 'node:crypto';

import {
  DEFAULT_QUANTITY,
  type DraftRowChanges,
  type DraftTransferRow,
  type ReferenceData,
  type TransferFormState,
} from './types.js';

export class RowIndexError extends Error {
  index: number;

  constructor(index: number, size: number) {
    super(`Row ${index} does not exist (form has ${size} rows).`);
    this.name = 'RowIndexError';
    this.index = index;
  }
}

const isValidIndex = (state: TransferFormState, index: number): boolean =>
  Number.isInteger(index) && index >= 0 && index < state.rows.length;

const assertIndex = (state: TransferFormState, index: number): void => {
  if (!isValidIndex(state, index)) {
    throw new RowIndexError(index, state.rows.length);
  }
};

export const isRowSelected = (row: DraftTransferRow): boolean => row.partLabel.trim() !== '';

export function addRow(state: TransferFormState, reference: ReferenceData): DraftTransferRow {
  const previous = state.rows.length > 0 ? state.rows[state.rows.length - 1] : undefined;
  const fallbackLocation = reference.locations[0] ?? '';
  const row: DraftTransferRow = {
    id: randomUUID(),
    partLabel: '',
    quantity: DEFAULT_QUANTITY,
    fromLocation: previous?.fromLocation || fallbackLocation,
    toLocation: previous?.toLocation || fallbackLocation,
  };
  state.rows.push(row);
  return row;
}

/**
 * Keeps a blank row at the end of the form: once the last row has a part
 * selected, a fresh row carrying its locations is appended. An emptied form
 * gets a single blank row.
 */
export function applyAutoAdd(state: TransferFormState, reference: ReferenceData): boolean {
  const last = state.rows.length > 0 ? state.rows[state.rows.length - 1] : undefined;
  if (last && !isRowSelected(last)) {
    return false;
  }
  addRow(state, reference);
  return true;
}

export function createFormState(reference: ReferenceData): TransferFormState {
  const state: TransferFormState = { rows: [] };
  addRow(state, reference);
  return state;
}

export function resetFormState(state: TransferFormState, reference: ReferenceData): void {
  state.rows = [];
  addRow(state, reference);
}

export function updateRow(
  state: TransferFormState,
  index: number,
  changes: DraftRowChanges,
  reference: ReferenceData,
): DraftTransferRow {
  assertIndex(state, index);
  const row = state.rows[index];
  if (changes.partLabel !== undefined) row.partLabel = changes.partLabel;
  if (changes.quantity !== undefined) row.quantity = changes.quantity;
  if (changes.fromLocation !== undefined) row.fromLocation = changes.fromLocation;
  if (changes.toLocation !== undefined) row.toLocation = changes.toLocation;
  applyAutoAdd(state, reference);
  return row;
}

export function deleteRows(state: TransferFormState, indices: number[], reference: ReferenceData): DraftTransferRow[] {
  indices.forEach((index) => assertIndex(state, index));

  // Highest position first so earlier removals do not shift later ones.
  const ordered = Array.from(new Set(indices)).sort((a, b) => b - a);
  const removed = ordered.map((index) => state.rows.splice(index, 1)[0]);

  applyAutoAdd(state, reference);
  return removed.reverse();
}

export function deleteRow(state: TransferFormState, index: number, reference: ReferenceData): DraftTransferRow {
  const [removed] = deleteRows(state, [index], reference);
  return removed;
}
