export interface Part {
  code: string;
  name: string;
  label: string;
}

export interface ReferenceData {
  locations: string[];
  parts: Part[];
}

export interface DraftTransferRow {
  id: string;
  partLabel: string;
  quantity: number;
  fromLocation: string;
  toLocation: string;
}

export type DraftRowChanges = Partial<Omit<DraftTransferRow, 'id'>>;

export interface TransferFormState {
  rows: DraftTransferRow[];
}

export interface TransferRecord {
  date: string;
  time: string;
  itemNo: string;
  itemDescription: string;
  quantity: number;
  fromLocation: string;
  toLocation: string;
}

export const TRANSFER_LOG_COLUMNS = [
  'Date',
  'Time',
  'Item No',
  'Item Description',
  'Quantity',
  'From Location',
  'To Location',
] as const;

export type TransferLogColumn = (typeof TRANSFER_LOG_COLUMNS)[number];

export const DEFAULT_QUANTITY = 1;
export const PART_LABEL_SEPARATOR = ' - ';
export const RECENT_TRANSFERS_LIMIT = 10;
