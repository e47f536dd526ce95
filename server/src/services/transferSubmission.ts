import { resetFormState } from '../../../shared/transfers/formState.js';
import type { ReferenceData, TransferFormState, TransferRecord } from '../../../shared/transfers/types.js';
import { appendTransfers } from '../stores/transferLogStore.js';

export const EMPTY_SUBMISSION_WARNING = 'No valid transfers to submit. Select a part and a quantity above 0.';

export interface SubmitTransfersOptions {
  transfersFile: string;
  timeZone: string;
  now?: Date;
}

export type SubmitTransfersResult =
  | { status: 'submitted'; records: TransferRecord[] }
  | { status: 'empty'; warning: string; records: TransferRecord[] };

export function submitTransfers(
  state: TransferFormState,
  reference: ReferenceData,
  options: SubmitTransfersOptions,
): SubmitTransfersResult {
  const records = appendTransfers(options.transfersFile, state.rows, {
    timeZone: options.timeZone,
    now: options.now,
  });

  if (records.length === 0) {
    return { status: 'empty', warning: EMPTY_SUBMISSION_WARNING, records };
  }

  resetFormState(state, reference);
  return { status: 'submitted', records };
}
