import type { FastifyInstance, FastifyReply } from 'fastify';

import type { TransferTrackerContext } from '../app.js';
import { submitTransfers } from '../services/transferSubmission.js';
import { readRecentTransfers } from '../stores/transferLogStore.js';
import {
  addRow,
  deleteRow,
  deleteRows,
  resetFormState,
  RowIndexError,
  updateRow,
} from '../../../shared/transfers/formState.js';
import type { DraftTransferRow } from '../../../shared/transfers/types.js';
import { validateRowChanges, type DraftRowChangesInput } from '../../../shared/transfers/validation.js';

export interface TransferFormRoutesOptions {
  context: TransferTrackerContext;
}

class ValidationError extends Error {
  errors: string[];

  constructor(errors: string[]) {
    super('Transfer form validation failed');
    this.errors = errors;
  }
}

const INDEX_PATTERN = /^\d+$/;

const parseIndex = (raw: string): number => {
  if (!INDEX_PATTERN.test(raw)) {
    throw new ValidationError([`Row index must be a non-negative integer: ${raw}`]);
  }
  return Number(raw);
};

const parseIndices = (body: unknown): number[] => {
  const indices = typeof body === 'object' && body !== null ? (body as { indices?: unknown }).indices : undefined;
  if (!Array.isArray(indices) || indices.length === 0) {
    throw new ValidationError(['indices must be a non-empty array of row positions.']);
  }
  const parsed: number[] = [];
  indices.forEach((value: unknown) => {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
      throw new ValidationError([`Row index must be a non-negative integer: ${String(value)}`]);
    }
    parsed.push(value);
  });
  return parsed;
};

const toResponse = (rows: DraftTransferRow[]): DraftTransferRow[] => rows.map((row) => ({ ...row }));

const sendFormError = (error: unknown, reply: FastifyReply) => {
  if (error instanceof ValidationError) {
    return reply.status(400).send({ errors: error.errors });
  }
  if (error instanceof RowIndexError) {
    return reply.status(404).send({ error: error.message });
  }
  throw error;
};

export default async function transferFormRoutes(server: FastifyInstance, options: TransferFormRoutesOptions) {
  const { context } = options;
  const { form, reference, config } = context;

  server.get('/', async (_request, reply) => reply.send({ rows: toResponse(form.rows) }));

  server.post('/rows', async (_request, reply) => {
    const row = addRow(form, reference);
    return reply.status(201).send({ row: { ...row }, rows: toResponse(form.rows) });
  });

  server.patch<{ Params: { index: string }; Body: unknown }>('/rows/:index', async (request, reply) => {
    try {
      const index = parseIndex(request.params.index);
      if (typeof request.body !== 'object' || request.body === null) {
        throw new ValidationError(['Request body must be an object.']);
      }
      const validation = validateRowChanges(request.body as DraftRowChangesInput, reference);
      if (!validation.success) {
        throw new ValidationError(validation.errors);
      }
      const row = updateRow(form, index, validation.data, reference);
      return reply.send({ row: { ...row }, rows: toResponse(form.rows) });
    } catch (error) {
      return sendFormError(error, reply);
    }
  });

  server.delete<{ Params: { index: string } }>('/rows/:index', async (request, reply) => {
    try {
      const removed = deleteRow(form, parseIndex(request.params.index), reference);
      return reply.send({ removed: [{ ...removed }], rows: toResponse(form.rows) });
    } catch (error) {
      return sendFormError(error, reply);
    }
  });

  server.post<{ Body: unknown }>('/rows/delete', async (request, reply) => {
    try {
      const removed = deleteRows(form, parseIndices(request.body), reference);
      return reply.send({ removed: toResponse(removed), rows: toResponse(form.rows) });
    } catch (error) {
      return sendFormError(error, reply);
    }
  });

  server.post('/reset', async (_request, reply) => {
    resetFormState(form, reference);
    return reply.send({ rows: toResponse(form.rows) });
  });

  server.post('/submit', async (request, reply) => {
    const result = submitTransfers(form, reference, {
      transfersFile: config.transfersFile,
      timeZone: config.timeZone,
      now: context.clock(),
    });
    const recent = readRecentTransfers(config.transfersFile);

    if (result.status === 'empty') {
      request.log.warn({ rows: form.rows.length }, 'Submit ignored: no valid transfer rows');
      return reply.send({ warning: result.warning, written: 0, rows: toResponse(form.rows), recent: recent.items });
    }

    request.log.info({ written: result.records.length, file: config.transfersFile }, 'Transfers submitted');
    return reply.status(201).send({
      written: result.records.length,
      records: result.records,
      rows: toResponse(form.rows),
      recent: recent.items,
    });
  });
}
