import type { DraftRowChanges, ReferenceData } from './types.js';

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; errors: string[] };

export interface DraftRowChangesInput {
  partLabel?: unknown;
  quantity?: unknown;
  fromLocation?: unknown;
  toLocation?: unknown;
}

const EDITABLE_FIELDS = ['partLabel', 'quantity', 'fromLocation', 'toLocation'] as const;

const sanitizeString = (value: unknown): string | undefined => {
  if (typeof value !== 'string') {
    return undefined;
  }
  return value.trim();
};

const sanitizeNonNegativeInteger = (value: unknown): number | undefined => {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    return undefined;
  }
  return value;
};

export const isKnownLocation = (reference: ReferenceData, value: string): boolean =>
  reference.locations.includes(value);

export const isKnownPartLabel = (reference: ReferenceData, value: string): boolean =>
  reference.parts.some((part) => part.label === value);

export const validateRowChanges = (
  input: DraftRowChangesInput,
  reference: ReferenceData,
): ValidationResult<DraftRowChanges> => {
  const errors: string[] = [];
  const data: DraftRowChanges = {};

  if (!EDITABLE_FIELDS.some((field) => input[field] !== undefined)) {
    return {
      success: false,
      errors: ['At least one of partLabel, quantity, fromLocation, toLocation is required.'],
    };
  }

  if (input.partLabel !== undefined) {
    // Labels of parts with a blank name end in the separator's trailing space.
    const partLabel =
      typeof input.partLabel === 'string' && isKnownPartLabel(reference, input.partLabel)
        ? input.partLabel
        : sanitizeString(input.partLabel);
    if (partLabel === undefined) {
      errors.push('partLabel must be a string.');
    } else if (partLabel !== '' && !isKnownPartLabel(reference, partLabel)) {
      errors.push(`Unknown part: ${partLabel}`);
    } else {
      data.partLabel = partLabel;
    }
  }

  if (input.quantity !== undefined) {
    const quantity = sanitizeNonNegativeInteger(input.quantity);
    if (quantity === undefined) {
      errors.push('quantity must be a non-negative integer.');
    } else {
      data.quantity = quantity;
    }
  }

  (['fromLocation', 'toLocation'] as const).forEach((field) => {
    if (input[field] === undefined) {
      return;
    }
    const location = sanitizeString(input[field]);
    if (!location) {
      errors.push(`${field} must be a non-empty string.`);
    } else if (!isKnownLocation(reference, location)) {
      errors.push(`Unknown location for ${field}: ${location}`);
    } else {
      data[field] = location;
    }
  });

  if (errors.length > 0) {
    return { success: false, errors };
  }

  return { success: true, data };
};
