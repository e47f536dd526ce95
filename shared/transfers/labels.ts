import { PART_LABEL_SEPARATOR, type Part } from './types.js';

export const buildPartLabel = (code: string, name: string): string => `${code}${PART_LABEL_SEPARATOR}${name}`;

/**
 * Splits a combined part label back into item number and description.
 * Only the first separator counts, so descriptions may themselves contain " - ".
 * A label without a separator is all code.
 */
export const splitPartLabel = (label: string): { code: string; name: string } => {
  const separatorIndex = label.indexOf(PART_LABEL_SEPARATOR);
  if (separatorIndex < 0) {
    return { code: label, name: '' };
  }
  return {
    code: label.slice(0, separatorIndex),
    name: label.slice(separatorIndex + PART_LABEL_SEPARATOR.length),
  };
};

export const searchParts = (parts: Part[], query: string | undefined, limit?: number): Part[] => {
  const needle = (query ?? '').trim().toLowerCase();
  const matches = needle ? parts.filter((part) => part.label.toLowerCase().includes(needle)) : [...parts];
  if (limit === undefined || !Number.isFinite(limit) || limit <= 0) {
    return matches;
  }
  return matches.slice(0, Math.floor(limit));
};
