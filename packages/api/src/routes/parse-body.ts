import { parseModel, ValidationError } from '@semdiff/core';
import type { Model } from '@semdiff/core';

/**
 * Parse one model out of a request body, prefixing validation failures with where it came from
 * (e.g. "ours/entities/0/name").
 */
export function parseBodyModel(value: unknown, label: string): Model {
  try {
    return parseModel(value);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ValidationError(
        `${label}: ${error.message}`,
        `${label}${error.field ?? ''}`,
        error.details,
      );
    }
    throw error;
  }
}
