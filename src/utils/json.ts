// This utility module keeps JSON parse operations safe and explicit.

import { AppError } from './errors.js';

// This helper parses JSON from files and emits a controlled error on malformed content.
export function parseJson(value: string, label: string): unknown {
  try {
    return JSON.parse(value) as unknown;
  } catch (error) {
    throw new AppError(500, 'corrupt_state', `Failed to parse JSON for ${label}.`, {
      originalMessage: error instanceof Error ? error.message : 'unknown'
    });
  }
}
