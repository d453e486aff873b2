import { readFileSync } from 'node:fs';
import { parse as parseCSV } from 'csv-parse/sync';
import { z } from 'zod';
import type { InputOptions } from './types.js';

const DEFAULT_HANDLE_COLUMN = 'channel_user';

const csvRowsSchema = z.array(z.record(z.string(), z.string()));

export class InputError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'InputError';
  }
}

function detectHandleColumn(
  rows: readonly Record<string, string>[],
  explicit: string | undefined,
): string {
  const headers = Object.keys(rows[0] ?? {});

  if (explicit) {
    if (!headers.includes(explicit)) {
      throw new InputError(
        `Column "${explicit}" not found. Available columns: ${headers.join(', ')}`,
      );
    }
    return explicit;
  }

  if (headers.includes(DEFAULT_HANDLE_COLUMN)) {
    return DEFAULT_HANDLE_COLUMN;
  }

  const detected = headers.find((header) =>
    rows.some((row) => row[header]?.startsWith('@')),
  );
  if (!detected) {
    throw new InputError(
      `No handle column found. Expected "${DEFAULT_HANDLE_COLUMN}" or a column with @handles`,
    );
  }

  return detected;
}

/**
 * Parses CSV content into the ordered list of handles. Row positions are
 * preserved, so a blank cell still occupies its index.
 */
export function parseInputHandles(
  content: string,
  options?: InputOptions,
): string[] {
  let parsed: unknown;
  try {
    parsed = parseCSV(content, {
      columns: true,
      skip_empty_lines: true,
      bom: true,
      relax_column_count: true,
    });
  } catch (error) {
    throw new InputError('Input is not valid CSV', { cause: error });
  }

  const rows = csvRowsSchema.parse(parsed);
  if (rows.length === 0) {
    return [];
  }

  const column = detectHandleColumn(rows, options?.column);
  return rows.map((row) => (row[column] ?? '').trim());
}

export function loadInputHandles(
  inputPath: string,
  options?: InputOptions,
): string[] {
  let content: string;
  try {
    content = readFileSync(inputPath, 'utf-8');
  } catch (error) {
    throw new InputError(`Cannot read input file ${inputPath}`, {
      cause: error,
    });
  }

  return parseInputHandles(content, options);
}
