/**
 * CSV Parser/Decoder
 * Turns raw bytes into a lazy, single-pass sequence of numbered `name,email,age` rows.
 *
 * - Bytes must be UTF-8; anything else raises ENCODING_ERROR and ends the import.
 *   A complete buffer is checked before the first row is produced, so a bad
 *   file never gets half imported.
 * - A first row reading `name,email,age` (any case) is a header and is skipped.
 * - Rows csv-parse cannot read, or with the wrong number of fields, come out
 *   as `malformed` and parsing goes on with the next row.
 */

import { CsvError, type Options } from 'csv-parse';
import { parse } from 'csv-parse/sync';
import { CSV_COLUMNS, type RawRow } from '../types/index.js';
import { encodingError } from '../utils/errors.js';

export type CsvSource = Uint8Array | AsyncIterable<Uint8Array>;

const RECORD_OPTIONS: Options = {
  delimiter: ',',
  trim: true,
  skip_empty_lines: true,
  skip_records_with_empty_values: true,
  relax_column_count: true,
  relax_quotes: true,
};

type ParsedRecord =
  | { kind: 'blank' }
  | { kind: 'fields'; fields: string[] }
  | { kind: 'error'; message: string };

/**
 * Decode a complete buffer as UTF-8. The decoder drops a leading BOM.
 */
export function decodeUtf8(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    throw encodingError(error);
  }
}

async function* decodeUtf8Chunks(chunks: AsyncIterable<Uint8Array>): AsyncGenerator<string> {
  const decoder = new TextDecoder('utf-8', { fatal: true });

  const decode = (chunk?: Uint8Array): string => {
    try {
      return chunk ? decoder.decode(chunk, { stream: true }) : decoder.decode();
    } catch (error) {
      throw encodingError(error);
    }
  };

  for await (const chunk of chunks) {
    const text = decode(chunk);
    if (text) yield text;
  }

  const tail = decode();
  if (tail) yield tail;
}

/**
 * Cut decoded text into the text of single records. Line breaks inside a
 * quoted field stay in the record; a quote only opens a field at its start,
 * as csv-parse reads it under `relax_quotes`. A quote that is never closed
 * runs to the end of the input.
 */
export async function* splitRecords(texts: AsyncIterable<string> | Iterable<string>): AsyncGenerator<string> {
  let current = '';
  let inQuotes = false;
  let afterQuote = false;
  let atFieldStart = true;

  for await (const text of texts) {
    for (const char of text) {
      if (inQuotes) {
        current += char;
        if (char === '"') {
          inQuotes = false;
          afterQuote = true;
        }
        continue;
      }

      if (afterQuote) {
        afterQuote = false;
        // "" inside a quoted field
        if (char === '"') {
          current += char;
          inQuotes = true;
          continue;
        }
      }

      if (char === '\n' || char === '\r') {
        if (current) yield current;
        current = '';
        atFieldStart = true;
        continue;
      }

      current += char;
      if (char === ',') {
        atFieldStart = true;
      } else if (char === '"' && atFieldStart) {
        inQuotes = true;
        atFieldStart = false;
      } else if (char !== ' ' && char !== '\t') {
        atFieldStart = false;
      }
    }
  }

  if (current) yield current;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function parseRecord(text: string): ParsedRecord {
  let records: unknown;
  try {
    records = parse(text, RECORD_OPTIONS);
  } catch (error) {
    if (error instanceof CsvError) {
      return { kind: 'error', message: error.message };
    }
    throw error;
  }

  if (!Array.isArray(records) || records.length === 0) {
    return { kind: 'blank' };
  }

  const [fields] = records;
  if (records.length !== 1 || !isStringArray(fields)) {
    return { kind: 'error', message: 'record could not be read as one row' };
  }

  return { kind: 'fields', fields };
}

export function isHeaderRow(fields: string[]): boolean {
  return fields.length === CSV_COLUMNS.length
    && fields.every((field, index) => field.trim().toLowerCase() === CSV_COLUMNS[index]);
}

/**
 * Parse a CSV source into numbered raw rows.
 *
 * Each record goes through csv-parse on its own, so a record it rejects is
 * reported as one malformed row and never takes the rows after it along.
 */
export async function* parseCsvRows(source: CsvSource): AsyncGenerator<RawRow> {
  const texts = source instanceof Uint8Array ? [decodeUtf8(source)] : decodeUtf8Chunks(source);
  let rowNumber = 0;
  let first = true;

  for await (const text of splitRecords(texts)) {
    const parsed = parseRecord(text);
    if (parsed.kind === 'blank') continue;

    if (first) {
      first = false;
      if (parsed.kind === 'fields' && isHeaderRow(parsed.fields)) continue;
    }

    rowNumber += 1;

    if (parsed.kind === 'error') {
      yield { kind: 'malformed', rowNumber, fieldCount: 0, message: parsed.message };
      continue;
    }

    const { fields } = parsed;
    const [name, email, age] = fields;
    if (fields.length !== CSV_COLUMNS.length || name === undefined || email === undefined || age === undefined) {
      yield {
        kind: 'malformed',
        rowNumber,
        fieldCount: fields.length,
        message: `expected ${CSV_COLUMNS.length} fields, found ${fields.length}`,
      };
      continue;
    }

    yield { kind: 'fields', rowNumber, fields: [name, email, age] };
  }
}
