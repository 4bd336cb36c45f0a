/**
 * CSV import types
 */

export const CSV_COLUMNS = ['name', 'email', 'age'] as const;

export type RowRejectionReason =
  | 'MalformedRow'
  | 'NameTooShort'
  | 'InvalidEmailFormat'
  | 'AgeNotInteger'
  | 'AgeOutOfRange'
  | 'DuplicateEmail';

/** A data row as it comes out of the parser, numbered from 1 after the header. */
export type RawRow =
  | { kind: 'fields'; rowNumber: number; fields: [string, string, string] }
  | { kind: 'malformed'; rowNumber: number; fieldCount: number; message: string };

export interface AcceptedRow {
  ok: true;
  name: string;
  email: string;
  age: number;
}

export interface RejectedRow {
  ok: false;
  reason: Exclude<RowRejectionReason, 'MalformedRow' | 'DuplicateEmail'>;
  message: string;
}

export type RowValidationResult = AcceptedRow | RejectedRow;

export interface RowRejection {
  row: number;
  reason: RowRejectionReason;
  message: string;
}

export interface ImportReport {
  source: string;
  totalRows: number;
  inserted: number;
  duplicateEmail: number;
  invalid: number;
  rejections: RowRejection[];
}
