/**
 * Import Engine
 * Runs one CSV file through parsing, validation and persistence and reports
 * what happened to every row.
 *
 * Rows are handled one at a time in file order. Row-level problems are
 * counted and listed in the report; only ENCODING_ERROR, STORE_UNAVAILABLE
 * and TIMEOUT abort an import. Rows inserted before an abort stay inserted.
 */

import type { CustomerStore, ImportReport, RowRejectionReason } from '../types/index.js';
import { parseCsvRows, type CsvSource } from './csvParser.js';
import { validateRow } from './rowValidator.js';
import { timeoutError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';
import { logger } from '../utils/logger.js';

export interface ImportEngineOptions {
  /** Budget for a whole import, in milliseconds. */
  timeoutMs: number;
}

const DEFAULT_OPTIONS: ImportEngineOptions = {
  timeoutMs: 60_000,
};

export function emptyReport(source: string): ImportReport {
  return {
    source,
    totalRows: 0,
    inserted: 0,
    duplicateEmail: 0,
    invalid: 0,
    rejections: [],
  };
}

function reject(report: ImportReport, row: number, reason: RowRejectionReason, message: string): void {
  if (reason === 'DuplicateEmail') {
    report.duplicateEmail += 1;
  } else {
    report.invalid += 1;
  }
  report.rejections.push({ row, reason, message });
}

export class ImportEngine {
  private options: ImportEngineOptions;

  constructor(
    private store: CustomerStore,
    options: Partial<ImportEngineOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async import(source: CsvSource, sourceLabel: string): Promise<ImportReport> {
    const { timeoutMs } = this.options;
    const deadline = Date.now() + timeoutMs;
    const report = emptyReport(sourceLabel);

    for await (const row of parseCsvRows(source)) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        throw timeoutError(`Import of ${sourceLabel}`, timeoutMs);
      }

      report.totalRows += 1;

      if (row.kind === 'malformed') {
        reject(report, row.rowNumber, 'MalformedRow', row.message);
        continue;
      }

      const [name, email, age] = row.fields;
      const result = validateRow(name, email, age);
      if (!result.ok) {
        reject(report, row.rowNumber, result.reason, result.message);
        continue;
      }

      const outcome = await withTimeout(
        this.store.insert({
          name: result.name,
          email: result.email,
          age: result.age,
          source: sourceLabel,
        }),
        remaining,
        `Import of ${sourceLabel}`
      );

      if (outcome === 'duplicate') {
        reject(report, row.rowNumber, 'DuplicateEmail', 'duplicate email (already imported)');
        continue;
      }

      report.inserted += 1;
    }

    logger.info(
      {
        source: sourceLabel,
        totalRows: report.totalRows,
        inserted: report.inserted,
        duplicateEmail: report.duplicateEmail,
        invalid: report.invalid,
      },
      'CSV import finished'
    );

    return report;
  }
}
