/**
 * Export Service
 * CSV export of all customers and the downloadable sample file.
 */

import { Readable } from 'stream';
import type { Customer, CustomerStore } from '../types/index.js';
import { CSV_COLUMNS } from '../types/index.js';

export const SAMPLE_CSV = 'name,email,age\nAlice,alice@example.com,30\nBob,bob@example.org,25\n';

export function escapeCsvValue(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCustomerLine(customer: Pick<Customer, 'name' | 'email' | 'age'>): string {
  return [customer.name, customer.email, String(customer.age)].map(escapeCsvValue).join(',');
}

export class ExportService {
  constructor(private store: CustomerStore) {}

  /**
   * Every customer as CSV lines, header first, in id order
   */
  async *csvLines(): AsyncGenerator<string> {
    yield `${CSV_COLUMNS.join(',')}\n`;

    for await (const customer of this.store.streamAll()) {
      yield `${formatCustomerLine(customer)}\n`;
    }
  }

  exportCsvStream(): Readable {
    return Readable.from(this.csvLines());
  }
}
